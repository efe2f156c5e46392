// Forwards domain events to the structured logger

import type { DomainEvent, DomainEventType, EventBus } from '../types/events.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const DOMAIN_EVENT_TYPES = [
  'RequestStateChanged',
  'EmbeddingsGenerated',
  'EmbeddingsStored',
  'IndexRebuilt',
] as const satisfies readonly DomainEventType[];

/**
 * Log every domain event on the bus. Request state changes are chatty and go
 * to debug; index events go to info. Returns a function that detaches the
 * handlers.
 */
export function logDomainEvents(bus: EventBus, log: Logger = createLogger('Events')): () => void {
  const handler = (event: DomainEvent): void => {
    const data = { source: event.source, eventId: event.eventId, payload: event.payload };
    if (event.type === 'RequestStateChanged') log.debug(event.type, data);
    else log.info(event.type, data);
  };
  for (const type of DOMAIN_EVENT_TYPES) bus.on(type, handler);
  return () => {
    for (const type of DOMAIN_EVENT_TYPES) bus.off(type, handler);
  };
}
