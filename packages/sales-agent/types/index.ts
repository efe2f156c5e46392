export type * from './sales.js';
export type * from './embeddings.js';
export type * from './agent.js';
export type * from './events.js';
export type { Outcome } from './outcome.js';
export { ENTITY_TYPES } from './embeddings.js';
export { SimpleEventBus } from './events.js';
export { computed, fallback, isFallback } from './outcome.js';
