// Per-request lifecycle:
// RECEIVED → EMBEDDING_QUERY → RETRIEVING → CONTEXT_MERGED → PROMPTING → GENERATING → DONE
// ERROR is reachable from every non-terminal state.

import { randomUUID } from 'node:crypto';
import type { AgentTask, RequestState, RequestStateChange } from '../types/agent.js';
import type { EventBus } from '../types/events.js';
import { errorMessage } from '../utils/errors.js';

const TRANSITIONS: Record<RequestState, readonly RequestState[]> = {
  RECEIVED: ['EMBEDDING_QUERY', 'ERROR'],
  EMBEDDING_QUERY: ['RETRIEVING', 'ERROR'],
  RETRIEVING: ['CONTEXT_MERGED', 'ERROR'],
  CONTEXT_MERGED: ['PROMPTING', 'ERROR'],
  PROMPTING: ['GENERATING', 'ERROR'],
  GENERATING: ['DONE', 'ERROR'],
  DONE: [],
  ERROR: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: RequestState,
    public readonly to: RequestState,
  ) {
    super(`Illegal request transition ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class RequestTracker {
  private current: RequestState = 'RECEIVED';
  readonly history: RequestState[] = ['RECEIVED'];

  constructor(
    readonly task: AgentTask,
    private readonly events?: EventBus,
    readonly requestId: string = randomUUID(),
  ) {}

  get state(): RequestState {
    return this.current;
  }

  get terminal(): boolean {
    return this.current === 'DONE' || this.current === 'ERROR';
  }

  advance(to: RequestState, error?: string): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) throw new IllegalTransitionError(from, to);
    this.current = to;
    this.history.push(to);

    const payload: RequestStateChange = { requestId: this.requestId, task: this.task, from, to };
    if (error !== undefined) payload.error = error;
    this.events?.emit({
      eventId: randomUUID(),
      type: 'RequestStateChanged',
      timestamp: new Date(),
      source: 'sales-agent',
      payload,
    });
  }

  /** Move to ERROR unless the request already finished */
  fail(err: unknown): void {
    if (this.terminal) return;
    this.advance('ERROR', errorMessage(err));
  }
}
