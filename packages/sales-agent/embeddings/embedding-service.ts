// Embedding Service — text → fixed-dimension vector.
// Provider calls are retried; anything that still fails degrades to the
// zero vector so one bad input cannot abort a batch.

import OpenAI from 'openai';
import { validateEmbedding } from './embedding-guard.js';
import { ExternalServiceError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { GENERATION_RETRY, withRetry, type RetryPolicy, type Sleep } from '../utils/retry.js';
import { computed, fallback, type Outcome } from '../types/outcome.js';

const log = createLogger('EmbeddingService');

export interface EmbeddingProvider {
  readonly model: string;
  embed(text: string): Promise<Float32Array>;
}

export interface OpenAiEmbeddingConfig {
  apiKey: string;
  model: string;
  dimension: number;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private client: OpenAI;

  constructor(private readonly config: OpenAiEmbeddingConfig) {
    this.model = config.model;
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async embed(text: string): Promise<Float32Array> {
    const response = await this.client.embeddings
      .create({
        model: this.config.model,
        input: text,
        dimensions: this.config.dimension,
      })
      .catch((err: unknown) => {
        throw new ExternalServiceError('embedding', `Embedding request failed: ${errorMessage(err)}`, err);
      });

    const first = response.data[0];
    if (!first) throw new ExternalServiceError('embedding', 'Embedding response contained no vectors');
    return Float32Array.from(first.embedding);
  }
}

export interface EmbeddingServiceOptions {
  retry?: RetryPolicy;
  sleep?: Sleep;
}

export class EmbeddingService {
  private readonly retry: RetryPolicy;
  private readonly sleep?: Sleep;

  constructor(
    private readonly provider: EmbeddingProvider,
    readonly dimension: number,
    options: EmbeddingServiceOptions = {},
  ) {
    this.retry = options.retry ?? GENERATION_RETRY;
    this.sleep = options.sleep;
  }

  zeroVector(): Float32Array {
    return new Float32Array(this.dimension);
  }

  /** Never throws. A `fallback` outcome carries the zero vector. */
  async embedOutcome(text: string): Promise<Outcome<Float32Array>> {
    if (text.trim() === '') {
      return fallback(this.zeroVector(), 'empty text');
    }

    try {
      const vector = await withRetry(
        async () => {
          const v = await this.provider.embed(text);
          validateEmbedding(v, this.dimension, text);
          return v;
        },
        this.retry,
        {
          sleep: this.sleep,
          onRetry: ({ attempt, delayMs, error }) =>
            log.warn(`Embedding attempt ${attempt} failed, retrying in ${delayMs}ms`, {
              error: errorMessage(error),
            }),
        },
      );
      return computed(vector);
    } catch (err) {
      const reason = errorMessage(err);
      log.error('Embedding failed, using zero vector', { error: reason, model: this.provider.model });
      return fallback(this.zeroVector(), reason);
    }
  }

  async embed(text: string): Promise<Float32Array> {
    const outcome = await this.embedOutcome(text);
    return outcome.value;
  }
}
