// Application context — built once at startup and handed to every surface.
// Owns the settings, processor, enrichment and embedding services, vector
// store, agent and event bus. Providers can be swapped for tests.

import type { Settings } from '../config/settings.js';
import { createVectorStore } from '../config/database.js';
import { SalesDataProcessor, type SourceReader } from '../data/sales-processor.js';
import { SlidingWindowRateLimiter, systemClock, type Clock } from '../embeddings/rate-limiter.js';
import { TextEnhancer } from '../embeddings/text-synthesizer.js';
import {
  EmbeddingService,
  OpenAiEmbeddingProvider,
  type EmbeddingProvider,
} from '../embeddings/embedding-service.js';
import { EmbeddingGenerator } from '../embeddings/embedding-generator.js';
import { AnthropicGenerationClient, type GenerationClient } from '../llm/generation-client.js';
import type { VectorStore } from '../memory/vector-store.js';
import { SalesAgent } from '../agents/sales-agent.js';
import { SimpleEventBus, type EventBus } from '../types/events.js';
import { createLogger, setLogLevel } from '../utils/logger.js';
import type { Sleep } from '../utils/retry.js';

const log = createLogger('AppContext');

/** Enrichment prompts ask for at most 200 words */
const ENRICHMENT_MAX_TOKENS = 300;

export interface AppContextOverrides {
  generation?: GenerationClient;
  embeddingProvider?: EmbeddingProvider;
  store?: VectorStore;
  readSource?: SourceReader;
  clock?: Clock;
  sleep?: Sleep;
  events?: EventBus;
}

export interface AppContext {
  readonly settings: Settings;
  readonly events: EventBus;
  readonly processor: SalesDataProcessor;
  readonly limiter: SlidingWindowRateLimiter;
  readonly enhancer: TextEnhancer;
  readonly embedder: EmbeddingService;
  readonly generator: EmbeddingGenerator;
  readonly store: VectorStore;
  readonly agent: SalesAgent;
  close(): Promise<void>;
}

/**
 * Wire every component from settings. The vector store collection is created
 * here; a store that cannot be prepared fails startup.
 */
export async function createAppContext(
  settings: Settings,
  overrides: AppContextOverrides = {},
): Promise<AppContext> {
  setLogLevel(settings.logLevel);

  const events = overrides.events ?? new SimpleEventBus();
  const clock = overrides.clock ?? systemClock;
  const sleep = overrides.sleep ?? clock.sleep;

  const generation =
    overrides.generation ??
    new AnthropicGenerationClient({ apiKey: settings.generation.apiKey, model: settings.generation.model });
  const provider =
    overrides.embeddingProvider ??
    new OpenAiEmbeddingProvider({
      apiKey: settings.embedding.apiKey,
      model: settings.embedding.model,
      dimension: settings.embedding.dimension,
    });

  const processor = new SalesDataProcessor(settings.dataPath, overrides.readSource);
  const limiter = new SlidingWindowRateLimiter(settings.rateLimit.maxRequests, settings.rateLimit.windowMs, clock);
  const enhancer = new TextEnhancer(generation, limiter, {
    enabled: settings.embedding.enrichText,
    temperature: settings.generation.temperature,
    maxTokens: ENRICHMENT_MAX_TOKENS,
    sleep,
  });
  const embedder = new EmbeddingService(provider, settings.embedding.dimension, { sleep });
  const generator = new EmbeddingGenerator(enhancer, embedder, {
    itemDelayMs: settings.embedding.itemDelayMs,
    sleep,
  });

  const store = overrides.store ?? (await createVectorStore(settings));
  await store.ensureCollection(settings.embedding.dimension);

  const agent = new SalesAgent(embedder, store, generation, {
    temperature: settings.generation.temperature,
    maxTokens: settings.generation.maxTokens,
    sleep,
    events,
  });

  log.info('Application context ready', {
    backend: overrides.store ? 'custom' : settings.vectorStore.backend,
    collection: settings.vectorStore.collection,
    dimension: settings.embedding.dimension,
    enrichText: settings.embedding.enrichText,
  });

  return {
    settings,
    events,
    processor,
    limiter,
    enhancer,
    embedder,
    generator,
    store,
    agent,
    close: () => store.close(),
  };
}
