// Sales Insight — retrieval-augmented sales analytics
// Aggregates transactions, embeds entity descriptions and answers questions from retrieved context

export { createAppContext } from './orchestrator/app-context.js';
export { logDomainEvents, DOMAIN_EVENT_TYPES } from './orchestrator/event-log.js';
export type { AppContext, AppContextOverrides } from './orchestrator/app-context.js';
export { SalesService, APP_VERSION } from './orchestrator/sales-service.js';
export type {
  ApiResponse,
  RebuildReport,
  CustomerRanking,
  SystemStats,
  SystemHealth,
} from './orchestrator/sales-service.js';

export { SalesAgent, PER_TYPE_LIMITS } from './agents/sales-agent.js';
export type { SalesAgentOptions } from './agents/sales-agent.js';
export { formatContext, NO_CONTEXT } from './agents/context-formatter.js';
export { RequestTracker, IllegalTransitionError } from './agents/request-tracker.js';

export { SalesDataProcessor, aggregate, cleanRows } from './data/sales-processor.js';
export { EmbeddingService, OpenAiEmbeddingProvider } from './embeddings/embedding-service.js';
export type { EmbeddingProvider } from './embeddings/embedding-service.js';
export { EmbeddingGenerator } from './embeddings/embedding-generator.js';
export { TextEnhancer, synthesize } from './embeddings/text-synthesizer.js';
export { SlidingWindowRateLimiter } from './embeddings/rate-limiter.js';
export { AnthropicGenerationClient } from './llm/generation-client.js';
export type { GenerationClient, CompletionRequest } from './llm/generation-client.js';

export { LocalVectorStore, stableId } from './memory/vector-store.js';
export type { VectorStore } from './memory/vector-store.js';
export { PgVectorStore } from './memory/pg-vector-store.js';

// Vector store factory — backend from settings.vectorStore.backend
export { createVectorStore } from './config/database.js';
export { loadSettings, validateSettings, assertStartupReady } from './config/settings.js';
export type { Settings } from './config/settings.js';

export { ConfigurationError, DataLoadError, ExternalServiceError } from './utils/errors.js';
export { createLogger, setLogLevel } from './utils/logger.js';

export * from './types/index.js';
