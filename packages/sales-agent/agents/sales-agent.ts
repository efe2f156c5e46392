// Sales Agent — retrieval-augmented answers over the indexed sales aggregates.
// Every operation embeds one retrieval query, searches the store per entity
// type, merges the pages by score and sends one prompt to the generation
// service. Generation failures come back as a degraded answer, not an error.

import { formatContext, mergeResults } from './context-formatter.js';
import {
  NOT_FOUND_SUGGESTIONS,
  RETRIEVAL_QUERIES,
  SYSTEM_PROMPTS,
  customerAnalysisPrompt,
  insightsPrompt,
  openQueryPrompt,
  productRecommendationPrompt,
  salesPitchPrompt,
  territoryAnalysisPrompt,
} from './prompts.js';
import { RequestTracker } from './request-tracker.js';
import type { EmbeddingService } from '../embeddings/embedding-service.js';
import type { GenerationClient } from '../llm/generation-client.js';
import type { VectorStore } from '../memory/vector-store.js';
import type {
  AgentTask,
  CustomerAnalysisResult,
  InsightsResult,
  ProductRecommendationResult,
  QueryResult,
  SalesPitchResult,
  TerritoryAnalysisResult,
} from '../types/agent.js';
import type { ContextResult, EntityType, SearchScope } from '../types/embeddings.js';
import type { EventBus } from '../types/events.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { GENERATION_RETRY, withRetry, type RetryPolicy, type Sleep } from '../utils/retry.js';

const log = createLogger('SalesAgent');

/** Results requested from each entity type when the scope is 'all' */
export const PER_TYPE_LIMITS: Record<EntityType, number> = {
  customer: 3,
  product: 3,
  territory: 2,
};

export interface SalesAgentOptions {
  temperature: number;
  maxTokens: number;
  retry?: RetryPolicy;
  sleep?: Sleep;
  events?: EventBus;
}

interface Generated {
  text: string;
  prompt: string;
  degraded: boolean;
}

function timestamp(): string {
  return new Date().toISOString();
}

function keyMatches(result: ContextResult, name: string): boolean {
  return result.key.toLowerCase().includes(name.toLowerCase());
}

export class SalesAgent {
  private readonly retry: RetryPolicy;

  constructor(
    private readonly embedder: EmbeddingService,
    private readonly store: VectorStore,
    private readonly client: GenerationClient,
    private readonly options: SalesAgentOptions,
  ) {
    this.retry = options.retry ?? GENERATION_RETRY;
  }

  /** Embed `query` once and return the merged, score-ordered context */
  async retrieveContext(query: string, scope: SearchScope = 'all'): Promise<ContextResult[]> {
    const vector = await this.embedder.embed(query);
    return this.search(vector, scope);
  }

  async query(text: string, scope: SearchScope = 'all'): Promise<QueryResult> {
    return this.run('open_query', async (tracker) => {
      const context = await this.retrieve(tracker, text, scope);
      const generated = await this.generate(tracker, 'open_query', () => openQueryPrompt(text, formatContext(context)));
      return {
        answer: generated.text,
        contextCount: context.length,
        contextDetails: context,
        scope,
        prompt: generated.prompt,
        degraded: generated.degraded,
        timestamp: timestamp(),
      };
    });
  }

  async analyzeCustomer(name: string): Promise<CustomerAnalysisResult> {
    return this.run('customer_analysis', async (tracker) => {
      const retrieved = await this.retrieve(tracker, RETRIEVAL_QUERIES.customer(name), 'customer');
      const matches = retrieved.filter((r) => keyMatches(r, name));
      const [first] = matches;
      if (!first) {
        tracker.fail(`Customer not found: ${name}`);
        return {
          found: false,
          error: `No information found for customer ${name}`,
          suggestions: [...NOT_FOUND_SUGGESTIONS],
          timestamp: timestamp(),
        };
      }

      const generated = await this.generate(tracker, 'customer_analysis', () =>
        customerAnalysisPrompt(formatContext(matches)),
      );
      return {
        found: true,
        analysis: generated.text,
        customer: { key: first.key, metadata: first.metadata },
        degraded: generated.degraded,
        timestamp: timestamp(),
      };
    });
  }

  async recommendProducts(criteria: string): Promise<ProductRecommendationResult> {
    return this.run('product_recommendation', async (tracker) => {
      const products = await this.retrieve(tracker, RETRIEVAL_QUERIES.products(criteria), 'product');
      const generated = await this.generate(tracker, 'product_recommendation', () =>
        productRecommendationPrompt(criteria, formatContext(products)),
      );
      return {
        recommendations: generated.text,
        productsAnalyzed: products.length,
        degraded: generated.degraded,
        timestamp: timestamp(),
      };
    });
  }

  /** An unknown territory still gets an answer, built from empty context */
  async analyzeTerritory(name: string): Promise<TerritoryAnalysisResult> {
    return this.run('territory_analysis', async (tracker) => {
      const retrieved = await this.retrieve(tracker, RETRIEVAL_QUERIES.territory(name), 'territory');
      const matches = retrieved.filter((r) => keyMatches(r, name));
      const generated = await this.generate(tracker, 'territory_analysis', () =>
        territoryAnalysisPrompt(formatContext(matches)),
      );
      const [first] = matches;
      return {
        analysis: generated.text,
        territory: first ? { key: first.key, metadata: first.metadata } : null,
        degraded: generated.degraded,
        timestamp: timestamp(),
      };
    });
  }

  async generatePitch(customer: string, productFocus = ''): Promise<SalesPitchResult> {
    return this.run('sales_pitch', async (tracker) => {
      const context = await this.retrieve(tracker, RETRIEVAL_QUERIES.pitch(customer, productFocus), 'all');
      const generated = await this.generate(tracker, 'sales_pitch', () =>
        salesPitchPrompt(customer, productFocus, formatContext(context)),
      );
      return {
        pitch: generated.text,
        personalizationLevel: context.length,
        degraded: generated.degraded,
        timestamp: timestamp(),
      };
    });
  }

  async getInsights(query: string): Promise<InsightsResult> {
    return this.run('general_insights', async (tracker) => {
      const context = await this.retrieve(tracker, query, 'all');
      const generated = await this.generate(tracker, 'general_insights', () =>
        insightsPrompt(query, formatContext(context)),
      );
      return {
        insights: generated.text,
        dataPointsAnalyzed: context.length,
        degraded: generated.degraded,
        timestamp: timestamp(),
      };
    });
  }

  // ── Pipeline steps ───────────────────────────────────────────────────

  private async run<T>(task: AgentTask, body: (tracker: RequestTracker) => Promise<T>): Promise<T> {
    const tracker = new RequestTracker(task, this.options.events);
    try {
      return await body(tracker);
    } catch (err) {
      tracker.fail(err);
      log.error(`${task} failed`, { requestId: tracker.requestId, error: errorMessage(err) });
      throw err;
    }
  }

  private async retrieve(tracker: RequestTracker, text: string, scope: SearchScope): Promise<ContextResult[]> {
    tracker.advance('EMBEDDING_QUERY');
    const vector = await this.embedder.embed(text);
    tracker.advance('RETRIEVING');
    const results = await this.search(vector, scope);
    tracker.advance('CONTEXT_MERGED');
    log.debug('Context retrieved', { requestId: tracker.requestId, scope, count: results.length });
    return results;
  }

  private async search(vector: Float32Array, scope: SearchScope): Promise<ContextResult[]> {
    const types: EntityType[] = scope === 'all' ? ['customer', 'product', 'territory'] : [scope];
    const pages: ContextResult[][] = [];
    for (const type of types) {
      pages.push(await this.store.search(vector, { type }, { limit: PER_TYPE_LIMITS[type] }));
    }
    return mergeResults(pages);
  }

  private async generate(tracker: RequestTracker, task: AgentTask, buildPrompt: () => string): Promise<Generated> {
    tracker.advance('PROMPTING');
    const prompt = buildPrompt();
    tracker.advance('GENERATING');

    try {
      const text = await withRetry(
        () =>
          this.client.complete({
            system: SYSTEM_PROMPTS[task],
            prompt,
            temperature: this.options.temperature,
            maxTokens: this.options.maxTokens,
          }),
        this.retry,
        {
          sleep: this.options.sleep,
          onRetry: ({ attempt, delayMs, error }) =>
            log.warn(`Generation attempt ${attempt} failed, retrying in ${delayMs}ms`, {
              task,
              error: errorMessage(error),
            }),
        },
      );
      tracker.advance('DONE');
      return { text, prompt, degraded: false };
    } catch (err) {
      const message = errorMessage(err);
      log.error('Generation failed', { task, requestId: tracker.requestId, error: message });
      tracker.fail(err);
      return { text: `Error generating response: ${message}`, prompt, degraded: true };
    }
  }
}
