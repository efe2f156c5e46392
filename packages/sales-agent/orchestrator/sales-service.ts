// Sales Service — the facade the CLI and MCP tools call.
// Every operation resolves to an ApiResponse; nothing here rejects.

import { randomUUID } from 'node:crypto';
import type { AppContext } from './app-context.js';
import type {
  CustomerAnalysisResult,
  InsightsResult,
  ProductRecommendationResult,
  QueryResult,
  SalesPitchResult,
  TerritoryAnalysisResult,
} from '../types/agent.js';
import type { CollectionStats, SearchScope, StoreHealth } from '../types/embeddings.js';
import type { DomainEventType } from '../types/events.js';
import type {
  CustomerStatus,
  ProcessingSummary,
  ProductCatalogEntry,
  TerritoryInsights,
} from '../types/sales.js';
import { ExternalServiceError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('SalesService');

export const APP_VERSION = '0.1.0';

export type ApiResponse<T> =
  | { success: true; message: string; data: T }
  | { success: false; message: string; error: string; data?: T };

export interface RebuildReport {
  summary: ProcessingSummary;
  recordsGenerated: number;
  notEnriched: number;
  notEmbedded: number;
  stats: CollectionStats;
}

export interface CustomerRanking {
  name: string;
  totalSales: number;
  totalOrders: number;
  avgOrderValue: number;
  territory: string;
  status: CustomerStatus;
}

export interface SystemStats {
  totalCustomers: number;
  totalProducts: number;
  totalTerritories: number;
  vectorStore: CollectionStats;
}

export interface SystemHealth {
  status: 'healthy' | 'degraded';
  version: string;
  dataLoaded: boolean;
  vectorStore: StoreHealth;
}

export class SalesService {
  private rebuildTail: Promise<unknown> = Promise.resolve();
  private loading: Promise<ProcessingSummary> | null = null;

  constructor(private readonly ctx: AppContext) {}

  // ── Write path ──────────────────────────────────────────────────────

  async processData(): Promise<ApiResponse<ProcessingSummary>> {
    return this.respond('processData', 'Data processing completed', () => this.ctx.processor.processAll());
  }

  /**
   * Load, aggregate, embed and replace the stored index. Concurrent calls
   * queue behind the rebuild already running.
   */
  rebuildIndex(): Promise<ApiResponse<RebuildReport>> {
    const run = this.rebuildTail.then(() => this.respond('rebuildIndex', 'Index rebuilt', () => this.rebuild()));
    this.rebuildTail = run;
    return run;
  }

  async clearIndex(): Promise<ApiResponse<{ cleared: true }>> {
    return this.respond('clearIndex', 'Vector store cleared', async () => {
      const ok = await this.ctx.store.clearCollection();
      if (!ok) throw new ExternalServiceError('vector-store', 'Failed to clear the collection');
      return { cleared: true as const };
    });
  }

  // ── Agent operations ────────────────────────────────────────────────

  async query(text: string, scope: SearchScope = 'all'): Promise<ApiResponse<QueryResult>> {
    return this.respond('query', 'Query processed successfully', () => this.ctx.agent.query(requireText(text, 'query'), scope));
  }

  async analyzeCustomer(name: string): Promise<ApiResponse<CustomerAnalysisResult>> {
    let result: CustomerAnalysisResult;
    try {
      result = await this.ctx.agent.analyzeCustomer(requireText(name, 'customer name'));
    } catch (err) {
      return failure('analyzeCustomer', err);
    }
    if (!result.found) return { success: false, message: result.error, error: result.error, data: result };
    return { success: true, message: 'Customer analysis completed', data: result };
  }

  async recommendProducts(criteria: string): Promise<ApiResponse<ProductRecommendationResult>> {
    return this.respond('recommendProducts', 'Product recommendations generated', () =>
      this.ctx.agent.recommendProducts(requireText(criteria, 'customer criteria')),
    );
  }

  async analyzeTerritory(name: string): Promise<ApiResponse<TerritoryAnalysisResult>> {
    return this.respond('analyzeTerritory', 'Territory analysis completed', () =>
      this.ctx.agent.analyzeTerritory(requireText(name, 'territory name')),
    );
  }

  async generatePitch(customer: string, productFocus = ''): Promise<ApiResponse<SalesPitchResult>> {
    return this.respond('generatePitch', 'Sales pitch generated', () =>
      this.ctx.agent.generatePitch(requireText(customer, 'customer name'), productFocus.trim()),
    );
  }

  async getInsights(query: string): Promise<ApiResponse<InsightsResult>> {
    return this.respond('getInsights', 'Sales insights generated', () => this.ctx.agent.getInsights(requireText(query, 'query')));
  }

  // ── Aggregate reads ─────────────────────────────────────────────────

  async topCustomers(limit = 10): Promise<ApiResponse<{ customers: CustomerRanking[] }>> {
    return this.respond('topCustomers', `Top ${limit} customers retrieved`, async () => {
      await this.ensureData();
      const customers = this.ctx.processor.getTopCustomers(limit).map((c) => ({
        name: c.name,
        totalSales: c.totalSales,
        totalOrders: c.totalOrders,
        avgOrderValue: c.avgOrderValue,
        territory: c.territory,
        status: c.customerStatus,
      }));
      return { customers };
    });
  }

  async topProducts(limit = 10): Promise<ApiResponse<{ products: ProductCatalogEntry[] }>> {
    return this.respond('topProducts', `Top ${limit} products retrieved`, async () => {
      await this.ensureData();
      return { products: this.ctx.processor.getTopProducts(limit) };
    });
  }

  async territoryInsights(): Promise<ApiResponse<TerritoryInsights>> {
    return this.respond('territoryInsights', 'Territory insights retrieved', async () => {
      await this.ensureData();
      return this.ctx.processor.getTerritoryInsights();
    });
  }

  async stats(): Promise<ApiResponse<SystemStats>> {
    return this.respond('stats', 'Statistics retrieved', async () => {
      await this.ensureData();
      const aggregates = this.ctx.processor.getAggregates();
      return {
        totalCustomers: aggregates?.customers.size ?? 0,
        totalProducts: aggregates?.products.size ?? 0,
        totalTerritories: aggregates?.territories.size ?? 0,
        vectorStore: await this.ctx.store.getStats(),
      };
    });
  }

  async health(): Promise<ApiResponse<SystemHealth>> {
    return this.respond('health', 'Health check completed', async () => {
      const vectorStore = await this.ctx.store.healthCheck();
      return {
        status: vectorStore.status === 'healthy' ? ('healthy' as const) : ('degraded' as const),
        version: APP_VERSION,
        dataLoaded: this.ctx.processor.getAggregates() !== null,
        vectorStore,
      };
    });
  }

  // ── Internals ───────────────────────────────────────────────────────

  private async rebuild(): Promise<RebuildReport> {
    const summary = await this.ctx.processor.processAll();
    const aggregates = this.ctx.processor.getAggregates();
    if (!aggregates) throw new Error('Aggregates unavailable after processing');

    const records = [...(await this.ctx.generator.generateEmbeddings(aggregates)).values()];
    const notEnriched = records.filter((r) => !r.enriched).length;
    const notEmbedded = records.filter((r) => !r.embedded).length;
    this.emit('EmbeddingsGenerated', { count: records.length, notEnriched, notEmbedded });

    // Full recompute: entities missing from the new source must not survive
    const cleared = await this.ctx.store.clearCollection();
    if (!cleared) throw new ExternalServiceError('vector-store', 'Failed to clear the collection before rebuilding');

    const stored = await this.ctx.store.upsert(records);
    if (!stored) throw new ExternalServiceError('vector-store', 'Failed to store embeddings');
    this.emit('EmbeddingsStored', { count: records.length });
    log.info(`Successfully stored ${records.length} embeddings`);

    const stats = await this.ctx.store.getStats();
    this.emit('IndexRebuilt', { summary, stats });

    return { summary, recordsGenerated: records.length, notEnriched, notEmbedded, stats };
  }

  private async ensureData(): Promise<void> {
    if (this.ctx.processor.getAggregates()) return;
    this.loading ??= this.ctx.processor.processAll().finally(() => {
      this.loading = null;
    });
    await this.loading;
  }

  private emit(type: DomainEventType, payload: Record<string, unknown>): void {
    this.ctx.events.emit({
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      source: 'sales-service',
      payload,
    });
  }

  private async respond<T>(operation: string, message: string, fn: () => Promise<T>): Promise<ApiResponse<T>> {
    try {
      return { success: true, message, data: await fn() };
    } catch (err) {
      return failure(operation, err);
    }
  }
}

function requireText(value: string, field: string): string {
  const trimmed = value.trim();
  if (!trimmed) throw new RangeError(`${field} must not be empty`);
  return trimmed;
}

function failure<T>(operation: string, err: unknown): ApiResponse<T> {
  const error = errorMessage(err);
  log.error(`${operation} failed`, { error });
  return { success: false, message: `Error: ${error}`, error };
}
