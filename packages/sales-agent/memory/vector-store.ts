// Vector Store — persisted (vector, metadata) pairs with filtered similarity search
// Postgres/ruvector in production (pg-vector-store.ts); in-process fallback here

import { createHash } from 'node:crypto';
import type {
  CollectionStats,
  ContextResult,
  DistanceMetric,
  EmbeddingRecord,
  EntityType,
  SearchFilters,
  SearchOptions,
  StoreHealth,
} from '../types/embeddings.js';
import { applyPostFilters, matchesEquality } from './search-filters.js';
import { createLogger } from '../utils/logger.js';

export const DEFAULT_SEARCH_LIMIT = 10;
export const DEFAULT_SCORE_THRESHOLD = 0;

export interface VectorStore {
  /** Idempotent; throws ExternalServiceError when the backend is unreachable */
  ensureCollection(dimension: number, metric?: DistanceMetric): Promise<void>;
  /** Empty input is a successful no-op */
  upsert(records: readonly EmbeddingRecord[]): Promise<boolean>;
  /** Descending by score; [] on failure */
  search(vector: Float32Array, filters: SearchFilters, options?: SearchOptions): Promise<ContextResult[]>;
  getStats(): Promise<CollectionStats>;
  healthCheck(): Promise<StoreHealth>;
  /** Drops and recreates the collection */
  clearCollection(): Promise<boolean>;
  close(): Promise<void>;
}

/** Deterministic UUID-shaped id from type and key, so rebuilds overwrite in place */
export function stableId(entityType: EntityType, key: string): string {
  const hex = createHash('sha256').update(`${entityType}:${key}`).digest('hex');
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20, 32)].join('-');
}

export function similarity(a: Float32Array, b: Float32Array, metric: DistanceMetric): number {
  let dot = 0, normA = 0, normB = 0, dist = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
    const d = a[i] - b[i];
    dist += d * d;
  }
  switch (metric) {
    case 'cosine': {
      const denom = Math.sqrt(normA) * Math.sqrt(normB);
      return denom === 0 ? 0 : dot / denom;
    }
    case 'euclidean':
      return 1 / (1 + Math.sqrt(dist));
    case 'dot_product':
      return dot;
  }
}

interface StoredPoint {
  record: EmbeddingRecord;
  id: string;
}

/** In-process collection with the same contract as the Postgres store */
export class LocalVectorStore implements VectorStore {
  private readonly log = createLogger('LocalVectorStore');
  private points: Map<string, StoredPoint> | null = null;
  private dimension = 0;
  private metric: DistanceMetric = 'cosine';

  constructor(private readonly collection = 'sales_data') {}

  async ensureCollection(dimension: number, metric: DistanceMetric = 'cosine'): Promise<void> {
    if (this.points) return;
    this.points = new Map();
    this.dimension = dimension;
    this.metric = metric;
    this.log.info(`Created collection: ${this.collection}`, { dimension, metric });
  }

  async upsert(records: readonly EmbeddingRecord[]): Promise<boolean> {
    if (records.length === 0) {
      this.log.warn('No embeddings to store');
      return true;
    }
    if (!this.points) {
      this.log.error('Collection does not exist', { collection: this.collection });
      return false;
    }
    for (const r of records) {
      if (r.vector.length !== this.dimension) {
        this.log.error('Vector dimension mismatch', { key: r.key, got: r.vector.length, expected: this.dimension });
        return false;
      }
    }
    for (const r of records) {
      const id = r.id ?? stableId(r.entityType, r.key);
      this.points.set(id, { id, record: { ...r, id } });
    }
    this.log.info(`Stored ${records.length} embeddings`);
    return true;
  }

  async search(vector: Float32Array, filters: SearchFilters, options: SearchOptions = {}): Promise<ContextResult[]> {
    if (!this.points) return [];
    const limit = options.limit ?? DEFAULT_SEARCH_LIMIT;
    const threshold = options.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD;

    const page = [...this.points.values()]
      .filter((p) => matchesEquality(p.record.metadata, filters))
      .map(
        (p): ContextResult => ({
          id: p.id,
          key: p.record.key,
          entityType: p.record.entityType,
          score: similarity(vector, p.record.vector, this.metric),
          text: p.record.text,
          metadata: p.record.metadata,
        }),
      )
      .filter((r) => r.score >= threshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, limit));

    return applyPostFilters(page, filters);
  }

  async getStats(): Promise<CollectionStats> {
    if (!this.points) return { totalPoints: 0, perTypeCounts: {}, status: 'missing' };
    const perTypeCounts: Partial<Record<EntityType, number>> = { customer: 0, product: 0, territory: 0 };
    for (const p of this.points.values()) {
      perTypeCounts[p.record.entityType] = (perTypeCounts[p.record.entityType] ?? 0) + 1;
    }
    return { totalPoints: this.points.size, perTypeCounts, status: 'ready' };
  }

  async healthCheck(): Promise<StoreHealth> {
    return { status: 'healthy', collectionPresent: this.points !== null };
  }

  async clearCollection(): Promise<boolean> {
    const dimension = this.dimension;
    this.points = null;
    await this.ensureCollection(dimension, this.metric);
    this.log.info(`Cleared collection: ${this.collection}`);
    return true;
  }

  async close(): Promise<void> {
    // nothing held open
  }
}
