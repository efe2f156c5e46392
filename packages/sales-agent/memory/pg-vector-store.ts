// PgVectorStore — PostgreSQL-backed VectorStore via ruvector-postgres
// One table per collection: ruvector(D) column, JSONB payload, stable UUID ids

import { closePool, float32ToVectorLiteral, queryWithRetry } from '../db/pg-client.js';
import { DEFAULT_SCORE_THRESHOLD, DEFAULT_SEARCH_LIMIT, stableId, type VectorStore } from './vector-store.js';
import { applyPostFilters, equalityPredicates, fromPayload, toPayload } from './search-filters.js';
import { ConfigurationError, ExternalServiceError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { ENTITY_TYPES } from '../types/embeddings.js';
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

const log = createLogger('PgVectorStore');

/** Rows per INSERT statement; 6 parameters each keeps well under the protocol limit */
const UPSERT_BATCH = 1000;

/** ruvector operator and the expression turning its distance into a similarity score */
const METRIC_SQL: Record<DistanceMetric, { operator: string; score: (dist: string) => string }> = {
  cosine: { operator: '<=>', score: (d) => `1 - (${d})` },
  euclidean: { operator: '<->', score: (d) => `1 / (1 + (${d}))` },
  // <#> is the negative inner product
  dot_product: { operator: '<#>', score: (d) => `-(${d})` },
};

function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some((t) => t === value);
}

export class PgVectorStore implements VectorStore {
  private dimension = 0;
  private metric: DistanceMetric = 'cosine';

  constructor(private readonly table: string) {
    if (!/^[a-z_][a-z0-9_]*$/.test(table)) {
      throw new ConfigurationError([`Invalid collection name: ${table}`]);
    }
  }

  async ensureCollection(dimension: number, metric: DistanceMetric = 'cosine'): Promise<void> {
    this.dimension = dimension;
    this.metric = metric;
    try {
      await queryWithRetry('CREATE EXTENSION IF NOT EXISTS ruvector', []);
      await queryWithRetry(
        `CREATE TABLE IF NOT EXISTS ${this.table} (
          id UUID PRIMARY KEY,
          entity_key TEXT NOT NULL,
          entity_type TEXT NOT NULL,
          content TEXT NOT NULL,
          payload JSONB NOT NULL,
          embedding ruvector(${dimension}) NOT NULL,
          updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
        )`,
        [],
      );
      await queryWithRetry(
        `CREATE INDEX IF NOT EXISTS ${this.table}_entity_type_idx ON ${this.table} (entity_type)`,
        [],
      );
      log.info(`Collection ready: ${this.table}`, { dimension, metric });
    } catch (err) {
      throw new ExternalServiceError('vector-store', `Cannot create collection ${this.table}: ${errorMessage(err)}`, err);
    }
  }

  async upsert(records: readonly EmbeddingRecord[]): Promise<boolean> {
    if (records.length === 0) {
      log.warn('No embeddings to store');
      return true;
    }

    try {
      for (let start = 0; start < records.length; start += UPSERT_BATCH) {
        const batch = records.slice(start, start + UPSERT_BATCH);
        const params: unknown[] = [];
        const tuples = batch.map((r, i) => {
          const b = i * 6;
          params.push(
            r.id ?? stableId(r.entityType, r.key),
            r.key,
            r.entityType,
            r.text,
            JSON.stringify(toPayload(r.metadata)),
            float32ToVectorLiteral(r.vector),
          );
          return `($${b + 1}, $${b + 2}, $${b + 3}, $${b + 4}, $${b + 5}::jsonb, $${b + 6}::ruvector)`;
        });

        await queryWithRetry(
          `INSERT INTO ${this.table} (id, entity_key, entity_type, content, payload, embedding)
           VALUES ${tuples.join(', ')}
           ON CONFLICT (id) DO UPDATE SET
             entity_key = EXCLUDED.entity_key,
             entity_type = EXCLUDED.entity_type,
             content = EXCLUDED.content,
             payload = EXCLUDED.payload,
             embedding = EXCLUDED.embedding,
             updated_at = now()`,
          params,
        );
      }
      log.info(`Stored ${records.length} embeddings in ${this.table}`);
      return true;
    } catch (err) {
      log.error('Error storing embeddings', { error: errorMessage(err) });
      return false;
    }
  }

  async search(vector: Float32Array, filters: SearchFilters, options: SearchOptions = {}): Promise<ContextResult[]> {
    const limit = options.limit ?? DEFAULT_SEARCH_LIMIT;
    const threshold = options.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD;
    const { operator, score } = METRIC_SQL[this.metric];
    const distance = `embedding ${operator} $1::ruvector`;
    const scoreExpr = score(distance);

    const params: unknown[] = [float32ToVectorLiteral(vector)];
    const where = equalityPredicates(filters).map(([field, value]) => {
      params.push(field, value);
      return `payload->>$${params.length - 1} = $${params.length}`;
    });
    params.push(threshold);
    where.push(`${scoreExpr} >= $${params.length}`);
    params.push(limit);
    const limitParam = `$${params.length}`;

    try {
      const { rows } = await queryWithRetry<{
        id: string;
        entity_key: string;
        entity_type: string;
        content: string;
        payload: unknown;
        score: number;
      }>(
        `SELECT id, entity_key, entity_type, content, payload, ${scoreExpr} AS score
         FROM ${this.table}
         WHERE ${where.join(' AND ')}
         ORDER BY ${distance}
         LIMIT ${limitParam}`,
        params,
      );

      const page: ContextResult[] = [];
      for (const r of rows) {
        const metadata = fromPayload(r.payload);
        if (!metadata || !isEntityType(r.entity_type)) {
          log.warn('Skipping row with unrecognized payload', { id: r.id });
          continue;
        }
        page.push({
          id: r.id,
          key: r.entity_key,
          entityType: r.entity_type,
          score: Number(r.score),
          text: r.content,
          metadata,
        });
      }
      return applyPostFilters(page, filters);
    } catch (err) {
      log.error('Error searching embeddings', { error: errorMessage(err) });
      return [];
    }
  }

  async getStats(): Promise<CollectionStats> {
    try {
      const present = await this.collectionPresent();
      if (!present) return { totalPoints: 0, perTypeCounts: {}, status: 'missing' };

      const { rows } = await queryWithRetry<{ entity_type: string; count: number }>(
        `SELECT entity_type, count(*)::int AS count FROM ${this.table} GROUP BY entity_type`,
        [],
      );
      const perTypeCounts: Partial<Record<EntityType, number>> = { customer: 0, product: 0, territory: 0 };
      let totalPoints = 0;
      for (const r of rows) {
        const count = Number(r.count);
        totalPoints += count;
        if (isEntityType(r.entity_type)) perTypeCounts[r.entity_type] = count;
      }
      return { totalPoints, perTypeCounts, status: 'ready' };
    } catch (err) {
      log.error('Error getting collection stats', { error: errorMessage(err) });
      return { totalPoints: 0, perTypeCounts: {}, status: 'unavailable' };
    }
  }

  async healthCheck(): Promise<StoreHealth> {
    try {
      return { status: 'healthy', collectionPresent: await this.collectionPresent() };
    } catch (err) {
      const error = errorMessage(err);
      log.error('Health check failed', { error });
      return { status: 'unhealthy', collectionPresent: false, error };
    }
  }

  async clearCollection(): Promise<boolean> {
    try {
      await queryWithRetry(`DROP TABLE IF EXISTS ${this.table}`, []);
      await this.ensureCollection(this.dimension, this.metric);
      log.info(`Cleared collection: ${this.table}`);
      return true;
    } catch (err) {
      log.error('Error clearing collection', { error: errorMessage(err) });
      return false;
    }
  }

  async close(): Promise<void> {
    await closePool();
  }

  private async collectionPresent(): Promise<boolean> {
    const { rows } = await queryWithRetry<{ reg: string | null }>('SELECT to_regclass($1)::text AS reg', [this.table]);
    return (rows[0]?.reg ?? null) !== null;
  }
}
