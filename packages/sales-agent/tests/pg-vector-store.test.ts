import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { EmbeddingRecord } from '../types/embeddings.js';

const { mockQuery, mockClosePool } = vi.hoisted(() => ({
  mockQuery: vi.fn(),
  mockClosePool: vi.fn(),
}));

vi.mock('../db/pg-client.js', () => ({
  queryWithRetry: mockQuery,
  closePool: mockClosePool,
  float32ToVectorLiteral: (vec: Float32Array) => `[${Array.from(vec).join(',')}]`,
}));

import { PgVectorStore } from '../memory/pg-vector-store.js';
import { stableId } from '../memory/vector-store.js';
import { ConfigurationError, ExternalServiceError } from '../utils/errors.js';

function record(overrides: Partial<EmbeddingRecord> = {}): EmbeddingRecord {
  return {
    key: 'A',
    entityType: 'customer',
    text: 'Customer: A',
    vector: Float32Array.from([1, 0]),
    metadata: { type: 'customer', territory: 'EMEA', totalSales: 300, customerStatus: 'Active' },
    enriched: true,
    embedded: true,
    ...overrides,
  };
}

describe('PgVectorStore', () => {
  let store: PgVectorStore;

  beforeEach(() => {
    vi.clearAllMocks();
    mockQuery.mockReset();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new PgVectorStore('sales_data');
  });

  it('rejects collection names that are not plain identifiers', () => {
    expect(() => new PgVectorStore('sales; DROP TABLE x')).toThrow(ConfigurationError);
  });

  it('ensureCollection creates the extension, table and index', async () => {
    mockQuery.mockResolvedValue({ rows: [] });

    await store.ensureCollection(384);

    expect(mockQuery).toHaveBeenCalledTimes(3);
    expect(mockQuery.mock.calls[0][0]).toBe('CREATE EXTENSION IF NOT EXISTS ruvector');
    expect(mockQuery.mock.calls[1][0]).toContain('CREATE TABLE IF NOT EXISTS sales_data');
    expect(mockQuery.mock.calls[1][0]).toContain('embedding ruvector(384) NOT NULL');
    expect(mockQuery.mock.calls[2][0]).toContain('CREATE INDEX IF NOT EXISTS sales_data_entity_type_idx');
  });

  it('ensureCollection surfaces failures as ExternalServiceError', async () => {
    mockQuery.mockRejectedValueOnce(new Error('connection refused'));
    await expect(store.ensureCollection(384)).rejects.toThrow(ExternalServiceError);
  });

  it('upsert of an empty batch issues no query', async () => {
    expect(await store.upsert([])).toBe(true);
    expect(mockQuery).not.toHaveBeenCalled();
  });

  it('upserts every record in one multi-row statement', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 2 });

    const ok = await store.upsert([
      record(),
      record({
        key: 'EMEA',
        entityType: 'territory',
        text: 'Territory: EMEA',
        metadata: { type: 'territory', marketShare: 100, totalSales: 800, uniqueCustomers: 2 },
      }),
    ]);

    expect(ok).toBe(true);
    expect(mockQuery).toHaveBeenCalledOnce();
    const [sql, params] = mockQuery.mock.calls[0];
    expect(sql).toContain('INSERT INTO sales_data');
    expect(sql).toContain('($1, $2, $3, $4, $5::jsonb, $6::ruvector), ($7, $8, $9, $10, $11::jsonb, $12::ruvector)');
    expect(sql).toContain('ON CONFLICT (id) DO UPDATE');
    expect(params).toEqual([
      stableId('customer', 'A'),
      'A',
      'customer',
      'Customer: A',
      JSON.stringify({ type: 'customer', territory: 'EMEA', total_sales: 300, customer_status: 'Active' }),
      '[1,0]',
      stableId('territory', 'EMEA'),
      'EMEA',
      'territory',
      'Territory: EMEA',
      JSON.stringify({ type: 'territory', market_share: 100, total_sales: 800, unique_customers: 2 }),
      '[1,0]',
    ]);
  });

  it('upsert reports failure instead of throwing', async () => {
    mockQuery.mockRejectedValueOnce(new Error('disk full'));
    expect(await store.upsert([record()])).toBe(false);
  });

  it('search pushes equality filters into SQL and validates payloads', async () => {
    mockQuery.mockResolvedValueOnce({
      rows: [
        {
          id: 'id-1',
          entity_key: 'A',
          entity_type: 'customer',
          content: 'Customer: A',
          payload: { type: 'customer', territory: 'EMEA', total_sales: 300, customer_status: 'Active' },
          score: 0.92,
        },
        { id: 'id-2', entity_key: 'X', entity_type: 'customer', content: '', payload: { type: 'bogus' }, score: 0.5 },
      ],
    });

    const results = await store.search(Float32Array.from([1, 0]), { type: 'customer', territory: 'EMEA' }, { limit: 3 });

    const [sql, params] = mockQuery.mock.calls[0];
    expect(sql).toContain('1 - (embedding <=> $1::ruvector) AS score');
    expect(sql).toContain("payload->>$2 = $3 AND payload->>$4 = $5 AND 1 - (embedding <=> $1::ruvector) >= $6");
    expect(sql).toContain('LIMIT $7');
    expect(params).toEqual(['[1,0]', 'type', 'customer', 'territory', 'EMEA', 0, 3]);
    expect(results).toEqual([
      {
        id: 'id-1',
        key: 'A',
        entityType: 'customer',
        score: 0.92,
        text: 'Customer: A',
        metadata: { type: 'customer', territory: 'EMEA', totalSales: 300, customerStatus: 'Active' },
      },
    ]);
  });

  it('search applies numeric minima to the returned page', async () => {
    mockQuery.mockResolvedValueOnce({
      rows: [
        {
          id: 'id-1',
          entity_key: 'A',
          entity_type: 'customer',
          content: '',
          payload: { type: 'customer', territory: 'EMEA', total_sales: 300, customer_status: 'Active' },
          score: 0.9,
        },
      ],
    });

    const results = await store.search(Float32Array.from([1, 0]), { type: 'customer', minSales: 1000 });

    expect(results).toEqual([]);
    expect(mockQuery.mock.calls[0][1]).toEqual(['[1,0]', 'type', 'customer', 0, 10]);
  });

  it('search degrades to an empty result on failure', async () => {
    mockQuery.mockRejectedValueOnce(new Error('timeout'));
    expect(await store.search(Float32Array.from([1, 0]), { type: 'product' })).toEqual([]);
  });

  it('uses the distance operator of the configured metric', async () => {
    mockQuery.mockResolvedValue({ rows: [] });
    await store.ensureCollection(2, 'dot_product');
    mockQuery.mockClear();

    await store.search(Float32Array.from([1, 0]), { type: 'territory' });

    expect(mockQuery.mock.calls[0][0]).toContain('ORDER BY embedding <#> $1::ruvector');
  });

  it('getStats counts points per entity type', async () => {
    mockQuery
      .mockResolvedValueOnce({ rows: [{ reg: 'sales_data' }] })
      .mockResolvedValueOnce({
        rows: [
          { entity_type: 'customer', count: 2 },
          { entity_type: 'territory', count: 1 },
        ],
      });

    expect(await store.getStats()).toEqual({
      totalPoints: 3,
      perTypeCounts: { customer: 2, product: 0, territory: 1 },
      status: 'ready',
    });
  });

  it('getStats reports a missing collection and an unreachable store', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ reg: null }] });
    expect(await store.getStats()).toEqual({ totalPoints: 0, perTypeCounts: {}, status: 'missing' });

    mockQuery.mockRejectedValueOnce(new Error('down'));
    expect(await store.getStats()).toEqual({ totalPoints: 0, perTypeCounts: {}, status: 'unavailable' });
  });

  it('healthCheck reports collection presence or the failure', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ reg: 'sales_data' }] });
    expect(await store.healthCheck()).toEqual({ status: 'healthy', collectionPresent: true });

    mockQuery.mockRejectedValueOnce(new Error('connection refused'));
    expect(await store.healthCheck()).toEqual({
      status: 'unhealthy',
      collectionPresent: false,
      error: 'connection refused',
    });
  });

  it('clearCollection drops and recreates the table', async () => {
    mockQuery.mockResolvedValue({ rows: [] });
    await store.ensureCollection(384);
    mockQuery.mockClear();

    expect(await store.clearCollection()).toBe(true);
    expect(mockQuery.mock.calls[0][0]).toBe('DROP TABLE IF EXISTS sales_data');
    expect(mockQuery.mock.calls[2][0]).toContain('embedding ruvector(384) NOT NULL');
  });

  it('close releases the pool', async () => {
    await store.close();
    expect(mockClosePool).toHaveBeenCalledOnce();
  });
});
