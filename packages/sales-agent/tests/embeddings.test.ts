import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  TextEnhancer,
  formatCurrency,
  synthesize,
  synthesizeCustomer,
  synthesizeProduct,
  synthesizeTerritory,
} from '../embeddings/text-synthesizer.js';
import { EmbeddingService, type EmbeddingProvider } from '../embeddings/embedding-service.js';
import { EmbeddingGenerator, metadataFor, recordKey } from '../embeddings/embedding-generator.js';
import { SlidingWindowRateLimiter, type Clock } from '../embeddings/rate-limiter.js';
import { EmbeddingQualityError, validateEmbedding } from '../embeddings/embedding-guard.js';
import type { CompletionRequest, GenerationClient } from '../llm/generation-client.js';
import type { EntityType } from '../types/embeddings.js';
import type { CustomerProfile, ProductCatalogEntry, SalesAggregates, TerritoryAnalysis } from '../types/sales.js';
import type { Outcome } from '../types/outcome.js';

const DIM = 8;

const customer: CustomerProfile = {
  name: 'A',
  phone: '555-0100',
  city: 'Paris',
  state: 'Unknown',
  country: 'France',
  territory: 'EMEA',
  contactName: 'Ann Lee',
  totalOrders: 3,
  totalSales: 1234.5,
  avgOrderValue: 411.5,
  preferredProducts: ['Classic Cars'],
  dealSizes: ['Small', 'Medium'],
  lastOrderDate: '2003-05-07',
  customerStatus: 'Active',
};

const product: ProductCatalogEntry = {
  key: 'Classic Cars_S10_1678',
  productLine: 'Classic Cars',
  productCode: 'S10_1678',
  totalSales: 700,
  avgSales: 233.333,
  orderCount: 3,
  avgPrice: 15,
  totalQuantity: 64,
  typicalDealSize: 'Small',
  performanceScore: 0.18705,
};

const territory: TerritoryAnalysis = {
  name: 'EMEA',
  totalSales: 800,
  avgSales: 200,
  totalOrders: 4,
  uniqueCustomers: 2,
  topProducts: { 'Classic Cars': 3, Motorcycles: 1 },
  dealDistribution: { Small: 2, Medium: 1 },
  marketShare: 12.3456,
};

const aggregates: SalesAggregates = {
  customers: new Map([['A', customer]]),
  products: new Map([[product.key, product]]),
  territories: new Map([['EMEA', territory]]),
};

function virtualClock(): Clock {
  let t = 0;
  return {
    now: () => t,
    sleep: async (ms) => {
      t += ms;
    },
  };
}

function unitVector(dim = DIM): Float32Array {
  const v = new Float32Array(dim);
  v[0] = 1;
  return v;
}

class ScriptedClient implements GenerationClient {
  readonly requests: CompletionRequest[] = [];
  constructor(private readonly script: Array<string | Error>) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.script.length > 1 ? this.script.shift() : this.script[0];
    if (next === undefined || next instanceof Error) throw next ?? new Error('script exhausted');
    return next;
  }
}

class FailingProvider implements EmbeddingProvider {
  readonly model = 'test-model';
  calls = 0;
  async embed(): Promise<Float32Array> {
    this.calls++;
    throw new Error('provider down');
  }
}

const noSleep = async (): Promise<void> => undefined;

afterEach(() => {
  vi.restoreAllMocks();
});

describe('text synthesizer', () => {
  it('renders a customer with fixed formatting', () => {
    expect(synthesizeCustomer(customer)).toBe(
      [
        'Customer: A',
        'Location: Paris, Unknown, France',
        'Territory: EMEA',
        'Contact: Ann Lee',
        '',
        'Sales Profile:',
        '- Total Orders: 3',
        '- Total Sales: $1,234.50',
        '- Average Order Value: $411.50',
        '- Preferred Products: Classic Cars',
        '- Deal Sizes: Small, Medium',
        '- Status: Active',
        '- Last Order: 2003-05-07',
        '',
        'Customer Segment: EMEA market with focus on Classic Cars products',
      ].join('\n'),
    );
  });

  it('renders product scores to three decimals', () => {
    const text = synthesizeProduct(product);
    expect(text).toContain('- Performance Score: 0.187');
    expect(text).toContain('- Average Sales per Order: $233.33');
  });

  it('renders territory percentages and distributions', () => {
    const text = synthesizeTerritory(territory);
    expect(text).toContain('- Market Share: 12.35%');
    expect(text).toContain('Top Products: Classic Cars, Motorcycles');
    expect(text).toContain('Deal Distribution: Small: 2, Medium: 1');
  });

  it('is deterministic', () => {
    const entity = { type: 'territory', value: territory } as const;
    expect(synthesize(entity)).toBe(synthesize(entity));
  });

  it('formats large currency values with separators', () => {
    expect(formatCurrency(1234567.891)).toBe('$1,234,567.89');
  });
});

describe('TextEnhancer', () => {
  it('retries with backoff and acquires the limiter before each attempt', async () => {
    const client = new ScriptedClient([new Error('busy'), new Error('busy'), 'Rich description']);
    const limiter = new SlidingWindowRateLimiter(30, 60_000, virtualClock());
    const waits: number[] = [];
    const enhancer = new TextEnhancer(client, limiter, {
      enabled: true,
      temperature: 0.7,
      maxTokens: 1024,
      sleep: async (ms) => {
        waits.push(ms);
      },
    });

    const result = await enhancer.enhance('base', 'Customer in EMEA territory', 'customer');

    expect(result).toEqual({ kind: 'computed', value: 'Rich description' });
    expect(waits).toEqual([4000, 4000]);
    expect(limiter.inFlight()).toBe(3);
    expect(client.requests[0].prompt).toContain('Context: Customer in EMEA territory');
    expect(client.requests[0].prompt).toContain('max 200 words');
  });

  it('falls back to the base text once attempts are exhausted', async () => {
    const client = new ScriptedClient([new Error('quota exceeded')]);
    const enhancer = new TextEnhancer(client, new SlidingWindowRateLimiter(30, 60_000, virtualClock()), {
      enabled: true,
      temperature: 0.7,
      maxTokens: 1024,
      sleep: noSleep,
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = await enhancer.enhance('base', 'hint');

    expect(result).toEqual({ kind: 'fallback', value: 'base', reason: 'quota exceeded' });
    expect(client.requests).toHaveLength(3);
  });

  it('returns the base text untouched when disabled', async () => {
    const client = new ScriptedClient(['never used']);
    const enhancer = new TextEnhancer(client, new SlidingWindowRateLimiter(30, 60_000, virtualClock()), {
      enabled: false,
      temperature: 0.7,
      maxTokens: 1024,
    });

    expect(await enhancer.enhance('base', 'hint')).toEqual({ kind: 'fallback', value: 'base', reason: 'disabled' });
    expect(client.requests).toHaveLength(0);
  });
});

describe('embedding guard', () => {
  it('accepts a unit vector of the configured dimension', () => {
    expect(() => validateEmbedding(unitVector(), DIM)).not.toThrow();
  });

  it('rejects wrong dimensions, non-finite components and zero vectors', () => {
    expect(() => validateEmbedding(unitVector(4), DIM)).toThrow(/dimension mismatch/);
    const nan = unitVector();
    nan[3] = Number.NaN;
    expect(() => validateEmbedding(nan, DIM)).toThrow(/not finite/);
    expect(() => validateEmbedding(new Float32Array(DIM), DIM)).toThrow(EmbeddingQualityError);
  });
});

describe('EmbeddingService', () => {
  it('returns the provider vector when valid', async () => {
    const vec = unitVector();
    const service = new EmbeddingService({ model: 'm', embed: async () => vec }, DIM);
    expect(await service.embedOutcome('text')).toEqual({ kind: 'computed', value: vec });
  });

  it('degrades to a zero vector after retries', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const provider = new FailingProvider();
    const service = new EmbeddingService(provider, DIM, { sleep: noSleep });

    const vector = await service.embed('text');

    expect(provider.calls).toBe(3);
    expect(vector).toHaveLength(DIM);
    expect([...vector].every((x) => x === 0)).toBe(true);
  });

  it('rejects a vector of the wrong dimension', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const service = new EmbeddingService({ model: 'm', embed: async () => unitVector(3) }, DIM, { sleep: noSleep });

    const outcome = await service.embedOutcome('text');

    expect(outcome.kind).toBe('fallback');
    expect(outcome.value).toHaveLength(DIM);
  });

  it('does not call the provider for empty text', async () => {
    const provider = new FailingProvider();
    const service = new EmbeddingService(provider, DIM);
    expect((await service.embedOutcome('   ')).kind).toBe('fallback');
    expect(provider.calls).toBe(0);
  });
});

describe('EmbeddingGenerator', () => {
  it('still returns one record per entity when every external call fails', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const enhancer = new TextEnhancer(
      new ScriptedClient([new Error('generation down')]),
      new SlidingWindowRateLimiter(30, 60_000, virtualClock()),
      { enabled: true, temperature: 0.7, maxTokens: 1024, sleep: noSleep },
    );
    const embedder = new EmbeddingService(new FailingProvider(), DIM, { sleep: noSleep });
    const itemWaits: number[] = [];
    const generator = new EmbeddingGenerator(enhancer, embedder, {
      itemDelayMs: 100,
      sleep: async (ms) => {
        itemWaits.push(ms);
      },
    });

    const records = await generator.generateEmbeddings(aggregates);

    expect([...records.keys()]).toEqual(['customer:A', 'product:Classic Cars_S10_1678', 'territory:EMEA']);
    for (const record of records.values()) {
      expect([...record.vector].every((x) => x === 0)).toBe(true);
      expect(record.enriched).toBe(false);
      expect(record.embedded).toBe(false);
    }
    expect(records.get('customer:A')?.text).toBe(synthesizeCustomer(customer));
    expect(itemWaits).toEqual([100, 100]);
    expect(
      errors.mock.calls.some((call) => String(call[0]).includes('[EmbeddingService:ERROR] Embedding failed')),
    ).toBe(true);
  });

  it('attaches typed metadata per entity', async () => {
    const enhancer = new TextEnhancer(
      new ScriptedClient(['enriched']),
      new SlidingWindowRateLimiter(30, 60_000, virtualClock()),
      { enabled: true, temperature: 0.7, maxTokens: 1024 },
    );
    const embedder = new EmbeddingService({ model: 'm', embed: async () => unitVector() }, DIM);
    const generator = new EmbeddingGenerator(enhancer, embedder, { itemDelayMs: 0 });

    const records = await generator.generateEmbeddings(aggregates);

    expect(records.get('product:Classic Cars_S10_1678')).toMatchObject({
      key: 'Classic Cars_S10_1678',
      entityType: 'product',
      text: 'enriched',
      enriched: true,
      embedded: true,
      metadata: { type: 'product', productLine: 'Classic Cars', performanceScore: 0.18705, typicalDealSize: 'Small' },
    });
    expect(records.get('territory:EMEA')?.metadata).toEqual(metadataFor({ type: 'territory', value: territory }));
  });

  it('skips and logs an item whose synthesis fails', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    class BrokenForCustomers extends TextEnhancer {
      override async enhance(baseText: string, hint: string, type?: EntityType): Promise<Outcome<string>> {
        if (type === 'customer') throw new Error('template failure');
        return super.enhance(baseText, hint, type);
      }
    }
    const enhancer = new BrokenForCustomers(
      new ScriptedClient(['enriched']),
      new SlidingWindowRateLimiter(30, 60_000, virtualClock()),
      { enabled: false, temperature: 0.7, maxTokens: 1024 },
    );
    const embedder = new EmbeddingService({ model: 'm', embed: async () => unitVector() }, DIM);
    const generator = new EmbeddingGenerator(enhancer, embedder, { itemDelayMs: 0 });

    const records = await generator.generateEmbeddings(aggregates);

    expect(records.has(recordKey('customer', 'A'))).toBe(false);
    expect(records.size).toBe(2);
    expect(errors.mock.calls.some((call) => String(call[0]).includes('Skipping customer A'))).toBe(true);
  });
});
