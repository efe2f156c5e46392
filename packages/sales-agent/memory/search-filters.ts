// Search filters and the stored payload shape.
// Metadata is camelCase in memory and snake_case at the storage boundary;
// everything read back from the store is validated before it becomes
// EntityMetadata again.

import { z } from 'zod';
import type { ContextResult, EntityMetadata, SearchFilters } from '../types/embeddings.js';

// ── Stored payload ──────────────────────────────────────────────────────

const CustomerPayload = z.object({
  type: z.literal('customer'),
  territory: z.string(),
  total_sales: z.number(),
  customer_status: z.enum(['Active', 'Inactive']),
});

const ProductPayload = z.object({
  type: z.literal('product'),
  product_line: z.string(),
  performance_score: z.number(),
  typical_deal_size: z.string(),
});

const TerritoryPayload = z.object({
  type: z.literal('territory'),
  market_share: z.number(),
  total_sales: z.number(),
  unique_customers: z.number(),
});

export const StoredPayloadSchema = z.discriminatedUnion('type', [CustomerPayload, ProductPayload, TerritoryPayload]);

export type StoredPayload = z.infer<typeof StoredPayloadSchema>;

export function toPayload(metadata: EntityMetadata): StoredPayload {
  switch (metadata.type) {
    case 'customer':
      return {
        type: 'customer',
        territory: metadata.territory,
        total_sales: metadata.totalSales,
        customer_status: metadata.customerStatus,
      };
    case 'product':
      return {
        type: 'product',
        product_line: metadata.productLine,
        performance_score: metadata.performanceScore,
        typical_deal_size: metadata.typicalDealSize,
      };
    case 'territory':
      return {
        type: 'territory',
        market_share: metadata.marketShare,
        total_sales: metadata.totalSales,
        unique_customers: metadata.uniqueCustomers,
      };
  }
}

/** Returns null when the stored payload does not match any entity shape */
export function fromPayload(raw: unknown): EntityMetadata | null {
  const parsed = StoredPayloadSchema.safeParse(raw);
  if (!parsed.success) return null;
  const p = parsed.data;
  switch (p.type) {
    case 'customer':
      return { type: 'customer', territory: p.territory, totalSales: p.total_sales, customerStatus: p.customer_status };
    case 'product':
      return {
        type: 'product',
        productLine: p.product_line,
        performanceScore: p.performance_score,
        typicalDealSize: p.typical_deal_size,
      };
    case 'territory':
      return {
        type: 'territory',
        marketShare: p.market_share,
        totalSales: p.total_sales,
        uniqueCustomers: p.unique_customers,
      };
  }
}

// ── Filters ─────────────────────────────────────────────────────────────

/**
 * Equality predicates evaluated inside the store, as payload field → value.
 * Always includes the entity type.
 */
export function equalityPredicates(filters: SearchFilters): Array<[string, string]> {
  const preds: Array<[string, string]> = [['type', filters.type]];
  switch (filters.type) {
    case 'customer':
      if (filters.territory) preds.push(['territory', filters.territory]);
      if (filters.customerStatus) preds.push(['customer_status', filters.customerStatus]);
      break;
    case 'product':
      if (filters.productLine) preds.push(['product_line', filters.productLine]);
      if (filters.typicalDealSize) preds.push(['typical_deal_size', filters.typicalDealSize]);
      break;
    case 'territory':
      break;
  }
  return preds;
}

export function matchesEquality(metadata: EntityMetadata, filters: SearchFilters): boolean {
  const payload: Record<string, unknown> = toPayload(metadata);
  return equalityPredicates(filters).every(([field, value]) => payload[field] === value);
}

/**
 * Numeric minima, applied to the page the store returned. A strict minimum
 * can leave fewer than `limit` results; the page is not re-queried.
 */
export function applyPostFilters(results: ContextResult[], filters: SearchFilters): ContextResult[] {
  switch (filters.type) {
    case 'customer': {
      const { minSales } = filters;
      if (minSales === undefined) return results;
      return results.filter((r) => r.metadata.type === 'customer' && r.metadata.totalSales >= minSales);
    }
    case 'product': {
      const { minPerformance } = filters;
      if (minPerformance === undefined) return results;
      return results.filter((r) => r.metadata.type === 'product' && r.metadata.performanceScore >= minPerformance);
    }
    case 'territory': {
      const { minMarketShare } = filters;
      if (minMarketShare === undefined) return results;
      return results.filter((r) => r.metadata.type === 'territory' && r.metadata.marketShare >= minMarketShare);
    }
  }
}
