// Vector representations of the sales aggregates and what retrieval returns

import type { CustomerStatus } from './sales.js';

export type EntityType = 'customer' | 'product' | 'territory';

export const ENTITY_TYPES: readonly EntityType[] = ['customer', 'product', 'territory'];

export type DistanceMetric = 'cosine' | 'euclidean' | 'dot_product';

export interface CustomerMetadata {
  readonly type: 'customer';
  readonly territory: string;
  readonly totalSales: number;
  readonly customerStatus: CustomerStatus;
}

export interface ProductMetadata {
  readonly type: 'product';
  readonly productLine: string;
  readonly performanceScore: number;
  readonly typicalDealSize: string;
}

export interface TerritoryMetadata {
  readonly type: 'territory';
  readonly marketShare: number;
  readonly totalSales: number;
  readonly uniqueCustomers: number;
}

export type EntityMetadata = CustomerMetadata | ProductMetadata | TerritoryMetadata;

export interface EmbeddingRecord {
  /** Stable store identifier; derived from type and key when absent */
  id?: string;
  key: string;
  entityType: EntityType;
  text: string;
  vector: Float32Array;
  metadata: EntityMetadata;
  /** false when enrichment fell back to the deterministic text */
  enriched: boolean;
  /** false when the vector is the zero-vector fallback */
  embedded: boolean;
}

export interface ContextResult {
  readonly id: string;
  readonly key: string;
  readonly entityType: EntityType;
  readonly score: number;
  readonly text: string;
  readonly metadata: EntityMetadata;
}

export type SearchScope = 'all' | EntityType;

export interface CustomerFilters {
  readonly type: 'customer';
  readonly territory?: string;
  readonly customerStatus?: CustomerStatus;
  /** Applied to the returned page, not inside the store */
  readonly minSales?: number;
}

export interface ProductFilters {
  readonly type: 'product';
  readonly productLine?: string;
  readonly typicalDealSize?: string;
  /** Applied to the returned page, not inside the store */
  readonly minPerformance?: number;
}

export interface TerritoryFilters {
  readonly type: 'territory';
  /** Applied to the returned page, not inside the store */
  readonly minMarketShare?: number;
}

export type SearchFilters = CustomerFilters | ProductFilters | TerritoryFilters;

export interface SearchOptions {
  limit?: number;
  scoreThreshold?: number;
}

export interface CollectionStats {
  totalPoints: number;
  perTypeCounts: Partial<Record<EntityType, number>>;
  status: 'ready' | 'missing' | 'unavailable';
}

export interface StoreHealth {
  status: 'healthy' | 'unhealthy';
  collectionPresent: boolean;
  error?: string;
}
