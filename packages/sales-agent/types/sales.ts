// Sales domain: raw transactions and the three aggregate views derived from them

export type CustomerStatus = 'Active' | 'Inactive';

/** One sales line item after cleaning. Never mutated after load. */
export interface TransactionRecord {
  readonly orderNumber: number | null;
  readonly quantityOrdered: number | null;
  readonly priceEach: number | null;
  readonly sales: number | null;
  readonly orderDate: Date | null;
  readonly status: string;
  readonly productLine: string;
  readonly productCode: string;
  readonly customerName: string;
  readonly phone: string;
  readonly addressLine1: string;
  readonly city: string;
  readonly state: string;
  readonly postalCode: string;
  readonly country: string;
  readonly territory: string;
  readonly contactFirstName: string;
  readonly contactLastName: string;
  readonly dealSize: string;
  readonly year: number | null;
  readonly quarter: number | null;
  readonly month: number | null;
}

export interface CustomerProfile {
  readonly name: string;
  readonly phone: string;
  readonly city: string;
  readonly state: string;
  readonly country: string;
  readonly territory: string;
  readonly contactName: string;
  readonly totalOrders: number;
  readonly totalSales: number;
  readonly avgOrderValue: number;
  readonly preferredProducts: readonly string[];
  readonly dealSizes: readonly string[];
  /** yyyy-MM-dd, or 'Unknown' when no order carried a parsable date */
  readonly lastOrderDate: string;
  readonly customerStatus: CustomerStatus;
}

export interface ProductCatalogEntry {
  /** `${productLine}_${productCode}` */
  readonly key: string;
  readonly productLine: string;
  readonly productCode: string;
  readonly totalSales: number;
  readonly avgSales: number;
  readonly orderCount: number;
  readonly avgPrice: number;
  readonly totalQuantity: number;
  readonly typicalDealSize: string;
  /** 0.5·sales + 0.3·orders + 0.2·quantity, each normalized by the catalog maximum */
  readonly performanceScore: number;
}

export interface TerritoryAnalysis {
  readonly name: string;
  readonly totalSales: number;
  readonly avgSales: number;
  readonly totalOrders: number;
  readonly uniqueCustomers: number;
  /** Up to three product lines with their order counts, most frequent first */
  readonly topProducts: Readonly<Record<string, number>>;
  readonly dealDistribution: Readonly<Record<string, number>>;
  /** Percentage of grand total sales across all territories */
  readonly marketShare: number;
}

export interface SalesAggregates {
  readonly customers: ReadonlyMap<string, CustomerProfile>;
  readonly products: ReadonlyMap<string, ProductCatalogEntry>;
  readonly territories: ReadonlyMap<string, TerritoryAnalysis>;
}

export interface ProcessingSummary {
  totalRecords: number;
  totalCustomers: number;
  totalProducts: number;
  totalTerritories: number;
  dateRange: { start: string; end: string } | null;
  totalSales: number;
  avgOrderValue: number;
}

export interface TerritoryInsights {
  totalTerritories: number;
  topTerritory: TerritoryAnalysis | null;
  territoryBreakdown: TerritoryAnalysis[];
}
