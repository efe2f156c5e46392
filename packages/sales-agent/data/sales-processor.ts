// Sales Data Processor — turns a transaction export into customer, product
// and territory aggregates. Full-batch recompute: every run replaces the
// previously published aggregates wholesale.

import { readFile } from 'node:fs/promises';
import { format, isValid, parse } from 'date-fns';
import { decodeSource, parseCsv } from '../utils/csv-parser.js';
import { DataLoadError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type {
  CustomerProfile,
  ProcessingSummary,
  ProductCatalogEntry,
  SalesAggregates,
  TerritoryAnalysis,
  TerritoryInsights,
  TransactionRecord,
} from '../types/sales.js';

const log = createLogger('SalesProcessor');

export const REQUIRED_COLUMNS = [
  'ORDERNUMBER',
  'QUANTITYORDERED',
  'PRICEEACH',
  'SALES',
  'ORDERDATE',
  'STATUS',
  'PRODUCTLINE',
  'PRODUCTCODE',
  'CUSTOMERNAME',
  'TERRITORY',
  'DEALSIZE',
] as const;

/** Tried in order against ORDERDATE */
export const ORDER_DATE_FORMATS = ['M/d/yyyy H:mm', 'M/d/yyyy', 'yyyy-MM-dd HH:mm:ss', 'yyyy-MM-dd'] as const;

const UNKNOWN = 'Unknown';

/** Performance score weights: sales, order count, quantity */
const SCORE_WEIGHTS = { sales: 0.5, orders: 0.3, quantity: 0.2 } as const;

// ── Parsing helpers ─────────────────────────────────────────────────────

export function parseNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

export function parseOrderDate(value: string | undefined): Date | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const reference = new Date(2000, 0, 1);
  for (const fmt of ORDER_DATE_FORMATS) {
    const d = parse(trimmed, fmt, reference);
    if (isValid(d)) return d;
  }
  return null;
}

/** Occurrence counts in first-seen order; ties resolve to the earliest value */
class FrequencyTable {
  private counts = new Map<string, number>();

  add(value: string): void {
    if (value === '') return;
    this.counts.set(value, (this.counts.get(value) ?? 0) + 1);
  }

  mostFrequent(): string | null {
    let best: string | null = null;
    let bestCount = 0;
    for (const [value, count] of this.counts) {
      if (count > bestCount) {
        best = value;
        bestCount = count;
      }
    }
    return best;
  }

  /** Descending by count; stable, so ties keep first-seen order */
  ranked(limit?: number): Record<string, number> {
    const entries = [...this.counts.entries()].sort((a, b) => b[1] - a[1]);
    return Object.fromEntries(limit === undefined ? entries : entries.slice(0, limit));
  }
}

// ── Accumulators ────────────────────────────────────────────────────────

interface CustomerAccumulator {
  name: string;
  phone: string;
  city: string;
  state: string;
  country: string;
  territory: string;
  contactFirst: string;
  contactLast: string;
  orders: number;
  totalSales: number;
  productLines: FrequencyTable;
  dealSizes: Set<string>;
  lastOrder: Date | null;
  shipped: boolean;
}

interface ProductAccumulator {
  productLine: string;
  productCode: string;
  orders: number;
  totalSales: number;
  priceSum: number;
  priceCount: number;
  totalQuantity: number;
  dealSizes: FrequencyTable;
}

interface TerritoryAccumulator {
  orders: number;
  totalSales: number;
  customers: Set<string>;
  productLines: FrequencyTable;
  dealSizes: FrequencyTable;
}

function firstNonEmpty(current: string, candidate: string): string {
  return current === '' ? candidate : current;
}

// ── Cleaning ────────────────────────────────────────────────────────────

export interface CleanResult {
  records: TransactionRecord[];
  duplicatesRemoved: number;
}

/** Drop exact-duplicate rows, then coerce each remaining row to a typed record */
export function cleanRows(headers: string[], rows: string[][]): CleanResult {
  const missing = REQUIRED_COLUMNS.filter((c) => !headers.includes(c));
  if (missing.length > 0) {
    throw new DataLoadError('Transaction source is missing required columns', { missing, headers });
  }

  const index = new Map(headers.map((h, i) => [h, i]));
  const cell = (row: string[], column: string): string => {
    const i = index.get(column);
    return i === undefined ? '' : (row[i] ?? '').trim();
  };

  const seen = new Set<string>();
  const records: TransactionRecord[] = [];
  let duplicatesRemoved = 0;

  for (const row of rows) {
    const fingerprint = JSON.stringify(row);
    if (seen.has(fingerprint)) {
      duplicatesRemoved++;
      continue;
    }
    seen.add(fingerprint);

    const orderDate = parseOrderDate(cell(row, 'ORDERDATE'));
    const monthId = parseNumber(cell(row, 'MONTH_ID'));
    const month = monthId ?? (orderDate ? orderDate.getMonth() + 1 : null);

    records.push({
      orderNumber: parseNumber(cell(row, 'ORDERNUMBER')),
      quantityOrdered: parseNumber(cell(row, 'QUANTITYORDERED')),
      priceEach: parseNumber(cell(row, 'PRICEEACH')),
      sales: parseNumber(cell(row, 'SALES')),
      orderDate,
      status: cell(row, 'STATUS'),
      productLine: cell(row, 'PRODUCTLINE'),
      productCode: cell(row, 'PRODUCTCODE'),
      customerName: cell(row, 'CUSTOMERNAME'),
      phone: cell(row, 'PHONE'),
      addressLine1: cell(row, 'ADDRESSLINE1'),
      city: cell(row, 'CITY'),
      state: cell(row, 'STATE') || UNKNOWN,
      postalCode: cell(row, 'POSTALCODE') || UNKNOWN,
      country: cell(row, 'COUNTRY'),
      territory: cell(row, 'TERRITORY') || UNKNOWN,
      contactFirstName: cell(row, 'CONTACTFIRSTNAME'),
      contactLastName: cell(row, 'CONTACTLASTNAME'),
      dealSize: cell(row, 'DEALSIZE'),
      year: parseNumber(cell(row, 'YEAR_ID')) ?? (orderDate ? orderDate.getFullYear() : null),
      quarter: parseNumber(cell(row, 'QTR_ID')) ?? (month !== null ? Math.ceil(month / 3) : null),
      month,
    });
  }

  return { records, duplicatesRemoved };
}

// ── Aggregation ─────────────────────────────────────────────────────────

/** Single pass over the records building all three keyed views */
export function aggregate(records: readonly TransactionRecord[]): SalesAggregates {
  const customerAcc = new Map<string, CustomerAccumulator>();
  const productAcc = new Map<string, ProductAccumulator>();
  const territoryAcc = new Map<string, TerritoryAccumulator>();

  for (const r of records) {
    const sales = r.sales ?? 0;

    if (r.customerName !== '') {
      let c = customerAcc.get(r.customerName);
      if (!c) {
        c = {
          name: r.customerName,
          phone: '',
          city: '',
          state: '',
          country: '',
          territory: '',
          contactFirst: '',
          contactLast: '',
          orders: 0,
          totalSales: 0,
          productLines: new FrequencyTable(),
          dealSizes: new Set(),
          lastOrder: null,
          shipped: false,
        };
        customerAcc.set(r.customerName, c);
      }
      c.phone = firstNonEmpty(c.phone, r.phone);
      c.city = firstNonEmpty(c.city, r.city);
      c.state = firstNonEmpty(c.state, r.state);
      c.country = firstNonEmpty(c.country, r.country);
      c.territory = firstNonEmpty(c.territory, r.territory);
      c.contactFirst = firstNonEmpty(c.contactFirst, r.contactFirstName);
      c.contactLast = firstNonEmpty(c.contactLast, r.contactLastName);
      c.orders++;
      c.totalSales += sales;
      c.productLines.add(r.productLine);
      if (r.dealSize !== '') c.dealSizes.add(r.dealSize);
      if (r.orderDate && (!c.lastOrder || r.orderDate > c.lastOrder)) c.lastOrder = r.orderDate;
      if (r.status === 'Shipped') c.shipped = true;
    }

    if (r.productLine !== '' || r.productCode !== '') {
      const key = `${r.productLine}_${r.productCode}`;
      let p = productAcc.get(key);
      if (!p) {
        p = {
          productLine: r.productLine,
          productCode: r.productCode,
          orders: 0,
          totalSales: 0,
          priceSum: 0,
          priceCount: 0,
          totalQuantity: 0,
          dealSizes: new FrequencyTable(),
        };
        productAcc.set(key, p);
      }
      p.orders++;
      p.totalSales += sales;
      if (r.priceEach !== null) {
        p.priceSum += r.priceEach;
        p.priceCount++;
      }
      p.totalQuantity += r.quantityOrdered ?? 0;
      p.dealSizes.add(r.dealSize);
    }

    let t = territoryAcc.get(r.territory);
    if (!t) {
      t = {
        orders: 0,
        totalSales: 0,
        customers: new Set(),
        productLines: new FrequencyTable(),
        dealSizes: new FrequencyTable(),
      };
      territoryAcc.set(r.territory, t);
    }
    t.orders++;
    t.totalSales += sales;
    if (r.customerName !== '') t.customers.add(r.customerName);
    t.productLines.add(r.productLine);
    t.dealSizes.add(r.dealSize);
  }

  const customers = new Map<string, CustomerProfile>();
  for (const [name, c] of customerAcc) {
    customers.set(name, {
      name,
      phone: c.phone,
      city: c.city,
      state: c.state || UNKNOWN,
      country: c.country,
      territory: c.territory || UNKNOWN,
      contactName: `${c.contactFirst} ${c.contactLast}`.trim(),
      totalOrders: c.orders,
      totalSales: c.totalSales,
      avgOrderValue: c.orders > 0 ? c.totalSales / c.orders : 0,
      preferredProducts: [c.productLines.mostFrequent() ?? UNKNOWN],
      dealSizes: [...c.dealSizes],
      lastOrderDate: c.lastOrder ? format(c.lastOrder, 'yyyy-MM-dd') : UNKNOWN,
      customerStatus: c.shipped ? 'Active' : 'Inactive',
    });
  }

  // Performance score needs the catalog-wide maxima, so it runs after the pass
  let maxSales = 0;
  let maxOrders = 0;
  let maxQuantity = 0;
  for (const p of productAcc.values()) {
    maxSales = Math.max(maxSales, p.totalSales);
    maxOrders = Math.max(maxOrders, p.orders);
    maxQuantity = Math.max(maxQuantity, p.totalQuantity);
  }
  const ratio = (value: number, max: number): number => (max > 0 ? Math.max(0, value / max) : 0);

  const products = new Map<string, ProductCatalogEntry>();
  for (const [key, p] of productAcc) {
    products.set(key, {
      key,
      productLine: p.productLine,
      productCode: p.productCode,
      totalSales: p.totalSales,
      avgSales: p.orders > 0 ? p.totalSales / p.orders : 0,
      orderCount: p.orders,
      avgPrice: p.priceCount > 0 ? p.priceSum / p.priceCount : 0,
      totalQuantity: p.totalQuantity,
      typicalDealSize: p.dealSizes.mostFrequent() ?? UNKNOWN,
      performanceScore:
        SCORE_WEIGHTS.sales * ratio(p.totalSales, maxSales) +
        SCORE_WEIGHTS.orders * ratio(p.orders, maxOrders) +
        SCORE_WEIGHTS.quantity * ratio(p.totalQuantity, maxQuantity),
    });
  }

  let grandTotal = 0;
  for (const t of territoryAcc.values()) grandTotal += t.totalSales;

  const territories = new Map<string, TerritoryAnalysis>();
  for (const [name, t] of territoryAcc) {
    territories.set(name, {
      name,
      totalSales: t.totalSales,
      avgSales: t.orders > 0 ? t.totalSales / t.orders : 0,
      totalOrders: t.orders,
      uniqueCustomers: t.customers.size,
      topProducts: t.productLines.ranked(3),
      dealDistribution: t.dealSizes.ranked(),
      marketShare: grandTotal !== 0 ? (100 * t.totalSales) / grandTotal : 0,
    });
  }

  return { customers, products, territories };
}

// ── Processor ───────────────────────────────────────────────────────────

export type SourceReader = (path: string) => Promise<Uint8Array>;

export class SalesDataProcessor {
  private aggregates: SalesAggregates | null = null;
  private records: readonly TransactionRecord[] = [];

  constructor(
    private readonly dataPath: string,
    private readonly readSource: SourceReader = (path) => readFile(path),
  ) {}

  /**
   * Decode, parse, clean and aggregate a raw export. Results are published
   * only once every step has succeeded.
   */
  process(raw: Uint8Array): SalesAggregates {
    const decoded = decodeSource(raw);
    if (decoded.lossy) {
      log.warn('No encoding decoded the source cleanly; undecodable bytes substituted');
    }

    const table = parseCsv(decoded.text);
    log.info(`Loaded ${table.rows.length} sales records with ${decoded.encoding} encoding`);

    const { records, duplicatesRemoved } = cleanRows(table.headers, table.rows);
    log.info(`Removed ${duplicatesRemoved} duplicate records`, {
      before: table.rows.length,
      after: records.length,
    });

    const result = aggregate(records);
    log.info('Aggregation complete', {
      customers: result.customers.size,
      products: result.products.size,
      territories: result.territories.size,
    });

    this.records = records;
    this.aggregates = result;

    const range = dateRange(records);
    log.info(`Processed ${records.length} records`, { dateRange: range });
    return result;
  }

  async processAll(): Promise<ProcessingSummary> {
    let raw: Uint8Array;
    try {
      raw = await this.readSource(this.dataPath);
    } catch (err) {
      throw new DataLoadError(`Cannot read transaction source: ${errorMessage(err)}`, { path: this.dataPath }, err);
    }

    const aggregates = this.process(raw);

    let totalSales = 0;
    let salesCount = 0;
    for (const r of this.records) {
      if (r.sales !== null) {
        totalSales += r.sales;
        salesCount++;
      }
    }

    return {
      totalRecords: this.records.length,
      totalCustomers: aggregates.customers.size,
      totalProducts: aggregates.products.size,
      totalTerritories: aggregates.territories.size,
      dateRange: dateRange(this.records),
      totalSales,
      avgOrderValue: salesCount > 0 ? totalSales / salesCount : 0,
    };
  }

  getAggregates(): SalesAggregates | null {
    return this.aggregates;
  }

  getTopCustomers(n = 10): CustomerProfile[] {
    if (!this.aggregates) return [];
    return [...this.aggregates.customers.values()]
      .sort((a, b) => b.totalSales - a.totalSales)
      .slice(0, Math.max(0, n));
  }

  getTopProducts(n = 10): ProductCatalogEntry[] {
    if (!this.aggregates) return [];
    return [...this.aggregates.products.values()]
      .sort((a, b) => b.performanceScore - a.performanceScore)
      .slice(0, Math.max(0, n));
  }

  getTerritoryInsights(): TerritoryInsights {
    const breakdown = this.aggregates
      ? [...this.aggregates.territories.values()].sort((a, b) => b.totalSales - a.totalSales)
      : [];
    return {
      totalTerritories: breakdown.length,
      topTerritory: breakdown[0] ?? null,
      territoryBreakdown: breakdown,
    };
  }
}

function dateRange(records: readonly TransactionRecord[]): { start: string; end: string } | null {
  let min: Date | null = null;
  let max: Date | null = null;
  for (const r of records) {
    if (!r.orderDate) continue;
    if (!min || r.orderDate < min) min = r.orderDate;
    if (!max || r.orderDate > max) max = r.orderDate;
  }
  if (!min || !max) return null;
  return { start: format(min, 'yyyy-MM-dd'), end: format(max, 'yyyy-MM-dd') };
}
