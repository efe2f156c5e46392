// Text Synthesizer — deterministic natural-language rendering of each
// aggregate, plus optional enrichment through the generation service.

import type { CustomerProfile, ProductCatalogEntry, TerritoryAnalysis } from '../types/sales.js';
import type { EntityType } from '../types/embeddings.js';
import type { GenerationClient } from '../llm/generation-client.js';
import type { SlidingWindowRateLimiter } from './rate-limiter.js';
import { computed, fallback, type Outcome } from '../types/outcome.js';
import { ENRICHMENT_RETRY, withRetry, type RetryPolicy, type Sleep } from '../utils/retry.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('TextSynthesizer');

export type AggregateEntity =
  | { type: 'customer'; value: CustomerProfile }
  | { type: 'product'; value: ProductCatalogEntry }
  | { type: 'territory'; value: TerritoryAnalysis };

// ── Formatting ──────────────────────────────────────────────────────────

const currencyFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** `$1,234.50` */
export function formatCurrency(value: number): string {
  return `$${currencyFormat.format(value)}`;
}

/** `12.34%` */
export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

/** `0.123` */
export function formatScore(value: number): string {
  return value.toFixed(3);
}

function formatDistribution(dist: Readonly<Record<string, number>>): string {
  const parts = Object.entries(dist).map(([k, v]) => `${k}: ${v}`);
  return parts.length > 0 ? parts.join(', ') : 'none';
}

// ── Templates ───────────────────────────────────────────────────────────

export function synthesizeCustomer(c: CustomerProfile): string {
  const focus = c.preferredProducts[0] ?? 'various';
  return [
    `Customer: ${c.name}`,
    `Location: ${c.city}, ${c.state}, ${c.country}`,
    `Territory: ${c.territory}`,
    `Contact: ${c.contactName}`,
    '',
    'Sales Profile:',
    `- Total Orders: ${c.totalOrders}`,
    `- Total Sales: ${formatCurrency(c.totalSales)}`,
    `- Average Order Value: ${formatCurrency(c.avgOrderValue)}`,
    `- Preferred Products: ${c.preferredProducts.join(', ')}`,
    `- Deal Sizes: ${c.dealSizes.join(', ')}`,
    `- Status: ${c.customerStatus}`,
    `- Last Order: ${c.lastOrderDate}`,
    '',
    `Customer Segment: ${c.territory} market with focus on ${focus} products`,
  ].join('\n');
}

export function synthesizeProduct(p: ProductCatalogEntry): string {
  return [
    `Product: ${p.productLine} - ${p.productCode}`,
    '',
    'Performance Metrics:',
    `- Total Sales: ${formatCurrency(p.totalSales)}`,
    `- Average Sales per Order: ${formatCurrency(p.avgSales)}`,
    `- Total Orders: ${p.orderCount}`,
    `- Average Price: ${formatCurrency(p.avgPrice)}`,
    `- Total Quantity Sold: ${p.totalQuantity}`,
    `- Typical Deal Size: ${p.typicalDealSize}`,
    `- Performance Score: ${formatScore(p.performanceScore)}`,
    '',
    `Product Category: ${p.productLine} with strong performance in ${p.typicalDealSize} market segment`,
  ].join('\n');
}

export function synthesizeTerritory(t: TerritoryAnalysis): string {
  const top = Object.keys(t.topProducts).slice(0, 3);
  return [
    `Territory: ${t.name}`,
    '',
    'Market Performance:',
    `- Total Sales: ${formatCurrency(t.totalSales)}`,
    `- Average Sales: ${formatCurrency(t.avgSales)}`,
    `- Total Orders: ${t.totalOrders}`,
    `- Unique Customers: ${t.uniqueCustomers}`,
    `- Market Share: ${formatPercent(t.marketShare)}`,
    '',
    `Top Products: ${top.join(', ')}`,
    `Deal Distribution: ${formatDistribution(t.dealDistribution)}`,
    '',
    `Market Characteristics: ${t.name} region with strong demand for ${top[0] ?? 'various'} products`,
  ].join('\n');
}

export function synthesize(entity: AggregateEntity): string {
  switch (entity.type) {
    case 'customer':
      return synthesizeCustomer(entity.value);
    case 'product':
      return synthesizeProduct(entity.value);
    case 'territory':
      return synthesizeTerritory(entity.value);
  }
}

export function entityKey(entity: AggregateEntity): string {
  switch (entity.type) {
    case 'customer':
      return entity.value.name;
    case 'product':
      return entity.value.key;
    case 'territory':
      return entity.value.name;
  }
}

/** Short description of the entity handed to the enrichment call */
export function contextHint(entity: AggregateEntity): string {
  switch (entity.type) {
    case 'customer':
      return `Customer in ${entity.value.territory} territory`;
    case 'product':
      return `Product in ${entity.value.productLine} category`;
    case 'territory':
      return `Sales territory analysis for ${entity.value.name}`;
  }
}

export function enhancementPrompt(baseText: string, hint: string, type?: EntityType): string {
  const subject = type ?? 'customer/product';
  return [
    `Enhance this ${subject} description for better semantic search.`,
    '',
    `Context: ${hint}`,
    `Original text:\n${baseText}`,
    '',
    'Write a rich, descriptive text that captures:',
    '1. Key business characteristics',
    '2. Sales potential',
    '3. Market segment',
    '4. Product preferences',
    '5. Geographic and demographic insights',
    '',
    'Keep it concise but informative (max 200 words).',
  ].join('\n');
}

// ── Enrichment ──────────────────────────────────────────────────────────

export interface TextEnhancerOptions {
  enabled: boolean;
  temperature: number;
  maxTokens: number;
  retry?: RetryPolicy;
  sleep?: Sleep;
}

export class TextEnhancer {
  constructor(
    private readonly client: GenerationClient,
    private readonly limiter: SlidingWindowRateLimiter,
    private readonly options: TextEnhancerOptions,
  ) {}

  /**
   * Best-effort rewrite of `baseText`. The rate limiter is acquired before
   * every attempt. On exhaustion the base text comes back as a fallback.
   */
  async enhance(baseText: string, hint: string, type?: EntityType): Promise<Outcome<string>> {
    if (!this.options.enabled) return fallback(baseText, 'disabled');

    const prompt = enhancementPrompt(baseText, hint, type);
    try {
      const text = await withRetry(
        async () => {
          await this.limiter.acquire();
          return this.client.complete({
            prompt,
            temperature: this.options.temperature,
            maxTokens: this.options.maxTokens,
          });
        },
        this.options.retry ?? ENRICHMENT_RETRY,
        {
          sleep: this.options.sleep,
          onRetry: ({ attempt, delayMs, error }) =>
            log.warn(`Enrichment attempt ${attempt} failed, retrying in ${delayMs}ms`, {
              error: errorMessage(error),
            }),
        },
      );
      return computed(text);
    } catch (err) {
      const reason = errorMessage(err);
      log.error('Enrichment failed, using base text', { hint, error: reason });
      return fallback(baseText, reason);
    }
  }
}
