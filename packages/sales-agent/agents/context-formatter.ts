// Renders retrieved context for the generation prompt

import type { ContextResult, EntityMetadata } from '../types/embeddings.js';
import { formatCurrency, formatPercent, formatScore } from '../embeddings/text-synthesizer.js';

/** Rendered in place of context when retrieval found nothing */
export const NO_CONTEXT = 'No relevant context found.';

const SEPARATOR = '\n\n---\n\n';

function metadataLines(metadata: EntityMetadata): string[] {
  switch (metadata.type) {
    case 'customer':
      return [
        `- Territory: ${metadata.territory}`,
        `- Total Sales: ${formatCurrency(metadata.totalSales)}`,
        `- Status: ${metadata.customerStatus}`,
      ];
    case 'product':
      return [
        `- Product Line: ${metadata.productLine}`,
        `- Performance Score: ${formatScore(metadata.performanceScore)}`,
        `- Deal Size: ${metadata.typicalDealSize}`,
      ];
    case 'territory':
      return [
        `- Market Share: ${formatPercent(metadata.marketShare)}`,
        `- Total Sales: ${formatCurrency(metadata.totalSales)}`,
        `- Unique Customers: ${metadata.uniqueCustomers}`,
      ];
  }
}

export function formatContextItem(result: ContextResult): string {
  return [
    `**Relevance Score: ${formatScore(result.score)}**`,
    `**Type:** ${result.entityType}`,
    `**Key:** ${result.key}`,
    '**Description:**',
    result.text || 'No description available',
    ...metadataLines(result.metadata),
  ].join('\n');
}

export function formatContext(results: readonly ContextResult[]): string {
  if (results.length === 0) return NO_CONTEXT;
  return results.map(formatContextItem).join(SEPARATOR);
}

/**
 * Concatenate per-category pages and rank them by score, highest first.
 * Array#sort is stable, so equal scores keep their emission order.
 */
export function mergeResults(pages: ReadonlyArray<readonly ContextResult[]>): ContextResult[] {
  return pages.flat().sort((a, b) => b.score - a.score);
}
