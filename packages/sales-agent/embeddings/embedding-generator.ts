// Embedding Generator — batch write path from aggregates to embedding records.
// Items run one at a time with a fixed yield between them; a failure on one
// item is logged and the batch moves on.

import type { SalesAggregates } from '../types/sales.js';
import type { EmbeddingRecord, EntityMetadata, EntityType } from '../types/embeddings.js';
import { ENTITY_TYPES } from '../types/embeddings.js';
import { contextHint, entityKey, synthesize, type AggregateEntity, type TextEnhancer } from './text-synthesizer.js';
import type { EmbeddingService } from './embedding-service.js';
import { sleep as realSleep, type Sleep } from '../utils/retry.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('EmbeddingGenerator');

/** Records are keyed by type and key so equal names in different views never collide */
export function recordKey(type: EntityType, key: string): string {
  return `${type}:${key}`;
}

export function metadataFor(entity: AggregateEntity): EntityMetadata {
  switch (entity.type) {
    case 'customer':
      return {
        type: 'customer',
        territory: entity.value.territory,
        totalSales: entity.value.totalSales,
        customerStatus: entity.value.customerStatus,
      };
    case 'product':
      return {
        type: 'product',
        productLine: entity.value.productLine,
        performanceScore: entity.value.performanceScore,
        typicalDealSize: entity.value.typicalDealSize,
      };
    case 'territory':
      return {
        type: 'territory',
        marketShare: entity.value.marketShare,
        totalSales: entity.value.totalSales,
        uniqueCustomers: entity.value.uniqueCustomers,
      };
  }
}

export function* entitiesOf(aggregates: SalesAggregates): Generator<AggregateEntity> {
  for (const value of aggregates.customers.values()) yield { type: 'customer', value };
  for (const value of aggregates.products.values()) yield { type: 'product', value };
  for (const value of aggregates.territories.values()) yield { type: 'territory', value };
}

export interface EmbeddingGeneratorOptions {
  itemDelayMs: number;
  sleep?: Sleep;
}

interface TypeTally {
  generated: number;
  notEnriched: number;
  notEmbedded: number;
}

export class EmbeddingGenerator {
  private readonly sleep: Sleep;

  constructor(
    private readonly enhancer: TextEnhancer,
    private readonly embedder: EmbeddingService,
    private readonly options: EmbeddingGeneratorOptions,
  ) {
    this.sleep = options.sleep ?? realSleep;
  }

  async generateEmbeddings(aggregates: SalesAggregates): Promise<Map<string, EmbeddingRecord>> {
    const records = new Map<string, EmbeddingRecord>();
    const tally = new Map<EntityType, TypeTally>(
      ENTITY_TYPES.map((t) => [t, { generated: 0, notEnriched: 0, notEmbedded: 0 }]),
    );
    const skipped: string[] = [];
    let first = true;

    for (const entity of entitiesOf(aggregates)) {
      if (!first && this.options.itemDelayMs > 0) await this.sleep(this.options.itemDelayMs);
      first = false;

      const key = entityKey(entity);
      log.debug(`Generating embedding for ${entity.type}: ${key}`);

      try {
        const record = await this.generateOne(entity, key);
        records.set(recordKey(entity.type, key), record);

        const t = tally.get(entity.type);
        if (t) {
          t.generated++;
          if (!record.enriched) t.notEnriched++;
          if (!record.embedded) t.notEmbedded++;
        }
      } catch (err) {
        skipped.push(recordKey(entity.type, key));
        log.error(`Skipping ${entity.type} ${key}`, { error: errorMessage(err) });
      }
    }

    log.info(`Generated ${records.size} embedding records`, {
      perType: Object.fromEntries(tally),
      skipped,
    });
    return records;
  }

  private async generateOne(entity: AggregateEntity, key: string): Promise<EmbeddingRecord> {
    const baseText = synthesize(entity);
    const text = await this.enhancer.enhance(baseText, contextHint(entity), entity.type);
    const vector = await this.embedder.embedOutcome(text.value);

    return {
      key,
      entityType: entity.type,
      text: text.value,
      vector: vector.value,
      metadata: metadataFor(entity),
      enriched: text.kind === 'computed',
      embedded: vector.kind === 'computed',
    };
  }
}
