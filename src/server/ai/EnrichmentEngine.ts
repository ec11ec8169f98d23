// ============================================================================
// ENRICHMENT ENGINE
// ============================================================================
// Batched categorization through a CategorizationProvider. The batch is the
// unit of failure: one bad batch never costs another batch its labels.

import type {
  CategoryDistribution,
  EnrichedProductRecord,
  ProductCategory,
  ProductRecord,
} from '../../shared/types.js';
import { PRODUCT_CATEGORIES, UNCATEGORIZED, isProductCategory } from '../../shared/types.js';
import type { CategorizationItem, CategorizationProvider, PriceStats } from './types.js';
import { computePriceStats } from './prompt.js';
import { realSleep, type Sleep } from '../behavior/random.js';
import { withTimeout } from '../utils/withTimeout.js';
import {
  DEFAULT_RETRY_CONFIG,
  EnrichmentBatchError,
  EnrichmentParseError,
  ScrapeErrorType,
  calculateRetryDelay,
  classifyError,
  errorMessage,
  type RetryConfig,
} from '../scraper/types/errors.js';

export interface EnrichmentOptions {
  batchSize: number;
  /** Per provider call */
  timeoutMs: number;
  retry: RetryConfig;
  sleep: Sleep;
  now: () => Date;
}

export const DEFAULT_ENRICHMENT_OPTIONS: EnrichmentOptions = {
  batchSize: 20,
  timeoutMs: 60000,
  retry: DEFAULT_RETRY_CONFIG,
  sleep: realSleep,
  now: () => new Date(),
};

export interface EnrichmentResult {
  /** Same length and order as the input */
  products: EnrichedProductRecord[];
  provider: string;
  distribution: CategoryDistribution;
  errors: Array<EnrichmentBatchError | EnrichmentParseError>;
  stats: PriceStats | null;
}

interface Label {
  category: ProductCategory;
  reasoning: string;
}

function categoryKey(value: string): string {
  return value.trim().toLowerCase().replace(/[\s_-]+/g, ' ');
}

/**
 * Map a provider label onto a known category, ignoring case, hyphens and
 * underscores ("mid-range" → "Mid Range")
 */
export function matchCategory(value: string): ProductCategory | null {
  const key = categoryKey(value);
  return PRODUCT_CATEGORIES.find((category) => categoryKey(category) === key) ?? null;
}

function hasPrice(record: ProductRecord): record is ProductRecord & { price: number } {
  return record.price !== null;
}

function toItem(record: ProductRecord & { price: number }): CategorizationItem {
  return { id: record.id, name: record.name, price: record.price, rating: record.rating };
}

/**
 * Count every category plus uncategorized; always sums to records.length
 */
export function computeCategoryDistribution(records: readonly EnrichedProductRecord[]): CategoryDistribution {
  const distribution: CategoryDistribution = { Budget: 0, 'Mid Range': 0, 'High End': 0, [UNCATEGORIZED]: 0 };

  for (const record of records) {
    if (record.ai_category && isProductCategory(record.ai_category)) {
      distribution[record.ai_category] += 1;
    } else {
      distribution[UNCATEGORIZED] += 1;
    }
  }

  return distribution;
}

export class EnrichmentEngine {
  private readonly options: EnrichmentOptions;

  constructor(options: Partial<EnrichmentOptions> = {}) {
    this.options = { ...DEFAULT_ENRICHMENT_OPTIONS, ...options };
    if (this.options.batchSize < 1) {
      throw new Error(`Invalid batch size: ${this.options.batchSize}`);
    }
  }

  async enrich(records: readonly ProductRecord[], provider: CategorizationProvider): Promise<EnrichmentResult> {
    const priced = records.filter(hasPrice);
    const stats = computePriceStats(priced.map((r) => r.price));
    const labels = new Map<string, Label>();
    const errors: EnrichmentResult['errors'] = [];

    console.log(`[EnrichmentEngine] Enriching ${records.length} products with ${provider.name}`);

    if (stats) {
      console.log(
        `[EnrichmentEngine] Price range: $${stats.min.toFixed(2)} - $${stats.max.toFixed(2)} (avg: $${stats.avg.toFixed(2)})`
      );

      const { batchSize } = this.options;
      for (let start = 0; start < priced.length; start += batchSize) {
        const batchNumber = start / batchSize + 1;
        const items = priced.slice(start, start + batchSize).map(toItem);

        console.log(`[EnrichmentEngine] Processing batch ${batchNumber} (${items.length} products)...`);
        const outcome = await this.runBatch(batchNumber, items, stats, provider);

        outcome.labels.forEach((label, id) => labels.set(id, label));
        errors.push(...outcome.errors);
      }
    } else {
      console.warn('[EnrichmentEngine] No products with prices to enrich');
    }

    const enrichedAt = this.options.now().toISOString();
    const products = records.map((record): EnrichedProductRecord => {
      const label = labels.get(record.id);
      if (!label) return record;
      return { ...record, ai_category: label.category, ai_reasoning: label.reasoning, enriched_at: enrichedAt };
    });

    const distribution = computeCategoryDistribution(products);
    console.log(`[EnrichmentEngine] Enriched ${labels.size}/${records.length} products, ${errors.length} error(s)`);

    return { products, provider: provider.name, distribution, errors, stats };
  }

  private async runBatch(
    batch: number,
    items: CategorizationItem[],
    stats: PriceStats,
    provider: CategorizationProvider
  ): Promise<{ labels: Map<string, Label>; errors: EnrichmentResult['errors'] }> {
    const ids = items.map((item) => item.id);
    const { retry, timeoutMs, sleep } = this.options;
    let attempt = 0;

    while (true) {
      try {
        const response = await withTimeout(
          provider.categorize({ batch, items, stats }),
          timeoutMs,
          `${provider.name} batch ${batch}`
        );
        return this.applyResponse(batch, ids, response.entries);
      } catch (error) {
        const type = classifyError(error);

        if (type === ScrapeErrorType.PARSE) {
          const parseError = new EnrichmentParseError(batch, ids, `Unparsable response for batch ${batch}: ${errorMessage(error)}`);
          console.warn(`[EnrichmentEngine] ${parseError.message}`);
          return { labels: new Map(), errors: [parseError] };
        }

        attempt++;
        const canRetry = attempt <= retry.maxRetries && retry.retriableTypes.includes(type);
        console.error(`[EnrichmentEngine] Batch ${batch} attempt ${attempt} failed: ${errorMessage(error)}`);

        if (!canRetry) {
          const batchError = new EnrichmentBatchError(batch, ids, attempt, error);
          console.warn(`[EnrichmentEngine] ${batchError.message}; passing batch through unenriched`);
          return { labels: new Map(), errors: [batchError] };
        }

        const delay = calculateRetryDelay(attempt - 1, retry);
        console.log(`[EnrichmentEngine] Retrying batch ${batch} in ${delay}ms...`);
        await sleep(delay);
      }
    }
  }

  private applyResponse(
    batch: number,
    ids: string[],
    entries: ReadonlyArray<{ id: string; category: string; reasoning: string }>
  ): { labels: Map<string, Label>; errors: EnrichmentParseError[] } {
    const wanted = new Set(ids);
    const byId = new Map<string, { category: string; reasoning: string }>();
    for (const entry of entries) {
      // First answer for an id wins; ids outside the batch are ignored
      if (wanted.has(entry.id) && !byId.has(entry.id)) {
        byId.set(entry.id, entry);
      }
    }

    const labels = new Map<string, Label>();
    const errors: EnrichmentParseError[] = [];

    for (const id of ids) {
      const entry = byId.get(id);
      const category = entry ? matchCategory(entry.category) : null;
      if (!entry) {
        errors.push(new EnrichmentParseError(batch, [id], `No categorization returned for ${id}`));
      } else if (!category) {
        errors.push(
          new EnrichmentParseError(
            batch,
            [id],
            `Category "${entry.category}" for ${id} is not one of ${PRODUCT_CATEGORIES.join(', ')}`
          )
        );
      } else {
        labels.set(id, { category, reasoning: entry.reasoning });
      }
    }

    if (errors.length > 0) {
      console.warn(`[EnrichmentEngine] Batch ${batch}: ${errors.length} record(s) left uncategorized`);
    }

    return { labels, errors };
  }
}
