// ============================================================================
// OUTPUT STORE
// ============================================================================
// JSON hand-off documents: raw records after scraping, enriched records after
// categorization. Written pretty-printed, read back with validation.

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import type {
  EnrichedOutputDocument,
  EnrichmentErrorSummary,
  ProductRecord,
  RawOutputDocument,
} from '../../shared/types.js';
import type { EnrichmentResult } from '../ai/EnrichmentEngine.js';
import { EnrichmentBatchError } from '../scraper/types/errors.js';

export const RAW_OUTPUT_FILE = 'products_raw.json';
export const ENRICHED_OUTPUT_FILE = 'products_enriched.json';

const ProductRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  price: z.number().nonnegative().nullable(),
  price_raw: z.string().nullable(),
  rating: z.number().nonnegative().nullable(),
  rating_raw: z.string().nullable(),
  stock_info: z.object({
    in_stock: z.boolean(),
    scarcity_signal: z.string().nullable(),
    raw_text: z.string().nullable(),
  }),
  source: z.string().min(1),
  source_url: z.string(),
  scraped_at: z.string(),
});

const RawOutputSchema = z.object({
  metadata: z.object({
    target: z.string(),
    total_products: z.number().int().nonnegative(),
    scraped_at: z.string(),
  }),
  products: z.array(ProductRecordSchema),
});

export function buildRawDocument(target: string, products: ProductRecord[], scrapedAt: Date): RawOutputDocument {
  return {
    metadata: { target, total_products: products.length, scraped_at: scrapedAt.toISOString() },
    products,
  };
}

export function summarizeEnrichmentErrors(errors: EnrichmentResult['errors']): EnrichmentErrorSummary[] {
  return errors.map((error): EnrichmentErrorSummary => ({
    kind: error instanceof EnrichmentBatchError ? 'batch' : 'parse',
    batch: error.batch,
    record_ids: error.recordIds,
    message: error.message,
  }));
}

export function buildEnrichedDocument(
  target: string | null,
  result: EnrichmentResult,
  enrichedAt: Date
): EnrichedOutputDocument {
  return {
    metadata: {
      target,
      total_products: result.products.length,
      enriched_at: enrichedAt.toISOString(),
      ai_provider: result.provider,
      category_distribution: result.distribution,
      enrichment_errors: summarizeEnrichmentErrors(result.errors),
    },
    products: result.products,
  };
}

export class OutputStore {
  constructor(private readonly outputDir: string) {}

  get rawPath(): string {
    return path.join(this.outputDir, RAW_OUTPUT_FILE);
  }

  get enrichedPath(): string {
    return path.join(this.outputDir, ENRICHED_OUTPUT_FILE);
  }

  async saveRaw(document: RawOutputDocument): Promise<string> {
    await this.write(this.rawPath, document);
    console.log(`[OutputStore] Raw data saved to: ${this.rawPath}`);
    return this.rawPath;
  }

  async saveEnriched(document: EnrichedOutputDocument): Promise<string> {
    await this.write(this.enrichedPath, document);
    console.log(`[OutputStore] Enriched data saved to: ${this.enrichedPath}`);
    return this.enrichedPath;
  }

  async loadRaw(): Promise<RawOutputDocument> {
    const content = await fs.readFile(this.rawPath, 'utf-8');
    const parsed = RawOutputSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`Invalid raw output in ${this.rawPath}: ${message}`);
    }
    return parsed.data;
  }

  private async write(filePath: string, document: unknown): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(document, null, 2), 'utf-8');
  }
}
