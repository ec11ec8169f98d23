// ============================================================================
// SHARED TYPES - Product Records, Targets and Output Documents
// ============================================================================

// Product Categories
export const PRODUCT_CATEGORIES = ['Budget', 'Mid Range', 'High End'] as const;

export type ProductCategory = (typeof PRODUCT_CATEGORIES)[number];

export const UNCATEGORIZED = 'uncategorized';

export type CategoryDistribution = Record<ProductCategory | typeof UNCATEGORIZED, number>;

export function isProductCategory(value: unknown): value is ProductCategory {
  return typeof value === 'string' && (PRODUCT_CATEGORIES as readonly string[]).includes(value);
}

// Product Record Types
export interface StockInfo {
  in_stock: boolean;
  /** Phrase such as "Only 2 left in stock" when limited stock was detected */
  scarcity_signal: string | null;
  /** Availability text as found on the page */
  raw_text: string | null;
}

export interface ProductRecord {
  /** `{source}_{sequence}`, unique within a run */
  id: string;
  name: string;
  price: number | null;
  price_raw: string | null;
  /** 1-5 scale */
  rating: number | null;
  rating_raw: string | null;
  stock_info: StockInfo;
  source: string;
  source_url: string;
  scraped_at: string;
}

export interface EnrichmentFields {
  ai_category: ProductCategory;
  ai_reasoning: string;
  enriched_at: string;
}

/**
 * A record after enrichment. Records the provider could not categorize pass
 * through without the enrichment fields.
 */
export type EnrichedProductRecord = ProductRecord & Partial<EnrichmentFields>;

// Target Configuration Types
export type TargetType = 'static' | 'dynamic';

export type ProductField = 'name' | 'price' | 'rating' | 'availability';

export const PRODUCT_FIELDS: readonly ProductField[] = ['name', 'price', 'rating', 'availability'];

/**
 * CSS selector relative to the product container. The object form reads an
 * attribute instead of the element's text.
 */
export type FieldSelector = string | { css: string; attribute: string };

export type TargetSelectors = { product_container: string } & Record<ProductField, FieldSelector>;

export interface TargetConfig {
  name: string;
  url: string;
  type: TargetType;
  selectors: TargetSelectors;
  /** Treat a listing with no containers as a valid empty result */
  allowEmpty?: boolean;
}

// Output Document Types
export interface RunMetadata {
  target: string;
  total_products: number;
  scraped_at: string;
}

export interface RawOutputDocument {
  metadata: RunMetadata;
  products: ProductRecord[];
}

export interface EnrichmentErrorSummary {
  kind: 'batch' | 'parse';
  batch: number;
  record_ids: string[];
  message: string;
}

export interface EnrichedRunMetadata {
  target: string | null;
  total_products: number;
  enriched_at: string;
  ai_provider: string;
  category_distribution: CategoryDistribution;
  enrichment_errors: EnrichmentErrorSummary[];
}

export interface EnrichedOutputDocument {
  metadata: EnrichedRunMetadata;
  products: EnrichedProductRecord[];
}
