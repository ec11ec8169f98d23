// ============================================================================
// ENRICHMENT TYPES
// ============================================================================

/** What a provider sees of a record */
export interface CategorizationItem {
  id: string;
  name: string;
  price: number;
  rating: number | null;
}

export interface PriceStats {
  min: number;
  max: number;
  avg: number;
}

export interface CategorizationRequest {
  /** 1-based batch number, for logging */
  batch: number;
  items: CategorizationItem[];
  /** Statistics over every priced record in the run, not just this batch */
  stats: PriceStats;
}

/**
 * One provider answer. `category` is whatever the provider said; the engine
 * checks it against the allowed categories.
 */
export interface Categorization {
  id: string;
  category: string;
  reasoning: string;
}

export interface CategorizationResponse {
  entries: Categorization[];
}

/**
 * Anything that can categorize a batch. Implementations throw on transport
 * failure and throw a PARSE PipelineError when the body is unusable.
 */
export interface CategorizationProvider {
  readonly name: string;
  categorize(request: CategorizationRequest): Promise<CategorizationResponse>;
}
