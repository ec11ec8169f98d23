// ============================================================================
// PIPELINE ERROR TYPES
// ============================================================================
// Categorized errors for retry decisions and failure reporting

/**
 * Categories of pipeline errors with different handling strategies
 */
export enum ScrapeErrorType {
  /** Network-related errors (connection, DNS, etc.) - retriable */
  NETWORK = 'network',
  /** Timeout errors (navigation, provider calls) - retriable */
  TIMEOUT = 'timeout',
  /** Navigation errors (page load, redirect issues) - retriable by the caller */
  NAVIGATION = 'navigation',
  /** Selector errors (element not found, invalid selector) - not retriable */
  SELECTOR = 'selector',
  /** Extraction errors (nothing extracted, data parsing) */
  EXTRACTION = 'extraction',
  /** Provider rejected the credentials */
  AUTH = 'auth',
  /** Provider throttled the request */
  RATE_LIMIT = 'rate_limit',
  /** Provider answered with something we cannot use */
  PARSE = 'parse',
  /** Configuration errors (invalid config, missing key) - not retriable */
  CONFIG = 'config',
  /** Unknown/unexpected errors */
  UNKNOWN = 'unknown',
}

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts after the first call */
  maxRetries: number;
  /** Delay before the first retry in ms */
  retryDelay: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Maximum delay cap in ms */
  maxDelay: number;
  /** Which error types to retry */
  retriableTypes: ScrapeErrorType[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  retryDelay: 1000,
  backoffMultiplier: 2,
  maxDelay: 10000,
  retriableTypes: [
    ScrapeErrorType.NETWORK,
    ScrapeErrorType.TIMEOUT,
    ScrapeErrorType.NAVIGATION,
    ScrapeErrorType.AUTH,
    ScrapeErrorType.RATE_LIMIT,
    ScrapeErrorType.UNKNOWN,
  ],
};

export function isRetriable(errorType: ScrapeErrorType, config: RetryConfig = DEFAULT_RETRY_CONFIG): boolean {
  return config.retriableTypes.includes(errorType);
}

/**
 * Calculate delay for retry attempt with exponential backoff
 */
export function calculateRetryDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const delay = config.retryDelay * Math.pow(config.backoffMultiplier, attempt);
  return Math.min(delay, config.maxDelay);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify an error into a ScrapeErrorType based on its message
 */
export function classifyError(error: unknown): ScrapeErrorType {
  if (error instanceof PipelineError) return error.type;

  const message = errorMessage(error).toLowerCase();

  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('exceeded')
  ) {
    return ScrapeErrorType.TIMEOUT;
  }

  if (
    message.includes('429') ||
    message.includes('rate limit') ||
    message.includes('too many requests') ||
    message.includes('quota')
  ) {
    return ScrapeErrorType.RATE_LIMIT;
  }

  if (
    message.includes('401') ||
    message.includes('403') ||
    message.includes('unauthorized') ||
    message.includes('api key') ||
    message.includes('authentication')
  ) {
    return ScrapeErrorType.AUTH;
  }

  if (
    message.includes('net::') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enotfound') ||
    message.includes('network') ||
    message.includes('connection')
  ) {
    return ScrapeErrorType.NETWORK;
  }

  if (
    message.includes('navigation') ||
    message.includes('navigate') ||
    message.includes('page.goto')
  ) {
    return ScrapeErrorType.NAVIGATION;
  }

  if (
    message.includes('selector') ||
    message.includes('queryselector') ||
    message.includes('not a valid')
  ) {
    return ScrapeErrorType.SELECTOR;
  }

  if (message.includes('config') || message.includes('invalid')) {
    return ScrapeErrorType.CONFIG;
  }

  return ScrapeErrorType.UNKNOWN;
}

/**
 * Base class for every error the pipeline raises or records
 */
export class PipelineError extends Error {
  readonly type: ScrapeErrorType;
  readonly timestamp: number;

  constructor(message: string, type: ScrapeErrorType, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.type = type;
    this.timestamp = Date.now();
  }

  get retriable(): boolean {
    return isRetriable(this.type);
  }
}

/**
 * Page failed to load. Fatal for the current target; retrying is up to the caller.
 */
export class NavigationError extends PipelineError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const type = classifyError(cause);
    super(
      `Navigation to ${url} failed: ${errorMessage(cause)}`,
      type === ScrapeErrorType.TIMEOUT || type === ScrapeErrorType.NETWORK ? type : ScrapeErrorType.NAVIGATION,
      { cause }
    );
    this.url = url;
  }
}

/**
 * A single field failed to extract or normalize. Recorded, never thrown.
 */
export class ExtractionFieldError extends PipelineError {
  readonly itemIndex: number;
  readonly field: string;
  readonly raw: string | null;

  constructor(itemIndex: number, field: string, reason: string, raw: string | null = null) {
    super(`Container ${itemIndex}: ${field} ${reason}`, ScrapeErrorType.EXTRACTION);
    this.itemIndex = itemIndex;
    this.field = field;
    this.raw = raw;
  }
}

export type EmptyExtractionReason = 'no-containers' | 'no-valid-records';

/**
 * Nothing could be extracted after the full loading sequence
 */
export class ExtractionEmptyError extends PipelineError {
  readonly target: string;
  readonly reason: EmptyExtractionReason;
  readonly containerCount: number;

  constructor(target: string, reason: EmptyExtractionReason, containerCount: number) {
    super(
      reason === 'no-containers'
        ? `No product containers found for target "${target}"`
        : `Found ${containerCount} containers for target "${target}" but none produced a valid record`,
      ScrapeErrorType.EXTRACTION
    );
    this.target = target;
    this.reason = reason;
    this.containerCount = containerCount;
  }
}

/**
 * Transport/provider failure for one enrichment batch after all retries
 */
export class EnrichmentBatchError extends PipelineError {
  readonly batch: number;
  readonly recordIds: string[];
  readonly attempts: number;

  constructor(batch: number, recordIds: string[], attempts: number, cause: unknown) {
    super(
      `Batch ${batch} failed after ${attempts} attempt(s): ${errorMessage(cause)}`,
      classifyError(cause),
      { cause }
    );
    this.batch = batch;
    this.recordIds = recordIds;
    this.attempts = attempts;
  }
}

/**
 * Unusable provider answer for one record (or for a whole batch when the body
 * is not parseable). Recorded, never thrown out of the engine.
 */
export class EnrichmentParseError extends PipelineError {
  readonly batch: number;
  readonly recordIds: string[];

  constructor(batch: number, recordIds: string[], reason: string) {
    super(reason, ScrapeErrorType.PARSE);
    this.batch = batch;
    this.recordIds = recordIds;
  }
}
