// ============================================================================
// STEALTH MARKET INTELLIGENCE - Public API
// ============================================================================

export * from '../shared/types.js';

// Session Controller
export {
  SessionController,
  withSession,
  type ScrapingSession,
  type SessionSource,
  type SessionControllerOptions,
  type WaitUntil,
} from './browser/SessionController.js';
export type { PageHandle, Viewport } from './browser/PageHandle.js';
export { PlaywrightPage } from './browser/PlaywrightPage.js';
export {
  createFingerprint,
  loadUserAgentProfiles,
  buildHeaders,
  type Fingerprint,
  type UserAgentProfile,
} from './browser/Fingerprint.js';
export { buildStealthScript } from './browser/stealthScript.js';

// Interaction Simulator
export {
  InteractionSimulator,
  DEFAULT_BEHAVIOR_CONFIG,
  type BehaviorConfig,
  type BrowseAction,
} from './behavior/InteractionSimulator.js';
export { SeededRandom, systemRandom, realSleep, type RandomSource, type Range, type Sleep } from './behavior/random.js';

// Extraction Orchestrator
export {
  StealthScraper,
  type ScrapeOptions,
  type ScrapeResult,
  type ScraperState,
  type StealthScraperDeps,
} from './scraper/StealthScraper.js';
export { parseContainer, type ParsedProduct, type ParseResult } from './scraper/ProductParser.js';
export { normalizePrice, formatPrice } from './scraper/utils/PriceParser.js';
export { normalizeRating } from './scraper/utils/RatingParser.js';
export { detectStock } from './scraper/utils/StockParser.js';
export * from './scraper/types/errors.js';

// Enrichment Engine
export {
  EnrichmentEngine,
  computeCategoryDistribution,
  matchCategory,
  type EnrichmentOptions,
  type EnrichmentResult,
} from './ai/EnrichmentEngine.js';
export * from './ai/types.js';
export { createProvider, LlmProvider, GeminiProvider, OpenAIProvider, AnthropicProvider } from './ai/providers/index.js';

// Configuration, output, composition
export { loadSettings, AI_PROVIDERS, type AiProviderName, type Settings } from './config/settings.js';
export { TargetRegistry } from './config/TargetRegistry.js';
export { loadTextScales, type TextScales } from './config/textScales.js';
export { OutputStore, buildRawDocument, buildEnrichedDocument } from './output/OutputStore.js';
export {
  MarketIntelligencePipeline,
  formatReport,
  summarizePrices,
  type PipelineReport,
  type PipelineRunOptions,
} from './pipeline/MarketIntelligencePipeline.js';
