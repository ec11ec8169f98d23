// ============================================================================
// MARKET INTELLIGENCE PIPELINE
// ============================================================================
// scrape → save raw → enrich → save enriched → report.
// Scraping failures are fatal; enrichment failures are not.

import type { CategoryDistribution, EnrichedOutputDocument, EnrichedProductRecord, RawOutputDocument } from '../../shared/types.js';
import { StealthScraper } from '../scraper/StealthScraper.js';
import { SessionController, type SessionSource } from '../browser/SessionController.js';
import { EnrichmentEngine } from '../ai/EnrichmentEngine.js';
import { createProvider } from '../ai/providers/index.js';
import type { CategorizationProvider } from '../ai/types.js';
import { OutputStore, buildEnrichedDocument, buildRawDocument } from '../output/OutputStore.js';
import { TargetRegistry } from '../config/TargetRegistry.js';
import type { AiProviderName, Settings } from '../config/settings.js';
import { realSleep, systemRandom, type RandomSource, type Sleep } from '../behavior/random.js';
import { DEFAULT_RETRY_CONFIG, errorMessage } from '../scraper/types/errors.js';
import { formatPrice } from '../scraper/utils/PriceParser.js';

export type ProviderFactory = (name: AiProviderName, ai: Settings['ai']) => CategorizationProvider;

export interface PipelineDeps {
  settings: Settings;
  targets?: TargetRegistry;
  sessions?: SessionSource;
  store?: OutputStore;
  providerFactory?: ProviderFactory;
  random?: RandomSource;
  sleep?: Sleep;
  now?: () => Date;
}

export interface PipelineRunOptions {
  target: string;
  maxProducts?: number;
  skipScraping?: boolean;
  skipEnrichment?: boolean;
  /** Overrides settings.ai.provider */
  provider?: AiProviderName;
  signal?: AbortSignal;
}

export interface PriceSummary {
  lowest: number;
  highest: number;
  average: number;
}

export interface PipelineReport {
  target: string;
  totalProducts: number;
  /** null when enrichment was skipped or failed */
  provider: string | null;
  distribution: CategoryDistribution | null;
  prices: PriceSummary | null;
  enrichmentErrors: number;
}

export function summarizePrices(products: readonly EnrichedProductRecord[]): PriceSummary | null {
  const prices = products.flatMap((p) => (p.price === null ? [] : [p.price]));
  if (prices.length === 0) return null;

  return {
    lowest: Math.min(...prices),
    highest: Math.max(...prices),
    average: prices.reduce((sum, p) => sum + p, 0) / prices.length,
  };
}

export function formatReport(report: PipelineReport): string[] {
  const lines = [
    `Target: ${report.target}`,
    `Total Products Analyzed: ${report.totalProducts}`,
    `AI Provider: ${report.provider ? report.provider.toUpperCase() : 'N/A'}`,
  ];

  if (report.distribution) {
    lines.push('Category Distribution:');
    for (const [category, count] of Object.entries(report.distribution)) {
      lines.push(`  - ${category}: ${count} products`);
    }
  }

  if (report.prices) {
    lines.push('Price Analysis:');
    lines.push(`  - Lowest: ${formatPrice(report.prices.lowest)}`);
    lines.push(`  - Highest: ${formatPrice(report.prices.highest)}`);
    lines.push(`  - Average: ${formatPrice(report.prices.average)}`);
  }

  if (report.enrichmentErrors > 0) {
    lines.push(`Enrichment errors: ${report.enrichmentErrors}`);
  }

  return lines;
}

export class MarketIntelligencePipeline {
  private readonly settings: Settings;
  private readonly targets: TargetRegistry;
  private readonly store: OutputStore;
  private readonly providerFactory: ProviderFactory;
  private readonly random: RandomSource;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly sessions: SessionSource;

  constructor(deps: PipelineDeps) {
    this.settings = deps.settings;
    this.targets = deps.targets ?? new TargetRegistry();
    this.store = deps.store ?? new OutputStore(deps.settings.outputDir);
    this.providerFactory = deps.providerFactory ?? createProvider;
    this.random = deps.random ?? systemRandom;
    this.sleep = deps.sleep ?? realSleep;
    this.now = deps.now ?? (() => new Date());
    this.sessions =
      deps.sessions ??
      new SessionController({
        headless: deps.settings.headless,
        navigationTimeoutMs: deps.settings.navigationTimeoutMs,
        random: this.random,
        sleep: this.sleep,
      });
  }

  async run(options: PipelineRunOptions): Promise<PipelineReport> {
    console.log('[Pipeline] ==================================================');
    console.log('[Pipeline] STEALTH MARKET INTELLIGENCE PIPELINE');
    console.log('[Pipeline] ==================================================');

    let raw: RawOutputDocument;
    if (options.skipScraping) {
      console.log('[Pipeline] Skipping scraping (using existing data)');
      raw = await this.store.loadRaw();
    } else {
      raw = await this.scrape(options);
    }

    let enriched: EnrichedOutputDocument | null = null;
    if (options.skipEnrichment) {
      console.log('[Pipeline] Skipping AI enrichment');
    } else {
      enriched = await this.enrich(raw, options.provider ?? this.settings.ai.provider);
    }

    const report = this.buildReport(raw, enriched);
    console.log('[Pipeline] PHASE 3: SUMMARY REPORT');
    for (const line of formatReport(report)) {
      console.log(`[Pipeline] ${line}`);
    }

    return report;
  }

  private async scrape(options: PipelineRunOptions): Promise<RawOutputDocument> {
    console.log('[Pipeline] PHASE 1: DATA COLLECTION');

    const target = this.targets.get(options.target);
    const scraper = new StealthScraper(target, {
      sessions: this.sessions,
      behavior: { actionDelayMs: this.settings.actionDelayMs },
      random: this.random,
      sleep: this.sleep,
      now: this.now,
    });

    const result = await scraper.scrape({ maxProducts: options.maxProducts, signal: options.signal });
    const document = buildRawDocument(target.name, result.products, this.now());
    await this.store.saveRaw(document);
    return document;
  }

  private async enrich(raw: RawOutputDocument, providerName: AiProviderName): Promise<EnrichedOutputDocument | null> {
    console.log('[Pipeline] PHASE 2: AI ENRICHMENT & CATEGORIZATION');

    const { ai } = this.settings;
    try {
      const provider = this.providerFactory(providerName, ai);
      const engine = new EnrichmentEngine({
        batchSize: ai.batchSize,
        timeoutMs: ai.timeoutMs,
        retry: { ...DEFAULT_RETRY_CONFIG, maxRetries: ai.maxRetries },
        sleep: this.sleep,
        now: this.now,
      });

      const result = await engine.enrich(raw.products, provider);
      const document = buildEnrichedDocument(raw.metadata.target, result, this.now());
      await this.store.saveEnriched(document);
      return document;
    } catch (error) {
      console.warn(`[Pipeline] AI enrichment failed: ${errorMessage(error)}`);
      console.warn('[Pipeline] Continuing without enrichment...');
      return null;
    }
  }

  private buildReport(raw: RawOutputDocument, enriched: EnrichedOutputDocument | null): PipelineReport {
    const products = enriched ? enriched.products : raw.products;
    return {
      target: raw.metadata.target,
      totalProducts: products.length,
      provider: enriched ? enriched.metadata.ai_provider : null,
      distribution: enriched ? enriched.metadata.category_distribution : null,
      prices: summarizePrices(products),
      enrichmentErrors: enriched ? enriched.metadata.enrichment_errors.length : 0,
    };
  }
}
