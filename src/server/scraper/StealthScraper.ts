// ============================================================================
// STEALTH SCRAPER - Extraction orchestrator
// ============================================================================
// idle → navigating → loading → extracting → done, with failed reachable from
// navigating and extracting. A run that fails before navigating (abort, no
// session) stays idle. One scoped session per run.

import { EventEmitter } from 'events';

import type { ProductRecord, TargetConfig } from '../../shared/types.js';
import { withSession, type SessionSource } from '../browser/SessionController.js';
import type { PageHandle } from '../browser/PageHandle.js';
import { InteractionSimulator, type BehaviorConfig } from '../behavior/InteractionSimulator.js';
import { realSleep, systemRandom, type RandomSource, type Sleep } from '../behavior/random.js';
import { buildContainerQuery } from './utils/ContainerReader.js';
import { parseContainer } from './ProductParser.js';
import { ExtractionEmptyError, ExtractionFieldError, errorMessage } from './types/errors.js';
import { defaultTextScales, type TextScales } from '../config/textScales.js';

export type ScraperState = 'idle' | 'navigating' | 'loading' | 'extracting' | 'done' | 'failed';

export interface ScrapeOptions {
  /** Stop after this many records (default 50) */
  maxProducts?: number;
  /** Browse rounds after lazy loading on dynamic targets (default 2) */
  browseInteractions?: number;
  signal?: AbortSignal;
}

export interface ScrapeResult {
  target: string;
  products: ProductRecord[];
  /** Per-field warnings; the affected records are still emitted */
  fieldErrors: ExtractionFieldError[];
  containerCount: number;
  /** True when the run stopped early on an abort request */
  aborted: boolean;
}

export interface StealthScraperDeps {
  sessions: SessionSource;
  behavior?: Partial<BehaviorConfig>;
  random?: RandomSource;
  sleep?: Sleep;
  scales?: TextScales;
  now?: () => Date;
}

const DEFAULT_MAX_PRODUCTS = 50;
const DEFAULT_BROWSE_INTERACTIONS = 2;

export class StealthScraper extends EventEmitter {
  private currentState: ScraperState = 'idle';
  private readonly random: RandomSource;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(
    private readonly target: TargetConfig,
    private readonly deps: StealthScraperDeps
  ) {
    super();
    this.random = deps.random ?? systemRandom;
    this.sleep = deps.sleep ?? realSleep;
    this.now = deps.now ?? (() => new Date());
  }

  get state(): ScraperState {
    return this.currentState;
  }

  async scrape(options: ScrapeOptions = {}): Promise<ScrapeResult> {
    const maxProducts = options.maxProducts ?? DEFAULT_MAX_PRODUCTS;

    console.log(`[StealthScraper] Starting: ${this.target.name}`);
    console.log(`[StealthScraper] URL: ${this.target.url} (${this.target.type})`);
    console.log(`[StealthScraper] Target: ${maxProducts} products`);

    this.currentState = 'idle';
    try {
      return await withSession(
        this.deps.sessions,
        async (session) => {
          this.setState('navigating');
          const page = await session.navigate(this.target.url);

          this.setState('loading');
          await this.loadContent(page, options.browseInteractions ?? DEFAULT_BROWSE_INTERACTIONS);

          this.setState('extracting');
          options.signal?.throwIfAborted();
          const result = await this.extract(page, maxProducts, options.signal);

          this.setState('done');
          return result;
        },
        { signal: options.signal }
      );
    } catch (error) {
      if (this.currentState !== 'idle') {
        this.setState('failed');
      }
      console.error(`[StealthScraper] ${this.target.name} failed: ${errorMessage(error)}`);
      throw error;
    }
  }

  private setState(state: ScraperState): void {
    this.currentState = state;
    this.emit('state', state);
  }

  /**
   * Dynamic targets get scrolled to the bottom and browsed so lazy content
   * renders. Every target then pauses for one action delay before extraction.
   * A failure here is logged; extraction decides whether the page is usable.
   */
  private async loadContent(page: PageHandle, browseInteractions: number): Promise<void> {
    const simulator = new InteractionSimulator(page, this.deps.behavior, this.random, this.sleep);
    try {
      if (this.target.type === 'dynamic') {
        console.log('[StealthScraper] Triggering lazy-loaded content...');
        await simulator.scrollToBottom();
        await simulator.browse(browseInteractions);
      }
      await simulator.randomDelay();
    } catch (error) {
      console.warn(`[StealthScraper] Lazy loading interrupted: ${errorMessage(error)}`);
    }
  }

  private async extract(page: PageHandle, maxProducts: number, signal?: AbortSignal): Promise<ScrapeResult> {
    const scales = this.deps.scales ?? defaultTextScales();
    const snapshot = await page.readContainers(buildContainerQuery(this.target.selectors));

    console.log(`[StealthScraper] Found ${snapshot.containerCount} product containers`);

    const result: ScrapeResult = {
      target: this.target.name,
      products: [],
      fieldErrors: [],
      containerCount: snapshot.containerCount,
      aborted: false,
    };

    if (snapshot.containerCount === 0) {
      if (this.target.allowEmpty) {
        console.warn(`[StealthScraper] No containers for ${this.target.name}, empty result allowed`);
        return result;
      }
      throw new ExtractionEmptyError(this.target.name, 'no-containers', 0);
    }

    for (const container of snapshot.containers) {
      if (result.products.length >= maxProducts) {
        console.log(`[StealthScraper] Reached target: ${maxProducts}`);
        break;
      }
      if (signal?.aborted) {
        console.warn(`[StealthScraper] Aborted after ${result.products.length} products`);
        result.aborted = true;
        break;
      }

      const { product, errors } = parseContainer(container, scales);
      result.fieldErrors.push(...errors);
      for (const error of errors) {
        console.warn(`[StealthScraper] ${error.message}`);
      }
      if (!product) continue;

      const record: ProductRecord = {
        id: `${this.target.name}_${result.products.length + 1}`,
        ...product,
        source: this.target.name,
        source_url: this.target.url,
        scraped_at: this.now().toISOString(),
      };
      result.products.push(record);
      this.emit('product', record);

      if (result.products.length % 10 === 0) {
        console.log(`[StealthScraper] Processed ${result.products.length} products...`);
      }
    }

    if (result.products.length === 0 && !result.aborted && maxProducts > 0) {
      throw new ExtractionEmptyError(this.target.name, 'no-valid-records', snapshot.containerCount);
    }

    console.log(
      `[StealthScraper] Extracted ${result.products.length} products (${result.fieldErrors.length} field warnings)`
    );
    return result;
  }
}
