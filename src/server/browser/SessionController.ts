// ============================================================================
// SESSION CONTROLLER - Stealth Playwright sessions
// ============================================================================

import { chromium } from 'playwright-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser, BrowserContext, Page } from 'playwright';
import { v4 as uuidv4 } from 'uuid';

import { createFingerprint, loadUserAgentProfiles, type Fingerprint, type UserAgentProfile } from './Fingerprint.js';
import type { PageHandle } from './PageHandle.js';
import { PlaywrightPage } from './PlaywrightPage.js';
import { buildStealthScript } from './stealthScript.js';
import { IGNORED_DEFAULT_ARGS, STEALTH_LAUNCH_ARGS } from '../config/stealth-flags.js';
import { realSleep, systemRandom, uniform, type RandomSource, type Range, type Sleep } from '../behavior/random.js';
import { NavigationError } from '../scraper/types/errors.js';

chromium.use(StealthPlugin());

export interface ScrapingSession {
  readonly id: string;
  readonly fingerprint: Fingerprint;
  /** Load a URL. Throws NavigationError on timeout or network failure; never retries. */
  navigate(url: string): Promise<PageHandle>;
  close(): Promise<void>;
}

export interface SessionSource {
  acquire(): Promise<ScrapingSession>;
}

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle';

export interface SessionControllerOptions {
  headless: boolean;
  navigationTimeoutMs: number;
  waitUntil: WaitUntil;
  /** Pause before navigating, in ms */
  preNavigationDelayMs: Range;
  /** Pause after the page loaded, in ms */
  postNavigationDelayMs: Range;
  /** Defaults to configs/user-agents.json */
  profiles?: readonly UserAgentProfile[];
  random: RandomSource;
  sleep: Sleep;
}

const DEFAULT_OPTIONS: SessionControllerOptions = {
  headless: true,
  navigationTimeoutMs: 60000,
  waitUntil: 'domcontentloaded',
  preNavigationDelayMs: [1000, 2500],
  postNavigationDelayMs: [1500, 3000],
  random: systemRandom,
  sleep: realSleep,
};

/**
 * Acquire a session, run `fn`, and close the session however `fn` settles.
 */
export async function withSession<T>(
  source: SessionSource,
  fn: (session: ScrapingSession) => Promise<T>,
  options: { signal?: AbortSignal } = {}
): Promise<T> {
  options.signal?.throwIfAborted();

  const session = await source.acquire();
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}

class PlaywrightSession implements ScrapingSession {
  private closed = false;

  constructor(
    readonly id: string,
    readonly fingerprint: Fingerprint,
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly options: SessionControllerOptions
  ) {}

  async navigate(url: string): Promise<PageHandle> {
    const { random, sleep } = this.options;

    // Think time before typing the URL
    await sleep(uniform(random, this.options.preNavigationDelayMs));

    console.log(`[SessionController] ${this.id} navigating to ${url}`);
    try {
      const response = await this.page.goto(url, {
        waitUntil: this.options.waitUntil,
        timeout: this.options.navigationTimeoutMs,
      });
      if (response && response.status() >= 400) {
        console.warn(`[SessionController] ${url} answered HTTP ${response.status()}`);
      }
    } catch (error) {
      throw new NavigationError(url, error);
    }

    await sleep(uniform(random, this.options.postNavigationDelayMs));

    return new PlaywrightPage(this.page);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    console.log(`[SessionController] Closing session ${this.id}`);
    try {
      await this.context.close();
    } catch (error) {
      console.error(`[SessionController] Error closing context of ${this.id}:`, error);
    }
    try {
      await this.browser.close();
    } catch (error) {
      console.error(`[SessionController] Error closing browser of ${this.id}:`, error);
    }
  }
}

export class SessionController implements SessionSource {
  private readonly options: SessionControllerOptions;
  private profiles: readonly UserAgentProfile[] | null;

  constructor(options: Partial<SessionControllerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.profiles = options.profiles ?? null;
  }

  async acquire(): Promise<ScrapingSession> {
    const id = uuidv4();
    const fingerprint = createFingerprint(this.getProfiles(), this.options.random);

    console.log(
      `[SessionController] Creating session ${id} (${fingerprint.viewport.width}x${fingerprint.viewport.height}, ${fingerprint.locale}, ${fingerprint.timezoneId})`
    );

    const browser = await chromium.launch({
      headless: this.options.headless,
      args: STEALTH_LAUNCH_ARGS,
      ignoreDefaultArgs: IGNORED_DEFAULT_ARGS,
    });

    try {
      const context = await browser.newContext({
        viewport: fingerprint.viewport,
        userAgent: fingerprint.userAgent,
        locale: fingerprint.locale,
        timezoneId: fingerprint.timezoneId,
        extraHTTPHeaders: fingerprint.headers,
        deviceScaleFactor: 1,
        isMobile: false,
        hasTouch: false,
        javaScriptEnabled: true,
      });

      await context.addInitScript(buildStealthScript(fingerprint));

      const page = await context.newPage();

      // Auto-dismiss alerts so they never block extraction
      page.on('dialog', (dialog) => {
        dialog.dismiss().catch((error: unknown) => {
          console.warn('[SessionController] Could not dismiss dialog:', error);
        });
      });

      return new PlaywrightSession(id, fingerprint, browser, context, page, this.options);
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        console.error('[SessionController] Error closing browser after failed setup:', closeError);
      });
      throw error;
    }
  }

  private getProfiles(): readonly UserAgentProfile[] {
    if (!this.profiles) {
      this.profiles = loadUserAgentProfiles();
    }
    return this.profiles;
  }
}
