import { describe, test, expect, vi, beforeEach } from 'vitest';

const chromium = vi.hoisted(() => ({ use: vi.fn(), launch: vi.fn() }));

vi.mock('playwright-extra', () => ({ chromium }));
vi.mock('puppeteer-extra-plugin-stealth', () => ({ default: () => ({ name: 'stealth' }) }));

import { SessionController, withSession } from '../SessionController.js';
import { PlaywrightPage } from '../PlaywrightPage.js';
import { buildStealthScript } from '../stealthScript.js';
import { IGNORED_DEFAULT_ARGS, STEALTH_LAUNCH_ARGS } from '../../config/stealth-flags.js';
import { SeededRandom } from '../../behavior/random.js';
import { NavigationError, ScrapeErrorType } from '../../scraper/types/errors.js';
import type { UserAgentProfile } from '../Fingerprint.js';

const PROFILE: UserAgentProfile = {
  userAgent: 'Mozilla/5.0 (test) Chrome/120.0.0.0',
  platform: 'Win32',
  locale: 'en-GB',
  timezoneId: 'Europe/London',
  languages: ['en-GB', 'en'],
};

const URL = 'https://shop.example.test/list';

interface StubOptions {
  gotoError?: Error;
  status?: number;
  contextError?: Error;
  contextCloseError?: Error;
}

function stubBrowser(options: StubOptions = {}) {
  const page = {
    goto: vi.fn(async () => {
      if (options.gotoError) throw options.gotoError;
      return { status: () => options.status ?? 200 };
    }),
    on: vi.fn(),
    url: () => URL,
  };
  const context = {
    addInitScript: vi.fn(async () => undefined),
    newPage: vi.fn(async () => page),
    close: vi.fn(async () => {
      if (options.contextCloseError) throw options.contextCloseError;
    }),
  };
  const browser = {
    newContext: vi.fn(async () => {
      if (options.contextError) throw options.contextError;
      return context;
    }),
    close: vi.fn(async () => undefined),
  };
  chromium.launch.mockResolvedValue(browser);
  return { browser, context, page };
}

function controller() {
  const sleep = vi.fn(async (_ms: number) => undefined);
  const sessions = new SessionController({
    headless: true,
    navigationTimeoutMs: 30000,
    preNavigationDelayMs: [1000, 2500],
    postNavigationDelayMs: [1500, 3000],
    profiles: [PROFILE],
    random: new SeededRandom(12),
    sleep,
  });
  return { sessions, sleep };
}

describe('SessionController', () => {
  beforeEach(() => {
    chromium.launch.mockReset();
  });

  test('launches with stealth flags and a fingerprinted context', async () => {
    const { browser, context, page } = stubBrowser();
    const { sessions } = controller();

    const session = await sessions.acquire();

    expect(chromium.launch).toHaveBeenCalledWith({
      headless: true,
      args: STEALTH_LAUNCH_ARGS,
      ignoreDefaultArgs: IGNORED_DEFAULT_ARGS,
    });
    expect(session.fingerprint).toMatchObject(PROFILE);
    expect(browser.newContext).toHaveBeenCalledWith(
      expect.objectContaining({
        viewport: session.fingerprint.viewport,
        userAgent: PROFILE.userAgent,
        locale: 'en-GB',
        timezoneId: 'Europe/London',
        extraHTTPHeaders: session.fingerprint.headers,
      })
    );
    expect(session.fingerprint.headers['Accept-Language']).toBe('en-GB,en;q=0.9');
    expect(context.addInitScript).toHaveBeenCalledWith(buildStealthScript(session.fingerprint));
    expect(page.on).toHaveBeenCalledWith('dialog', expect.any(Function));
  });

  test('dismisses dialogs', async () => {
    const { page } = stubBrowser();
    const { sessions } = controller();
    await sessions.acquire();

    const [, onDialog] = page.on.mock.calls[0];
    const dialog = { dismiss: vi.fn(async () => undefined) };
    onDialog(dialog);

    expect(dialog.dismiss).toHaveBeenCalledTimes(1);
  });

  test('navigate waits around the page load and returns a page handle', async () => {
    const { page } = stubBrowser();
    const { sessions, sleep } = controller();
    const session = await sessions.acquire();

    const handle = await session.navigate(URL);

    expect(handle).toBeInstanceOf(PlaywrightPage);
    expect(handle.url()).toBe(URL);
    expect(page.goto).toHaveBeenCalledWith(URL, { waitUntil: 'domcontentloaded', timeout: 30000 });
    expect(sleep).toHaveBeenCalledTimes(2);
    const [[before], [after]] = sleep.mock.calls;
    expect(before).toBeGreaterThanOrEqual(1000);
    expect(before).toBeLessThan(2500);
    expect(after).toBeGreaterThanOrEqual(1500);
    expect(after).toBeLessThan(3000);
  });

  test('an HTTP error status does not fail navigation', async () => {
    stubBrowser({ status: 503 });
    const { sessions } = controller();
    const session = await sessions.acquire();

    await expect(session.navigate(URL)).resolves.toBeInstanceOf(PlaywrightPage);
  });

  test('a goto rejection becomes a NavigationError', async () => {
    stubBrowser({ gotoError: new Error('page.goto: Timeout 30000ms exceeded.') });
    const { sessions, sleep } = controller();
    const session = await sessions.acquire();

    const error = await session.navigate(URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NavigationError);
    expect(error).toMatchObject({ url: URL, type: ScrapeErrorType.TIMEOUT });
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  test('closes the browser when context setup fails', async () => {
    const { browser } = stubBrowser({ contextError: new Error('context crashed') });
    const { sessions } = controller();

    await expect(sessions.acquire()).rejects.toThrow('context crashed');
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  test('close releases context and browser once', async () => {
    const { browser, context } = stubBrowser();
    const { sessions } = controller();
    const session = await sessions.acquire();

    await session.close();
    await session.close();

    expect(context.close).toHaveBeenCalledTimes(1);
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  test('close still shuts the browser when the context fails to close', async () => {
    const { browser } = stubBrowser({ contextCloseError: new Error('already gone') });
    const { sessions } = controller();
    const session = await sessions.acquire();

    await expect(session.close()).resolves.toBeUndefined();
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  test('withSession releases the browser after a failed navigation', async () => {
    const { browser } = stubBrowser({ gotoError: new Error('net::ERR_CONNECTION_REFUSED') });
    const { sessions } = controller();

    await expect(withSession(sessions, (session) => session.navigate(URL))).rejects.toMatchObject({
      type: ScrapeErrorType.NETWORK,
    });
    expect(browser.close).toHaveBeenCalledTimes(1);
  });
});
