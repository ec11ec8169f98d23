import type { Page } from 'playwright';

import type { PageHandle, Viewport } from './PageHandle.js';
import {
  readContainers,
  type ContainerQuery,
  type ContainerSnapshot,
} from '../scraper/utils/ContainerReader.js';

const FALLBACK_VIEWPORT: Viewport = { width: 1920, height: 1080 };

/**
 * PageHandle backed by a Playwright page
 */
export class PlaywrightPage implements PageHandle {
  constructor(private readonly page: Page) {}

  url(): string {
    return this.page.url();
  }

  viewport(): Viewport {
    return this.page.viewportSize() ?? FALLBACK_VIEWPORT;
  }

  async scrollBy(deltaY: number): Promise<void> {
    // Wheel events look like a user; window.scrollBy does not fire them
    await this.page.mouse.wheel(0, deltaY);
  }

  async scrollHeight(): Promise<number> {
    return this.page.evaluate(() => document.body.scrollHeight);
  }

  async moveMouse(x: number, y: number, steps: number = 10): Promise<void> {
    await this.page.mouse.move(x, y, { steps });
  }

  async readContainers(query: ContainerQuery): Promise<ContainerSnapshot> {
    return this.page.evaluate(readContainers, query);
  }
}
