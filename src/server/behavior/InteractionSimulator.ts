// ============================================================================
// INTERACTION SIMULATOR
// ============================================================================
// Human-looking scrolls, pointer moves and pauses. Triggers lazy-loaded
// content and keeps behavioural fingerprints irregular.

import type { PageHandle } from '../browser/PageHandle.js';
import { pick, randomInt, realSleep, systemRandom, uniform, type RandomSource, type Range, type Sleep } from './random.js';

export type BrowseAction =
  | { type: 'scroll'; deltaY: number }
  | { type: 'mouse'; x: number; y: number }
  | { type: 'pause'; ms: number };

/**
 * Configuration for interaction simulation. Pixel ranges are inclusive,
 * durations are in ms.
 */
export interface BehaviorConfig {
  /** Scroll distance per browse round */
  scrollPx: Range;
  /** Pause after each browse scroll */
  scrollDelayMs: Range;
  /** Scroll distance per scrollToBottom step */
  bottomIncrementPx: Range;
  /** Pause after each scrollToBottom step, lets lazy content load */
  bottomPauseMs: Range;
  /** Hard cap on scrollToBottom steps */
  maxScrollRounds: number;
  /** Delay between actions and for a browse "pause" round (REQUEST_DELAY_MIN/MAX) */
  actionDelayMs: Range;
  /** Settle time after a pointer move */
  mouseSettleMs: Range;
  /** Keep the pointer this far from the viewport edge */
  mouseMarginPx: number;
  mouseEnabled: boolean;
}

export const DEFAULT_BEHAVIOR_CONFIG: BehaviorConfig = {
  scrollPx: [200, 600],
  scrollDelayMs: [800, 2500],
  bottomIncrementPx: [300, 800],
  bottomPauseMs: [1400, 2600],
  maxScrollRounds: 50,
  actionDelayMs: [2000, 5000],
  mouseSettleMs: [100, 300],
  mouseMarginPx: 100,
  mouseEnabled: true,
};

const BROWSE_ACTIONS = ['scroll', 'mouse', 'pause'] as const;

export class InteractionSimulator {
  private readonly config: BehaviorConfig;

  constructor(
    private readonly page: PageHandle,
    config: Partial<BehaviorConfig> = {},
    private readonly random: RandomSource = systemRandom,
    private readonly sleep: Sleep = realSleep
  ) {
    this.config = { ...DEFAULT_BEHAVIOR_CONFIG, ...config };
  }

  /**
   * Perform `interactions` rounds, each a scroll, a pointer move or a pause.
   * Returns what was done, in order.
   */
  async browse(interactions: number): Promise<BrowseAction[]> {
    const actions: BrowseAction[] = [];

    for (let i = 0; i < interactions; i++) {
      const kind = pick(this.random, BROWSE_ACTIONS);

      if (kind === 'scroll') {
        const deltaY = randomInt(this.random, this.config.scrollPx);
        await this.page.scrollBy(deltaY);
        await this.sleep(uniform(this.random, this.config.scrollDelayMs));
        actions.push({ type: 'scroll', deltaY });
      } else if (kind === 'mouse' && this.config.mouseEnabled) {
        const { x, y } = await this.randomMouseMovement();
        actions.push({ type: 'mouse', x, y });
      } else {
        actions.push({ type: 'pause', ms: await this.randomDelay() });
      }
    }

    return actions;
  }

  /**
   * Scroll in random increments until the document stops growing, or the
   * round cap is hit. Returns the number of scroll steps performed.
   */
  async scrollToBottom(
    incrementRange: Range = this.config.bottomIncrementPx,
    pauseRange: Range = this.config.bottomPauseMs
  ): Promise<number> {
    let lastHeight = await this.page.scrollHeight();
    let rounds = 0;
    let reachedBottom = false;

    while (rounds < this.config.maxScrollRounds) {
      await this.page.scrollBy(randomInt(this.random, incrementRange));
      await this.sleep(uniform(this.random, pauseRange));
      rounds++;

      const newHeight = await this.page.scrollHeight();
      if (newHeight <= lastHeight) {
        reachedBottom = true;
        break;
      }
      lastHeight = newHeight;
    }

    if (reachedBottom) {
      console.log(`[InteractionSimulator] Reached bottom after ${rounds} scroll(s), height ${lastHeight}px`);
    } else {
      console.warn(`[InteractionSimulator] Stopped scrolling after ${rounds} rounds (cap reached)`);
    }

    return rounds;
  }

  async randomDelay(range: Range = this.config.actionDelayMs): Promise<number> {
    const ms = uniform(this.random, range);
    await this.sleep(ms);
    return ms;
  }

  async randomMouseMovement(): Promise<{ x: number; y: number }> {
    const { width, height } = this.page.viewport();
    const margin = this.config.mouseMarginPx;

    const x = randomInt(this.random, axisRange(width, margin));
    const y = randomInt(this.random, axisRange(height, margin));

    await this.page.moveMouse(x, y, randomInt(this.random, [5, 15]));
    await this.sleep(uniform(this.random, this.config.mouseSettleMs));

    return { x, y };
  }

  /**
   * Idle like someone reading: pointer drift and the odd small scroll.
   * Duration is measured in simulated pause time, not wall clock.
   */
  async simulateReading(durationMs: number = uniform(this.random, [2000, 5000])): Promise<void> {
    let elapsed = 0;

    while (elapsed < durationMs) {
      if (this.config.mouseEnabled) {
        await this.randomMouseMovement();
      }

      if (this.random.next() > 0.7) {
        await this.page.scrollBy(randomInt(this.random, [-50, 150]));
      }

      const pause = uniform(this.random, [500, 1500]);
      await this.sleep(pause);
      elapsed += pause;
    }
  }
}

function axisRange(size: number, margin: number): Range {
  if (size <= margin * 2) {
    return [0, Math.max(0, size - 1)];
  }
  return [margin, size - margin];
}
