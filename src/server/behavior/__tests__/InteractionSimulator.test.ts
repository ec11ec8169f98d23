import { describe, test, expect, vi } from 'vitest';
import { InteractionSimulator, DEFAULT_BEHAVIOR_CONFIG } from '../InteractionSimulator.js';
import { SeededRandom } from '../random.js';
import { FakePage, listingDocument } from '../../scraper/__tests__/fakes.js';

class GrowingPage extends FakePage {
  private height = 1000;

  async scrollHeight(): Promise<number> {
    this.height += 500;
    return this.height;
  }
}

function noSleep() {
  return vi.fn(async (_ms: number) => undefined);
}

describe('InteractionSimulator', () => {
  describe('browse', () => {
    test('performs the requested number of rounds', async () => {
      const page = new FakePage(listingDocument([]));
      const simulator = new InteractionSimulator(page, {}, new SeededRandom(11), noSleep());

      const actions = await simulator.browse(6);

      expect(actions).toHaveLength(6);
    });

    test('the same seed replays the same actions', async () => {
      const pageA = new FakePage(listingDocument([]));
      const pageB = new FakePage(listingDocument([]));

      const actionsA = await new InteractionSimulator(pageA, {}, new SeededRandom(99), noSleep()).browse(10);
      const actionsB = await new InteractionSimulator(pageB, {}, new SeededRandom(99), noSleep()).browse(10);

      expect(actionsA).toEqual(actionsB);
      expect(pageA.scrolls).toEqual(pageB.scrolls);
      expect(pageA.moves).toEqual(pageB.moves);
    });

    test('keeps scrolls, moves and pauses inside their ranges', async () => {
      const page = new FakePage(listingDocument([]), { viewport: { width: 1366, height: 768 } });
      const actions = await new InteractionSimulator(page, {}, new SeededRandom(5), noSleep()).browse(50);

      for (const action of actions) {
        if (action.type === 'scroll') {
          expect(action.deltaY).toBeGreaterThanOrEqual(200);
          expect(action.deltaY).toBeLessThanOrEqual(600);
        } else if (action.type === 'mouse') {
          expect(action.x).toBeGreaterThanOrEqual(100);
          expect(action.x).toBeLessThanOrEqual(1266);
          expect(action.y).toBeGreaterThanOrEqual(100);
          expect(action.y).toBeLessThanOrEqual(668);
        } else {
          expect(action.ms).toBeGreaterThanOrEqual(2000);
          expect(action.ms).toBeLessThan(5000);
        }
      }
    });

    test('pause rounds sleep within the configured action delay window', async () => {
      const page = new FakePage(listingDocument([]));
      const sleep = noSleep();
      const simulator = new InteractionSimulator(
        page,
        { actionDelayMs: [9000, 9001], mouseEnabled: false },
        new SeededRandom(5),
        sleep
      );

      const actions = await simulator.browse(20);
      const pauses = actions.flatMap((a) => (a.type === 'pause' ? [a.ms] : []));

      expect(pauses.length).toBeGreaterThan(0);
      for (const ms of pauses) {
        expect(ms).toBeGreaterThanOrEqual(9000);
        expect(ms).toBeLessThan(9001);
        expect(sleep).toHaveBeenCalledWith(ms);
      }
    });

    test('never moves the pointer when mouse movement is disabled', async () => {
      const page = new FakePage(listingDocument([]));
      const actions = await new InteractionSimulator(page, { mouseEnabled: false }, new SeededRandom(5), noSleep()).browse(30);

      expect(actions.some((a) => a.type === 'mouse')).toBe(false);
      expect(page.moves).toEqual([]);
    });
  });

  describe('scrollToBottom', () => {
    test('stops once the content height stops growing', async () => {
      const page = new FakePage(listingDocument([]), { heights: [1000, 2000, 3000, 3000] });
      const sleep = noSleep();
      const simulator = new InteractionSimulator(page, {}, new SeededRandom(8), sleep);

      const rounds = await simulator.scrollToBottom();

      expect(rounds).toBe(3);
      expect(page.scrolls).toHaveLength(3);
      for (const step of page.scrolls) {
        expect(step).toBeGreaterThanOrEqual(300);
        expect(step).toBeLessThanOrEqual(800);
      }
      expect(sleep).toHaveBeenCalledTimes(3);
    });

    test('uses the given increment and pause ranges', async () => {
      const page = new FakePage(listingDocument([]), { heights: [1000, 1000] });
      const sleep = noSleep();

      await new InteractionSimulator(page, {}, new SeededRandom(8), sleep).scrollToBottom([50, 50], [10, 10]);

      expect(page.scrolls).toEqual([50]);
      expect(sleep).toHaveBeenCalledWith(10);
    });

    test('caps the rounds on pages that never stop growing', async () => {
      const page = new GrowingPage(listingDocument([]));
      const simulator = new InteractionSimulator(page, { maxScrollRounds: 5 }, new SeededRandom(8), noSleep());

      const rounds = await simulator.scrollToBottom();

      expect(rounds).toBe(5);
      expect(page.scrolls).toHaveLength(5);
    });
  });

  test('randomDelay sleeps within the action delay window', async () => {
    const sleep = noSleep();
    const simulator = new InteractionSimulator(new FakePage(listingDocument([])), {}, new SeededRandom(2), sleep);

    const ms = await simulator.randomDelay();

    expect(ms).toBeGreaterThanOrEqual(DEFAULT_BEHAVIOR_CONFIG.actionDelayMs[0]);
    expect(ms).toBeLessThan(DEFAULT_BEHAVIOR_CONFIG.actionDelayMs[1]);
    expect(sleep).toHaveBeenCalledWith(ms);
  });

  test('randomMouseMovement stays inside a small viewport', async () => {
    const page = new FakePage(listingDocument([]), { viewport: { width: 150, height: 120 } });
    const simulator = new InteractionSimulator(page, {}, new SeededRandom(4), noSleep());

    for (let i = 0; i < 20; i++) {
      const { x, y } = await simulator.randomMouseMovement();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThanOrEqual(149);
      expect(y).toBeGreaterThanOrEqual(0);
      expect(y).toBeLessThanOrEqual(119);
    }
  });

  test('simulateReading idles for at least the requested duration', async () => {
    const page = new FakePage(listingDocument([]));
    const readingPauses: number[] = [];
    const sleep = vi.fn(async (ms: number) => {
      if (ms >= 500) readingPauses.push(ms);
    });
    const simulator = new InteractionSimulator(page, { mouseSettleMs: [100, 300] }, new SeededRandom(6), sleep);

    await simulator.simulateReading(3000);

    const total = readingPauses.reduce((sum, ms) => sum + ms, 0);
    expect(total).toBeGreaterThanOrEqual(3000);
    expect(page.moves.length).toBe(readingPauses.length);
  });
});
