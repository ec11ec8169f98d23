// ============================================================================
// RANDOM SOURCE
// ============================================================================
// Injectable randomness so interaction sequences can be replayed from a seed

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export type Range = readonly [min: number, max: number];

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Mulberry32 generator. Same seed, same sequence.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export function uniform(random: RandomSource, [min, max]: Range): number {
  return min + random.next() * (max - min);
}

/** Integer in [min, max], both inclusive */
export function randomInt(random: RandomSource, [min, max]: Range): number {
  const lo = Math.ceil(Math.min(min, max));
  const hi = Math.floor(Math.max(min, max));
  return lo + Math.floor(random.next() * (hi - lo + 1));
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index];
}
