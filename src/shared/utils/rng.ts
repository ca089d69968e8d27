/**
 * Deterministic pseudo-random number generation for reproducible games.
 *
 * Agents, the arena and tests take a `LocalAIRng` (a `() => number` in
 * [0, 1)) so any source can be plugged in; `SeededRNG` is the standard one.
 */

export type LocalAIRng = () => number;

/**
 * mulberry32 PRNG. The same seed always yields the same sequence on every
 * platform.
 */
export class SeededRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Next float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }

  /** Bound `next` for APIs that take a plain LocalAIRng. */
  asFunction(): LocalAIRng {
    return () => this.next();
  }
}

/**
 * Seed for a fresh game when none was configured.
 */
export function generateGameSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}

/**
 * Uniformly picks one element. Returns undefined for an empty list.
 */
export function pickRandom<T>(items: ReadonlyArray<T>, rng: LocalAIRng): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  const index = Math.min(items.length - 1, Math.floor(rng() * items.length));
  return items[index];
}
