/**
 * Seeded random source shared by map generation and spawning.
 * Linear congruential generator: same seed, same sequence.
 */

export class SeededRandom {
  private state: number;

  constructor(readonly seed: number) {
    this.state = seed >>> 0;
  }

  /** Advance the state and return a value in [0, 1). */
  next(): number {
    this.state = (Math.imul(this.state, 1664525) + 1013904223) >>> 0;
    return this.state / 0x100000000;
  }

  /** Return an integer in [min, max] (inclusive). */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Pick a random element from a non-empty list. */
  pick<T>(list: readonly [T, ...T[]]): T {
    return list[this.nextInt(0, list.length - 1)] ?? list[0];
  }
}

/**
 * Fresh seed for sessions started without one
 */
export function randomSeed(): number {
  return Math.floor(Math.random() * 0x100000000);
}
