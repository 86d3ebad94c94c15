import { RandomSource } from '../models/types';

/**
 * Seeded PRNG (xoshiro128**).
 * The same seed always replays the same bid sets, which is what the tests
 * and the harness rely on.
 */
export class SeededRandom implements RandomSource {
  private s: Uint32Array;

  constructor(seed: number) {
    // Splitmix32 to initialize state from a single seed
    this.s = new Uint32Array(4);
    for (let i = 0; i < 4; i++) {
      seed += 0x9e3779b9;
      let t = seed;
      t = Math.imul(t ^ (t >>> 16), 0x85ebca6b);
      t = Math.imul(t ^ (t >>> 13), 0xc2b2ae35);
      this.s[i] = (t ^ (t >>> 16)) >>> 0;
    }
  }

  /** Returns a float in [0, 1). */
  next(): number {
    const s = this.s;
    const result = Math.imul(s[1] * 5, 7);
    const t = s[1] << 9;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];
    s[2] ^= t;
    s[3] = (s[3] << 11) | (s[3] >>> 21);

    return ((result << 7) | (result >>> 25)) / 4294967296 + 0.5;
  }

  /** Returns an integer in [min, max). */
  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min));
  }

  /** Returns a non-negative 32-bit seed for a child generator. */
  nextSeed(): number {
    return this.nextInt(0, 0x7fffffff);
  }
}

/** Unseeded source backed by Math.random, for interactive use. */
export const mathRandom: RandomSource = {
  nextInt(min: number, max: number): number {
    return min + Math.floor(Math.random() * (max - min));
  },
};
