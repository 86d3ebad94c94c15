import { RandomSource } from '../src/models/types';

/**
 * RandomSource that replays a fixed list of draws. Throws when a draw is
 * out of range or the script runs out, so a test fails loudly if the
 * generator asks for more (or different) randomness than expected.
 */
export class ScriptedRandom implements RandomSource {
  private draws: number[];

  constructor(draws: number[]) {
    this.draws = [...draws];
  }

  nextInt(min: number, max: number): number {
    const value = this.draws.shift();
    if (value === undefined) {
      throw new Error(`Script exhausted (asked for [${min}, ${max}))`);
    }
    if (value < min || value >= max) {
      throw new Error(`Scripted draw ${value} outside [${min}, ${max})`);
    }
    return value;
  }

  get remaining(): number {
    return this.draws.length;
  }
}
