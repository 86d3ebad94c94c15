import { Configuration } from '../src/core/configuration';
import { createDefaultAuctionSettings, createTestAuctionSettings } from '../src/core/configs';
import { RandomGenerator, trimToBudget } from '../src/core/generators/randomGenerator';
import { SeededRandom } from '../src/utils/random';
import { ScriptedRandom } from './helpers';

describe('trimToBudget', () => {
  test('reserves the cheapest distinct options for later factions', () => {
    // 3 waiting → the two after the next need at least 0 + 1
    expect(trimToBudget([0, 1, 2, 3, 4, 5], 5, 3, true)).toEqual([0, 1, 2, 3, 4]);
  });

  test('reuses the cheapest option when repeats are allowed', () => {
    // 3 waiting → the two after the next need at least 2 × 1
    expect(trimToBudget([1, 2, 3, 4, 5], 5, 3, false)).toEqual([1, 2, 3]);
  });

  test('the last faction only needs to fit the remaining budget', () => {
    expect(trimToBudget([0, 1, 2, 3], 2, 1, true)).toEqual([0, 1, 2]);
  });

  test('can empty the pool', () => {
    expect(trimToBudget([6, 7, 8], 15, 3, false)).toEqual([]);
    expect(trimToBudget([], 15, 3, false)).toEqual([]);
  });
});

describe('RandomGenerator', () => {
  const generator = new RandomGenerator();

  test('type is random', () => {
    expect(generator.type).toBe('random');
  });

  test('follows the scripted draws, last faction takes the largest option', () => {
    const settings = createTestAuctionSettings();
    // Green draws option 10, Red option 3, Blue is last and takes the largest left
    const rng = new ScriptedRandom([1, 10, 0, 3, 0]);

    const result = generator.generate(settings, rng);

    expect(Object.fromEntries(result.bids)).toEqual({ Green: 10, Red: 3, Blue: 2 });
    expect(result.unassigned).toEqual([]);
    expect(rng.remaining).toBe(0);
  });

  test('drops used values when identical bids are prohibited', () => {
    const settings = createTestAuctionSettings({ identical_bids_prohibited: true });
    const rng = new ScriptedRandom([0, 10, 1, 5, 0]);

    const result = generator.generate(settings, rng);

    expect(Object.fromEntries(result.bids)).toEqual({ Red: 10, Blue: 5, Green: 0 });
  });

  test('infeasible minimums leave every faction unassigned', () => {
    const config = new Configuration(createTestAuctionSettings({ min_individual_bid: 6 }));
    const bids = config.newBidSet();

    const outcome = bids.makeRandom(new ScriptedRandom([]));

    expect(outcome).toEqual({
      generator: 'random',
      complete: false,
      unassigned: ['Red', 'Green', 'Blue'],
    });
    expect(bids.validate()).toBe(false);
    expect(bids.messages).toEqual([
      'Red is below the minimum (6).',
      'Green is below the minimum (6).',
      'Blue is below the minimum (6).',
    ]);
  });

  test('running out of distinct values leaves the rest unassigned', () => {
    const config = new Configuration(
      createTestAuctionSettings({ max_individual_bid: 1, identical_bids_prohibited: true }),
    );
    const bids = config.newBidSet();

    const outcome = bids.makeRandom(new ScriptedRandom([0, 0, 0, 0]));

    expect(outcome.complete).toBe(false);
    expect(outcome.unassigned).toEqual(['Blue']);
    expect(bids.toRecord()).toEqual({ Red: 0, Green: 1, Blue: 0 });
    bids.validate();
    expect(bids.messages).toEqual(['Red and Blue have identical bids.']);
  });

  test('default auction: 1000 runs stay within the budget with distinct bids', () => {
    const config = new Configuration(createDefaultAuctionSettings());
    const bids = config.newBidSet();

    for (let seed = 0; seed < 1000; seed++) {
      const outcome = bids.makeRandom(new SeededRandom(seed));
      const values = Object.values(bids.toRecord());

      expect(outcome.complete).toBe(true);
      expect(bids.total).toBeLessThanOrEqual(100);
      expect(new Set(values).size).toBe(7);
      for (const v of values) {
        expect(v).not.toBeNull();
        expect(v ?? -1).toBeGreaterThanOrEqual(0);
        expect(v ?? 99).toBeLessThanOrEqual(33);
      }
      expect(bids.validate()).toBe(true);
    }
  });

  test('repeats allowed: 1000 runs stay within bounds and budget', () => {
    const config = new Configuration(createTestAuctionSettings());
    const bids = config.newBidSet();

    for (let seed = 0; seed < 1000; seed++) {
      bids.makeRandom(new SeededRandom(seed));
      expect(bids.total).toBeLessThanOrEqual(15);
      expect(bids.validate()).toBe(true);
    }
  });

  test('tight budget with distinct bids stays feasible', () => {
    // 0 + 1 + ... + 6 = 21: only one multiset fits
    const config = new Configuration(createDefaultAuctionSettings({ max_total: 21 }));
    const bids = config.newBidSet();

    for (let seed = 0; seed < 50; seed++) {
      bids.makeRandom(new SeededRandom(seed));
      const values = Object.values(bids.toRecord()).map((v) => v ?? -1);
      expect(values.sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6]);
    }
  });

  test('same seed replays the same bid set', () => {
    const config = new Configuration(createDefaultAuctionSettings());
    const a = config.newBidSet();
    const b = config.newBidSet();

    a.makeRandom(new SeededRandom(2024));
    b.makeRandom(new SeededRandom(2024));

    expect(a.toRecord()).toEqual(b.toRecord());
  });
});
