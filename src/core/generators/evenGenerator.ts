import {
  AuctionSettings,
  BidGenerator,
  BidGeneratorType,
  GenerationResult,
  RandomSource,
} from '../../models/types';

/**
 * Even Bid Generator
 *
 * Builds n consecutive values starting at the lowest start point whose sum
 * reaches max_total, then walks the list decrementing one value at a time
 * until the sum fits. Only the faction → value mapping is random; the
 * multiset of values is fixed by the settings.
 *
 * Example (7 factions, min 0, max_total 100):
 *   start 12 → [12..18], sum 105 → five decrements → [11,12,13,14,15,17,18]
 *
 * Edge cases:
 * - The decrement index wraps around the list
 * - Values never drop below min_individual_bid; if every value sits at the
 *   minimum and the sum still exceeds max_total, the loop stops there and
 *   validation reports the overshoot
 * - When the minimum is forced as the start point, wrapping can give two
 *   factions the same value. Validation reports it when identical bids are
 *   prohibited.
 * - Values are not capped at max_individual_bid
 */
export class EvenGenerator implements BidGenerator {
  readonly type: BidGeneratorType = 'even';

  generate(settings: Readonly<AuctionSettings>, rng: RandomSource): GenerationResult {
    const values = evenValues(settings);
    const pending = [...settings.faction_names];
    const bids = new Map<string, number>();

    for (const value of values) {
      const [faction] = pending.splice(rng.nextInt(0, pending.length), 1);
      bids.set(faction, value);
    }

    return { bids, unassigned: [] };
  }
}

/**
 * The ascending values the even generator hands out, before they are
 * shuffled onto factions.
 */
export function evenValues(settings: Readonly<AuctionSettings>): number[] {
  const n = settings.faction_names.length;
  const min = settings.min_individual_bid;
  const triangle = (n * (n - 1)) / 2;

  // Smallest start ≥ min with start·n + n(n−1)/2 ≥ max_total
  const start = Math.max(min, Math.ceil((settings.max_total - triangle) / n));

  const values = Array.from({ length: n }, (_, i) => start + i);
  let sum = values.reduce((s, v) => s + v, 0);

  let i = 0;
  let idle = 0;
  while (sum > settings.max_total && idle < n) {
    if (values[i] > min) {
      values[i]--;
      sum--;
      idle = 0;
    } else {
      idle++;
    }
    i = (i + 1) % n;
  }

  return values;
}
