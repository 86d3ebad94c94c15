import {
  AuctionSettings,
  BidGenerator,
  BidGeneratorType,
  GenerationResult,
  RandomSource,
} from '../../models/types';

/**
 * Constrained-Random Bid Generator
 *
 * Factions are visited in random order. Each one draws a bid from an option
 * pool that starts as every integer in [min, max] and is trimmed after each
 * draw so the factions still waiting can always be covered by the cheapest
 * options left:
 *
 *   pool ← { v ∈ pool : v ≤ max_total − total − minrest }
 *
 * where `minrest` is what the factions after the next one must spend at
 * least. The last faction takes the largest option left instead of a random
 * one, so little of the budget goes unused.
 *
 * Properties:
 * - Every bid lies within [min, max]
 * - total ≤ max_total
 * - No repeated values when identical bids are prohibited
 * - must_use_all_points is NOT guaranteed; callers still validate
 *
 * Edge cases:
 * - Infeasible settings (e.g. min × n > max_total): the pool runs dry and
 *   the remaining factions are returned as unassigned
 */
export class RandomGenerator implements BidGenerator {
  readonly type: BidGeneratorType = 'random';

  generate(settings: Readonly<AuctionSettings>, rng: RandomSource): GenerationResult {
    const unique = settings.identical_bids_prohibited;
    const bids = new Map<string, number>();
    const pending = [...settings.faction_names];

    let options: number[] = [];
    for (let v = settings.min_individual_bid; v <= settings.max_individual_bid; v++) {
      options.push(v);
    }
    // The first draw is trimmed like every later one
    options = trimToBudget(options, settings.max_total, pending.length, unique);

    let total = 0;

    while (pending.length > 0 && options.length > 0) {
      const [faction] = pending.splice(rng.nextInt(0, pending.length), 1);

      const bid =
        pending.length === 0
          ? options[options.length - 1]
          : options[rng.nextInt(0, options.length)];

      bids.set(faction, bid);
      total += bid;

      if (unique) {
        options = options.filter((v) => v !== bid);
      }
      options = trimToBudget(options, settings.max_total - total, pending.length, unique);
    }

    return {
      bids,
      unassigned: settings.faction_names.filter((f) => !bids.has(f)),
    };
  }
}

/**
 * Drop options that would leave too little budget for the factions after
 * the next draw.
 *
 * @param options - Ascending option pool
 * @param remaining - Budget not yet spent
 * @param pendingCount - Factions still waiting for a bid, including the next one
 * @param unique - Whether each option may be used only once
 */
export function trimToBudget(
  options: number[],
  remaining: number,
  pendingCount: number,
  unique: boolean,
): number[] {
  if (options.length === 0) return options;

  const after = Math.max(0, pendingCount - 1);
  // Without the uniqueness rule every later faction can reuse the cheapest option
  const minrest = unique
    ? options.slice(0, after).reduce((sum, v) => sum + v, 0)
    : options[0] * after;

  const ceiling = remaining - minrest;
  return options.filter((v) => v <= ceiling);
}
