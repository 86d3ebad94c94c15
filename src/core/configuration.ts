import {
  AuctionSettings,
  FeasibilityReport,
  SeedPosition,
} from '../models/types';
import { BidSet } from './bidSet';

/**
 * The rules of one auction round. Built once per round from tournament
 * settings and treated as immutable: variants are made with `duplicate()`.
 *
 * The constructor rejects settings that are structurally broken. Settings
 * that are merely unsatisfiable (say, min × n > max_total) are accepted;
 * `checkFeasibility()` reports them and generation still completes.
 */
export class Configuration implements AuctionSettings {
  readonly faction_names: string[];
  readonly board_count: number;
  readonly min_individual_bid: number;
  readonly max_individual_bid: number;
  readonly max_total: number;
  readonly identical_bids_prohibited: boolean;
  readonly must_use_all_points: boolean;

  constructor(settings: AuctionSettings) {
    const names = settings.faction_names;
    if (names.length < 2) {
      throw new Error(`At least 2 factions are required, got ${names.length}`);
    }
    const seen = new Set<string>();
    for (const name of names) {
      if (name.trim() === '') {
        throw new Error('Faction names must not be empty');
      }
      if (seen.has(name)) {
        throw new Error(`Duplicate faction name: ${name}`);
      }
      seen.add(name);
    }

    const integers: [string, number][] = [
      ['board_count', settings.board_count],
      ['min_individual_bid', settings.min_individual_bid],
      ['max_individual_bid', settings.max_individual_bid],
      ['max_total', settings.max_total],
    ];
    for (const [field, value] of integers) {
      if (!Number.isSafeInteger(value)) {
        throw new Error(`${field} must be an integer, got ${value}`);
      }
    }
    if (settings.board_count < 1) {
      throw new Error(`board_count must be at least 1, got ${settings.board_count}`);
    }
    if (settings.min_individual_bid > settings.max_individual_bid) {
      throw new Error(
        `min_individual_bid (${settings.min_individual_bid}) exceeds max_individual_bid (${settings.max_individual_bid})`,
      );
    }

    this.faction_names = [...names];
    this.board_count = settings.board_count;
    this.min_individual_bid = settings.min_individual_bid;
    this.max_individual_bid = settings.max_individual_bid;
    this.max_total = settings.max_total;
    this.identical_bids_prohibited = settings.identical_bids_prohibited;
    this.must_use_all_points = settings.must_use_all_points;
  }

  /**
   * Independent copy, optionally with some settings replaced. Used for
   * previews such as "random bids with 80 points".
   */
  duplicate(overrides?: Partial<AuctionSettings>): Configuration {
    return new Configuration({ ...this.toSettings(), ...overrides });
  }

  /** Fresh bid set for this configuration, every bid 0. */
  newBidSet(): BidSet {
    return new BidSet(this);
  }

  allBoardNumbers(): number[] {
    return Array.from({ length: this.board_count }, (_, i) => i + 1);
  }

  /**
   * Every (board, faction) pair with its seed, boards-major:
   * board b (1-based), faction index p → seed (b − 1)·n + p + 1.
   */
  allSeeds(): SeedPosition[] {
    const seeds: SeedPosition[] = [];
    for (const board of this.allBoardNumbers()) {
      this.faction_names.forEach((faction, p) => {
        seeds.push({ seed: this.seedFor(board, p), board, faction });
      });
    }
    return seeds;
  }

  /** Inverse of the seed ordering. Undefined outside 1..board_count·n. */
  positionForSeed(seed: number): SeedPosition | undefined {
    const n = this.faction_names.length;
    if (!Number.isInteger(seed) || seed < 1 || seed > this.board_count * n) {
      return undefined;
    }
    const index = seed - 1;
    return {
      seed,
      board: Math.floor(index / n) + 1,
      faction: this.faction_names[index % n],
    };
  }

  /**
   * Whether any bid set can satisfy these rules at all.
   */
  checkFeasibility(): FeasibilityReport {
    const n = this.faction_names.length;
    const min = this.min_individual_bid;
    const max = this.max_individual_bid;
    const triangle = (n * (n - 1)) / 2;
    const reasons: string[] = [];

    if (this.identical_bids_prohibited && max - min + 1 < n) {
      reasons.push(
        `Only ${max - min + 1} distinct bids fit between ${min} and ${max}, but there are ${n} factions.`,
      );
    }

    const lowest = this.identical_bids_prohibited ? n * min + triangle : n * min;
    if (lowest > this.max_total) {
      reasons.push(`The smallest possible total (${lowest}) is above the maximum (${this.max_total}).`);
    }

    if (this.must_use_all_points) {
      const highest = this.identical_bids_prohibited ? n * max - triangle : n * max;
      if (highest < this.max_total) {
        reasons.push(`The largest possible total (${highest}) is below ${this.max_total}.`);
      }
    }

    return { feasible: reasons.length === 0, reasons };
  }

  toSettings(): AuctionSettings {
    return {
      faction_names: [...this.faction_names],
      board_count: this.board_count,
      min_individual_bid: this.min_individual_bid,
      max_individual_bid: this.max_individual_bid,
      max_total: this.max_total,
      identical_bids_prohibited: this.identical_bids_prohibited,
      must_use_all_points: this.must_use_all_points,
    };
  }

  private seedFor(board: number, factionIndex: number): number {
    return (board - 1) * this.faction_names.length + factionIndex + 1;
  }
}
