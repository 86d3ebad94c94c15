import {
  BidGeneratorType,
  BidInput,
  GenerationOutcome,
  ParsedBid,
  RandomSource,
} from '../models/types';
import type { Configuration } from './configuration';
import { parseBid } from './bidParser';
import { validateBids } from './validation/validator';
import { getGenerator } from './generatorFactory';
import { mathRandom } from '../utils/random';

/**
 * One player's bids for one round.
 *
 * Always holds an entry for every faction of its configuration. Entries are
 * either a parsed integer or the raw text that failed to parse; the latter
 * is reported by `validate()` rather than rejected on input.
 */
export class BidSet {
  readonly config: Configuration;
  private bids = new Map<string, ParsedBid>();
  private lastMessages: string[] = [];

  constructor(config: Configuration) {
    this.config = config;
    this.clear();
  }

  // ── State ───────────────────────────────────────────────────────────────

  /** Reset every faction's bid to 0. */
  clear(): void {
    for (const faction of this.config.faction_names) {
      this.bids.set(faction, { ok: true, value: 0 });
    }
  }

  /** Sum of every bid that parsed. */
  get total(): number {
    let total = 0;
    for (const bid of this.bids.values()) {
      if (bid.ok) total += bid.value;
    }
    return total;
  }

  setBid(faction: string, input: BidInput): ParsedBid {
    this.requireFaction(faction);
    const parsed = parseBid(input);
    this.bids.set(faction, parsed);
    return parsed;
  }

  getBid(faction: string): ParsedBid {
    this.requireFaction(faction);
    const bid = this.bids.get(faction);
    return bid ?? { ok: true, value: 0 };
  }

  /** Faction → bid, null where the input did not parse. */
  toRecord(): Record<string, number | null> {
    const record: Record<string, number | null> = {};
    for (const faction of this.config.faction_names) {
      const bid = this.getBid(faction);
      record[faction] = bid.ok ? bid.value : null;
    }
    return record;
  }

  // ── Validation ──────────────────────────────────────────────────────────

  /**
   * Re-check the bids and cache the violation messages.
   * Returns true when there are none.
   */
  validate(): boolean {
    this.lastMessages = validateBids(this.config, this.bids);
    return this.lastMessages.length === 0;
  }

  /** Messages from the most recent `validate()` call. */
  get messages(): string[] {
    return [...this.lastMessages];
  }

  // ── Generation ──────────────────────────────────────────────────────────

  makeRandom(rng: RandomSource = mathRandom): GenerationOutcome {
    return this.generate('random', rng);
  }

  makeEven(rng: RandomSource = mathRandom): GenerationOutcome {
    return this.generate('even', rng);
  }

  /**
   * Replace the bids with ones produced by a generator. Factions the
   * generator could not serve stay at 0 and are listed in the outcome.
   */
  generate(type: BidGeneratorType, rng: RandomSource = mathRandom): GenerationOutcome {
    this.clear();
    const result = getGenerator(type).generate(this.config, rng);

    for (const [faction, value] of result.bids) {
      this.bids.set(faction, { ok: true, value });
    }

    return {
      generator: type,
      complete: result.unassigned.length === 0,
      unassigned: result.unassigned,
    };
  }

  private requireFaction(faction: string): void {
    if (!this.bids.has(faction)) {
      throw new Error(`Unknown faction: ${faction}`);
    }
  }
}
