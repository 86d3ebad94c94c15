import Decimal from 'decimal.js';

// Configure Decimal for report statistics
Decimal.set({ precision: 28, rounding: Decimal.ROUND_HALF_EVEN });

// ─── Auction Settings ───────────────────────────────────────────────────────────

/**
 * The rules of one power auction round, as supplied by the hosting
 * tournament application.
 */
export interface AuctionSettings {
  /** Factions players bid for, in display order. */
  faction_names: string[];

  /** Number of boards being seeded this round. */
  board_count: number;

  /** Lowest bid allowed on a single faction. */
  min_individual_bid: number;

  /** Highest bid allowed on a single faction. */
  max_individual_bid: number;

  /** Point budget a player may spread across all factions. */
  max_total: number;

  /** When true, no two factions may receive the same bid. */
  identical_bids_prohibited: boolean;

  /** When true, the bids must add up to exactly max_total. */
  must_use_all_points: boolean;
}

// ─── Seeds ──────────────────────────────────────────────────────────────────────

/** A (board, faction) pair and its linear seed ordinal. */
export interface SeedPosition {
  seed: number;
  /** 1-based board number. */
  board: number;
  faction: string;
}

/**
 * Result of settling one player's bids. Produced by the external settlement
 * process; carried here so hosts can type it.
 */
export interface PlayerAssignment {
  player_id: string;
  seed: number;
  board: number;
  faction: string;
  bids: Record<string, number>;
}

// ─── Bids ───────────────────────────────────────────────────────────────────────

export type ParsedBid =
  | { ok: true; value: number }
  | { ok: false; raw: string };

/** Raw input for a single faction: a form field's text or a number. */
export type BidInput = string | number;

export interface FeasibilityReport {
  feasible: boolean;
  /** Why no legal bid set exists. Empty when feasible. */
  reasons: string[];
}

// ─── Randomness ─────────────────────────────────────────────────────────────────

/**
 * Source of uniform integers. Generators take one of these so runs can be
 * replayed under a fixed seed.
 */
export interface RandomSource {
  /** Returns an integer in [min, max). */
  nextInt(min: number, max: number): number;
}

// ─── Generator Strategy Interface ───────────────────────────────────────────────

export type BidGeneratorType =
  | 'random'   // Constrained-random pick from the option pool
  | 'even'     // Consecutive values, decremented down to the budget
  ;

export interface GenerationResult {
  /** Faction → generated bid. Factions left unassigned are absent. */
  bids: Map<string, number>;

  /** Factions the generator could not give a bid to. */
  unassigned: string[];
}

/**
 * All bid generators implement this interface. BidSet clears itself, calls
 * `generate()`, and copies the returned bids in.
 *
 * To add a new generator:
 * 1. Add it to BidGeneratorType
 * 2. Implement the BidGenerator interface
 * 3. Register it in the generator factory
 */
export interface BidGenerator {
  readonly type: BidGeneratorType;

  generate(settings: Readonly<AuctionSettings>, rng: RandomSource): GenerationResult;
}

/** What BidSet reports back after running a generator. */
export interface GenerationOutcome {
  generator: BidGeneratorType;

  /** True when every faction received a generated bid. */
  complete: boolean;

  /** Factions left at 0 because the option pool ran dry. */
  unassigned: string[];
}
