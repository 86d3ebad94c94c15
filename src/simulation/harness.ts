import Decimal from 'decimal.js';
import { AuctionSettings, BidGeneratorType } from '../models/types';
import { Configuration } from '../core/configuration';
import { SeededRandom } from '../utils/random';

// ─── Harness Configuration ──────────────────────────────────────────────────────

export interface HarnessConfig {
  /** Number of bid sets to generate. */
  num_runs: number;

  /** Auction rules every run is generated under. */
  settings: AuctionSettings;

  /** Which generator to exercise. */
  generator: BidGeneratorType;

  /** Master seed; each run gets its own seed drawn from it. */
  master_seed: number;
}

// ─── Harness Results ────────────────────────────────────────────────────────────

export interface HarnessResult {
  config: HarnessConfig;
  num_runs: number;

  /** Runs whose bid set passed validation. */
  valid_runs: number;

  /** Runs where the generator left factions unassigned. */
  incomplete_runs: number;

  /** Runs where two factions ended up with the same bid. */
  repeated_value_runs: number;

  /** Validation message → number of runs that produced it. */
  message_counts: Map<string, number>;

  total_stats: TotalStats;

  /** Faction → mean bid across all runs. */
  faction_means: Map<string, number>;

  run_results: RunSummary[];
}

export interface TotalStats {
  min_total: number;
  max_total: number;
  mean_total: number;
}

export interface RunSummary {
  run_index: number;
  seed: number;
  bids: Record<string, number | null>;
  total: number;
  valid: boolean;
  messages: string[];
}

// ─── Harness ────────────────────────────────────────────────────────────────────

/**
 * Runs one generator many times and aggregates how its bid sets fare
 * against validation. Every run is reproducible from its recorded seed.
 */
export class GeneratorHarness {
  private config: HarnessConfig;
  private auction: Configuration;
  private masterRng: SeededRandom;

  constructor(config: HarnessConfig) {
    if (!Number.isInteger(config.num_runs) || config.num_runs < 1) {
      throw new Error(`num_runs must be a positive integer, got ${config.num_runs}`);
    }
    this.config = config;
    this.auction = new Configuration(config.settings);
    this.masterRng = new SeededRandom(config.master_seed);
  }

  run(progressCallback?: (run: number, total: number) => void): HarnessResult {
    const factions = this.auction.faction_names;
    const messageCounts = new Map<string, number>();
    const factionSums = new Map<string, Decimal>(factions.map((f) => [f, new Decimal(0)]));
    const runResults: RunSummary[] = [];

    let validRuns = 0;
    let incompleteRuns = 0;
    let repeatedValueRuns = 0;
    let totalSum = new Decimal(0);
    let minTotal = Number.POSITIVE_INFINITY;
    let maxTotal = Number.NEGATIVE_INFINITY;

    for (let run = 0; run < this.config.num_runs; run++) {
      if (progressCallback) progressCallback(run + 1, this.config.num_runs);

      const seed = this.masterRng.nextSeed();
      const bidSet = this.auction.newBidSet();
      const outcome = bidSet.generate(this.config.generator, new SeededRandom(seed));
      const valid = bidSet.validate();
      const messages = bidSet.messages;
      const bids = bidSet.toRecord();
      const total = bidSet.total;

      if (valid) validRuns++;
      if (!outcome.complete) incompleteRuns++;

      const values = factions.map((f) => bids[f]);
      if (new Set(values).size < values.length) repeatedValueRuns++;

      for (const message of messages) {
        messageCounts.set(message, (messageCounts.get(message) ?? 0) + 1);
      }
      for (const faction of factions) {
        const sum = factionSums.get(faction) ?? new Decimal(0);
        factionSums.set(faction, sum.plus(bids[faction] ?? 0));
      }

      totalSum = totalSum.plus(total);
      minTotal = Math.min(minTotal, total);
      maxTotal = Math.max(maxTotal, total);

      runResults.push({ run_index: run, seed, bids, total, valid, messages });
    }

    const runs = new Decimal(this.config.num_runs);
    const factionMeans = new Map<string, number>();
    for (const [faction, sum] of factionSums) {
      factionMeans.set(faction, sum.div(runs).toDecimalPlaces(4).toNumber());
    }

    return {
      config: this.config,
      num_runs: this.config.num_runs,
      valid_runs: validRuns,
      incomplete_runs: incompleteRuns,
      repeated_value_runs: repeatedValueRuns,
      message_counts: messageCounts,
      total_stats: {
        min_total: minTotal,
        max_total: maxTotal,
        mean_total: totalSum.div(runs).toDecimalPlaces(4).toNumber(),
      },
      faction_means: factionMeans,
      run_results: runResults,
    };
  }
}

// ─── Pretty Print ───────────────────────────────────────────────────────────────

export function printHarnessReport(result: HarnessResult): string {
  const lines: string[] = [];
  const hr = '═'.repeat(72);
  const settings = result.config.settings;

  lines.push('');
  lines.push(hr);
  lines.push(`  GENERATOR REPORT — ${result.config.generator}, ${result.num_runs} runs`);
  lines.push(hr);
  lines.push('');

  lines.push('  RULES');
  lines.push('  ' + '─'.repeat(60));
  lines.push(`  Bids ${settings.min_individual_bid}..${settings.max_individual_bid}, total ≤ ${settings.max_total}`);
  lines.push(`  Identical bids prohibited: ${settings.identical_bids_prohibited ? 'yes' : 'no'}`);
  lines.push(`  Must use all points:       ${settings.must_use_all_points ? 'yes' : 'no'}`);
  lines.push('');

  lines.push('  OUTCOMES');
  lines.push('  ' + '─'.repeat(60));
  const pct = (count: number) => ((count / result.num_runs) * 100).toFixed(1).padStart(5);
  lines.push(`  Valid:          ${String(result.valid_runs).padStart(6)}  (${pct(result.valid_runs)}%)`);
  lines.push(`  Incomplete:     ${String(result.incomplete_runs).padStart(6)}  (${pct(result.incomplete_runs)}%)`);
  lines.push(`  Repeated value: ${String(result.repeated_value_runs).padStart(6)}  (${pct(result.repeated_value_runs)}%)`);
  const ts = result.total_stats;
  lines.push(`  Total  min: ${ts.min_total}  max: ${ts.max_total}  mean: ${ts.mean_total.toFixed(2)}`);
  lines.push('');

  lines.push('  MEAN BID PER FACTION');
  lines.push('  ' + '─'.repeat(60));
  const scale = Math.max(1, settings.max_individual_bid);
  for (const [faction, mean] of result.faction_means) {
    const bar = '█'.repeat(Math.max(0, Math.round((mean / scale) * 40)));
    lines.push(`  ${faction.padEnd(22)} ${mean.toFixed(2).padStart(7)}  ${bar}`);
  }
  lines.push('');

  if (result.message_counts.size > 0) {
    lines.push('  VIOLATIONS');
    lines.push('  ' + '─'.repeat(60));
    const sorted = [...result.message_counts.entries()].sort((a, b) => b[1] - a[1]);
    for (const [message, count] of sorted) {
      lines.push(`  ${String(count).padStart(6)}× ${message}`);
    }
    lines.push('');
  }

  lines.push(hr);

  return lines.join('\n');
}
