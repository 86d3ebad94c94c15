import * as fs from 'fs';
import { createDefaultAuctionSettings } from './core/configs';
import { Configuration } from './core/configuration';
import { isGeneratorType, listGenerators } from './core/generatorFactory';
import { parseAuctionSettings } from './core/settingsSchema';
import { GeneratorHarness, printHarnessReport } from './simulation/harness';
import { SeededRandom } from './utils/random';
import { AuctionSettings } from './models/types';

// ─── Parse CLI args ─────────────────────────────────────────────────────────────

const args = process.argv.slice(2);
const flag = (name: string): string | undefined =>
  args.find((a) => a.startsWith(`--${name}=`))?.split('=')[1];

const strategy = flag('strategy') ?? 'random';
const numRuns = parseInt(flag('runs') ?? '1', 10);
const seed = parseInt(flag('seed') ?? String(Date.now()), 10);
const points = flag('points');
const configPath = flag('config');

if (!isGeneratorType(strategy)) {
  console.error(`Unknown strategy "${strategy}". Choose one of: ${listGenerators().join(', ')}`);
  process.exit(1);
}

// ─── Settings ───────────────────────────────────────────────────────────────────

function loadSettings(path: string | undefined): AuctionSettings {
  if (!path) return createDefaultAuctionSettings();

  const parsed = parseAuctionSettings(JSON.parse(fs.readFileSync(path, 'utf8')));
  if (!parsed.success) {
    console.error(`Invalid settings in ${path}:`);
    parsed.issues.forEach((issue) => console.error(`  - ${issue}`));
    process.exit(1);
  }
  return parsed.settings;
}

let config = new Configuration(loadSettings(configPath));
if (points !== undefined) {
  // Preview with a different budget, leaving the loaded rules untouched
  config = config.duplicate({ max_total: parseInt(points, 10) });
}

const feasibility = config.checkFeasibility();
if (!feasibility.feasible) {
  console.log(`\nWarning: no legal bid set exists for these rules.`);
  feasibility.reasons.forEach((reason) => console.log(`  - ${reason}`));
}

// ─── Single bid set ─────────────────────────────────────────────────────────────

if (numRuns <= 1) {
  const bidSet = config.newBidSet();
  const outcome = bidSet.generate(strategy, new SeededRandom(seed));
  const valid = bidSet.validate();

  console.log(`\nPower auction bids (${strategy}, seed ${seed})`);
  for (const [faction, bid] of Object.entries(bidSet.toRecord())) {
    console.log(`  ${faction.padEnd(22)} ${String(bid ?? '-').padStart(5)}`);
  }
  console.log(`  ${'Total'.padEnd(22)} ${String(bidSet.total).padStart(5)} / ${config.max_total}`);

  if (!outcome.complete) {
    console.log(`  Unassigned: ${outcome.unassigned.join(', ')}`);
  }
  console.log(valid ? '  Valid.' : '  Invalid:');
  bidSet.messages.forEach((message) => console.log(`    - ${message}`));

  if (args.includes('--json')) {
    console.log(JSON.stringify({ seed, strategy, bids: bidSet.toRecord(), messages: bidSet.messages }, null, 2));
  }
  process.exit(valid ? 0 : 2);
}

// ─── Harness ────────────────────────────────────────────────────────────────────

console.log(`\nBid generator harness`);
console.log(`  Runs: ${numRuns}  Seed: ${seed}  Strategy: ${strategy}`);

const startTime = Date.now();

const harness = new GeneratorHarness({
  num_runs: numRuns,
  settings: config.toSettings(),
  generator: strategy,
  master_seed: seed,
});

const result = harness.run((run, total) => {
  if (run % 100 === 0 || run === total) {
    process.stdout.write(`\r  Progress: ${run}/${total}`);
  }
});

const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
console.log(`\r  Completed ${numRuns} runs in ${elapsed}s`);

console.log(printHarnessReport(result));

if (args.includes('--json')) {
  const jsonOut = {
    config: { num_runs: result.num_runs, master_seed: seed, strategy },
    valid_runs: result.valid_runs,
    incomplete_runs: result.incomplete_runs,
    message_counts: Object.fromEntries(result.message_counts),
    faction_means: Object.fromEntries(result.faction_means),
    total_stats: result.total_stats,
    runs: result.run_results,
  };
  const filename = `bid_results_${seed}.json`;
  fs.writeFileSync(filename, JSON.stringify(jsonOut, null, 2));
  console.log(`  Results saved to ${filename}`);
}
