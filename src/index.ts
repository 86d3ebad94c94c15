// ─── Types ──────────────────────────────────────────────────────────────────────
export type {
  AuctionSettings,
  SeedPosition,
  PlayerAssignment,
  ParsedBid,
  BidInput,
  FeasibilityReport,
  RandomSource,
  BidGeneratorType,
  BidGenerator,
  GenerationResult,
  GenerationOutcome,
} from './models/types';

// ─── Core ───────────────────────────────────────────────────────────────────────
export { Configuration } from './core/configuration';
export { BidSet } from './core/bidSet';
export { parseBid } from './core/bidParser';
export { validateBids, formatFactionList } from './core/validation/validator';

// ─── Generators ─────────────────────────────────────────────────────────────────
export { RandomGenerator, trimToBudget } from './core/generators/randomGenerator';
export { EvenGenerator, evenValues } from './core/generators/evenGenerator';
export { getGenerator, isGeneratorType, listGenerators } from './core/generatorFactory';

// ─── Configs ────────────────────────────────────────────────────────────────────
export {
  GREAT_POWERS,
  createDefaultAuctionSettings,
  createTestAuctionSettings,
  createStrictAuctionSettings,
} from './core/configs';
export { auctionSettingsSchema, parseAuctionSettings } from './core/settingsSchema';
export type { SettingsParseResult } from './core/settingsSchema';

// ─── Simulation ─────────────────────────────────────────────────────────────────
export { GeneratorHarness, printHarnessReport } from './simulation/harness';
export type { HarnessConfig, HarnessResult, RunSummary, TotalStats } from './simulation/harness';

// ─── Utils ──────────────────────────────────────────────────────────────────────
export { SeededRandom, mathRandom } from './utils/random';
