import { AuctionSettings } from '../models/types';

/** The seven great powers of the classic board game. */
export const GREAT_POWERS: readonly string[] = [
  'Austria-Hungary',
  'England',
  'France',
  'Germany',
  'Italy',
  'Russia',
  'Turkey',
];

/**
 * Default power auction settings:
 *
 * 7 great powers, 3 boards
 * Bids between 0 and 33 per power, 100 points in total
 * No two powers may get the same bid; unused points are allowed.
 */
export function createDefaultAuctionSettings(
  overrides?: Partial<AuctionSettings>,
): AuctionSettings {
  return {
    faction_names: [...GREAT_POWERS],
    board_count: 3,
    min_individual_bid: 0,
    max_individual_bid: 33,
    max_total: 100,
    identical_bids_prohibited: true,
    must_use_all_points: false,
    ...overrides,
  };
}

/**
 * Small settings for tests: three factions, two boards, 15 points.
 */
export function createTestAuctionSettings(
  overrides?: Partial<AuctionSettings>,
): AuctionSettings {
  return {
    faction_names: ['Red', 'Green', 'Blue'],
    board_count: 2,
    min_individual_bid: 0,
    max_individual_bid: 10,
    max_total: 15,
    identical_bids_prohibited: false,
    must_use_all_points: false,
    ...overrides,
  };
}

/**
 * Default settings with both rules switched on: distinct bids that spend
 * the whole budget.
 */
export function createStrictAuctionSettings(): AuctionSettings {
  return createDefaultAuctionSettings({
    identical_bids_prohibited: true,
    must_use_all_points: true,
  });
}
