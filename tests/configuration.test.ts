import { Configuration } from '../src/core/configuration';
import {
  GREAT_POWERS,
  createDefaultAuctionSettings,
  createTestAuctionSettings,
} from '../src/core/configs';

describe('Configuration', () => {
  describe('constructor', () => {
    test('copies the settings', () => {
      const settings = createTestAuctionSettings();
      const config = new Configuration(settings);
      settings.faction_names.push('Yellow');

      expect(config.faction_names).toEqual(['Red', 'Green', 'Blue']);
      expect(config.max_total).toBe(15);
    });

    test('rejects fewer than two factions', () => {
      expect(
        () => new Configuration(createTestAuctionSettings({ faction_names: ['Red'] })),
      ).toThrow('At least 2 factions are required, got 1');
    });

    test('rejects duplicate faction names', () => {
      expect(
        () => new Configuration(createTestAuctionSettings({ faction_names: ['Red', 'Red'] })),
      ).toThrow('Duplicate faction name: Red');
    });

    test('rejects empty faction names', () => {
      expect(
        () => new Configuration(createTestAuctionSettings({ faction_names: ['Red', ' '] })),
      ).toThrow('Faction names must not be empty');
    });

    test('rejects min above max', () => {
      expect(
        () => new Configuration(createTestAuctionSettings({ min_individual_bid: 11 })),
      ).toThrow('min_individual_bid (11) exceeds max_individual_bid (10)');
    });

    test('rejects non-integer numbers', () => {
      expect(
        () => new Configuration(createTestAuctionSettings({ max_total: 2.5 })),
      ).toThrow('max_total must be an integer, got 2.5');
    });

    test('rejects a board count below 1', () => {
      expect(
        () => new Configuration(createTestAuctionSettings({ board_count: 0 })),
      ).toThrow('board_count must be at least 1, got 0');
    });

    test('accepts a budget no bid set can meet', () => {
      const config = new Configuration(createTestAuctionSettings({ min_individual_bid: 6 }));
      expect(config.max_total).toBe(15);
    });
  });

  describe('duplicate', () => {
    test('copies every setting', () => {
      const config = new Configuration(createDefaultAuctionSettings());
      const copy = config.duplicate();

      expect(copy).not.toBe(config);
      expect(copy.toSettings()).toEqual(config.toSettings());
    });

    test('overrides apply to the copy only', () => {
      const config = new Configuration(createDefaultAuctionSettings());
      const copy = config.duplicate({ max_total: 80 });

      expect(copy.max_total).toBe(80);
      expect(config.max_total).toBe(100);
    });

    test('faction list is not shared', () => {
      const config = new Configuration(createDefaultAuctionSettings());
      const copy = config.duplicate();
      copy.faction_names.push('Extra');

      expect(config.faction_names).toEqual([...GREAT_POWERS]);
    });
  });

  test('newBidSet is bound to the configuration and zeroed', () => {
    const config = new Configuration(createTestAuctionSettings());
    const bids = config.newBidSet();

    expect(bids.config).toBe(config);
    expect(bids.toRecord()).toEqual({ Red: 0, Green: 0, Blue: 0 });
  });

  test('allBoardNumbers', () => {
    const config = new Configuration(createDefaultAuctionSettings());
    expect(config.allBoardNumbers()).toEqual([1, 2, 3]);
  });

  test('allSeeds runs boards-major, factions-minor', () => {
    const config = new Configuration(createTestAuctionSettings());
    expect(config.allSeeds()).toEqual([
      { seed: 1, board: 1, faction: 'Red' },
      { seed: 2, board: 1, faction: 'Green' },
      { seed: 3, board: 1, faction: 'Blue' },
      { seed: 4, board: 2, faction: 'Red' },
      { seed: 5, board: 2, faction: 'Green' },
      { seed: 6, board: 2, faction: 'Blue' },
    ]);
  });

  test('allSeeds length is boards × factions', () => {
    const config = new Configuration(createDefaultAuctionSettings());
    const seeds = config.allSeeds();
    expect(seeds).toHaveLength(21);
    expect(seeds[20]).toEqual({ seed: 21, board: 3, faction: 'Turkey' });
  });

  test('positionForSeed inverts the seed ordering', () => {
    const config = new Configuration(createTestAuctionSettings());
    for (const position of config.allSeeds()) {
      expect(config.positionForSeed(position.seed)).toEqual(position);
    }
    expect(config.positionForSeed(0)).toBeUndefined();
    expect(config.positionForSeed(7)).toBeUndefined();
    expect(config.positionForSeed(1.5)).toBeUndefined();
  });

  describe('checkFeasibility', () => {
    test('default settings are feasible', () => {
      const config = new Configuration(createDefaultAuctionSettings());
      expect(config.checkFeasibility()).toEqual({ feasible: true, reasons: [] });
    });

    test('minimums above the budget', () => {
      const config = new Configuration(createTestAuctionSettings({ min_individual_bid: 6 }));
      expect(config.checkFeasibility()).toEqual({
        feasible: false,
        reasons: ['The smallest possible total (18) is above the maximum (15).'],
      });
    });

    test('too few distinct values for the identical-bids rule', () => {
      const config = new Configuration(
        createTestAuctionSettings({ max_individual_bid: 1, identical_bids_prohibited: true }),
      );
      expect(config.checkFeasibility()).toEqual({
        feasible: false,
        reasons: ['Only 2 distinct bids fit between 0 and 1, but there are 3 factions.'],
      });
    });

    test('distinct minimums above the budget', () => {
      const config = new Configuration(
        createDefaultAuctionSettings({ max_total: 20 }),
      );
      expect(config.checkFeasibility().reasons).toEqual([
        'The smallest possible total (21) is above the maximum (20).',
      ]);
    });

    test('maximums below a budget that must be spent', () => {
      const config = new Configuration(
        createTestAuctionSettings({ max_individual_bid: 4, must_use_all_points: true }),
      );
      expect(config.checkFeasibility()).toEqual({
        feasible: false,
        reasons: ['The largest possible total (12) is below 15.'],
      });
    });
  });
});
