import { z } from 'zod';
import { AuctionSettings } from '../models/types';
import { createDefaultAuctionSettings } from './configs';

/**
 * Settings file schema. Omitted fields fall back to the default preset.
 */
export const auctionSettingsSchema = z
  .object({
    faction_names: z
      .array(z.string().trim().min(1, 'faction names must not be empty'))
      .min(2, 'at least 2 factions are required')
      .refine((names) => new Set(names).size === names.length, {
        message: 'faction names must be unique',
      }),
    board_count: z.number().int().min(1),
    min_individual_bid: z.number().int(),
    max_individual_bid: z.number().int(),
    max_total: z.number().int(),
    identical_bids_prohibited: z.boolean(),
    must_use_all_points: z.boolean(),
  })
  .partial()
  .transform((value, ctx): AuctionSettings => {
    const settings = createDefaultAuctionSettings(value);
    if (settings.min_individual_bid > settings.max_individual_bid) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'min_individual_bid must not exceed max_individual_bid',
        path: ['min_individual_bid'],
      });
      return z.NEVER;
    }
    return settings;
  });

export type SettingsParseResult =
  | { success: true; settings: AuctionSettings }
  | { success: false; issues: string[] };

/**
 * Validate parsed JSON as auction settings. Issues are rendered as
 * "path: message" lines.
 */
export function parseAuctionSettings(input: unknown): SettingsParseResult {
  const result = auctionSettingsSchema.safeParse(input);
  if (result.success) {
    return { success: true, settings: result.data };
  }
  return {
    success: false,
    issues: result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    }),
  };
}

