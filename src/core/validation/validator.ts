import { AuctionSettings, ParsedBid } from '../../models/types';

/**
 * Join faction names for display: "A", "A and B", "A, B and C".
 */
export function formatFactionList(names: string[]): string {
  if (names.length <= 1) return names.join('');
  return `${names.slice(0, -1).join(', ')} and ${names[names.length - 1]}`;
}

/**
 * Check one player's bids against the round's rules.
 *
 * Messages come out in a fixed order: per-faction problems in faction order,
 * then one message per group of identical bids, then the total checks.
 * An empty list means the bid set is legal.
 *
 * @param bids - Parsed bid for every faction, keyed by faction name
 */
export function validateBids(
  settings: Readonly<AuctionSettings>,
  bids: ReadonlyMap<string, ParsedBid>,
): string[] {
  const messages: string[] = [];
  const byValue = new Map<number, string[]>();
  let total = 0;

  // ── Per-faction checks ──────────────────────────────────────────────────
  for (const faction of settings.faction_names) {
    const bid = bids.get(faction);
    if (bid === undefined || !bid.ok) {
      messages.push(`${faction} is not a number.`);
      continue;
    }

    total += bid.value;
    const group = byValue.get(bid.value);
    if (group) {
      group.push(faction);
    } else {
      byValue.set(bid.value, [faction]);
    }

    if (bid.value < settings.min_individual_bid) {
      messages.push(`${faction} is below the minimum (${settings.min_individual_bid}).`);
    }
    if (bid.value > settings.max_individual_bid) {
      messages.push(`${faction} is above the maximum (${settings.max_individual_bid}).`);
    }
  }

  // ── Identical bids ──────────────────────────────────────────────────────
  if (settings.identical_bids_prohibited) {
    for (const factions of byValue.values()) {
      if (factions.length >= 2) {
        messages.push(`${formatFactionList(factions)} have identical bids.`);
      }
    }
  }

  // ── Totals ──────────────────────────────────────────────────────────────
  if (settings.must_use_all_points && total !== settings.max_total) {
    messages.push(`The total must equal ${settings.max_total}.`);
  }
  if (total > settings.max_total) {
    messages.push(`The total is above the maximum (${settings.max_total}).`);
  }

  return messages;
}
