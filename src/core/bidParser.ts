import { BidInput, ParsedBid } from '../models/types';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a single faction's bid as typed into a form field.
 *
 * Accepts integers given as numbers or as text with optional surrounding
 * whitespace and sign. Anything else (empty text, decimals, NaN, "12abc")
 * is a parse failure carrying the raw input.
 */
export function parseBid(input: BidInput): ParsedBid {
  if (typeof input === 'number') {
    return Number.isSafeInteger(input)
      ? { ok: true, value: input }
      : { ok: false, raw: String(input) };
  }

  const text = input.trim();
  if (!INTEGER_PATTERN.test(text)) {
    return { ok: false, raw: input };
  }

  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    return { ok: false, raw: input };
  }
  // Normalise "-0" so totals and duplicate grouping see a plain 0
  return { ok: true, value: value === 0 ? 0 : value };
}
