/**
 * DealRelay — Price & Discount Extraction
 *
 * Pure pattern utilities used by the scoring engine. A candidate that
 * cannot be parsed is reported in `failures` and otherwise ignored.
 */

import { ParseError } from '../lib/errors';

export interface ExtractionResult {
  /** Most favorable value: lowest price or highest discount. Null when nothing parsed. */
  value: number | null;
  /** Every successfully parsed value, in text order */
  values: number[];
  failures: ParseError[];
}

// A number with optional thousands groups (space, NBSP, narrow NBSP, dot, comma)
// and an optional 1–2 digit decimal part.
const NUMBER = String.raw`\d{1,3}(?:[ \u00a0\u202f.,]\d{3})+(?:[.,]\d{1,2})?|\d+(?:[.,]\d{1,2})?`;
const NUMBER_START = String.raw`(?<![\d.,])`;
const LETTER_AHEAD = String.raw`(?![a-zа-яё])`;

const CURRENCY = String.raw`(?:₽|руб(?:лей|ля|ль)?\.?|р\.|р|rub)`;

const PRICE_SUFFIXED = new RegExp(
  String.raw`${NUMBER_START}(${NUMBER})\s?${CURRENCY}${LETTER_AHEAD}`,
  'giu'
);
const PRICE_PREFIXED = new RegExp(String.raw`₽\s?(${NUMBER})`, 'giu');

const DISCOUNT_PREFIXED = new RegExp(
  String.raw`(?:[-−–—]\s?|скидк[а-яё]*\s*(?:до\s*)?(?:[-−–]\s?)?|discount\s*(?:of\s*)?|sale\s*|off\s*)(${NUMBER})\s?%`,
  'giu'
);
const DISCOUNT_SUFFIXED = new RegExp(
  String.raw`${NUMBER_START}(${NUMBER})\s?%\s*(?:off|скидк)`,
  'giu'
);

/**
 * Parse a matched amount such as `1 290`, `1.290`, `1,290.50` or `12,5`.
 * A separator followed by exactly three digits groups thousands;
 * a trailing separator with one or two digits is the decimal part.
 */
export function parseAmount(raw: string): number | ParseError {
  const compact = raw.replace(/[\s\u00a0\u202f]/g, '');
  const match = compact.match(/^(\d+(?:[.,]\d{3})*)(?:[.,](\d{1,2}))?$/);
  if (!match) {
    return new ParseError(`Unrecognized number format "${raw}"`, raw);
  }

  const integerPart = match[1].replace(/[.,]/g, '');
  const value = Number(`${integerPart}.${match[2] ?? '0'}`);
  if (!Number.isFinite(value)) {
    return new ParseError(`Number out of range "${raw}"`, raw);
  }
  return value;
}

function collect(
  text: string,
  patterns: RegExp[],
  validate: (value: number, raw: string) => ParseError | null
): { values: number[]; failures: ParseError[] } {
  const found: Array<{ index: number; value: number }> = [];
  const failures: ParseError[] = [];
  const lower = text.toLowerCase();

  for (const pattern of patterns) {
    for (const match of lower.matchAll(pattern)) {
      const raw = match[1];
      if (raw === undefined) continue;

      const parsed = parseAmount(raw);
      if (parsed instanceof ParseError) {
        failures.push(parsed);
        continue;
      }
      const invalid = validate(parsed, raw);
      if (invalid) {
        failures.push(invalid);
        continue;
      }
      found.push({ index: match.index ?? 0, value: parsed });
    }
  }

  found.sort((a, b) => a.index - b.index);
  return { values: found.map(f => f.value), failures };
}

/**
 * Extract currency-formatted prices; `value` is the lowest one.
 */
export function extractPrice(text: string): ExtractionResult {
  const { values, failures } = collect(text, [PRICE_SUFFIXED, PRICE_PREFIXED], (value, raw) =>
    value > 0 ? null : new ParseError(`Price must be positive "${raw}"`, raw)
  );
  return {
    value: values.length > 0 ? Math.min(...values) : null,
    values,
    failures,
  };
}

/**
 * Extract discount percentages; `value` is the highest one.
 */
export function extractDiscount(text: string): ExtractionResult {
  const { values, failures } = collect(
    text,
    [DISCOUNT_PREFIXED, DISCOUNT_SUFFIXED],
    (value, raw) =>
      value > 0 && value < 100
        ? null
        : new ParseError(`Discount out of range "${raw}"`, raw)
  );
  return {
    value: values.length > 0 ? Math.max(...values) : null,
    values,
    failures,
  };
}
