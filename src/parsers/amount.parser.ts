import type { MonetaryAmount } from '../types/dialogue.types.ts';
import { isCandidateAmount, parseDecimal } from '../utils/money.ts';

// Numeric token on a receipt line. First alternative: thousands-grouped number
// ("1,234", "1.234.567,89", "12 345"); second: plain digits with an optional
// 1-2 digit fraction ("1500", "12,34"). Tokens never start or stop inside a
// digit run, so "1500" is one token and "999999999" is not read as "999".
const AMOUNT_TOKEN = /(?<!\d)(?:\d{1,3}(?:[,. ]\d{3})+(?:[.,]\d{1,2})?|\d+(?:[.,]\d{1,2})?)(?!\d)/g;

function countChar(text: string, char: string): number {
  let count = 0;
  for (const c of text) {
    if (c === char) count++;
  }
  return count;
}

/**
 * Parse one numeric token whose separators may be ambiguous.
 *
 * Returns a list so callers can handle several readings of the same token;
 * the current rules always produce at most one value. Unparseable tokens
 * give an empty list.
 *
 * @example
 * parseNumericToken('1,234')    // [1234]
 * parseNumericToken('12,34')    // [12.34]
 * parseNumericToken('1.234,56') // [1234.56]
 */
export function parseNumericToken(token: string): MonetaryAmount[] {
  const compact = token.replace(/\s+/g, '');
  if (!compact) return [];

  const dots = countChar(compact, '.');
  const commas = countChar(compact, ',');

  let normalized: string;

  if (commas === 0 && dots <= 1) {
    // "1234" or "12.34"
    normalized = compact;
  } else if (dots === 0 && commas === 1) {
    // "1,234" is grouped, "12,34" / "12,3" use a decimal comma
    const fraction = compact.slice(compact.indexOf(',') + 1);
    normalized = fraction.length === 3
      ? compact.replace(',', '')
      : compact.replace(',', '.');
  } else if (dots > 0 && commas > 0) {
    // Whichever separator comes last is the decimal point
    normalized = compact.lastIndexOf('.') > compact.lastIndexOf(',')
      ? compact.replace(/,/g, '')
      : compact.replace(/\./g, '').replace(',', '.');
  } else if (dots > 1) {
    normalized = compact.replace(/\./g, '');
  } else {
    normalized = compact.replace(/,/g, '');
  }

  const value = parseDecimal(normalized);
  return value ? [value] : [];
}

/**
 * Scan OCR text for plausible receipt totals.
 *
 * Values outside [1, 10,000,000] are dropped, duplicates (by value, so
 * "1,234" and "1234.00" collapse) are merged, and the result is sorted
 * largest first since the grand total is usually the biggest number printed.
 */
export function extractAmountCandidates(ocrText: string | null | undefined): MonetaryAmount[] {
  if (!ocrText) return [];

  // Full-width digits and punctuation (１，２３４) become ASCII
  const text = ocrText.normalize('NFKC');
  const unique = new Map<string, MonetaryAmount>();

  for (const match of text.matchAll(AMOUNT_TOKEN)) {
    for (const value of parseNumericToken(match[0])) {
      if (!isCandidateAmount(value)) continue;

      const key = value.toFixed();
      if (!unique.has(key)) {
        unique.set(key, value);
      }
    }
  }

  const candidates = [...unique.values()].sort((a, b) => b.comparedTo(a));

  console.log(`[AmountParser] Found ${candidates.length} amount candidates`);
  return candidates;
}
