import Decimal from 'decimal.js';
import type { MonetaryAmount } from '../types/dialogue.types.ts';

/**
 * Decimal constructor used for every amount in the service. 64 significant
 * digits keeps receipt-sized arithmetic exact.
 */
export const Money = Decimal.clone({ precision: 64, rounding: Decimal.ROUND_HALF_UP });

export const MIN_CANDIDATE_AMOUNT = new Money(1);
export const MAX_CANDIDATE_AMOUNT = new Money(10_000_000);

// Unsigned plain decimal: "12", "12.", ".5", "12.50". No exponent, no sign.
const PLAIN_DECIMAL = /^(?:\d+\.?\d*|\.\d+)$/;

/**
 * Parse an unsigned plain decimal string. Returns null for anything else.
 */
export function parseDecimal(text: string): MonetaryAmount | null {
  if (!PLAIN_DECIMAL.test(text)) {
    return null;
  }
  return new Money(text);
}

export function isCandidateAmount(value: MonetaryAmount): boolean {
  return value.gte(MIN_CANDIDATE_AMOUNT) && value.lte(MAX_CANDIDATE_AMOUNT);
}
