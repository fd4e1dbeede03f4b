import Decimal from 'decimal.js';
import type { MonetaryAmount } from '../types/dialogue.types.ts';
import { ValidationError } from '../utils/errors.ts';
import { isCandidateAmount, parseDecimal } from '../utils/money.ts';

export const AMOUNT_POSTBACK_PREFIX = 'amount=';

const WHOLE_NUMBER = /^\+?\d+$/;

/**
 * Parse the party size typed by the user: "3", " 3 ", "+3", "３".
 * Throws ValidationError for anything that is not a positive integer.
 */
export function parsePeopleCount(text: string): number {
  const normalized = text.normalize('NFKC').trim();

  if (!WHOLE_NUMBER.test(normalized)) {
    throw new ValidationError(`Not a whole number: "${text.slice(0, 50)}"`);
  }

  const people = Number(normalized);
  if (!Number.isSafeInteger(people) || people <= 0) {
    throw new ValidationError(`People count must be positive, got "${normalized}"`);
  }

  return people;
}

/**
 * Postback payload carried by a selection button. Uses the exact decimal
 * text so the value round-trips without float conversion.
 */
export function encodeAmountPostback(amount: Decimal): string {
  return `${AMOUNT_POSTBACK_PREFIX}${amount.toFixed()}`;
}

export function isAmountPostback(data: string): boolean {
  return data.startsWith(AMOUNT_POSTBACK_PREFIX);
}

/**
 * Read the amount back from a selection postback. Throws ValidationError
 * when the value is malformed or outside the candidate range.
 */
export function decodeAmountPostback(data: string): MonetaryAmount {
  if (!isAmountPostback(data)) {
    throw new ValidationError('Not an amount postback');
  }

  const value = parseDecimal(data.slice(AMOUNT_POSTBACK_PREFIX.length));
  if (!value || !isCandidateAmount(value)) {
    throw new ValidationError(`Invalid amount in postback: "${data.slice(0, 50)}"`);
  }

  return value;
}
