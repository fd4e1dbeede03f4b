import type { MonetaryAmount } from '../types/dialogue.types.ts';
import { InvalidArgumentError } from './errors.ts';
import { Money } from './money.ts';

/**
 * Divide a bill between `people`, rounding half away from zero to `scale`
 * fractional digits (10 / 4 = 2.50, 0.125 / 1 = 0.13, 100 / 3 = 33.33).
 *
 * The quotient is computed as integer quotient + remainder of the scaled
 * total, so there is no intermediate rounding before the final one.
 */
export function splitPerPerson(total: MonetaryAmount, people: number, scale: number = 2): MonetaryAmount {
  if (!Number.isSafeInteger(people) || people <= 0) {
    throw new InvalidArgumentError(`Number of people must be a positive integer, got ${people}`);
  }
  if (!Number.isSafeInteger(scale) || scale < 0) {
    throw new InvalidArgumentError(`Scale must be a non-negative integer, got ${scale}`);
  }

  const amount = new Money(total);
  const unit = new Money(10).pow(scale);
  const scaled = amount.abs().times(unit);

  const remainder = scaled.mod(people);
  let quotient = scaled.minus(remainder).div(people);
  if (remainder.times(2).gte(people)) {
    quotient = quotient.plus(1);
  }

  const perPerson = quotient.div(unit);
  return amount.isNegative() ? perPerson.negated() : perPerson;
}
