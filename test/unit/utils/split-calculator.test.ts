/**
 * Tests for split-calculator.ts
 */
import { describe, test, expect } from 'vitest';
import Decimal from 'decimal.js';
import { splitPerPerson } from '../../../src/utils/split-calculator';
import { InvalidArgumentError } from '../../../src/utils/errors';

const split = (total: string, people: number, scale?: number) =>
  splitPerPerson(new Decimal(total), people, scale).toFixed(scale ?? 2);

describe('splitPerPerson', () => {
  test('divides evenly', () => {
    expect(split('10', 4)).toBe('2.50');
    expect(split('3000', 3)).toBe('1000.00');
  });

  test('rounds down below the half', () => {
    expect(split('100', 3)).toBe('33.33');
    expect(split('1234', 3)).toBe('411.33');
  });

  test('rounds up from the half', () => {
    expect(split('100', 6)).toBe('16.67');
    expect(split('0.125', 1)).toBe('0.13');
  });

  test('rounds half away from zero at scale 0', () => {
    expect(split('5', 2, 0)).toBe('3');
    expect(split('1', 2, 0)).toBe('1');
  });

  test('keeps the sign for negative totals', () => {
    expect(split('-10', 4)).toBe('-2.50');
    expect(split('-1', 2, 0)).toBe('-1');
  });

  test('a single person pays the total', () => {
    expect(split('1234.56', 1)).toBe('1234.56');
  });

  test('stays exact for large totals', () => {
    expect(split('9999999.99', 7)).toBe('1428571.43');
  });

  test.each([0, -1, 1.5, Number.NaN])('rejects %s people', (people) => {
    expect(() => splitPerPerson(new Decimal('100'), people)).toThrow(InvalidArgumentError);
  });

  test('rejects a negative scale', () => {
    expect(() => splitPerPerson(new Decimal('100'), 2, -1)).toThrow(InvalidArgumentError);
  });
});
