import { describe, it, expect } from 'vitest';
import {
  americanToDecimal,
  fractionalToDecimal,
  toDecimalOdds,
} from '../../src/engine/odds-format.js';
import { InvalidOddsError } from '../../src/engine/errors.js';
import { catchError } from '../helpers/catch-error.js';

describe('americanToDecimal', () => {
  it('should convert favourites and underdogs', () => {
    expect(americanToDecimal(-200)).toBe(1.5);
    expect(americanToDecimal(150)).toBe(2.5);
    expect(americanToDecimal(100)).toBe(2);
  });

  it('should reject zero', () => {
    expect(() => americanToDecimal(0)).toThrow(InvalidOddsError);
  });

  it('should accept +100 and -100 as even money', () => {
    expect(americanToDecimal(100)).toBe(2);
    expect(americanToDecimal(-100)).toBe(2);
  });

  it('should reject prices between -100 and +100', () => {
    expect(() => americanToDecimal(99)).toThrow(InvalidOddsError);
    expect(() => americanToDecimal(-99)).toThrow(InvalidOddsError);
    expect(() => americanToDecimal(-50)).toThrow(InvalidOddsError);
    expect(() => americanToDecimal(50)).toThrow(InvalidOddsError);
  });
});

describe('fractionalToDecimal', () => {
  it('should convert fractional prices', () => {
    expect(fractionalToDecimal('5/2')).toBe(3.5);
    expect(fractionalToDecimal(' 1 / 4 ')).toBe(1.25);
    expect(fractionalToDecimal('Evens')).toBe(2);
  });

  it('should reject malformed prices', () => {
    expect(() => fractionalToDecimal('abc')).toThrow(InvalidOddsError);
    expect(() => fractionalToDecimal('5/0')).toThrow(InvalidOddsError);
  });
});

describe('toDecimalOdds', () => {
  it('should pass decimal prices through', () => {
    expect(toDecimalOdds(2.25, 'decimal')).toBe(2.25);
    expect(toDecimalOdds('2.25', 'decimal')).toBe(2.25);
  });

  it('should accept american prices as strings', () => {
    expect(toDecimalOdds('+150', 'american')).toBe(2.5);
    expect(toDecimalOdds('-200', 'american')).toBe(1.5);
  });

  it('should convert fractional prices', () => {
    expect(toDecimalOdds('5/2', 'fractional')).toBe(3.5);
  });

  it('should not turn an out-of-range american string into a price', () => {
    expect(() => toDecimalOdds('-50', 'american')).toThrow(InvalidOddsError);
    expect(() => toDecimalOdds('+50', 'american')).toThrow(InvalidOddsError);
  });

  it('should only accept plain numerals in strings', () => {
    expect(() => toDecimalOdds('0x10', 'decimal')).toThrow(InvalidOddsError);
    expect(() => toDecimalOdds('1e1', 'decimal')).toThrow(InvalidOddsError);
    expect(() => toDecimalOdds('0x96', 'american')).toThrow(InvalidOddsError);
  });

  it('should leave the above-1.0 rule to the valuator', () => {
    expect(toDecimalOdds(1, 'decimal')).toBe(1);
  });

  it('should report which outcome carried a bad price', () => {
    const err = catchError(() => toDecimalOdds('  ', 'decimal', 'draw'));
    expect(err).toBeInstanceOf(InvalidOddsError);
    expect(err).toMatchObject({ outcome: 'draw', code: 'INVALID_ODDS' });
    expect(() => toDecimalOdds('evens', 'american', 'team2')).toThrow(InvalidOddsError);
  });
});
