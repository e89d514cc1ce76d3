import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import { formatCurrency, isValidPaiseValue, parseAmountToPaise, rupeesToPaise } from './currency';

describe('currency', () => {
  it('formats paise as rupees with Indian grouping and two decimals', () => {
    expect(formatCurrency(5_000_000)).toBe('₹50,000.00');
    expect(formatCurrency(50_000)).toBe('₹500.00');
    expect(formatCurrency(4_950_000)).toBe('₹49,500.00');
    expect(formatCurrency(0)).toBe('₹0.00');
  });

  it('formats rupee values when asked to', () => {
    expect(formatCurrency(12.5, 'rupees')).toBe('₹12.50');
  });

  it('parses plain, comma-grouped and rupee-prefixed amounts', () => {
    expect(parseAmountToPaise('500')).toBe(50_000);
    expect(parseAmountToPaise('1,250.50')).toBe(125_050);
    expect(parseAmountToPaise('₹75')).toBe(7_500);
    expect(parseAmountToPaise(19.99)).toBe(1_999);
  });

  it.each(['abc', '-5', '0', '0.001', '', '1e3', '12.5.3'])('rejects %j', (input) => {
    expect(() => parseAmountToPaise(input)).toThrow(ValidationError);
  });

  it('rejects non-finite and non-positive numbers', () => {
    expect(() => parseAmountToPaise(Number.NaN)).toThrow(ValidationError);
    expect(() => parseAmountToPaise(Number.POSITIVE_INFINITY)).toThrow(ValidationError);
    expect(() => parseAmountToPaise(-1)).toThrow(ValidationError);
  });

  it('rejects amounts that do not come to a whole positive number of paise', () => {
    expect(() => parseAmountToPaise(0.004)).toThrow('Amount out of range: 0.004');
    expect(() => parseAmountToPaise(1e17)).toThrow('Amount out of range: 100000000000000000');
  });

  it('rounds rupees to the nearest paisa', () => {
    expect(rupeesToPaise(10.257)).toBe(1_026);
  });

  it('accepts only positive integer paise', () => {
    expect(isValidPaiseValue(100)).toBe(true);
    expect(isValidPaiseValue(0)).toBe(false);
    expect(isValidPaiseValue(1.5)).toBe(false);
    expect(isValidPaiseValue('100')).toBe(false);
  });
});
