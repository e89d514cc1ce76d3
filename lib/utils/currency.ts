import { ValidationError } from '../errors';

/**
 * Currency utility functions for handling paise and rupees
 * All amounts stored in database as paise (integer) for precision
 * Only converted to rupees for display purposes
 */

const AMOUNT_PATTERN = /^\d+(\.\d+)?$/;

export function paiseToRupees(paise: number): number {
  return paise / 100;
}

export function rupeesToPaise(rupees: number): number {
  return Math.round(rupees * 100);
}

export function formatCurrency(amount: number, currency: 'paise' | 'rupees' = 'paise'): string {
  const value = currency === 'paise' ? paiseToRupees(amount) : amount;
  return `₹${value.toLocaleString('en-IN', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;
}

/**
 * Parse a user-typed rupee amount ("500", "1,250.50", "₹75") into paise.
 * Throws ValidationError unless the result is a positive whole number of paise.
 */
export function parseAmountToPaise(input: string | number): number {
  let rupees: number;

  if (typeof input === 'number') {
    rupees = input;
  } else {
    const cleaned = input.trim().replace(/^₹/, '').replace(/,/g, '');
    if (!AMOUNT_PATTERN.test(cleaned)) {
      throw new ValidationError(`Invalid amount: ${input}`);
    }
    rupees = Number(cleaned);
  }

  if (!Number.isFinite(rupees) || rupees <= 0) {
    throw new ValidationError(`Amount must be a positive number: ${input}`);
  }

  const paise = rupeesToPaise(rupees);
  if (!isValidPaiseValue(paise)) {
    throw new ValidationError(`Amount out of range: ${input}`);
  }

  return paise;
}

// Validate if a paise value is a valid integer
export function isValidPaiseValue(paise: unknown): paise is number {
  return typeof paise === 'number' && Number.isSafeInteger(paise) && paise > 0;
}
