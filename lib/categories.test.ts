import { describe, expect, it } from 'vitest';
import {
  classifyNote,
  coerceCategory,
  loadCategoryRules,
  resolveCategory,
  type CategoryRule,
} from './categories';

const rules: CategoryRule[] = [
  { category: 'food', keywords: ['lunch', 'tea'] },
  { category: 'transport', keywords: ['cab', 'lunch'] },
];

describe('classifyNote', () => {
  it('returns the first rule whose keyword appears as a word', () => {
    expect(classifyNote('Cab to office', rules)).toBe('transport');
    expect(classifyNote('team lunch by cab', rules)).toBe('food');
  });

  it('lets earlier rules win on overlapping keywords', () => {
    expect(classifyNote('lunch', rules)).toBe('food');
  });

  it('matches whole words only', () => {
    expect(classifyNote('teapot', rules)).toBe('other');
  });

  it('falls back when nothing matches or the note is empty', () => {
    expect(classifyNote('misc stuff', rules)).toBe('other');
    expect(classifyNote('', rules, 'shopping')).toBe('shopping');
  });

  it('loads the bundled keyword rules in priority order', () => {
    const bundled = loadCategoryRules();
    expect(bundled[0].category).toBe('food');
    expect(classifyNote('uber ride home', bundled)).toBe('transport');
    expect(classifyNote('electricity', bundled)).toBe('bills');
  });
});

describe('coerceCategory', () => {
  it('keeps known categories and lowercases them', () => {
    expect(coerceCategory('expense', 'Food')).toBe('food');
    expect(coerceCategory('income', 'salary')).toBe('salary');
  });

  it('coerces unknown or missing categories to other', () => {
    expect(coerceCategory('expense', 'xyz')).toBe('other');
    expect(coerceCategory('expense', undefined)).toBe('other');
    expect(coerceCategory('income', 'food')).toBe('other');
  });

  it('drops categories on savings', () => {
    expect(coerceCategory('savings', 'food')).toBeNull();
  });
});

describe('resolveCategory', () => {
  it('takes a leading category word and keeps the rest as the note', () => {
    expect(resolveCategory('expense', 'food lunch with team', rules)).toEqual({
      category: 'food',
      note: 'lunch with team',
    });
    expect(resolveCategory('income', 'salary monthly pay', rules)).toEqual({
      category: 'salary',
      note: 'monthly pay',
    });
  });

  it('classifies expense notes that do not start with a category', () => {
    expect(resolveCategory('expense', 'cab home', rules)).toEqual({
      category: 'transport',
      note: 'cab home',
    });
    expect(resolveCategory('expense', 'xyz', rules)).toEqual({ category: 'other', note: 'xyz' });
  });

  it('uses other for income without a known category', () => {
    expect(resolveCategory('income', 'bonus from work', rules)).toEqual({
      category: 'other',
      note: 'bonus from work',
    });
  });

  it('handles an empty remainder', () => {
    expect(resolveCategory('expense', '', rules)).toEqual({ category: 'other', note: null });
    expect(resolveCategory('savings', '  ', rules)).toEqual({ category: null, note: null });
  });
});
