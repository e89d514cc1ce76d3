import fs from 'fs';
import { z } from 'zod';
import type { TransactionKind } from '../types';

export const EXPENSE_CATEGORIES = [
  'food',
  'transport',
  'bills',
  'shopping',
  'health',
  'entertainment',
  'education',
  'other',
] as const;

export const INCOME_CATEGORIES = ['salary', 'freelance', 'business', 'investment', 'gift', 'other'] as const;

export const DEFAULT_CATEGORY = 'other';

export const CATEGORY_EMOJI: Record<string, string> = {
  food: '🍔',
  transport: '🚗',
  bills: '🧾',
  shopping: '🛍️',
  health: '💊',
  entertainment: '🎬',
  education: '📚',
  salary: '💼',
  freelance: '🧑‍💻',
  business: '🏪',
  investment: '📈',
  gift: '🎁',
  other: '📦',
};

export interface CategoryRule {
  category: string;
  keywords: string[];
}

const rulesFileSchema = z.object({
  rules: z.array(
    z.object({
      category: z.enum(EXPENSE_CATEGORIES),
      keywords: z.array(z.string().min(1)),
    })
  ),
});

let cachedRules: CategoryRule[] | null = null;

/** Ordered keyword rules from data/category-keywords.json, read once per process. */
export function loadCategoryRules(): CategoryRule[] {
  if (!cachedRules) {
    const raw = fs.readFileSync(new URL('../data/category-keywords.json', import.meta.url), 'utf8');
    cachedRules = rulesFileSchema.parse(JSON.parse(raw)).rules.map((rule) => ({
      category: rule.category,
      keywords: rule.keywords.map((keyword) => keyword.toLowerCase()),
    }));
  }
  return cachedRules;
}

/**
 * Pick a category for a free-text note: the first rule with a keyword equal
 * to one of the note's words wins; otherwise `fallback`.
 */
export function classifyNote(
  note: string,
  rules: readonly CategoryRule[],
  fallback: string = DEFAULT_CATEGORY
): string {
  const words = new Set(note.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []);
  if (words.size === 0) {
    return fallback;
  }

  for (const rule of rules) {
    if (rule.keywords.some((keyword) => words.has(keyword))) {
      return rule.category;
    }
  }
  return fallback;
}

function categoriesFor(kind: TransactionKind): readonly string[] {
  switch (kind) {
    case 'expense':
      return EXPENSE_CATEGORIES;
    case 'income':
      return INCOME_CATEGORIES;
    case 'savings':
      return [];
  }
}

export function isKnownCategory(kind: TransactionKind, value: string): boolean {
  return categoriesFor(kind).includes(value.toLowerCase());
}

/** Savings carry no category; anything outside the kind's set becomes `other`. */
export function coerceCategory(kind: TransactionKind, value?: string | null): string | null {
  if (kind === 'savings') {
    return null;
  }
  if (!value) {
    return DEFAULT_CATEGORY;
  }
  const normalized = value.trim().toLowerCase();
  return isKnownCategory(kind, normalized) ? normalized : DEFAULT_CATEGORY;
}

/**
 * Split the words after an amount into category and note. A leading word that
 * names a category is taken as the category; otherwise every word is note text
 * and expenses fall back to keyword classification.
 */
export function resolveCategory(
  kind: TransactionKind,
  words: string,
  rules: readonly CategoryRule[] = loadCategoryRules()
): { category: string | null; note: string | null } {
  const text = words.trim();
  if (kind === 'savings') {
    return { category: null, note: text || null };
  }

  const [first = '', ...rest] = text.split(/\s+/);
  if (first && isKnownCategory(kind, first)) {
    const note = rest.join(' ');
    return { category: first.toLowerCase(), note: note || null };
  }

  if (kind === 'expense') {
    return { category: classifyNote(text, rules), note: text || null };
  }
  return { category: DEFAULT_CATEGORY, note: text || null };
}
