import { resolveCategory } from '../lib/categories';
import { ValidationError } from '../lib/errors';
import type { TransactionKind } from '../types';

export type ReportName = 'today' | 'month' | 'mini_statement' | 'full_statement';

export type ParsedCommand =
  | {
      type: 'record';
      kind: TransactionKind;
      amount: string;
      category: string | null;
      note: string | null;
    }
  | { type: 'report'; report: ReportName }
  | { type: 'cancel' }
  | { type: 'help' }
  | { type: 'unknown' };

export interface EntryDetail {
  amount: string;
  category: string | null;
  note: string | null;
}

export interface DebtDetail {
  amount: string;
  contact: string;
  purpose: string | null;
}

function tokenize(text: string): string[] {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

function record(
  kind: TransactionKind,
  tokens: string[],
  amountIndex: number,
  fixedCategory?: string
): ParsedCommand {
  const amount = tokens[amountIndex] ?? '';
  const rest = tokens.slice(amountIndex + 1).join(' ');

  if (fixedCategory) {
    return { type: 'record', kind, amount, category: fixedCategory, note: rest || null };
  }
  return { type: 'record', kind, amount, ...resolveCategory(kind, rest) };
}

/**
 * Interpret a free-text message sent while no guided entry is in progress.
 * Keywords are case-insensitive; notes keep the sender's casing.
 */
export function parseCommand(text: string): ParsedCommand {
  const tokens = tokenize(text);
  const [first = '', second = ''] = tokens.map((token) => token.toLowerCase());

  if (first === 'salary' && second === 'credited') {
    return record('income', tokens, 2, 'salary');
  }
  if (first === 'salary') {
    return record('income', tokens, 1, 'salary');
  }
  if (first === 'income') {
    return record('income', tokens, 1);
  }
  if (first === 'spend') {
    return record('expense', tokens, 1);
  }
  if (first === 'credit' && second === 'savings') {
    return record('savings', tokens, 2);
  }
  if (first === 'save') {
    return record('savings', tokens, 1);
  }

  const lower = tokens.join(' ').toLowerCase();

  if (lower === 'cancel') {
    return { type: 'cancel' };
  }
  if (lower === 'help') {
    return { type: 'help' };
  }
  if (lower.includes('today report')) {
    return { type: 'report', report: 'today' };
  }
  if (lower.includes('month report')) {
    return { type: 'report', report: 'month' };
  }
  if (lower.includes('full statement')) {
    return { type: 'report', report: 'full_statement' };
  }
  if (lower.includes('statement')) {
    return { type: 'report', report: 'mini_statement' };
  }

  return { type: 'unknown' };
}

/** `amount [category] [description]`; for savings everything after the amount is the note. */
export function parseEntryDetail(kind: TransactionKind, text: string): EntryDetail {
  const tokens = tokenize(text);
  if (tokens.length === 0) {
    throw new ValidationError('Amount is required');
  }
  return { amount: tokens[0], ...resolveCategory(kind, tokens.slice(1).join(' ')) };
}

/** `amount contact [purpose]` for borrow, lend and settlement entries. */
export function parseDebtDetail(text: string): DebtDetail {
  const tokens = tokenize(text);
  if (tokens.length === 0) {
    throw new ValidationError('Amount is required');
  }
  if (tokens.length < 2) {
    throw new ValidationError('Contact name is required');
  }
  const purpose = tokens.slice(2).join(' ');
  return { amount: tokens[0], contact: tokens[1], purpose: purpose || null };
}
