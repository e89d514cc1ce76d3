import { describe, expect, it } from 'vitest';
import {
  SEPARATOR,
  formatCategoryBreakdown,
  formatDailySeries,
  formatPendingDebts,
  formatPercent,
  formatPersonLedger,
  formatStatement,
  formatSummary,
  formatTransactionLine,
} from './report-formatter';
import type { DateRange, DebtRecord } from '../types';

const today: DateRange = {
  from: '2026-10-18 00:00:00',
  to: '2026-10-19 00:00:00',
  label: '18 October 2026',
};

const month: DateRange = {
  from: '2026-10-01 00:00:00',
  to: '2026-11-01 00:00:00',
  label: 'October 2026',
};

describe('formatPercent', () => {
  it('prints one decimal', () => {
    expect(formatPercent(1, 3)).toBe('33.3%');
  });

  it('prints 0.0% when the whole is zero', () => {
    expect(formatPercent(500, 0)).toBe('0.0%');
  });
});

describe('formatSummary', () => {
  it('renders totals and net for a day', () => {
    const text = formatSummary({
      title: "Today's Report",
      periodName: 'Date',
      range: today,
      rows: [
        { kind: 'expense', total_paise: 50_000, count: 1 },
        { kind: 'income', total_paise: 5_000_000, count: 1 },
      ],
    });

    expect(text).toBe(
      [
        "📊 *Today's Report*",
        '📅 Date: 18 October 2026',
        '',
        '💰 Income: ₹50,000.00',
        '💸 Expenses: ₹500.00 (1 transaction)',
        '🏦 Savings: ₹0.00',
        SEPARATOR,
        '💵 Net: ₹49,500.00',
      ].join('\n')
    );
  });

  it('prints zero rates when there is no income', () => {
    const text = formatSummary({
      title: 'Monthly Report',
      periodName: 'Month',
      range: month,
      rows: [{ kind: 'expense', total_paise: 20_000, count: 3 }],
      showRates: true,
    });

    expect(text.split('\n').slice(-4)).toEqual([
      '💵 Net: -₹200.00',
      '',
      '📈 Savings Rate: 0.0%',
      '📉 Expense Rate: 0.0%',
    ]);
  });

  it('computes rates against income', () => {
    const text = formatSummary({
      title: 'Monthly Report',
      periodName: 'Month',
      range: month,
      rows: [
        { kind: 'income', total_paise: 100_000, count: 1 },
        { kind: 'expense', total_paise: 25_000, count: 2 },
        { kind: 'savings', total_paise: 10_000, count: 1 },
      ],
      showRates: true,
    });

    expect(text).toContain('💸 Expenses: ₹250.00 (2 transactions)');
    expect(text).toContain('📈 Savings Rate: 10.0%');
    expect(text).toContain('📉 Expense Rate: 25.0%');
  });

  it('has a no-data variant', () => {
    expect(formatSummary({ title: "Today's Report", periodName: 'Date', range: today, rows: [] })).toBe(
      "📊 *Today's Report*\n📅 Date: 18 October 2026\n\nNo transactions recorded."
    );
  });
});

describe('formatDailySeries', () => {
  it('lists days with a total', () => {
    const text = formatDailySeries({ ...month, label: 'Last 30 days' }, [
      { day: '2026-10-18', total_paise: 50_000, count: 2 },
      { day: '2026-10-03', total_paise: 12_550, count: 1 },
    ]);

    expect(text).toBe(
      [
        '💸 *Daily Expenses*',
        '📅 Last 30 days',
        '',
        '18 Oct 2026: ₹500.00 (2 transactions)',
        '03 Oct 2026: ₹125.50 (1 transaction)',
        SEPARATOR,
        'Total: ₹625.50 (3 transactions)',
      ].join('\n')
    );
  });
});

describe('formatCategoryBreakdown', () => {
  it('shows shares of the total, largest first', () => {
    const text = formatCategoryBreakdown(month, [
      { category: 'transport', total_paise: 25_000, count: 1 },
      { category: 'food', total_paise: 75_000, count: 3 },
    ]);

    expect(text.split('\n').slice(3)).toEqual([
      '🍔 Food: ₹750.00 (75.0%, 3 transactions)',
      '🚗 Transport: ₹250.00 (25.0%, 1 transaction)',
      SEPARATOR,
      'Total: ₹1,000.00',
    ]);
  });
});

describe('formatStatement', () => {
  it('escapes user notes', () => {
    expect(
      formatTransactionLine({
        id: 1,
        owner: 'owner-1',
        kind: 'expense',
        amount_paise: 50_000,
        category: 'food',
        note: 'lunch_with *team*',
        created_at: '2026-10-18 14:05:00',
      })
    ).toBe('💸 18 Oct 2026, 02:05 PM · -₹500.00 · Food · lunch\\_with \\*team\\*');
  });

  it('has an empty variant', () => {
    expect(formatStatement('Mini Statement', 'Last 10 transactions', [])).toBe(
      '📝 *Mini Statement*\n_Last 10 transactions_\n\nNo transactions yet.'
    );
  });
});

describe('formatPersonLedger', () => {
  it('nets pending amounts per contact', () => {
    const text = formatPersonLedger([
      { contact_name: 'John', debt_type: 'borrowed', status: 'pending', total_paise: 50_000, count: 1 },
      { contact_name: 'Priya', debt_type: 'lent', status: 'pending', total_paise: 100_000, count: 2 },
      { contact_name: 'Priya', debt_type: 'lent', status: 'settled', total_paise: 20_000, count: 1 },
    ]);

    expect(text).toBe(
      [
        '👥 *Loans by Person*',
        '',
        '👤 John\n   📥 Borrowed (pending): ₹500.00 (1)\n   ⬅️ You owe ₹500.00',
        '',
        '👤 Priya\n   📤 Lent (pending): ₹1,000.00 (2)\n   ✅ Lent (received): ₹200.00 (1)\n   ➡️ Owes you ₹1,000.00',
        SEPARATOR,
        '📥 You owe: ₹500.00',
        '📤 Owed to you: ₹1,000.00',
      ].join('\n')
    );
  });
});

describe('formatPendingDebts', () => {
  it('groups by direction with ids', () => {
    const debt: DebtRecord = {
      id: 7,
      owner: 'owner-1',
      debt_type: 'borrowed',
      amount_paise: 50_000,
      contact_name: 'John',
      purpose: 'bike',
      status: 'pending',
      borrow_date: '2026-10-10 12:00:00',
      return_date: null,
      created_at: '2026-10-10 12:00:00',
      updated_at: '2026-10-10 12:00:00',
    };

    expect(formatPendingDebts([debt])).toBe(
      [
        '⏳ *Pending Loans*',
        '',
        '📥 *You borrowed*',
        '#7 · John · ₹500.00 · bike · since 10 Oct 2026',
        '',
        'Tap a button below once a loan is returned or received.',
      ].join('\n')
    );
  });

  it('has an empty variant', () => {
    expect(formatPendingDebts([])).toBe('⏳ *Pending Loans*\n\nNo pending loans. 🎉');
  });
});
