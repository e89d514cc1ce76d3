import { CATEGORY_EMOJI } from '../lib/categories';
import { formatCurrency } from '../lib/utils/currency';
import { formatDateTime, formatShortDate } from '../lib/utils/dates';
import { escapeMarkdown, pluralize } from '../lib/utils/text';
import type {
  CategoryTotal,
  DateRange,
  DayTotal,
  DebtRecord,
  KindTotal,
  PersonTotal,
  TransactionKind,
  TransactionRecord,
  UserSettings,
} from '../types';

// Report text for Telegram's legacy Markdown. Everything typed by a user goes
// through escapeMarkdown before it lands in a report.

export const SEPARATOR = '━━━━━━━━━━━━━━━━━';

const KIND_EMOJI: Record<TransactionKind, string> = {
  income: '💰',
  expense: '💸',
  savings: '🏦',
};

export function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/** Share of `whole` as a one-decimal percentage; 0.0% when `whole` is not positive. */
export function formatPercent(part: number, whole: number): string {
  const ratio = whole > 0 ? (part / whole) * 100 : 0;
  return `${ratio.toFixed(1)}%`;
}

export function formatSignedCurrency(paise: number): string {
  return paise < 0 ? `-${formatCurrency(-paise)}` : formatCurrency(paise);
}

function categoryLabel(category: string): string {
  const emoji = CATEGORY_EMOJI[category] ?? CATEGORY_EMOJI.other;
  return `${emoji} ${titleCase(category)}`;
}

export interface SummaryReport {
  title: string;
  /** `Date` for single days, `Month` for month reports */
  periodName: 'Date' | 'Month' | 'Period';
  range: DateRange;
  rows: KindTotal[];
  showRates?: boolean;
}

export function formatSummary({ title, periodName, range, rows, showRates = false }: SummaryReport): string {
  const header = `📊 *${title}*\n📅 ${periodName}: ${range.label}`;

  if (rows.length === 0) {
    return `${header}\n\nNo transactions recorded.`;
  }

  const totals: Record<TransactionKind, KindTotal> = {
    income: { kind: 'income', total_paise: 0, count: 0 },
    expense: { kind: 'expense', total_paise: 0, count: 0 },
    savings: { kind: 'savings', total_paise: 0, count: 0 },
  };
  for (const row of rows) {
    totals[row.kind] = row;
  }

  const income = totals.income.total_paise;
  const expenses = totals.expense.total_paise;
  const savings = totals.savings.total_paise;
  const net = income - expenses - savings;

  const lines = [
    header,
    '',
    `💰 Income: ${formatCurrency(income)}`,
    `💸 Expenses: ${formatCurrency(expenses)} (${pluralize(totals.expense.count, 'transaction')})`,
    `🏦 Savings: ${formatCurrency(savings)}`,
    SEPARATOR,
    `💵 Net: ${formatSignedCurrency(net)}`,
  ];

  if (showRates) {
    lines.push(
      '',
      `📈 Savings Rate: ${formatPercent(savings, income)}`,
      `📉 Expense Rate: ${formatPercent(expenses, income)}`
    );
  }

  return lines.join('\n');
}

export function formatDailySeries(range: DateRange, rows: DayTotal[]): string {
  const header = `💸 *Daily Expenses*\n📅 ${range.label}`;

  if (rows.length === 0) {
    return `${header}\n\nNo expenses recorded.`;
  }

  const total = rows.reduce((sum, row) => sum + row.total_paise, 0);
  const count = rows.reduce((sum, row) => sum + row.count, 0);

  return [
    header,
    '',
    ...rows.map(
      (row) => `${formatShortDate(row.day)}: ${formatCurrency(row.total_paise)} (${pluralize(row.count, 'transaction')})`
    ),
    SEPARATOR,
    `Total: ${formatCurrency(total)} (${pluralize(count, 'transaction')})`,
  ].join('\n');
}

export function formatCategoryBreakdown(range: DateRange, rows: CategoryTotal[]): string {
  const header = `📈 *Spending Analysis*\n📅 ${range.label}`;

  if (rows.length === 0) {
    return `${header}\n\nNo expenses recorded.`;
  }

  const total = rows.reduce((sum, row) => sum + row.total_paise, 0);
  const sorted = [...rows].sort(
    (a, b) => b.total_paise - a.total_paise || a.category.localeCompare(b.category)
  );

  return [
    header,
    '',
    ...sorted.map(
      (row) =>
        `${categoryLabel(row.category)}: ${formatCurrency(row.total_paise)} ` +
        `(${formatPercent(row.total_paise, total)}, ${pluralize(row.count, 'transaction')})`
    ),
    SEPARATOR,
    `Total: ${formatCurrency(total)}`,
  ].join('\n');
}

export function formatTransactionLine(tx: TransactionRecord): string {
  const sign = tx.kind === 'income' ? '+' : tx.kind === 'expense' ? '-' : '';
  const parts = [`${KIND_EMOJI[tx.kind]} ${formatDateTime(tx.created_at)}`, `${sign}${formatCurrency(tx.amount_paise)}`];
  if (tx.category) {
    parts.push(titleCase(tx.category));
  }
  if (tx.note) {
    parts.push(escapeMarkdown(tx.note));
  }
  return parts.join(' · ');
}

export function formatStatement(
  title: string,
  subtitle: string,
  transactions: TransactionRecord[],
  footer?: string
): string {
  const header = `📝 *${title}*\n_${subtitle}_`;

  if (transactions.length === 0) {
    return `${header}\n\nNo transactions yet.`;
  }

  const lines = [header, '', ...transactions.map(formatTransactionLine)];
  if (footer) {
    lines.push('', `_${footer}_`);
  }
  return lines.join('\n');
}

const PERSON_LINE_LABELS: Record<string, string> = {
  'borrowed:pending': '📥 Borrowed (pending)',
  'borrowed:settled': '✅ Borrowed (returned)',
  'lent:pending': '📤 Lent (pending)',
  'lent:settled': '✅ Lent (received)',
  'settlement:settled': '🤝 Settlements',
  'settlement:pending': '🤝 Settlements',
};

export function formatPersonLedger(rows: PersonTotal[]): string {
  const header = '👥 *Loans by Person*';

  if (rows.length === 0) {
    return `${header}\n\nNo loans recorded.`;
  }

  const byContact = new Map<string, PersonTotal[]>();
  for (const row of rows) {
    const list = byContact.get(row.contact_name) ?? [];
    list.push(row);
    byContact.set(row.contact_name, list);
  }

  let youOwe = 0;
  let owedToYou = 0;
  const sections: string[] = [];

  for (const [contact, contactRows] of [...byContact.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    const borrowedPending = contactRows
      .filter((row) => row.debt_type === 'borrowed' && row.status === 'pending')
      .reduce((sum, row) => sum + row.total_paise, 0);
    const lentPending = contactRows
      .filter((row) => row.debt_type === 'lent' && row.status === 'pending')
      .reduce((sum, row) => sum + row.total_paise, 0);
    youOwe += borrowedPending;
    owedToYou += lentPending;

    const balance = lentPending - borrowedPending;
    const position =
      balance > 0
        ? `➡️ Owes you ${formatCurrency(balance)}`
        : balance < 0
          ? `⬅️ You owe ${formatCurrency(-balance)}`
          : '✔️ All settled';

    sections.push(
      [
        `👤 ${escapeMarkdown(contact)}`,
        ...contactRows.map(
          (row) =>
            `   ${PERSON_LINE_LABELS[`${row.debt_type}:${row.status}`]}: ${formatCurrency(row.total_paise)} (${row.count})`
        ),
        `   ${position}`,
      ].join('\n')
    );
  }

  return [
    header,
    '',
    sections.join('\n\n'),
    SEPARATOR,
    `📥 You owe: ${formatCurrency(youOwe)}`,
    `📤 Owed to you: ${formatCurrency(owedToYou)}`,
  ].join('\n');
}

function formatDebtLine(debt: DebtRecord): string {
  const parts = [`#${debt.id}`, escapeMarkdown(debt.contact_name), formatCurrency(debt.amount_paise)];
  if (debt.purpose) {
    parts.push(escapeMarkdown(debt.purpose));
  }
  parts.push(`since ${formatShortDate(debt.borrow_date)}`);
  return parts.join(' · ');
}

export function formatPendingDebts(debts: DebtRecord[]): string {
  const header = '⏳ *Pending Loans*';

  if (debts.length === 0) {
    return `${header}\n\nNo pending loans. 🎉`;
  }

  const borrowed = debts.filter((debt) => debt.debt_type === 'borrowed');
  const lent = debts.filter((debt) => debt.debt_type === 'lent');
  const lines = [header];

  if (borrowed.length > 0) {
    lines.push('', '📥 *You borrowed*', ...borrowed.map(formatDebtLine));
  }
  if (lent.length > 0) {
    lines.push('', '📤 *You lent*', ...lent.map(formatDebtLine));
  }

  lines.push('', 'Tap a button below once a loan is returned or received.');
  return lines.join('\n');
}

export function formatTransactionConfirmation(
  kind: TransactionKind,
  amountPaise: number,
  category: string | null,
  note: string | null,
  recordedAt: string
): string {
  const titles: Record<TransactionKind, string> = {
    income: 'Income Recorded',
    expense: 'Expense Recorded',
    savings: 'Savings Credited',
  };

  const lines = [`✅ *${titles[kind]}*`, '', `${KIND_EMOJI[kind]} Amount: ${formatCurrency(amountPaise)}`];
  if (category) {
    lines.push(`🏷️ Category: ${categoryLabel(category)}`);
  }
  lines.push(`📝 Note: ${note ? escapeMarkdown(note) : 'No note'}`, `📅 Date: ${formatDateTime(recordedAt)}`);
  return lines.join('\n');
}

export function formatDebtConfirmation(
  debtType: 'borrowed' | 'lent' | 'settlement',
  amountPaise: number,
  contact: string,
  purpose: string | null
): string {
  const titles = {
    borrowed: '📥 *Borrowed Money Recorded*',
    lent: '📤 *Lent Money Recorded*',
    settlement: '🤝 *Settlement Recorded*',
  };
  const direction = {
    borrowed: 'From',
    lent: 'To',
    settlement: 'With',
  };

  return [
    titles[debtType],
    '',
    `💵 Amount: ${formatCurrency(amountPaise)}`,
    `👤 ${direction[debtType]}: ${escapeMarkdown(contact)}`,
    `📝 Purpose: ${purpose ? escapeMarkdown(purpose) : 'Not specified'}`,
  ].join('\n');
}

export function formatSettledConfirmation(debt: DebtRecord): string {
  const verb = debt.debt_type === 'borrowed' ? 'Returned' : 'Received';
  return [
    `✅ *Loan ${verb}*`,
    '',
    `👤 ${escapeMarkdown(debt.contact_name)}`,
    `💵 Amount: ${formatCurrency(debt.amount_paise)}`,
    `📅 Settled: ${debt.return_date ? formatDateTime(debt.return_date) : 'today'}`,
  ].join('\n');
}

export function formatSettings(settings: UserSettings, timezone: string): string {
  return [
    '⚙️ *Settings*',
    '',
    `🔔 Daily report: ${settings.daily_report ? '✅ On' : '❌ Off'}`,
    `⏰ Report time: ${settings.report_time} (${escapeMarkdown(timezone)})`,
  ].join('\n');
}
