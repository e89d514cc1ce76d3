import { addDays, toDateKey } from '../lib/utils/dates';
import { logEvent } from '../lib/utils/logger';
import type LedgerService from './ledger-service';
import {
  formatCategoryBreakdown,
  formatDailySeries,
  formatPendingDebts,
  formatPersonLedger,
  formatStatement,
  formatSummary,
} from './report-formatter';
import type { DebtRecord, OwnerId, Period } from '../types';

export const MINI_STATEMENT_SIZE = 10;
export const FULL_STATEMENT_LIMIT = 500;

/**
 * Runs the ledger queries behind each report and renders them as text.
 */
class ReportService {
  constructor(private readonly ledger: LedgerService) {}

  async todayReport(owner: OwnerId): Promise<string> {
    return this.summary(owner, { type: 'today' }, "Today's Report", 'Date', false);
  }

  async monthReport(owner: OwnerId): Promise<string> {
    return this.summary(owner, { type: 'month' }, 'Monthly Report', 'Month', true);
  }

  /** Summary of the calendar day before `now`, used by the scheduled push. */
  async previousDayReport(owner: OwnerId): Promise<string> {
    const yesterday = toDateKey(addDays(this.ledger.now(), -1));
    return this.summary(owner, { type: 'day', date: yesterday }, "Yesterday's Report", 'Date', false);
  }

  async dailyExpenses(owner: OwnerId): Promise<string> {
    const result = await this.ledger.query(owner, {
      groupBy: 'day',
      period: { type: 'last30' },
      kind: 'expense',
    });
    if (result.groupBy !== 'day') {
      throw new Error(`Unexpected aggregate shape: ${result.groupBy}`);
    }
    return formatDailySeries(result.range, result.rows);
  }

  async spendingAnalysis(owner: OwnerId): Promise<string> {
    const result = await this.ledger.query(owner, {
      groupBy: 'category',
      period: { type: 'month' },
      kind: 'expense',
    });
    if (result.groupBy !== 'category') {
      throw new Error(`Unexpected aggregate shape: ${result.groupBy}`);
    }
    return formatCategoryBreakdown(result.range, result.rows);
  }

  async miniStatement(owner: OwnerId): Promise<string> {
    const transactions = await this.ledger.recentTransactions(owner, MINI_STATEMENT_SIZE);
    return formatStatement('Mini Statement', `Last ${MINI_STATEMENT_SIZE} transactions`, transactions);
  }

  /**
   * This month's transactions, newest first, capped at FULL_STATEMENT_LIMIT.
   * Long enough to need pagination.
   */
  async fullStatement(owner: OwnerId): Promise<string> {
    // One row past the cap tells whether anything was left out
    const transactions = await this.ledger.recentTransactions(owner, FULL_STATEMENT_LIMIT + 1, {
      type: 'month',
    });
    const truncated = transactions.length > FULL_STATEMENT_LIMIT;
    return formatStatement(
      'Full Statement',
      'This month',
      transactions.slice(0, FULL_STATEMENT_LIMIT),
      truncated ? `Showing the latest ${FULL_STATEMENT_LIMIT} transactions.` : undefined
    );
  }

  async personLedger(owner: OwnerId): Promise<string> {
    const result = await this.ledger.query(owner, { groupBy: 'person' });
    if (result.groupBy !== 'person') {
      throw new Error(`Unexpected aggregate shape: ${result.groupBy}`);
    }
    return formatPersonLedger(result.rows);
  }

  async pendingLoans(owner: OwnerId): Promise<{ text: string; debts: DebtRecord[] }> {
    const debts = await this.ledger.pendingDebts(owner);
    return { text: formatPendingDebts(debts), debts };
  }

  private async summary(
    owner: OwnerId,
    period: Period,
    title: string,
    periodName: 'Date' | 'Month',
    showRates: boolean
  ): Promise<string> {
    const result = await this.ledger.query(owner, { groupBy: 'kind', period });
    if (result.groupBy !== 'kind') {
      throw new Error(`Unexpected aggregate shape: ${result.groupBy}`);
    }

    logEvent('report_generated', { owner, title, rows: result.rows.length }, 'debug');
    return formatSummary({ title, periodName, range: result.range, rows: result.rows, showRates });
  }
}

export default ReportService;
