import { coerceCategory } from '../lib/categories';
import { DEFAULT_REPORT_TIME, type LedgerStore } from '../lib/db/ledger-store';
import { AppError, NotFoundError, StorageError, ValidationError, errorMessage } from '../lib/errors';
import { parseAmountToPaise } from '../lib/utils/currency';
import { resolvePeriod, toLocalTimestamp } from '../lib/utils/dates';
import { logEvent } from '../lib/utils/logger';
import type {
  AggregateRows,
  DebtRecord,
  DebtType,
  LedgerQuery,
  NewDebt,
  OwnerId,
  Period,
  SettleDirection,
  TransactionKind,
  TransactionRecord,
  UserSettings,
} from '../types';

export type Clock = () => Date;

export const REPORT_TIMES = ['06:00', '08:00', '12:00', '18:00', '21:00'] as const;

const MAX_TEXT_LENGTH = 200;

function cleanText(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }
  return trimmed.slice(0, MAX_TEXT_LENGTH);
}

function debtTypeFor(direction: SettleDirection): 'borrowed' | 'lent' {
  return direction === 'returned' ? 'borrowed' : 'lent';
}

class LedgerService {
  constructor(
    private readonly store: LedgerStore,
    private readonly clock: Clock = () => new Date()
  ) {}

  now(): Date {
    return this.clock();
  }

  /**
   * Record an income, expense or savings entry. Returns the new row id.
   */
  async record(
    owner: OwnerId,
    kind: TransactionKind,
    amount: string | number,
    category?: string | null,
    note?: string | null
  ): Promise<number> {
    const entry = await this.recordEntry(owner, kind, amount, category, note);
    return entry.id;
  }

  /** Same as `record`, resolving to the stored row for confirmation messages. */
  async recordEntry(
    owner: OwnerId,
    kind: TransactionKind,
    amount: string | number,
    category?: string | null,
    note?: string | null
  ): Promise<TransactionRecord> {
    const tx = {
      owner,
      kind,
      amount_paise: parseAmountToPaise(amount),
      category: coerceCategory(kind, category),
      note: cleanText(note),
    };
    const createdAt = toLocalTimestamp(this.clock());

    const id = await this.run('transaction_record', { owner, kind }, () =>
      this.store.insertTransaction(tx, createdAt)
    );

    logEvent('transaction_recorded', {
      owner,
      id,
      kind,
      amount_paise: tx.amount_paise,
      category: tx.category,
    });
    return { id, ...tx, created_at: createdAt };
  }

  /**
   * Record money borrowed from or lent to a contact as a pending debt.
   */
  async recordDebt(
    owner: OwnerId,
    debtType: 'borrowed' | 'lent',
    amount: string | number,
    contact: string,
    purpose?: string | null
  ): Promise<number> {
    const entry = await this.recordDebtEntry(owner, debtType, amount, contact, purpose);
    return entry.id;
  }

  /**
   * Log a repayment against a contact that has no pending record to close.
   * Stored already settled.
   */
  async recordSettlement(
    owner: OwnerId,
    amount: string | number,
    contact: string,
    note?: string | null
  ): Promise<number> {
    const entry = await this.recordDebtEntry(owner, 'settlement', amount, contact, note);
    return entry.id;
  }

  async recordDebtEntry(
    owner: OwnerId,
    debtType: DebtType,
    amount: string | number,
    contact: string,
    purpose?: string | null
  ): Promise<NewDebt & { id: number }> {
    const debt: NewDebt = {
      owner,
      debt_type: debtType,
      amount_paise: parseAmountToPaise(amount),
      contact_name: this.requireContact(contact),
      purpose: cleanText(purpose),
    };

    const id = await this.run('debt_record', { owner, debtType }, () =>
      this.store.insertDebt(debt, toLocalTimestamp(this.clock()))
    );

    logEvent('debt_recorded', { owner, id, debtType, amount_paise: debt.amount_paise });
    return { id, ...debt };
  }

  /**
   * Close a pending debt. Throws NotFoundError when the id is not a pending
   * record of the matching type owned by `owner`.
   */
  async settleDebt(owner: OwnerId, debtId: number, direction: SettleDirection): Promise<DebtRecord> {
    const debtType = debtTypeFor(direction);
    const settled = await this.run('debt_settle', { owner, debtId, direction }, () =>
      this.store.settleDebt(owner, debtId, debtType, toLocalTimestamp(this.clock()))
    );

    if (!settled) {
      logEvent('debt_settle_not_found', { owner, debtId, direction }, 'warn');
      throw new NotFoundError(`No pending ${debtType} record ${debtId}`);
    }

    logEvent('debt_settled', { owner, debtId, direction, amount_paise: settled.amount_paise });
    return settled;
  }

  async settle(owner: OwnerId, debtId: number, direction: SettleDirection): Promise<boolean> {
    try {
      await this.settleDebt(owner, debtId, direction);
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Aggregate an owner's ledger grouped by kind, day, category or person.
   */
  async query(owner: OwnerId, filter: LedgerQuery): Promise<AggregateRows> {
    if (filter.groupBy === 'person') {
      const rows = await this.run('ledger_query', { owner, groupBy: filter.groupBy }, () =>
        this.store.personTotals(owner)
      );
      return { groupBy: 'person', rows };
    }

    const grouped = filter;
    const range = resolvePeriod(grouped.period, this.clock());

    return this.run('ledger_query', { owner, groupBy: grouped.groupBy }, async (): Promise<AggregateRows> => {
      switch (grouped.groupBy) {
        case 'kind':
          return { groupBy: 'kind', range, rows: await this.store.kindTotals(owner, range) };
        case 'day':
          return {
            groupBy: 'day',
            range,
            kind: grouped.kind,
            rows: await this.store.dayTotals(owner, grouped.kind, range),
          };
        case 'category':
          return {
            groupBy: 'category',
            range,
            kind: grouped.kind,
            rows: await this.store.categoryTotals(owner, grouped.kind, range),
          };
      }
    });
  }

  async recentTransactions(
    owner: OwnerId,
    limit: number,
    period?: Period
  ): Promise<TransactionRecord[]> {
    const range = period ? resolvePeriod(period, this.clock()) : undefined;
    return this.run('transactions_list', { owner, limit }, () =>
      this.store.recentTransactions(owner, limit, range)
    );
  }

  async pendingDebts(owner: OwnerId, debtType?: 'borrowed' | 'lent'): Promise<DebtRecord[]> {
    return this.run('pending_debts_list', { owner, debtType }, () =>
      this.store.pendingDebts(owner, debtType)
    );
  }

  /**
   * Hard-delete everything stored for `owner`. Irreversible.
   */
  async purgeOwner(owner: OwnerId): Promise<void> {
    await this.run('owner_purge', { owner }, () => this.store.purgeOwner(owner));
    logEvent('owner_purged', { owner }, 'warn');
  }

  async ensureSettings(owner: OwnerId): Promise<void> {
    await this.run('settings_ensure', { owner }, () =>
      this.store.ensureSettings(owner, toLocalTimestamp(this.clock()))
    );
  }

  async getSettings(owner: OwnerId): Promise<UserSettings> {
    const settings = await this.run('settings_get', { owner }, () => this.store.getSettings(owner));
    return settings ?? { owner, daily_report: true, report_time: DEFAULT_REPORT_TIME };
  }

  async setDailyReport(owner: OwnerId, enabled: boolean): Promise<UserSettings> {
    await this.ensureSettings(owner);
    await this.run('settings_update', { owner }, () =>
      this.store.updateSettings(owner, { daily_report: enabled }, toLocalTimestamp(this.clock()))
    );
    logEvent('settings_updated', { owner, daily_report: enabled });
    return this.getSettings(owner);
  }

  async setReportTime(owner: OwnerId, reportTime: string): Promise<UserSettings> {
    if (!REPORT_TIMES.some((time) => time === reportTime)) {
      throw new ValidationError(`Unsupported report time: ${reportTime}`);
    }

    await this.ensureSettings(owner);
    await this.run('settings_update', { owner }, () =>
      this.store.updateSettings(owner, { report_time: reportTime }, toLocalTimestamp(this.clock()))
    );
    logEvent('settings_updated', { owner, report_time: reportTime });
    return this.getSettings(owner);
  }

  async listDailyReportOwners(reportTime: string): Promise<OwnerId[]> {
    return this.run('daily_report_owners', { reportTime }, () =>
      this.store.listDailyReportOwners(reportTime)
    );
  }

  private requireContact(contact: string): string {
    const name = cleanText(contact);
    if (!name) {
      throw new ValidationError('Contact name is required');
    }
    return name;
  }

  /**
   * Run a store call, logging failures and surfacing them as StorageError.
   */
  private async run<T>(
    operation: string,
    data: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      logEvent(`${operation}_error`, { ...data, error: errorMessage(error) }, 'error');
      throw new StorageError(`Storage failure during ${operation}`, { cause: error });
    }
  }
}

export default LedgerService;
