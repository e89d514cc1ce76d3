import type {
  CategoryTotal,
  DateRange,
  DayTotal,
  DebtRecord,
  KindTotal,
  NewDebt,
  NewTransaction,
  OwnerId,
  PersonTotal,
  TransactionKind,
  TransactionRecord,
  UserSettings,
} from '../../types';

export const DEFAULT_REPORT_TIME = '06:00';

export type SettingsPatch = Partial<Pick<UserSettings, 'daily_report' | 'report_time'>>;

/**
 * Persistence driver for the ledger. Timestamps arrive pre-formatted as local
 * `YYYY-MM-DD HH:mm:ss` strings; drivers never read the clock themselves.
 */
export interface LedgerStore {
  insertTransaction(tx: NewTransaction, createdAt: string): Promise<number>;
  insertDebt(debt: NewDebt, createdAt: string): Promise<number>;

  /** Move one pending row of `debtType` to settled. Resolves null when nothing matched. */
  settleDebt(
    owner: OwnerId,
    id: number,
    debtType: 'borrowed' | 'lent',
    settledAt: string
  ): Promise<DebtRecord | null>;

  kindTotals(owner: OwnerId, range: DateRange): Promise<KindTotal[]>;
  dayTotals(owner: OwnerId, kind: TransactionKind, range: DateRange): Promise<DayTotal[]>;
  categoryTotals(owner: OwnerId, kind: TransactionKind, range: DateRange): Promise<CategoryTotal[]>;
  personTotals(owner: OwnerId): Promise<PersonTotal[]>;

  recentTransactions(owner: OwnerId, limit: number, range?: DateRange): Promise<TransactionRecord[]>;
  pendingDebts(owner: OwnerId, debtType?: 'borrowed' | 'lent'): Promise<DebtRecord[]>;

  /** Delete every transaction, debt and settings row of `owner` in one unit. */
  purgeOwner(owner: OwnerId): Promise<void>;

  ensureSettings(owner: OwnerId, createdAt: string): Promise<void>;
  getSettings(owner: OwnerId): Promise<UserSettings | null>;
  updateSettings(owner: OwnerId, patch: SettingsPatch, updatedAt: string): Promise<void>;
  listDailyReportOwners(reportTime: string): Promise<OwnerId[]>;

  close(): Promise<void>;
}
