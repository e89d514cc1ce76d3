import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logEvent } from '../utils/logger';
import { DEFAULT_REPORT_TIME, type LedgerStore, type SettingsPatch } from './ledger-store';
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

// Applied in order, tracked by PRAGMA user_version. Only ever append.
const MIGRATIONS: string[] = [
  `
    CREATE TABLE IF NOT EXISTS transactions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      owner TEXT NOT NULL,
      kind TEXT NOT NULL CHECK (kind IN ('income', 'expense', 'savings')),
      amount_paise INTEGER NOT NULL CHECK (amount_paise > 0),
      category TEXT,
      note TEXT,
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_transactions_owner_created ON transactions(owner, created_at);
  `,
  `
    CREATE TABLE IF NOT EXISTS debt_records (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      owner TEXT NOT NULL,
      debt_type TEXT NOT NULL CHECK (debt_type IN ('borrowed', 'lent', 'settlement')),
      amount_paise INTEGER NOT NULL CHECK (amount_paise > 0),
      contact_name TEXT NOT NULL,
      purpose TEXT,
      status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'settled')),
      borrow_date TEXT NOT NULL,
      return_date TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_debt_records_owner_status ON debt_records(owner, status);
  `,
  `
    CREATE TABLE IF NOT EXISTS user_settings (
      owner TEXT PRIMARY KEY,
      daily_report INTEGER NOT NULL DEFAULT 1,
      report_time TEXT NOT NULL DEFAULT '${DEFAULT_REPORT_TIME}',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_user_settings_daily ON user_settings(daily_report, report_time);
  `,
];

interface SettingsRow {
  owner: string;
  daily_report: number;
  report_time: string;
}

export class SqliteLedgerStore implements LedgerStore {
  private db: Database.Database;

  constructor(filename: string = ':memory:') {
    if (filename !== ':memory:') {
      const dir = path.dirname(filename);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
    this.migrate();
  }

  private migrate(): void {
    const current = Number(this.db.pragma('user_version', { simple: true }));

    for (let version = current; version < MIGRATIONS.length; version++) {
      this.db.transaction(() => {
        this.db.exec(MIGRATIONS[version]);
        this.db.pragma(`user_version = ${version + 1}`);
      })();
      logEvent('sqlite_migration_applied', { version: version + 1 }, 'debug');
    }
  }

  async insertTransaction(tx: NewTransaction, createdAt: string): Promise<number> {
    const result = this.db
      .prepare(
        `INSERT INTO transactions (owner, kind, amount_paise, category, note, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(tx.owner, tx.kind, tx.amount_paise, tx.category, tx.note, createdAt);
    return Number(result.lastInsertRowid);
  }

  async insertDebt(debt: NewDebt, createdAt: string): Promise<number> {
    const status = debt.debt_type === 'settlement' ? 'settled' : 'pending';
    const returnDate = debt.debt_type === 'settlement' ? createdAt : null;

    const result = this.db
      .prepare(
        `INSERT INTO debt_records
           (owner, debt_type, amount_paise, contact_name, purpose, status,
            borrow_date, return_date, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        debt.owner,
        debt.debt_type,
        debt.amount_paise,
        debt.contact_name,
        debt.purpose,
        status,
        createdAt,
        returnDate,
        createdAt,
        createdAt
      );
    return Number(result.lastInsertRowid);
  }

  async settleDebt(
    owner: OwnerId,
    id: number,
    debtType: 'borrowed' | 'lent',
    settledAt: string
  ): Promise<DebtRecord | null> {
    return this.db.transaction((): DebtRecord | null => {
      const { changes } = this.db
        .prepare(
          `UPDATE debt_records
             SET status = 'settled', return_date = ?, updated_at = ?
           WHERE id = ? AND owner = ? AND debt_type = ? AND status = 'pending'`
        )
        .run(settledAt, settledAt, id, owner, debtType);

      if (changes === 0) {
        return null;
      }

      return (
        this.db
          .prepare<[number], DebtRecord>('SELECT * FROM debt_records WHERE id = ?')
          .get(id) ?? null
      );
    })();
  }

  async kindTotals(owner: OwnerId, range: DateRange): Promise<KindTotal[]> {
    return this.db
      .prepare<[string, string, string], KindTotal>(
        `SELECT kind, SUM(amount_paise) AS total_paise, COUNT(*) AS count
           FROM transactions
          WHERE owner = ? AND created_at >= ? AND created_at < ?
          GROUP BY kind
          ORDER BY kind`
      )
      .all(owner, range.from, range.to);
  }

  async dayTotals(owner: OwnerId, kind: TransactionKind, range: DateRange): Promise<DayTotal[]> {
    return this.db
      .prepare<[string, string, string, string], DayTotal>(
        `SELECT substr(created_at, 1, 10) AS day, SUM(amount_paise) AS total_paise, COUNT(*) AS count
           FROM transactions
          WHERE owner = ? AND kind = ? AND created_at >= ? AND created_at < ?
          GROUP BY day
          ORDER BY day DESC`
      )
      .all(owner, kind, range.from, range.to);
  }

  async categoryTotals(
    owner: OwnerId,
    kind: TransactionKind,
    range: DateRange
  ): Promise<CategoryTotal[]> {
    return this.db
      .prepare<[string, string, string, string], CategoryTotal>(
        `SELECT COALESCE(category, 'other') AS category,
                SUM(amount_paise) AS total_paise,
                COUNT(*) AS count
           FROM transactions
          WHERE owner = ? AND kind = ? AND created_at >= ? AND created_at < ?
          GROUP BY COALESCE(category, 'other')
          ORDER BY total_paise DESC, category ASC`
      )
      .all(owner, kind, range.from, range.to);
  }

  async personTotals(owner: OwnerId): Promise<PersonTotal[]> {
    return this.db
      .prepare<[string], PersonTotal>(
        `SELECT contact_name, debt_type, status,
                SUM(amount_paise) AS total_paise,
                COUNT(*) AS count
           FROM debt_records
          WHERE owner = ?
          GROUP BY contact_name, debt_type, status
          ORDER BY contact_name, debt_type, status`
      )
      .all(owner);
  }

  async recentTransactions(
    owner: OwnerId,
    limit: number,
    range?: DateRange
  ): Promise<TransactionRecord[]> {
    if (range) {
      return this.db
        .prepare<[string, string, string, number], TransactionRecord>(
          `SELECT * FROM transactions
            WHERE owner = ? AND created_at >= ? AND created_at < ?
            ORDER BY created_at DESC, id DESC
            LIMIT ?`
        )
        .all(owner, range.from, range.to, limit);
    }

    return this.db
      .prepare<[string, number], TransactionRecord>(
        `SELECT * FROM transactions
          WHERE owner = ?
          ORDER BY created_at DESC, id DESC
          LIMIT ?`
      )
      .all(owner, limit);
  }

  async pendingDebts(owner: OwnerId, debtType?: 'borrowed' | 'lent'): Promise<DebtRecord[]> {
    if (debtType) {
      return this.db
        .prepare<[string, string], DebtRecord>(
          `SELECT * FROM debt_records
            WHERE owner = ? AND status = 'pending' AND debt_type = ?
            ORDER BY borrow_date DESC, id DESC`
        )
        .all(owner, debtType);
    }

    return this.db
      .prepare<[string], DebtRecord>(
        `SELECT * FROM debt_records
          WHERE owner = ? AND status = 'pending'
          ORDER BY borrow_date DESC, id DESC`
      )
      .all(owner);
  }

  async purgeOwner(owner: OwnerId): Promise<void> {
    this.db.transaction(() => {
      this.db.prepare('DELETE FROM transactions WHERE owner = ?').run(owner);
      this.db.prepare('DELETE FROM debt_records WHERE owner = ?').run(owner);
      this.db.prepare('DELETE FROM user_settings WHERE owner = ?').run(owner);
    })();
  }

  async ensureSettings(owner: OwnerId, createdAt: string): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO user_settings (owner, created_at, updated_at)
         VALUES (?, ?, ?)
         ON CONFLICT(owner) DO NOTHING`
      )
      .run(owner, createdAt, createdAt);
  }

  async getSettings(owner: OwnerId): Promise<UserSettings | null> {
    const row = this.db
      .prepare<[string], SettingsRow>(
        'SELECT owner, daily_report, report_time FROM user_settings WHERE owner = ?'
      )
      .get(owner);

    if (!row) {
      return null;
    }

    return {
      owner: row.owner,
      daily_report: row.daily_report === 1,
      report_time: row.report_time,
    };
  }

  async updateSettings(owner: OwnerId, patch: SettingsPatch, updatedAt: string): Promise<void> {
    this.db.transaction(() => {
      if (patch.daily_report !== undefined) {
        this.db
          .prepare('UPDATE user_settings SET daily_report = ?, updated_at = ? WHERE owner = ?')
          .run(patch.daily_report ? 1 : 0, updatedAt, owner);
      }
      if (patch.report_time !== undefined) {
        this.db
          .prepare('UPDATE user_settings SET report_time = ?, updated_at = ? WHERE owner = ?')
          .run(patch.report_time, updatedAt, owner);
      }
    })();
  }

  async listDailyReportOwners(reportTime: string): Promise<OwnerId[]> {
    const rows = this.db
      .prepare<[string], { owner: string }>(
        `SELECT owner FROM user_settings
          WHERE daily_report = 1 AND report_time = ?
          ORDER BY owner`
      )
      .all(reportTime);
    return rows.map((row) => row.owner);
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
