import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { LedgerStore, SettingsPatch } from './ledger-store';
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

// PostgREST serialises bigint/numeric aggregates inconsistently across versions
const count = z.coerce.number().int();

const kindSchema = z.enum(['income', 'expense', 'savings']);
const debtTypeSchema = z.enum(['borrowed', 'lent', 'settlement']);
const statusSchema = z.enum(['pending', 'settled']);

const idRowSchema = z.object({ id: count });

const transactionSchema = z.object({
  id: count,
  owner: z.string(),
  kind: kindSchema,
  amount_paise: count,
  category: z.string().nullable(),
  note: z.string().nullable(),
  created_at: z.string(),
});

const debtSchema = z.object({
  id: count,
  owner: z.string(),
  debt_type: debtTypeSchema,
  amount_paise: count,
  contact_name: z.string(),
  purpose: z.string().nullable(),
  status: statusSchema,
  borrow_date: z.string(),
  return_date: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const kindTotalSchema = z.object({ kind: kindSchema, total_paise: count, count });
const dayTotalSchema = z.object({ day: z.string(), total_paise: count, count });
const categoryTotalSchema = z.object({ category: z.string(), total_paise: count, count });
const personTotalSchema = z.object({
  contact_name: z.string(),
  debt_type: debtTypeSchema,
  status: statusSchema,
  total_paise: count,
  count,
});

const settingsSchema = z.object({
  owner: z.string(),
  daily_report: z.boolean(),
  report_time: z.string(),
});

function check(error: { message: string } | null): void {
  if (error) {
    throw new Error(`Database error: ${error.message}`);
  }
}

/**
 * Ledger driver backed by Supabase (Postgres). Grouped reports and the owner
 * purge run as SQL functions from supabase/migrations so each is one statement
 * on the server.
 */
export class SupabaseLedgerStore implements LedgerStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async insertTransaction(tx: NewTransaction, createdAt: string): Promise<number> {
    const { data, error } = await this.supabase
      .from('transactions')
      .insert([{ ...tx, created_at: createdAt }])
      .select('id')
      .single();
    check(error);
    return idRowSchema.parse(data).id;
  }

  async insertDebt(debt: NewDebt, createdAt: string): Promise<number> {
    const settled = debt.debt_type === 'settlement';
    const { data, error } = await this.supabase
      .from('debt_records')
      .insert([{
        ...debt,
        status: settled ? 'settled' : 'pending',
        borrow_date: createdAt,
        return_date: settled ? createdAt : null,
        created_at: createdAt,
        updated_at: createdAt,
      }])
      .select('id')
      .single();
    check(error);
    return idRowSchema.parse(data).id;
  }

  async settleDebt(
    owner: OwnerId,
    id: number,
    debtType: 'borrowed' | 'lent',
    settledAt: string
  ): Promise<DebtRecord | null> {
    const { data, error } = await this.supabase
      .from('debt_records')
      .update({ status: 'settled', return_date: settledAt, updated_at: settledAt })
      .eq('id', id)
      .eq('owner', owner)
      .eq('debt_type', debtType)
      .eq('status', 'pending')
      .select('*');
    check(error);
    const rows = z.array(debtSchema).parse(data ?? []);
    return rows[0] ?? null;
  }

  async kindTotals(owner: OwnerId, range: DateRange): Promise<KindTotal[]> {
    const { data, error } = await this.supabase.rpc('ledger_kind_totals', {
      p_owner: owner,
      p_from: range.from,
      p_to: range.to,
    });
    check(error);
    return z.array(kindTotalSchema).parse(data ?? []);
  }

  async dayTotals(owner: OwnerId, kind: TransactionKind, range: DateRange): Promise<DayTotal[]> {
    const { data, error } = await this.supabase.rpc('ledger_day_totals', {
      p_owner: owner,
      p_kind: kind,
      p_from: range.from,
      p_to: range.to,
    });
    check(error);
    return z.array(dayTotalSchema).parse(data ?? []);
  }

  async categoryTotals(
    owner: OwnerId,
    kind: TransactionKind,
    range: DateRange
  ): Promise<CategoryTotal[]> {
    const { data, error } = await this.supabase.rpc('ledger_category_totals', {
      p_owner: owner,
      p_kind: kind,
      p_from: range.from,
      p_to: range.to,
    });
    check(error);
    return z.array(categoryTotalSchema).parse(data ?? []);
  }

  async personTotals(owner: OwnerId): Promise<PersonTotal[]> {
    const { data, error } = await this.supabase.rpc('ledger_person_totals', { p_owner: owner });
    check(error);
    return z.array(personTotalSchema).parse(data ?? []);
  }

  async recentTransactions(
    owner: OwnerId,
    limit: number,
    range?: DateRange
  ): Promise<TransactionRecord[]> {
    let query = this.supabase.from('transactions').select('*').eq('owner', owner);
    if (range) {
      query = query.gte('created_at', range.from).lt('created_at', range.to);
    }

    const { data, error } = await query
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .limit(limit);
    check(error);
    return z.array(transactionSchema).parse(data ?? []);
  }

  async pendingDebts(owner: OwnerId, debtType?: 'borrowed' | 'lent'): Promise<DebtRecord[]> {
    let query = this.supabase
      .from('debt_records')
      .select('*')
      .eq('owner', owner)
      .eq('status', 'pending');
    if (debtType) {
      query = query.eq('debt_type', debtType);
    }

    const { data, error } = await query
      .order('borrow_date', { ascending: false })
      .order('id', { ascending: false });
    check(error);
    return z.array(debtSchema).parse(data ?? []);
  }

  async purgeOwner(owner: OwnerId): Promise<void> {
    const { error } = await this.supabase.rpc('ledger_purge_owner', { p_owner: owner });
    check(error);
  }

  async ensureSettings(owner: OwnerId, createdAt: string): Promise<void> {
    const { error } = await this.supabase
      .from('user_settings')
      .upsert(
        [{ owner, created_at: createdAt, updated_at: createdAt }],
        { onConflict: 'owner', ignoreDuplicates: true }
      );
    check(error);
  }

  async getSettings(owner: OwnerId): Promise<UserSettings | null> {
    const { data, error } = await this.supabase
      .from('user_settings')
      .select('owner, daily_report, report_time')
      .eq('owner', owner)
      .maybeSingle();
    check(error);
    return data ? settingsSchema.parse(data) : null;
  }

  async updateSettings(owner: OwnerId, patch: SettingsPatch, updatedAt: string): Promise<void> {
    const { error } = await this.supabase
      .from('user_settings')
      .update({ ...patch, updated_at: updatedAt })
      .eq('owner', owner);
    check(error);
  }

  async listDailyReportOwners(reportTime: string): Promise<OwnerId[]> {
    const { data, error } = await this.supabase
      .from('user_settings')
      .select('owner')
      .eq('daily_report', true)
      .eq('report_time', reportTime)
      .order('owner');
    check(error);
    return z.array(z.object({ owner: z.string() })).parse(data ?? []).map((row) => row.owner);
  }

  async close(): Promise<void> {
    // supabase-js keeps no pooled connection to release
  }
}

export function createSupabaseLedgerStore(url: string, serviceRoleKey: string): SupabaseLedgerStore {
  return new SupabaseLedgerStore(
    createClient(url, serviceRoleKey, { auth: { persistSession: false } })
  );
}
