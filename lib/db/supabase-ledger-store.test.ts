import { createClient } from '@supabase/supabase-js';
import { describe, expect, it, vi } from 'vitest';
import { SupabaseLedgerStore } from './supabase-ledger-store';

interface CapturedRequest {
  method: string;
  url: URL;
  body: unknown;
}

/**
 * A real supabase-js client whose fetch answers every request with `body`
 * and records what was sent, so each test sees the PostgREST call it made.
 */
function storeAnswering(body: unknown, status = 200) {
  const requests: CapturedRequest[] = [];
  const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
    requests.push({
      method: init?.method ?? 'GET',
      url: new URL(input instanceof Request ? input.url : String(input)),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    });

    if (body === undefined) {
      return new Response(null, { status: 204 });
    }
    return new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const client = createClient('http://localhost:54321', 'test-secret', {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: fetchMock },
  });
  return { store: new SupabaseLedgerStore(client), requests };
}

const debtRow = {
  id: '7',
  owner: 'owner-1',
  debt_type: 'borrowed',
  amount_paise: '50000',
  contact_name: 'John',
  purpose: null,
  status: 'settled',
  borrow_date: '2026-10-17 09:00:00',
  return_date: '2026-10-18 14:05:00',
  created_at: '2026-10-17 09:00:00',
  updated_at: '2026-10-18 14:05:00',
};

describe('SupabaseLedgerStore', () => {
  it('inserts a transaction and returns its id', async () => {
    const { store, requests } = storeAnswering({ id: '42' }, 201);

    const id = await store.insertTransaction(
      { owner: 'owner-1', kind: 'expense', amount_paise: 50000, category: 'food', note: 'lunch' },
      '2026-10-18 14:05:00'
    );

    expect(id).toBe(42);
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('POST');
    expect(requests[0].url.pathname).toBe('/rest/v1/transactions');
    expect(requests[0].url.searchParams.get('select')).toBe('id');
    expect(requests[0].body).toEqual([
      {
        owner: 'owner-1',
        kind: 'expense',
        amount_paise: 50000,
        category: 'food',
        note: 'lunch',
        created_at: '2026-10-18 14:05:00',
      },
    ]);
  });

  it('stores a settlement already settled', async () => {
    const { store, requests } = storeAnswering({ id: 3 }, 201);

    await store.insertDebt(
      { owner: 'owner-1', debt_type: 'settlement', amount_paise: 20000, contact_name: 'Asha', purpose: null },
      '2026-10-18 14:05:00'
    );

    expect(requests[0].url.pathname).toBe('/rest/v1/debt_records');
    expect(requests[0].body).toEqual([
      {
        owner: 'owner-1',
        debt_type: 'settlement',
        amount_paise: 20000,
        contact_name: 'Asha',
        purpose: null,
        status: 'settled',
        borrow_date: '2026-10-18 14:05:00',
        return_date: '2026-10-18 14:05:00',
        created_at: '2026-10-18 14:05:00',
        updated_at: '2026-10-18 14:05:00',
      },
    ]);
  });

  describe('settleDebt', () => {
    it('only updates a pending row of the owner and type', async () => {
      const { store, requests } = storeAnswering([debtRow]);

      const settled = await store.settleDebt('owner-1', 7, 'borrowed', '2026-10-18 14:05:00');

      expect(settled).toEqual({ ...debtRow, id: 7, amount_paise: 50000 });
      expect(requests[0].method).toBe('PATCH');
      expect(requests[0].url.pathname).toBe('/rest/v1/debt_records');
      expect(requests[0].url.searchParams.get('id')).toBe('eq.7');
      expect(requests[0].url.searchParams.get('owner')).toBe('eq.owner-1');
      expect(requests[0].url.searchParams.get('debt_type')).toBe('eq.borrowed');
      expect(requests[0].url.searchParams.get('status')).toBe('eq.pending');
      expect(requests[0].body).toEqual({
        status: 'settled',
        return_date: '2026-10-18 14:05:00',
        updated_at: '2026-10-18 14:05:00',
      });
    });

    it('resolves null when no pending row matched', async () => {
      const { store } = storeAnswering([]);

      expect(await store.settleDebt('owner-1', 7, 'lent', '2026-10-18 14:05:00')).toBeNull();
    });
  });

  it('calls the kind totals function and coerces bigint text', async () => {
    const { store, requests } = storeAnswering([
      { kind: 'expense', total_paise: '50000', count: '1' },
      { kind: 'income', total_paise: 5000000, count: 1 },
    ]);

    const totals = await store.kindTotals('owner-1', {
      from: '2026-10-18 00:00:00',
      to: '2026-10-19 00:00:00',
      label: '',
    });

    expect(totals).toEqual([
      { kind: 'expense', total_paise: 50000, count: 1 },
      { kind: 'income', total_paise: 5000000, count: 1 },
    ]);
    expect(requests[0].method).toBe('POST');
    expect(requests[0].url.pathname).toBe('/rest/v1/rpc/ledger_kind_totals');
    expect(requests[0].body).toEqual({
      p_owner: 'owner-1',
      p_from: '2026-10-18 00:00:00',
      p_to: '2026-10-19 00:00:00',
    });
  });

  it('passes the kind to the category totals function', async () => {
    const { store, requests } = storeAnswering([{ category: 'food', total_paise: '12000', count: '2' }]);

    const totals = await store.categoryTotals('owner-1', 'expense', {
      from: '2026-10-01 00:00:00',
      to: '2026-11-01 00:00:00',
      label: '',
    });

    expect(totals).toEqual([{ category: 'food', total_paise: 12000, count: 2 }]);
    expect(requests[0].url.pathname).toBe('/rest/v1/rpc/ledger_category_totals');
    expect(requests[0].body).toEqual({
      p_owner: 'owner-1',
      p_kind: 'expense',
      p_from: '2026-10-01 00:00:00',
      p_to: '2026-11-01 00:00:00',
    });
  });

  it('rejects a row outside the known kinds', async () => {
    const { store } = storeAnswering([{ kind: 'bonus', total_paise: '100', count: '1' }]);

    await expect(
      store.kindTotals('owner-1', { from: '2026-10-18 00:00:00', to: '2026-10-19 00:00:00', label: '' })
    ).rejects.toThrow();
  });

  it('purges an owner through one function call', async () => {
    const { store, requests } = storeAnswering(undefined);

    await store.purgeOwner('owner-1');

    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('POST');
    expect(requests[0].url.pathname).toBe('/rest/v1/rpc/ledger_purge_owner');
    expect(requests[0].body).toEqual({ p_owner: 'owner-1' });
  });

  it('lists daily report owners for one slot', async () => {
    const { store, requests } = storeAnswering([{ owner: 'owner-1' }, { owner: 'owner-2' }]);

    expect(await store.listDailyReportOwners('06:00')).toEqual(['owner-1', 'owner-2']);
    expect(requests[0].method).toBe('GET');
    expect(requests[0].url.pathname).toBe('/rest/v1/user_settings');
    expect(requests[0].url.searchParams.get('daily_report')).toBe('eq.true');
    expect(requests[0].url.searchParams.get('report_time')).toBe('eq.06:00');
    expect(requests[0].url.searchParams.get('order')).toBe('owner.asc');
  });

  it('turns an error response into a database error', async () => {
    const { store } = storeAnswering({ message: 'permission denied for table transactions', code: '42501' }, 400);

    await expect(store.purgeOwner('owner-1')).rejects.toThrow(
      'Database error: permission denied for table transactions'
    );
  });
});
