import type { LedgerConfig } from '../config';
import { logEvent } from '../utils/logger';
import type { LedgerStore } from './ledger-store';
import { SqliteLedgerStore } from './sqlite-ledger-store';
import { createSupabaseLedgerStore } from './supabase-ledger-store';

export function createLedgerStore(config: LedgerConfig): LedgerStore {
  logEvent('ledger_store_selected', { driver: config.driver });

  if (config.driver === 'supabase') {
    return createSupabaseLedgerStore(config.url, config.serviceRoleKey);
  }
  return new SqliteLedgerStore(config.path);
}
