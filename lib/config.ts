import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_TIMEZONE = 'Asia/Kolkata';
export const DEFAULT_SQLITE_PATH = './data/ledger.db';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: optionalString,
  LEDGER_DRIVER: z.preprocess(blankToUndefined, z.enum(['sqlite', 'supabase']).default('sqlite')),
  SQLITE_PATH: optionalString,
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  SESSION_STORE: z.preprocess(blankToUndefined, z.enum(['memory', 'upstash']).default('memory')),
  UPSTASH_REDIS_REST_URL: optionalString,
  UPSTASH_REDIS_REST_TOKEN: optionalString,
  REDIS_URL: optionalString,
  TZ: optionalString,
});

export type LedgerConfig =
  | { driver: 'sqlite'; path: string }
  | { driver: 'supabase'; url: string; serviceRoleKey: string };

export type SessionConfig =
  | { driver: 'memory' }
  | { driver: 'upstash'; url: string; token: string };

export interface AppConfig {
  telegramToken: string;
  timezone: string;
  ledger: LedgerConfig;
  session: SessionConfig;
  /** BullMQ connection; the daily report job is off without it */
  redisUrl: string | null;
}

function required(name: string, value: string | undefined, reason: string): string {
  if (!value) {
    throw new ConfigError(`${name} is required ${reason}`);
  }
  return value;
}

/**
 * Read configuration from the environment. Throws ConfigError when a value the
 * selected drivers need is missing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid ${issue?.path.join('.') ?? 'environment'}: ${issue?.message ?? 'unknown'}`);
  }
  const vars = parsed.data;

  const telegramToken = required('TELEGRAM_BOT_TOKEN', vars.TELEGRAM_BOT_TOKEN, 'to start the bot');

  const ledger: LedgerConfig =
    vars.LEDGER_DRIVER === 'supabase'
      ? {
          driver: 'supabase',
          url: required('SUPABASE_URL', vars.SUPABASE_URL, 'when LEDGER_DRIVER=supabase'),
          serviceRoleKey: required(
            'SUPABASE_SERVICE_ROLE_KEY',
            vars.SUPABASE_SERVICE_ROLE_KEY,
            'when LEDGER_DRIVER=supabase'
          ),
        }
      : { driver: 'sqlite', path: vars.SQLITE_PATH ?? DEFAULT_SQLITE_PATH };

  const session: SessionConfig =
    vars.SESSION_STORE === 'upstash'
      ? {
          driver: 'upstash',
          url: required('UPSTASH_REDIS_REST_URL', vars.UPSTASH_REDIS_REST_URL, 'when SESSION_STORE=upstash'),
          token: required('UPSTASH_REDIS_REST_TOKEN', vars.UPSTASH_REDIS_REST_TOKEN, 'when SESSION_STORE=upstash'),
        }
      : { driver: 'memory' };

  return {
    telegramToken,
    timezone: vars.TZ ?? DEFAULT_TIMEZONE,
    ledger,
    session,
    redisUrl: vars.REDIS_URL ?? null,
  };
}
