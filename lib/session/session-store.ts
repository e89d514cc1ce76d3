import { Redis } from '@upstash/redis';
import { z } from 'zod';
import { logEvent } from '../utils/logger';
import type { ConversationContext, OwnerId } from '../../types';

/**
 * Where conversation state lives between messages. One entry per owner,
 * no expiry: an entry stays until it is cleared or the backing store is lost.
 */
export interface SessionStore {
  get(owner: OwnerId): Promise<ConversationContext | null>;
  set(owner: OwnerId, context: ConversationContext): Promise<void>;
  clear(owner: OwnerId): Promise<void>;
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<OwnerId, ConversationContext>();

  async get(owner: OwnerId): Promise<ConversationContext | null> {
    const context = this.sessions.get(owner);
    return context ? { ...context } : null;
  }

  async set(owner: OwnerId, context: ConversationContext): Promise<void> {
    this.sessions.set(owner, { ...context });
  }

  async clear(owner: OwnerId): Promise<void> {
    this.sessions.delete(owner);
  }
}

const contextSchema = z.object({
  state: z.enum([
    'idle',
    'awaiting_income_amount',
    'awaiting_expense_detail',
    'awaiting_savings_amount',
    'awaiting_borrow_detail',
    'awaiting_lend_detail',
    'awaiting_settlement_detail',
  ]),
  createdAt: z.number(),
  lastActivity: z.number(),
});

/** The subset of the Upstash client the session store talks to. */
export interface KeyValueClient {
  get(key: string): Promise<unknown>;
  set(key: string, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<unknown>;
}

/**
 * Session store on Upstash Redis, for running several bot processes against
 * the same users.
 */
export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly redis: KeyValueClient,
    private readonly prefix: string = 'conversation:'
  ) {}

  async get(owner: OwnerId): Promise<ConversationContext | null> {
    const stored = await this.redis.get(this.key(owner));
    if (stored === null || stored === undefined) {
      return null;
    }

    // Upstash deserialises JSON values on read; other clients hand back the raw string
    let value: unknown = stored;
    if (typeof stored === 'string') {
      try {
        value = JSON.parse(stored);
      } catch {
        value = null;
      }
    }

    const parsed = contextSchema.safeParse(value);
    if (!parsed.success) {
      logEvent('session_payload_invalid', { owner, issues: parsed.error.issues.length }, 'warn');
      await this.clear(owner);
      return null;
    }
    return parsed.data;
  }

  async set(owner: OwnerId, context: ConversationContext): Promise<void> {
    await this.redis.set(this.key(owner), JSON.stringify(context));
  }

  async clear(owner: OwnerId): Promise<void> {
    await this.redis.del(this.key(owner));
  }

  private key(owner: OwnerId): string {
    return `${this.prefix}${owner}`;
  }
}

export function createUpstashSessionStore(url: string, token: string): RedisSessionStore {
  return new RedisSessionStore(new Redis({ url, token }));
}
