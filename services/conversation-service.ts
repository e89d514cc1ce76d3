import { EXPENSE_CATEGORIES } from '../lib/categories';
import { ValidationError } from '../lib/errors';
import type { SessionStore } from '../lib/session/session-store';
import { logEvent } from '../lib/utils/logger';
import { escapeMarkdown } from '../lib/utils/text';
import { parseDebtDetail, parseEntryDetail } from './command-parser';
import type LedgerService from './ledger-service';
import { formatDebtConfirmation, formatTransactionConfirmation } from './report-formatter';
import type { ConversationContext, ConversationState, OwnerId } from '../types';

export type AwaitingState = Exclude<ConversationState, 'idle'>;

export type FlowOutcome =
  | { status: 'idle' }
  | { status: 'completed'; text: string }
  | { status: 'invalid'; state: AwaitingState; text: string };

export const PROMPTS: Record<AwaitingState, string> = {
  awaiting_income_amount:
    '💰 *Add Income*\n\nSend the amount, optionally with a category and note.\nExample: `50000 salary October pay`',
  awaiting_expense_detail:
    '💸 *Add Expense*\n\nSend: `amount [category] [description]`\nExample: `500 food lunch`\n\n' +
    `Categories: ${EXPENSE_CATEGORIES.join(', ')}`,
  awaiting_savings_amount:
    '🏦 *Add Savings*\n\nSend the amount, optionally with a note.\nExample: `5000 emergency fund`',
  awaiting_borrow_detail:
    '📥 *Borrowed Money*\n\nSend: `amount name [purpose]`\nExample: `500 John bike repair`',
  awaiting_lend_detail:
    '📤 *Lent Money*\n\nSend: `amount name [purpose]`\nExample: `1000 Priya rent`',
  awaiting_settlement_detail:
    '🤝 *Record Settlement*\n\nSend: `amount name [note]`\nExample: `300 John part payment`',
};

/**
 * Guided multi-step entry. A button puts the owner in an `awaiting_*` state;
 * their next message is parsed for that state, written to the ledger, and the
 * state returns to idle. Bad input keeps the state and re-prompts.
 */
class ConversationService {
  constructor(
    private readonly sessions: SessionStore,
    private readonly ledger: LedgerService,
    private readonly clock: () => number = Date.now
  ) {}

  /**
   * Get conversation context for a user, idle when nothing is stored
   */
  async getConversationContext(owner: OwnerId): Promise<ConversationContext> {
    const context = await this.sessions.get(owner);
    if (!context) {
      const now = this.clock();
      return { state: 'idle', createdAt: now, lastActivity: now };
    }
    return context;
  }

  /**
   * Start waiting for the owner's next message. Returns the prompt to show.
   */
  async begin(owner: OwnerId, state: AwaitingState): Promise<string> {
    const now = this.clock();
    await this.sessions.set(owner, { state, createdAt: now, lastActivity: now });

    logEvent('conversation_state_updated', { owner, newState: state });
    return PROMPTS[state];
  }

  /**
   * Reset conversation to idle without writing anything
   */
  async resetConversation(owner: OwnerId): Promise<boolean> {
    const context = await this.sessions.get(owner);
    await this.sessions.clear(owner);

    const wasActive = context !== null && context.state !== 'idle';
    if (wasActive) {
      logEvent('conversation_reset', { owner, previousState: context.state });
    }
    return wasActive;
  }

  /**
   * Feed a free-text message to the active entry flow, if any.
   */
  async processMessage(owner: OwnerId, message: string): Promise<FlowOutcome> {
    const context = await this.getConversationContext(owner);
    if (context.state === 'idle') {
      return { status: 'idle' };
    }

    const state = context.state;
    try {
      const text = await this.complete(owner, state, message);
      await this.sessions.clear(owner);

      logEvent('conversation_completed', { owner, state });
      return { status: 'completed', text };
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }

      await this.sessions.set(owner, { ...context, lastActivity: this.clock() });
      logEvent('conversation_invalid_input', { owner, state, reason: error.message });
      return {
        status: 'invalid',
        state,
        text: `❌ ${escapeMarkdown(error.message)}\n\n${PROMPTS[state]}`,
      };
    }
  }

  private async complete(owner: OwnerId, state: AwaitingState, message: string): Promise<string> {
    switch (state) {
      case 'awaiting_income_amount':
      case 'awaiting_expense_detail':
      case 'awaiting_savings_amount': {
        const kind =
          state === 'awaiting_income_amount' ? 'income' : state === 'awaiting_expense_detail' ? 'expense' : 'savings';
        const detail = parseEntryDetail(kind, message);
        const entry = await this.ledger.recordEntry(owner, kind, detail.amount, detail.category, detail.note);
        return formatTransactionConfirmation(kind, entry.amount_paise, entry.category, entry.note, entry.created_at);
      }

      case 'awaiting_borrow_detail':
      case 'awaiting_lend_detail':
      case 'awaiting_settlement_detail': {
        const debtType =
          state === 'awaiting_borrow_detail' ? 'borrowed' : state === 'awaiting_lend_detail' ? 'lent' : 'settlement';
        const detail = parseDebtDetail(message);
        const entry = await this.ledger.recordDebtEntry(
          owner,
          debtType,
          detail.amount,
          detail.contact,
          detail.purpose
        );
        return formatDebtConfirmation(debtType, entry.amount_paise, entry.contact_name, entry.purpose);
      }
    }
  }
}

export default ConversationService;
