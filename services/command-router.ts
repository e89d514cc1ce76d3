import { EXPENSE_CATEGORIES, INCOME_CATEGORIES } from '../lib/categories';
import { NotFoundError, ValidationError, errorMessage } from '../lib/errors';
import { logEvent } from '../lib/utils/logger';
import { escapeMarkdown } from '../lib/utils/text';
import { parseCommand, type ParsedCommand, type ReportName } from './command-parser';
import type ConversationService from './conversation-service';
import type { AwaitingState } from './conversation-service';
import type LedgerService from './ledger-service';
import {
  ACTIONS,
  SETTINGS_TIME_PREFIX,
  SETTLE_RECEIVED_PREFIX,
  SETTLE_RETURNED_PREFIX,
  backMenu,
  cancelMenu,
  loansMenu,
  mainMenu,
  pendingDebtsMenu,
  reportsMenu,
  resetConfirmMenu,
  settingsMenu,
} from './menus';
import { formatSettings, formatSettledConfirmation, formatTransactionConfirmation } from './report-formatter';
import type ReportService from './report-service';
import type { BotReply, ButtonRows, OwnerId, SettleDirection } from '../types';

export const WELCOME_TEXT = [
  '👋 *Welcome to Paisa Ledger!*',
  '',
  'Track income, expenses, savings and loans right here.',
  '',
  '*Quick Commands:*',
  '• `salary credited 50000`',
  '• `spend 500 food lunch`',
  '• `credit savings 5000`',
  '',
  '*Choose an option:*',
].join('\n');

export const HELP_TEXT = [
  '📖 *Help - How to Use*',
  '',
  '*📝 Text Commands:*',
  '• `salary credited <amount>` or `salary <amount>`',
  '• `income <amount> [category] [note]`',
  '• `spend <amount> [category] [note]`',
  '• `credit savings <amount> [note]` or `save <amount> [note]`',
  '• `today report`, `month report`',
  '• `statement`, `full statement`',
  '• `cancel` stops an entry in progress',
  '',
  '*🏷️ Categories:*',
  `• Expense: ${EXPENSE_CATEGORIES.join(', ')}`,
  `• Income: ${INCOME_CATEGORIES.join(', ')}`,
  '• If the first word after the amount is not a category, the words are kept as the note',
  '• Expense notes are then sorted by keyword (`lunch` → food), anything else is `other`',
  '',
  '*🔘 Buttons:*',
  '• *Add Income / Expense / Savings* - guided entry',
  '• *Reports* - daily, monthly and category summaries',
  '• *Loans* - money borrowed and lent, settle when repaid',
  '• *Settings* - daily report on or off, and its time',
  '• *Reset All* - delete all your data',
].join('\n');

const UNKNOWN_TEXT = [
  '❌ Unknown command.',
  '',
  'Use the buttons below or type:',
  '• `salary credited 5000`',
  '• `spend 500 lunch`',
  '• `credit savings 2000`',
].join('\n');

export const FAILURE_TEXT = '❌ Something went wrong. Please try again.';
export const NOT_FOUND_TEXT = '❌ That loan was not found or is already settled.';

// Keyed by callback data, which the client controls: Map lookups never reach Object.prototype
const ENTRY_ACTIONS = new Map<string, AwaitingState>([
  [ACTIONS.menuIncome, 'awaiting_income_amount'],
  [ACTIONS.menuExpense, 'awaiting_expense_detail'],
  [ACTIONS.menuSavings, 'awaiting_savings_amount'],
  [ACTIONS.loanBorrow, 'awaiting_borrow_detail'],
  [ACTIONS.loanLend, 'awaiting_lend_detail'],
  [ACTIONS.loanSettlement, 'awaiting_settlement_detail'],
]);

type ReportAction = (reports: ReportService, owner: OwnerId) => Promise<string>;

const REPORT_ACTIONS = new Map<string, ReportAction>([
  [ACTIONS.reportToday, (reports, owner) => reports.todayReport(owner)],
  [ACTIONS.reportMonth, (reports, owner) => reports.monthReport(owner)],
  [ACTIONS.reportDailyExpenses, (reports, owner) => reports.dailyExpenses(owner)],
  [ACTIONS.reportSpending, (reports, owner) => reports.spendingAnalysis(owner)],
  [ACTIONS.reportMiniStatement, (reports, owner) => reports.miniStatement(owner)],
  [ACTIONS.reportFullStatement, (reports, owner) => reports.fullStatement(owner)],
  [ACTIONS.loanLedger, (reports, owner) => reports.personLedger(owner)],
]);

function reply(text: string, buttons: ButtonRows = mainMenu()): BotReply {
  return { text, buttons };
}

export interface CommandRouterOptions {
  /** Shown on the settings screen next to the report time */
  timezone: string;
}

/**
 * Maps incoming text, commands and button actions to ledger writes and report
 * reads. Knows nothing about the chat transport.
 */
class CommandRouter {
  constructor(
    private readonly ledger: LedgerService,
    private readonly reports: ReportService,
    private readonly conversation: ConversationService,
    private readonly options: CommandRouterOptions
  ) {}

  /** `/start`: ends any entry in progress and shows the main menu. */
  async handleStart(owner: OwnerId): Promise<BotReply> {
    return this.guard(owner, 'start', async () => {
      await this.conversation.resetConversation(owner);
      return reply(WELCOME_TEXT);
    });
  }

  async handleHelp(owner: OwnerId): Promise<BotReply> {
    return this.guard(owner, 'help', async () => reply(HELP_TEXT));
  }

  async handleCancel(owner: OwnerId): Promise<BotReply> {
    return this.guard(owner, 'cancel', () => this.cancel(owner));
  }

  async handleText(owner: OwnerId, text: string): Promise<BotReply> {
    return this.guard(owner, 'text', async () => {
      const command = parseCommand(text);
      if (command.type === 'cancel') {
        return this.cancel(owner);
      }

      const outcome = await this.conversation.processMessage(owner, text);
      switch (outcome.status) {
        case 'completed':
          return reply(outcome.text);
        case 'invalid':
          return reply(outcome.text, [...cancelMenu(), ...mainMenu()]);
        case 'idle':
          return this.runCommand(owner, command);
      }
    });
  }

  /**
   * Handle a button tap. Any tap ends a guided entry that was in progress;
   * the entry buttons then start a new one.
   */
  async handleAction(owner: OwnerId, action: string): Promise<BotReply> {
    return this.guard(owner, 'action', async () => {
      await this.conversation.resetConversation(owner);

      const entryState = ENTRY_ACTIONS.get(action);
      if (entryState) {
        const prompt = await this.conversation.begin(owner, entryState);
        return reply(prompt, cancelMenu());
      }

      const report = REPORT_ACTIONS.get(action);
      if (report) {
        return reply(await report(this.reports, owner), backMenu());
      }

      if (action.startsWith(SETTLE_RETURNED_PREFIX)) {
        return this.settle(owner, action.slice(SETTLE_RETURNED_PREFIX.length), 'returned');
      }
      if (action.startsWith(SETTLE_RECEIVED_PREFIX)) {
        return this.settle(owner, action.slice(SETTLE_RECEIVED_PREFIX.length), 'received');
      }
      if (action.startsWith(SETTINGS_TIME_PREFIX)) {
        const settings = await this.ledger.setReportTime(owner, action.slice(SETTINGS_TIME_PREFIX.length));
        return reply(formatSettings(settings, this.options.timezone), settingsMenu(settings));
      }

      switch (action) {
        case ACTIONS.backMenu:
          return reply('🏠 *Main Menu*\n\nChoose an option:');
        case ACTIONS.cancel:
          return reply('❌ Cancelled. Nothing was recorded.');
        case ACTIONS.help:
          return reply(HELP_TEXT, backMenu());
        case ACTIONS.menuReports:
          return reply('📊 *Select Report Type*', reportsMenu());
        case ACTIONS.menuLoans:
          return reply('🤝 *Loans*\n\nRecord money you borrow or lend, and settle it when repaid.', loansMenu());
        case ACTIONS.loanPending: {
          const { text, debts } = await this.reports.pendingLoans(owner);
          return reply(text, pendingDebtsMenu(debts));
        }
        case ACTIONS.menuSettings: {
          const settings = await this.ledger.getSettings(owner);
          return reply(formatSettings(settings, this.options.timezone), settingsMenu(settings));
        }
        case ACTIONS.settingsToggleDaily: {
          const current = await this.ledger.getSettings(owner);
          const settings = await this.ledger.setDailyReport(owner, !current.daily_report);
          return reply(formatSettings(settings, this.options.timezone), settingsMenu(settings));
        }
        case ACTIONS.resetConfirm:
          return reply(
            [
              '⚠️ *Reset All Data*',
              '',
              'This will delete ALL your records:',
              '• Income, expenses and savings',
              '• Loans and settlements',
              '• Settings',
              '',
              '❗ This action cannot be undone!',
              '',
              'Are you sure?',
            ].join('\n'),
            resetConfirmMenu()
          );
        case ACTIONS.resetConfirmed:
          await this.ledger.purgeOwner(owner);
          return reply(
            '✅ *All Data Reset Successfully!*\n\nYour account is now clean.\nStart fresh by adding new transactions.'
          );
        default:
          logEvent('unknown_action', { owner, action }, 'warn');
          return reply('⚠️ That button is no longer available.\n\nChoose an option:');
      }
    });
  }

  private async runCommand(owner: OwnerId, command: ParsedCommand): Promise<BotReply> {
    switch (command.type) {
      case 'record': {
        const entry = await this.ledger.recordEntry(
          owner,
          command.kind,
          command.amount,
          command.category,
          command.note
        );
        return reply(
          formatTransactionConfirmation(entry.kind, entry.amount_paise, entry.category, entry.note, entry.created_at)
        );
      }
      case 'report':
        return reply(await this.report(owner, command.report));
      case 'help':
        return reply(HELP_TEXT);
      case 'cancel':
        return this.cancel(owner);
      case 'unknown':
        return reply(UNKNOWN_TEXT);
    }
  }

  private async report(owner: OwnerId, name: ReportName): Promise<string> {
    switch (name) {
      case 'today':
        return this.reports.todayReport(owner);
      case 'month':
        return this.reports.monthReport(owner);
      case 'mini_statement':
        return this.reports.miniStatement(owner);
      case 'full_statement':
        return this.reports.fullStatement(owner);
    }
  }

  private async cancel(owner: OwnerId): Promise<BotReply> {
    const wasActive = await this.conversation.resetConversation(owner);
    return reply(wasActive ? '❌ Cancelled. Nothing was recorded.' : 'Nothing to cancel.');
  }

  private async settle(owner: OwnerId, rawId: string, direction: SettleDirection): Promise<BotReply> {
    const debtId = Number(rawId);
    if (!Number.isSafeInteger(debtId) || debtId <= 0) {
      throw new NotFoundError(`Malformed debt id: ${rawId}`);
    }

    const debt = await this.ledger.settleDebt(owner, debtId, direction);
    const { debts } = await this.reports.pendingLoans(owner);
    return reply(formatSettledConfirmation(debt), pendingDebtsMenu(debts));
  }

  /**
   * Ensure the owner's settings row exists, run the handler, and turn known
   * failures into user-facing replies. Unexpected errors are logged, never shown.
   */
  private async guard(owner: OwnerId, source: string, fn: () => Promise<BotReply>): Promise<BotReply> {
    try {
      await this.ledger.ensureSettings(owner);
      return await fn();
    } catch (error) {
      if (error instanceof ValidationError) {
        return reply(`❌ ${escapeMarkdown(error.message)}\n\nType *help* to see the supported formats.`);
      }
      if (error instanceof NotFoundError) {
        return reply(NOT_FOUND_TEXT);
      }

      logEvent('command_router_error', { owner, source, error: errorMessage(error) }, 'error');
      return reply(FAILURE_TEXT);
    }
  }
}

export default CommandRouter;
