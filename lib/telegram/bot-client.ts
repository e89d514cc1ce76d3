import { Bot, GrammyError, type Context, type InlineKeyboard } from 'grammy';
import type CommandRouter from '../../services/command-router';
import { errorMessage } from '../errors';
import { chunkText } from '../utils/text';
import { logEvent } from '../utils/logger';
import { paginateReply, toInlineKeyboard } from './keyboards';
import type { BotReply, OwnerId } from '../../types';

type RenderMode = 'edit' | 'reply';

const UNEDITABLE_MESSAGE_ERRORS = [
  'message to edit not found',
  "message can't be edited",
  'message_id_invalid',
];

class TelegramBotClient {
  private readonly bot: Bot;
  private isRunning = false;

  constructor(
    token: string,
    private readonly router: CommandRouter
  ) {
    this.bot = new Bot(token);
    this.setupHandlers();
  }

  /**
   * Register commands and start long polling. Resolves once polling stops.
   */
  async start(): Promise<void> {
    await this.bot.api.setMyCommands([
      { command: 'start', description: 'Open the main menu' },
      { command: 'help', description: 'How to use the bot' },
      { command: 'cancel', description: 'Stop the current entry' },
    ]);

    this.isRunning = true;
    await this.bot.start({
      drop_pending_updates: false,
      onStart: (info) => logEvent('telegram_polling_started', { username: info.username }),
    });
    this.isRunning = false;
  }

  async stop(): Promise<void> {
    if (this.isRunning) {
      await this.bot.stop();
      logEvent('telegram_polling_stopped', {});
    }
  }

  /**
   * Push a message outside of any conversation. Rejects when Telegram refuses it.
   */
  async sendText(owner: OwnerId, text: string): Promise<void> {
    for (const chunk of chunkText(text)) {
      await this.bot.api.sendMessage(owner, chunk, { parse_mode: 'Markdown' });
    }
    logEvent('telegram_message_sent', { owner, type: 'push' });
  }

  /**
   * Set up update handlers for the bot
   */
  private setupHandlers(): void {
    this.bot.command('start', (ctx) => this.respond(ctx, 'reply', (owner) => this.router.handleStart(owner)));
    this.bot.command('help', (ctx) => this.respond(ctx, 'reply', (owner) => this.router.handleHelp(owner)));
    this.bot.command('cancel', (ctx) => this.respond(ctx, 'reply', (owner) => this.router.handleCancel(owner)));

    this.bot.on('callback_query:data', async (ctx) => {
      await ctx.answerCallbackQuery();
      const action = ctx.callbackQuery.data;
      await this.respond(ctx, 'edit', (owner) => this.router.handleAction(owner, action));
    });

    this.bot.on('message:text', (ctx) => {
      const text = ctx.message.text;
      return this.respond(ctx, 'reply', (owner) => this.router.handleText(owner, text));
    });

    this.bot.catch((err) => {
      logEvent(
        'telegram_handler_error',
        { updateId: err.ctx.update.update_id, error: errorMessage(err.error) },
        'error'
      );
    });
  }

  private async respond(
    ctx: Context,
    mode: RenderMode,
    handler: (owner: OwnerId) => Promise<BotReply>
  ): Promise<void> {
    const from = ctx.from;
    if (!from) {
      return;
    }

    const owner = String(from.id);
    logEvent('telegram_update_received', { owner, updateId: ctx.update.update_id }, 'debug');

    const reply = await handler(owner);
    await this.render(ctx, reply, mode);
  }

  /**
   * First page edits the tapped message (or answers the text), later pages
   * follow as new messages.
   */
  private async render(ctx: Context, reply: BotReply, mode: RenderMode): Promise<void> {
    const pages = paginateReply(reply);

    for (const [index, page] of pages.entries()) {
      const extra = {
        parse_mode: 'Markdown' as const,
        reply_markup: page.buttons ? toInlineKeyboard(page.buttons) : undefined,
      };

      if (index === 0 && mode === 'edit' && ctx.callbackQuery?.message) {
        await this.editOrReply(ctx, page.text, extra);
      } else {
        await ctx.reply(page.text, extra);
      }
    }
  }

  private async editOrReply(
    ctx: Context,
    text: string,
    extra: { parse_mode: 'Markdown'; reply_markup: InlineKeyboard | undefined }
  ): Promise<void> {
    try {
      await ctx.editMessageText(text, extra);
    } catch (error) {
      if (!(error instanceof GrammyError)) {
        throw error;
      }
      if (error.description.includes('message is not modified')) {
        return;
      }
      if (!UNEDITABLE_MESSAGE_ERRORS.some((reason) => error.description.includes(reason))) {
        throw error;
      }

      logEvent('telegram_edit_fallback', { reason: error.description }, 'debug');
      await ctx.reply(text, extra);
    }
  }
}

let telegramBotClient: TelegramBotClient | undefined;

export function getTelegramBotClient(token: string, router: CommandRouter): TelegramBotClient {
  if (!telegramBotClient) {
    telegramBotClient = new TelegramBotClient(token, router);
  }
  return telegramBotClient;
}

export default TelegramBotClient;
