import 'dotenv/config';
import { loadConfig } from './lib/config';
import { createLedgerStore } from './lib/db';
import { errorMessage } from './lib/errors';
import { startDailyReportJobs, type DailyReportJobs } from './lib/jobs/daily-report-queue';
import { MemorySessionStore, createUpstashSessionStore, type SessionStore } from './lib/session/session-store';
import { getTelegramBotClient } from './lib/telegram/bot-client';
import { logEvent } from './lib/utils/logger';
import CommandRouter from './services/command-router';
import ConversationService from './services/conversation-service';
import DailyReportService from './services/daily-report-service';
import LedgerService from './services/ledger-service';
import ReportService from './services/report-service';

async function main(): Promise<void> {
  const config = loadConfig();
  // Day boundaries, report slots and the cron all follow the process time zone
  process.env.TZ = config.timezone;

  const store = createLedgerStore(config.ledger);
  const sessions: SessionStore =
    config.session.driver === 'upstash'
      ? createUpstashSessionStore(config.session.url, config.session.token)
      : new MemorySessionStore();

  const ledger = new LedgerService(store);
  const reports = new ReportService(ledger);
  const conversation = new ConversationService(sessions, ledger);
  const router = new CommandRouter(ledger, reports, conversation, { timezone: config.timezone });
  const client = getTelegramBotClient(config.telegramToken, router);

  let jobs: DailyReportJobs | null = null;
  if (config.redisUrl) {
    const dailyReports = new DailyReportService(ledger, reports, (owner, text) => client.sendText(owner, text));
    jobs = await startDailyReportJobs(dailyReports, config.redisUrl, config.timezone);
  } else {
    logEvent('daily_report_disabled', { reason: 'REDIS_URL not set' }, 'warn');
  }

  const handleShutdown = async (signal: string) => {
    logEvent('shutdown_start', { signal });
    try {
      await client.stop();
      await jobs?.close();
      await store.close();
      logEvent('shutdown_complete', {});
    } catch (error) {
      logEvent('shutdown_error', { error: errorMessage(error) }, 'error');
      process.exitCode = 1;
    }
  };

  process.once('SIGINT', () => {
    handleShutdown('SIGINT').catch((error: unknown) => {
      logEvent('shutdown_error', { error: errorMessage(error) }, 'error');
    });
  });
  process.once('SIGTERM', () => {
    handleShutdown('SIGTERM').catch((error: unknown) => {
      logEvent('shutdown_error', { error: errorMessage(error) }, 'error');
    });
  });

  logEvent('ledger_bot_starting', {
    ledgerDriver: config.ledger.driver,
    sessionStore: config.session.driver,
    timezone: config.timezone,
  });
  await client.start();
}

main().catch((error: unknown) => {
  logEvent('startup_error', { error: errorMessage(error) }, 'fatal');
  process.exit(1);
});
