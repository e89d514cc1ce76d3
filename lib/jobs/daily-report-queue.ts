import { Queue, Worker, type ConnectionOptions } from 'bullmq';
import type DailyReportService from '../../services/daily-report-service';
import { ConfigError } from '../errors';
import { toHourSlot } from '../utils/dates';
import { logEvent } from '../utils/logger';

export const DAILY_REPORT_QUEUE = 'daily-reports';
export const DAILY_REPORT_SCHEDULER_ID = 'daily-report-hourly';
export const DAILY_REPORT_JOB = 'daily-report';
// Every hour on the hour; owners whose report_time matches the slot get a push
export const DAILY_REPORT_CRON = '0 * * * *';

/**
 * Turn a redis:// or rediss:// URL into BullMQ connection options.
 */
export function redisConnectionFromUrl(url: string): ConnectionOptions {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new ConfigError(`REDIS_URL is not a valid URL`, { cause: error });
  }
  if (parsed.protocol !== 'redis:' && parsed.protocol !== 'rediss:') {
    throw new ConfigError(`REDIS_URL must use redis:// or rediss://, got ${parsed.protocol}`);
  }

  return {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 6379,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
    // BullMQ workers block on Redis and must not give up on a request
    maxRetriesPerRequest: null,
  };
}

export interface DailyReportJobs {
  queue: Queue;
  worker: Worker;
  close(): Promise<void>;
}

/**
 * Register the hourly scheduler and start the worker that runs each slot.
 */
export async function startDailyReportJobs(
  service: DailyReportService,
  redisUrl: string,
  timezone: string
): Promise<DailyReportJobs> {
  const connection = redisConnectionFromUrl(redisUrl);
  const queue = new Queue(DAILY_REPORT_QUEUE, { connection });

  await queue.upsertJobScheduler(
    DAILY_REPORT_SCHEDULER_ID,
    { pattern: DAILY_REPORT_CRON, tz: timezone },
    { name: DAILY_REPORT_JOB, opts: { removeOnComplete: 24, removeOnFail: 100 } }
  );

  const worker = new Worker(
    DAILY_REPORT_QUEUE,
    async (job) => {
      if (job.name !== DAILY_REPORT_JOB) {
        return null;
      }
      const reportTime = toHourSlot(new Date());
      logEvent('daily_report_job_start', { jobId: job.id, reportTime });
      return service.run(reportTime);
    },
    { connection, concurrency: 1 }
  );

  worker.on('completed', (job) => {
    logEvent('daily_report_job_completed', { jobId: job.id });
  });

  worker.on('failed', (job, err) => {
    logEvent('daily_report_job_failed', { jobId: job?.id, error: err.message }, 'error');
  });

  logEvent('daily_report_scheduler_started', { cron: DAILY_REPORT_CRON, timezone });

  return {
    queue,
    worker,
    async close() {
      await worker.close();
      await queue.close();
    },
  };
}
