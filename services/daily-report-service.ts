import { DeliveryError, errorMessage } from '../lib/errors';
import { logEvent } from '../lib/utils/logger';
import type LedgerService from './ledger-service';
import type ReportService from './report-service';
import type { OwnerId } from '../types';

/** Pushes a message to one owner; rejects when delivery fails. */
export type Notifier = (owner: OwnerId, text: string) => Promise<void>;

export interface DailyReportResult {
  reportTime: string;
  sent: number;
  failed: number;
}

export const DAILY_REPORT_HEADER = '🌅 *Good morning!* Here is how yesterday went.';

/**
 * Sends yesterday's summary to every owner who opted in for `reportTime`.
 * Owners are processed one at a time; a failed delivery is logged and the
 * batch moves on.
 */
class DailyReportService {
  constructor(
    private readonly ledger: LedgerService,
    private readonly reports: ReportService,
    private readonly notify: Notifier
  ) {}

  async run(reportTime: string): Promise<DailyReportResult> {
    const owners = await this.ledger.listDailyReportOwners(reportTime);
    logEvent('daily_report_batch_started', { reportTime, owners: owners.length });

    let sent = 0;
    let failed = 0;

    for (const owner of owners) {
      try {
        await this.deliver(owner);
        sent++;
      } catch (error) {
        failed++;
        const failure =
          error instanceof DeliveryError
            ? error
            : new DeliveryError(owner, `Daily report failed for ${owner}`, { cause: error });
        logEvent('daily_report_delivery_failed', { owner, reportTime, error: errorMessage(failure.cause) }, 'error');
      }
    }

    logEvent('daily_report_batch_finished', { reportTime, sent, failed });
    return { reportTime, sent, failed };
  }

  private async deliver(owner: OwnerId): Promise<void> {
    const report = await this.reports.previousDayReport(owner);
    try {
      await this.notify(owner, `${DAILY_REPORT_HEADER}\n\n${report}`);
    } catch (error) {
      throw new DeliveryError(owner, `Could not deliver daily report to ${owner}`, { cause: error });
    }
  }
}

export default DailyReportService;
