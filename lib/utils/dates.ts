import { ValidationError } from '../errors';
import type { DateRange, Period } from '../../types';

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local wall-clock date as `YYYY-MM-DD`. */
export function toDateKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local wall-clock time as `YYYY-MM-DD HH:mm:ss`, the format every stored timestamp uses. */
export function toLocalTimestamp(date: Date): string {
  return `${toDateKey(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function parseDateKey(dateKey: string): Date {
  const match = DATE_KEY_PATTERN.exec(dateKey);
  if (!match) {
    throw new ValidationError(`Invalid date: ${dateKey}`);
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    throw new ValidationError(`Invalid date: ${dateKey}`);
  }
  return date;
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/** `18 October 2026` */
export function formatLongDate(date: Date): string {
  return `${pad(date.getDate())} ${MONTHS[date.getMonth()]} ${date.getFullYear()}`;
}

/** `October 2026` */
export function formatMonthLabel(date: Date): string {
  return `${MONTHS[date.getMonth()]} ${date.getFullYear()}`;
}

/** `18 Oct 2026` from a date key or stored timestamp. */
export function formatShortDate(value: string): string {
  const date = parseDateKey(value.slice(0, 10));
  return `${pad(date.getDate())} ${MONTHS[date.getMonth()].slice(0, 3)} ${date.getFullYear()}`;
}

/** `18 Oct 2026, 02:05 PM` from a stored timestamp. */
export function formatDateTime(timestamp: string): string {
  const match = TIMESTAMP_PATTERN.exec(timestamp);
  if (!match) {
    return timestamp;
  }
  const hours = Number(match[4]);
  const suffix = hours < 12 ? 'AM' : 'PM';
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  return `${formatShortDate(timestamp)}, ${pad(hour12)}:${match[5]} ${suffix}`;
}

/** Current local hour as a report slot, e.g. `06:00`. */
export function toHourSlot(date: Date): string {
  return `${pad(date.getHours())}:00`;
}

/**
 * Resolve a report period against `now` into a half-open timestamp range
 * `[from, to)` plus a display label.
 */
export function resolvePeriod(period: Period, now: Date): DateRange {
  const today = startOfDay(now);

  switch (period.type) {
    case 'today':
      return {
        from: toLocalTimestamp(today),
        to: toLocalTimestamp(addDays(today, 1)),
        label: formatLongDate(today),
      };

    case 'day': {
      const day = parseDateKey(period.date);
      return {
        from: toLocalTimestamp(day),
        to: toLocalTimestamp(addDays(day, 1)),
        label: formatLongDate(day),
      };
    }

    case 'month': {
      const first = new Date(today.getFullYear(), today.getMonth(), 1);
      const next = new Date(today.getFullYear(), today.getMonth() + 1, 1);
      return {
        from: toLocalTimestamp(first),
        to: toLocalTimestamp(next),
        label: formatMonthLabel(first),
      };
    }

    case 'last30':
      return {
        from: toLocalTimestamp(addDays(today, -29)),
        to: toLocalTimestamp(addDays(today, 1)),
        label: 'Last 30 days',
      };

    case 'range': {
      const from = parseDateKey(period.from);
      const to = parseDateKey(period.to);
      if (to < from) {
        throw new ValidationError(`Range ends before it starts: ${period.from}..${period.to}`);
      }
      return {
        from: toLocalTimestamp(from),
        to: toLocalTimestamp(addDays(to, 1)),
        label: `${formatShortDate(period.from)} to ${formatShortDate(period.to)}`,
      };
    }
  }
}
