import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import {
  formatDateTime,
  formatLongDate,
  formatShortDate,
  resolvePeriod,
  toHourSlot,
  toLocalTimestamp,
} from './dates';

const now = new Date(2026, 9, 18, 14, 5, 9);

describe('dates', () => {
  it('formats local timestamps and labels', () => {
    expect(toLocalTimestamp(now)).toBe('2026-10-18 14:05:09');
    expect(formatLongDate(now)).toBe('18 October 2026');
    expect(formatShortDate('2026-10-03 08:00:00')).toBe('03 Oct 2026');
    expect(toHourSlot(now)).toBe('14:00');
  });

  it('formats stored timestamps on a 12-hour clock', () => {
    expect(formatDateTime('2026-10-18 14:05:09')).toBe('18 Oct 2026, 02:05 PM');
    expect(formatDateTime('2026-10-18 00:30:00')).toBe('18 Oct 2026, 12:30 AM');
    expect(formatDateTime('not a timestamp')).toBe('not a timestamp');
  });

  it('resolves today as a half-open day range starting at midnight', () => {
    expect(resolvePeriod({ type: 'today' }, now)).toEqual({
      from: '2026-10-18 00:00:00',
      to: '2026-10-19 00:00:00',
      label: '18 October 2026',
    });
  });

  it('resolves the current month', () => {
    expect(resolvePeriod({ type: 'month' }, now)).toEqual({
      from: '2026-10-01 00:00:00',
      to: '2026-11-01 00:00:00',
      label: 'October 2026',
    });
    expect(resolvePeriod({ type: 'month' }, new Date(2026, 11, 31, 23, 59)).to).toBe(
      '2027-01-01 00:00:00'
    );
  });

  it('resolves the last 30 days including today', () => {
    expect(resolvePeriod({ type: 'last30' }, now)).toEqual({
      from: '2026-09-19 00:00:00',
      to: '2026-10-19 00:00:00',
      label: 'Last 30 days',
    });
  });

  it('resolves a single day and an inclusive range', () => {
    expect(resolvePeriod({ type: 'day', date: '2026-10-17' }, now)).toEqual({
      from: '2026-10-17 00:00:00',
      to: '2026-10-18 00:00:00',
      label: '17 October 2026',
    });
    expect(resolvePeriod({ type: 'range', from: '2026-10-01', to: '2026-10-15' }, now)).toEqual({
      from: '2026-10-01 00:00:00',
      to: '2026-10-16 00:00:00',
      label: '01 Oct 2026 to 15 Oct 2026',
    });
  });

  it('rejects impossible dates and reversed ranges', () => {
    expect(() => resolvePeriod({ type: 'day', date: '2026-02-30' }, now)).toThrow(ValidationError);
    expect(() => resolvePeriod({ type: 'range', from: '2026-10-15', to: '2026-10-01' }, now)).toThrow(
      ValidationError
    );
  });
});
