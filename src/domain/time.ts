import { DateTime } from 'luxon';

import { ValidationError } from '@agenda/shared';

const MINUTE_MS = 60_000;
const WALL_CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** A calendar day in the business timezone, as the half-open range of instants it covers. */
export interface DayWindow {
  day: string;
  start: Date;
  end: Date;
}

export function addMinutes(instant: Date, minutes: number): Date {
  return new Date(instant.getTime() + minutes * MINUTE_MS);
}

export function minutesBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / MINUTE_MS;
}

/**
 * Reads an ISO 8601 timestamp. Values without an offset are wall-clock times in `zone`.
 */
export function parseTimestamp(value: string, zone: string): Date {
  const parsed = DateTime.fromISO(value, { zone });
  if (!parsed.isValid) {
    throw new ValidationError('start must be an ISO 8601 timestamp: YYYY-MM-DDTHH:MM[:SS]', {
      value
    });
  }

  return parsed.toJSDate();
}

function toWindow(startOfDay: DateTime): DayWindow {
  return {
    day: startOfDay.toISODate() ?? '',
    start: startOfDay.toJSDate(),
    end: startOfDay.plus({ days: 1 }).toJSDate()
  };
}

export function dayWindowOf(instant: Date, zone: string): DayWindow {
  return toWindow(DateTime.fromJSDate(instant, { zone }).startOf('day'));
}

export function dayWindowForDate(date: string, zone: string): DayWindow {
  const parsed = CALENDAR_DATE_PATTERN.test(date) ? DateTime.fromISO(date, { zone }) : null;
  if (!parsed || !parsed.isValid) {
    throw new ValidationError('Invalid date format, expected YYYY-MM-DD', { date });
  }

  return toWindow(parsed.startOf('day'));
}

export function isWallClockTime(value: string): boolean {
  return WALL_CLOCK_PATTERN.test(value);
}

/** The instant at which the wall clock in `zone` reads `time` (HH:mm) on `date`. */
export function atWallClock(date: string, time: string, zone: string): Date {
  const match = WALL_CLOCK_PATTERN.exec(time);
  if (!match) {
    throw new ValidationError('Invalid wall-clock time, expected HH:MM', { time });
  }

  return DateTime.fromISO(date, { zone })
    .set({ hour: Number(match[1]), minute: Number(match[2]), second: 0, millisecond: 0 })
    .toJSDate();
}
