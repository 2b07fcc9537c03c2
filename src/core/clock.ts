import { addHours, addMinutes, differenceInMinutes, isValid } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { LocalDate, LocalTime, Weekday } from '../state/payroll-types';
import { PayrollError, PayrollErrorCode } from '../errors';

/**
 * Shift times are wall-clock values with no zone attached. Every instant is built
 * on a fixed zone so that host time zone and DST transitions never move a quarter hour.
 */
export const WALL_CLOCK_ZONE = 'UTC';

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const TIME_RE = /^([01]?\d|2[0-3]):[0-5]\d$/;

export const isLocalTime = (s: string) => TIME_RE.test(s);

function padTime(time: LocalTime): string {
  return time.length === 4 ? `0${time}` : time;
}

export function atWallClock(date: LocalDate, time: LocalTime = '00:00'): Date {
  const d = fromZonedTime(`${date}T${padTime(time)}:00`, WALL_CLOCK_ZONE);
  if (!isValid(d)) {
    throw new PayrollError({
      code: PayrollErrorCode.INVALID_DATE,
      message: `[clock] cannot build an instant from ${date} ${time}`,
      details: { date, time },
    });
  }
  return d;
}

export const toLocalDate = (d: Date): LocalDate => formatInTimeZone(d, WALL_CLOCK_ZONE, 'yyyy-MM-dd');

/** Rejects shapes like 2025-02-30 that a lenient parser would roll over. */
export function isLocalDate(s: string): boolean {
  if (!DATE_RE.test(s)) return false;
  const d = fromZonedTime(`${s}T00:00:00`, WALL_CLOCK_ZONE);
  return isValid(d) && toLocalDate(d) === s;
}

const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];

export function toWeekday(n: number): Weekday {
  const wd = WEEKDAYS.find((w) => w === n);
  if (wd === undefined) {
    throw new PayrollError({
      code: PayrollErrorCode.INVALID_INPUT,
      message: `[clock] weekday out of range: ${n}`,
      details: { weekday: n },
    });
  }
  return wd;
}

export function weekdayOf(date: LocalDate | Date): Weekday {
  const d = typeof date === 'string' ? atWallClock(date) : date;
  // ISO day: 1 = Monday … 7 = Sunday
  return toWeekday(Number(formatInTimeZone(d, WALL_CLOCK_ZONE, 'i')) - 1);
}

export const hourOf = (d: Date) => Number(formatInTimeZone(d, WALL_CLOCK_ZONE, 'H'));

export const yearOf = (date: LocalDate) => Number(date.slice(0, 4));

// addDays works in host-local time; whole-hour steps keep the arithmetic zone-free.
export const shiftInstant = (d: Date, days: number) => addHours(d, 24 * days);

export const shiftDate = (date: LocalDate, days: number): LocalDate =>
  toLocalDate(shiftInstant(atWallClock(date), days));

export const hoursBetween = (start: Date, end: Date) => differenceInMinutes(end, start) / 60;

/** Hours, from `start` to `end` of a time-of-day span; `end <= start` wraps past midnight. */
export function spanHours(start: LocalTime, end: LocalTime): number {
  const s = atWallClock('2000-01-03', start);
  let e = atWallClock('2000-01-03', end);
  if (e <= s) e = shiftInstant(e, 1);
  return hoursBetween(s, e);
}

/**
 * Walks [start, end) in 15-minute increments and credits 0.25h for every increment
 * whose starting instant satisfies `counts`.
 */
export function countQuarterHours(start: Date, end: Date, counts: (at: Date) => boolean): number {
  let quarters = 0;
  for (let cursor = start; cursor < end; cursor = addMinutes(cursor, 15)) {
    if (counts(cursor)) quarters += 1;
  }
  return quarters / 4;
}
