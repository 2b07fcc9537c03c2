import { LocalDate, ScheduleEntry, ShiftEntry } from '../state/payroll-types';
import { atWallClock, hoursBetween, shiftDate, weekdayOf, yearOf } from '../core/clock';
import { expectationFor } from '../core/schedule';
import { EnvConfig } from '../config/env';

export const PERIOD_DAYS = 14;
export const DEFAULT_PERIOD_ANCHOR: LocalDate = '2024-12-14';

export const periodAnchorFrom = (env: EnvConfig): LocalDate =>
  env.PAYROLL_PERIOD_ANCHOR ?? DEFAULT_PERIOD_ANCHOR;

/** The fourteen dates of the period ending on `periodEnding`, oldest first. */
export function payPeriodDates(periodEnding: LocalDate): LocalDate[] {
  const dates: LocalDate[] = [];
  for (let back = PERIOD_DAYS - 1; back >= 0; back--) {
    dates.push(shiftDate(periodEnding, -back));
  }
  return dates;
}

/** End of the biweekly period containing `date`, given any one known period end. */
export function periodEndingFor(date: LocalDate, anchor: LocalDate = DEFAULT_PERIOD_ANCHOR): LocalDate {
  const days = Math.round(hoursBetween(atWallClock(anchor), atWallClock(date)) / 24);
  const offset = ((days % PERIOD_DAYS) + PERIOD_DAYS) % PERIOD_DAYS;
  return offset === 0 ? date : shiftDate(date, PERIOD_DAYS - offset);
}

/**
 * One entry per date of the period. Saved entries win; other dates get the scheduled
 * shift for their weekday (empty on a day off) with no leave.
 */
export function buildTimesheet(
  periodEnding: LocalDate,
  saved: ShiftEntry[],
  scheduleFor: (year: number) => ScheduleEntry[],
): ShiftEntry[] {
  const byDate = new Map(saved.map((s) => [s.date, s]));
  return payPeriodDates(periodEnding).map((date) => {
    const existing = byDate.get(date);
    if (existing) return existing;
    const exp = expectationFor(scheduleFor(yearOf(date)), weekdayOf(date));
    return {
      date,
      startTime: exp.isWorkday ? exp.startTime : null,
      endTime: exp.isWorkday ? exp.endTime : null,
      leave: null,
      supplementalHours: {},
    };
  });
}
