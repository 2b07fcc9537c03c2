import { Holiday, LocalDate, ScheduleEntry, SUNDAY } from '../state/payroll-types';
import { shiftDate, weekdayOf } from './clock';
import { isScheduledWorkday } from './schedule';
import { defaultPayRules } from './rules';

/**
 * Slide rule: a holiday on a regular day off is credited to the nearest workday,
 * forward when it falls on Sunday and backward otherwise.
 *
 * @param searchLimit days tried before giving up; an all-RDO schedule keeps the calendar date
 */
export function resolveObservedHoliday(
  holidayDate: LocalDate,
  schedule: ScheduleEntry[],
  searchLimit = defaultPayRules.holidaySlideLimit,
): LocalDate {
  const wd = weekdayOf(holidayDate);
  if (isScheduledWorkday(schedule, wd)) return holidayDate;

  const direction = wd === SUNDAY ? 1 : -1;
  for (let step = 1; step <= searchLimit; step++) {
    const candidate = shiftDate(holidayDate, step * direction);
    if (isScheduledWorkday(schedule, weekdayOf(candidate))) return candidate;
  }
  return holidayDate;
}

export function observedHolidayDates(
  holidays: Holiday[],
  schedule: ScheduleEntry[],
  searchLimit?: number,
): Set<LocalDate> {
  return new Set(holidays.map((h) => resolveObservedHoliday(h.date, schedule, searchLimit)));
}
