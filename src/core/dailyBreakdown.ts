import {
  DailyBucket,
  Holiday,
  LeaveDesignation,
  LocalDate,
  LocalTime,
  PayrollIssue,
  ScheduleEntry,
  ShiftBoundary,
  SupplementalHours,
  SUNDAY,
} from '../state/payroll-types';
import { max0 } from '../state/number';
import {
  atWallClock,
  countQuarterHours,
  hourOf,
  hoursBetween,
  shiftInstant,
  weekdayOf,
} from './clock';
import { expectationFor } from './schedule';
import { observedHolidayDates } from './holiday';
import { PayRules, resolveRules } from './rules';

export type DailyBreakdownInput = {
  date: LocalDate;
  startTime?: LocalTime | null;
  endTime?: LocalTime | null;
  leave?: LeaveDesignation | null;
  supplementalHours?: SupplementalHours;
  schedule: ScheduleEntry[]; // entries for the date's year
  holidays: Holiday[]; // calendars around the date's year
};

type WorkedSpan = {
  start: Date;
  end: Date;
  boundary: ShiftBoundary;
};

/**
 * Anchors both times on `date`. When the end is not after the start the shift crossed
 * midnight: a late start (>= overnightStartHour) is taken to have begun the day before,
 * anything else runs into the next day.
 */
function resolveSpan(
  date: LocalDate,
  startTime: LocalTime,
  endTime: LocalTime,
  rules: PayRules,
): WorkedSpan | null {
  let start = atWallClock(date, startTime);
  let end = atWallClock(date, endTime);
  if (start.getTime() === end.getTime()) return null;
  if (end > start) return { start, end, boundary: 'SAME_DAY' };

  if (hourOf(start) >= rules.overnightStartHour) {
    start = shiftInstant(start, -1);
    return { start, end, boundary: 'STARTED_PREVIOUS_DAY' };
  }
  end = shiftInstant(end, 1);
  return { start, end, boundary: 'ENDS_NEXT_DAY' };
}

export function calculateDailyBreakdown(
  input: DailyBreakdownInput,
  config: Partial<PayRules> = {},
): DailyBucket {
  const rules = resolveRules(config);
  const { date, startTime, endTime, schedule, holidays } = input;
  const leave = input.leave ?? null;
  const issues: PayrollIssue[] = [];

  // 1) expectation
  const expectation = expectationFor(schedule, weekdayOf(date));
  if (!expectation.found) {
    issues.push({
      level: 'WARNING',
      code: 'MISSING_SCHEDULE',
      message: `No schedule entry for the weekday of ${date}; treated as a day off.`,
      date,
    });
  }
  const { isWorkday, stdHours } = expectation;

  // 2) holiday
  const isObservedHoliday = observedHolidayDates(holidays, schedule, rules.holidaySlideLimit).has(
    date,
  );

  // 3) worked time and differentials
  let workedHours = 0;
  let nightHours = 0;
  let sundayHours = 0;
  let boundary: ShiftBoundary = 'SAME_DAY';

  const span = startTime && endTime ? resolveSpan(date, startTime, endTime, rules) : null;
  if (span) {
    boundary = span.boundary;
    if (boundary !== 'SAME_DAY') {
      issues.push({
        level: 'INFO',
        code: 'AMBIGUOUS_SHIFT_BOUNDARY',
        message:
          boundary === 'STARTED_PREVIOUS_DAY'
            ? `Shift ${startTime}-${endTime} on ${date} read as starting the previous evening.`
            : `Shift ${startTime}-${endTime} on ${date} read as ending the next morning.`,
        date,
        meta: { boundary },
      });
    }

    workedHours = hoursBetween(span.start, span.end);
    nightHours = countQuarterHours(span.start, span.end, (at) => {
      const h = hourOf(at);
      return h >= rules.nightStartHour || h < rules.nightEndHour;
    });

    if (isWorkday) {
      // touch rule: the scheduled shift earns premium once it touches Sunday
      const touchesSunday =
        weekdayOf(span.start) === SUNDAY || weekdayOf(span.end) === SUNDAY;
      sundayHours = touchesSunday ? Math.min(rules.sundayPremiumCap, workedHours) : 0;
    } else {
      // calendar rule: only the quarter hours that are literally on Sunday
      sundayHours = countQuarterHours(span.start, span.end, (at) => weekdayOf(at) === SUNDAY);
    }
  }

  // 4) gap analysis
  let holidayLeaveHours = 0;
  let chargedLeaveHours = 0;
  let gapHours = 0;
  if (isWorkday) {
    const gap = max0(stdHours - workedHours);
    if (gap > 0 && (leave === 'Holiday' || isObservedHoliday)) {
      holidayLeaveHours = gap;
    } else if (gap > 0 && leave) {
      chargedLeaveHours = gap;
    } else if (gap > 0) {
      gapHours = gap;
      issues.push({
        level: 'WARNING',
        code: 'UNRESOLVED_GAP',
        message: `${gap} scheduled hour(s) on ${date} are neither worked nor covered by leave.`,
        date,
        meta: { gapHours: gap, stdHours, workedHours },
      });
    }
  }

  // 5) core buckets
  const regularHours = isWorkday ? Math.min(rules.dailyRegularCap, workedHours) : 0;
  const overtimeHours = isWorkday ? max0(workedHours - rules.dailyRegularCap) : workedHours;

  // 6) holiday premium, stacked on top of base/overtime
  const holidayWorkedHours =
    isObservedHoliday && workedHours > 0 ? Math.min(rules.holidayPremiumCap, workedHours) : 0;

  return {
    date,
    workedHours,
    regularHours,
    overtimeHours,
    nightHours,
    sundayHours,
    holidayWorkedHours,
    holidayLeaveHours,
    chargedLeaveHours,
    gapHours,
    leave,
    isWorkday,
    isObservedHoliday,
    boundary,
    supplementalHours: { ...(input.supplementalHours ?? {}) },
    issues,
  };
}
