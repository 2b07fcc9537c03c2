import { PayrollSources } from '../types';
import {
  DeclaredPaycheck,
  Holiday,
  LocalDate,
  ScheduleEntry,
  ShiftEntry,
} from '../../state/payroll-types';
import { scheduleForYear } from '../../core/schedule';
import { selectReferenceContext } from '../../state/reference';
import { payPeriodDates } from '../../orchestrator/timesheet';

export type MemorySourcesData = {
  schedules?: ScheduleEntry[];
  holidays?: Holiday[];
  shifts?: ShiftEntry[];
  paychecks?: DeclaredPaycheck[];
};

/**
 * Serves already-canonicalized rows from memory. Shift entries are bucketed into
 * periods by date; reference contexts fall back across paychecks the same way the
 * stored data does.
 */
export function makeMemorySources(data: MemorySourcesData = {}): PayrollSources {
  const schedules = data.schedules ?? [];
  const holidays = data.holidays ?? [];
  const shifts = data.shifts ?? [];
  const paychecks = data.paychecks ?? [];

  const entriesFor = (periodEnding: LocalDate): ShiftEntry[] => {
    const dates = new Set(payPeriodDates(periodEnding));
    return shifts
      .filter((s) => dates.has(s.date))
      .sort((a, b) => a.date.localeCompare(b.date));
  };

  return {
    schedule(year) {
      return scheduleForYear(schedules, year);
    },
    holidays(year) {
      return holidays.filter((h) => h.year === year);
    },
    shiftEntries(periodEnding) {
      return entriesFor(periodEnding);
    },
    hasSavedEntries(periodEnding) {
      return entriesFor(periodEnding).length > 0;
    },
    referenceContext(paycheckId) {
      const ctx = selectReferenceContext(paychecks, paycheckId);
      return ctx.source === 'NONE' ? null : ctx;
    },
    declaredPaycheck(paycheckId) {
      return paychecks.find((p) => p.id === paycheckId) ?? null;
    },
  };
}
