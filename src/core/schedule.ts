import { ScheduleEntry, Weekday } from '../state/payroll-types';
import { spanHours } from './clock';

export type DayExpectation = {
  isWorkday: boolean;
  stdHours: number;
  startTime: string | null;
  endTime: string | null;
  found: boolean; // false when the weekday has no schedule entry
};

export const NO_EXPECTATION: DayExpectation = {
  isWorkday: false,
  stdHours: 0,
  startTime: null,
  endTime: null,
  found: false,
};

export function scheduleForYear(entries: ScheduleEntry[], year: number): ScheduleEntry[] {
  return entries.filter((e) => e.year === year);
}

export function expectationFor(schedule: ScheduleEntry[], weekday: Weekday): DayExpectation {
  const entry = schedule.find((e) => e.weekday === weekday);
  if (!entry) return NO_EXPECTATION;
  if (!entry.isWorkday) return { ...NO_EXPECTATION, found: true };

  const startTime = entry.startTime || null;
  const endTime = entry.endTime || null;
  return {
    isWorkday: true,
    stdHours: startTime && endTime ? spanHours(startTime, endTime) : 0,
    startTime,
    endTime,
    found: true,
  };
}

export const isScheduledWorkday = (schedule: ScheduleEntry[], weekday: Weekday) =>
  schedule.some((e) => e.weekday === weekday && e.isWorkday);
