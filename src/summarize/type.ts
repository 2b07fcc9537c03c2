import {
  DailyBucket,
  Holiday,
  LocalDate,
  PaycheckBreakdown,
  PayrollIssue,
  PeriodMeta,
  ReferenceContext,
  ScheduleEntry,
  ShiftEntry,
} from '../state/payroll-types';

export type PeriodSummaryInput = {
  periodEnding: LocalDate;
  entries: ShiftEntry[];
  scheduleFor: (year: number) => ScheduleEntry[];
  holidaysFor: (year: number) => Holiday[];
  reference: ReferenceContext;
  meta?: PeriodMeta; // defaults to { periodEnding }
};

export type PeriodSummary = {
  buckets: DailyBucket[]; // ascending by date
  paycheck: PaycheckBreakdown;
  issues: PayrollIssue[]; // daily issues first, then the synthesizer's
};
