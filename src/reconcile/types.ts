import {
  DeclaredPaycheck,
  Holiday,
  LocalDate,
  PayrollIssue,
  ReferenceContext,
  ScheduleEntry,
  ShiftEntry,
} from '../state/payroll-types';

export type CodeDriftEntry = {
  paycheckId: string;
  previousId: string;
  payDate: LocalDate;
  issues: PayrollIssue[];
};

/**
 * Everything the ledger reads from storage. Implementations must serve a consistent
 * snapshot for the duration of one build.
 */
export interface PayrollSources {
  schedule(year: number): ScheduleEntry[];
  holidays(year: number): Holiday[];
  shiftEntries(periodEnding: LocalDate): ShiftEntry[];
  hasSavedEntries(periodEnding: LocalDate): boolean;
  /** The period's own rates; null when nothing usable is on file. */
  referenceContext(paycheckId: string): ReferenceContext | null;
  declaredPaycheck(paycheckId: string): DeclaredPaycheck | null;
}
