import { Hours, Money } from './number';

export type LocalDate = string; // YYYY-MM-DD
export type LocalTime = string; // HH:MM, 24h

/** 0 = Monday … 6 = Sunday */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;
export const SUNDAY: Weekday = 6;

export type LeaveDesignation = 'Annual' | 'Sick' | 'Holiday' | 'Credit' | 'Comp' | 'LWOP';
export const LEAVE_DESIGNATIONS: readonly LeaveDesignation[] = [
  'Annual',
  'Sick',
  'Holiday',
  'Credit',
  'Comp',
  'LWOP',
];

export type SupplementalHours = Record<string, Hours>; // e.g. { OJTI: 2, CIC: 1.5 }

export type ScheduleEntry = {
  year: number;
  weekday: Weekday;
  isWorkday: boolean;
  startTime?: LocalTime | null;
  endTime?: LocalTime | null; // <= startTime means the shift crosses midnight
};

export type Holiday = {
  year: number;
  name: string;
  date: LocalDate; // calendar date, before the slide rule
};

export type ShiftEntry = {
  date: LocalDate;
  startTime?: LocalTime | null;
  endTime?: LocalTime | null;
  leave?: LeaveDesignation | null;
  supplementalHours: SupplementalHours;
};

// ---------- issues (non-fatal findings returned as data) ----------

export type IssueLevel = 'INFO' | 'WARNING' | 'ERROR';

export type PayrollIssueCode =
  | 'MISSING_SCHEDULE'
  | 'AMBIGUOUS_SHIFT_BOUNDARY'
  | 'UNRESOLVED_GAP'
  | 'MISSING_REFERENCE_RATE'
  | 'ARITHMETIC_MISMATCH'
  | 'NEW_EARNINGS_CODE'
  | 'NEW_DEDUCTION_CODE'
  | 'MISSING_DEDUCTION_CODE';

export type PayrollIssue = {
  level: IssueLevel;
  code: PayrollIssueCode;
  message: string;
  date?: LocalDate;
  meta?: Record<string, unknown>;
};

// ---------- daily engine output ----------

export type ShiftBoundary = 'SAME_DAY' | 'STARTED_PREVIOUS_DAY' | 'ENDS_NEXT_DAY';

export type DailyBucket = {
  date: LocalDate;
  workedHours: Hours;
  regularHours: Hours;
  overtimeHours: Hours;
  nightHours: Hours;
  sundayHours: Hours;
  holidayWorkedHours: Hours;
  holidayLeaveHours: Hours; // paid, uncharged
  chargedLeaveHours: Hours; // charged to `leave`
  gapHours: Hours; // scheduled but neither worked nor designated
  leave: LeaveDesignation | null;
  isWorkday: boolean;
  isObservedHoliday: boolean;
  boundary: ShiftBoundary;
  supplementalHours: SupplementalHours;
  issues: PayrollIssue[];
};

// ---------- paycheck lines ----------

export type EarningsCategory =
  | 'REGULAR'
  | 'INCENTIVE'
  | 'FLSA_PREMIUM'
  | 'TRUE_OVERTIME'
  | 'NIGHT'
  | 'SUNDAY'
  | 'HOLIDAY_WORKED'
  | 'SUPPLEMENTAL'
  | 'OTHER';

export type DeductionCategory =
  | 'FEDERAL_TAX'
  | 'STATE_TAX'
  | 'OASDI'
  | 'MEDICARE'
  | 'RETIREMENT'
  | 'TSP'
  | 'OTHER';

export type DeductionBasis = 'PERCENT' | 'FIXED';

export type EarningsLine = {
  type: string; // label as printed on the statement
  category: EarningsCategory;
  rate: Money;
  hours: Hours;
  currentAmount: Money;
  adjustedAmount?: Money;
  ytdAmount?: Money | null; // null = unknown
};

export type DeductionLine = {
  type: string;
  category: DeductionCategory;
  basis: DeductionBasis;
  currentAmount: Money;
  adjustedAmount?: Money;
  ytdAmount?: Money | null;
};

export type LeaveLine = {
  type: string;
  start: number; // hours.minutes notation
  earned: number;
  used: number;
  end: number;
};

export type ReferenceSource = 'SELF' | 'FALLBACK' | 'NONE';

export type ReferenceContext = {
  paycheckId?: string;
  baseRate: Money;
  earnings: EarningsLine[];
  deductions: DeductionLine[];
  leave: LeaveLine[];
  referenceGross?: Money; // declared gross of the reference paycheck
  source: ReferenceSource;
};

export type PeriodMeta = {
  periodEnding: LocalDate;
  payDate?: LocalDate;
  agency?: string;
};

export type PaycheckBreakdown = {
  meta: PeriodMeta;
  baseRate: Money;
  earnings: EarningsLine[];
  deductions: DeductionLine[];
  leave: LeaveLine[];
  chargedLeave: Partial<Record<LeaveDesignation, Hours>>; // informational
  grossPay: Money;
  totalDeductions: Money;
  netPay: Money;
  remarks: string;
  reliable: boolean;
  issues: PayrollIssue[];
};

// ---------- declared (official) paycheck ----------

export type DeclaredEarningsRow = {
  type: string;
  rate: Money;
  hoursCurrent: Hours;
  hoursAdjusted: Hours;
  amountCurrent: Money;
  amountAdjusted: Money;
  amountYtd: Money;
};

export type DeclaredDeductionRow = {
  type: string;
  amountCurrent: Money;
  amountAdjusted: Money;
  amountYtd: Money;
};

export type DeclaredPaycheck = {
  id: string;
  payDate: LocalDate;
  periodEnding: LocalDate;
  agency?: string;
  remarks?: string;
  grossPay: Money;
  totalDeductions: Money;
  netPay: Money;
  earnings: DeclaredEarningsRow[];
  deductions: DeclaredDeductionRow[];
  leave: LeaveLine[];
};

/** fieldKey → diagnostic; empty means internally consistent */
export type AuditFlags = Record<string, string>;

// ---------- ledger ----------

export type LedgerStatus = 'UNAUDITED' | 'BALANCED' | 'GOV_OWES_YOU' | 'BACKPAY';

export type LedgerPeriod = {
  paycheckId: string;
  periodEnding: LocalDate;
  declaredGross: Money;
};

export type LedgerRow = {
  paycheckId: string;
  periodEnding: LocalDate;
  expectedGross: Money | null; // null when unaudited
  actualGross: Money;
  diff: Money; // actual - expected
  runningBalance: Money;
  status: LedgerStatus;
  reliable: boolean;
};

// ---------- timesheet edits ----------

export type ShiftEdit =
  | { date: LocalDate; field: 'startTime' | 'endTime'; value: LocalTime | null }
  | { date: LocalDate; field: 'leave'; value: LeaveDesignation | null }
  | { date: LocalDate; field: 'supplementalHours'; category: string; value: Hours };

export type ShiftFieldDiff = {
  date: LocalDate;
  field: string; // 'startTime', 'leave', 'supplementalHours.OJTI', …
  before: string | number | null;
  after: string | number | null;
};
