import { z } from 'zod';
import {
  RawHolidayRow,
  RawPaycheckWithRows,
  RawScheduleRow,
  RawShiftEntry,
  rawHolidayRowSchema,
  rawPaycheckSchema,
  rawScheduleRowSchema,
  rawShiftEntrySchema,
} from '../types/backend-raw';
import {
  DeclaredPaycheck,
  DeductionLine,
  EarningsLine,
  Holiday,
  ScheduleEntry,
  ShiftEntry,
  SupplementalHours,
} from './payroll-types';
import { classifyDeduction, classifyEarnings } from '../core/categories';
import { toWeekday } from '../core/clock';
import { PayrollError, PayrollErrorCode } from '../errors';

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new PayrollError({
      code: PayrollErrorCode.INVALID_INPUT,
      message: `[ingest] invalid ${what}: ${summary}`,
      details: { issues: parsed.error.issues },
      originalError: parsed.error,
    });
  }
  return parsed.data;
}

export function canonicalizePaycheck(raw: RawPaycheckWithRows): DeclaredPaycheck {
  const p = parseOrThrow(rawPaycheckSchema, raw, 'paycheck');
  return {
    id: p.id,
    payDate: p.pay_date,
    periodEnding: p.period_ending,
    agency: p.agency ?? undefined,
    remarks: p.remarks ?? undefined,
    grossPay: p.gross_pay,
    totalDeductions: p.total_deductions,
    netPay: p.net_pay,
    earnings: p.earnings.map((e) => ({
      type: e.type,
      rate: e.rate,
      hoursCurrent: e.hours_current,
      hoursAdjusted: e.hours_adjusted,
      amountCurrent: e.amount_current,
      amountAdjusted: e.amount_adjusted,
      amountYtd: e.amount_ytd,
    })),
    deductions: p.deductions.map((d) => ({
      type: d.type,
      amountCurrent: d.amount_current,
      amountAdjusted: d.amount_adjusted,
      amountYtd: d.amount_ytd,
    })),
    leave: p.leave.map((l) => ({
      type: l.type,
      start: l.balance_start,
      earned: l.earned_current,
      used: l.used_current,
      end: l.balance_end,
    })),
  };
}

export function canonicalizeShiftEntry(raw: RawShiftEntry): ShiftEntry {
  const r = parseOrThrow(rawShiftEntrySchema, raw, 'shift entry');
  const supplementalHours: SupplementalHours = {};
  if (r.ojti_hours) supplementalHours.OJTI = r.ojti_hours;
  if (r.cic_hours) supplementalHours.CIC = r.cic_hours;
  return {
    date: r.day_date,
    startTime: r.start_time,
    endTime: r.end_time,
    leave: r.leave_type,
    supplementalHours,
  };
}

export function canonicalizeScheduleRow(raw: RawScheduleRow): ScheduleEntry {
  const r = parseOrThrow(rawScheduleRowSchema, raw, 'schedule row');
  return {
    year: r.year,
    weekday: toWeekday(r.day_of_week),
    isWorkday: r.is_workday,
    startTime: r.start_time,
    endTime: r.end_time,
  };
}

export function canonicalizeHoliday(raw: RawHolidayRow): Holiday {
  const r = parseOrThrow(rawHolidayRowSchema, raw, 'holiday');
  return { year: r.year, name: r.name, date: r.date };
}

// ---------- declared rows -> typed lines ----------

export function toEarningsLines(
  paycheck: DeclaredPaycheck,
  supplementalCategories: string[] = ['OJTI', 'CIC'],
): EarningsLine[] {
  return paycheck.earnings.map((e) => ({
    type: e.type,
    category: classifyEarnings(e.type, supplementalCategories),
    rate: e.rate,
    hours: e.hoursCurrent,
    currentAmount: e.amountCurrent,
    adjustedAmount: e.amountAdjusted,
    ytdAmount: e.amountYtd,
  }));
}

export function toDeductionLines(paycheck: DeclaredPaycheck): DeductionLine[] {
  return paycheck.deductions.map((d) => ({
    type: d.type,
    ...classifyDeduction(d.type),
    currentAmount: d.amountCurrent,
    adjustedAmount: d.amountAdjusted,
    ytdAmount: d.amountYtd,
  }));
}
