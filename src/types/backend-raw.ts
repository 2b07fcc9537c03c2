import { z } from 'zod';
import { isLocalDate, isLocalTime } from '../core/clock';
import { LEAVE_DESIGNATIONS, LeaveDesignation } from '../state/payroll-types';

// Rows as the storage layer returns them (snake_case, nullable numerics).

const localDate = z.string().refine(isLocalDate, { message: 'expected a YYYY-MM-DD date' });

const amount = z
  .number()
  .finite()
  .nullish()
  .transform((v) => v ?? 0);

const optionalTime = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? v.trim() : null))
  .refine((v) => v === null || isLocalTime(v), { message: 'expected HH:MM (24h)' });

const isLeaveDesignation = (v: string): v is LeaveDesignation =>
  LEAVE_DESIGNATIONS.some((d) => d === v);

const leaveDesignation = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() && v.trim() !== 'None' ? v.trim() : null))
  .refine((v) => v === null || isLeaveDesignation(v), {
    message: `expected one of ${LEAVE_DESIGNATIONS.join(', ')}`,
  })
  .transform((v) => (v !== null && isLeaveDesignation(v) ? v : null));

export const rawEarningsRowSchema = z.object({
  type: z.string().min(1),
  rate: amount,
  hours_current: amount,
  hours_adjusted: amount,
  amount_current: amount,
  amount_adjusted: amount,
  amount_ytd: amount,
});

export const rawDeductionRowSchema = z.object({
  type: z.string().min(1),
  amount_current: amount,
  amount_adjusted: amount,
  amount_ytd: amount,
});

export const rawLeaveRowSchema = z.object({
  type: z.string().min(1),
  balance_start: amount,
  earned_current: amount,
  used_current: amount,
  balance_end: amount,
});

export const rawPaycheckSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  pay_date: localDate,
  period_ending: localDate,
  net_pay: amount,
  gross_pay: amount,
  total_deductions: amount,
  agency: z.string().nullish(),
  remarks: z.string().nullish(),
  earnings: z.array(rawEarningsRowSchema).default([]),
  deductions: z.array(rawDeductionRowSchema).default([]),
  leave: z.array(rawLeaveRowSchema).default([]),
});

/** Mobile-sync / timesheet row. */
export const rawShiftEntrySchema = z.object({
  day_date: localDate,
  start_time: optionalTime,
  end_time: optionalTime,
  leave_type: leaveDesignation,
  ojti_hours: amount,
  cic_hours: amount,
});

export const rawScheduleRowSchema = z.object({
  year: z.number().int(),
  day_of_week: z.number().int().min(0).max(6),
  start_time: optionalTime,
  end_time: optionalTime,
  is_workday: z.union([z.boolean(), z.number()]).transform(Boolean),
});

export const rawHolidayRowSchema = z.object({
  year: z.number().int(),
  name: z.string().min(1),
  date: localDate,
});

export type RawPaycheckWithRows = z.input<typeof rawPaycheckSchema>;
export type RawShiftEntry = z.input<typeof rawShiftEntrySchema>;
export type RawScheduleRow = z.input<typeof rawScheduleRowSchema>;
export type RawHolidayRow = z.input<typeof rawHolidayRowSchema>;
