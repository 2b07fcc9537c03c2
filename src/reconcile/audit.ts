import { AuditFlags, DeclaredPaycheck, LeaveLine, PayrollIssue } from '../state/payroll-types';
import {
  formatHoursMinutes,
  formatMoney,
  sumCents,
  toCents,
  toMinutes,
} from '../state/number';
import { PayRules, resolveRules } from '../core/rules';

const leaveKey = (l: LeaveLine) => `leave_${l.type}_end`;

const isExempt = (type: string, exempt: string[]) =>
  exempt.some((t) => type.trim().toLowerCase() === t.toLowerCase());

/**
 * Checks a declared statement against its own arithmetic: leave continuity per balance,
 * earnings against gross, gross less deductions against net. An empty result means the
 * statement is consistent, not that it is correct.
 */
export function auditPaycheck(
  paycheck: DeclaredPaycheck,
  config: Partial<PayRules> = {},
): AuditFlags {
  const rules = resolveRules(config);
  const flags: AuditFlags = {};

  for (const l of paycheck.leave) {
    if (isExempt(l.type, rules.exemptLeaveTypes)) continue;
    const computed = toMinutes(l.start) + toMinutes(l.earned) - toMinutes(l.used);
    const declared = toMinutes(l.end);
    const off = Math.abs(computed - declared);
    if (off > rules.leaveToleranceMinutes) {
      flags[leaveKey(l)] =
        `Math Error: ${l.start.toFixed(2)} + ${l.earned.toFixed(2)} - ${l.used.toFixed(2)} ` +
        `should be ${formatHoursMinutes(computed)}, stub says ${l.end.toFixed(2)} (off by ${off} min)`;
    }
  }

  const earnedCents = sumCents(
    paycheck.earnings.map((e) => toCents(e.amountCurrent) + toCents(e.amountAdjusted)),
  );
  const grossCents = toCents(paycheck.grossPay);
  if (Math.abs(earnedCents - grossCents) > rules.moneyToleranceCents) {
    flags.gross_pay = `Sum (${formatMoney(earnedCents / 100)}) != Gross (${formatMoney(paycheck.grossPay)})`;
  }

  const netCents = grossCents - toCents(paycheck.totalDeductions);
  if (Math.abs(netCents - toCents(paycheck.netPay)) > rules.moneyToleranceCents) {
    flags.net_pay = 'Math Error: Gross - Ded != Net';
  }

  return flags;
}

export function auditIssues(paycheck: DeclaredPaycheck, flags: AuditFlags): PayrollIssue[] {
  return Object.entries(flags).map(([field, message]): PayrollIssue => ({
    level: 'WARNING',
    code: 'ARITHMETIC_MISMATCH',
    message,
    date: paycheck.periodEnding,
    meta: { paycheckId: paycheck.id, field },
  }));
}
