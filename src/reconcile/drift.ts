import { DeclaredPaycheck, DeductionLine, PayrollIssue } from '../state/payroll-types';
import { Money } from '../state/number';
import { isTaxCategory } from '../core/categories';
import { byDateThenId, codeKey, sumBy } from './helpers';
import { CodeDriftEntry } from './types';

function codes(rows: Array<{ type: string }>): Map<string, string> {
  const m = new Map<string, string>();
  for (const r of rows) m.set(codeKey(r.type), r.type.trim());
  return m;
}

/**
 * Row names that appear or disappear between consecutive statements. A new deduction is
 * the loudest signal: it usually means an allotment or garnishment nobody asked for.
 */
export function compareEarningsAndDeductionCodes(
  previous: DeclaredPaycheck,
  current: DeclaredPaycheck,
): PayrollIssue[] {
  const issues: PayrollIssue[] = [];
  const meta = { previousId: previous.id, paycheckId: current.id };

  const prevEarnings = codes(previous.earnings);
  for (const [key, label] of codes(current.earnings)) {
    if (!prevEarnings.has(key)) {
      issues.push({
        level: 'WARNING',
        code: 'NEW_EARNINGS_CODE',
        message: `New earnings code: ${label}`,
        date: current.payDate,
        meta: { ...meta, type: label },
      });
    }
  }

  const prevDeductions = codes(previous.deductions);
  const curDeductions = codes(current.deductions);
  for (const [key, label] of curDeductions) {
    if (!prevDeductions.has(key)) {
      issues.push({
        level: 'ERROR',
        code: 'NEW_DEDUCTION_CODE',
        message: `New deduction code: ${label}`,
        date: current.payDate,
        meta: { ...meta, type: label },
      });
    }
  }
  for (const [key, label] of prevDeductions) {
    if (!curDeductions.has(key)) {
      issues.push({
        level: 'WARNING',
        code: 'MISSING_DEDUCTION_CODE',
        message: `Deduction code no longer present: ${label}`,
        date: current.payDate,
        meta: { ...meta, type: label },
      });
    }
  }

  return issues;
}

export function auditHistory(paychecks: DeclaredPaycheck[]): CodeDriftEntry[] {
  const sorted = [...paychecks].sort(
    byDateThenId(
      (p) => p.payDate,
      (p) => p.id,
    ),
  );
  const out: CodeDriftEntry[] = [];
  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    out.push({
      paycheckId: current.id,
      previousId: previous.id,
      payDate: current.payDate,
      issues: compareEarningsAndDeductionCodes(previous, current),
    });
  }
  return out;
}

/** Percent of gross withheld as tax (federal, state, OASDI, Medicare). */
export function effectiveTaxRate(deductions: DeductionLine[], gross: Money): number {
  if (gross <= 0) return 0;
  const taxes = sumBy(
    deductions.filter((d) => isTaxCategory(d.category)),
    (d) => d.currentAmount,
  );
  return (100 * taxes) / gross;
}
