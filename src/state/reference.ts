import { DeclaredPaycheck, ReferenceContext } from './payroll-types';
import { toDeductionLines, toEarningsLines } from './from-backend';

export const EMPTY_REFERENCE: ReferenceContext = {
  baseRate: 0,
  earnings: [],
  deductions: [],
  leave: [],
  source: 'NONE',
};

/** Rate of the statement's REGULAR line, or 0. */
export function regularRateOf(paycheck: DeclaredPaycheck): number {
  const regular = toEarningsLines(paycheck).find((l) => l.category === 'REGULAR');
  return regular && regular.rate > 0 ? regular.rate : 0;
}

export function toReferenceContext(
  paycheck: DeclaredPaycheck,
  source: ReferenceContext['source'],
): ReferenceContext {
  return {
    paycheckId: paycheck.id,
    baseRate: regularRateOf(paycheck),
    earnings: toEarningsLines(paycheck),
    deductions: toDeductionLines(paycheck),
    leave: paycheck.leave,
    referenceGross: paycheck.grossPay,
    source,
  };
}

/**
 * Rates and deduction ratios come from the requested statement. When that statement has
 * no positive regular rate (a pay lapse, an adjustment-only stub) the most recent earlier
 * statement that does is used instead. An id not on file has no context.
 */
export function selectReferenceContext(
  paychecks: DeclaredPaycheck[],
  paycheckId: string,
): ReferenceContext {
  const requested = paychecks.find((p) => p.id === paycheckId);
  if (!requested) return EMPTY_REFERENCE;
  if (regularRateOf(requested) > 0) return toReferenceContext(requested, 'SELF');

  const fallback = paychecks
    .filter((p) => p.periodEnding < requested.periodEnding && regularRateOf(p) > 0)
    .sort((a, b) =>
      a.periodEnding === b.periodEnding
        ? b.id.localeCompare(a.id)
        : b.periodEnding.localeCompare(a.periodEnding),
    )[0];

  return fallback ? toReferenceContext(fallback, 'FALLBACK') : EMPTY_REFERENCE;
}
