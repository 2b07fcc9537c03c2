import {
  DailyBucket,
  DeductionLine,
  EarningsLine,
  LEAVE_DESIGNATIONS,
  LeaveDesignation,
  LeaveLine,
  PaycheckBreakdown,
  PayrollIssue,
  PeriodMeta,
} from '../state/payroll-types';
import {
  centsToMoney,
  fromMinutes,
  Hours,
  Money,
  subMoney,
  sumMoney,
  toCents,
  toMinutes,
  truncHours,
  truncMoney,
} from '../state/number';
import { EARNINGS_LABEL } from './categories';
import { computeFlsaPremium } from './overtime';
import { PayRules, resolveRules } from './rules';
import { createLogger } from '../logger';

const logger = createLogger('synthesize');

export type SynthesizeInput = {
  buckets: DailyBucket[];
  baseRate: Money;
  referenceEarnings: EarningsLine[];
  referenceDeductions: DeductionLine[];
  referenceLeave: LeaveLine[];
  referenceGross?: Money; // defaults to the sum of reference earnings
  meta: PeriodMeta;
};

export type PeriodHourTotals = {
  regular: Hours;
  overtime: Hours;
  night: Hours;
  sunday: Hours;
  holidayWorked: Hours;
  holidayLeave: Hours;
  supplemental: Record<string, Hours>;
  chargedLeave: Partial<Record<LeaveDesignation, Hours>>;
};

export function sumBuckets(buckets: DailyBucket[]): PeriodHourTotals {
  const raw = {
    regular: 0,
    overtime: 0,
    night: 0,
    sunday: 0,
    holidayWorked: 0,
    holidayLeave: 0,
  };
  const supplemental: Record<string, Hours> = {};
  const chargedLeave: Partial<Record<LeaveDesignation, Hours>> = {};

  for (const b of buckets) {
    raw.regular += b.regularHours;
    raw.overtime += b.overtimeHours;
    raw.night += b.nightHours;
    raw.sunday += b.sundayHours;
    raw.holidayWorked += b.holidayWorkedHours;
    raw.holidayLeave += b.holidayLeaveHours;
    for (const [cat, h] of Object.entries(b.supplementalHours)) {
      supplemental[cat] = (supplemental[cat] ?? 0) + (Number.isFinite(h) ? h : 0);
    }
    if (b.leave && b.chargedLeaveHours > 0) {
      chargedLeave[b.leave] = (chargedLeave[b.leave] ?? 0) + b.chargedLeaveHours;
    }
  }

  for (const cat of Object.keys(supplemental)) supplemental[cat] = truncHours(supplemental[cat]);
  for (const d of LEAVE_DESIGNATIONS) {
    const h = chargedLeave[d];
    if (h !== undefined) chargedLeave[d] = truncHours(h);
  }

  return {
    regular: truncHours(raw.regular),
    overtime: truncHours(raw.overtime),
    night: truncHours(raw.night),
    sunday: truncHours(raw.sunday),
    holidayWorked: truncHours(raw.holidayWorked),
    holidayLeave: truncHours(raw.holidayLeave),
    supplemental,
    chargedLeave,
  };
}

/** Incentive pay follows the ratio a real statement paid against its regular pay. */
export function incentiveFactor(referenceEarnings: EarningsLine[]): number {
  const incentive = referenceEarnings.find((l) => l.category === 'INCENTIVE');
  const regular = referenceEarnings.find((l) => l.category === 'REGULAR');
  if (!incentive || !regular || regular.currentAmount <= 0) return 0;
  return incentive.currentAmount / regular.currentAmount;
}

function labeled(
  category: keyof typeof EARNINGS_LABEL,
  rate: Money,
  hours: Hours,
  currentAmount: Money,
): EarningsLine {
  return { type: EARNINGS_LABEL[category], category, rate, hours, currentAmount };
}

/** newYtd = referenceYtd - referenceCurrent + newCurrent; unknown without a positive reference YTD */
function continueYtd(
  reference: { currentAmount: Money; ytdAmount?: Money | null } | undefined,
  current: Money,
): Money | null {
  if (!reference || reference.ytdAmount == null || reference.ytdAmount <= 0) return null;
  return centsToMoney(
    toCents(reference.ytdAmount) - toCents(reference.currentAmount) + toCents(current),
  );
}

function matchReferenceEarnings(line: EarningsLine, reference: EarningsLine[]) {
  if (line.category === 'SUPPLEMENTAL' || line.category === 'OTHER') {
    const key = line.type.trim().toLowerCase();
    return reference.find((r) => r.type.trim().toLowerCase() === key);
  }
  return reference.find((r) => r.category === line.category);
}

export function projectLeave(referenceLeave: LeaveLine[], chargeable: string[]): LeaveLine[] {
  return referenceLeave
    .filter((l) => chargeable.some((t) => l.type.includes(t)))
    .map((l) => ({
      type: l.type,
      start: l.start,
      earned: l.earned,
      used: 0, // usage is reconciled by the audit, not projected
      end: fromMinutes(toMinutes(l.start) + toMinutes(l.earned)),
    }));
}

export function synthesizePaycheck(
  input: SynthesizeInput,
  config: Partial<PayRules> = {},
): PaycheckBreakdown {
  const rules = resolveRules(config);
  const { buckets, baseRate, referenceEarnings, referenceDeductions, referenceLeave, meta } = input;
  const issues: PayrollIssue[] = [];

  const reliable = baseRate > 0;
  if (!reliable) {
    issues.push({
      level: 'ERROR',
      code: 'MISSING_REFERENCE_RATE',
      message: `No positive base rate available for the period ending ${meta.periodEnding}; amounts are not reliable.`,
      date: meta.periodEnding,
    });
    logger.warn('Synthesizing without a reference rate', { periodEnding: meta.periodEnding });
  }
  const rate = reliable ? baseRate : 0;

  // 1) hours
  const t = sumBuckets(buckets);
  const basicHours = truncHours(t.regular + t.holidayLeave);

  // 2..5) straight-time amounts
  const basePay = truncMoney(basicHours * rate);
  const trueOvertime = t.overtime > 0 ? truncMoney(t.overtime * rate) : 0;

  const nightRate = truncMoney(rate * rules.nightDifferentialRate);
  const nightPay = truncMoney(t.night * nightRate);
  const sundayRate = truncMoney(rate * rules.sundayPremiumRate);
  const sundayPay = truncMoney(t.sunday * sundayRate);
  const holidayPay = truncMoney(t.holidayWorked * rate);

  const supplementalLines: EarningsLine[] = [];
  for (const [cat, hours] of Object.entries(t.supplemental)) {
    const fraction = rules.supplementalRates[cat];
    if (fraction === undefined || hours <= 0) continue;
    const supRate = truncMoney(rate * fraction);
    supplementalLines.push({
      type: cat,
      category: 'SUPPLEMENTAL',
      rate: supRate,
      hours,
      currentAmount: truncMoney(hours * supRate),
    });
  }

  // 6) incentive
  const factor = incentiveFactor(referenceEarnings);
  const incentivePay = factor > 0 ? truncMoney(basePay * factor) : 0;
  const incentiveRate = factor > 0 ? truncMoney(rate * factor) : 0;

  // 7) FLSA premium
  const straightTime = sumMoney([
    basePay,
    trueOvertime,
    nightPay,
    sundayPay,
    holidayPay,
    incentivePay,
    ...supplementalLines.map((l) => l.currentAmount),
  ]);
  const flsa = computeFlsaPremium(
    {
      overtimeHours: t.overtime,
      straightTimeRemuneration: straightTime,
      hoursWorked: basicHours + t.overtime,
    },
    rules.flsaPremiumFactor,
  );

  // earnings lines, non-zero only
  const earnings: EarningsLine[] = [];
  if (basicHours > 0) earnings.push(labeled('REGULAR', rate, basicHours, basePay));
  if (incentivePay) earnings.push(labeled('INCENTIVE', incentiveRate, basicHours, incentivePay));
  if (t.overtime > 0) {
    earnings.push(labeled('FLSA_PREMIUM', flsa.premiumRate, t.overtime, flsa.premiumAmount));
    earnings.push(labeled('TRUE_OVERTIME', rate, t.overtime, trueOvertime));
  }
  if (t.night > 0) earnings.push(labeled('NIGHT', nightRate, t.night, nightPay));
  if (t.sunday > 0) earnings.push(labeled('SUNDAY', sundayRate, t.sunday, sundayPay));
  if (t.holidayWorked > 0) {
    earnings.push(labeled('HOLIDAY_WORKED', rate, t.holidayWorked, holidayPay));
  }
  earnings.push(...supplementalLines);

  // 8) gross
  const grossPay = sumMoney(earnings.map((l) => l.currentAmount));

  // 9) deductions
  const referenceGross =
    input.referenceGross ?? sumMoney(referenceEarnings.map((l) => l.currentAmount));
  const deductions: DeductionLine[] = referenceDeductions.map((ref) => {
    const currentAmount =
      ref.basis === 'PERCENT'
        ? referenceGross > 0
          ? truncMoney(grossPay * (ref.currentAmount / referenceGross))
          : 0
        : ref.currentAmount;
    return {
      type: ref.type,
      category: ref.category,
      basis: ref.basis,
      currentAmount,
      ytdAmount: continueYtd(ref, currentAmount),
    };
  });
  const totalDeductions = sumMoney(deductions.map((d) => d.currentAmount));

  // 10) net
  const netPay = subMoney(grossPay, totalDeductions);

  // 11) year to date
  for (const line of earnings) {
    const reference = matchReferenceEarnings(line, referenceEarnings);
    line.ytdAmount = continueYtd(reference, line.currentAmount);
  }

  // 12) leave
  const leave = projectLeave(referenceLeave, rules.chargeableLeaveTypes);

  return {
    meta,
    baseRate: rate,
    earnings,
    deductions,
    leave,
    chargedLeave: t.chargedLeave,
    grossPay,
    totalDeductions,
    netPay,
    remarks: reliable
      ? 'GENERATED\nWeighted-average FLSA premium'
      : 'GENERATED WITHOUT A REFERENCE RATE\nAmounts are not reliable',
    reliable,
    issues,
  };
}
