import { describe, it, expect } from 'vitest';
import { incentiveFactor, projectLeave, sumBuckets, synthesizePaycheck, SynthesizeInput } from '../src/core/synthesize';
import { makeBucket, makeDeductionLine, makeEarningsLine } from './helpers/factories';

const META = { periodEnding: '2025-01-11' };

function tenDays(extra?: Parameters<typeof makeBucket>[0]) {
  const buckets = Array.from({ length: 10 }, () => makeBucket({ regularHours: 8, workedHours: 8 }));
  if (extra) buckets.push(makeBucket(extra));
  return buckets;
}

function input(partial: Partial<SynthesizeInput>): SynthesizeInput {
  return {
    buckets: [],
    baseRate: 50,
    referenceEarnings: [makeEarningsLine()],
    referenceDeductions: [],
    referenceLeave: [],
    meta: META,
    ...partial,
  };
}

const amounts = (lines: Array<{ type: string; rate: number; hours: number; currentAmount: number }>) =>
  lines.map((l) => [l.type, l.rate, l.hours, l.currentAmount]);

describe('synthesizePaycheck', () => {
  it('applies the weighted-average overtime premium', () => {
    const p = synthesizePaycheck(
      input({ buckets: tenDays({ overtimeHours: 4, workedHours: 4, isWorkday: false }) }),
    );
    expect(amounts(p.earnings)).toEqual([
      ['Regular / Holiday Leave', 50, 80, 4000],
      ['FLSA Premium', 25, 4, 100],
      ['True Overtime', 50, 4, 200],
    ]);
    expect(p.grossPay).toBe(4300);
    expect(p.totalDeductions).toBe(0);
    expect(p.netPay).toBe(4300);
    expect(p.reliable).toBe(true);
    expect(p.issues).toEqual([]);
    expect(p.remarks).toBe('GENERATED\nWeighted-average FLSA premium');
  });

  it('rates differentials and supplemental hours as fractions of the base rate', () => {
    const p = synthesizePaycheck(
      input({
        baseRate: 40,
        referenceEarnings: [makeEarningsLine({ rate: 40, currentAmount: 3200 })],
        buckets: [
          makeBucket({
            regularHours: 8,
            nightHours: 8,
            sundayHours: 8,
            supplementalHours: { OJTI: 2, CIC: 1.5, TRAINING: 3 },
          }),
        ],
      }),
    );
    expect(amounts(p.earnings)).toEqual([
      ['Regular / Holiday Leave', 40, 8, 320],
      ['Night Differential', 4, 8, 32],
      ['Sunday Premium', 10, 8, 80],
      ['OJTI', 10, 2, 20],
      ['CIC', 4, 1.5, 6],
    ]);
    expect(p.grossPay).toBe(458);
  });

  it('truncates differential rates and amounts to the cent', () => {
    const p = synthesizePaycheck(
      input({ baseRate: 37.17, buckets: [makeBucket({ regularHours: 8, nightHours: 3.5 })] }),
    );
    const night = p.earnings.find((l) => l.category === 'NIGHT');
    expect(night?.rate).toBe(3.71);
    expect(night?.currentAmount).toBe(12.98);
    // 8 × 37.17 = 297.36
    expect(p.grossPay).toBe(310.34);
  });

  it('pays incentive at the reference ratio and adds holiday-worked premium', () => {
    const p = synthesizePaycheck(
      input({
        referenceEarnings: [
          makeEarningsLine({ currentAmount: 4000 }),
          makeEarningsLine({ type: 'Controller Incentive Pay', category: 'INCENTIVE', rate: 2.5, currentAmount: 200 }),
        ],
        buckets: [
          ...tenDays(),
          makeBucket({ holidayWorkedHours: 8, isObservedHoliday: true }),
        ],
      }),
    );
    expect(amounts(p.earnings)).toEqual([
      ['Regular / Holiday Leave', 50, 80, 4000],
      ['Controller Incentive Pay', 2.5, 80, 200],
      ['Holiday Worked', 50, 8, 400],
    ]);
    expect(p.grossPay).toBe(4600);
  });

  it('counts holiday leave as basic hours', () => {
    const buckets = Array.from({ length: 9 }, () => makeBucket({ regularHours: 8 }));
    buckets.push(makeBucket({ holidayLeaveHours: 8 }));
    const p = synthesizePaycheck(input({ buckets }));
    expect(p.earnings).toHaveLength(1);
    expect(p.earnings[0].hours).toBe(80);
    expect(p.grossPay).toBe(4000);
  });

  it('scales percentage deductions with gross and carries fixed ones', () => {
    const p = synthesizePaycheck(
      input({
        buckets: tenDays({ overtimeHours: 4, isWorkday: false }),
        referenceGross: 4000,
        referenceDeductions: [
          makeDeductionLine({ currentAmount: 400, ytdAmount: 4000 }),
          makeDeductionLine({ type: 'Health Benefits', category: 'OTHER', basis: 'FIXED', currentAmount: 150, ytdAmount: 0 }),
        ],
      }),
    );
    expect(p.deductions.map((d) => [d.type, d.currentAmount, d.ytdAmount])).toEqual([
      ['Federal Tax', 430, 4030],
      ['Health Benefits', 150, null],
    ]);
    expect(p.totalDeductions).toBe(580);
    expect(p.netPay).toBe(3720);
  });

  it('drops percentage deductions to zero when the reference gross is zero', () => {
    const p = synthesizePaycheck(
      input({
        buckets: tenDays(),
        referenceGross: 0,
        referenceDeductions: [makeDeductionLine({ currentAmount: 400 })],
      }),
    );
    expect(p.deductions[0].currentAmount).toBe(0);
    expect(p.netPay).toBe(4000);
  });

  it('continues year-to-date only from a positive reference figure', () => {
    const p = synthesizePaycheck(
      input({
        referenceEarnings: [makeEarningsLine({ currentAmount: 3800, ytdAmount: 38000 })],
        buckets: tenDays({ overtimeHours: 4, isWorkday: false }),
      }),
    );
    expect(p.earnings.map((l) => [l.category, l.ytdAmount])).toEqual([
      ['REGULAR', 38200],
      ['FLSA_PREMIUM', null],
      ['TRUE_OVERTIME', null],
    ]);
  });

  it('marks a run without a base rate as unreliable instead of passing it off as valid', () => {
    const p = synthesizePaycheck(input({ baseRate: 0, buckets: tenDays() }));
    expect(p.reliable).toBe(false);
    expect(p.grossPay).toBe(0);
    expect(p.issues.map((i) => [i.level, i.code])).toEqual([['ERROR', 'MISSING_REFERENCE_RATE']]);
    expect(p.remarks).toBe('GENERATED WITHOUT A REFERENCE RATE\nAmounts are not reliable');
  });

  it('reports charged leave by designation', () => {
    const p = synthesizePaycheck(
      input({
        buckets: [
          makeBucket({ regularHours: 4, chargedLeaveHours: 4, leave: 'Annual' }),
          makeBucket({ regularHours: 6, chargedLeaveHours: 2, leave: 'Annual' }),
          makeBucket({ chargedLeaveHours: 8, leave: 'Sick' }),
        ],
      }),
    );
    expect(p.chargedLeave).toEqual({ Annual: 6, Sick: 8 });
  });

  it('is deterministic for identical input', () => {
    const build = () =>
      input({
        buckets: tenDays({ overtimeHours: 2.25, nightHours: 2, sundayHours: 8, isWorkday: false }),
        referenceDeductions: [makeDeductionLine()],
      });
    expect(synthesizePaycheck(build())).toEqual(synthesizePaycheck(build()));
  });
});

describe('synthesizer parts', () => {
  it('sums buckets with truncation', () => {
    const t = sumBuckets([
      makeBucket({ overtimeHours: 0.33333 }),
      makeBucket({ overtimeHours: 0.33333, supplementalHours: { OJTI: 1.25 } }),
    ]);
    expect(t.overtime).toBe(0.6666);
    expect(t.supplemental).toEqual({ OJTI: 1.25 });
  });

  it('derives the incentive factor from the reference statement', () => {
    expect(
      incentiveFactor([
        makeEarningsLine({ currentAmount: 4000 }),
        makeEarningsLine({ category: 'INCENTIVE', currentAmount: 200 }),
      ]),
    ).toBe(0.05);
    expect(incentiveFactor([makeEarningsLine()])).toBe(0);
    expect(incentiveFactor([makeEarningsLine({ category: 'INCENTIVE', currentAmount: 200 })])).toBe(0);
  });

  it('projects chargeable leave balances forward in hours.minutes', () => {
    const leave = projectLeave(
      [
        { type: 'Annual', start: 6.45, earned: 4, used: 2.3, end: 8.15 },
        { type: 'Sick', start: 10.3, earned: 4, used: 0, end: 14.3 },
        { type: 'Admin', start: 0, earned: 0, used: 4, end: 0 },
      ],
      ['Annual', 'Sick', 'Credit'],
    );
    expect(leave).toEqual([
      { type: 'Annual', start: 6.45, earned: 4, used: 0, end: 10.45 },
      { type: 'Sick', start: 10.3, earned: 4, used: 0, end: 14.3 },
    ]);
  });
});
