import { DailyBucket, Holiday, ScheduleEntry } from '../state/payroll-types';
import { calculateDailyBreakdown } from '../core/dailyBreakdown';
import { synthesizePaycheck } from '../core/synthesize';
import { PayRules } from '../core/rules';
import { yearOf } from '../core/clock';
import { PeriodSummary, PeriodSummaryInput } from './type';

function memoByYear<T>(load: (year: number) => T): (year: number) => T {
  const cache = new Map<number, T>();
  return (year) => {
    let v = cache.get(year);
    if (v === undefined) {
      v = load(year);
      cache.set(year, v);
    }
    return v;
  };
}

export function summarizePeriod(
  input: PeriodSummaryInput,
  config: Partial<PayRules> = {},
): PeriodSummary {
  const { periodEnding, reference } = input;
  // one read per year keeps the whole run on a single snapshot of each lookup
  const scheduleFor = memoByYear<ScheduleEntry[]>(input.scheduleFor);
  const holidaysFor = memoByYear<Holiday[]>(input.holidaysFor);
  // a holiday can slide across new year in either direction
  const holidaysAround = (year: number) => [
    ...holidaysFor(year - 1),
    ...holidaysFor(year),
    ...holidaysFor(year + 1),
  ];

  const buckets: DailyBucket[] = [...input.entries]
    .sort((a, b) => a.date.localeCompare(b.date))
    .map((e) =>
      calculateDailyBreakdown(
        {
          date: e.date,
          startTime: e.startTime,
          endTime: e.endTime,
          leave: e.leave,
          supplementalHours: e.supplementalHours,
          schedule: scheduleFor(yearOf(e.date)),
          holidays: holidaysAround(yearOf(e.date)),
        },
        config,
      ),
    );

  const paycheck = synthesizePaycheck(
    {
      buckets,
      baseRate: reference.baseRate,
      referenceEarnings: reference.earnings,
      referenceDeductions: reference.deductions,
      referenceLeave: reference.leave,
      referenceGross: reference.referenceGross,
      meta: input.meta ?? { periodEnding },
    },
    config,
  );

  return {
    buckets,
    paycheck,
    issues: [...buckets.flatMap((b) => b.issues), ...paycheck.issues],
  };
}
