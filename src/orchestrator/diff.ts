import { ShiftEntry, ShiftFieldDiff } from '../state/payroll-types';

const scalarFields = ['startTime', 'endTime', 'leave'] as const;

export function buildDiff(
  before: ShiftEntry[],
  after: ShiftEntry[],
  touched: Set<string>,
): ShiftFieldDiff[] {
  if (before === after) return [];
  const out: ShiftFieldDiff[] = [];

  for (const date of [...touched].sort()) {
    const b = before.find((e) => e.date === date);
    const a = after.find((e) => e.date === date);
    if (!b || !a) continue;

    for (const field of scalarFields) {
      const bv = b[field] ?? null;
      const av = a[field] ?? null;
      if (bv !== av) out.push({ date, field, before: bv, after: av });
    }

    const categories = new Set([
      ...Object.keys(b.supplementalHours),
      ...Object.keys(a.supplementalHours),
    ]);
    for (const cat of [...categories].sort()) {
      const bv = b.supplementalHours[cat] ?? null;
      const av = a.supplementalHours[cat] ?? null;
      if (bv !== av) out.push({ date, field: `supplementalHours.${cat}`, before: bv, after: av });
    }
  }

  return out;
}
