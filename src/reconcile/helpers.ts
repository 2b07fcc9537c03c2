import { LedgerStatus } from '../state/payroll-types';
import { MoneyCents } from '../state/number';

/** diff = declared − expected; below −threshold the worker was underpaid. */
export function statusFromDiff(diffCents: MoneyCents, thresholdCents: MoneyCents): LedgerStatus {
  if (diffCents < -thresholdCents) return 'GOV_OWES_YOU';
  if (diffCents > thresholdCents) return 'BACKPAY';
  return 'BALANCED';
}

// ---------- aggregation ----------

export function sumBy<T>(arr: T[], pick: (x: T) => number): number {
  let s = 0;
  for (const it of arr) s += pick(it) || 0;
  return s;
}

/** Ascending by a date key, ties broken by id so that the order never depends on input order. */
export function byDateThenId<T>(date: (x: T) => string, id: (x: T) => string) {
  return (a: T, b: T) => date(a).localeCompare(date(b)) || id(a).localeCompare(id(b));
}

/** Normalized row name used to compare codes across statements. */
export const codeKey = (type: string) => type.trim().replace(/\s+/g, ' ').toLowerCase();
