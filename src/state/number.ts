export type Money = number; // dollars, always a whole number of cents
export type MoneyCents = number; // integer cents, used for exact sums
export type Hours = number;

export const num = (v: unknown) => (Number.isFinite(Number(v)) ? Number(v) : 0);
export const max0 = (x: number) => Math.max(0, x);

/**
 * Truncates toward zero at `places` decimals.
 *
 * The scaled value is first fixed at 6 decimals so that binary noise
 * (`0.29 * 100 === 28.999999999999996`) does not cost a whole unit.
 */
export function truncateTo(value: number, places: number): number {
  const factor = 10 ** places;
  const scaled = Number((value * factor).toFixed(6));
  return Math.trunc(scaled) / factor;
}

export const truncHours = (h: number): Hours => truncateTo(h, 4);
export const truncMoney = (m: number): Money => truncateTo(m, 2);

export function toCents(m: Money): MoneyCents {
  return Math.round((m + Math.sign(m) * Number.EPSILON) * 100);
}

export const centsToMoney = (c: MoneyCents): Money => Math.round(c) / 100;

export const sumCents = (xs: MoneyCents[]) => xs.reduce((a, b) => a + b, 0);

/** Exact sum of amounts that are already whole cents. */
export const sumMoney = (xs: Money[]): Money => centsToMoney(sumCents(xs.map(toCents)));

export const subMoney = (a: Money, b: Money): Money => centsToMoney(toCents(a) - toCents(b));

// ---------- hours.minutes notation (leave balances) ----------

/** `6.45` → 405: the fractional part is literal minutes, not a fraction of an hour. */
export function toMinutes(v: number | null | undefined): number {
  if (v == null || !Number.isFinite(v)) return 0;
  const sign = v < 0 ? -1 : 1;
  const abs = Math.abs(v);
  const h = Math.trunc(abs);
  const m = Math.round((abs - h) * 100);
  return sign * (h * 60 + m);
}

/** 495 → `8.15` */
export function fromMinutes(minutes: number): number {
  const sign = minutes < 0 ? -1 : 1;
  const abs = Math.abs(minutes);
  return (sign * Math.round(Math.floor(abs / 60) * 100 + (abs % 60))) / 100;
}

export const formatHoursMinutes = (minutes: number) => fromMinutes(minutes).toFixed(2);

const moneyFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export const formatMoney = (m: Money) => moneyFormat.format(m);
