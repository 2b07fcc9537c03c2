import { Hours, Money, truncMoney } from '../state/number';

export type FlsaPremiumInput = {
  overtimeHours: Hours;
  straightTimeRemuneration: Money; // base + true OT + differentials + incentive + supplemental
  hoursWorked: Hours; // basic hours (regular + holiday leave) + overtime
};

export type FlsaPremium = {
  regularRateOfPay: number; // unrounded
  premiumRate: Money;
  premiumAmount: Money;
};

const NO_PREMIUM: FlsaPremium = { regularRateOfPay: 0, premiumRate: 0, premiumAmount: 0 };

/**
 * Weighted-average overtime: the premium is half of the regular rate of pay, where the
 * regular rate is all straight-time remuneration divided by all hours worked.
 * The straight-time part of overtime is paid separately as true overtime.
 *
 * @param factor share of the regular rate paid as premium (0.5 = "half-time")
 */
export function computeFlsaPremium(input: FlsaPremiumInput, factor = 0.5): FlsaPremium {
  const { overtimeHours, straightTimeRemuneration, hoursWorked } = input;
  if (overtimeHours <= 0 || hoursWorked <= 0) return NO_PREMIUM;

  const regularRateOfPay = straightTimeRemuneration / hoursWorked;
  const premiumRate = truncMoney(regularRateOfPay * factor);
  const premiumAmount = truncMoney(overtimeHours * premiumRate);
  return { regularRateOfPay, premiumRate, premiumAmount };
}
