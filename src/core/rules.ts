export type PayRules = {
  // differentials, as fractions of the base rate
  nightDifferentialRate: number;
  sundayPremiumRate: number;
  supplementalRates: Record<string, number>; // category -> fraction; unlisted categories earn nothing

  // daily caps (hours)
  dailyRegularCap: number;
  sundayPremiumCap: number;
  holidayPremiumCap: number;

  // night window: [nightStartHour, 24) ∪ [0, nightEndHour)
  nightStartHour: number;
  nightEndHour: number;

  // end <= start with a start at or after this hour means the shift began the day before
  overnightStartHour: number;

  flsaPremiumFactor: number; // 0.5 = half the regular rate of pay
  holidaySlideLimit: number; // days searched before giving up

  chargeableLeaveTypes: string[]; // projected forward by the synthesizer
  exemptLeaveTypes: string[]; // no running balance, skipped by the audit

  leaveToleranceMinutes: number;
  moneyToleranceCents: number;
  ledgerThreshold: number; // dollars
  ledgerMaxPeriods: number;
};

export const defaultPayRules: PayRules = {
  nightDifferentialRate: 0.1,
  sundayPremiumRate: 0.25,
  supplementalRates: { OJTI: 0.25, CIC: 0.1 },

  dailyRegularCap: 8,
  sundayPremiumCap: 8,
  holidayPremiumCap: 8,

  nightStartHour: 18,
  nightEndHour: 6,
  overnightStartHour: 19,

  flsaPremiumFactor: 0.5,
  holidaySlideLimit: 14,

  chargeableLeaveTypes: ['Annual', 'Sick', 'Credit'],
  exemptLeaveTypes: ['Admin', 'Change of Station Leave', 'Time Off Award', 'Gov Shutdown-Excepted'],

  leaveToleranceMinutes: 1,
  moneyToleranceCents: 1,
  ledgerThreshold: 1,
  ledgerMaxPeriods: 520, // twenty years of biweekly periods
};

export function resolveRules(config: Partial<PayRules> = {}): PayRules {
  return { ...defaultPayRules, ...config };
}
