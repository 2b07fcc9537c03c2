export * from './state/payroll-types';
export * from './state/number';
export { PayrollError, PayrollErrorCode } from './errors';
export type { PayrollErrorParams } from './errors';
export { loadEnvConfig, ruleOverridesFrom } from './config/env';
export type { EnvConfig } from './config/env';
export { createLogger } from './logger';

export { defaultPayRules, resolveRules } from './core/rules';
export type { PayRules } from './core/rules';
export { resolveObservedHoliday, observedHolidayDates } from './core/holiday';
export { expectationFor, scheduleForYear } from './core/schedule';
export type { DayExpectation } from './core/schedule';
export { calculateDailyBreakdown } from './core/dailyBreakdown';
export type { DailyBreakdownInput } from './core/dailyBreakdown';
export { synthesizePaycheck, sumBuckets, incentiveFactor, projectLeave } from './core/synthesize';
export type { SynthesizeInput, PeriodHourTotals } from './core/synthesize';
export { computeFlsaPremium } from './core/overtime';
export type { FlsaPremium, FlsaPremiumInput } from './core/overtime';
export { classifyEarnings, classifyDeduction, isTaxCategory, EARNINGS_LABEL } from './core/categories';

export * from './types/backend-raw';
export {
  canonicalizePaycheck,
  canonicalizeShiftEntry,
  canonicalizeScheduleRow,
  canonicalizeHoliday,
  toEarningsLines,
  toDeductionLines,
} from './state/from-backend';
export { selectReferenceContext, toReferenceContext, EMPTY_REFERENCE } from './state/reference';

export { auditPaycheck, auditIssues } from './reconcile/audit';
export { compareEarningsAndDeductionCodes, auditHistory, effectiveTaxRate } from './reconcile/drift';
export { buildLedger } from './reconcile/ledger';
export { makeMemorySources } from './reconcile/adapters/memory-sources';
export type { MemorySourcesData } from './reconcile/adapters/memory-sources';
export * from './reconcile/types';

export {
  payPeriodDates,
  periodEndingFor,
  periodAnchorFrom,
  buildTimesheet,
} from './orchestrator/timesheet';
export { applyShiftEdits } from './orchestrator/applyChanges';
export type { ApplyShiftEditsResult } from './orchestrator/applyChanges';

export { summarizePeriod } from './summarize/summarizePeriod';
export * from './summarize/type';
