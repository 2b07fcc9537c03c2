import { DeductionBasis, DeductionCategory, EarningsCategory } from '../state/payroll-types';

export const EARNINGS_LABEL: Record<Exclude<EarningsCategory, 'SUPPLEMENTAL' | 'OTHER'>, string> = {
  REGULAR: 'Regular / Holiday Leave',
  INCENTIVE: 'Controller Incentive Pay',
  FLSA_PREMIUM: 'FLSA Premium',
  TRUE_OVERTIME: 'True Overtime',
  NIGHT: 'Night Differential',
  SUNDAY: 'Sunday Premium',
  HOLIDAY_WORKED: 'Holiday Worked',
};

/*
 * Statement row names are free text and have been renamed over the years, so
 * declared rows are classified by substring. Order matters: first match wins.
 * Known fragility: a renamed row falls through to OTHER (or FIXED for deductions)
 * instead of failing loudly.
 */
const EARNINGS_RULES: Array<[RegExp, EarningsCategory]> = [
  [/controller incentive|\bcip\b/i, 'INCENTIVE'],
  [/flsa/i, 'FLSA_PREMIUM'],
  [/true overtime|^overtime/i, 'TRUE_OVERTIME'],
  [/night/i, 'NIGHT'],
  [/sunday/i, 'SUNDAY'],
  [/holiday work/i, 'HOLIDAY_WORKED'],
  [/regular/i, 'REGULAR'],
];

const DEDUCTION_RULES: Array<[RegExp, DeductionCategory]> = [
  [/oasdi|social security/i, 'OASDI'],
  [/medicare/i, 'MEDICARE'],
  [/fed(eral)?\b.*tax|fitw/i, 'FEDERAL_TAX'],
  [/tax/i, 'STATE_TAX'],
  [/\btsp\b|thrift/i, 'TSP'],
  [/fers|retire/i, 'RETIREMENT'],
];

const PERCENT_CATEGORIES = new Set<DeductionCategory>([
  'FEDERAL_TAX',
  'STATE_TAX',
  'OASDI',
  'MEDICARE',
  'RETIREMENT',
  'TSP',
]);

const TAX_CATEGORIES = new Set<DeductionCategory>(['FEDERAL_TAX', 'STATE_TAX', 'OASDI', 'MEDICARE']);

export function classifyEarnings(type: string, supplemental: string[] = []): EarningsCategory {
  if (supplemental.some((s) => s.toLowerCase() === type.trim().toLowerCase())) {
    return 'SUPPLEMENTAL';
  }
  for (const [re, cat] of EARNINGS_RULES) {
    if (re.test(type)) return cat;
  }
  return 'OTHER';
}

export function classifyDeduction(type: string): {
  category: DeductionCategory;
  basis: DeductionBasis;
} {
  const hit = DEDUCTION_RULES.find(([re]) => re.test(type));
  const category = hit ? hit[1] : 'OTHER';
  return { category, basis: PERCENT_CATEGORIES.has(category) ? 'PERCENT' : 'FIXED' };
}

export const isTaxCategory = (c: DeductionCategory) => TAX_CATEGORIES.has(c);
