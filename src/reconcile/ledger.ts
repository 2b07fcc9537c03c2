import { LedgerPeriod, LedgerRow, ReferenceContext } from '../state/payroll-types';
import { centsToMoney, toCents } from '../state/number';
import { PayRules, resolveRules } from '../core/rules';
import { summarizePeriod } from '../summarize/summarizePeriod';
import { createLogger } from '../logger';
import { byDateThenId, statusFromDiff } from './helpers';
import { PayrollSources } from './types';

const logger = createLogger('ledger');

/**
 * Folds declared-minus-expected gross over every period in chronological order.
 *
 * A period with no saved shift data is taken at its declared value. Every other period is
 * re-derived from its own shifts at its own historical rate, falling back to
 * `currentReference` (and marking the row unreliable) when nothing is on file.
 */
export function buildLedger(
  periods: LedgerPeriod[],
  currentReference: ReferenceContext,
  sources: PayrollSources,
  config: Partial<PayRules> = {},
): LedgerRow[] {
  const rules = resolveRules(config);
  const cap = rules.ledgerMaxPeriods;
  const sorted = [...periods].sort(
    byDateThenId(
      (p) => p.periodEnding,
      (p) => p.paycheckId,
    ),
  );

  if (sorted.length > cap) {
    logger.warn('Ledger period cap reached; later periods are not folded', {
      supplied: sorted.length,
      cap,
    });
  }

  const thresholdCents = toCents(rules.ledgerThreshold);
  const rows: LedgerRow[] = [];
  let balanceCents = 0;

  for (const period of sorted.slice(0, cap)) {
    const actualCents = toCents(period.declaredGross);

    if (!sources.hasSavedEntries(period.periodEnding)) {
      rows.push({
        paycheckId: period.paycheckId,
        periodEnding: period.periodEnding,
        expectedGross: null,
        actualGross: centsToMoney(actualCents),
        diff: 0,
        runningBalance: centsToMoney(balanceCents),
        status: 'UNAUDITED',
        reliable: true,
      });
      logger.debug('Ledger period unaudited', { periodEnding: period.periodEnding });
      continue;
    }

    const own = sources.referenceContext(period.paycheckId);
    const { paycheck } = summarizePeriod(
      {
        periodEnding: period.periodEnding,
        entries: sources.shiftEntries(period.periodEnding),
        scheduleFor: (year) => sources.schedule(year),
        holidaysFor: (year) => sources.holidays(year),
        reference: own ?? currentReference,
      },
      rules,
    );

    const diffCents = actualCents - toCents(paycheck.grossPay);
    balanceCents += diffCents;
    const status = statusFromDiff(diffCents, thresholdCents);

    rows.push({
      paycheckId: period.paycheckId,
      periodEnding: period.periodEnding,
      expectedGross: paycheck.grossPay,
      actualGross: centsToMoney(actualCents),
      diff: centsToMoney(diffCents),
      runningBalance: centsToMoney(balanceCents),
      status,
      reliable: own !== null && paycheck.reliable,
    });
    logger.debug('Ledger period audited', {
      periodEnding: period.periodEnding,
      expectedGross: paycheck.grossPay,
      diff: centsToMoney(diffCents),
      status,
    });
  }

  return rows;
}
