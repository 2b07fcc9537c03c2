import { describe, it, expect } from 'vitest';
import { calculateDailyBreakdown, DailyBreakdownInput } from '../src/core/dailyBreakdown';
import { Holiday } from '../src/state/payroll-types';
import { makeSchedule } from './helpers/factories';

const monFri = makeSchedule();

function day(partial: Partial<DailyBreakdownInput> & { date: string }): DailyBreakdownInput {
  return { schedule: monFri, holidays: [], ...partial };
}

describe('calculateDailyBreakdown', () => {
  it('splits a 10h scheduled day into 8 regular and 2 overtime', () => {
    const b = calculateDailyBreakdown(day({ date: '2025-01-06', startTime: '07:00', endTime: '17:00' }));
    expect(b.workedHours).toBe(10);
    expect(b.regularHours).toBe(8);
    expect(b.overtimeHours).toBe(2);
    expect(b.nightHours).toBe(0);
    expect(b.sundayHours).toBe(0);
    expect(b.gapHours).toBe(0);
    expect(b.issues).toEqual([]);
  });

  it('puts a late-start overnight shift on the previous evening and counts it all as night', () => {
    const b = calculateDailyBreakdown(day({ date: '2025-01-07', startTime: '22:00', endTime: '06:00' }));
    expect(b.workedHours).toBe(8);
    expect(b.nightHours).toBe(8);
    expect(b.boundary).toBe('STARTED_PREVIOUS_DAY');
    expect(b.issues).toHaveLength(1);
    expect(b.issues[0].code).toBe('AMBIGUOUS_SHIFT_BOUNDARY');
    expect(b.issues[0].level).toBe('INFO');
    expect(b.issues[0].meta).toEqual({ boundary: 'STARTED_PREVIOUS_DAY' });
  });

  it('runs an earlier-start crossing shift into the next morning', () => {
    const b = calculateDailyBreakdown(day({ date: '2025-01-06', startTime: '17:00', endTime: '01:00' }));
    expect(b.boundary).toBe('ENDS_NEXT_DAY');
    expect(b.workedHours).toBe(8);
    expect(b.nightHours).toBe(7);
  });

  it('treats equal start and end as no work', () => {
    const b = calculateDailyBreakdown(
      day({ date: '2025-01-06', startTime: '08:00', endTime: '08:00', leave: 'Sick' }),
    );
    expect(b.workedHours).toBe(0);
    expect(b.chargedLeaveHours).toBe(8);
    expect(b.leave).toBe('Sick');
  });

  describe('Sunday premium', () => {
    const sunThu = makeSchedule([6, 0, 1, 2, 3]);

    it('credits a scheduled shift that touches Sunday up to 8 hours', () => {
      // starts Saturday 23:00, ends Sunday 07:00: only 7 hours are on Sunday
      const b = calculateDailyBreakdown(
        day({ date: '2025-01-05', startTime: '23:00', endTime: '07:00', schedule: sunThu }),
      );
      expect(b.isWorkday).toBe(true);
      expect(b.workedHours).toBe(8);
      expect(b.sundayHours).toBe(8);
    });

    it('caps the touch rule at 8 hours', () => {
      const b = calculateDailyBreakdown(
        day({ date: '2025-01-05', startTime: '08:00', endTime: '18:00', schedule: sunThu }),
      );
      expect(b.sundayHours).toBe(8);
      expect(b.regularHours).toBe(8);
      expect(b.overtimeHours).toBe(2);
    });

    it('counts only the Sunday clock time on a day off', () => {
      const b = calculateDailyBreakdown(day({ date: '2025-01-05', startTime: '23:00', endTime: '07:00' }));
      expect(b.isWorkday).toBe(false);
      expect(b.regularHours).toBe(0);
      expect(b.overtimeHours).toBe(8);
      expect(b.sundayHours).toBe(7);
      expect(b.nightHours).toBe(7);
    });
  });

  describe('gap analysis', () => {
    it('charges a short day to the designated leave', () => {
      const b = calculateDailyBreakdown(
        day({ date: '2025-01-06', startTime: '08:00', endTime: '12:00', leave: 'Annual' }),
      );
      expect(b.regularHours).toBe(4);
      expect(b.chargedLeaveHours).toBe(4);
      expect(b.holidayLeaveHours).toBe(0);
    });

    it('credits holiday leave on an observed holiday without a designation', () => {
      const holidays: Holiday[] = [{ year: 2025, name: 'Test Day', date: '2025-01-06' }];
      const b = calculateDailyBreakdown(day({ date: '2025-01-06', holidays }));
      expect(b.isObservedHoliday).toBe(true);
      expect(b.holidayLeaveHours).toBe(8);
      expect(b.chargedLeaveHours).toBe(0);
      expect(b.issues).toEqual([]);
    });

    it('credits holiday leave when the designation is Holiday', () => {
      const b = calculateDailyBreakdown(day({ date: '2025-01-06', leave: 'Holiday' }));
      expect(b.holidayLeaveHours).toBe(8);
      expect(b.chargedLeaveHours).toBe(0);
    });

    it('leaves an undesignated gap uncredited and reports it', () => {
      const b = calculateDailyBreakdown(day({ date: '2025-01-06' }));
      expect(b.gapHours).toBe(8);
      expect(b.chargedLeaveHours).toBe(0);
      expect(b.holidayLeaveHours).toBe(0);
      expect(b.issues.map((i) => [i.level, i.code])).toEqual([['WARNING', 'UNRESOLVED_GAP']]);
    });

    it('ignores leave on a day off', () => {
      const b = calculateDailyBreakdown(day({ date: '2025-01-04', leave: 'Annual' }));
      expect(b.chargedLeaveHours).toBe(0);
      expect(b.gapHours).toBe(0);
    });
  });

  it('stacks holiday-worked hours on the slid observed date', () => {
    const holidays: Holiday[] = [{ year: 2026, name: 'Independence Day', date: '2026-07-04' }];
    const b = calculateDailyBreakdown(
      day({ date: '2026-07-03', startTime: '08:00', endTime: '16:00', holidays }),
    );
    expect(b.isObservedHoliday).toBe(true);
    expect(b.holidayWorkedHours).toBe(8);
    expect(b.regularHours).toBe(8);
    expect(b.holidayLeaveHours).toBe(0);
  });

  it('degrades to a day off when the weekday has no schedule entry', () => {
    const b = calculateDailyBreakdown(
      day({ date: '2025-01-06', startTime: '08:00', endTime: '16:00', schedule: [] }),
    );
    expect(b.isWorkday).toBe(false);
    expect(b.overtimeHours).toBe(8);
    expect(b.issues.map((i) => i.code)).toEqual(['MISSING_SCHEDULE']);
  });

  it('passes supplemental hours through untouched', () => {
    const supplementalHours = { OJTI: 2, CIC: 1.5 };
    const b = calculateDailyBreakdown(
      day({ date: '2025-01-06', startTime: '08:00', endTime: '16:00', supplementalHours }),
    );
    expect(b.supplementalHours).toEqual({ OJTI: 2, CIC: 1.5 });
    expect(b.supplementalHours).not.toBe(supplementalHours);
  });

  it('reads caps and the night window from the rules', () => {
    const b = calculateDailyBreakdown(
      day({ date: '2025-01-06', startTime: '07:00', endTime: '17:00' }),
      { dailyRegularCap: 10, nightStartHour: 16 },
    );
    expect(b.regularHours).toBe(10);
    expect(b.overtimeHours).toBe(0);
    expect(b.nightHours).toBe(1);
  });
});
