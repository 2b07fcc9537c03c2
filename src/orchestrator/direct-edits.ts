import { ShiftEdit, ShiftEntry } from '../state/payroll-types';
import { isLocalTime } from '../core/clock';
import { max0, num } from '../state/number';
import { PayrollError, PayrollErrorCode } from '../errors';

type TimeEdit = Extract<ShiftEdit, { field: 'startTime' | 'endTime' }>;

function assertTime(edit: TimeEdit) {
  if (edit.value !== null && !isLocalTime(edit.value)) {
    throw new PayrollError({
      code: PayrollErrorCode.INVALID_TIME,
      message: `[timesheet] ${edit.field} on ${edit.date} is not HH:MM: ${edit.value}`,
      details: { date: edit.date, field: edit.field, value: edit.value },
    });
  }
}

/** Writes edits into a draft timesheet. Dates outside the sheet are skipped. */
export function applyDirectEdits(draft: ShiftEntry[], edits: ShiftEdit[]): Set<string> {
  const touched = new Set<string>();
  for (const edit of edits) {
    const entry = draft.find((e) => e.date === edit.date);
    if (!entry) continue;
    switch (edit.field) {
      case 'startTime':
        assertTime(edit);
        entry.startTime = edit.value;
        break;
      case 'endTime':
        assertTime(edit);
        entry.endTime = edit.value;
        break;
      case 'leave':
        entry.leave = edit.value;
        break;
      case 'supplementalHours': {
        const hours = max0(num(edit.value));
        if (hours > 0) entry.supplementalHours[edit.category] = hours;
        else delete entry.supplementalHours[edit.category];
        break;
      }
    }
    touched.add(edit.date);
  }
  return touched;
}
