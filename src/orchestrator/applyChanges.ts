import { ShiftEdit, ShiftEntry, ShiftFieldDiff } from '../state/payroll-types';
import { produce } from 'immer';
import { applyDirectEdits } from './direct-edits';
import { buildDiff } from './diff';

export type ApplyShiftEditsResult = {
  next: ShiftEntry[];
  touched: Set<string>; // dates that received at least one edit
  diff: ShiftFieldDiff[]; // field-level before/after
};

export function applyShiftEdits(current: ShiftEntry[], edits: ShiftEdit[]): ApplyShiftEditsResult {
  let touched = new Set<string>();

  const next = produce(current, (draft) => {
    touched = applyDirectEdits(draft, edits);
  });

  // unchanged input comes back as the same reference
  const diff = buildDiff(current, next, touched);
  return { next, touched, diff };
}
