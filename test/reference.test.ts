import { describe, it, expect } from 'vitest';
import { selectReferenceContext } from '../src/state/reference';
import { makeRegularOnly } from './helpers/factories';

describe('selectReferenceContext', () => {
  const a = makeRegularOnly('a', '2025-01-11', 50, 4000);
  const lapse = makeRegularOnly('b', '2025-01-25', 0, 0);
  const c = makeRegularOnly('c', '2025-02-08', 52, 4160);
  const all = [c, lapse, a];

  it('uses the statement itself when it has a regular rate', () => {
    const ctx = selectReferenceContext(all, 'a');
    expect(ctx.source).toBe('SELF');
    expect(ctx.paycheckId).toBe('a');
    expect(ctx.baseRate).toBe(50);
    expect(ctx.referenceGross).toBe(4000);
    expect(ctx.earnings.map((l) => [l.type, l.category, l.currentAmount])).toEqual([
      ['Regular', 'REGULAR', 4000],
    ]);
  });

  it('falls back to the latest earlier statement with a rate during a lapse', () => {
    const ctx = selectReferenceContext(all, 'b');
    expect(ctx.source).toBe('FALLBACK');
    expect(ctx.paycheckId).toBe('a');
    expect(ctx.baseRate).toBe(50);
  });

  it('returns a zero-rate context when only later statements have a rate', () => {
    const ctx = selectReferenceContext([lapse, c], 'b');
    expect(ctx.source).toBe('NONE');
    expect(ctx.baseRate).toBe(0);
    expect(ctx.earnings).toEqual([]);
  });

  it('returns no context for an id that is not on file', () => {
    const ctx = selectReferenceContext(all, 'zzz');
    expect(ctx.source).toBe('NONE');
    expect(ctx.paycheckId).toBeUndefined();
    expect(ctx.baseRate).toBe(0);
  });
});
