import { describe, expect, it } from 'vitest';
import { compareOrderKeys, toEffectiveTime, toSubMillis, type OrderKey } from '@/lib/chat/cursors';

function key(partial: Partial<OrderKey>): OrderKey {
  return { effectiveAt: 1000, subMillis: 0, id: null, seq: 0, ...partial };
}

describe('toSubMillis', () => {
  it('keeps the digits past the millisecond', () => {
    expect(toSubMillis('2024-05-01T10:00:04.123900+00:00')).toBe(0.9);
    expect(toSubMillis('2024-05-01T10:00:04.123456Z')).toBe(0.456);
  });

  it('is zero at millisecond precision or coarser', () => {
    expect(toSubMillis('2024-05-01T10:00:04.123Z')).toBe(0);
    expect(toSubMillis('2024-05-01T10:00:04Z')).toBe(0);
  });
});

describe('toEffectiveTime', () => {
  it('sorts unparseable timestamps last', () => {
    expect(toEffectiveTime('not a date')).toBe(Number.MAX_SAFE_INTEGER);
  });
});

describe('compareOrderKeys', () => {
  it('compares milliseconds, then the fraction', () => {
    expect(compareOrderKeys(key({ effectiveAt: 1 }), key({ effectiveAt: 2 }))).toBeLessThan(0);
    expect(compareOrderKeys(key({ subMillis: 0.9 }), key({ subMillis: 0.1 }))).toBeGreaterThan(0);
  });

  it('orders confirmed ties by id regardless of seq', () => {
    expect(compareOrderKeys(key({ id: 'a', seq: 9 }), key({ id: 'b', seq: 1 }))).toBe(-1);
  });

  it('puts confirmed before pending and pending by seq', () => {
    expect(compareOrderKeys(key({ seq: 1 }), key({ id: 'z', seq: 5 }))).toBe(1);
    expect(compareOrderKeys(key({ seq: 1 }), key({ seq: 2 }))).toBe(-1);
  });
});
