import { describe, it, expect } from 'vitest';
import { addDays, daysBetween, toDate } from '../../src/utils/dates.js';

describe('toDate', () => {
  it('should read a naive timestamp as UTC', () => {
    expect(toDate('2026-03-01T09:30:00').toISOString()).toBe('2026-03-01T09:30:00.000Z');
  });

  it('should read a space-separated naive timestamp as UTC', () => {
    expect(toDate('2026-03-01 09:30:00').toISOString()).toBe('2026-03-01T09:30:00.000Z');
    expect(toDate('2026-03-01 09:30:00').getTime()).toBe(toDate('2026-03-01T09:30:00').getTime());
  });

  it('should honour an offset after a space separator', () => {
    expect(toDate('2026-03-01 09:30:00+00:00').toISOString()).toBe('2026-03-01T09:30:00.000Z');
  });

  it('should honour an explicit offset', () => {
    expect(toDate('2026-03-01T09:30:00-05:00').toISOString()).toBe('2026-03-01T14:30:00.000Z');
    expect(toDate('2026-03-01T09:30:00Z').toISOString()).toBe('2026-03-01T09:30:00.000Z');
  });

  it('should read a bare date as UTC midnight', () => {
    expect(toDate('2026-03-01').toISOString()).toBe('2026-03-01T00:00:00.000Z');
  });

  it('should copy Date inputs', () => {
    const original = new Date('2026-03-01T00:00:00Z');
    const copy = toDate(original);
    expect(copy).not.toBe(original);
    expect(copy.getTime()).toBe(original.getTime());
  });
});

describe('date arithmetic', () => {
  it('should add and count whole days', () => {
    const start = new Date('2026-03-01T12:00:00Z');
    expect(addDays(start, -14).toISOString()).toBe('2026-02-15T12:00:00.000Z');
    expect(daysBetween(start, new Date('2026-03-04T11:00:00Z'))).toBe(2);
  });
});
