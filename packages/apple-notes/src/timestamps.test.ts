import { describe, expect, it } from 'vitest';

import { appleTimestampToDate, appleTimestampToIso } from './timestamps';

describe('appleTimestampToDate', () => {
  it('counts seconds from 2001-01-01 UTC', () => {
    expect(appleTimestampToDate(0)?.toISOString()).toBe('2001-01-01T00:00:00.000Z');
    expect(appleTimestampToIso(86_400.5)).toBe('2001-01-02T00:00:00.500Z');
  });

  it('handles dates before the reference date', () => {
    expect(appleTimestampToIso(-978_307_200)).toBe('1970-01-01T00:00:00.000Z');
  });

  it('returns null for missing or non-finite values', () => {
    expect(appleTimestampToDate(null)).toBeNull();
    expect(appleTimestampToDate(undefined)).toBeNull();
    expect(appleTimestampToDate(Number.NaN)).toBeNull();
    expect(appleTimestampToIso(Number.POSITIVE_INFINITY)).toBeNull();
    expect(appleTimestampToIso(1e20)).toBeNull();
  });
});
