import { describe, expect, it } from 'vitest';

import {
  DEFAULT_NOISE_FILTERS,
  isJunkString,
  isTrailingJunkLine,
  resolveNoiseFilters,
} from './noiseFilters';

describe('isJunkString', () => {
  it('keeps ordinary prose', () => {
    expect(isJunkString('Buy milk and eggs tomorrow')).toBe(false);
    expect(isJunkString('Café on the corner opens at nine')).toBe(false);
  });

  it('rejects empty strings', () => {
    expect(isJunkString('')).toBe(true);
  });

  it('rejects strings that are mostly symbols', () => {
    expect(isJunkString('!!!@@@###')).toBe(true);
    expect(isJunkString('a.b,c;d!?')).toBe(true);
  });

  it('rejects hex blobs', () => {
    expect(isJunkString('deadbeef-1234')).toBe(true);
    expect(isJunkString('0A1B 2C3D\n4E5F')).toBe(true);
  });

  it('keeps words spelled only with hex letters', () => {
    expect(isJunkString('Bad Dec face')).toBe(false);
    expect(isJunkString('decade')).toBe(false);
  });

  it('rejects strings carrying schema identifiers', () => {
    expect(isJunkString('see NSKeyedArchiver data')).toBe(true);
    expect(isJunkString('type com.apple.notes.table here')).toBe(true);
  });

  it('rejects strings dense with mis-decoded accents', () => {
    expect(isJunkString('ÃÃÃ abc')).toBe(true);
  });

  it('honours overridden substring lists', () => {
    const options = resolveNoiseFilters({ junkSubstrings: [] });
    expect(isJunkString('see NSKeyedArchiver data', options)).toBe(false);
  });

  it('honours overridden ratios', () => {
    const options = { ...DEFAULT_NOISE_FILTERS, minAlphanumericRatio: 0.95 };
    expect(isJunkString('Hello, world!', options)).toBe(true);
    expect(isJunkString('Hello, world!')).toBe(false);
  });
});

describe('isTrailingJunkLine', () => {
  it('matches short protocol markers', () => {
    expect(isTrailingJunkLine('J$')).toBe(true);
    expect(isTrailingJunkLine(' (* ')).toBe(true);
    expect(isTrailingJunkLine('OK')).toBe(false);
    expect(isTrailingJunkLine('')).toBe(false);
  });

  it('matches UUID-shaped tokens', () => {
    expect(isTrailingJunkLine('ID 123e4567-e89b-12d3-a456-426614174000')).toBe(true);
  });

  it('matches namespaced identifiers', () => {
    expect(isTrailingJunkLine('public.jpeg')).toBe(true);
    expect(isTrailingJunkLine('kind com.example.drawing')).toBe(true);
    expect(isTrailingJunkLine('visit example.com today')).toBe(false);
  });

  it('matches runs of high Latin-1 bytes', () => {
    expect(isTrailingJunkLine('xþÿy')).toBe(true);
    expect(isTrailingJunkLine('Café')).toBe(false);
  });
});
