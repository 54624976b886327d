import { describe, expect, it } from 'vitest';

import {
  extractFallbackText,
  extractPrintableRuns,
  isPrintableByte,
  trimTrailingJunk,
} from './fallbackExtractor';
import { DEFAULT_NOISE_FILTERS } from './noiseFilters';

function bytesOf(...parts: Array<string | number[]>): Uint8Array {
  const chunks = parts.map((part) =>
    typeof part === 'string' ? Buffer.from(part, 'latin1') : Buffer.from(part),
  );
  return new Uint8Array(Buffer.concat(chunks));
}

function pseudoRandomBytes(seed: number, length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  let state = seed;
  for (let i = 0; i < length; i += 1) {
    state = (state * 48271) % 2147483647;
    bytes[i] = state % 256;
  }
  return bytes;
}

describe('isPrintableByte', () => {
  it('accepts ASCII and Latin-1 graphics plus common whitespace', () => {
    expect(isPrintableByte(0x41)).toBe(true);
    expect(isPrintableByte(0x0a)).toBe(true);
    expect(isPrintableByte(0x09)).toBe(true);
    expect(isPrintableByte(0xe9)).toBe(true);
  });

  it('rejects control bytes and the soft hyphen', () => {
    expect(isPrintableByte(0x00)).toBe(false);
    expect(isPrintableByte(0x7f)).toBe(false);
    expect(isPrintableByte(0x85)).toBe(false);
    expect(isPrintableByte(0xad)).toBe(false);
  });
});

describe('extractPrintableRuns', () => {
  it('keeps runs of at least the minimum length', () => {
    expect(extractPrintableRuns(bytesOf([0], 'ab', [0], 'abc', [1], 'hello'))).toEqual([
      'abc',
      'hello',
    ]);
  });

  it('decodes UTF-8 sequences and reads stray high bytes as Latin-1', () => {
    const utf8 = Array.from(Buffer.from('Don\u2019t forget', 'utf8'));
    expect(extractPrintableRuns(bytesOf(utf8, [0x00], 'caf', [0xe9], '!'))).toEqual([
      'Don\u2019t forget',
      'caf\u00e9!',
    ]);
  });
});

describe('trimTrailingJunk', () => {
  it('drops the last junk line and everything after it', () => {
    const text = 'first\n\nsecond\nJ$\nthird';
    expect(trimTrailingJunk(text, DEFAULT_NOISE_FILTERS)).toBe('first\n\nsecond');
  });

  it('leaves clean text alone', () => {
    expect(trimTrailingJunk('first\n\nsecond', DEFAULT_NOISE_FILTERS)).toBe('first\n\nsecond');
  });
});

describe('extractFallbackText', () => {
  it('recovers prose and discards metadata strings', () => {
    const bytes = bytesOf(
      [0x08, 0x00, 0x12],
      'Grocery list for the weekend',
      [0x1a, 0x05],
      'J$',
      [0x00],
      'Remember to call the plumber',
      [0x00, 0x02],
      'com.apple.notes.inlinetextattachment.hashtag',
      [0x00],
      'Zq!',
    );
    expect(extractFallbackText(bytes)).toBe(
      'Grocery list for the weekend\n\nRemember to call the plumber',
    );
  });

  it('cuts the text at a trailing identifier line', () => {
    const bytes = bytesOf(
      'Meeting notes for Monday',
      [0x00],
      'Action items: ship it',
      [0x00],
      'ref 123e4567-e89b-12d3-a456-426614174000 tail',
    );
    expect(extractFallbackText(bytes)).toBe('Meeting notes for Monday\n\nAction items: ship it');
  });

  it('keeps UTF-8 prose readable', () => {
    const prose = 'Don\u2019t forget the caf\u00e9 order today';
    const bytes = bytesOf([0x0a, 0x00, 0x12], Array.from(Buffer.from(prose, 'utf8')), [0x00]);
    expect(extractFallbackText(bytes)).toBe(prose);
  });

  it('keeps short strings when nothing longer survives', () => {
    expect(extractFallbackText(bytesOf('cat', [0x00], 'dog'))).toBe('cat\n\ndog');
  });

  it('applies option overrides', () => {
    const bytes = bytesOf('cat', [0x00], 'elephants walk');
    expect(extractFallbackText(bytes)).toBe('elephants walk');
    expect(extractFallbackText(bytes, { meaningfulLength: 20 })).toBe('cat\n\nelephants walk');
  });

  it('returns an empty string for empty, tiny and non-UTF-8 input', () => {
    expect(extractFallbackText(new Uint8Array([]))).toBe('');
    expect(extractFallbackText(new Uint8Array([0x41]))).toBe('');
    expect(extractFallbackText(new Uint8Array([0xff, 0xfe, 0xc3, 0x28]))).toBe('');
  });

  it('always returns a string for arbitrary bytes', () => {
    for (let seed = 1; seed <= 50; seed += 1) {
      const bytes = pseudoRandomBytes(seed, (seed * 37) % 400);
      expect(typeof extractFallbackText(bytes)).toBe('string');
    }
  });
});
