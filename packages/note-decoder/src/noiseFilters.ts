/**
 * Tunable predicates used when a payload has to be scraped for text instead of decoded.
 * The defaults were fitted against real NoteStore records; they reject metadata-shaped
 * strings and keep prose, but none of them is exact.
 */
export interface NoiseFilterOptions {
  /** Shortest printable byte run considered at all. */
  minRunLength: number;
  /** Strings longer than this are preferred over shorter ones. */
  meaningfulLength: number;
  /** Minimum share of letters, digits and whitespace. */
  minAlphanumericRatio: number;
  /** Schema and class names that only show up in serialized metadata. */
  junkSubstrings: string[];
  /** Latin-1 characters typical of UTF-8 bytes read one at a time. */
  mojibakeChars: string[];
  maxMojibakeRatio: number;
  /** Strings shorter than this are junk when mostly punctuation. */
  shortStringLength: number;
  maxShortPunctuationRatio: number;
  /** A line matching any of these starts the junk tail of extracted text. */
  trailingJunkPatterns: RegExp[];
}

export const DEFAULT_JUNK_SUBSTRINGS = [
  'com.apple.',
  'NSObject',
  'NSString',
  'NSDictionary',
  'NSKeyedArchiver',
  '$classname',
  '$objects',
  'bplist',
  'ICAttachment',
  'ICNote',
  'ICTable',
  'CRDT',
  'TTStyle',
];

// Ã, Â and â lead most two-byte UTF-8 sequences when they are read as Latin-1.
export const DEFAULT_MOJIBAKE_CHARS = [
  '\u00c2',
  '\u00c3',
  '\u00e2',
  '\u00d0',
  '\u00d1',
  '\u00d8',
  '\u00de',
  '\u00f0',
  '\u00f8',
  '\u00fe',
  '\u00ff',
];

export const DEFAULT_TRAILING_JUNK_PATTERNS: RegExp[] = [
  // runs of high Latin-1 bytes left over from binary fields
  /[\u00c0-\u00ff]{2,}/,
  // short protocol markers such as `J$` or `(*`
  /^\s*(?=\S*[^\p{L}\p{N}\s])\S{1,4}\s*$/u,
  /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/i,
  /(?:^|\s)(?:com|public|org)\.[a-z0-9_-]+/i,
];

export const DEFAULT_NOISE_FILTERS: NoiseFilterOptions = {
  minRunLength: 3,
  meaningfulLength: 10,
  minAlphanumericRatio: 0.5,
  junkSubstrings: DEFAULT_JUNK_SUBSTRINGS,
  mojibakeChars: DEFAULT_MOJIBAKE_CHARS,
  maxMojibakeRatio: 0.3,
  shortStringLength: 15,
  maxShortPunctuationRatio: 0.5,
  trailingJunkPatterns: DEFAULT_TRAILING_JUNK_PATTERNS,
};

export function resolveNoiseFilters(overrides?: Partial<NoiseFilterOptions>): NoiseFilterOptions {
  return { ...DEFAULT_NOISE_FILTERS, ...overrides };
}

const ALPHANUMERIC_OR_SPACE = /[\p{L}\p{N}\s]/u;
const HEX_OR_DASH = /^[0-9a-fA-F-]+$/;
const DIGIT = /[0-9]/;
const PUNCTUATION = /[\p{P}\p{S}]/u;

function countMatching(chars: string[], predicate: (char: string) => boolean): number {
  let count = 0;
  for (const char of chars) {
    if (predicate(char)) {
      count += 1;
    }
  }
  return count;
}

export function isJunkString(
  value: string,
  options: NoiseFilterOptions = DEFAULT_NOISE_FILTERS,
): boolean {
  const chars = Array.from(value);
  if (chars.length === 0) {
    return true;
  }

  const alphanumeric = countMatching(chars, (char) => ALPHANUMERIC_OR_SPACE.test(char));
  if (alphanumeric / chars.length < options.minAlphanumericRatio) {
    return true;
  }

  const compact = value.replace(/[ \r\n]/g, '');
  // words such as "face" or "Dec" are hex too, so a blob needs at least one digit
  if (HEX_OR_DASH.test(compact) && DIGIT.test(compact)) {
    return true;
  }

  if (options.junkSubstrings.some((needle) => needle && value.includes(needle))) {
    return true;
  }

  const mojibake = new Set(options.mojibakeChars);
  const mojibakeCount = countMatching(chars, (char) => mojibake.has(char));
  if (mojibakeCount / chars.length > options.maxMojibakeRatio) {
    return true;
  }

  if (chars.length < options.shortStringLength) {
    const punctuation = countMatching(chars, (char) => PUNCTUATION.test(char));
    if (punctuation / chars.length > options.maxShortPunctuationRatio) {
      return true;
    }
  }

  return false;
}

export function isTrailingJunkLine(
  line: string,
  options: NoiseFilterOptions = DEFAULT_NOISE_FILTERS,
): boolean {
  return options.trailingJunkPatterns.some((pattern) => pattern.test(line));
}
