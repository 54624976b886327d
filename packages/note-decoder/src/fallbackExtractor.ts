import {
  isJunkString,
  isTrailingJunkLine,
  resolveNoiseFilters,
  type NoiseFilterOptions,
} from './noiseFilters';

const TAB = 0x09;
const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const SOFT_HYPHEN = 0xad;

/** Printable when read as Latin-1: ASCII graphics, Latin-1 graphics and common whitespace. */
export function isPrintableByte(byte: number): boolean {
  if (byte === TAB || byte === LINE_FEED || byte === CARRIAGE_RETURN) {
    return true;
  }
  if (byte >= 0x20 && byte <= 0x7e) {
    return true;
  }
  return byte >= 0xa0 && byte <= 0xff && byte !== SOFT_HYPHEN;
}

function utf8SequenceLength(lead: number): number {
  if (lead >= 0xc2 && lead <= 0xdf) {
    return 2;
  }
  if (lead >= 0xe0 && lead <= 0xef) {
    return 3;
  }
  if (lead >= 0xf0 && lead <= 0xf4) {
    return 4;
  }
  return 0;
}

const C1_CONTROLS = /[\u0080-\u009f]/;

/**
 * Decodes a printable multi-byte UTF-8 character starting at `index`, or returns undefined
 * when the bytes there are not one.
 */
function readUtf8Char(bytes: Uint8Array, index: number): string | undefined {
  const lead = bytes[index];
  const length = lead === undefined ? 0 : utf8SequenceLength(lead);
  if (length === 0 || index + length > bytes.length) {
    return undefined;
  }
  for (let offset = 1; offset < length; offset += 1) {
    const next = bytes[index + offset];
    if (next === undefined || next < 0x80 || next > 0xbf) {
      return undefined;
    }
  }
  // overlong forms and surrogates decode to U+FFFD
  const char = Buffer.from(bytes.subarray(index, index + length)).toString('utf8');
  if (char.includes('\uFFFD') || C1_CONTROLS.test(char)) {
    return undefined;
  }
  return char;
}

/**
 * Splits the payload into runs of printable characters. Valid UTF-8 sequences are decoded
 * as such; every other byte is read as Latin-1.
 */
export function extractPrintableRuns(bytes: Uint8Array, minRunLength = 3): string[] {
  const runs: string[] = [];
  let current = '';
  let index = 0;
  while (index < bytes.length) {
    const char = readUtf8Char(bytes, index);
    if (char !== undefined) {
      current += char;
      index += Buffer.byteLength(char, 'utf8');
      continue;
    }
    const byte = bytes[index] ?? 0;
    index += 1;
    if (isPrintableByte(byte)) {
      current += String.fromCharCode(byte);
      continue;
    }
    if (current.length >= minRunLength) {
      runs.push(current);
    }
    current = '';
  }
  if (current.length >= minRunLength) {
    runs.push(current);
  }
  return runs;
}

/**
 * Drops the tail of the text starting at the last line that looks like serialized metadata.
 * Metadata trails the prose in these payloads, so everything after that line goes too.
 */
export function trimTrailingJunk(text: string, options: NoiseFilterOptions): string {
  const lines = text.split('\n');
  for (let index = lines.length - 1; index >= 0; index -= 1) {
    const line = lines[index];
    if (line !== undefined && isTrailingJunkLine(line, options)) {
      return lines.slice(0, index).join('\n').trimEnd();
    }
  }
  return text.trimEnd();
}

/**
 * Best-effort text recovery for payloads that cannot be decoded structurally. Attachment
 * positions are lost on this path. Returns an empty string when nothing survives filtering.
 */
export function extractFallbackText(
  bytes: Uint8Array,
  overrides?: Partial<NoiseFilterOptions>,
): string {
  const options = resolveNoiseFilters(overrides);
  const candidates = extractPrintableRuns(bytes, options.minRunLength)
    .map((run) => run.trim())
    .filter((run) => run.length > 0 && !isJunkString(run, options));

  const meaningful = candidates.filter((run) => run.length > options.meaningfulLength);
  const kept = meaningful.length > 0 ? meaningful : candidates;

  return trimTrailingJunk(kept.join('\n\n'), options);
}
