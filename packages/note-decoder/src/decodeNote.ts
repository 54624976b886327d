import { resolveAttachments } from './attachmentResolver';
import { decompressPayload, inflatePartialPayload } from './decompress';
import {
  DecompressionError,
  SchemaDecodeError,
  describeError,
  isNoteDecodeError,
} from './errors';
import { extractFallbackText } from './fallbackExtractor';
import { decodeNoteStore } from './structuredDecoder';
import type { DecodeNoteOptions, DecodedNoteContent } from './types';

function fallbackResult(
  bytes: Uint8Array,
  error: Error,
  options: DecodeNoteOptions,
): DecodedNoteContent {
  return {
    source: 'fallback',
    error,
    text: extractFallbackText(bytes, options.noiseFilters),
    positions: new Map(),
    fileMarkers: [],
    substitutions: [],
  };
}

/**
 * Decodes one note payload into text plus attachment positions. Decompression and schema
 * failures do not escape; they switch to byte scanning, which returns text without positions.
 * Anything else, such as the bundled schema failing to load, is rethrown.
 */
export function decodeNoteContent(
  blob: Uint8Array,
  options: DecodeNoteOptions = {},
): DecodedNoteContent {
  const logger = options.logger ?? console;

  if (blob.length === 0) {
    return fallbackResult(blob, new SchemaDecodeError('Empty note payload', 'document'), options);
  }

  let payload = blob;
  try {
    payload = decompressPayload(blob);
    const structured = decodeNoteStore(payload);
    const resolved = resolveAttachments(structured.text, structured.runs, options.lookup, {
      logger,
    });
    return { source: 'structured', ...resolved };
  } catch (err) {
    if (!isNoteDecodeError(err)) {
      throw err;
    }
    logger.warn(`[note-decoder] ${err.code}, falling back to text scan: ${describeError(err)}`);
    // a cut-off stream still inflates up to the damage; scan that before the compressed bytes
    const scanned =
      err instanceof DecompressionError ? (inflatePartialPayload(blob) ?? blob) : payload;
    return fallbackResult(scanned, err, options);
  }
}
