import zlib from 'node:zlib';

import { DecompressionError, describeError } from './errors';

export const GZIP_MAGIC = [0x1f, 0x8b] as const;

export function isGzipPayload(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];
}

/**
 * Inflates a gzip-framed payload. Anything without the gzip magic is an older, uncompressed
 * record and is returned as is.
 */
export function decompressPayload(bytes: Uint8Array): Uint8Array {
  if (!isGzipPayload(bytes)) {
    return bytes;
  }
  try {
    return new Uint8Array(zlib.gunzipSync(bytes));
  } catch (err) {
    throw new DecompressionError(`Failed to inflate note payload: ${describeError(err)}`, err);
  }
}

/**
 * Inflates whatever a truncated or damaged gzip stream still yields. Returns undefined when
 * nothing comes out, as with a broken header.
 */
export function inflatePartialPayload(bytes: Uint8Array): Uint8Array | undefined {
  let partial: Buffer;
  try {
    partial = zlib.gunzipSync(bytes, { finishFlush: zlib.constants.Z_SYNC_FLUSH });
  } catch {
    return undefined;
  }
  return partial.length > 0 ? new Uint8Array(partial) : undefined;
}
