export type NoteDecodeErrorCode = 'decompression_failed' | 'schema_decode_failed';

export class NoteDecodeError extends Error {
  code: NoteDecodeErrorCode;
  details?: unknown;

  constructor(code: NoteDecodeErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'NoteDecodeError';
    this.code = code;
    this.details = details;
  }
}

/** The payload carried a gzip header but the stream could not be inflated. */
export class DecompressionError extends NoteDecodeError {
  constructor(message: string, details?: unknown) {
    super('decompression_failed', message, details);
    this.name = 'DecompressionError';
  }
}

/**
 * The payload did not match the NoteStore layout. `path` names the first missing or invalid
 * field, e.g. `document.note.noteText`; it is empty when the wire stream itself was unreadable.
 */
export class SchemaDecodeError extends NoteDecodeError {
  path: string;

  constructor(message: string, path = '', details?: unknown) {
    super('schema_decode_failed', message, details);
    this.name = 'SchemaDecodeError';
    this.path = path;
  }
}

export function isNoteDecodeError(err: unknown): err is NoteDecodeError {
  return err instanceof NoteDecodeError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
