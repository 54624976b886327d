import {
  decodeNoteContent,
  describeError,
  type AttachmentRef,
  type NoiseFilterOptions,
} from '@notestore/note-decoder';
import { normalizeTags, type Logger } from '@notestore/shared';

import { createAttachmentLookup } from './attachmentLookup';
import type { NoteStoreConfig } from './config';
import {
  AppleNotesStore,
  type AttachmentRecord,
  type NoteRow,
  type NoteStoreReader,
} from './noteStore';
import { appleTimestampToIso } from './timestamps';

/** Fallback text shorter than this is replaced by the note's snippet. */
const MIN_FALLBACK_TEXT_LENGTH = 10;

export type NoteContentSource = 'structured' | 'fallback' | 'snippet';

export interface NoteAttachment {
  identifier: string;
  typeUti: string;
  /** Offset of the U+FFFC placeholder in `content`. */
  offset: number;
  filename: string | null;
  size: number | null;
}

export interface AppleNote {
  id: number;
  identifier: string | null;
  title: string;
  content: string;
  contentSource: NoteContentSource;
  folder: string | null;
  createdAt: string | null;
  modifiedAt: string | null;
  tags: string[];
  attachments: NoteAttachment[];
}

export interface NoteExtractionFailure {
  noteId: number;
  title: string;
  error: string;
}

export interface ExtractionResult {
  notes: AppleNote[];
  failures: NoteExtractionFailure[];
}

export interface ExtractNotesOptions {
  maxNotes?: number;
  logger?: Logger;
  noiseFilters?: Partial<NoiseFilterOptions>;
}

function toNoteAttachment(
  ref: AttachmentRef,
  offset: number,
  record: AttachmentRecord | null,
): NoteAttachment {
  return {
    identifier: ref.identifier,
    typeUti: ref.classifier || record?.typeUti || '',
    offset,
    filename: record?.filename ?? null,
    size: record?.size ?? null,
  };
}

function readAttachmentRecord(
  reader: NoteStoreReader,
  identifier: string,
  logger: Logger,
): AttachmentRecord | null {
  try {
    return reader.getAttachment(identifier);
  } catch (err) {
    logger.warn(`[apple-notes] could not read attachment ${identifier}: ${describeError(err)}`);
    return null;
  }
}

function buildNote(
  row: NoteRow,
  reader: NoteStoreReader,
  logger: Logger,
  noiseFilters: Partial<NoiseFilterOptions> | undefined,
): AppleNote {
  const base = {
    id: row.id,
    identifier: row.identifier,
    title: row.title || 'Untitled',
    folder: row.folder,
    createdAt: appleTimestampToIso(row.created),
    modifiedAt: appleTimestampToIso(row.modified),
  };

  if (!row.content || row.content.length === 0) {
    const content = row.snippet ?? '';
    return { ...base, content, contentSource: 'snippet', tags: [], attachments: [] };
  }

  const decoded = decodeNoteContent(new Uint8Array(row.content), {
    lookup: createAttachmentLookup(reader),
    logger,
    ...(noiseFilters ? { noiseFilters } : {}),
  });

  if (decoded.source === 'fallback') {
    if (decoded.text.length < MIN_FALLBACK_TEXT_LENGTH && row.snippet) {
      const content = row.snippet;
      return { ...base, content, contentSource: 'snippet', tags: [], attachments: [] };
    }
    const content = decoded.text;
    return { ...base, content, contentSource: 'fallback', tags: [], attachments: [] };
  }

  const hashtags = decoded.substitutions
    .filter((substitution) => substitution.kind === 'hashtag')
    .map((substitution) => substitution.text);

  return {
    ...base,
    content: decoded.text,
    contentSource: 'structured',
    tags: normalizeTags(hashtags),
    attachments: decoded.fileMarkers.map((marker) =>
      toNoteAttachment(
        marker.ref,
        marker.offset,
        readAttachmentRecord(reader, marker.ref.identifier, logger),
      ),
    ),
  };
}

/**
 * Decodes every live note in the store. A note that cannot be read is logged and reported in
 * `failures`; the remaining notes are still returned.
 */
export function extractAllNotes(
  reader: NoteStoreReader,
  options: ExtractNotesOptions = {},
): ExtractionResult {
  const logger = options.logger ?? console;
  const rows = reader.listNoteRows();
  const selected = options.maxNotes !== undefined ? rows.slice(0, options.maxNotes) : rows;

  const notes: AppleNote[] = [];
  const failures: NoteExtractionFailure[] = [];

  for (const row of selected) {
    try {
      notes.push(buildNote(row, reader, logger, options.noiseFilters));
    } catch (err) {
      const title = row.title || 'Untitled';
      const error = describeError(err);
      logger.error(`[apple-notes] failed to extract note ${row.id} (${title}): ${error}`);
      failures.push({ noteId: row.id, title, error });
    }
  }

  const fallbackCount = notes.filter((note) => note.contentSource !== 'structured').length;
  logger.info(
    `[apple-notes] extracted ${notes.length} notes ` +
      `(${fallbackCount} without structure, ${failures.length} failed)`,
  );

  return { notes, failures };
}

/** Opens the configured database, extracts its notes and closes it again. */
export function extractNotesFromConfig(
  config: NoteStoreConfig,
  logger: Logger = console,
): ExtractionResult {
  const store = new AppleNotesStore(config.dbPath);
  try {
    return extractAllNotes(store, {
      logger,
      ...(config.maxNotes !== undefined ? { maxNotes: config.maxNotes } : {}),
      ...(config.fallback ? { noiseFilters: config.fallback } : {}),
    });
  } finally {
    store.close();
  }
}
