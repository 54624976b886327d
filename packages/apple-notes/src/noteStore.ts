import fs from 'node:fs';

import Database from 'better-sqlite3';
import { describeError } from '@notestore/note-decoder';

import { DEFAULT_DB_PATH } from './config';
import { NoteStoreAccessError, NoteStoreNotFoundError, NoteStoreReadError } from './errors';

export type NoteRow = {
  id: number;
  identifier: string | null;
  title: string | null;
  snippet: string | null;
  created: number | null;
  modified: number | null;
  folder: string | null;
  content: Buffer | null;
};

export type AttachmentRecord = {
  identifier: string;
  typeUti: string | null;
  altText: string | null;
  size: number | null;
  filename: string | null;
};

/** Read access the extractor needs; implemented by AppleNotesStore and by test fakes. */
export interface NoteStoreReader {
  listNoteRows(): NoteRow[];
  getAttachment(identifier: string): AttachmentRecord | null;
}

// Notes and folders share ZICCLOUDSYNCINGOBJECT; note bodies live in ZICNOTEDATA.
const LIST_NOTES_SQL = `
  SELECT
    n.Z_PK AS id,
    n.ZIDENTIFIER AS identifier,
    n.ZTITLE1 AS title,
    n.ZSNIPPET AS snippet,
    n.ZCREATIONDATE1 AS created,
    n.ZMODIFICATIONDATE1 AS modified,
    f.ZTITLE2 AS folder,
    c.ZDATA AS content
  FROM ZICCLOUDSYNCINGOBJECT n
  LEFT JOIN ZICCLOUDSYNCINGOBJECT f ON n.ZFOLDER = f.Z_PK
  LEFT JOIN ZICNOTEDATA c ON n.ZNOTEDATA = c.Z_PK
  WHERE n.ZTITLE1 IS NOT NULL
    AND n.ZMARKEDFORDELETION = 0
  ORDER BY n.ZMODIFICATIONDATE1 DESC
`;

const GET_ATTACHMENT_SQL = `
  SELECT
    a.ZIDENTIFIER AS identifier,
    a.ZTYPEUTI AS typeUti,
    a.ZALTTEXT AS altText,
    a.ZFILESIZE AS size,
    m.ZFILENAME AS filename
  FROM ZICCLOUDSYNCINGOBJECT a
  LEFT JOIN ZICCLOUDSYNCINGOBJECT m ON a.ZMEDIA = m.Z_PK
  WHERE a.ZIDENTIFIER = ?
  LIMIT 1
`;

const ACCESS_ERROR_CODES = new Set([
  'SQLITE_CANTOPEN',
  'SQLITE_AUTH',
  'SQLITE_PERM',
  'EACCES',
  'EPERM',
]);

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isAccessError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && ACCESS_ERROR_CODES.has(code);
}

/**
 * Read-only view over a NoteStore.sqlite file. Nothing is ever written back; opening the live
 * database while Notes is running is safe.
 */
export class AppleNotesStore implements NoteStoreReader {
  readonly dbPath: string;
  private readonly db: Database.Database;

  constructor(dbPath: string = DEFAULT_DB_PATH) {
    this.dbPath = dbPath;
    if (!fs.existsSync(dbPath)) {
      throw new NoteStoreNotFoundError(dbPath);
    }
    try {
      this.db = new Database(dbPath, { readonly: true, fileMustExist: true });
    } catch (error) {
      throw this.wrapError(error, 'open database');
    }
  }

  close(): void {
    this.db.close();
  }

  listNoteRows(): NoteRow[] {
    try {
      return this.db.prepare(LIST_NOTES_SQL).all() as NoteRow[];
    } catch (error) {
      throw this.wrapError(error, 'list notes');
    }
  }

  getAttachment(identifier: string): AttachmentRecord | null {
    try {
      const row = this.db.prepare(GET_ATTACHMENT_SQL).get(identifier) as
        | AttachmentRecord
        | undefined;
      return row ?? null;
    } catch (error) {
      throw this.wrapError(error, `read attachment ${identifier}`);
    }
  }

  private wrapError(error: unknown, action: string): Error {
    if (isAccessError(error)) {
      return new NoteStoreAccessError(this.dbPath, describeError(error));
    }
    return new NoteStoreReadError(
      `Failed to ${action} in Apple Notes database at ${this.dbPath}: ${describeError(error)}`,
    );
  }
}
