import fs from 'node:fs';
import path from 'node:path';
import zlib from 'node:zlib';

import { loadSync, type Root, type Type } from 'protobufjs';

import type { StructuredNote } from './types';

const PROTO_FILE = 'notestore.proto';

/**
 * Finds the schema beside the sources, or from `dist/note-decoder/src` after a build, where
 * tsc leaves the .proto file behind in the package directory.
 */
export function resolveNoteStoreProtoPath(baseDir: string = __dirname): string {
  const packageProto = path.resolve(baseDir, '..', 'proto', PROTO_FILE);
  const repoProto = path.resolve(
    baseDir,
    '..',
    '..',
    '..',
    'packages',
    'note-decoder',
    'proto',
    PROTO_FILE,
  );
  if (!fs.existsSync(packageProto) && fs.existsSync(repoProto)) {
    return repoProto;
  }
  return packageProto;
}

export const NOTE_STORE_PROTO_PATH = resolveNoteStoreProtoPath();

let cachedRoot: Root | undefined;

function getRoot(): Root {
  if (!cachedRoot) {
    cachedRoot = loadSync(NOTE_STORE_PROTO_PATH);
  }
  return cachedRoot;
}

export function getNoteStoreType(): Type {
  return getRoot().lookupType('notestore.NoteStoreProto');
}

export interface EncodeNoteStoreOptions {
  /** Wrap the payload in gzip the way the Notes app stores it. Defaults to true. */
  gzip?: boolean;
}

/**
 * Serializes text and runs into a NoteStore payload. Mostly useful for producing fixtures
 * and for re-encoding notes after edits.
 */
export function encodeNoteStore(
  note: StructuredNote,
  options: EncodeNoteStoreOptions = {},
): Uint8Array {
  const type = getNoteStoreType();
  const message = type.fromObject({
    document: {
      version: 0,
      note: {
        noteText: note.text,
        attributeRun: note.runs.map((run) => ({
          length: run.length,
          ...(run.attachment
            ? {
                attachmentInfo: {
                  attachmentIdentifier: run.attachment.identifier,
                  typeUti: run.attachment.classifier,
                },
              }
            : {}),
        })),
      },
    },
  });
  const bytes = type.encode(message).finish();
  if (options.gzip === false) {
    return bytes;
  }
  return new Uint8Array(zlib.gzipSync(bytes));
}
