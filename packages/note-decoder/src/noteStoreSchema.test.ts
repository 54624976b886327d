import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { NOTE_STORE_PROTO_PATH, resolveNoteStoreProtoPath } from './noteStoreSchema';

const packageDir = path.resolve(__dirname, '..');
const repoRoot = path.resolve(packageDir, '..', '..');
const sourceProto = path.join(packageDir, 'proto', 'notestore.proto');

describe('resolveNoteStoreProtoPath', () => {
  it('uses the proto directory beside the sources', () => {
    expect(NOTE_STORE_PROTO_PATH).toBe(sourceProto);
    expect(resolveNoteStoreProtoPath(__dirname)).toBe(sourceProto);
  });

  it('finds the package schema from the build output directory', () => {
    const builtDir = path.join(repoRoot, 'dist', 'note-decoder', 'src');
    expect(resolveNoteStoreProtoPath(builtDir)).toBe(sourceProto);
  });
});
