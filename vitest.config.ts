import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@notestore/shared': path.resolve(__dirname, 'packages/shared/src'),
      '@notestore/note-decoder': path.resolve(__dirname, 'packages/note-decoder/src'),
    },
  },
  test: {
    environment: 'node',
    include: [
      'packages/shared/src/**/*.test.ts',
      'packages/note-decoder/src/**/*.test.ts',
      'packages/apple-notes/src/**/*.test.ts',
    ],
  },
});
