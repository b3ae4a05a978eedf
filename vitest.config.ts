import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// The server imports the library by its package name; point that at the sources.
const librarySource = fileURLToPath(new URL('./src/index.ts', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      'pg-metadata-catalog': librarySource,
    },
  },
  test: {
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        extends: true,
        test: {
          name: 'server',
          include: ['catalog-server/tests/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
    ],
  },
});
