import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const here = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  root: resolve(here, '..', '..'),
  resolve: {
    alias: {
      '@chordcast/core': resolve(here, '../core/src/index.ts'),
      '@chordcast/platform-native': resolve(here, '../platform-native/src/index.ts'),
      '@chordcast/platform': resolve(here, '../platform/src/index.ts'),
    },
  },
  test: {
    include: ['packages/test-harness/src/**/*.spec.ts'],
    setupFiles: ['packages/test-harness/src/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json-summary'],
      all: true,
      include: [
        'packages/core/src/**/*.ts',
        'packages/platform-native/src/**/*.ts',
        'apps/daemon/src/**/*.ts',
      ],
    },
  },
});
