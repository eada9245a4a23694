import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  root: __dirname,
  resolve: {
    alias: {
      '@seqgen/sequence': path.resolve(__dirname, './packages/sequence/src/index.ts'),
      '@seqgen/logger/mock': path.resolve(__dirname, './packages/logger/src/mock.ts'),
      '@seqgen/logger': path.resolve(__dirname, './packages/logger/src/index.ts'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
  },
});
