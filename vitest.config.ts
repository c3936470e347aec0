import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

// __dirname is not available in ESM ("type": "module") without this shim.
const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./test/setup.ts'],
    include: ['**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist'],
    // Async tests that deadlock must not hang CI
    testTimeout: 10000,
    isolate: true,
  },
  resolve: {
    alias: {
      '@kernel': path.resolve(__dirname, 'packages/kernel'),
      '@database': path.resolve(__dirname, 'packages/database'),
      '@config': path.resolve(__dirname, 'packages/config'),
      '@errors': path.resolve(__dirname, 'packages/errors'),
      '@domain': path.resolve(__dirname, 'domains'),
      '@shutdown': path.resolve(__dirname, 'packages/shutdown'),
    },
  },
});
