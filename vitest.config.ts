import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/**/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/cli/src/index.ts', 'packages/**/src/**/*.test.ts'],
      thresholds: {
        statements: 95,
        branches: 85,
        functions: 95,
        lines: 95
      }
    }
  },
  resolve: {
    alias: {
      '@huefield/color-field': path.resolve(__dirname, 'packages/color-field/src'),
      '@huefield/settings': path.resolve(__dirname, 'packages/settings/src'),
      '@huefield/engine': path.resolve(__dirname, 'packages/engine/src')
    }
  }
});
