import path from 'node:path';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => path.resolve(__dirname, 'packages', name, 'src/index.ts');

export default defineConfig({
  resolve: {
    alias: {
      '@ctxgrep/shared': pkg('shared'),
      '@ctxgrep/core': pkg('core'),
      '@ctxgrep/cli': pkg('cli'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.tmp/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: ['**/node_modules/**', '**/dist/**', '**/*.d.ts', '**/*.test.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
