import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const src = (pkg: string, file = 'index.ts'): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/${file}`, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages resolve to their sources; subpaths first
    alias: [
      { find: '@vouchers/crypto/testkit', replacement: src('crypto', 'testkit.ts') },
      { find: /^@vouchers\/(kernel|crypto|schema|voucher|protocol|stores)$/, replacement: src('$1') },
    ],
  },
  test: {
    root: '.',
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      LOG_LEVEL: 'silent',
    },
    testTimeout: 10000,
  },
});
