import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const src = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages resolve to their TypeScript sources
    alias: [
      { find: /^@stratum\/crypto$/, replacement: src('./packages/crypto/src/index.ts') },
      { find: /^@stratum\/crypto\/testkit$/, replacement: src('./packages/crypto/src/testkit.ts') },
      { find: /^@stratum\/cli$/, replacement: src('./packages/cli/src/index.ts') },
    ],
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
    bail: process.env.CI ? 1 : 0,
  },
});
