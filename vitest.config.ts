import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages resolve to their sources
      '@signet/http-signatures': fileURLToPath(
        new URL('./packages/http-signatures/src/index.ts', import.meta.url)
      ),
      '@signet/crypto': fileURLToPath(new URL('./packages/crypto/src/index.ts', import.meta.url)),
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    // RSA key generation in the crypto tests
    testTimeout: 10000,
  },
});
