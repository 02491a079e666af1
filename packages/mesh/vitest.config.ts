import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages resolve to their built output; tests run against the sources.
export default defineConfig({
  resolve: {
    alias: {
      '@pactwire/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: false,
    include: ['tests/**/*.test.ts'],
  },
});
