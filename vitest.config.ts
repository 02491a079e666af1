import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

// Workspace packages resolve to their built output; tests run against the sources.
export default defineConfig({
  resolve: {
    alias: {
      '@pactwire/core': source('core'),
      '@pactwire/mesh': source('mesh'),
    },
  },
  test: {
    globals: false,
    include: ['packages/*/tests/**/*.test.ts'],
  },
});
