import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@tailorkit/agents': fromRoot('./agents/src/index.ts'),
      '@tailorkit/core': fromRoot('./packages/core/src/index.ts'),
      '@tailorkit/schemas': fromRoot('./packages/schemas/src/index.ts'),
    },
  },
});
