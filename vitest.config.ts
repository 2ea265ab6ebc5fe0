import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@hltvsync/agents': fromRoot('./agents/src'),
      '@hltvsync/core': fromRoot('./packages/core/src'),
      '@hltvsync/db': fromRoot('./packages/db/src'),
      '@hltvsync/schemas': fromRoot('./packages/schemas/src'),
      '@/lib': fromRoot('./apps/sync/lib'),
    },
  },
});
