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
      '@boardscout/agents': fromRoot('./agents/src/index.ts'),
      '@boardscout/core': fromRoot('./packages/core/src/index.ts'),
      '@boardscout/db': fromRoot('./packages/db/src/index.ts'),
      '@boardscout/llm': fromRoot('./packages/llm/src/index.ts'),
      '@boardscout/schemas': fromRoot('./packages/schemas/src/index.ts'),
      '@/lib': fromRoot('./apps/server/lib'),
    },
  },
});
