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
      '@exitready/agents': fromRoot('./agents/src/index.ts'),
      '@exitready/llm': fromRoot('./packages/llm/src/index.ts'),
      '@exitready/schemas': fromRoot('./packages/schemas/src/index.ts'),
    },
  },
});
