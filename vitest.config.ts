import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (rel: string) => fileURLToPath(new URL(rel, import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@rulelogic/types': pkg('./packages/types/src/index.ts'),
      '@rulelogic/logic-vm': pkg('./packages/logic-vm/src/index.ts'),
    },
  },
});
