import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relativePath: string): string => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ledgerscan/types': fromRoot('./packages/types/src/index.ts'),
      '@ledgerscan/pdf-extract': fromRoot('./packages/pdf-extract/src/index.ts'),
      '@ledgerscan/statement-parser': fromRoot('./packages/statement-parser/src/index.ts'),
      '@ledgerscan/output': fromRoot('./packages/output/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
