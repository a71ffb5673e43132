import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const r = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/src/**/*.spec.ts'],
  },
  resolve: {
    alias: {
      '@fennec/ast': r('./packages/fennec-ast/src/index.ts'),
      '@fennec/shared': r('./packages/fennec-shared/src/index.ts'),
      '@fennec/reader': r('./packages/fennec-reader/src/index.ts'),
      '@fennec/compiler': r('./packages/fennec-compiler/src/index.ts'),
    },
  },
});
