import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspace = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'functions/*/src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@homeview/realm-core': workspace('./packages/realm-core/src/index.ts'),
      '@homeview/page-params': workspace('./packages/page-params/src/index.ts'),
    },
  },
});
