import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@micro-recall/shared': fileURLToPath(new URL('./shared/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['shared/**/*.test.ts', 'study/src/**/*.test.ts'],
  },
});
