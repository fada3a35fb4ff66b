import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    name: 'temporal',
    root: fileURLToPath(new URL('.', import.meta.url)),
    include: ['src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@triadic/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
      '@triadic/temporal': fileURLToPath(new URL('./src/index.ts', import.meta.url)),
    },
  },
});
