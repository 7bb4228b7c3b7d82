import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'server',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/main.ts'],
    },
  },
  resolve: {
    alias: {
      '@csvjson/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
