import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const src = (pkg: string) => fileURLToPath(new URL(`../${pkg}/src`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@barflow/shared': src('shared'),
      '@barflow/db': src('db'),
      '@barflow/core': src('core'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10_000,
    include: ['src/**/*.test.ts'],
  },
});
