/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

const timeout = 1000 * 10; // 10 seconds
export default defineConfig({
  test: {
    environment: 'node', // backend runner
    globals: true,
    reporters: 'default',
    include: ['src/tests/**/*.test.ts'],
    testTimeout: timeout,
    hookTimeout: timeout,
  },
  esbuild: { target: 'es2022' },
});
