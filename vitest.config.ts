/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

const timeout = 1000 * 10; // 10 seconds
export default defineConfig({
  test: {
    environment: 'node', // backend runner
    globals: true,
    reporters: 'default',
    include: ['src/tests/**/*.spec.ts'],
    testTimeout: timeout,
    hookTimeout: timeout,
    // keep worker retry warnings out of the test output
    env: { LOG_LEVEL: 'error' },
  },
  esbuild: { target: 'es2022' },
});
