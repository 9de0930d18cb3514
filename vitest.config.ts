import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for the engine and server tests.
 * Tests live under tests/ and mirror the shared/ and server/ layout.
 */
export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
});
