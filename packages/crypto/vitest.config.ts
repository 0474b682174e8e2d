import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Argon2id runs a 64 MiB, 3-pass hash per call
    testTimeout: 30_000,
  },
});
