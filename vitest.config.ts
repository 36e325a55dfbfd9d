import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    reporters: ['default'],
    // argon2 hashing of the seed accounts takes a noticeable fraction of a second
    testTimeout: 20_000,
  },
});
