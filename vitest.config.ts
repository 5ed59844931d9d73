import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // The CLI tests change the working directory, which worker threads do not allow.
    pool: 'forks',
  },
});
