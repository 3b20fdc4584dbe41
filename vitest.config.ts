import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*_test.ts'],
    environment: 'node',
    // Logger tests share one process-wide global logger
    sequence: {
      concurrent: false,
    },
  },
});
