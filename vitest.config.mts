import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
    setupFiles: ['./vitest.setup.ts'],
    include: ['test/**/*.{spec,test}.ts'],
    testTimeout: 30000,
  },
});
