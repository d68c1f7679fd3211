import {defineConfig} from 'vitest/config';

export default defineConfig({
  test: {
    name: 'hll',
    include: ['src/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
