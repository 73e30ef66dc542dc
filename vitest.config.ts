import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],

    // 並發與 stream 測試使用真實計時器，保留 10 秒
    testTimeout: 10000,
    hookTimeout: 10000,

    slowTestThreshold: 1000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/main.ts', 'src/types/**'],
    },
  },
});
