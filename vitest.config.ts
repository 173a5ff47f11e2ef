import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    environment: 'node',
    restoreMocks: true,
    coverage: {
      reporter: ['text', 'lcov']
    }
  }
});
