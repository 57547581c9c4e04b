import { defineConfig } from 'vitest/config'
import { fileURLToPath, URL } from 'node:url'

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    coverage: {
      provider: 'v8',
      reportsDirectory: 'coverage',
      reporter: ['text', 'lcov', 'html'],
      // Core coverage scope: solver + session reducer
      include: ['src/solver/**', 'src/session/**'],
      exclude: ['**/__tests__/**', '**/*.test.*'],
      thresholds: {
        statements: 90,
        branches: 75,
        functions: 90,
        lines: 90,
      },
    },
    include: ['src/**/*.test.ts', 'eval/**/*.test.ts'],
    globals: true,
  },
})
