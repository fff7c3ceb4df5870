/// <reference types="vitest" />
import {defineConfig} from 'vitest/config'

export default defineConfig({
  test: {
    // Engines run in plain Node, no DOM needed
    environment: 'node',

    // Global test configuration
    globals: true,

    // Setup files
    setupFiles: ['./test/setup.ts'],

    // Include and exclude patterns
    include: ['test/**/*.{test,spec}.ts', 'src/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist', 'examples'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['coverage/**', 'dist/**', 'test/**', 'examples/**', '**/*.d.ts', '**/*.config.*'],
      thresholds: {
        branches: 80,
        functions: 80,
        lines: 80,
        statements: 80,
      },
    },

    // Test timeout
    testTimeout: 10000,
  },
})
