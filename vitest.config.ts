import { defineConfig } from 'vitest/config'

const BASE_EXCLUDE = [
  'src/**/*.test.ts',
  'src/**/*.d.ts',
  'src/__tests__/**',
]

// Entry points are exercised end to end only.
const L7_ENTRY_POINTS = [
  'src/L7-app/cli.ts',
]

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['src/__tests__/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'json-summary'],
      include: ['src/**/*.ts'],
      exclude: [...BASE_EXCLUDE, ...L7_ENTRY_POINTS],
      reportsDirectory: 'coverage',
    },
    testTimeout: 30000,

    // ── Per-tier test projects ──
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['src/__tests__/unit/**/*.test.ts'],
          testTimeout: 10_000,
        },
      },
      {
        extends: true,
        test: {
          name: 'integration-L3',
          include: ['src/__tests__/integration/L3/**/*.test.ts'],
          testTimeout: 30_000,
        },
      },
      {
        extends: true,
        test: {
          name: 'integration-L6',
          include: ['src/__tests__/integration/L6/**/*.test.ts'],
          testTimeout: 60_000,
        },
      },
      {
        extends: true,
        test: {
          name: 'integration-L7',
          include: ['src/__tests__/integration/L7/**/*.test.ts'],
          testTimeout: 60_000,
        },
      },
    ],
  },
})
