import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts', 'apps/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['apps/maintainer/src/test-setup.ts'],
    env: {
      LOG_LEVEL: 'fatal',
    },
    testTimeout: 10000,
  },
})
