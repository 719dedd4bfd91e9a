import { defineConfig } from 'vitest/config'
import viteTsConfigPaths from 'vite-tsconfig-paths'

export default defineConfig({
  plugins: [
    viteTsConfigPaths({
      projects: ['./tsconfig.json'],
    }),
  ],
  test: {
    globals: true,
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['./src/test/setup.ts'],
    environment: 'node',
    pool: 'forks',
    // Rate limiter timing assertions are wall-clock sensitive
    testTimeout: 15000,
    env: {
      LOG_LEVEL: 'error',
      LOG_TYPES: '*',
    },
  },
})
