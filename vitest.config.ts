import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const rootDir = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@shared/types': path.resolve(rootDir, 'shared/src/index.ts'),
    },
  },
  test: {
    include: ['shared/src/**/*.{test,spec}.ts', 'server/src/**/*.{test,spec}.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
    env: {
      NODE_ENV: 'test',
      DATABASE_PATH: ':memory:',
    },
    environment: 'node',
    setupFiles: ['server/tests/setup-env.ts'],
    allowOnly: false,
    fileParallelism: false,
    isolate: true,
    sequence: {
      concurrent: false,
    },
    testTimeout: 30000,
    hookTimeout: 30000,
    passWithNoTests: false,
  },
})
