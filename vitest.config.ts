import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['core/**/*.test.ts', 'storage/**/*.test.ts', 'cli/**/*.test.ts', 'utils/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist/**'],
    env: {
      NANDFS_LOG_LEVEL: 'silent',
    },
  },
})
