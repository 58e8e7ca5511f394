import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    testTimeout: 30_000, // large-N statistical runs
    include: ['src/__tests__/**/*.test.ts'],
    env: { LOG_LEVEL: 'silent' },
  },
})
