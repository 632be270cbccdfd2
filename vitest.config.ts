import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/__tests__/*.test.ts'],
    environment: 'node',
    env: {
      // Plain JSON logs without pino-pretty's worker thread; only errors
      NODE_ENV: 'production',
      LOG_LEVEL: 'error',
    },
  },
})
