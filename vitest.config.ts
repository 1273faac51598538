import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
    // better-sqlite3 is a native addon; keep each test file in its own process
    pool: 'forks',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      LEDGER_DB_PATH: ':memory:',
      STORE_RETRY_DELAY_MS: '0',
    },
  },
})
