import Database from 'better-sqlite3'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'

import { config } from '../config'
import { logger } from '../services/observability'
import { createLedgerStore, migrateLedger } from './queries'
import type { MigrationResult } from './queries'
import { withStoreRetry } from './retry'
import type { StoreRetryOptions } from './retry'

/**
 * Open the shared ledger file. Other processes (camera, gate) may hold it at
 * the same time; WAL lets readers proceed while one writer commits.
 */
export function openLedgerDatabase(path: string, busyTimeoutMs: number): Database.Database {
  const inMemory = path === ':memory:'
  if (!inMemory) mkdirSync(dirname(path), { recursive: true })
  const database = new Database(path, { timeout: busyTimeoutMs })
  if (!inMemory) database.pragma('journal_mode = WAL')
  return database
}

/** Bring the schema up to date, waiting out a writer that holds the file at startup */
export async function prepareLedger(
  database: Database.Database,
  retry: Pick<StoreRetryOptions, 'attempts' | 'delayMs'>,
): Promise<MigrationResult> {
  const migration = await withStoreRetry(() => migrateLedger(database), {
    ...retry,
    onBusy: (attempt, err) => logger.warn('ledger_migration_busy', { attempt, max_attempts: retry.attempts }, err),
  })
  if (migration.addedSlotColumn) {
    logger.info('ledger_migrated', { added_column: 'slot' })
  }
  return migration
}

const sqlite = openLedgerDatabase(config.ledgerPath, config.storeBusyTimeoutMs)
await prepareLedger(sqlite, config.storeRetry)
logger.info('ledger_ready', { path: config.ledgerPath })

const db = createLedgerStore(sqlite)

export { sqlite, db }
export type { LedgerStore } from './queries'
