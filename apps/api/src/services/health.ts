import { db } from '../db'
import type { LedgerStore } from '../db'
import { bus } from './index'
import { logger } from './observability'

export function checkLedgerConnectivity(store: Pick<LedgerStore, 'ping'> = db): boolean {
  try {
    return store.ping()
  } catch (err) {
    logger.warn('readiness_ledger_failed', {}, err)
    return false
  }
}

export function getReadinessReport() {
  const ledger = checkLedgerConnectivity()
  return {
    ledger,
    busSubscribers: bus.size,
    ready: ledger,
  }
}
