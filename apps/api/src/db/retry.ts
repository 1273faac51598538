import { StoreBusyError, StoreError } from '../errors'

export interface StoreRetryOptions {
  attempts: number
  delayMs: number
  /** Called after each busy attempt, before the backoff */
  onBusy?: (attempt: number, error: unknown) => void
}

/** SQLITE_BUSY / SQLITE_LOCKED and their extended codes */
export function isBusyError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false
  const { code } = error
  return typeof code === 'string' && (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED'))
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Run a whole ledger operation, re-running it from the start while the store
 * reports contention from another process.
 *
 * - busy on every attempt → StoreBusyError
 * - any other failure → StoreError (no retry)
 */
export async function withStoreRetry<T>(operation: () => T, options: StoreRetryOptions): Promise<T> {
  let lastBusy: unknown
  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return operation()
    } catch (error) {
      if (!isBusyError(error)) {
        if (error instanceof StoreError) throw error
        const message = error instanceof Error ? error.message : String(error)
        throw new StoreError(`Ledger operation failed: ${message}`, { cause: error })
      }
      lastBusy = error
      options.onBusy?.(attempt, error)
      if (attempt < options.attempts && options.delayMs > 0) {
        await sleep(options.delayMs)
      }
    }
  }
  throw new StoreBusyError(options.attempts, { cause: lastBusy })
}
