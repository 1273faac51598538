import type { StructuredLogger } from '@parkline/observability'

import { logger as defaultLogger } from './observability'

/**
 * The one plate currently waiting at the exit for payment.
 *
 * A single value, not a queue: the lot has one exit lane, so a new quote
 * replaces whatever was pending. Clearing is compare-and-clear, so a late
 * confirmation for an older plate cannot wipe out a newer pending plate.
 * Every read-modify-write runs under `withLock`.
 */
export class PendingExitCoordinator {
  private pending: string | null = null
  private tail: Promise<unknown> = Promise.resolve()
  private readonly logger: StructuredLogger

  constructor(logger: StructuredLogger = defaultLogger) {
    this.logger = logger.child({ component: 'pending_exit' })
  }

  /** Returns the plate that was replaced, if any */
  setPending(plate: string): Promise<string | null> {
    return this.withLock(() => {
      const previous = this.pending
      this.pending = plate
      if (previous && previous !== plate) {
        this.logger.warn('pending_exit_overwritten', { plate, previous })
      } else {
        this.logger.info('pending_exit_set', { plate })
      }
      return previous
    })
  }

  getPending(): Promise<string | null> {
    return this.withLock(() => this.pending)
  }

  /** Clears only when `plate` is the pending one; returns whether it did */
  clearIfMatches(plate: string): Promise<boolean> {
    return this.withLock(() => {
      if (this.pending !== plate) return false
      this.pending = null
      this.logger.info('pending_exit_cleared', { plate })
      return true
    })
  }

  private withLock<T>(critical: () => T): Promise<T> {
    const result = this.tail.then(critical)
    this.tail = result.catch(() => undefined)
    return result
  }
}
