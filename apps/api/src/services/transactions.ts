import type {
  CloseOutcome,
  EntryOutcome,
  ExitQuote,
  LedgerStats,
  OccupancyMap,
  ParkingRecord,
  PlateRole,
  QuoteOutcome,
} from '@parkline/core'
import { computeBilling, normalizePlate } from '@parkline/core'
import type { StructuredLogger } from '@parkline/observability'

import type { LedgerStore } from '../db/queries'
import { withStoreRetry } from '../db/retry'
import { ArtifactError, StoreError } from '../errors'
import type { PaymentArtifactRegistry } from './paymentArtifacts'
import type { SlotAllocator } from './slotAllocator'
import {
  ledgerLatencyMs,
  ledgerOperationsTotal,
  logger as defaultLogger,
  storeBusyRetriesTotal,
} from './observability'

export interface TransactionManagerOptions {
  ledger: LedgerStore
  slots: SlotAllocator
  artifacts: PaymentArtifactRegistry
  ratePerMinute: number
  currency: string
  retry: { attempts: number; delayMs: number }
  now?: () => Date
  logger?: StructuredLogger
}

/**
 * The only writer of the parking ledger.
 *
 * Each operation is one ledger transaction. When another process holds the
 * store, the whole operation is re-run from the start (bounded by the retry
 * budget), never resumed halfway.
 */
export class TransactionManager {
  private readonly ledger: LedgerStore
  private readonly now: () => Date
  private readonly logger: StructuredLogger

  constructor(private readonly options: TransactionManagerOptions) {
    this.ledger = options.ledger
    this.now = options.now ?? (() => new Date())
    this.logger = (options.logger ?? defaultLogger).child({ component: 'transactions' })
  }

  /**
   * Open a stay for `plate` in the first free slot.
   * A repeated detection of a parked plate is answered with already_in.
   */
  async logEntry(rawPlate: string): Promise<EntryOutcome> {
    const plate = normalizePlate(rawPlate)
    const outcome = await this.run('entry', () =>
      this.ledger.transaction((): EntryOutcome => {
        const existing = this.ledger.getActiveForPlate(plate)
        if (existing) return { status: 'already_in', record: existing }

        const slot = this.options.slots.allocate()
        if (!slot) return { status: 'full' }

        const record = this.ledger.insertRecord(plate, this.now(), slot)
        return { status: 'entry_logged', slot, record }
      }),
    )
    ledgerOperationsTotal.inc({ op: 'entry', outcome: outcome.status })

    if (outcome.status === 'entry_logged') {
      this.logger.info('entry_logged', { plate, slot: outcome.slot, record_id: outcome.record.id })
    } else {
      this.logger.warn(`entry_${outcome.status}`, { plate })
    }
    return outcome
  }

  /**
   * Price the open stay as of now without closing it.
   * Safe to repeat: each call re-prices against the current time and refreshes
   * the payment request; the record stays IN until payment is confirmed.
   */
  async quoteExit(rawPlate: string): Promise<QuoteOutcome> {
    const plate = normalizePlate(rawPlate)
    const record = await this.run('quote', () => this.ledger.getActiveForPlate(plate))
    if (!record) {
      ledgerOperationsTotal.inc({ op: 'quote', outcome: 'not_found' })
      this.logger.warn('exit_quote_not_found', { plate })
      return { status: 'not_found' }
    }

    const exitTime = this.now()
    const { durationMinutes, amountDue } = computeBilling(
      record.entryTime,
      exitTime,
      this.options.ratePerMinute,
    )
    const quote: ExitQuote = {
      plate,
      entryTime: record.entryTime,
      exitTime,
      durationMinutes,
      amountDue,
      currency: this.options.currency,
      slot: record.slot,
      paymentArtifactRef: null,
    }

    try {
      const artifact = this.options.artifacts.issue(plate, amountDue)
      quote.paymentArtifactRef = artifact.ref
      quote.paymentUri = artifact.uri
    } catch (err) {
      if (!(err instanceof ArtifactError)) throw err
      // Quote still stands; the caller can retry the artifact alone.
      quote.artifactError = err.message
      this.logger.warn('payment_artifact_failed', { plate }, err)
    }

    ledgerOperationsTotal.inc({ op: 'quote', outcome: 'quoted' })
    this.logger.info('exit_quoted', { plate, duration_minutes: durationMinutes, amount_due: amountDue })
    return { status: 'quoted', quote }
  }

  /**
   * Payment confirmed: persist the final bill and release the slot.
   *
   * This is the single durable billing event. A row that somehow already has
   * an exit time only gets its status forced to OUT. Once closed, further
   * calls find no IN row and return not_found; the closed row is unchanged.
   */
  async confirmAndClose(rawPlate: string): Promise<CloseOutcome> {
    const plate = normalizePlate(rawPlate)
    const outcome = await this.run('close', () =>
      this.ledger.transaction((): CloseOutcome => {
        const active = this.ledger.getActiveForPlate(plate)
        if (!active) return { status: 'not_found' }

        if (active.exitTime === null) {
          const exitTime = this.now()
          const billing = computeBilling(active.entryTime, exitTime, this.options.ratePerMinute)
          this.ledger.closeRecord(active.id, { exitTime, ...billing })
        } else {
          this.ledger.forceOut(active.id)
        }

        const closed = this.ledger.getById(active.id)
        if (!closed) throw new StoreError(`Ledger record ${active.id} vanished while closing`)
        return { status: 'closed', record: closed }
      }),
    )
    ledgerOperationsTotal.inc({ op: 'close', outcome: outcome.status })

    if (outcome.status === 'closed') {
      this.options.artifacts.discard(plate)
      this.logger.info('exit_closed', {
        plate,
        record_id: outcome.record.id,
        slot: outcome.record.slot,
        duration_minutes: outcome.record.durationMinutes,
        amount_due: outcome.record.amountDue,
      })
    } else {
      this.logger.warn('exit_close_not_found', { plate })
    }
    return outcome
  }

  /** Entry or exit, decided by the ledger rather than by the caller */
  async classify(rawPlate: string): Promise<PlateRole> {
    const plate = normalizePlate(rawPlate)
    const active = await this.run('classify', () => this.ledger.getActiveForPlate(plate))
    return active ? 'exit' : 'entry'
  }

  async occupancy(): Promise<OccupancyMap> {
    return this.run('occupancy', () => this.options.slots.occupancy())
  }

  async recentRecords(limit: number): Promise<ParkingRecord[]> {
    return this.run('list', () => this.ledger.listRecords(limit))
  }

  async latestRecord(rawPlate: string): Promise<ParkingRecord | null> {
    const plate = normalizePlate(rawPlate)
    return this.run('latest', () => this.ledger.getLatestForPlate(plate))
  }

  /** Today's counters, "today" being the server's local calendar day */
  async stats(): Promise<LedgerStats> {
    const now = this.now()
    const dayStart = new Date(now.getFullYear(), now.getMonth(), now.getDate())
    const dayEnd = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1)
    return this.run('stats', () => this.ledger.getStats(dayStart, dayEnd))
  }

  private async run<T>(op: string, operation: () => T): Promise<T> {
    const stopTimer = ledgerLatencyMs.startTimer({ op })
    try {
      return await withStoreRetry(operation, {
        ...this.options.retry,
        onBusy: (attempt, err) => {
          storeBusyRetriesTotal.inc({ op })
          this.logger.warn('store_busy', { op, attempt, max_attempts: this.options.retry.attempts }, err)
        },
      })
    } catch (err) {
      ledgerOperationsTotal.inc({ op, outcome: err instanceof StoreError ? 'store_error' : 'store_busy' })
      this.logger.error('ledger_operation_failed', { op }, err)
      throw err
    } finally {
      stopTimer()
    }
  }
}
