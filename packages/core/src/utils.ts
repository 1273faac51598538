import { SCAN_STATUSES } from './types'
import type { ScanStatus } from './types'

export function isScanStatus(value: unknown): value is ScanStatus {
  return SCAN_STATUSES.some((status) => status === value)
}

/**
 * Normalize a license plate to the ledger's canonical form.
 * Strips whitespace and dashes, converts to uppercase.
 * Input: "mh12 ab 1234", "MH-12-AB-1234"
 * Output: "MH12AB1234"
 */
export function normalizePlate(plate: string): string {
  return plate.replace(/[\s-]/g, '').toUpperCase()
}

export interface Billing {
  durationMinutes: number
  amountDue: number
}

/**
 * Bill a stay per started minute.
 * durationMinutes = ceil(max(1, elapsedSeconds) / 60)
 *
 * Guards:
 * - Sub-minute, zero or negative elapsed time (clock skew) → 1 minute
 * - Amount rounded to 2 dp
 */
export function computeBilling(entryTime: Date, exitTime: Date, ratePerMinute: number): Billing {
  const elapsedSeconds = (exitTime.getTime() - entryTime.getTime()) / 1000
  const durationMinutes = Math.ceil(Math.max(1, elapsedSeconds) / 60)
  const amountDue = Math.round(durationMinutes * ratePerMinute * 100) / 100
  return { durationMinutes, amountDue }
}

/**
 * Format a fee amount with its currency for display.
 * e.g. formatFee(37.5, "inr") → "37.50 INR"
 */
export function formatFee(amount: number, currency: string): string {
  return `${amount.toFixed(2)} ${currency.toUpperCase()}`
}

const LEGACY_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/

/**
 * Parse a timestamp read back from the ledger.
 * Current rows are ISO-8601; rows from older deployments use
 * "YYYY-MM-DD HH:MM:SS" in server-local time.
 * Returns null when neither form matches.
 */
export function parseLedgerTimestamp(value: string): Date | null {
  const legacy = value.match(LEGACY_TIMESTAMP)
  if (legacy) {
    const [, y, mo, d, h, mi, s] = legacy.map(Number)
    return new Date(y, mo - 1, d, h, mi, s)
  }
  const ms = Date.parse(value)
  return Number.isNaN(ms) ? null : new Date(ms)
}
