/**
 * Runtime configuration for the API process.
 *
 * Everything comes from environment variables (loaded from `.env` by
 * `dotenv/config` in the entrypoint). Slot layout and tariff are fixed
 * configuration, never persisted: changing SLOT_COUNT takes effect on the
 * next start and the allocator recomputes occupancy from the ledger.
 */

export interface ApiConfig {
  port: number
  ledgerPath: string
  slotCount: number
  slotPrefix: string
  ratePerMinute: number
  currency: string
  storeRetry: { attempts: number; delayMs: number }
  /** SQLite busy-handler timeout for a single attempt */
  storeBusyTimeoutMs: number
  upi: { payeeVpa: string; payeeName: string }
  /** SMS payment webhook is disabled while unset */
  smsWebhookToken?: string
  gateApiKey?: string
  corsOrigin: string[] | '*'
  /** Ledger rows included in bus snapshots and ledger-changed events */
  recentRecordsLimit: number
}

type Env = Record<string, string | undefined>

function readInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return fallback
  const value = parseInt(raw, 10)
  return !isNaN(value) && value >= min ? value : fallback
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return fallback
  const value = parseFloat(raw)
  return !isNaN(value) && value > 0 ? value : fallback
}

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

export function loadConfig(env: Env = process.env): ApiConfig {
  const corsOrigins = readString(env, 'CORS_ORIGIN')
  return {
    port: readInt(env, 'PORT', 5000, 1),
    ledgerPath: readString(env, 'LEDGER_DB_PATH') ?? 'data/parking.db',
    slotCount: readInt(env, 'SLOT_COUNT', 15, 1),
    slotPrefix: readString(env, 'SLOT_PREFIX') ?? 'A',
    ratePerMinute: readNumber(env, 'RATE_PER_MINUTE', 1),
    currency: (readString(env, 'CURRENCY') ?? 'INR').toUpperCase(),
    storeRetry: {
      attempts: readInt(env, 'STORE_RETRY_ATTEMPTS', 5, 1),
      delayMs: readInt(env, 'STORE_RETRY_DELAY_MS', 500),
    },
    storeBusyTimeoutMs: readInt(env, 'STORE_BUSY_TIMEOUT_MS', 100),
    upi: {
      payeeVpa: readString(env, 'UPI_PAYEE_VPA') ?? 'parking@upi',
      payeeName: readString(env, 'UPI_PAYEE_NAME') ?? 'ParkingLot',
    },
    smsWebhookToken: readString(env, 'SMS_WEBHOOK_TOKEN'),
    gateApiKey: readString(env, 'GATE_API_KEY'),
    corsOrigin: corsOrigins && corsOrigins !== '*' ? corsOrigins.split(',').map((o) => o.trim()) : '*',
    recentRecordsLimit: readInt(env, 'RECENT_RECORDS_LIMIT', 50, 1),
  }
}

export const config = loadConfig()
