// ---- Ledger types ----

export type RecordStatus = 'IN' | 'OUT'

/** One row of the parking ledger: a single physical stay. */
export interface ParkingRecord {
  id: number
  plate: string
  entryTime: Date
  /** Set together with status=OUT, exactly once */
  exitTime: Date | null
  durationMinutes: number | null
  amountDue: number | null
  status: RecordStatus
  /** Null only for rows written before slots were tracked */
  slot: string | null
}

/** Slot label → plate currently parked there (null when free) */
export type OccupancyMap = Record<string, string | null>

export interface LedgerStats {
  todayEntries: number
  currentlyParked: number
  todayRevenue: number
}

// ---- Transaction outcomes ----

export type EntryOutcome =
  | { status: 'entry_logged'; slot: string; record: ParkingRecord }
  | { status: 'already_in'; record: ParkingRecord }
  | { status: 'full' }

export interface ExitQuote {
  plate: string
  entryTime: Date
  /** The quote moment; not persisted until payment is confirmed */
  exitTime: Date
  durationMinutes: number
  amountDue: number
  currency: string
  slot: string | null
  paymentArtifactRef: string | null
  paymentUri?: string
  /** Present when the payment artifact could not be generated */
  artifactError?: string
}

export type QuoteOutcome = { status: 'quoted'; quote: ExitQuote } | { status: 'not_found' }

export type CloseOutcome = { status: 'closed'; record: ParkingRecord } | { status: 'not_found' }

export type PlateRole = 'entry' | 'exit'

// ---- Payment artifact ----

export interface PaymentArtifact {
  ref: string
  plate: string
  amount: number
  currency: string
  /** UPI deep link, rendered as a QR code by the presentation layer */
  uri: string
  createdAt: Date
}

// ---- Gate commands ----

export type GateId = 'entry' | 'exit'

export type GateAction = 'open'

export interface GateCommand {
  gateId: GateId
  action: GateAction
  plate?: string
  issuedAt: string
}

// ---- Notification bus ----

export const SCAN_STATUSES = [
  'entry_logged',
  'already_in',
  'full',
  'exit_pending',
  'not_found',
  'store_busy',
  'store_error',
] as const

export type ScanStatus = (typeof SCAN_STATUSES)[number]

export interface PlateDetectedEvent {
  plate: string
  status: ScanStatus
  slot?: string | null
  amountDue?: number
  durationMinutes?: number
  entryTime?: string
  exitTime?: string
}

export interface BusPayloads {
  'occupancy-changed': { slots: OccupancyMap }
  'ledger-changed': { records: ParkingRecord[] }
  'exit-pending': { plate: string; amountDue?: number; durationMinutes?: number }
  'payment-confirmed': { plate: string; amountDue: number | null; durationMinutes: number | null }
  'plate-detected': PlateDetectedEvent
  'gate-command': GateCommand
}

export type BusTopic = keyof BusPayloads

/** A bus message as delivered to subscribers: `{ type: topic, ...payload }` */
export type BusEvent = { [K in BusTopic]: { type: K } & BusPayloads[K] }[BusTopic]

export interface BusSnapshot {
  type: 'snapshot'
  slots: OccupancyMap
  records: ParkingRecord[]
  pendingExit: string | null
}

export const BUS_TOPICS: readonly BusTopic[] = [
  'occupancy-changed',
  'ledger-changed',
  'exit-pending',
  'payment-confirmed',
  'plate-detected',
  'gate-command',
]
