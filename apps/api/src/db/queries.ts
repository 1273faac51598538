import type Database from 'better-sqlite3'
import type { LedgerStats, ParkingRecord } from '@parkline/core'
import { parseLedgerTimestamp } from '@parkline/core'

import { StoreError } from '../errors'

// ---- Schema ----

interface ParkingRow {
  id: number
  plate: string
  entry_time: string | null
  exit_time: string | null
  duration_min: number | null
  amount: number | null
  status: string | null
  slot: string | null
}

export interface MigrationResult {
  addedSlotColumn: boolean
}

/**
 * Create the ledger table when missing and bring older files up to date.
 * Databases from before slot tracking lack the `slot` column; it is added
 * once, leaving existing rows untouched (their slot reads back as null).
 */
export function migrateLedger(database: Database.Database): MigrationResult {
  database.exec(`
    CREATE TABLE IF NOT EXISTS parking_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      plate TEXT NOT NULL,
      entry_time TEXT,
      exit_time TEXT,
      duration_min INTEGER,
      amount REAL,
      status TEXT,
      slot TEXT
    )
  `)

  const columns = database
    .prepare<[], { name: string }>('PRAGMA table_info(parking_log)')
    .all()
    .map((c) => c.name)

  let addedSlotColumn = false
  if (!columns.includes('slot')) {
    database.exec('ALTER TABLE parking_log ADD COLUMN slot TEXT')
    addedSlotColumn = true
  }

  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_parking_log_plate_status ON parking_log(plate, status);
    CREATE INDEX IF NOT EXISTS idx_parking_log_status ON parking_log(status);
  `)

  return { addedSlotColumn }
}

function mapRecord(row: ParkingRow): ParkingRecord {
  const entryTime = row.entry_time ? parseLedgerTimestamp(row.entry_time) : null
  if (!entryTime) {
    throw new StoreError(`Unreadable entry_time on ledger record ${row.id}: ${row.entry_time}`)
  }
  return {
    id: row.id,
    plate: row.plate,
    entryTime,
    exitTime: row.exit_time ? parseLedgerTimestamp(row.exit_time) : null,
    durationMinutes: row.duration_min,
    amountDue: row.amount,
    status: row.status === 'IN' ? 'IN' : 'OUT',
    slot: row.slot,
  }
}

/** `YYYY-MM-DD HH:MM:SS` in server-local time, the form older deployments wrote */
function formatLegacyTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

// ---- Store ----

export interface CloseFields {
  exitTime: Date
  durationMinutes: number
  amountDue: number
}

export interface LedgerStore {
  insertRecord(plate: string, entryTime: Date, slot: string): ParkingRecord
  getById(id: number): ParkingRecord | null
  getLatestForPlate(plate: string): ParkingRecord | null
  getActiveForPlate(plate: string): ParkingRecord | null
  getActiveRecords(): ParkingRecord[]
  /** Sets exit fields and status=OUT in one statement; false if the row was not IN */
  closeRecord(id: number, fields: CloseFields): boolean
  forceOut(id: number): boolean
  listRecords(limit: number): ParkingRecord[]
  getStats(dayStart: Date, dayEnd: Date): LedgerStats
  /** Run `fn` under BEGIN IMMEDIATE: the write lock is held before the first read */
  transaction<T>(fn: () => T): T
  ping(): boolean
}

export function createLedgerStore(database: Database.Database): LedgerStore {
  const insertStmt = database.prepare<[string, string, string]>(
    `INSERT INTO parking_log (plate, entry_time, status, slot) VALUES (?, ?, 'IN', ?)`,
  )
  const byIdStmt = database.prepare<[number], ParkingRow>(`SELECT * FROM parking_log WHERE id = ?`)
  const latestForPlateStmt = database.prepare<[string], ParkingRow>(
    `SELECT * FROM parking_log WHERE plate = ? ORDER BY id DESC LIMIT 1`,
  )
  const activeForPlateStmt = database.prepare<[string], ParkingRow>(
    `SELECT * FROM parking_log WHERE plate = ? AND status = 'IN' ORDER BY id DESC LIMIT 1`,
  )
  const activeStmt = database.prepare<[], ParkingRow>(
    `SELECT * FROM parking_log WHERE status = 'IN' ORDER BY id ASC`,
  )
  const closeStmt = database.prepare<[string, number, number, number]>(
    `UPDATE parking_log SET exit_time = ?, duration_min = ?, amount = ?, status = 'OUT'
     WHERE id = ? AND status = 'IN'`,
  )
  const forceOutStmt = database.prepare<[number]>(`UPDATE parking_log SET status = 'OUT' WHERE id = ?`)
  const listStmt = database.prepare<[number], ParkingRow>(
    `SELECT * FROM parking_log ORDER BY id DESC LIMIT ?`,
  )
  // Column 11 tells the two stored forms apart: 'T' for ISO rows, ' ' for
  // legacy local-time rows. Each form is compared against bounds in its own format.
  const entriesBetweenStmt = database.prepare<[string, string, string, string], { n: number }>(
    `SELECT COUNT(*) AS n FROM parking_log
     WHERE (substr(entry_time, 11, 1) = 'T' AND entry_time >= ? AND entry_time < ?)
        OR (substr(entry_time, 11, 1) = ' ' AND entry_time >= ? AND entry_time < ?)`,
  )
  const parkedStmt = database.prepare<[], { n: number }>(
    `SELECT COUNT(*) AS n FROM parking_log WHERE status = 'IN'`,
  )
  const revenueBetweenStmt = database.prepare<[string, string, string, string], { total: number }>(
    `SELECT COALESCE(SUM(amount), 0) AS total FROM parking_log
     WHERE status = 'OUT'
       AND ((substr(exit_time, 11, 1) = 'T' AND exit_time >= ? AND exit_time < ?)
         OR (substr(exit_time, 11, 1) = ' ' AND exit_time >= ? AND exit_time < ?))`,
  )
  const pingStmt = database.prepare<[], { ok: number }>('SELECT 1 AS ok')

  function getById(id: number): ParkingRecord | null {
    const row = byIdStmt.get(id)
    return row ? mapRecord(row) : null
  }

  function insertRecord(plate: string, entryTime: Date, slot: string): ParkingRecord {
    const { lastInsertRowid } = insertStmt.run(plate, entryTime.toISOString(), slot)
    const record = getById(Number(lastInsertRowid))
    if (!record) throw new StoreError(`Inserted ledger record ${lastInsertRowid} could not be read back`)
    return record
  }

  function getLatestForPlate(plate: string): ParkingRecord | null {
    const row = latestForPlateStmt.get(plate)
    return row ? mapRecord(row) : null
  }

  function getActiveForPlate(plate: string): ParkingRecord | null {
    const row = activeForPlateStmt.get(plate)
    return row ? mapRecord(row) : null
  }

  function getActiveRecords(): ParkingRecord[] {
    return activeStmt.all().map(mapRecord)
  }

  function closeRecord(id: number, fields: CloseFields): boolean {
    const { changes } = closeStmt.run(
      fields.exitTime.toISOString(),
      fields.durationMinutes,
      fields.amountDue,
      id,
    )
    return changes > 0
  }

  function forceOut(id: number): boolean {
    return forceOutStmt.run(id).changes > 0
  }

  function listRecords(limit: number): ParkingRecord[] {
    return listStmt.all(limit).map(mapRecord)
  }

  function getStats(dayStart: Date, dayEnd: Date): LedgerStats {
    const bounds: [string, string, string, string] = [
      dayStart.toISOString(),
      dayEnd.toISOString(),
      formatLegacyTimestamp(dayStart),
      formatLegacyTimestamp(dayEnd),
    ]
    return {
      todayEntries: entriesBetweenStmt.get(...bounds)?.n ?? 0,
      currentlyParked: parkedStmt.get()?.n ?? 0,
      todayRevenue: revenueBetweenStmt.get(...bounds)?.total ?? 0,
    }
  }

  function transaction<T>(fn: () => T): T {
    return database.transaction(fn).immediate()
  }

  function ping(): boolean {
    return pingStmt.get()?.ok === 1
  }

  return {
    insertRecord,
    getById,
    getLatestForPlate,
    getActiveForPlate,
    getActiveRecords,
    closeRecord,
    forceOut,
    listRecords,
    getStats,
    transaction,
    ping,
  }
}
