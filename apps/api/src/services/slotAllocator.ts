import type { OccupancyMap, ParkingRecord } from '@parkline/core'
import { firstFreeSlot } from '@parkline/core'

import type { LedgerStore } from '../db/queries'

/**
 * Assigns slots from live ledger occupancy.
 *
 * There is no stored "next free slot" pointer: every call re-reads the IN
 * rows, so a crash between processes can never leave a slot leaked. Call it
 * inside the ledger transaction that will use the result.
 */
export class SlotAllocator {
  constructor(
    private readonly ledger: Pick<LedgerStore, 'getActiveRecords'>,
    readonly labels: readonly string[],
  ) {}

  get capacity(): number {
    return this.labels.length
  }

  /** First free label in order, or null when the lot is full */
  allocate(): string | null {
    return firstFreeSlot(this.labels, this.occupiedLabels(this.ledger.getActiveRecords()))
  }

  occupancy(): OccupancyMap {
    const slots: OccupancyMap = Object.fromEntries(this.labels.map((label) => [label, null]))
    for (const record of this.ledger.getActiveRecords()) {
      if (record.slot !== null && record.slot in slots) {
        slots[record.slot] = record.plate
      }
    }
    return slots
  }

  private occupiedLabels(active: ParkingRecord[]): Set<string> {
    const occupied = new Set<string>()
    for (const record of active) {
      if (record.slot !== null) occupied.add(record.slot)
    }
    return occupied
  }
}
