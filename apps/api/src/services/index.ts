import type { BusSnapshot } from '@parkline/core'
import { buildSlotLabels } from '@parkline/core'

import { config } from '../config'
import { db } from '../db'
import { GateCommandRelay } from './gateRelay'
import { LedgerNotifier } from './ledgerNotifier'
import { NotificationBus } from './notificationBus'
import { PaymentArtifactRegistry } from './paymentArtifacts'
import { PendingExitCoordinator } from './pendingExit'
import { ExitSettlement } from './settlement'
import { SlotAllocator } from './slotAllocator'
import { TransactionManager } from './transactions'

export const slotAllocator = new SlotAllocator(db, buildSlotLabels(config.slotCount, config.slotPrefix))

export const paymentArtifacts = new PaymentArtifactRegistry({
  payeeVpa: config.upi.payeeVpa,
  payeeName: config.upi.payeeName,
  currency: config.currency,
})

export const transactions = new TransactionManager({
  ledger: db,
  slots: slotAllocator,
  artifacts: paymentArtifacts,
  ratePerMinute: config.ratePerMinute,
  currency: config.currency,
  retry: config.storeRetry,
})

export const pendingExit = new PendingExitCoordinator()

async function loadSnapshot(): Promise<BusSnapshot> {
  const [slots, records, pending] = await Promise.all([
    transactions.occupancy(),
    transactions.recentRecords(config.recentRecordsLimit),
    pendingExit.getPending(),
  ])
  return { type: 'snapshot', slots, records, pendingExit: pending }
}

export const bus = new NotificationBus(loadSnapshot)
export const gateRelay = new GateCommandRelay(bus)
export const ledgerNotifier = new LedgerNotifier(bus, transactions, config.recentRecordsLimit)

export const exitSettlement = new ExitSettlement({
  transactions,
  pendingExit,
  gates: gateRelay,
  bus,
  notifier: ledgerNotifier,
})
