import type { CloseOutcome } from '@parkline/core'

import type { GateCommandRelay } from './gateRelay'
import type { LedgerNotifier } from './ledgerNotifier'
import type { NotificationBus } from './notificationBus'
import type { PendingExitCoordinator } from './pendingExit'
import type { TransactionManager } from './transactions'

export interface ExitSettlementDeps {
  transactions: Pick<TransactionManager, 'confirmAndClose'>
  pendingExit: Pick<PendingExitCoordinator, 'clearIfMatches'>
  gates: Pick<GateCommandRelay, 'requestGateOpen'>
  bus: Pick<NotificationBus, 'publish'>
  notifier: Pick<LedgerNotifier, 'ledgerChanged'>
}

/**
 * Post-payment path shared by the confirm endpoint and the SMS webhook.
 * The exit gate is only asked to open once the close has committed.
 */
export class ExitSettlement {
  constructor(private readonly deps: ExitSettlementDeps) {}

  async settle(plate: string): Promise<CloseOutcome> {
    const outcome = await this.deps.transactions.confirmAndClose(plate)
    if (outcome.status !== 'closed') return outcome

    const { record } = outcome
    await this.deps.pendingExit.clearIfMatches(record.plate)
    this.deps.gates.requestGateOpen('exit', record.plate)
    this.deps.bus.publish('payment-confirmed', {
      plate: record.plate,
      amountDue: record.amountDue,
      durationMinutes: record.durationMinutes,
    })
    await this.deps.notifier.ledgerChanged()
    return outcome
  }
}
