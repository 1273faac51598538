import type { StructuredLogger } from '@parkline/observability'

import type { NotificationBus } from './notificationBus'
import { logger as defaultLogger } from './observability'
import type { TransactionManager } from './transactions'

/**
 * Publishes fresh ledger and occupancy views after a committed change.
 *
 * Reads happen after the commit, so a failure here never affects the
 * change itself; dashboards catch up on the next event or reconnect.
 */
export class LedgerNotifier {
  private readonly logger: StructuredLogger

  constructor(
    private readonly bus: Pick<NotificationBus, 'publish'>,
    private readonly transactions: Pick<TransactionManager, 'occupancy' | 'recentRecords'>,
    private readonly recentLimit: number,
    logger: StructuredLogger = defaultLogger,
  ) {
    this.logger = logger.child({ component: 'ledger_notifier' })
  }

  async ledgerChanged(): Promise<void> {
    try {
      const [slots, records] = await Promise.all([
        this.transactions.occupancy(),
        this.transactions.recentRecords(this.recentLimit),
      ])
      this.bus.publish('ledger-changed', { records })
      this.bus.publish('occupancy-changed', { slots })
    } catch (err) {
      this.logger.warn('ledger_refresh_failed', {}, err)
    }
  }
}
