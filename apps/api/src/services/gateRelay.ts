import type { GateCommand, GateId } from '@parkline/core'

import type { NotificationBus } from './notificationBus'
import { gateCommandsTotal, logger } from './observability'

/**
 * Turns "this gate should open" into a bus message for the gate process.
 *
 * The API never talks to the barrier hardware; only the gate process holds
 * the serial line and acts on these commands.
 */
export class GateCommandRelay {
  constructor(
    private readonly bus: Pick<NotificationBus, 'publish'>,
    private readonly now: () => Date = () => new Date(),
  ) {}

  requestGateOpen(gateId: GateId, plate?: string): GateCommand {
    const command: GateCommand = {
      gateId,
      action: 'open',
      ...(plate && { plate }),
      issuedAt: this.now().toISOString(),
    }
    const receivers = this.bus.publish('gate-command', command)
    gateCommandsTotal.inc({ gate: gateId })

    if (receivers === 0) {
      logger.warn('gate_command_unheard', { gate_id: gateId, plate })
    } else {
      logger.info('gate_command_published', { gate_id: gateId, plate, receivers })
    }
    return command
  }
}
