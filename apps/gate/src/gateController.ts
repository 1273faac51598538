import type { GateId } from '@parkline/core'
import type { StructuredLogger } from '@parkline/observability'

import type { CommandSink } from './commandSink'
import { gateSignal } from './commandSink'

export interface GateControllerOptions {
  sink: CommandSink
  dwellMs: number
  logger: StructuredLogger
  sleep?: (ms: number) => Promise<void>
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Open, hold, close. Actuations of the same gate run one after another and
 * are never cut short; the two gates are independent.
 */
export class GateController {
  private readonly tails = new Map<GateId, Promise<void>>()
  private readonly sleep: (ms: number) => Promise<void>

  constructor(private readonly options: GateControllerOptions) {
    this.sleep = options.sleep ?? defaultSleep
  }

  actuate(gateId: GateId, plate?: string): Promise<void> {
    const previous = this.tails.get(gateId) ?? Promise.resolve()
    const run = previous.then(() => this.cycle(gateId, plate))
    this.tails.set(
      gateId,
      run.catch(() => undefined),
    )
    return run
  }

  /** Resolves once every actuation already queued has finished its close */
  async drain(): Promise<void> {
    await Promise.all(this.tails.values())
  }

  private async cycle(gateId: GateId, plate?: string) {
    const { sink, dwellMs, logger } = this.options
    await sink.send(gateSignal('open', gateId))
    logger.info('gate_opened', { gate_id: gateId, plate })
    await this.sleep(dwellMs)
    await sink.send(gateSignal('close', gateId))
    logger.info('gate_closed', { gate_id: gateId, plate })
  }
}
