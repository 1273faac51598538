import type { ScanStatus } from '@parkline/core'
import type { StructuredLogger } from '@parkline/observability'
import { extractPlate } from '@parkline/plates'
import type { PlateDebouncer } from '@parkline/plates'

import type { GateController } from './gateController'
import type { ApiClient } from './lib/api'

export interface DetectionWorkflowOptions {
  api: ApiClient
  gates: Pick<GateController, 'actuate'>
  debouncer: Pick<PlateDebouncer, 'accept'>
  logger: StructuredLogger
  countryCode?: string
}

export type DetectionOutcome =
  | { kind: 'unreadable' }
  | { kind: 'debounced'; plate: string }
  | { kind: 'scanned'; plate: string; status: ScanStatus }
  | { kind: 'failed'; plate: string; error: string }

/**
 * Camera read → plate → ledger.
 *
 * Entries open the entry gate straight away. Exits only get a quote here;
 * the exit gate opens when the payment-driven gate command arrives on the bus.
 */
export class DetectionWorkflow {
  constructor(private readonly options: DetectionWorkflowOptions) {}

  async handle(raw: string): Promise<DetectionOutcome> {
    const { api, gates, debouncer, logger } = this.options

    const plate = extractPlate(raw, this.options.countryCode)
    if (!plate) {
      logger.debug('plate_unreadable', { raw })
      return { kind: 'unreadable' }
    }
    if (!debouncer.accept(plate)) {
      return { kind: 'debounced', plate }
    }

    let status: ScanStatus
    try {
      const result = await api.scan(plate)
      status = result.status

      switch (result.status) {
        case 'entry_logged':
          logger.info('entry_logged', { plate, slot: result.slot })
          gates.actuate('entry', plate).catch((err: unknown) => {
            logger.error('gate_actuation_failed', { gate_id: 'entry', plate }, err)
          })
          break
        case 'exit_pending':
          logger.info('exit_awaiting_payment', {
            plate,
            amount_due: result.amountDue,
            duration_minutes: result.durationMinutes,
          })
          break
        default:
          logger.warn('scan_not_actioned', { plate, status: result.status })
      }
    } catch (err) {
      logger.error('scan_failed', { plate }, err)
      return { kind: 'failed', plate, error: err instanceof Error ? err.message : String(err) }
    }

    return { kind: 'scanned', plate, status }
  }
}
