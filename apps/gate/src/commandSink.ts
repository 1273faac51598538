import type { Writable } from 'node:stream'
import type { GateId } from '@parkline/core'
import type { StructuredLogger } from '@parkline/observability'

export type GateSignal = 'OPEN_ENTRY' | 'CLOSE_ENTRY' | 'OPEN_EXIT' | 'CLOSE_EXIT'

export function gateSignal(action: 'open' | 'close', gateId: GateId): GateSignal {
  if (gateId === 'entry') return action === 'open' ? 'OPEN_ENTRY' : 'CLOSE_ENTRY'
  return action === 'open' ? 'OPEN_EXIT' : 'CLOSE_EXIT'
}

/** The hardware channel. Only the gate process holds one. */
export interface CommandSink {
  send(signal: GateSignal): Promise<void>
}

/**
 * Newline-terminated commands on a byte stream (the barrier controller's serial line).
 * Once the stream fails, the failure is logged and every later send rejects with it.
 */
export class LineCommandSink implements CommandSink {
  private failure: Error | null = null

  constructor(
    private readonly stream: Writable,
    private readonly logger: StructuredLogger,
  ) {
    stream.on('error', (err) => {
      if (this.failure) return
      this.failure = err
      this.logger.error('gate_device_failed', {}, err)
    })
  }

  send(signal: GateSignal): Promise<void> {
    const { failure } = this
    if (failure) return Promise.reject(failure)
    return new Promise((resolve, reject) => {
      this.stream.write(`${signal}\n`, (err) => (err ? reject(err) : resolve()))
    })
  }
}

/** Dry-run sink for lots without a barrier controller attached */
export class LoggingCommandSink implements CommandSink {
  constructor(private readonly logger: StructuredLogger) {}

  async send(signal: GateSignal): Promise<void> {
    this.logger.info('gate_signal', { signal })
  }
}
