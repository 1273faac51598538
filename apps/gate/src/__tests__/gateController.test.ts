import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { StructuredLogger } from '@parkline/observability'

import type { GateSignal } from '../commandSink'
import { GateController } from '../gateController'

const logger = new StructuredLogger({}, { level: 'silent' })

let sent: GateSignal[]
const sink = {
  send: vi.fn(async (signal: GateSignal) => {
    sent.push(signal)
  }),
}

beforeEach(() => {
  vi.useFakeTimers()
  sent = []
  sink.send.mockClear()
})

afterEach(() => {
  vi.useRealTimers()
})

describe('GateController', () => {
  it('opens, holds for the dwell time, then closes', async () => {
    const gates = new GateController({ sink, dwellMs: 3000, logger })

    const done = gates.actuate('exit', 'MH12AB1234')
    await vi.advanceTimersByTimeAsync(0)
    expect(sent).toEqual(['OPEN_EXIT'])

    await vi.advanceTimersByTimeAsync(2999)
    expect(sent).toEqual(['OPEN_EXIT'])

    await vi.advanceTimersByTimeAsync(1)
    await done
    expect(sent).toEqual(['OPEN_EXIT', 'CLOSE_EXIT'])
  })

  it('runs actuations of one gate back to back', async () => {
    const gates = new GateController({ sink, dwellMs: 1000, logger })

    const first = gates.actuate('entry')
    const second = gates.actuate('entry')
    await vi.advanceTimersByTimeAsync(1000)
    await first
    expect(sent).toEqual(['OPEN_ENTRY', 'CLOSE_ENTRY', 'OPEN_ENTRY'])

    await vi.advanceTimersByTimeAsync(1000)
    await second
    expect(sent).toEqual(['OPEN_ENTRY', 'CLOSE_ENTRY', 'OPEN_ENTRY', 'CLOSE_ENTRY'])
  })

  it('drives the two gates independently', async () => {
    const gates = new GateController({ sink, dwellMs: 1000, logger })

    const entry = gates.actuate('entry')
    const exit = gates.actuate('exit')
    await vi.advanceTimersByTimeAsync(0)
    expect(sent).toEqual(['OPEN_ENTRY', 'OPEN_EXIT'])

    await vi.advanceTimersByTimeAsync(1000)
    await Promise.all([entry, exit])
    expect(sent).toEqual(['OPEN_ENTRY', 'OPEN_EXIT', 'CLOSE_ENTRY', 'CLOSE_EXIT'])
  })

  it('keeps serving a gate after a failed actuation', async () => {
    const gates = new GateController({ sink, dwellMs: 1000, logger })
    sink.send.mockRejectedValueOnce(new Error('serial port closed'))

    await expect(gates.actuate('exit')).rejects.toThrow('serial port closed')

    const retry = gates.actuate('exit')
    await vi.advanceTimersByTimeAsync(1000)
    await retry
    expect(sent).toEqual(['OPEN_EXIT', 'CLOSE_EXIT'])
  })

  it('drains an open barrier through its close', async () => {
    const gates = new GateController({ sink, dwellMs: 3000, logger })
    gates.actuate('exit', 'MH12AB1234').catch(() => undefined)
    await vi.advanceTimersByTimeAsync(0)

    let drained = false
    const draining = gates.drain().then(() => {
      drained = true
    })
    await vi.advanceTimersByTimeAsync(2999)
    expect(drained).toBe(false)
    expect(sent).toEqual(['OPEN_EXIT'])

    await vi.advanceTimersByTimeAsync(1)
    await draining
    expect(sent).toEqual(['OPEN_EXIT', 'CLOSE_EXIT'])
  })

  it('drains at once when no gate is moving', async () => {
    await new GateController({ sink, dwellMs: 1000, logger }).drain()
    expect(sent).toEqual([])
  })
})
