import { describe, it, expect, vi, beforeEach } from 'vitest'
import type { ParkingRecord } from '@parkline/core'

import { ExitSettlement } from '../../services/settlement'

const closedRecord: ParkingRecord = {
  id: 7,
  plate: 'MH12AB1234',
  entryTime: new Date('2026-03-01T10:00:00.000Z'),
  exitTime: new Date('2026-03-01T10:01:01.000Z'),
  durationMinutes: 2,
  amountDue: 2,
  status: 'OUT',
  slot: 'A1',
}

const calls: string[] = []

const deps = {
  transactions: { confirmAndClose: vi.fn() },
  pendingExit: { clearIfMatches: vi.fn() },
  gates: { requestGateOpen: vi.fn() },
  bus: { publish: vi.fn() },
  notifier: { ledgerChanged: vi.fn() },
}

beforeEach(() => {
  vi.clearAllMocks()
  calls.length = 0
  deps.pendingExit.clearIfMatches.mockImplementation(async () => {
    calls.push('clear')
    return true
  })
  deps.gates.requestGateOpen.mockImplementation(() => {
    calls.push('gate')
  })
  deps.bus.publish.mockImplementation((topic: string) => {
    calls.push(topic)
    return 1
  })
  deps.notifier.ledgerChanged.mockImplementation(async () => {
    calls.push('ledger')
  })
})

describe('ExitSettlement', () => {
  it('closes, clears the pending exit, opens the exit gate and announces the payment', async () => {
    deps.transactions.confirmAndClose.mockImplementation(async () => {
      calls.push('close')
      return { status: 'closed', record: closedRecord }
    })

    const outcome = await new ExitSettlement(deps).settle('MH12AB1234')

    expect(outcome).toEqual({ status: 'closed', record: closedRecord })
    expect(calls).toEqual(['close', 'clear', 'gate', 'payment-confirmed', 'ledger'])
    expect(deps.pendingExit.clearIfMatches).toHaveBeenCalledWith('MH12AB1234')
    expect(deps.gates.requestGateOpen).toHaveBeenCalledWith('exit', 'MH12AB1234')
    expect(deps.bus.publish).toHaveBeenCalledWith('payment-confirmed', {
      plate: 'MH12AB1234',
      amountDue: 2,
      durationMinutes: 2,
    })
  })

  it('does nothing else when there is no open stay', async () => {
    deps.transactions.confirmAndClose.mockResolvedValue({ status: 'not_found' })

    expect(await new ExitSettlement(deps).settle('MH12AB1234')).toEqual({ status: 'not_found' })
    expect(calls).toEqual([])
  })

  it('never opens the gate when the close fails', async () => {
    deps.transactions.confirmAndClose.mockRejectedValue(new Error('store_busy'))

    await expect(new ExitSettlement(deps).settle('MH12AB1234')).rejects.toThrow('store_busy')
    expect(deps.gates.requestGateOpen).not.toHaveBeenCalled()
  })
})
