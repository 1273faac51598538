import { describe, it, expect, vi, beforeEach } from 'vitest'
import { StructuredLogger } from '@parkline/observability'

import { DetectionWorkflow } from '../detection'
import { ApiError } from '../lib/api'

const api = { scan: vi.fn() }
const gates = { actuate: vi.fn() }
const debouncer = { accept: vi.fn() }
const logger = new StructuredLogger({}, { level: 'silent' })

function workflow() {
  return new DetectionWorkflow({ api, gates, debouncer, logger, countryCode: 'IN' })
}

beforeEach(() => {
  vi.clearAllMocks()
  debouncer.accept.mockReturnValue(true)
  gates.actuate.mockResolvedValue(undefined)
})

describe('DetectionWorkflow', () => {
  it('opens the entry gate once the entry is logged', async () => {
    api.scan.mockResolvedValue({ role: 'entry', status: 'entry_logged', slot: 'A1' })

    const outcome = await workflow().handle('IND MH 12 AB 1234')

    expect(outcome).toEqual({ kind: 'scanned', plate: 'MH12AB1234', status: 'entry_logged' })
    expect(api.scan).toHaveBeenCalledWith('MH12AB1234')
    expect(gates.actuate).toHaveBeenCalledWith('entry', 'MH12AB1234')
  })

  it('leaves the exit gate to the payment-driven command', async () => {
    api.scan.mockResolvedValue({ role: 'exit', status: 'exit_pending', amountDue: 2, durationMinutes: 2 })

    const outcome = await workflow().handle('MH12AB1234')

    expect(outcome).toEqual({ kind: 'scanned', plate: 'MH12AB1234', status: 'exit_pending' })
    expect(gates.actuate).not.toHaveBeenCalled()
  })

  it.each(['already_in', 'full', 'store_busy'] as const)('does not open a gate on %s', async (status) => {
    api.scan.mockResolvedValue({ status })

    expect(await workflow().handle('MH12AB1234')).toEqual({ kind: 'scanned', plate: 'MH12AB1234', status })
    expect(gates.actuate).not.toHaveBeenCalled()
  })

  it('skips text with no plate in it', async () => {
    expect(await workflow().handle('~~ ##')).toEqual({ kind: 'unreadable' })
    expect(api.scan).not.toHaveBeenCalled()
  })

  it('skips repeat reads inside the cooldown', async () => {
    debouncer.accept.mockReturnValue(false)

    expect(await workflow().handle('MH12AB1234')).toEqual({ kind: 'debounced', plate: 'MH12AB1234' })
    expect(api.scan).not.toHaveBeenCalled()
  })

  it('reports an unreachable API without throwing', async () => {
    api.scan.mockRejectedValue(new ApiError('API unreachable: http://api.test/api/gate/scan'))

    expect(await workflow().handle('MH12AB1234')).toEqual({
      kind: 'failed',
      plate: 'MH12AB1234',
      error: 'API unreachable: http://api.test/api/gate/scan',
    })
    expect(gates.actuate).not.toHaveBeenCalled()
  })
})
