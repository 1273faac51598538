import { describe, it, expect, vi } from 'vitest'

import { ApiError, createApiClient } from '../lib/api'

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

describe('createApiClient', () => {
  it('posts the plate to the scan endpoint', async () => {
    const fetchFn = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>().mockResolvedValue(
      jsonResponse(201, { role: 'entry', status: 'entry_logged', slot: 'A1', record: { id: 1 } }),
    )
    const api = createApiClient('http://api.test', fetchFn)

    expect(await api.scan('MH12AB1234')).toEqual({ role: 'entry', status: 'entry_logged', slot: 'A1' })
    expect(fetchFn).toHaveBeenCalledWith('http://api.test/api/gate/scan', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ plate: 'MH12AB1234' }),
    })
  })

  it('returns business outcomes carried by non-2xx replies', async () => {
    const fetchFn = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
    fetchFn.mockResolvedValueOnce(jsonResponse(409, { role: 'entry', status: 'full' }))
    fetchFn.mockResolvedValueOnce(jsonResponse(503, { status: 'store_busy' }))
    const api = createApiClient('http://api.test', fetchFn)

    expect(await api.scan('MH12AB1234')).toEqual({ role: 'entry', status: 'full' })
    expect(await api.scan('MH12AB1234')).toEqual({ status: 'store_busy' })
  })

  it('keeps the quote figures of an exit', async () => {
    const fetchFn = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>().mockResolvedValue(
      jsonResponse(200, { role: 'exit', status: 'exit_pending', slot: 'A1', amountDue: 2, durationMinutes: 2 }),
    )
    const api = createApiClient('http://api.test', fetchFn)

    expect(await api.scan('MH12AB1234')).toEqual({
      role: 'exit',
      status: 'exit_pending',
      slot: 'A1',
      amountDue: 2,
      durationMinutes: 2,
    })
  })

  it('throws ApiError for replies without a scan status', async () => {
    const fetchFn = vi
      .fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .mockResolvedValue(jsonResponse(400, { error: 'plate is required' }))
    const api = createApiClient('http://api.test', fetchFn)

    const error = await api.scan('').catch((e: unknown) => e)
    expect(error).toBeInstanceOf(ApiError)
    expect(error).toMatchObject({ message: 'plate is required', status: 400 })
  })

  it('throws ApiError when the API cannot be reached', async () => {
    const fetchFn = vi
      .fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .mockRejectedValue(new TypeError('fetch failed'))
    const api = createApiClient('http://api.test', fetchFn)

    await expect(api.scan('MH12AB1234')).rejects.toThrow('API unreachable: http://api.test/api/gate/scan')
  })
})
