import type { PlateRole, ScanStatus } from '@parkline/core'
import { isScanStatus } from '@parkline/core'

export class ApiError extends Error {
  constructor(message: string, readonly status?: number, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ApiError'
  }
}

/** The parts of a scan response the gate acts on */
export interface ScanResult {
  status: ScanStatus
  role?: PlateRole
  slot?: string | null
  amountDue?: number
  durationMinutes?: number
}

export interface ApiClient {
  scan(plate: string): Promise<ScanResult>
}

type FetchFn = typeof fetch

/** Fetch helper */
async function apiFetch(
  fetchFn: FetchFn,
  url: string,
  options: { method?: string; body?: unknown } = {},
): Promise<{ status: number; body: unknown }> {
  const { method = 'GET', body } = options

  let res: Response
  try {
    res = await fetchFn(url, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body ? JSON.stringify(body) : undefined,
    })
  } catch (err) {
    throw new ApiError(`API unreachable: ${url}`, undefined, { cause: err })
  }

  const data: unknown = await res.json().catch(() => ({}))
  return { status: res.status, body: data }
}

function parseScanResult(body: unknown): ScanResult | null {
  if (!body || typeof body !== 'object' || !('status' in body) || !isScanStatus(body.status)) {
    return null
  }
  const result: ScanResult = { status: body.status }
  if ('role' in body && (body.role === 'entry' || body.role === 'exit')) result.role = body.role
  if ('slot' in body && (typeof body.slot === 'string' || body.slot === null)) result.slot = body.slot
  if ('amountDue' in body && typeof body.amountDue === 'number') result.amountDue = body.amountDue
  if ('durationMinutes' in body && typeof body.durationMinutes === 'number') {
    result.durationMinutes = body.durationMinutes
  }
  return result
}

export function createApiClient(baseUrl: string, fetchFn: FetchFn = fetch): ApiClient {
  return {
    /**
     * Report one detection. Business outcomes (409 already_in/full, 404,
     * 503 store_busy) come back as results; only unusable replies throw.
     */
    async scan(plate: string): Promise<ScanResult> {
      const { status, body } = await apiFetch(fetchFn, `${baseUrl}/api/gate/scan`, {
        method: 'POST',
        body: { plate },
      })
      const result = parseScanResult(body)
      if (!result) {
        const reason =
          body && typeof body === 'object' && 'error' in body && typeof body.error === 'string'
            ? body.error
            : `API error: ${status}`
        throw new ApiError(reason, status)
      }
      return result
    },
  }
}
