import type { Response } from 'express'
import { normalizePlate } from '@parkline/core'

import { errorCodeFor, httpStatusFor } from '../errors'
import { logger } from '../services/observability'

const PLATE_REGEX = /^[A-Z0-9]{2,16}$/

/** Normalized plate, or null when the value is missing or malformed */
export function readPlate(value: unknown): string | null {
  if (typeof value !== 'string') return null
  const plate = normalizePlate(value.trim())
  return PLATE_REGEX.test(plate) ? plate : null
}

/** Map a store failure to 503 (busy) or 500 under the given response key */
export function replyStoreFailure(
  res: Response,
  err: unknown,
  key: 'status' | 'error',
  context: Record<string, unknown>,
) {
  const code = errorCodeFor(err)
  logger.error('request_store_failure', { ...context, code, request_id: res.locals.requestId }, err)
  return res.status(httpStatusFor(err)).json({ [key]: code })
}
