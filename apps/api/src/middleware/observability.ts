import { randomUUID } from 'node:crypto'
import type { NextFunction, Request, Response } from 'express'
import { normalizePlate } from '@parkline/core'
import { logger } from '../services/observability'

function extractPlate(req: Request): string | undefined {
  const body: unknown = req.body
  const fromBody =
    body && typeof body === 'object' && 'plate' in body && typeof body.plate === 'string'
      ? body.plate
      : undefined
  const raw = fromBody || req.params?.plate
  return raw ? normalizePlate(raw) : undefined
}

export function observabilityMiddleware(req: Request, res: Response, next: NextFunction) {
  const requestId = req.header('X-Request-Id') || randomUUID()
  const startedAt = Date.now()
  const plate = extractPlate(req)

  res.locals.requestId = requestId
  res.setHeader('X-Request-Id', requestId)

  logger.info('request_started', {
    request_id: requestId,
    method: req.method,
    path: req.path,
    plate,
  })

  res.on('finish', () => {
    logger.info('request_finished', {
      request_id: requestId,
      method: req.method,
      path: req.path,
      status_code: res.statusCode,
      duration_ms: Date.now() - startedAt,
      plate,
    })
  })

  next()
}
