import express from 'express'
import cors from 'cors'

import { config } from './config'
import { gateRouter } from './routes/gate'
import { ledgerRouter } from './routes/ledger'
import { paymentsRouter } from './routes/payments'
import { pendingExitRouter } from './routes/pendingExit'
import { webhooksRouter } from './routes/webhooks'
import { gateLimit, standardLimit, webhookLimit } from './middleware/rateLimit'
import { observabilityMiddleware } from './middleware/observability'
import { metrics } from './services/observability'
import { getReadinessReport } from './services/health'

export function createApp() {
  const app = express()

  // Middleware
  app.use(cors({ origin: config.corsOrigin }))
  app.use(express.json({ limit: '100kb' }))
  app.use(observabilityMiddleware)

  // Rate limiting
  app.use('/api/webhooks', webhookLimit)
  app.use('/api/gate', gateLimit)
  app.use('/api', standardLimit)

  // Basic health check (liveness)
  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.floor(process.uptime()),
    })
  })

  // Readiness: the ledger store answers
  app.get('/readyz', (_req, res) => {
    const readiness = getReadinessReport()
    res.status(readiness.ready ? 200 : 503).json({
      status: readiness.ready ? 'ready' : 'not_ready',
      timestamp: new Date().toISOString(),
      checks: {
        ledger: readiness.ledger ? 'ok' : 'fail',
      },
      busSubscribers: readiness.busSubscribers,
    })
  })

  // Metrics snapshot
  app.get('/metrics', (_req, res) => {
    res.json({
      timestamp: new Date().toISOString(),
      metrics: metrics.asJson(),
    })
  })

  // Routes
  app.use('/api/gate', gateRouter)
  app.use('/api/pending-exit', pendingExitRouter)
  app.use('/api/payments', paymentsRouter)
  app.use('/api/webhooks', webhooksRouter)
  app.use('/api', ledgerRouter)

  return app
}
