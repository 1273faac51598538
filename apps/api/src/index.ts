import 'dotenv/config'
import { createServer } from 'http'

import { createApp } from './app'
import { config } from './config'
import { sqlite } from './db'
import { bus } from './services'
import { logger } from './services/observability'
import { setupWebSocket } from './ws/index'

const app = createApp()
const server = createServer(app)
const wss = setupWebSocket(server, { bus, gateApiKey: config.gateApiKey })

server.listen(config.port, () => {
  logger.info('api_listening', {
    url: `http://localhost:${config.port}`,
    ledger: config.ledgerPath,
    slots: config.slotCount,
    rate_per_minute: config.ratePerMinute,
    sms_webhook: config.smsWebhookToken ? 'enabled' : 'disabled',
  })
})

function shutdown(signal: string) {
  logger.info('api_shutting_down', { signal })
  for (const client of wss.clients) client.terminate()
  wss.close()
  server.close((err) => {
    if (err) logger.error('api_close_failed', {}, err)
    sqlite.close()
    process.exit(err ? 1 : 0)
  })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
