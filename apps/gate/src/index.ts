import 'dotenv/config'
import { createWriteStream } from 'node:fs'
import { createInterface } from 'node:readline'
import { createLogger } from '@parkline/observability'
import { PlateDebouncer } from '@parkline/plates'

import { GateBusClient } from './busClient'
import { LineCommandSink, LoggingCommandSink } from './commandSink'
import type { CommandSink } from './commandSink'
import { loadConfig } from './config'
import { DetectionWorkflow } from './detection'
import { GateController } from './gateController'
import { createApiClient } from './lib/api'

const config = loadConfig()
const logger = createLogger({ service: 'gate' })

const sink: CommandSink = config.device
  ? new LineCommandSink(createWriteStream(config.device, { flags: 'a' }), logger.child({ component: 'device' }))
  : new LoggingCommandSink(logger.child({ component: 'dry_run_sink' }))

const gates = new GateController({ sink, dwellMs: config.dwellMs, logger: logger.child({ component: 'gates' }) })

const workflow = new DetectionWorkflow({
  api: createApiClient(config.apiUrl),
  gates,
  debouncer: new PlateDebouncer({ cooldownMs: config.cooldownMs }),
  logger: logger.child({ component: 'detection' }),
  countryCode: config.countryCode,
})

const busClient = new GateBusClient({
  url: config.wsUrl,
  apiKey: config.gateApiKey,
  reconnectMs: config.reconnectMs,
  logger: logger.child({ component: 'bus' }),
  onCommand: (command) => {
    logger.info('gate_command_received', { gate_id: command.gateId, plate: command.plate })
    gates.actuate(command.gateId, command.plate).catch((err: unknown) => {
      logger.error('gate_actuation_failed', { gate_id: command.gateId, plate: command.plate }, err)
    })
  },
})

// Plate source: one OCR read per stdin line.
const lines = createInterface({ input: process.stdin })
lines.on('line', (line) => {
  workflow.handle(line).catch((err: unknown) => logger.error('detection_failed', {}, err))
})

busClient.start()
logger.info('gate_started', {
  api_url: config.apiUrl,
  ws_url: config.wsUrl,
  device: config.device ?? 'dry-run',
  dwell_ms: config.dwellMs,
})

function shutdown(signal: string) {
  logger.info('gate_shutting_down', { signal })
  lines.close()
  busClient.stop()
  // A barrier that is open stays open until its close is sent.
  gates.drain().then(() => process.exit(0))
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
