import { MetricsRegistry, createLogger } from '@parkline/observability'

export const logger = createLogger({ service: 'api' })
export const metrics = new MetricsRegistry()

export const ledgerOperationsTotal = metrics.counter(
  'ledger_operations_total',
  'Ledger operations by operation and outcome',
)
export const storeBusyRetriesTotal = metrics.counter(
  'store_busy_retries_total',
  'Attempts that found the ledger store busy',
)
export const ledgerLatencyMs = metrics.histogram(
  'ledger_operation_latency_ms',
  'Latency of ledger operations including busy retries',
)
export const gateCommandsTotal = metrics.counter(
  'gate_commands_total',
  'Gate actuation intents published on the bus',
)
export const busDroppedSubscribersTotal = metrics.counter(
  'bus_dropped_subscribers_total',
  'Bus subscribers removed after a failed delivery',
)
