export {
  StructuredLogger,
  createLogger,
  parseLogLevel,
  type LogLevel,
  type LogThreshold,
  type LogFields,
  type LogSink,
  type LoggerOptions,
} from './logger'
export { Counter, Histogram, MetricsRegistry, type Labels } from './metrics'
