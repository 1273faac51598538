export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
/** Minimum level a logger emits; 'silent' drops everything */
export type LogThreshold = LogLevel | 'silent'
export type LogFields = Record<string, unknown>
export type LogSink = (line: string) => void

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isThreshold(value: string): value is LogThreshold {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value)
}

export function parseLogLevel(value: string | undefined, fallback: LogThreshold = 'info'): LogThreshold {
  const normalized = value?.trim().toLowerCase()
  return normalized && isThreshold(normalized) ? normalized : fallback
}

function serializeError(err: unknown): LogFields {
  if (!(err instanceof Error)) return { error: String(err) }
  const code = 'code' in err ? err.code : undefined
  return {
    error_name: err.name,
    error_message: err.message,
    ...(typeof code === 'string' && { error_code: code }),
    error_stack: err.stack,
  }
}

export interface LoggerOptions {
  level?: LogThreshold
  sink?: LogSink
}

export class StructuredLogger {
  private readonly level: LogThreshold
  private readonly sink: LogSink

  constructor(private readonly baseFields: LogFields = {}, options: LoggerOptions = {}) {
    this.level = options.level ?? parseLogLevel(process.env.LOG_LEVEL)
    this.sink = options.sink ?? ((line) => console.log(line))
  }

  child(fields: LogFields): StructuredLogger {
    return new StructuredLogger({ ...this.baseFields, ...fields }, { level: this.level, sink: this.sink })
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level]
  }

  private emit(level: LogLevel, message: string, fields?: LogFields, err?: unknown) {
    if (!this.isEnabled(level)) return
    const payload: LogFields = {
      ts: new Date().toISOString(),
      level,
      msg: message,
      ...this.baseFields,
      ...(fields || {}),
      ...(err ? serializeError(err) : {}),
    }
    // JSON lines for machine parsing in log pipelines.
    this.sink(JSON.stringify(payload))
  }

  debug(message: string, fields?: LogFields) { this.emit('debug', message, fields) }
  info(message: string, fields?: LogFields) { this.emit('info', message, fields) }
  warn(message: string, fields?: LogFields, err?: unknown) { this.emit('warn', message, fields, err) }
  error(message: string, fields?: LogFields, err?: unknown) { this.emit('error', message, fields, err) }
}

export function createLogger(baseFields: LogFields = {}, options: LoggerOptions = {}): StructuredLogger {
  return new StructuredLogger(baseFields, options)
}
