import WebSocket from 'ws'
import type { GateCommand } from '@parkline/core'
import type { StructuredLogger } from '@parkline/observability'

export interface GateBusClientOptions {
  url: string
  apiKey?: string
  reconnectMs: number
  logger: StructuredLogger
  onCommand: (command: GateCommand) => void
}

/** A gate-command bus message, or null for anything else */
export function parseGateCommand(raw: string): GateCommand | null {
  let message: unknown
  try {
    message = JSON.parse(raw)
  } catch {
    return null
  }
  if (!message || typeof message !== 'object' || !('type' in message) || message.type !== 'gate-command') {
    return null
  }
  const gateId = 'gateId' in message ? message.gateId : undefined
  const action = 'action' in message ? message.action : undefined
  if ((gateId !== 'entry' && gateId !== 'exit') || action !== 'open') return null

  const command: GateCommand = {
    gateId,
    action,
    issuedAt: 'issuedAt' in message && typeof message.issuedAt === 'string' ? message.issuedAt : '',
  }
  if ('plate' in message && typeof message.plate === 'string') command.plate = message.plate
  return command
}

/**
 * Subscribes to gate commands on the API bus.
 * Reconnects after a fixed delay whenever the socket closes.
 */
export class GateBusClient {
  private socket: WebSocket | null = null
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null
  private stopped = false

  constructor(private readonly options: GateBusClientOptions) {}

  get connected(): boolean {
    return this.socket?.readyState === WebSocket.OPEN
  }

  start() {
    this.stopped = false
    this.connect()
  }

  stop() {
    this.stopped = true
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer)
      this.reconnectTimer = null
    }
    this.socket?.close()
    this.socket = null
  }

  private connect() {
    const { logger } = this.options
    const url = this.options.apiKey
      ? `${this.options.url}?apiKey=${encodeURIComponent(this.options.apiKey)}`
      : this.options.url
    const socket = new WebSocket(url)
    this.socket = socket

    socket.on('open', () => {
      logger.info('bus_connected', { url: this.options.url })
    })

    socket.on('message', (data) => {
      const command = parseGateCommand(data.toString())
      if (command) this.options.onCommand(command)
    })

    socket.on('close', () => {
      if (this.socket === socket) this.socket = null
      if (this.stopped) return
      logger.warn('bus_disconnected', { reconnect_ms: this.options.reconnectMs })
      this.reconnectTimer = setTimeout(() => this.connect(), this.options.reconnectMs)
    })

    socket.on('error', (err) => {
      logger.warn('bus_socket_error', {}, err)
    })
  }
}
