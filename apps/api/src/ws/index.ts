import { randomUUID } from 'node:crypto'
import type { IncomingMessage, Server as HttpServer } from 'http'
import { WebSocketServer, WebSocket } from 'ws'
import type { BusTopic } from '@parkline/core'
import { BUS_TOPICS } from '@parkline/core'

import type { BusSubscriber, NotificationBus } from '../services/notificationBus'
import { logger } from '../services/observability'

export interface WsOptions {
  bus: NotificationBus
  /** Required from /ws/gate clients when set */
  gateApiKey?: string
}

type Channel = 'dashboard' | 'gate'

const CHANNELS: Record<string, Channel> = {
  '/ws/dashboard': 'dashboard',
  '/ws/gate': 'gate',
}

function channelFor(req: IncomingMessage): { url: URL; channel: Channel | undefined } {
  const url = new URL(req.url || '', `http://${req.headers.host}`)
  return { url, channel: CHANNELS[url.pathname] }
}

const GATE_TOPICS: ReadonlySet<BusTopic> = new Set<BusTopic>(['gate-command'])

function sendJson(ws: WebSocket, message: object) {
  // A closed socket would swallow the frame; surface it so the bus drops us.
  if (ws.readyState !== WebSocket.OPEN) {
    throw new Error(`WebSocket not open (readyState ${ws.readyState})`)
  }
  ws.send(JSON.stringify(message))
}

function subscriberFor(ws: WebSocket, channel: Channel): BusSubscriber {
  return {
    id: `${channel}-${randomUUID()}`,
    topics: channel === 'gate' ? GATE_TOPICS : new Set(BUS_TOPICS),
    wantsSnapshot: channel === 'dashboard',
    send: (topic, payload) => sendJson(ws, { type: topic, ...payload }),
    sendSnapshot: (snapshot) => sendJson(ws, snapshot),
  }
}

/**
 * Bus bridge for dashboards (/ws/dashboard, every topic, snapshot first) and
 * the gate process (/ws/gate, gate commands only).
 */
export function setupWebSocket(server: HttpServer, options: WsOptions): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true })

  server.on('upgrade', (req, socket, head) => {
    const { url, channel } = channelFor(req)

    if (!channel) {
      socket.write('HTTP/1.1 404 Not Found\r\n\r\n')
      socket.destroy()
      return
    }

    if (channel === 'gate' && options.gateApiKey) {
      const apiKey = url.searchParams.get('apiKey') || req.headers['x-api-key']
      if (apiKey !== options.gateApiKey) {
        logger.warn('ws_gate_unauthorized', { remote: req.socket.remoteAddress })
        socket.write('HTTP/1.1 401 Unauthorized\r\n\r\n')
        socket.destroy()
        return
      }
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit('connection', ws, req)
    })
  })

  wss.on('connection', (ws, req) => {
    const { channel } = channelFor(req)
    if (!channel) {
      ws.close(4000, 'Invalid WebSocket path')
      return
    }
    const subscriber = subscriberFor(ws, channel)
    const log = logger.child({ subscriber_id: subscriber.id })

    ws.on('close', () => {
      options.bus.unsubscribe(subscriber.id)
      log.info('ws_disconnected')
    })
    ws.on('error', (err) => log.warn('ws_error', {}, err))

    options.bus
      .subscribe(subscriber)
      .then(() => log.info('ws_subscribed', { channel }))
      .catch((err: unknown) => log.error('ws_subscribe_failed', { channel }, err))
  })

  logger.info('ws_ready', { channels: Object.keys(CHANNELS) })
  return wss
}
