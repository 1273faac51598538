import type { BusPayloads, BusSnapshot, BusTopic } from '@parkline/core'
import type { StructuredLogger } from '@parkline/observability'

import { busDroppedSubscribersTotal, logger as defaultLogger } from './observability'

export interface BusSubscriber {
  id: string
  /** Topics to receive; all topics when omitted */
  topics?: ReadonlySet<BusTopic>
  /** Deliver the snapshot on subscribe (default true) */
  wantsSnapshot?: boolean
  send<K extends BusTopic>(topic: K, payload: BusPayloads[K]): void
  sendSnapshot(snapshot: BusSnapshot): void
}

export type SnapshotProvider = () => Promise<BusSnapshot>

interface Subscription {
  subscriber: BusSubscriber
  ready: boolean
  /** Events published while the snapshot was being read */
  backlog: Array<() => void>
}

/**
 * Best-effort fan-out of ledger and gate events.
 *
 * New subscribers get a snapshot first and incremental events after it;
 * events raised while the snapshot is loading are held back and delivered
 * right after it. Nothing is persisted or acknowledged: a subscriber that
 * disconnects misses events until it reconnects and gets a fresh snapshot.
 * The ledger stays the source of truth.
 */
export class NotificationBus {
  private readonly subscriptions = new Map<string, Subscription>()
  private readonly logger: StructuredLogger

  constructor(
    private readonly snapshot: SnapshotProvider,
    logger: StructuredLogger = defaultLogger,
  ) {
    this.logger = logger.child({ component: 'bus' })
  }

  get size(): number {
    return this.subscriptions.size
  }

  /** Register a subscriber; resolves once its snapshot has been delivered */
  async subscribe(subscriber: BusSubscriber): Promise<() => void> {
    const subscription: Subscription = { subscriber, ready: false, backlog: [] }
    this.subscriptions.set(subscriber.id, subscription)
    const unsubscribe = () => this.unsubscribe(subscriber.id)

    if (subscriber.wantsSnapshot !== false) {
      try {
        const snapshot = await this.snapshot()
        this.deliver(subscription, () => subscriber.sendSnapshot(snapshot))
      } catch (err) {
        // Incremental events still flow; the client resyncs on reconnect.
        this.logger.error('bus_snapshot_failed', { subscriber_id: subscriber.id }, err)
      }
    }

    subscription.ready = true
    const backlog = subscription.backlog.splice(0)
    for (const send of backlog) {
      if (!this.deliver(subscription, send)) break
    }
    return unsubscribe
  }

  unsubscribe(id: string): boolean {
    return this.subscriptions.delete(id)
  }

  /** Fire-and-forget; returns the number of subscribers it was handed to */
  publish<K extends BusTopic>(topic: K, payload: BusPayloads[K]): number {
    let delivered = 0
    for (const subscription of Array.from(this.subscriptions.values())) {
      const { subscriber } = subscription
      if (subscriber.topics && !subscriber.topics.has(topic)) continue

      const send = () => subscriber.send(topic, payload)
      if (!subscription.ready) {
        subscription.backlog.push(send)
        delivered++
      } else if (this.deliver(subscription, send)) {
        delivered++
      }
    }
    this.logger.debug('bus_published', { topic, delivered })
    return delivered
  }

  private deliver(subscription: Subscription, send: () => void): boolean {
    try {
      send()
      return true
    } catch (err) {
      this.subscriptions.delete(subscription.subscriber.id)
      busDroppedSubscribersTotal.inc()
      this.logger.warn('bus_subscriber_dropped', { subscriber_id: subscription.subscriber.id }, err)
      return false
    }
  }
}
