import { describe, it, expect, vi } from 'vitest'
import type { BusSnapshot, BusTopic } from '@parkline/core'

import { NotificationBus } from '../../services/notificationBus'
import type { BusSubscriber } from '../../services/notificationBus'
import { busDroppedSubscribersTotal } from '../../services/observability'

const SNAPSHOT: BusSnapshot = {
  type: 'snapshot',
  slots: { A1: 'MH12AB1234', A2: null },
  records: [],
  pendingExit: null,
}

function deferred<T>() {
  let settle: (value: T) => void = () => undefined
  const promise = new Promise<T>((resolve) => {
    settle = resolve
  })
  return { promise, resolve: (value: T) => settle(value) }
}

function recorder(id: string, overrides: Partial<BusSubscriber> = {}) {
  const received: Array<{ type: string }> = []
  const subscriber: BusSubscriber = {
    id,
    send: (topic, payload) => {
      received.push({ type: topic, ...payload })
    },
    sendSnapshot: (snapshot) => {
      received.push(snapshot)
    },
    ...overrides,
  }
  return { subscriber, received }
}

describe('NotificationBus', () => {
  it('delivers the snapshot first, then incremental events', async () => {
    const bus = new NotificationBus(async () => SNAPSHOT)
    const { subscriber, received } = recorder('dash-1')

    await bus.subscribe(subscriber)
    bus.publish('exit-pending', { plate: 'MH12AB1234' })

    expect(received).toEqual([SNAPSHOT, { type: 'exit-pending', plate: 'MH12AB1234' }])
  })

  it('holds events raised while the snapshot loads and flushes them after it', async () => {
    const pending = deferred<BusSnapshot>()
    const bus = new NotificationBus(() => pending.promise)
    const { subscriber, received } = recorder('dash-1')

    const subscribed = bus.subscribe(subscriber)
    expect(bus.publish('occupancy-changed', { slots: { A1: null } })).toBe(1)
    expect(received).toEqual([])

    pending.resolve(SNAPSHOT)
    await subscribed

    expect(received.map((m) => m.type)).toEqual(['snapshot', 'occupancy-changed'])
  })

  it('filters by topic', async () => {
    const bus = new NotificationBus(async () => SNAPSHOT)
    const gate = recorder('gate-1', { topics: new Set<BusTopic>(['gate-command']), wantsSnapshot: false })
    const dashboard = recorder('dash-1')
    await bus.subscribe(gate.subscriber)
    await bus.subscribe(dashboard.subscriber)

    expect(bus.publish('payment-confirmed', { plate: 'MH12AB1234', amountDue: 2, durationMinutes: 2 })).toBe(1)
    expect(
      bus.publish('gate-command', { gateId: 'exit', action: 'open', issuedAt: '2026-03-01T10:00:00.000Z' }),
    ).toBe(2)

    expect(gate.received).toEqual([
      { type: 'gate-command', gateId: 'exit', action: 'open', issuedAt: '2026-03-01T10:00:00.000Z' },
    ])
    expect(dashboard.received.map((m) => m.type)).toEqual(['snapshot', 'payment-confirmed', 'gate-command'])
  })

  it('drops a subscriber whose delivery throws and keeps serving the others', async () => {
    const bus = new NotificationBus(async () => SNAPSHOT)
    const healthy = recorder('dash-1', { wantsSnapshot: false })
    const broken = recorder('dash-2', {
      wantsSnapshot: false,
      send: () => {
        throw new Error('socket closed')
      },
    })
    await bus.subscribe(healthy.subscriber)
    await bus.subscribe(broken.subscriber)
    const droppedBefore = busDroppedSubscribersTotal.value()

    expect(bus.publish('exit-pending', { plate: 'MH12AB1234' })).toBe(1)
    expect(bus.size).toBe(1)
    expect(busDroppedSubscribersTotal.value()).toBe(droppedBefore + 1)

    expect(bus.publish('exit-pending', { plate: 'KA01AB1000' })).toBe(1)
    expect(healthy.received).toHaveLength(2)
  })

  it('still subscribes when the snapshot cannot be read', async () => {
    const bus = new NotificationBus(() => Promise.reject(new Error('store busy')))
    const { subscriber, received } = recorder('dash-1')

    await bus.subscribe(subscriber)
    bus.publish('exit-pending', { plate: 'MH12AB1234' })

    expect(received).toEqual([{ type: 'exit-pending', plate: 'MH12AB1234' }])
  })

  it('stops delivering after unsubscribe', async () => {
    const bus = new NotificationBus(async () => SNAPSHOT)
    const sendSnapshot = vi.fn()
    const { subscriber, received } = recorder('dash-1', { sendSnapshot })

    const unsubscribe = await bus.subscribe(subscriber)
    expect(sendSnapshot).toHaveBeenCalledWith(SNAPSHOT)
    unsubscribe()

    expect(bus.publish('exit-pending', { plate: 'MH12AB1234' })).toBe(0)
    expect(received).toEqual([])
    expect(bus.size).toBe(0)
  })
})
