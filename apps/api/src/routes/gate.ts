import { Router } from 'express'
import type { Response } from 'express'
import type { EntryOutcome, ExitQuote, PlateDetectedEvent } from '@parkline/core'
import { isScanStatus } from '@parkline/core'

import { bus, exitSettlement, ledgerNotifier, pendingExit, transactions } from '../services'
import { errorCodeFor } from '../errors'
import { readPlate, replyStoreFailure } from './helpers'

export const gateRouter = Router()

function entryStatusCode(outcome: EntryOutcome): 201 | 409 {
  return outcome.status === 'entry_logged' ? 201 : 409
}

function entryEvent(plate: string, outcome: EntryOutcome): PlateDetectedEvent {
  switch (outcome.status) {
    case 'entry_logged':
      return {
        plate,
        status: outcome.status,
        slot: outcome.slot,
        entryTime: outcome.record.entryTime.toISOString(),
      }
    case 'already_in':
      return { plate, status: outcome.status, slot: outcome.record.slot }
    case 'full':
      return { plate, status: outcome.status }
  }
}

function exitEvent(quote: ExitQuote): PlateDetectedEvent {
  return {
    plate: quote.plate,
    status: 'exit_pending',
    slot: quote.slot,
    amountDue: quote.amountDue,
    durationMinutes: quote.durationMinutes,
    entryTime: quote.entryTime.toISOString(),
    exitTime: quote.exitTime.toISOString(),
  }
}

// POST /api/gate/entry: Log a vehicle into the first free slot
gateRouter.post('/entry', async (req, res) => {
  const plate = readPlate(req.body?.plate)
  if (!plate) {
    return res.status(400).json({ error: 'plate is required' })
  }

  try {
    const outcome = await transactions.logEntry(plate)
    if (outcome.status === 'entry_logged') {
      await ledgerNotifier.ledgerChanged()
    }
    return res.status(entryStatusCode(outcome)).json(outcome)
  } catch (err) {
    return replyStoreFailure(res, err, 'status', { route: 'gate_entry', plate })
  }
})

async function replyExitQuote(rawPlate: unknown, res: Response) {
  const plate = readPlate(rawPlate)
  if (!plate) {
    return res.status(400).json({ error: 'plate is required' })
  }

  try {
    const outcome = await transactions.quoteExit(plate)
    if (outcome.status === 'not_found') {
      return res.status(404).json({ error: 'not_found' })
    }
    return res.json(outcome.quote)
  } catch (err) {
    return replyStoreFailure(res, err, 'error', { route: 'gate_exit_quote', plate })
  }
}

// GET /api/gate/exit-quote/:plate: Price the open stay without closing it
gateRouter.get('/exit-quote/:plate', (req, res) => replyExitQuote(req.params.plate, res))

// POST /api/gate/exit-quote
gateRouter.post('/exit-quote', (req, res) => replyExitQuote(req.body?.plate, res))

// POST /api/gate/confirm-exit: Payment confirmed: close the stay and open the exit gate
gateRouter.post('/confirm-exit', async (req, res) => {
  const plate = readPlate(req.body?.plate)
  if (!plate) {
    return res.status(400).json({ success: false, error: 'plate is required' })
  }

  try {
    const outcome = await exitSettlement.settle(plate)
    if (outcome.status === 'not_found') {
      return res.status(404).json({ success: false, error: 'not_found' })
    }
    return res.json({ success: true, record: outcome.record })
  } catch (err) {
    return replyStoreFailure(res, err, 'error', { route: 'gate_confirm_exit', plate })
  }
})

/**
 * POST /api/gate/scan: One camera detection, routed by the ledger.
 *
 * A plate with an open stay is an exit: it is quoted and becomes the pending
 * exit. Anything else is an entry.
 */
gateRouter.post('/scan', async (req, res) => {
  const plate = readPlate(req.body?.plate)
  if (!plate) {
    return res.status(400).json({ error: 'plate is required' })
  }

  try {
    const role = await transactions.classify(plate)

    if (role === 'entry') {
      const outcome = await transactions.logEntry(plate)
      bus.publish('plate-detected', entryEvent(plate, outcome))
      if (outcome.status === 'entry_logged') {
        await ledgerNotifier.ledgerChanged()
      }
      return res.status(entryStatusCode(outcome)).json({ role, ...outcome })
    }

    const outcome = await transactions.quoteExit(plate)
    if (outcome.status === 'not_found') {
      // Closed by another process between the two reads.
      bus.publish('plate-detected', { plate, status: 'not_found' })
      return res.status(404).json({ role, status: 'not_found' })
    }

    const { quote } = outcome
    await pendingExit.setPending(plate)
    bus.publish('exit-pending', {
      plate,
      amountDue: quote.amountDue,
      durationMinutes: quote.durationMinutes,
    })
    bus.publish('plate-detected', exitEvent(quote))
    return res.json({ role, status: 'exit_pending', ...quote })
  } catch (err) {
    bus.publish('plate-detected', { plate, status: errorCodeFor(err) })
    return replyStoreFailure(res, err, 'status', { route: 'gate_scan', plate })
  }
})

// POST /api/gate/plate-detected: Relay a detection from a camera process to dashboards
gateRouter.post('/plate-detected', async (req, res) => {
  const plate = readPlate(req.body?.plate)
  const status: unknown = req.body?.status
  if (!plate || !isScanStatus(status)) {
    return res.status(400).json({ error: 'plate and a known status are required' })
  }

  const event: PlateDetectedEvent = { plate, status }
  const { slot, amountDue, durationMinutes, entryTime, exitTime } = req.body
  if (typeof slot === 'string' || slot === null) event.slot = slot
  if (typeof amountDue === 'number') event.amountDue = amountDue
  if (typeof durationMinutes === 'number') event.durationMinutes = durationMinutes
  if (typeof entryTime === 'string') event.entryTime = entryTime
  if (typeof exitTime === 'string') event.exitTime = exitTime

  const delivered = bus.publish('plate-detected', event)
  if (status === 'entry_logged') {
    await ledgerNotifier.ledgerChanged()
  }
  return res.json({ success: true, delivered })
})
