import { Router } from 'express'

import { config } from '../config'
import { slotAllocator, transactions } from '../services'
import { readPlate, replyStoreFailure } from './helpers'

export const ledgerRouter = Router()

const MAX_LIMIT = 500

function parseLimit(value: unknown): number {
  const limit = typeof value === 'string' ? parseInt(value, 10) : NaN
  if (isNaN(limit) || limit < 1) return config.recentRecordsLimit
  return Math.min(limit, MAX_LIMIT)
}

// GET /api/occupancy: Slot label → parked plate (null when free)
ledgerRouter.get('/occupancy', async (_req, res) => {
  try {
    res.json({ slots: await transactions.occupancy() })
  } catch (err) {
    replyStoreFailure(res, err, 'error', { route: 'occupancy' })
  }
})

// GET /api/ledger?limit=: Recent ledger records, newest first
ledgerRouter.get('/ledger', async (req, res) => {
  try {
    res.json({ records: await transactions.recentRecords(parseLimit(req.query.limit)) })
  } catch (err) {
    replyStoreFailure(res, err, 'error', { route: 'ledger' })
  }
})

// GET /api/ledger/status/:plate: Status of the plate's latest record
ledgerRouter.get('/ledger/status/:plate', async (req, res) => {
  const plate = readPlate(req.params.plate)
  if (!plate) {
    return res.status(400).json({ error: 'Invalid plate' })
  }

  try {
    const record = await transactions.latestRecord(plate)
    return res.json({ plate, status: record ? record.status : 'not_found' })
  } catch (err) {
    return replyStoreFailure(res, err, 'error', { route: 'ledger_status', plate })
  }
})

// GET /api/stats: Today's counters for the dashboard
ledgerRouter.get('/stats', async (_req, res) => {
  try {
    const [stats, slots] = await Promise.all([transactions.stats(), transactions.occupancy()])
    const availableSlots = Object.values(slots).filter((plate) => plate === null).length
    res.json({ ...stats, availableSlots, totalSlots: slotAllocator.capacity })
  } catch (err) {
    replyStoreFailure(res, err, 'error', { route: 'stats' })
  }
})
