import { Router } from 'express'

import { bus, pendingExit } from '../services'
import { readPlate } from './helpers'

export const pendingExitRouter = Router()

// GET /api/pending-exit: The plate waiting at the exit, if any
pendingExitRouter.get('/', async (_req, res) => {
  res.json({ pendingExit: await pendingExit.getPending() })
})

// POST /api/pending-exit/:plate: Mark a plate as waiting at the exit
pendingExitRouter.post('/:plate', async (req, res) => {
  const plate = readPlate(req.params.plate)
  if (!plate) {
    return res.status(400).json({ error: 'Invalid plate' })
  }

  const previous = await pendingExit.setPending(plate)
  bus.publish('exit-pending', { plate })
  return res.json({ pendingExit: plate, previous })
})
