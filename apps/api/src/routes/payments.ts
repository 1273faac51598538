import { Router } from 'express'

import { paymentArtifacts } from '../services'
import { readPlate } from './helpers'

export const paymentsRouter = Router()

// GET /api/payments/:plate: Latest UPI payment request issued for the plate
paymentsRouter.get('/:plate', (req, res) => {
  const plate = readPlate(req.params.plate)
  if (!plate) {
    return res.status(400).json({ error: 'Invalid plate' })
  }

  const artifact = paymentArtifacts.get(plate)
  if (!artifact) {
    return res.status(404).json({ error: 'not_found' })
  }
  return res.json(artifact)
})
