import rateLimit from 'express-rate-limit'

const isTest = process.env.NODE_ENV === 'test'

/** 30 requests per minute, for the payment webhook */
export const webhookLimit = rateLimit({
  windowMs: 60 * 1000,
  limit: 30,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  skip: () => isTest,
})

/** 120 requests per minute, for camera-driven gate calls */
export const gateLimit = rateLimit({
  windowMs: 60 * 1000,
  limit: 120,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  skip: () => isTest,
})

/** 300 requests per minute, catch-all for dashboard reads */
export const standardLimit = rateLimit({
  windowMs: 60 * 1000,
  limit: 300,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  skip: () => isTest,
})
