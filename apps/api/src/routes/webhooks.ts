import { Router, urlencoded } from 'express'

import { config } from '../config'
import { exitSettlement } from '../services'
import { logger } from '../services/observability'
import { readPlate, replyStoreFailure } from './helpers'

export const webhooksRouter = Router()

/** e.g. "INR 40.00 received via UPI from payer@bank. Ref: MH12AB1234" */
const SMS_PAYMENT_REGEX = /INR (\d+\.\d{2}) received.*Ref:.*?([A-Z0-9]+)/

export interface SmsPayment {
  amount: number
  plate: string
}

export function parseSmsPayment(message: string): SmsPayment | null {
  const match = message.match(SMS_PAYMENT_REGEX)
  if (!match) return null
  const plate = readPlate(match[2])
  if (!plate) return null
  return { amount: parseFloat(match[1]), plate }
}

/**
 * POST /api/webhooks/sms
 *
 * Bank SMS forwarded by a phone relay app, as a form post or JSON:
 * `{ token, message }`. A matching payment settles the plate's exit exactly
 * as the confirm endpoint does. Unmatched messages are acknowledged with 200
 * so the relay does not keep resending them.
 */
webhooksRouter.post('/sms', urlencoded({ extended: false }), async (req, res) => {
  if (!config.smsWebhookToken) {
    return res.status(503).json({ error: 'SMS webhook is not configured' })
  }

  const token: unknown = req.body?.token
  if (token !== config.smsWebhookToken) {
    const preview = typeof token === 'string' && token ? `${token.slice(0, 4)}...` : 'no-token'
    logger.warn('sms_webhook_unauthorized', { token_preview: preview })
    return res.status(403).json({ error: 'Forbidden' })
  }

  const message: unknown = req.body?.message
  if (typeof message !== 'string') {
    return res.status(400).json({ error: 'message is required' })
  }
  logger.info('sms_webhook_received', { preview: message.slice(0, 50) })

  const payment = parseSmsPayment(message)
  if (!payment) {
    return res.json({ matched: false })
  }

  try {
    const outcome = await exitSettlement.settle(payment.plate)
    if (outcome.status === 'not_found') {
      logger.warn('sms_payment_unmatched', { plate: payment.plate, amount: payment.amount })
      return res.json({ matched: true, confirmed: false, plate: payment.plate })
    }

    const { record } = outcome
    if (record.amountDue !== null && payment.amount < record.amountDue) {
      logger.warn('sms_payment_short', {
        plate: payment.plate,
        amount_paid: payment.amount,
        amount_due: record.amountDue,
      })
    }
    logger.info('sms_payment_confirmed', { plate: payment.plate, amount: payment.amount })
    return res.json({ matched: true, confirmed: true, plate: payment.plate, amount: payment.amount })
  } catch (err) {
    return replyStoreFailure(res, err, 'error', { route: 'sms_webhook', plate: payment.plate })
  }
})
