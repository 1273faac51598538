import type { PaymentArtifact } from '@parkline/core'
import { buildUpiPaymentURI } from '@parkline/core'

import { ArtifactError } from '../errors'

export interface PaymentArtifactOptions {
  payeeVpa: string
  payeeName: string
  currency: string
  now?: () => Date
}

/**
 * Latest UPI payment request per plate.
 *
 * A refreshed exit quote overwrites the plate's artifact under the same ref,
 * so a payment page polling by ref always shows the current amount.
 */
export class PaymentArtifactRegistry {
  private readonly artifacts = new Map<string, PaymentArtifact>()
  private readonly now: () => Date

  constructor(private readonly options: PaymentArtifactOptions) {
    this.now = options.now ?? (() => new Date())
  }

  static refFor(plate: string): string {
    return `upi-${plate}`
  }

  issue(plate: string, amount: number): PaymentArtifact {
    let uri: string
    try {
      uri = buildUpiPaymentURI({
        payeeVpa: this.options.payeeVpa,
        payeeName: this.options.payeeName,
        amount,
        currency: this.options.currency,
        note: plate,
      })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ArtifactError(`Payment request for ${plate} not generated: ${message}`, { cause: err })
    }

    const artifact: PaymentArtifact = {
      ref: PaymentArtifactRegistry.refFor(plate),
      plate,
      amount,
      currency: this.options.currency,
      uri,
      createdAt: this.now(),
    }
    this.artifacts.set(plate, artifact)
    return artifact
  }

  get(plate: string): PaymentArtifact | null {
    return this.artifacts.get(plate) ?? null
  }

  discard(plate: string): boolean {
    return this.artifacts.delete(plate)
  }
}
