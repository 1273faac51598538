/**
 * Infrastructure failures of the ledger and payment-artifact paths.
 *
 * Business outcomes (already_in, full, not_found) are never thrown; they are
 * returned as discriminated results by the transaction manager.
 */

export class StoreBusyError extends Error {
  readonly code = 'store_busy'

  constructor(readonly attempts: number, options?: ErrorOptions) {
    super(`Ledger store busy after ${attempts} attempt(s)`, options)
    this.name = 'StoreBusyError'
  }
}

export class StoreError extends Error {
  readonly code = 'store_error'

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'StoreError'
  }
}

export class ArtifactError extends Error {
  readonly code = 'artifact_error'

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ArtifactError'
  }
}

/** HTTP status for an error escaping a ledger operation */
export function httpStatusFor(error: unknown): 503 | 500 {
  return error instanceof StoreBusyError ? 503 : 500
}

export function errorCodeFor(error: unknown): 'store_busy' | 'store_error' {
  return error instanceof StoreBusyError ? 'store_busy' : 'store_error'
}
