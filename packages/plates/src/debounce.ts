export interface PlateDebouncerOptions {
  /** Window in which a repeat read of the same plate is ignored */
  cooldownMs: number
  now?: () => number
}

/**
 * Suppresses repeated detections of the same plate.
 *
 * A camera sees a stopped car on every frame; only the first read, or a read
 * after the cooldown has elapsed, should reach the ledger. A different plate
 * is always accepted.
 */
export class PlateDebouncer {
  private lastPlate: string | null = null
  private lastAcceptedAt = 0
  private readonly now: () => number

  constructor(private readonly options: PlateDebouncerOptions) {
    this.now = options.now ?? Date.now
  }

  accept(plate: string): boolean {
    const at = this.now()
    if (plate === this.lastPlate && at - this.lastAcceptedAt <= this.options.cooldownMs) {
      return false
    }
    this.lastPlate = plate
    this.lastAcceptedAt = at
    return true
  }

  reset() {
    this.lastPlate = null
    this.lastAcceptedAt = 0
  }
}
