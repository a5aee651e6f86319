/**
 * Error thrown when ORAM geometry or a parameter layout is invalid.
 * Raised at construction time, before any state exists.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Error thrown when an access would need more stash slots than remain.
 *
 * The access is abandoned before the stash, the position map or server
 * memory change, so the ORAM is left exactly as it was.
 */
export class StashOverflowError extends Error {
  constructor(
    public readonly blockId: number,
    public readonly required: number,
    public readonly available: number
  ) {
    super(
      `Stash overflow while accessing block ${blockId}: ` +
        `${required} slot(s) needed, ${available} free`
    )
    this.name = 'StashOverflowError'
  }
}

/**
 * Error thrown when a persisted server image or client state file cannot be
 * used: bad magic, failed checksum, truncation or a geometry mismatch.
 */
export class CorruptStateError extends Error {
  constructor(
    public readonly filePath: string,
    reason: string
  ) {
    super(`Cannot load ${filePath}: ${reason}`)
    this.name = 'CorruptStateError'
  }
}
