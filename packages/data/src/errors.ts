/**
 * Raised when the ledger cannot durably store or read a record. Risk decisions
 * depend on a complete ledger, so callers must not swallow it.
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'PersistenceError'
  }
}
