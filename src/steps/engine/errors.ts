/**
 * Raised when normalized data breaks a structural rule the engine relies on
 * (a play outside every drive, a drive without an offense, a turnover resting
 * on a negated play). These are defects upstream of aggregation and are never
 * patched over.
 */
export class InvariantViolationError extends Error {
  constructor(
    message: string,
    readonly gameId?: string,
  ) {
    super(gameId ? `[${gameId}] ${message}` : message);
    this.name = 'InvariantViolationError';
  }
}
