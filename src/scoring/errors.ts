/**
 * Errors raised by the scoring engine.
 *
 * ConfigurationError is a programming or config defect and must surface
 * immediately. It is never turned into a per-repository failure.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A batch entry that is neither a clean success nor a clean failure. */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
  }
}
