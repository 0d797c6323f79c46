/**
 * Error types
 */

/**
 * Thrown when an internal consistency check fails. Reaching one of these
 * means a bug in this library, not bad input.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
 * Thrown when a single-character operation receives something that is not
 * exactly one code unit.
 */
export class CharArgumentError extends Error {
  constructor(
    message: string,
    public readonly received: string,
  ) {
    super(message);
    this.name = "CharArgumentError";
  }
}

/**
 * Classification policy validation error
 */
export class PolicyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PolicyError";
  }
}

/**
 * Throws an InvariantError when the condition does not hold.
 */
export function assertInvariant(
  condition: boolean,
  message: string,
): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}
