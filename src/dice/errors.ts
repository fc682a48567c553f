/**
 * Error raised for every dice-formula failure: invalid characters, malformed
 * dice groups, out-of-range parameters, grammar errors and division by zero.
 * The message is shown to users as is.
 *
 * @module dice/errors
 */
export class DiceParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DiceParseError';
  }
}

/**
 * @param {unknown} e - Caught value.
 * @returns {boolean} True for formula errors, which get a user-facing reply.
 */
export function isDiceParseError(e: unknown): e is DiceParseError {
  return e instanceof DiceParseError;
}
