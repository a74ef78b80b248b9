/**
 * Caller-facing input problem: an empty or unparseable batch, or an unknown ecosystem.
 * Raised before any registry or vulnerability lookup is made.
 */
export class ValidationError extends Error {
  readonly code = 'BAD_REQUEST'

  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError
}
