/**
 * Study Planner - Error Types
 *
 * Validation failures are raised before any store mutation and map to a
 * 400 response. Everything else is treated as a server error.
 */

export class ValidationError extends Error {
  readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
