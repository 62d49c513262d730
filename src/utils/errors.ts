/**
 * Domain errors
 * Carry the same statusCode/code shape the API error handler understands
 */

export class InvalidObservationError extends Error {
  readonly statusCode = 400;
  readonly code = 'INVALID_OBSERVATION';

  constructor(
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = 'InvalidObservationError';
  }
}
