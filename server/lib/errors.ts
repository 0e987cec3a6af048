/**
 * Error taxonomy shared by the domain layer, services and routes.
 * The HTTP layer maps each class onto its status code and `code`.
 */

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, statusCode: number, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends AppError {
  readonly fromState: string;
  readonly event: string;

  constructor(fromState: string, event: string) {
    super(`Cannot ${event} a stage in ${fromState} status`, 409, 'INVALID_TRANSITION', {
      from_state: fromState,
      event,
    });
    this.name = 'InvalidTransitionError';
    this.fromState = fromState;
    this.event = event;
  }
}

export class ConcurrencyConflictError extends AppError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} was modified by another request`, 409, 'CONCURRENCY_CONFLICT', { entity, id });
    this.name = 'ConcurrencyConflictError';
  }
}

/** Malformed stored data (e.g. an invoice number without a numeric sequence). Fatal for the operation. */
export class FormatError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 500, 'FORMAT_ERROR', details);
    this.name = 'FormatError';
  }
}
