/**
 * Error kinds surfaced to callers. Every kind is a normal, recoverable outcome
 * of a single call.
 */
export type ErrorKind = 'NotFound' | 'InvalidOperation' | 'CycleDetected' | 'SlugConflict' | 'ValidationError' | 'Internal';

export class AppError extends Error {
  constructor(
    public readonly message: string,
    public readonly code = 'INTERNAL_ERROR',
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  get kind(): ErrorKind {
    return 'Internal';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', details?: unknown) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }

  get kind(): ErrorKind {
    return 'NotFound';
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }

  get kind(): ErrorKind {
    return 'ValidationError';
  }
}

export class InvalidOperationError extends AppError {
  constructor(message = 'Operation not allowed', details?: unknown) {
    super(message, 'INVALID_OPERATION', details);
    this.name = 'InvalidOperationError';
  }

  get kind(): ErrorKind {
    return 'InvalidOperation';
  }
}

export class CycleDetectedError extends AppError {
  constructor(message = 'Operation would create a cycle', details?: unknown) {
    super(message, 'CYCLE_DETECTED', details);
    this.name = 'CycleDetectedError';
  }

  get kind(): ErrorKind {
    return 'CycleDetected';
  }
}

export class SlugConflictError extends AppError {
  constructor(message = 'Slug already in use', details?: unknown) {
    super(message, 'SLUG_CONFLICT', details);
    this.name = 'SlugConflictError';
  }

  get kind(): ErrorKind {
    return 'SlugConflict';
  }
}
