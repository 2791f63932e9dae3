export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    details: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.statusCode = statusCode;
    this.code = code;
    this.details = Object.freeze({ ...details });
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

/**
 * The runtime could not allocate the requested output string.
 * Not recoverable by retrying with the same input.
 */
export class ResourceExhaustedError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, 507, 'RESOURCE_EXHAUSTED', details, options);
  }
}
