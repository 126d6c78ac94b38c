/**
 * Error types and codes
 *
 * Business rejections (everything except LOCK_TIMEOUT, STORE_UNAVAILABLE and
 * INTERNAL_ERROR) are terminal for the request. Infrastructure errors are
 * transient and callers may retry them.
 */

export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_QUANTITY = 'INVALID_QUANTITY',

  // Not found errors (404)
  NOT_FOUND_OR_INACTIVE = 'NOT_FOUND_OR_INACTIVE',

  // Conflict errors (409)
  SLOT_UNAVAILABLE = 'SLOT_UNAVAILABLE',
  INVALID_TICKET_NUMBERS = 'INVALID_TICKET_NUMBERS',
  INVALID_STATE_TRANSITION = 'INVALID_STATE_TRANSITION',
  NO_RESERVED_INVENTORY = 'NO_RESERVED_INVENTORY',
  TICKETS_ALREADY_GENERATED = 'TICKETS_ALREADY_GENERATED',
  CONFLICT = 'CONFLICT',

  // Unprocessable (422)
  INVALID_TIME_WINDOW = 'INVALID_TIME_WINDOW',

  // Server errors (5xx)
  LOCK_TIMEOUT = 'LOCK_TIMEOUT',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_QUANTITY]: 400,
  [ErrorCode.NOT_FOUND_OR_INACTIVE]: 404,
  [ErrorCode.SLOT_UNAVAILABLE]: 409,
  [ErrorCode.INVALID_TICKET_NUMBERS]: 409,
  [ErrorCode.INVALID_STATE_TRANSITION]: 409,
  [ErrorCode.NO_RESERVED_INVENTORY]: 409,
  [ErrorCode.TICKETS_ALREADY_GENERATED]: 409,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.INVALID_TIME_WINDOW]: 422,
  [ErrorCode.LOCK_TIMEOUT]: 503,
  [ErrorCode.STORE_UNAVAILABLE]: 503,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

export function statusForCode(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = statusForCode(code),
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Rejected appointment precondition
 */
export class BookingError extends AppError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, statusForCode(code), details);
    this.name = 'BookingError';
  }
}

/**
 * Rejected raffle reservation precondition
 */
export class ReservationError extends AppError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, statusForCode(code), details);
    this.name = 'ReservationError';
  }
}

/**
 * Lock-wait timeout or store fault. Never a business rule rejection.
 */
export class InfrastructureError extends AppError {
  readonly retryable = true;

  constructor(
    code: ErrorCode.LOCK_TIMEOUT | ErrorCode.STORE_UNAVAILABLE,
    message: string,
    public readonly cause?: unknown
  ) {
    super(code, message, statusForCode(code));
    this.name = 'InfrastructureError';
  }
}

/**
 * Raised by a store when a declared unique key is violated
 */
export class UniqueConstraintError extends AppError {
  constructor(constraint: string, message = `Duplicate value violates ${constraint}`) {
    super(ErrorCode.CONFLICT, message, statusForCode(ErrorCode.CONFLICT), { constraint });
    this.name = 'UniqueConstraintError';
  }
}

/**
 * Wrap anything that is not already an AppError as an opaque infrastructure fault
 */
export function toInfrastructureError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InfrastructureError(ErrorCode.STORE_UNAVAILABLE, `Store operation failed: ${message}`, error);
}
