/**
 * Error taxonomy shared by the core and the HTTP layer. The error middleware
 * turns any AppError into `{ error: { code, message, ...details } }` with its status.
 */

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  readonly code: string;
  readonly status: number;
  readonly details?: ErrorDetails;

  constructor(message: string, opts: { code: string; status: number; details?: ErrorDetails }) {
    super(message);
    this.name = new.target.name;
    this.code = opts.code;
    this.status = opts.status;
    this.details = opts.details;
  }
}

/** Missing or malformed input; rejected before any side effect. */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails, code = "VALIDATION_FAILED") {
    super(message, { code, status: 400, details });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found", code = "NOT_FOUND") {
    super(message, { code, status: 404 });
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden", code = "FORBIDDEN") {
    super(message, { code, status: 403 });
  }
}

/** The requested interval is taken. Not retried automatically. */
export class ConflictError extends AppError {
  constructor(message: string, details?: ErrorDetails, code = "UNAVAILABLE") {
    super(message, { code, status: 409, details });
  }
}

/** Gateway timeout or failure. Safe to retry the quote phase. */
export class ExternalServiceError extends AppError {
  constructor(message: string, details?: ErrorDetails, code = "PAYMENT_GATEWAY_ERROR") {
    super(message, { code, status: 500, details });
  }
}

/**
 * Payment or price mismatch at confirmation time. Money may have moved without a
 * booking existing, so the payment id always travels with it for support.
 */
export class ReconciliationError extends AppError {
  readonly paymentId: string;

  constructor(
    message: string,
    paymentId: string,
    opts: { code?: string; status?: number; details?: ErrorDetails } = {}
  ) {
    super(message, {
      code: opts.code ?? "PAYMENT_VERIFICATION_FAILED",
      status: opts.status ?? 402,
      details: { paymentId, ...opts.details },
    });
    this.paymentId = paymentId;
  }
}

/** Operation not allowed in the booking's (or account's) current state. */
export class StateError extends AppError {
  constructor(message: string, details?: ErrorDetails, code = "INVALID_STATE") {
    super(message, { code, status: 409, details });
  }
}
