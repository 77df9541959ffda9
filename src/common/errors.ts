export type ErrorKind =
  | "ValidationError"
  | "PermissionError"
  | "NotFoundError"
  | "InvalidStateError"
  | "StoreUnavailable"
  | "AuthenticationError";

export interface ErrorDetail {
  path: string;
  message: string;
}

/**
 * Base class for every error the services raise on purpose.
 * `status` is the HTTP status the error middleware renders it with.
 */
export abstract class DomainError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toJSON() {
    return { kind: this.kind, message: this.message };
  }
}

export class ValidationError extends DomainError {
  readonly kind = "ValidationError";
  readonly status = 400;

  constructor(message: string, public readonly details: ErrorDetail[] = []) {
    super(message);
  }
}

export class AuthenticationError extends DomainError {
  readonly kind = "AuthenticationError";
  readonly status = 401;
}

export class PermissionError extends DomainError {
  readonly kind = "PermissionError";
  readonly status = 403;
}

export class NotFoundError extends DomainError {
  readonly kind = "NotFoundError";
  readonly status = 404;
}

export class InvalidStateError extends DomainError {
  readonly kind = "InvalidStateError";
  readonly status = 409;
}

/** Transient infrastructure fault: a store was unreachable or timed out. */
export class StoreUnavailable extends DomainError {
  readonly kind = "StoreUnavailable";
  readonly status = 503;

  constructor(public readonly store: string, cause?: unknown) {
    super(
      `${store} store unavailable` +
        (cause instanceof Error ? `: ${cause.message}` : "")
    );
    if (cause !== undefined) this.cause = cause;
  }
}

export const isDomainError = (error: unknown): error is DomainError =>
  error instanceof DomainError;
