/**
 * CareDesk - Error Taxonomy
 *
 * Every failure a service can raise. The HTTP boundary turns these into a
 * flash message plus a redirect (forms) or a status code (views).
 */

export type ErrorKind =
  | "AuthenticationFailure"
  | "AuthorizationFailure"
  | "Conflict"
  | "NotFound"
  | "InvalidInput"
  | "StorageFailure";

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  AuthenticationFailure: 401,
  AuthorizationFailure: 403,
  Conflict: 409,
  NotFound: 404,
  InvalidInput: 400,
  StorageFailure: 500,
};

export class CaredeskError extends Error {
  readonly kind: ErrorKind;
  readonly status: number;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
    this.status = STATUS_BY_KIND[kind];
  }
}

export class AuthenticationError extends CaredeskError {
  constructor(message = "Invalid credentials.") {
    super("AuthenticationFailure", message);
  }
}

export class AuthorizationError extends CaredeskError {
  constructor(message = "Access denied.") {
    super("AuthorizationFailure", message);
  }
}

export class ConflictError extends CaredeskError {
  constructor(message: string) {
    super("Conflict", message);
  }
}

export class NotFoundError extends CaredeskError {
  constructor(resource: string, id: number | string) {
    super("NotFound", `${resource} ${id} not found.`);
  }
}

export class InvalidInputError extends CaredeskError {
  constructor(message: string) {
    super("InvalidInput", message);
  }
}

export class StorageError extends CaredeskError {
  constructor(cause: unknown) {
    super("StorageFailure", "Database error.", { cause });
  }
}

export function isCaredeskError(err: unknown): err is CaredeskError {
  return err instanceof CaredeskError;
}
