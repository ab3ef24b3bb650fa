/**
 * Transport-Level Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of failures reach the HTTP boundary:
 *
 *   1. Operational errors — expected outcomes such as "collection not found",
 *      a malformed alias action or a coordinator that timed out. They carry
 *      an HTTP status and a message that is safe to show the client.
 *
 *   2. Programmer errors — bugs. They get a generic 500 and are logged.
 *
 * `isOperational` tells the two apart in errorHandler.ts.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses regardless of the compilation target.
 *
 * The subclasses are the fixed set of statuses the dispatcher can produce;
 * see errorToStatus.ts for how coordinator failures land on them.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

/** Invalid argument: malformed envelope or a request with no valid operation. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/** The coordinator gave up waiting for the operation to be applied. */
export class TimeoutError extends AppError {
  constructor(message: string) {
    super(message, 504);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 503);
  }
}
