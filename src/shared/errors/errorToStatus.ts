/**
 * Coordinator → Transport Status Mapping
 * Layer: Shared
 *
 * Fixed classification table used by every dispatcher path (mutations and
 * reads alike). It adds no semantics of its own: the coordinator's message is
 * passed through and only the status class is chosen here.
 *
 *   bad_request    → 400 ValidationError
 *   not_found      → 404
 *   already_exists → 409 ConflictError
 *   timeout        → 504 TimeoutError
 *   unavailable    → 503 ServiceUnavailableError
 *   internal       → 500 (non-operational)
 */
import {
  AppError,
  ConflictError,
  ServiceUnavailableError,
  TimeoutError,
  ValidationError,
} from './AppError';
import type { CoordinatorError } from './CoordinatorError';

export function errorToStatus(error: CoordinatorError): AppError {
  switch (error.kind) {
    case 'bad_request':
      return new ValidationError(error.message);
    case 'not_found':
      return new AppError(error.message, 404);
    case 'already_exists':
      return new ConflictError(error.message);
    case 'timeout':
      return new TimeoutError(error.message);
    case 'unavailable':
      return new ServiceUnavailableError(error.message);
    case 'internal':
      return new AppError(error.message, 500, false);
  }
}
