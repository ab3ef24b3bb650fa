/**
 * Unit Tests — errorToStatus
 *
 * Locks down the fixed coordinator → transport table. Each kind must land on
 * its own status class; none may fall through to a generic error.
 */
import {
  AppError,
  ConflictError,
  ServiceUnavailableError,
  TimeoutError,
  ValidationError,
} from '@shared/errors/AppError';
import { COORDINATOR_ERROR_KINDS, CoordinatorError } from '@shared/errors/CoordinatorError';
import { errorToStatus } from '@shared/errors/errorToStatus';

describe('errorToStatus()', () => {
  it.each([
    ['bad_request', ValidationError, 400],
    ['not_found', AppError, 404],
    ['already_exists', ConflictError, 409],
    ['timeout', TimeoutError, 504],
    ['unavailable', ServiceUnavailableError, 503],
    ['internal', AppError, 500],
  ] as const)('should map %s to %p with status %i', (kind, errorClass, statusCode) => {
    const status = errorToStatus(new CoordinatorError(kind, 'coordinator said no'));

    expect(status).toBeInstanceOf(errorClass);
    expect(status.statusCode).toBe(statusCode);
    expect(status.message).toBe('coordinator said no');
  });

  it('should cover every coordinator error kind', () => {
    const statuses = COORDINATOR_ERROR_KINDS.map(
      (kind) => errorToStatus(new CoordinatorError(kind, kind)).statusCode,
    );

    expect(statuses).toEqual([400, 404, 409, 504, 503, 500]);
  });

  it('should keep operational failures operational and internal ones not', () => {
    expect(errorToStatus(CoordinatorError.notFound('x')).isOperational).toBe(true);
    expect(errorToStatus(new CoordinatorError('internal', 'boom')).isOperational).toBe(false);
  });
});
