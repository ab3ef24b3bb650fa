/**
 * Coordinator Error
 * Layer: Shared
 *
 * The only failure type a Coordinator Client rejects with. It describes what
 * went wrong inside the coordinator (`kind`) but carries no HTTP meaning;
 * the dispatcher turns it into an AppError through errorToStatus().
 */
export const COORDINATOR_ERROR_KINDS = [
  'bad_request',
  'not_found',
  'already_exists',
  'timeout',
  'unavailable',
  'internal',
] as const;

export type CoordinatorErrorKind = (typeof COORDINATOR_ERROR_KINDS)[number];

export class CoordinatorError extends Error {
  public readonly kind: CoordinatorErrorKind;

  constructor(kind: CoordinatorErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = 'CoordinatorError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static notFound(description: string): CoordinatorError {
    return new CoordinatorError('not_found', `Not found: ${description}`);
  }

  static alreadyExists(description: string): CoordinatorError {
    return new CoordinatorError('already_exists', `${description} already exists!`);
  }

  static badRequest(description: string): CoordinatorError {
    return new CoordinatorError('bad_request', `Wrong input: ${description}`);
  }

  static timeout(seconds: number, operation: string): CoordinatorError {
    return new CoordinatorError(
      'timeout',
      `Timeout of ${seconds}s reached while waiting for ${operation}`,
    );
  }
}
