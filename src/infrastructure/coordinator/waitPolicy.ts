/**
 * Coordinator-side wait enforcement.
 *
 * The adapter only passes the caller's Duration through; bounding and
 * enforcing it happens here. A timed-out operation is not rolled back: the
 * caller learns that waiting stopped, not that the work was undone.
 */
import { durationToMillis } from '@domain/operations/waitTimeout';
import { CoordinatorError } from '@shared/errors/CoordinatorError';
import type { Duration } from '@shared/types';

export interface WaitPolicy {
  defaultWaitTimeoutSec: number;
  maxWaitTimeoutSec: number;
}

/** Requested wait (or the default when none was asked for), capped at the policy max. */
export function effectiveWaitTimeout(requested: Duration | undefined, policy: WaitPolicy): Duration {
  const seconds = requested?.seconds ?? policy.defaultWaitTimeoutSec;
  return { seconds: Math.min(seconds, policy.maxWaitTimeoutSec) };
}

export async function withWaitTimeout<T>(
  work: Promise<T>,
  wait: Duration,
  operation: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(CoordinatorError.timeout(wait.seconds, operation)),
      durationToMillis(wait),
    );
  });

  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
  }
}
