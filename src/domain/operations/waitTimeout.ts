/**
 * Wait-timeout extraction shared by every mutating request. Bounds are the
 * coordinator's business; this only turns seconds into a Duration.
 */
import type { WithTimeout } from '@domain/operations/requests';
import type { Duration } from '@shared/types';

export function waitTimeout(request: WithTimeout): Duration | undefined {
  return request.timeout === undefined ? undefined : { seconds: request.timeout };
}

export function durationToMillis(duration: Duration): number {
  return duration.seconds * 1000;
}
