/**
 * Request Envelope Validation
 * Layer: Interfaces (HTTP)
 *
 * The bouncer at the door: params, query and body are checked against a Zod
 * schema before anything reaches the collections service. A mismatch is a
 * transport-level problem and becomes a ValidationError (400) that the global
 * error handler returns as-is.
 *
 * Controllers call parseRequest() once per request part and get back the
 * schema's typed, coerced output ("5" → 5 for ?timeout=5):
 *
 *   const { timeout } = parseRequest(timeoutQuerySchema, req.query);
 *
 * Whether the parsed request describes a valid operation is a separate
 * question, answered later by the operation converters.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { z } from 'zod/v4';

export function parseRequest<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => {
        const path = issue.path.map(String).join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join('; ');
    throw new ValidationError(messages);
  }

  return result.data;
}
