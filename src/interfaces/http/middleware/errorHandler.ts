/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * The last stop on the middleware line. Express 5 forwards rejected async
 * handlers here, so controllers never wrap calls in try/catch.
 *
 * Three cases:
 *   - Operational AppError (conversion failures, classified coordinator
 *     errors): logged at warn, sent with its statusCode and message.
 *   - Client errors raised by Express itself before routing (malformed JSON,
 *     oversized body): they carry a 4xx `status` and are passed on unchanged.
 *   - Anything else, including non-operational AppErrors: logged at error,
 *     answered with a generic 500 so internals never reach the client.
 *
 * Express recognizes an error handler by its FOUR parameters.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

function clientErrorStatus(err: Error): number | null {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    logger.warn({ statusCode: status, message: err.message }, 'Rejected request envelope');
    res.status(status).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}
