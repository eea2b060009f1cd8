import type { NextFunction, Request, Response } from 'express';

import { AppError } from '../errors/app-error.js';
import { logError, logWarn } from '../services/logger.js';

export interface ErrorResponse {
  error: string;
}

function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  const cause = err instanceof Error ? err : new Error(String(err));
  return new AppError(cause.message, 500, 'INTERNAL_ERROR', undefined, false, {
    cause,
  });
}

function describeRequest(req: Request): string {
  return `${req.method} ${req.path}`;
}

/**
 * The detailed error goes to the log only; the client gets the generic
 * message attached to the error class.
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by arity.
  _next: NextFunction
): void {
  const appError = toAppError(err);

  if (res.headersSent) {
    logWarn('Error after response headers were sent', {
      request: describeRequest(req),
      code: appError.code,
      error: appError.message,
    });
    res.end();
    return;
  }

  logError(
    `HTTP ${appError.statusCode}: ${appError.message} - ${describeRequest(req)}`,
    appError
  );

  const body: ErrorResponse = { error: appError.clientMessage };
  res.status(appError.statusCode).json(body);
}
