/**
 * API Middleware — typed error responses and the global error handler.
 */

import { Request, Response, NextFunction } from 'express';
import {
  TypedError,
  apiError,
  errorMessage,
  httpStatusFor,
  internalError,
  validationError,
} from '../domain/errors';
import { logger } from '../logger';

/** Send a typed error with the status its code maps to. */
export function sendError(res: Response, error: TypedError): void {
  res.status(httpStatusFor(error)).json(apiError(error));
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isBodyParseError(err)) {
    logger.warn('Malformed JSON body', { path: req.path });
    sendError(res, validationError('Request body is not valid JSON'));
    return;
  }

  logger.error('Unhandled request error', {
    path: req.path,
    message: errorMessage(err, 'Internal server error'),
    stack: err instanceof Error ? err.stack : undefined,
  });

  sendError(res, internalError(errorMessage(err, 'Internal server error')));
}
