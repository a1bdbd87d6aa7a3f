import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { HttpError, formatZodError } from '../errors';
import { logger } from '../logger';

export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  let httpError: HttpError;

  if (err instanceof HttpError) {
    httpError = err;
  } else if (err instanceof ZodError) {
    httpError = HttpError.badRequest('Validation failed', { issues: formatZodError(err) });
  } else {
    httpError = new HttpError(500, 'internal_error', 'Internal server error');
    logger.error({ err, path: req.path }, 'Unhandled error');
  }

  const responseBody: Record<string, unknown> = {
    error: httpError.message,
    code: httpError.code,
    requestId: typeof res.locals.requestId === 'string' ? res.locals.requestId : null
  };

  if (httpError.details !== undefined) {
    responseBody.details = httpError.details;
  }

  res.status(httpError.statusCode).json(responseBody);
};
