import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { isAppError, toError } from '../utils/errors';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

interface PgErrorFields {
  code: string;
  constraint?: string;
  detail?: string;
}

const hasPgCode = (err: unknown): err is PgErrorFields =>
  typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string' && /^[0-9A-Z]{5}$/.test(err.code);

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (isAppError(err)) {
    return ResponseHandler.error(res, err.message, err.statusCode, {
      code: err.code,
      details: err.details,
    });
  }

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.errors);
  }

  // Body parser rejects malformed JSON with a 400-typed SyntaxError
  if (err instanceof SyntaxError && 'body' in err) {
    return ResponseHandler.badRequest(res, 'Malformed JSON body');
  }

  if (hasPgCode(err)) {
    switch (err.code) {
      case '23505': // unique_violation
        return ResponseHandler.conflict(res, 'Resource already exists', { constraint: err.constraint }, 'UNIQUE_VIOLATION');
      case '23503': // foreign_key_violation
        return ResponseHandler.error(res, 'Referenced resource does not exist', 400, {
          code: 'FOREIGN_KEY_VIOLATION',
          details: { constraint: err.constraint },
        });
      case '23514': // check_violation
        return ResponseHandler.conflict(res, 'Change violates a data constraint', { constraint: err.constraint }, 'CHECK_VIOLATION');
      case '22P02': // invalid_text_representation
        return ResponseHandler.badRequest(res, 'Invalid identifier or value format');
    }
  }

  const error = toError(err);
  logger.error('[Error Handler]', {
    message: error.message,
    stack: error.stack,
    url: req.originalUrl,
    method: req.method,
    params: req.params,
    query: req.query,
  });

  return ResponseHandler.error(res, 'Internal server error', 500, {
    code: 'INTERNAL_ERROR',
    details: appConfig.nodeEnv === 'development' ? error.stack : undefined,
  });
};

export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
