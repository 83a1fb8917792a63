import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';
import {
  AppError,
  getPgErrorCode,
  PG_FOREIGN_KEY_VIOLATION,
  PG_UNIQUE_VIOLATION,
} from '../utils/errors';

// Express recognises error middleware by its four parameters.
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.errors);
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error('[Error Handler]', {
        message: err.message,
        code: err.code,
        url: req.originalUrl,
        method: req.method,
      });
    }
    return ResponseHandler.error(res, err.message, err.statusCode, { code: err.code });
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return ResponseHandler.error(res, 'Malformed JSON body', 400, { code: 'BAD_REQUEST' });
  }

  const pgCode = getPgErrorCode(err);

  if (pgCode === PG_UNIQUE_VIOLATION) {
    return ResponseHandler.conflict(res);
  }

  if (pgCode === PG_FOREIGN_KEY_VIOLATION) {
    return ResponseHandler.error(res, 'Referenced record does not exist', 400, {
      code: 'FOREIGN_KEY_VIOLATION',
    });
  }

  const error = err instanceof Error ? err : new Error(String(err));

  logger.error('[Error Handler]', {
    message: error.message,
    stack: error.stack,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    params: req.params,
  });

  return ResponseHandler.error(res, 'Internal server error', 500, {
    code: 'INTERNAL_ERROR',
    details: appConfig.nodeEnv === 'development' ? error.stack : undefined,
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
