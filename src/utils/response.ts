import { Response } from 'express';
import { logger } from './logging';

/**
 * Response envelope shared by every endpoint
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: ApiErrorBody;
}

export interface ApiErrorBody {
  code?: string;
  details?: unknown;
}

export class ResponseHandler {
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'OK',
    statusCode: number = 200
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
    };

    return res.status(statusCode).json(response);
  }

  static created<T>(res: Response, data?: T, message: string = 'Created'): Response {
    return this.success(res, data, message, 201);
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: ApiErrorBody
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
    };

    logger.warn(`[API Error] ${message}`, { statusCode, code: error?.code });

    return res.status(statusCode).json(response);
  }

  static validationError(
    res: Response,
    details: unknown,
    message: string = 'Invalid request data'
  ): Response {
    return this.error(res, message, 400, {
      code: 'VALIDATION_ERROR',
      details,
    });
  }

  static notFound(res: Response, message: string = 'Not found'): Response {
    return this.error(res, message, 404, { code: 'NOT_FOUND' });
  }

  static conflict(res: Response, message: string = 'Record already exists'): Response {
    return this.error(res, message, 409, { code: 'CONFLICT' });
  }
}
