import { Response } from 'express';
import { logger } from './logging';

export interface ApiErrorBody {
  code?: string;
  details?: unknown;
}

/**
 * Response envelope shared by every endpoint
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: ApiErrorBody;
  meta?: Record<string, unknown>;
}

export class ResponseHandler {
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'Success',
    statusCode: number = 200,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
      ...(meta && { meta }),
    };

    return res.status(statusCode).json(response);
  }

  /**
   * Created Response (201)
   */
  static created<T>(
    res: Response,
    data?: T,
    message: string = 'Created',
    meta?: Record<string, unknown>
  ): Response {
    return this.success(res, data, message, 201, meta);
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: ApiErrorBody,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
      ...(meta && { meta }),
    };

    const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[API Error] ${message}`, { statusCode, error, meta });

    return res.status(statusCode).json(response);
  }

  static badRequest(res: Response, message: string = 'Bad request', details?: unknown): Response {
    return this.error(res, message, 400, { code: 'BAD_REQUEST', details });
  }

  static validationError(res: Response, errors: unknown, message: string = 'Invalid request data'): Response {
    return this.error(res, message, 400, { code: 'VALIDATION_ERROR', details: errors });
  }

  static notFound(res: Response, message: string = 'Not found'): Response {
    return this.error(res, message, 404, { code: 'NOT_FOUND' });
  }

  /**
   * Conflict Response (409)
   */
  static conflict(
    res: Response,
    message: string = 'Conflict',
    details?: unknown,
    code: string = 'CONFLICT'
  ): Response {
    return this.error(res, message, 409, { code, details });
  }
}
