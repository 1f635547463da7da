/**
 * Response envelope helpers shared by the API handlers
 * @module @prepuller/server/api/responses
 */

import type { Response } from 'express';
import { ConfigError, ErrorCode, isPrepullError, type Logger } from '@prepuller/shared';

/**
 * API success response
 */
export interface ApiSuccessResponse<T> {
  success: true;
  data: T;
}

/**
 * API error response
 */
export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Helper to send success response
 */
export function sendSuccess<T>(res: Response, data: T, statusCode = 200): void {
  const response: ApiSuccessResponse<T> = { success: true, data };
  res.status(statusCode).json(response);
}

/**
 * Helper to send error response
 */
export function sendError(
  res: Response,
  code: string,
  message: string,
  statusCode: number,
  details?: Record<string, unknown>
): void {
  const response: ApiErrorResponse = {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
  res.status(statusCode).json(response);
}

/**
 * Translate a thrown error into an error response.
 * Errors outside the PrepullError hierarchy are logged and reported as 500.
 */
export function sendFailure(res: Response, error: unknown, logger: Logger): void {
  if (error instanceof ConfigError) {
    sendError(res, ErrorCode[error.code], error.message, error.statusCode, { errors: error.details });
    return;
  }

  if (isPrepullError(error)) {
    if (error.statusCode >= 500) {
      logger.error('Request failed', error);
    }
    sendError(res, ErrorCode[error.code], error.message, error.statusCode);
    return;
  }

  logger.error('Unexpected error', error instanceof Error ? error : undefined);
  sendError(res, 'INTERNAL_ERROR', 'An unexpected error occurred', 500);
}
