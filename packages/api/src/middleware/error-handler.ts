/**
 * Error handling for the Briefing API
 * Provides structured error responses with proper HTTP status codes
 */
import type { Context, ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { ErrorCodes, type ErrorCode } from '@meeting-briefing/agents';
import type { AppEnv } from '../types';

export { ErrorCodes, type ErrorCode };

// Structured error response
export interface ErrorResponse {
  success: false;
  error: string;
  code: ErrorCode;
  details?: Record<string, unknown>;
  timestamp: string;
  request_id?: string;
}

// Custom application error
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public status: ContentfulStatusCode = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

// Helper functions to create common errors
export function notFoundError(resource: string): AppError {
  return new AppError(`${resource} not found`, ErrorCodes.NOT_FOUND, 404);
}

export function runInProgressError(message: string): AppError {
  return new AppError(message, ErrorCodes.RUN_IN_PROGRESS, 409);
}

/**
 * Format Zod validation errors into a user-friendly structure
 */
export function formatZodError(error: ZodError): Record<string, string[]> {
  const formatted: Record<string, string[]> = {};

  for (const issue of error.issues) {
    const path = issue.path.join('.');
    const key = path || 'root';
    const messages = formatted[key] ?? [];
    messages.push(issue.message);
    formatted[key] = messages;
  }

  return formatted;
}

function httpErrorCode(status: number): ErrorCode {
  switch (status) {
    case 400:
      return ErrorCodes.VALIDATION_ERROR;
    case 404:
      return ErrorCodes.NOT_FOUND;
    case 409:
      return ErrorCodes.RUN_IN_PROGRESS;
    case 429:
      return ErrorCodes.RATE_LIMITED;
    default:
      return ErrorCodes.INTERNAL_ERROR;
  }
}

/**
 * Build error response object
 */
function buildErrorResponse(
  c: Context<AppEnv>,
  message: string,
  code: ErrorCode,
  details?: Record<string, unknown>
): ErrorResponse {
  const requestId = c.get('requestId');
  return {
    success: false,
    error: message,
    code,
    ...(details ? { details } : {}),
    timestamp: new Date().toISOString(),
    ...(requestId ? { request_id: requestId } : {}),
  };
}

/**
 * Application error handler, registered with `app.onError`
 */
export function handleError(options: { exposeInternalErrors?: boolean } = {}): ErrorHandler<AppEnv> {
  return (err, c) => {
    // Validation errors thrown by zValidator hooks
    if (err instanceof ZodError) {
      const fields = formatZodError(err);
      const first = err.issues[0]?.message ?? 'Validation failed';
      return c.json(
        buildErrorResponse(c, first, ErrorCodes.VALIDATION_ERROR, { fields }),
        400
      );
    }

    if (err instanceof AppError) {
      return c.json(buildErrorResponse(c, err.message, err.code, err.details), err.status);
    }

    if (err instanceof HTTPException) {
      return c.json(
        buildErrorResponse(c, err.message || 'HTTP error', httpErrorCode(err.status)),
        err.status
      );
    }

    c.get('logger').error('unhandled_error', err);

    const message = options.exposeInternalErrors ? err.message : 'Internal server error';
    return c.json(buildErrorResponse(c, message, ErrorCodes.INTERNAL_ERROR), 500);
  };
}
