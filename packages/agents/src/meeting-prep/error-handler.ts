/**
 * Error Handler
 *
 * Maps errors thrown by the search and model clients to typed stage
 * failure codes with a user-facing message.
 *
 * @module meeting-prep/error-handler
 */

import Anthropic from '@anthropic-ai/sdk';
import { ErrorCodes, type StageErrorCode } from './contracts/errors';
import { EmptyCompletionError } from './clients/completion';
import { SearchError } from './clients/web-search';
import { getErrorMessage } from './utils';

// ===========================================
// Types
// ===========================================

/**
 * Where the error came from
 */
export type ErrorSource = 'search' | 'model' | 'internal';

/**
 * Classified error with code and user message
 */
export interface ClassifiedError {
  /** Error code for programmatic handling */
  code: StageErrorCode;
  /** Technical error message */
  message: string;
  /** User-facing message */
  userMessage: string;
  source: ErrorSource;
}

// ===========================================
// Error Detection
// ===========================================

function statusOf(error: unknown): number | undefined {
  if (error instanceof Anthropic.APIError || error instanceof SearchError) {
    return error.status;
  }
  return undefined;
}

function isTimeoutError(error: unknown, message: string): boolean {
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return true;
  }
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return true;
  }
  return /timed? ?out/i.test(message);
}

function isRateLimitError(error: unknown): boolean {
  return error instanceof Anthropic.RateLimitError || statusOf(error) === 429;
}

function isAuthenticationError(error: unknown): boolean {
  if (error instanceof Anthropic.AuthenticationError) return true;
  if (error instanceof Anthropic.PermissionDeniedError) return true;
  const status = statusOf(error);
  return status === 401 || status === 403;
}

// ===========================================
// Error Classification
// ===========================================

/**
 * Classify an error into a structured error with code and user message.
 */
export function classifyError(error: unknown, source: ErrorSource): ClassifiedError {
  const message = getErrorMessage(error);

  if (error instanceof EmptyCompletionError) {
    return {
      code: ErrorCodes.EMPTY_OUTPUT,
      message,
      userMessage: 'The model returned an empty answer. Please try again.',
      source,
    };
  }

  if (isRateLimitError(error)) {
    return {
      code: ErrorCodes.RATE_LIMITED,
      message,
      userMessage: 'Too many requests. Please try again in a few minutes.',
      source,
    };
  }

  if (isAuthenticationError(error)) {
    return {
      code: ErrorCodes.UNAUTHORIZED,
      message,
      userMessage: 'An API key was rejected. Check the service configuration.',
      source,
    };
  }

  if (isTimeoutError(error, message)) {
    return {
      code: ErrorCodes.TIMEOUT,
      message,
      userMessage: 'An upstream service took too long to respond. Please try again.',
      source,
    };
  }

  return classifyBySource(source, message);
}

/**
 * Classify error by source service.
 */
function classifyBySource(source: ErrorSource, message: string): ClassifiedError {
  switch (source) {
    case 'search':
      return {
        code: ErrorCodes.SEARCH_ERROR,
        message,
        userMessage: 'Web search is temporarily unavailable. Please try again.',
        source,
      };

    case 'model':
      return {
        code: ErrorCodes.MODEL_ERROR,
        message,
        userMessage: 'AI service temporarily unavailable. Please try again.',
        source,
      };

    default:
      return {
        code: ErrorCodes.INTERNAL_ERROR,
        message,
        userMessage: 'An unexpected error occurred. Please try again.',
        source,
      };
  }
}
