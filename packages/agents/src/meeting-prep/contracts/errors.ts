/**
 * Error Codes
 *
 * Codes shared by pipeline results, stage failures and the briefing API.
 *
 * @module meeting-prep/contracts/errors
 */

export const ErrorCodes = {
  // Input
  INVALID_REQUEST: 'INVALID_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Upstream services
  RATE_LIMITED: 'RATE_LIMITED',
  UNAUTHORIZED: 'UNAUTHORIZED',
  TIMEOUT: 'TIMEOUT',
  SEARCH_ERROR: 'SEARCH_ERROR',
  MODEL_ERROR: 'MODEL_ERROR',
  EMPTY_OUTPUT: 'EMPTY_OUTPUT',

  // Pipeline
  BRIEFING_GENERATION_FAILED: 'BRIEFING_GENERATION_FAILED',
  RUN_IN_PROGRESS: 'RUN_IN_PROGRESS',
  NOT_FOUND: 'NOT_FOUND',

  // Process
  CONFIG_ERROR: 'CONFIG_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Codes a single stage can fail with */
export type StageErrorCode =
  | typeof ErrorCodes.RATE_LIMITED
  | typeof ErrorCodes.UNAUTHORIZED
  | typeof ErrorCodes.TIMEOUT
  | typeof ErrorCodes.SEARCH_ERROR
  | typeof ErrorCodes.MODEL_ERROR
  | typeof ErrorCodes.EMPTY_OUTPUT
  | typeof ErrorCodes.INTERNAL_ERROR;
