import { logger } from './logger.js';
import { HdrAnalysisError } from './guards/errors.js';

/**
 * Standard error response format for the CLI and the server
 */
export interface ErrorResponse {
  error: boolean;
  message: string;
  details?: Record<string, unknown>;
  code?: string;
}

/**
 * Creates a standardized error response object
 * @param message Error message
 * @param details Additional error details
 * @param code Error code
 */
export function createErrorResponse(
  message: string,
  details?: Record<string, unknown>,
  code?: string
): ErrorResponse {
  return {
    error: true,
    message,
    details,
    code
  };
}

/**
 * Handles errors in a consistent way across the codebase
 * @param error Error object or string
 * @param context Additional context for the error
 */
export function handleError(error: unknown, context?: string): ErrorResponse {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const contextPrefix = context ? `[${context}] ` : '';
  const fullMessage = `${contextPrefix}${errorMessage}`;

  logger.error(fullMessage);

  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }

  if (error instanceof HdrAnalysisError) {
    return createErrorResponse(fullMessage, error.details, error.code);
  }

  return createErrorResponse(
    fullMessage,
    error instanceof Error ? { stack: error.stack } : undefined
  );
}
