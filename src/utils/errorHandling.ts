/**
 * Error Handling Utilities
 *
 * Type-safe helpers for working with `unknown` values caught in
 * `catch (error)` blocks.
 */

/**
 * Type guard to check if value is an Error object
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Type guard to check if error has a message property
 */
export function hasMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof (error as { message: unknown }).message === 'string'
  );
}

/**
 * Type guard to check if error has a code property
 */
export function hasCode(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof (error as { code: unknown }).code === 'string'
  );
}

/**
 * Safely extract error message from unknown error
 * Handles Error objects, objects with message, strings, and unknown values
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }

  if (hasMessage(error)) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unknown error occurred';
}

export function getErrorStack(error: unknown): string | undefined {
  if (isError(error)) {
    return error.stack;
  }
  return undefined;
}

/**
 * Safely extract error code from unknown error
 * Node.js system errors carry a string code (ENOENT, EACCES, ...)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (hasCode(error)) {
    return error.code;
  }

  // Check for errno property (Node.js system errors)
  if (
    typeof error === 'object' &&
    error !== null &&
    'errno' in error &&
    typeof (error as { errno: unknown }).errno === 'number'
  ) {
    return String((error as { errno: number }).errno);
  }

  return undefined;
}

/**
 * Create standardized error log context from unknown error
 * Returns structured object suitable for logger calls
 */
export function createErrorLogContext(
  error: unknown,
  additionalContext?: Record<string, unknown>
): {
  error: string;
  stack?: string;
  code?: string;
  [key: string]: unknown;
} {
  const stack = getErrorStack(error);
  const code = getErrorCode(error);

  return {
    error: getErrorMessage(error),
    ...(stack && { stack }),
    ...(code && { code }),
    ...additionalContext,
  };
}

/**
 * Convert unknown error to Error object
 * Useful when you need to wrap or rethrow a proper Error
 */
export function toError(error: unknown): Error {
  if (isError(error)) {
    return error;
  }

  if (hasMessage(error)) {
    return new Error(error.message);
  }

  if (typeof error === 'string') {
    return new Error(error);
  }

  return new Error('An unknown error occurred');
}

/**
 * Permission failures reported by the filesystem
 */
export function isPermissionError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === 'EACCES' || code === 'EPERM';
}
