/**
 * Error Handling Utilities
 *
 * Type-safe helpers for `catch (error)` blocks, where the caught value is
 * `unknown` and may come from child processes, fs or library code.
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
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

/**
 * Type guard to check if error has a string code property (Node system errors)
 */
export function hasCode(error: unknown): error is { code: string } {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
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

  // Fallback for truly unknown errors
  return 'An unknown error occurred';
}

/**
 * Safely extract error code from unknown error, e.g. ENOENT from spawn
 */
export function getErrorCode(error: unknown): string | undefined {
  if (hasCode(error)) {
    return error.code;
  }

  // Check for errno property (Node.js system errors)
  if (typeof error === 'object' && error !== null && 'errno' in error && typeof error.errno === 'number') {
    return String(error.errno);
  }

  return undefined;
}

/**
 * Missing-binary errors from spawn/execFile
 */
export function isCommandNotFound(error: unknown): boolean {
  return getErrorCode(error) === 'ENOENT';
}
