/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

import {
  ApplicationError,
  BatchError,
  ErrorCode,
  ExtractionError,
  GeoRestrictionError,
  InvalidUrlError,
  SearchError,
  SSHError,
  UnexpectedError,
  VideoUnavailableError,
  type ErrorContext,
  type ErrorType,
} from './ApplicationError.js';
import { getErrorMessage, isError } from '../utils/errorHandling.js';

export {
  ApplicationError,
  ErrorCode,
  ERROR_TYPES,
  type ErrorContext,
  type ErrorOptions,
  type ErrorType,
} from './ApplicationError.js';

export {
  InvalidUrlError,
  GeoRestrictionError,
  VideoUnavailableError,
  ExtractionError,
  ExtractionTimeoutError,
  ExtractionCancelledError,
  SearchError,
  BatchError,
  SSHError,
  ConfigurationError,
  UnexpectedError,
} from './ApplicationError.js';

/**
 * Wire shape of a failed tool call
 */
export interface ToolError {
  error_type: ErrorType;
  message: string;
}

/**
 * Wrap any thrown value in an ApplicationError, leaving ApplicationErrors as they are
 */
export function toApplicationError(error: unknown, context?: ErrorContext): ApplicationError {
  if (error instanceof ApplicationError) {
    return error;
  }
  return new UnexpectedError(getErrorMessage(error), context, isError(error) ? error : undefined);
}

export function toToolError(error: unknown): ToolError {
  const appError = toApplicationError(error);
  return { error_type: appError.errorType, message: appError.message };
}

/**
 * Build the error for a classified failure kind
 */
export function errorForType(
  type: ErrorType,
  message: string,
  options: { code?: ErrorCode; context?: ErrorContext; cause?: Error; host?: string } = {}
): ApplicationError {
  const { code, context, cause, host } = options;
  switch (type) {
    case 'InvalidURL':
      return new InvalidUrlError(context?.target ?? '', message, context);
    case 'GeoRestriction':
      return new GeoRestrictionError(message, context, cause);
    case 'VideoUnavailable':
      return new VideoUnavailableError(message, context, cause);
    case 'ExtractionError':
      return new ExtractionError(message, code, {
        ...(context && { context }),
        ...(cause && { cause }),
      });
    case 'SearchError':
      return new SearchError(message, code, {
        ...(context && { context }),
        ...(cause && { cause }),
      });
    case 'BatchError':
      return new BatchError(message, code, {
        ...(context && { context }),
        ...(cause && { cause }),
      });
    case 'SSHError':
      return new SSHError(host ?? 'unknown', message, null, context, cause);
    case 'UnexpectedError':
      return new UnexpectedError(message, context, cause);
  }
}
