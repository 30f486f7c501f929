/**
 * Unified Error Hierarchy for mediascope
 *
 * Every failure the service reports carries:
 * - a machine-readable error code
 * - one of the tool-facing error types (`error_type` on the wire)
 * - HTTP status code mapping
 * - context metadata for structured logging
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors (4xx)
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',
  VALIDATION_INVALID_URL = 'VALIDATION_INVALID_URL',

  // Extraction Errors
  EXTRACTION_GEO_RESTRICTED = 'EXTRACTION_GEO_RESTRICTED',
  EXTRACTION_VIDEO_UNAVAILABLE = 'EXTRACTION_VIDEO_UNAVAILABLE',
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  EXTRACTION_RATE_LIMITED = 'EXTRACTION_RATE_LIMITED',
  EXTRACTION_TIMEOUT = 'EXTRACTION_TIMEOUT',
  EXTRACTION_CANCELLED = 'EXTRACTION_CANCELLED',
  EXTRACTION_MALFORMED_OUTPUT = 'EXTRACTION_MALFORMED_OUTPUT',
  EXTRACTION_NO_SUBTITLES = 'EXTRACTION_NO_SUBTITLES',
  EXTRACTION_NO_AUDIO = 'EXTRACTION_NO_AUDIO',

  // Search / Batch
  SEARCH_FAILED = 'SEARCH_FAILED',
  BATCH_FAILED = 'BATCH_FAILED',
  BATCH_LIMIT_EXCEEDED = 'BATCH_LIMIT_EXCEEDED',

  // Remote transport
  REMOTE_TRANSPORT_FAILED = 'REMOTE_TRANSPORT_FAILED',

  // Configuration / System (5xx - permanent)
  CONFIG_INVALID = 'CONFIG_INVALID',
  SYSTEM_DEPENDENCY_MISSING = 'SYSTEM_DEPENDENCY_MISSING',

  // Generic fallback
  UNKNOWN = 'UNKNOWN',
}

/**
 * Error types reported to tool callers as `error_type`
 */
export const ERROR_TYPES = [
  'InvalidURL',
  'GeoRestriction',
  'VideoUnavailable',
  'ExtractionError',
  'SearchError',
  'BatchError',
  'SSHError',
  'UnexpectedError',
] as const;

export type ErrorType = (typeof ERROR_TYPES)[number];

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'video_info', 'runRemote') */
  operation?: string;

  /** URL or query the operation was working on */
  target?: string;

  /** Duration of operation before failure (ms) */
  durationMs?: number;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

export interface ErrorOptions {
  isOperational?: boolean;
  retryable?: boolean;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base application error class
 * All custom errors in mediascope should extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Tool-facing error type
   */
  public abstract readonly errorType: ErrorType;

  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * HTTP status code for API responses
   */
  public readonly statusCode: number;

  /**
   * Whether this error is operational (expected) vs programmer error
   */
  public readonly isOperational: boolean;

  /**
   * Whether the same call might succeed later
   */
  public readonly retryable: boolean;

  public readonly context: ErrorContext;

  /**
   * Original error that caused this error (if wrapped)
   */
  public readonly cause?: Error;

  public readonly timestamp: Date;

  constructor(message: string, code: ErrorCode, statusCode: number, options: ErrorOptions = {}) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    if (options.cause) {
      this.cause = options.cause;
    }
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      errorType: this.errorType,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }
}

// ============================================
// INPUT ERRORS (4xx - Client Error)
// ============================================

export class InvalidUrlError extends ApplicationError {
  public readonly errorType = 'InvalidURL';

  constructor(
    public readonly url: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(message || `Unsupported or malformed URL: ${url}`, ErrorCode.VALIDATION_INVALID_URL, 400, {
      ...(context && { context }),
    });
  }
}

// ============================================
// CONTENT ERRORS (reported by the platform)
// ============================================

export class GeoRestrictionError extends ApplicationError {
  public readonly errorType = 'GeoRestriction';

  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.EXTRACTION_GEO_RESTRICTED, 451, {
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class VideoUnavailableError extends ApplicationError {
  public readonly errorType = 'VideoUnavailable';

  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.EXTRACTION_VIDEO_UNAVAILABLE, 404, {
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// ============================================
// EXTRACTION ERRORS (5xx - operational)
// ============================================

export class ExtractionError extends ApplicationError {
  public readonly errorType: ErrorType = 'ExtractionError';

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.EXTRACTION_FAILED,
    options: ErrorOptions = {}
  ) {
    super(message, code, extractionStatus(code), {
      retryable: code === ErrorCode.EXTRACTION_RATE_LIMITED,
      ...options,
    });
  }
}

/**
 * Extraction exceeded its deadline; the process was killed
 */
export class ExtractionTimeoutError extends ExtractionError {
  public readonly timedOut = true;

  constructor(
    public readonly timeoutMs: number,
    context?: ErrorContext
  ) {
    super(`Extraction timed out after ${timeoutMs}ms`, ErrorCode.EXTRACTION_TIMEOUT, {
      retryable: true,
      ...(context && { context }),
    });
  }
}

export class ExtractionCancelledError extends ExtractionError {
  constructor(context?: ErrorContext) {
    super('Extraction cancelled by caller', ErrorCode.EXTRACTION_CANCELLED, {
      ...(context && { context }),
    });
  }
}

function extractionStatus(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.VALIDATION_INPUT_INVALID:
      return 400;
    case ErrorCode.EXTRACTION_TIMEOUT:
      return 504;
    case ErrorCode.EXTRACTION_CANCELLED:
      return 499;
    case ErrorCode.EXTRACTION_RATE_LIMITED:
      return 429;
    default:
      return 502;
  }
}

export class SearchError extends ApplicationError {
  public readonly errorType = 'SearchError';

  constructor(message: string, code: ErrorCode = ErrorCode.SEARCH_FAILED, options: ErrorOptions = {}) {
    super(message, code, code === ErrorCode.VALIDATION_INPUT_INVALID ? 400 : 502, options);
  }
}

export class BatchError extends ApplicationError {
  public readonly errorType = 'BatchError';

  constructor(message: string, code: ErrorCode = ErrorCode.BATCH_FAILED, options: ErrorOptions = {}) {
    const clientFault = code === ErrorCode.VALIDATION_INPUT_INVALID || code === ErrorCode.BATCH_LIMIT_EXCEEDED;
    super(message, code, clientFault ? 400 : 502, options);
  }
}

// ============================================
// REMOTE TRANSPORT ERRORS (5xx - operational)
// ============================================

/**
 * The secure-shell channel itself failed (connect, auth, remote temp dir)
 */
export class SSHError extends ApplicationError {
  public readonly errorType = 'SSHError';

  constructor(
    public readonly host: string,
    message: string,
    public readonly exitCode: number | null = null,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, ErrorCode.REMOTE_TRANSPORT_FAILED, 503, {
      retryable: true,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// ============================================
// PERMANENT / SYSTEM ERRORS (5xx)
// ============================================

export class ConfigurationError extends ApplicationError {
  public readonly errorType = 'UnexpectedError';

  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.CONFIG_INVALID, 500, {
      isOperational: false,
      ...(context && { context }),
    });
  }
}

export class UnexpectedError extends ApplicationError {
  public readonly errorType = 'UnexpectedError';

  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.UNKNOWN, 500, {
      isOperational: false,
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}
