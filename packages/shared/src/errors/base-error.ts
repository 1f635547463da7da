/**
 * Base error class with error codes
 * @module @prepuller/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  TIMEOUT = 1003,
  CANCELLED = 1004,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  OUT_OF_RANGE = 2004,
  UNKNOWN_STRATEGY = 2005,

  // Resource errors (5xxx)
  NOT_FOUND = 5000,
  ALREADY_EXISTS = 5001,

  // Image source errors (6xxx)
  SOURCE_UNAVAILABLE = 6000,
  REGISTRY_AUTH_FAILED = 6001,
  REGISTRY_UNREACHABLE = 6002,

  // Pull errors (7xxx)
  PULL_FAILED = 7000,
  PULL_WORKLOAD_CREATE_FAILED = 7001,
  PULL_TIMEOUT = 7002,
  PULL_CANCELLED = 7003,
  PULL_NO_TARGETS = 7004,

  // Cluster errors (8xxx)
  CLUSTER_API_ERROR = 8000,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Resource type involved */
  resourceType?: string;
  /** Resource ID involved */
  resourceId?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all prepuller errors
 */
export class PrepullError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** HTTP status code equivalent */
  public readonly statusCode: number;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;
  /** Correlation ID for tracing */
  public correlationId?: string;
  /** Original error if this wraps another */
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'PrepullError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;
    this.statusCode = statusCodeFor(code);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Set correlation ID for tracing
   */
  withCorrelationId(correlationId: string): this {
    this.correlationId = correlationId;
    return this;
  }

  /**
   * Convert to JSON for API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }

  /**
   * Convert to log-friendly format
   */
  toLog(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      meta: this.meta,
      timestamp: this.timestamp.toISOString(),
      correlationId: this.correlationId,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  /**
   * Check if this is a client error (4xx)
   */
  isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }

  /**
   * Check if this is a server error (5xx)
   */
  isServerError(): boolean {
    return this.statusCode >= 500;
  }

  /**
   * Whether the next reconciliation tick may succeed where this one failed
   */
  isRetryable(): boolean {
    return [
      ErrorCode.TIMEOUT,
      ErrorCode.INTERNAL,
      ErrorCode.SOURCE_UNAVAILABLE,
      ErrorCode.REGISTRY_UNREACHABLE,
      ErrorCode.PULL_FAILED,
      ErrorCode.PULL_WORKLOAD_CREATE_FAILED,
      ErrorCode.PULL_TIMEOUT,
      ErrorCode.CLUSTER_API_ERROR,
    ].includes(this.code);
  }
}

/**
 * Map error code to HTTP status code
 */
function statusCodeFor(code: ErrorCode): number {
  const codeCategory = Math.floor(code / 1000);

  switch (codeCategory) {
    case 2: // Validation
      return 400;
    case 5: // Resource
      if (code === ErrorCode.NOT_FOUND) {
        return 404;
      }
      if (code === ErrorCode.ALREADY_EXISTS) {
        return 409;
      }
      return 400;
    case 6: // Image source
    case 8: // Cluster
      return 502;
    default:
      return 500;
  }
}

/**
 * Check if an error is a PrepullError
 */
export function isPrepullError(error: unknown): error is PrepullError {
  return error instanceof PrepullError;
}

/**
 * Wrap an unknown error as a PrepullError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): PrepullError {
  if (isPrepullError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new PrepullError(error.message, code, {}, error);
  }

  return new PrepullError(String(error), code);
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
