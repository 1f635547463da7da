/**
 * Image source errors
 * @module @prepuller/shared/errors/source-error
 */

import { PrepullError, ErrorCode, type ErrorMeta } from './base-error';

/**
 * A strategy could not produce its images this tick.
 * The controller skips the strategy and tries again on the next tick.
 */
export class SourceUnavailableError extends PrepullError {
  /** Repository or source the failure relates to */
  public readonly source?: string;

  constructor(
    message: string,
    source?: string,
    cause?: Error,
    code: ErrorCode = ErrorCode.SOURCE_UNAVAILABLE,
    meta: ErrorMeta = {},
  ) {
    super(message, code, { ...meta, resourceType: 'image-source', resourceId: source }, cause);
    this.name = 'SourceUnavailableError';
    this.source = source;
  }

  /**
   * Registry rejected our credentials or we could not obtain a token
   */
  static authFailed(source: string, message: string): SourceUnavailableError {
    return new SourceUnavailableError(
      `Registry authentication failed for ${source}: ${message}`,
      source,
      undefined,
      ErrorCode.REGISTRY_AUTH_FAILED,
    );
  }

  /**
   * Registry could not be reached or answered unexpectedly
   */
  static unreachable(source: string, cause?: Error, status?: number): SourceUnavailableError {
    const suffix = status !== undefined ? ` (HTTP ${status})` : cause ? `: ${cause.message}` : '';
    return new SourceUnavailableError(
      `Registry request failed for ${source}${suffix}`,
      source,
      cause,
      ErrorCode.REGISTRY_UNREACHABLE,
      status !== undefined ? { status } : {},
    );
  }
}

/**
 * Check if an error is a SourceUnavailableError
 */
export function isSourceUnavailableError(error: unknown): error is SourceUnavailableError {
  return error instanceof SourceUnavailableError;
}
