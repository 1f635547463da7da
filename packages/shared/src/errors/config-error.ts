/**
 * Configuration error class
 * @module @prepuller/shared/errors/config-error
 */

import { PrepullError, ErrorCode, type ErrorMeta } from './base-error';

/**
 * Config error detail
 */
export interface ConfigErrorDetail {
  /** Field that failed validation */
  field: string;
  /** Error message */
  message: string;
  /** Validation rule that failed */
  rule?: string;
  /** Expected value/format */
  expected?: string;
  /** Actual value received */
  received?: unknown;
}

/**
 * Malformed policy or strategy definition. Raised at creation time and never stored.
 */
export class ConfigError extends PrepullError {
  /** Field-level details */
  public readonly details: ConfigErrorDetail[];

  constructor(
    message: string,
    details: ConfigErrorDetail[] = [],
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
    meta: ErrorMeta = {},
  ) {
    super(message, code, meta);
    this.name = 'ConfigError';
    this.details = details;
  }

  /**
   * Create from a single field error
   */
  static field(field: string, message: string, rule?: string): ConfigError {
    return new ConfigError(`Invalid configuration for field: ${field}`, [
      { field, message, rule },
    ], ErrorCode.INVALID_INPUT, { field });
  }

  /**
   * Create for a required field
   */
  static required(field: string): ConfigError {
    return new ConfigError(`Missing required field: ${field}`, [
      { field, message: 'This field is required', rule: 'required' },
    ], ErrorCode.MISSING_REQUIRED_FIELD, { field });
  }

  /**
   * Create from multiple field errors
   */
  static multiple(errors: ConfigErrorDetail[]): ConfigError {
    const fieldNames = errors.map(e => e.field).join(', ');
    return new ConfigError(
      `Invalid configuration for fields: ${fieldNames}`,
      errors,
    );
  }

  /**
   * Check if a specific field has an error
   */
  hasFieldError(field: string): boolean {
    return this.details.some(d => d.field === field);
  }

  override toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        details: this.details,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }
}

/**
 * Check if an error is a ConfigError
 */
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
