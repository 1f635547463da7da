/**
 * prepuller - Shared Package
 * Types, validation, errors and logging
 * @module @prepuller/shared
 */

// Types (includes helpers like matchesLabels, normalizeImageReference, etc.)
export * from './types/index';

// Errors
export * from './errors/index';

// Validation
export * from './validation/index';

// Logging
export {
  Logger,
  createLogger,
  createServiceLogger,
  parseLogLevel,
  generateCorrelationId,
} from './logging/logger';

export type { LogLevel, LogThreshold, LogMeta, LogEntry, LoggerConfig, PullLogContext } from './logging/logger';
