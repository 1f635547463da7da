/**
 * Error classes for prepuller
 * @module @prepuller/shared/errors
 */

// Base error
export {
  PrepullError,
  ErrorCode,
  isPrepullError,
  wrapError,
  errorMessage,
} from './base-error';

export type { ErrorMeta } from './base-error';

// Configuration errors
export { ConfigError, isConfigError } from './config-error';

export type { ConfigErrorDetail } from './config-error';

// Image source errors
export { SourceUnavailableError, isSourceUnavailableError } from './source-error';

// Pull errors
export { PullFailedError, isPullFailedError } from './pull-error';

export type { PullFailureReason } from './pull-error';

// Cluster errors
export { ClusterApiError, isClusterApiError } from './cluster-error';
