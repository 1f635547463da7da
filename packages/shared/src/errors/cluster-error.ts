/**
 * Cluster API error class
 * @module @prepuller/shared/errors/cluster-error
 */

import { PrepullError, ErrorCode } from './base-error';

/**
 * Transient failure talking to the cluster (listing nodes, reading or
 * mutating pull workloads). The tick that hit it keeps the previous inventory.
 */
export class ClusterApiError extends PrepullError {
  /** Cluster operation that failed, e.g. `listNodes` */
  public readonly operation: string;
  /** HTTP status reported by the API server, when there was one */
  public readonly apiStatus?: number;

  constructor(operation: string, message: string, apiStatus?: number, cause?: Error) {
    super(`Cluster API ${operation} failed: ${message}`, ErrorCode.CLUSTER_API_ERROR, {
      operation,
      ...(apiStatus !== undefined && { apiStatus }),
    }, cause);
    this.name = 'ClusterApiError';
    this.operation = operation;
    this.apiStatus = apiStatus;
  }

  /**
   * Wrap whatever the cluster client threw
   */
  static from(operation: string, error: unknown, apiStatus?: number): ClusterApiError {
    if (error instanceof ClusterApiError) {
      return error;
    }
    if (error instanceof Error) {
      return new ClusterApiError(operation, error.message, apiStatus, error);
    }
    return new ClusterApiError(operation, String(error), apiStatus);
  }

  isNotFound(): boolean {
    return this.apiStatus === 404;
  }
}

/**
 * Check if an error is a ClusterApiError
 */
export function isClusterApiError(error: unknown): error is ClusterApiError {
  return error instanceof ClusterApiError;
}
