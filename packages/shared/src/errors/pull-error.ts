/**
 * Pull job error class
 * @module @prepuller/shared/errors/pull-error
 */

import { PrepullError, ErrorCode, type ErrorMeta } from './base-error';

/**
 * Why a pull attempt ended in the failed state
 */
export type PullFailureReason = 'create' | 'timeout' | 'cancelled' | 'no-targets';

const REASON_CODES: Record<PullFailureReason, ErrorCode> = {
  create: ErrorCode.PULL_WORKLOAD_CREATE_FAILED,
  timeout: ErrorCode.PULL_TIMEOUT,
  cancelled: ErrorCode.PULL_CANCELLED,
  'no-targets': ErrorCode.PULL_NO_TARGETS,
};

/**
 * A pull attempt failed. The image stays desired and is retried on a later tick.
 */
export class PullFailedError extends PrepullError {
  public readonly reason: PullFailureReason;
  public readonly imageReference: string;

  constructor(
    message: string,
    reason: PullFailureReason,
    imageReference: string,
    cause?: Error,
    meta: ErrorMeta = {},
  ) {
    super(message, REASON_CODES[reason], {
      ...meta,
      resourceType: 'pull-job',
      resourceId: imageReference,
    }, cause);
    this.name = 'PullFailedError';
    this.reason = reason;
    this.imageReference = imageReference;
  }

  static createFailed(imageReference: string, workloadName: string, cause?: Error): PullFailedError {
    const detail = cause ? `: ${cause.message}` : '';
    return new PullFailedError(
      `Failed to create pull workload ${workloadName}${detail}`,
      'create',
      imageReference,
      cause,
      { workloadName },
    );
  }

  static timedOut(imageReference: string, completed: number, target: number, timeoutMs: number): PullFailedError {
    return new PullFailedError(
      `Pull of ${imageReference} timed out after ${timeoutMs}ms (${completed}/${target} nodes ready)`,
      'timeout',
      imageReference,
      undefined,
      { completed, target, timeoutMs },
    );
  }

  static cancelled(imageReference: string): PullFailedError {
    return new PullFailedError(
      `Pull of ${imageReference} was cancelled`,
      'cancelled',
      imageReference,
    );
  }

  static noTargets(imageReference: string): PullFailedError {
    return new PullFailedError(
      `No nodes match the selector for ${imageReference}`,
      'no-targets',
      imageReference,
    );
  }
}

/**
 * Check if an error is a PullFailedError
 */
export function isPullFailedError(error: unknown): error is PullFailedError {
  return error instanceof PullFailedError;
}
