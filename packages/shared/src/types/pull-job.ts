/**
 * Pull job types
 * @module @prepuller/shared/types/pull-job
 */

import type { Labels } from './labels';

/**
 * Pull job lifecycle
 * - pending: accepted, nothing created yet
 * - creating: pull workload being created
 * - waiting: workload running, pods pulling
 * - deleting: every targeted node is ready, workload being removed
 * - done: image is on the targeted nodes
 * - failed: this attempt ended without the image
 */
export type PullJobState = 'pending' | 'creating' | 'waiting' | 'deleting' | 'done' | 'failed';

/**
 * Terminal pull job states
 */
export const TERMINAL_PULL_STATES: readonly PullJobState[] = ['done', 'failed'];

/**
 * Check if a pull job state is terminal
 */
export function isTerminalPullState(state: PullJobState): boolean {
  return state === 'done' || state === 'failed';
}

/**
 * Point-in-time view of a pull job
 */
export interface PullJob {
  /** Unique job ID */
  id: string;
  /** Image being pulled */
  imageReference: string;
  /** Nodes targeted by label */
  labelSelector: Labels;
  /** Current state */
  state: PullJobState;
  /** Pods scheduled for the workload, or the targeted node count before that */
  targetNodeCount: number;
  /** Pods that finished pulling */
  completedNodeCount: number;
  /** Failure message of this attempt */
  lastError?: string;
  /** Name of the pull workload */
  workloadName: string;
  /** Attempt number for this image and selector, starting at 1 */
  attempt: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Status of a pull workload as read from the cluster
 */
export interface PullWorkloadStatus {
  /** Pods the workload should run */
  desiredNumberScheduled: number;
  /** Pods running with the image pulled */
  numberReady: number;
}
