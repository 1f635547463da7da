/**
 * Cache policy status types
 * @module @prepuller/shared/types/status
 */

import type { Labels } from './labels';
import type { DesiredImage } from './images';
import type { PullJob } from './pull-job';

/**
 * A strategy that failed to resolve on the last tick
 */
export interface SourceErrorEntry {
  /** Strategy description, e.g. `TagClassifyingStrategy(lsstsqre/sciplat-lab)` */
  strategy: string;
  message: string;
}

/**
 * Derived status of a cache policy, recomputed every tick
 */
export interface CachePolicyStatus {
  name: string;
  labelSelector: Labels;
  /** Images the strategies produced */
  desired: DesiredImage[];
  /** Every image the sources list, including those not cached */
  all: DesiredImage[];
  /** Pull jobs started for this policy and not yet superseded */
  pulling: PullJob[];
  /** Desired images present on the targeted nodes */
  available: DesiredImage[];
  /** Normalized references present on every targeted node */
  availableReferences: string[];
  /** Nodes matching the selector */
  targetNodeCount: number;
  sourceErrors: SourceErrorEntry[];
  lastReconciledAt?: Date;
  lastError?: string;
}

/**
 * Empty status for a policy that has not reconciled yet
 */
export function createInitialStatus(name: string, labelSelector: Labels): CachePolicyStatus {
  return {
    name,
    labelSelector: { ...labelSelector },
    desired: [],
    all: [],
    pulling: [],
    available: [],
    availableReferences: [],
    targetNodeCount: 0,
    sourceErrors: [],
  };
}
