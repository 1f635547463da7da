/**
 * Cluster primitives the reconciliation engine depends on
 * @module @prepuller/core/cluster/cluster-client
 */

import type { Labels, NodeRecord, PullWorkloadStatus } from '@prepuller/shared';

/**
 * What to create for one pull attempt
 */
export interface PullWorkloadSpec {
  /** Workload name, unique per policy, image and attempt */
  name: string;
  /** Image to pull, as given by the source */
  image: string;
  /** Pods are scheduled only onto nodes carrying these labels */
  nodeSelector: Labels;
  /** Policy that owns the pull, recorded on the workload */
  policy: string;
}

/**
 * Access to the cluster. Implementations reject with `ClusterApiError`.
 */
export interface ClusterClient {
  /** List every node with its labels and image cache */
  listNodes(): Promise<NodeRecord[]>;
  /** Create a node-selector-scoped, one-pod-per-node pull workload */
  createPullWorkload(spec: PullWorkloadSpec): Promise<void>;
  /** Read scheduled and ready pod counts of a pull workload */
  readPullWorkloadStatus(name: string): Promise<PullWorkloadStatus>;
  /** Delete a pull workload; a workload that is already gone counts as deleted */
  deletePullWorkload(name: string): Promise<void>;
  /** Names of pull workloads managed by this process, whoever created them */
  listPullWorkloads(): Promise<string[]>;
}
