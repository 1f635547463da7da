/**
 * Node inventory types
 * @module @prepuller/shared/types/node
 */

import type { Labels } from './labels';

/**
 * What a cluster node reports about itself and its image cache
 */
export interface NodeRecord {
  /** Node name (unique within the cluster) */
  nodeName: string;
  /** Node labels */
  labels: Labels;
  /** Normalized references (tag form) of images present on the node */
  presentImages: ReadonlySet<string>;
  /** Normalized reference → digest of the local copy */
  imageDigests: ReadonlyMap<string, string>;
}

/**
 * How many targeted nodes must hold an image for it to count as available
 * - all: every node matching the selector
 * - any: at least one matching node
 */
export type AvailabilityMode = 'all' | 'any';

/**
 * All availability modes
 */
export const AVAILABILITY_MODES: readonly AvailabilityMode[] = ['all', 'any'];

/**
 * Type guard for availability modes
 */
export function isAvailabilityMode(value: string): value is AvailabilityMode {
  return value === 'all' || value === 'any';
}
