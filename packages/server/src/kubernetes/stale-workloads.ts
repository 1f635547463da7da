/**
 * Startup removal of pull workloads left by an earlier process
 * @module @prepuller/server/kubernetes/stale-workloads
 */

import type { ClusterClient } from '@prepuller/core';
import { errorMessage, type Logger } from '@prepuller/shared';

/**
 * Delete every managed pull workload. Deletion failures are logged and
 * skipped; a failure to list them propagates.
 *
 * @returns Number of workloads removed
 */
export async function removeStaleWorkloads(cluster: ClusterClient, logger: Logger): Promise<number> {
  const names = await cluster.listPullWorkloads();
  let removed = 0;

  for (const name of names) {
    try {
      await cluster.deletePullWorkload(name);
      removed += 1;
    } catch (error) {
      logger.warn('Could not delete stale pull workload', { workload: name, error: errorMessage(error) });
    }
  }

  if (removed > 0) {
    logger.info('Removed stale pull workloads', { count: removed });
  }
  return removed;
}
