/**
 * Unit tests for startup removal of leftover pull workloads
 */

import { describe, it, expect } from 'vitest';
import { createServiceLogger } from '@prepuller/shared';
import { removeStaleWorkloads } from '../../src/kubernetes/stale-workloads';
import { FakeClusterClient } from '../../../core/tests/helpers/fakes';

const logger = createServiceLogger({ service: 'prepuller' });

describe('removeStaleWorkloads', () => {
  it('should delete every managed workload', async () => {
    const cluster = new FakeClusterClient();
    await cluster.createPullWorkload({ name: 'prepull-a', image: 'alpine:3.19', nodeSelector: {}, policy: 'a' });
    await cluster.createPullWorkload({ name: 'prepull-b', image: 'alpine:3.20', nodeSelector: {}, policy: 'b' });

    await expect(removeStaleWorkloads(cluster, logger)).resolves.toBe(2);

    expect(cluster.deleted).toEqual(['prepull-a', 'prepull-b']);
    await expect(cluster.listPullWorkloads()).resolves.toEqual([]);
  });

  it('should return zero when nothing is left over', async () => {
    await expect(removeStaleWorkloads(new FakeClusterClient(), logger)).resolves.toBe(0);
  });
});
