/**
 * Unit tests for NodeInventory
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { ClusterApiError } from '@prepuller/shared';
import { NodeInventory } from '../../src/inventory';
import { FakeClusterClient } from '../helpers/fakes';

const LAB = 'docker.io/lsstsqre/lab:w_2021_13';

describe('NodeInventory', () => {
  let cluster: FakeClusterClient;
  let clock: number;
  let inventory: NodeInventory;

  beforeEach(() => {
    clock = 1_000_000;
    cluster = new FakeClusterClient();
    cluster.addNode('node-a', { jupyterlab: 'ok' }, [LAB, 'alpine:3.19']);
    cluster.addNode('node-b', { jupyterlab: 'ok' }, ['lsstsqre/lab:w_2021_13']);
    cluster.addNode('node-c', { role: 'infra' }, ['alpine:3.19']);
    inventory = new NodeInventory(cluster, { maxAgeMs: 5000, now: () => clock });
  });

  describe('refresh', () => {
    it('should start empty', () => {
      expect(inventory.snapshot.nodes).toEqual([]);
      expect(inventory.snapshot.refreshedAt).toBeNull();
      expect(inventory.ageMs()).toBeNull();
    });

    it('should load every node', async () => {
      await inventory.refresh();

      expect(inventory.snapshot.nodes.map((node) => node.nodeName)).toEqual(['node-a', 'node-b', 'node-c']);
      expect(inventory.nodeCount.value).toBe(3);
      expect(inventory.ageMs()).toBe(0);
    });

    it('should share one request between concurrent callers', async () => {
      await Promise.all([inventory.refresh(), inventory.refresh(), inventory.refresh()]);
      expect(cluster.listNodesCalls).toBe(1);
    });

    it('should reuse a fresh snapshot', async () => {
      await inventory.refresh();
      clock += 4999;
      await inventory.refresh();
      expect(cluster.listNodesCalls).toBe(1);

      clock += 1;
      await inventory.refresh();
      expect(cluster.listNodesCalls).toBe(2);
    });

    it('should hit the cluster again after invalidate', async () => {
      await inventory.refresh();
      inventory.invalidate();
      await inventory.refresh();
      expect(cluster.listNodesCalls).toBe(2);
    });

    it('should keep the previous snapshot when listing fails', async () => {
      await inventory.refresh();
      const before = inventory.snapshot;
      inventory.invalidate();
      cluster.listNodesError = new Error('apiserver unavailable');

      const error = await inventory.refresh().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ClusterApiError);
      expect(error).toHaveProperty('message', 'Cluster API listNodes failed: apiserver unavailable');
      expect(inventory.snapshot).toBe(before);
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await inventory.refresh();
    });

    it('should select nodes by label', () => {
      expect(inventory.nodesMatching({ jupyterlab: 'ok' }).map((node) => node.nodeName)).toEqual(['node-a', 'node-b']);
      expect(inventory.nodesMatching({})).toHaveLength(3);
    });

    it('should intersect images over matching nodes', () => {
      expect([...inventory.imagesAvailableFor({ jupyterlab: 'ok' })]).toEqual([LAB]);
      expect([...inventory.imagesAvailableFor({ role: 'infra' })]).toEqual(['docker.io/library/alpine:3.19']);
    });

    it('should return an empty set when no node matches', () => {
      expect(inventory.imagesAvailableFor({ jupyterlab: 'missing' }).size).toBe(0);
    });

    it('should compare references in normalized form', () => {
      expect(inventory.isAvailable('lsstsqre/lab:w_2021_13', { jupyterlab: 'ok' })).toBe(true);
      expect(inventory.isAvailable('registry.hub.docker.com/lsstsqre/lab:w_2021_13', { jupyterlab: 'ok' })).toBe(true);
    });

    it('should require every node in all mode and one node in any mode', () => {
      expect(inventory.isAvailable('alpine:3.19', { jupyterlab: 'ok' })).toBe(false);
      expect(inventory.isAvailable('alpine:3.19', { jupyterlab: 'ok' }, 'any')).toBe(true);
    });

    it('should never report availability when no node matches', () => {
      expect(inventory.isAvailable(LAB, { jupyterlab: 'missing' }, 'any')).toBe(false);
    });
  });

  describe('digest-aware availability', () => {
    it('should require the node copy to have the wanted digest', async () => {
      cluster = new FakeClusterClient();
      cluster.addNode('node-a', {}, { [LAB]: 'sha256:new' });
      cluster.addNode('node-b', {}, { [LAB]: 'sha256:old' });
      inventory = new NodeInventory(cluster, { now: () => clock });
      await inventory.refresh();

      const image = { displayName: 'Lab', imageReference: LAB, digest: 'sha256:new' };
      expect(inventory.isAvailable(image, {})).toBe(false);
      expect(inventory.isAvailable(image, {}, 'any')).toBe(true);
      expect(inventory.isAvailable({ displayName: 'Lab', imageReference: LAB }, {})).toBe(true);
    });

    it('should find cached references by digest on every selected node', async () => {
      const recommended = 'docker.io/lsstsqre/lab:recommended';
      cluster = new FakeClusterClient();
      cluster.addNode('node-a', { jupyterlab: 'ok' }, { [LAB]: 'sha256:aaa', [recommended]: 'sha256:aaa' });
      cluster.addNode('node-b', { jupyterlab: 'ok' }, { [LAB]: 'sha256:aaa', [recommended]: 'sha256:bbb' });
      inventory = new NodeInventory(cluster, { now: () => clock });
      await inventory.refresh();

      expect(inventory.referencesWithDigest('sha256:aaa', { jupyterlab: 'ok' })).toEqual([LAB]);
      expect(inventory.referencesWithDigest('sha256:bbb', { jupyterlab: 'ok' })).toEqual([]);
      expect(inventory.referencesWithDigest('sha256:aaa', { jupyterlab: 'missing' })).toEqual([]);
    });
  });
});
