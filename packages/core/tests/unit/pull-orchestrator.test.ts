/**
 * Unit tests for PullOrchestrator
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { NodeInventory } from '../../src/inventory';
import { PullOrchestrator, pullJobKey, pullWorkloadName } from '../../src/pull';
import { FakeClusterClient } from '../helpers/fakes';

const LAB = 'docker.io/lsstsqre/lab:w_2021_13';
const SELECTOR = { jupyterlab: 'ok' };

describe('pullJobKey', () => {
  it('should key equivalent references and selectors the same way', () => {
    expect(pullJobKey('lsstsqre/lab:w_2021_13', { b: '2', a: '1' })).toBe(pullJobKey(LAB, { a: '1', b: '2' }));
    expect(pullJobKey(LAB, SELECTOR)).toBe(`${LAB}|jupyterlab=ok`);
  });
});

describe('pullWorkloadName', () => {
  it('should embed owner, key hash and attempt', () => {
    expect(pullWorkloadName('jupyter', 'some-key', 3)).toMatch(/^prepull-jupyter-[0-9a-f]{10}-3$/);
  });

  it('should differ per attempt and per key', () => {
    expect(pullWorkloadName('jupyter', 'k1', 1)).not.toBe(pullWorkloadName('jupyter', 'k1', 2));
    expect(pullWorkloadName('jupyter', 'k1', 1)).not.toBe(pullWorkloadName('jupyter', 'k2', 1));
  });

  it('should stay within 63 characters', () => {
    const name = pullWorkloadName('a'.repeat(60), 'key', 1);
    expect(name).toHaveLength(63);
    expect(name.startsWith(`prepull-${'a'.repeat(42)}-`)).toBe(true);
  });

  it('should replace characters that are not allowed in names', () => {
    expect(pullWorkloadName('Lab.Policy', 'key', 1)).toMatch(/^prepull-lab-policy-[0-9a-f]{10}-1$/);
  });
});

describe('PullOrchestrator', () => {
  let cluster: FakeClusterClient;
  let inventory: NodeInventory;
  let orchestrator: PullOrchestrator;

  beforeEach(() => {
    cluster = new FakeClusterClient();
    cluster.addNode('node-a', SELECTOR);
    cluster.addNode('node-b', SELECTOR);
    cluster.addNode('node-c', { role: 'infra' });
    inventory = new NodeInventory(cluster);
    orchestrator = new PullOrchestrator({ cluster, inventory, pollIntervalMs: 1 });
  });

  function request(owner = 'jupyter', targetNodes = 2) {
    return { owner, image: LAB, labelSelector: SELECTOR, targetNodes };
  }

  it('should create a scoped workload, wait for it and delete it', async () => {
    const handle = orchestrator.ensurePulled(request());

    const job = await handle.completion;

    expect(job.state).toBe('done');
    expect(job.completedNodeCount).toBe(2);
    expect(job.targetNodeCount).toBe(2);
    expect(job.attempt).toBe(1);
    expect(cluster.created).toEqual([
      { name: job.workloadName, image: LAB, nodeSelector: SELECTOR, policy: 'jupyter' },
    ]);
    expect(cluster.deleted).toEqual([job.workloadName]);
    expect(handle.isTerminal()).toBe(true);
    expect(orchestrator.activeJobs()).toEqual([]);
  });

  it('should report a new job as pending until it is picked up', async () => {
    const handle = orchestrator.ensurePulled(request());

    expect(handle.snapshot().state).toBe('pending');
    expect(cluster.created).toEqual([]);

    await expect(handle.completion).resolves.toMatchObject({ state: 'done' });
  });

  it('should refresh the inventory once the image is pulled', async () => {
    await inventory.refresh();
    expect(inventory.isAvailable(LAB, SELECTOR)).toBe(false);

    await orchestrator.ensurePulled(request()).completion;

    expect(inventory.isAvailable(LAB, SELECTOR)).toBe(true);
    expect(inventory.isAvailable(LAB, { role: 'infra' })).toBe(false);
  });

  it('should coalesce requests for the same image and selector', async () => {
    const first = orchestrator.ensurePulled(request('jupyter'));
    const second = orchestrator.ensurePulled({ ...request('notebooks'), image: 'lsstsqre/lab:w_2021_13' });

    expect(second.id).toBe(first.id);
    expect(orchestrator.find(LAB, SELECTOR)?.id).toBe(first.id);

    await first.completion;
    expect(cluster.created).toHaveLength(1);
  });

  it('should fail the attempt when the workload cannot be created and retry with a new attempt', async () => {
    cluster.createError = new Error('quota exceeded');

    const failed = await orchestrator.ensurePulled(request()).completion;

    expect(failed.state).toBe('failed');
    expect(failed.lastError).toBe(`Failed to create pull workload ${failed.workloadName}: quota exceeded`);

    cluster.createError = null;
    const retried = await orchestrator.ensurePulled(request()).completion;

    expect(retried.state).toBe('done');
    expect(retried.attempt).toBe(2);
    expect(retried.workloadName).toMatch(/-2$/);
    expect(retried.workloadName).not.toBe(failed.workloadName);
  });

  it('should time out when pods never become ready', async () => {
    cluster.completePulls = false;
    orchestrator = new PullOrchestrator({ cluster, inventory, pollIntervalMs: 1, timeoutMs: 5 });

    const job = await orchestrator.ensurePulled(request()).completion;

    expect(job.state).toBe('failed');
    expect(job.lastError).toBe(`Pull of ${LAB} timed out after 5ms (0/2 nodes ready)`);
    expect(cluster.deleted).toEqual([job.workloadName]);
  });

  it('should tolerate transient status errors', async () => {
    cluster.statusError = new Error('etcd timeout');
    const handle = orchestrator.ensurePulled(request());

    await vi.waitFor(() => expect(handle.snapshot().state).toBe('waiting'));
    cluster.statusError = null;

    await expect(handle.completion).resolves.toMatchObject({ state: 'done' });
  });

  it('should fail without creating anything when no node is targeted', async () => {
    const job = await orchestrator.ensurePulled(request('jupyter', 0)).completion;

    expect(job.state).toBe('failed');
    expect(job.lastError).toBe(`No nodes match the selector for ${LAB}`);
    expect(cluster.created).toEqual([]);
  });

  describe('release', () => {
    it('should cancel a job nobody wants any more', async () => {
      cluster.completePulls = false;
      const handle = orchestrator.ensurePulled(request());
      await vi.waitFor(() => expect(handle.snapshot().state).toBe('waiting'));

      orchestrator.release('jupyter');
      const job = await handle.completion;

      expect(job.state).toBe('failed');
      expect(job.lastError).toBe(`Pull of ${LAB} was cancelled`);
      expect(cluster.deleted).toEqual([job.workloadName]);
    });

    it('should start a fresh attempt instead of joining a cancelled job', async () => {
      cluster.completePulls = false;
      const first = orchestrator.ensurePulled(request('jupyter'));
      await vi.waitFor(() => expect(first.snapshot().state).toBe('waiting'));

      orchestrator.release('jupyter');
      const second = orchestrator.ensurePulled(request('notebooks'));

      expect(second.id).not.toBe(first.id);
      expect(second.snapshot().state).toBe('pending');
      await expect(first.completion).resolves.toMatchObject({
        state: 'failed',
        lastError: `Pull of ${LAB} was cancelled`,
      });

      cluster.completePulls = true;
      const job = await second.completion;
      expect(job.state).toBe('done');
      expect(job.attempt).toBe(2);
      expect(cluster.created).toHaveLength(2);
    });

    it('should not create a workload for a job released before it started', async () => {
      const handle = orchestrator.ensurePulled(request());
      orchestrator.release('jupyter');

      await expect(handle.completion).resolves.toMatchObject({ state: 'failed' });
      expect(cluster.created).toEqual([]);
    });

    it('should keep a job another owner still wants', async () => {
      const handle = orchestrator.ensurePulled(request('jupyter'));
      orchestrator.ensurePulled(request('notebooks'));

      orchestrator.release('jupyter');

      await expect(handle.completion).resolves.toMatchObject({ state: 'done' });
    });
  });

  describe('shutdown', () => {
    it('should cancel running jobs and refuse new ones', async () => {
      cluster.completePulls = false;
      const handle = orchestrator.ensurePulled(request());

      await orchestrator.shutdown();

      expect(handle.snapshot().state).toBe('failed');
      const late = await orchestrator.ensurePulled(request()).completion;
      expect(late.state).toBe('failed');
      expect(late.lastError).toBe(`Pull of ${LAB} was cancelled`);
    });
  });
});
