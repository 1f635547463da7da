/**
 * Pull orchestration
 * @module @prepuller/core/pull/pull-orchestrator
 *
 * Drives one ephemeral pull workload per (image, label selector) through
 * pending → creating → waiting → deleting → done, or to failed. A job stays
 * pending until its driver picks it up on the next microtask.
 */

import { createHash, randomUUID } from 'crypto';
import {
  ClusterApiError,
  PullFailedError,
  createServiceLogger,
  errorMessage,
  isTerminalPullState,
  normalizeImageReference,
  selectorKey,
  type Labels,
  type Logger,
  type PullJob,
  type PullJobState,
} from '@prepuller/shared';
import type { ClusterClient } from '../cluster/cluster-client';
import type { NodeInventory } from '../inventory/node-inventory';

/**
 * Request to have an image present on selected nodes
 */
export interface PullRequest {
  /** Who wants the image; a policy name */
  owner: string;
  /** Image reference to pull */
  image: string;
  labelSelector: Labels;
  /** Nodes currently matching the selector */
  targetNodes: number;
}

/**
 * Caller's view of a pull job
 */
export interface PullJobHandle {
  readonly id: string;
  /** Normalized image and selector the job is keyed on */
  readonly key: string;
  snapshot(): PullJob;
  isTerminal(): boolean;
  /** Settles (never rejects) once the job reaches done or failed */
  readonly completion: Promise<PullJob>;
}

/**
 * Pull orchestrator options
 */
export interface PullOrchestratorOptions {
  cluster: ClusterClient;
  /** Invalidated and refreshed after every successful pull */
  inventory: NodeInventory;
  /** Delay between workload status reads (default: 5000) */
  pollIntervalMs?: number;
  /** Give up waiting after this long (default: 1200000) */
  timeoutMs?: number;
  /** Clock, overridable in tests */
  now?: () => number;
  logger?: Logger;
}

/**
 * Maximum length of a workload name (DNS-1123 label)
 */
const MAX_WORKLOAD_NAME_LENGTH = 63;

interface JobRecord {
  id: string;
  key: string;
  imageReference: string;
  labelSelector: Labels;
  state: PullJobState;
  targetNodeCount: number;
  completedNodeCount: number;
  lastError?: string;
  workloadName: string;
  attempt: number;
  createdAt: Date;
  updatedAt: Date;
  owners: Set<string>;
  abandoned: boolean;
  /** Cuts a pending poll delay short */
  wake: (() => void) | null;
  completion: Promise<PullJob>;
  settle: (job: PullJob) => void;
}

/**
 * Key a pull on its normalized image and selector
 */
export function pullJobKey(image: string, labelSelector: Readonly<Labels>): string {
  return `${normalizeImageReference(image)}|${selectorKey(labelSelector)}`;
}

/**
 * Workload name for an attempt: `prepull-<policy>-<hash>-<attempt>`,
 * trimmed to a valid DNS label
 */
export function pullWorkloadName(owner: string, key: string, attempt: number): string {
  const hash = createHash('sha256').update(key).digest('hex').slice(0, 10);
  const suffix = `-${hash}-${attempt}`;
  const room = MAX_WORKLOAD_NAME_LENGTH - 'prepull-'.length - suffix.length;
  const policy = owner
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, '-')
    .slice(0, Math.max(room, 0))
    .replace(/-+$/, '');
  return policy ? `prepull-${policy}${suffix}` : `prepull${suffix}`;
}

/**
 * Owns every pull workload this process creates.
 *
 * At most one non-terminal job exists per key; concurrent requests for the
 * same key share it. Failed jobs are not retried here: the next request
 * starts a new attempt.
 */
export class PullOrchestrator {
  private readonly cluster: ClusterClient;
  private readonly inventory: NodeInventory;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly active = new Map<string, JobRecord>();
  private readonly attempts = new Map<string, number>();
  private stopped = false;

  constructor(options: PullOrchestratorOptions) {
    this.cluster = options.cluster;
    this.inventory = options.inventory;
    this.pollIntervalMs = options.pollIntervalMs ?? 5000;
    this.timeoutMs = options.timeoutMs ?? 1_200_000;
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? createServiceLogger({ service: 'prepuller' }))
      .child({ component: 'pull-orchestrator' });
  }

  /**
   * Start a pull, or join the one already running for the same image and selector
   */
  ensurePulled(request: PullRequest): PullJobHandle {
    const key = pullJobKey(request.image, request.labelSelector);
    const existing = this.active.get(key);
    if (existing && !isTerminalPullState(existing.state)) {
      existing.owners.add(request.owner);
      this.logger.debug('Joined running pull', { jobId: existing.id, owner: request.owner });
      return this.handleFor(existing);
    }

    const attempt = (this.attempts.get(key) ?? 0) + 1;
    this.attempts.set(key, attempt);

    const createdAt = new Date(this.now());
    let settle: (job: PullJob) => void = () => undefined;
    const completion = new Promise<PullJob>((resolve) => {
      settle = resolve;
    });
    const record: JobRecord = {
      id: randomUUID(),
      key,
      imageReference: request.image,
      labelSelector: { ...request.labelSelector },
      state: 'pending',
      targetNodeCount: request.targetNodes,
      completedNodeCount: 0,
      workloadName: pullWorkloadName(request.owner, key, attempt),
      attempt,
      createdAt,
      updatedAt: createdAt,
      owners: new Set([request.owner]),
      abandoned: false,
      wake: null,
      completion,
      settle,
    };

    this.active.set(key, record);
    queueMicrotask(() => {
      void this.drive(record);
    });
    return this.handleFor(record);
  }

  /**
   * Drop an owner's interest. Jobs nobody wants any more are cancelled and
   * their workloads removed.
   */
  release(owner: string): void {
    for (const record of [...this.active.values()]) {
      if (record.owners.delete(owner) && record.owners.size === 0) {
        this.abandon(record);
      }
    }
  }

  /**
   * Cancel every running job and wait for their cleanup
   */
  async shutdown(): Promise<void> {
    this.stopped = true;
    const records = [...this.active.values()];
    for (const record of records) {
      record.owners.clear();
      this.abandon(record);
    }
    await Promise.all(records.map((record) => record.completion));
  }

  /**
   * Snapshots of non-terminal jobs
   */
  activeJobs(): PullJob[] {
    return [...this.active.values()].map(toSnapshot);
  }

  /**
   * Handle of the running job for an image and selector, if any
   */
  find(image: string, labelSelector: Readonly<Labels>): PullJobHandle | undefined {
    const record = this.active.get(pullJobKey(image, labelSelector));
    return record ? this.handleFor(record) : undefined;
  }

  private handleFor(record: JobRecord): PullJobHandle {
    return {
      id: record.id,
      key: record.key,
      snapshot: () => toSnapshot(record),
      isTerminal: () => isTerminalPullState(record.state),
      completion: record.completion,
    };
  }

  private async drive(record: JobRecord): Promise<void> {
    try {
      record.settle(await this.run(record));
    } catch (error) {
      this.logger.error('Pull job crashed', error instanceof Error ? error : undefined, { jobId: record.id });
      this.fail(record, PullFailedError.createFailed(
        record.imageReference,
        record.workloadName,
        error instanceof Error ? error : undefined,
      ));
      record.settle(this.finish(record));
    }
  }

  private async run(record: JobRecord): Promise<PullJob> {
    const log = this.logger.forPull({ jobId: record.id, workload: record.workloadName, image: record.imageReference });

    if (this.stopped || record.abandoned) {
      this.fail(record, PullFailedError.cancelled(record.imageReference));
      return this.finish(record);
    }

    if (record.targetNodeCount <= 0) {
      this.fail(record, PullFailedError.noTargets(record.imageReference));
      return this.finish(record);
    }

    this.transition(record, 'creating');
    try {
      await this.cluster.createPullWorkload({
        name: record.workloadName,
        image: record.imageReference,
        nodeSelector: record.labelSelector,
        policy: [...record.owners][0] ?? '',
      });
    } catch (error) {
      const failure = PullFailedError.createFailed(
        record.imageReference,
        record.workloadName,
        error instanceof Error ? error : undefined,
      );
      log.warn('Pull workload creation failed', { error: failure.message });
      if (!record.abandoned) {
        this.fail(record, failure);
      }
      await this.removeWorkload(record, log);
      return this.finish(record);
    }

    if (record.abandoned) {
      await this.removeWorkload(record, log);
      return this.finish(record);
    }

    this.transition(record, 'waiting');
    log.info('Waiting for image pull', { image: record.imageReference, targetNodes: record.targetNodeCount });

    const ready = await this.waitUntilReady(record, log);
    if (!ready) {
      await this.removeWorkload(record, log);
      return this.finish(record);
    }

    this.transition(record, 'deleting');
    await this.removeWorkload(record, log);
    this.transition(record, 'done');
    log.info('Image pulled', { image: record.imageReference, nodes: record.completedNodeCount });

    this.inventory.invalidate();
    try {
      await this.inventory.refresh();
    } catch (error) {
      log.warn('Inventory refresh after pull failed', { error: errorMessage(error) });
    }
    return this.finish(record);
  }

  /**
   * Poll until every scheduled pod is ready. Returns false when the job
   * failed or was abandoned meanwhile.
   */
  private async waitUntilReady(record: JobRecord, log: Logger): Promise<boolean> {
    const deadline = this.now() + this.timeoutMs;

    while (!record.abandoned) {
      try {
        const status = await this.cluster.readPullWorkloadStatus(record.workloadName);
        if (record.abandoned) {
          return false;
        }
        if (status.desiredNumberScheduled > 0) {
          record.targetNodeCount = status.desiredNumberScheduled;
        }
        record.completedNodeCount = status.numberReady;
        record.updatedAt = new Date(this.now());
        if (record.targetNodeCount > 0 && record.completedNodeCount >= record.targetNodeCount) {
          return true;
        }
      } catch (error) {
        log.warn('Transient workload status error', { error: ClusterApiError.from('readPullWorkloadStatus', error).message });
      }

      if (this.now() >= deadline) {
        const failure = PullFailedError.timedOut(
          record.imageReference,
          record.completedNodeCount,
          record.targetNodeCount,
          this.timeoutMs,
        );
        log.warn('Image pull timed out', { error: failure.message });
        this.fail(record, failure);
        return false;
      }

      await this.pause(record);
    }
    return false;
  }

  private pause(record: JobRecord): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        record.wake = null;
        resolve();
      }, this.pollIntervalMs);
      record.wake = () => {
        clearTimeout(timer);
        record.wake = null;
        resolve();
      };
    });
  }

  private abandon(record: JobRecord): void {
    if (record.abandoned || isTerminalPullState(record.state)) {
      return;
    }
    record.abandoned = true;
    if (record.state === 'deleting') {
      // Image is already on the nodes; let the job finish as done
      return;
    }
    this.fail(record, PullFailedError.cancelled(record.imageReference));
    // Cleanup finishes on the detached record; new requests start a fresh attempt
    if (this.active.get(record.key) === record) {
      this.active.delete(record.key);
    }
    this.logger.info('Pull abandoned', { jobId: record.id, image: record.imageReference });
    record.wake?.();
  }

  private async removeWorkload(record: JobRecord, log: Logger): Promise<void> {
    try {
      await this.cluster.deletePullWorkload(record.workloadName);
    } catch (error) {
      log.warn('Pull workload deletion failed', { error: errorMessage(error) });
    }
  }

  private transition(record: JobRecord, state: PullJobState): void {
    if (isTerminalPullState(record.state)) {
      return;
    }
    record.state = state;
    record.updatedAt = new Date(this.now());
  }

  private fail(record: JobRecord, error: PullFailedError): void {
    if (isTerminalPullState(record.state)) {
      return;
    }
    record.state = 'failed';
    record.lastError = error.message;
    record.updatedAt = new Date(this.now());
  }

  private finish(record: JobRecord): PullJob {
    if (this.active.get(record.key) === record) {
      this.active.delete(record.key);
    }
    return toSnapshot(record);
  }
}

function toSnapshot(record: JobRecord): PullJob {
  return {
    id: record.id,
    imageReference: record.imageReference,
    labelSelector: { ...record.labelSelector },
    state: record.state,
    targetNodeCount: record.targetNodeCount,
    completedNodeCount: record.completedNodeCount,
    ...(record.lastError !== undefined && { lastError: record.lastError }),
    workloadName: record.workloadName,
    attempt: record.attempt,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}
