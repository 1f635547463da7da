/**
 * Cache Policy Controller
 * @module @prepuller/core/controller/cache-policy-controller
 *
 * Reconciles one cache policy on a timer:
 * 1. Resolve every image source and merge the results
 * 2. Refresh the node inventory and check availability on the targeted nodes
 * 3. Pull missing images one at a time
 * 4. Publish the derived status
 */

import { shallowRef, type ShallowRef } from '@vue/reactivity';
import {
  createInitialStatus,
  createServiceLogger,
  errorMessage,
  formatLabelSelector,
  normalizeImageReference,
  type AvailabilityMode,
  type CachePolicySpec,
  type CachePolicyStatus,
  type DesiredImage,
  type Logger,
  type PullJob,
  type ResolvedImages,
  type SourceErrorEntry,
} from '@prepuller/shared';
import type { ImageSourceStrategy, ResolveContext } from '../strategies/image-source-strategy';
import type { NodeInventory } from '../inventory/node-inventory';
import type { PullJobHandle, PullOrchestrator } from '../pull/pull-orchestrator';

/**
 * Cache policy controller options
 */
export interface CachePolicyControllerOptions {
  spec: CachePolicySpec;
  strategies: ImageSourceStrategy[];
  inventory: NodeInventory;
  orchestrator: PullOrchestrator;
  /** Interval between reconciliation runs in milliseconds (default: 60000) */
  reconcileIntervalMs?: number;
  /** How many targeted nodes must hold an image (default: all) */
  availabilityMode?: AvailabilityMode;
  /** Clock, overridable in tests */
  now?: () => number;
  logger?: Logger;
}

interface ResolvedSources {
  desired: DesiredImage[];
  all: DesiredImage[];
  sourceErrors: SourceErrorEntry[];
}

/**
 * Keeps one policy's desired images present on its nodes
 */
export class CachePolicyController {
  readonly name: string;
  readonly spec: Readonly<CachePolicySpec>;
  private readonly strategies: readonly ImageSourceStrategy[];
  private readonly inventory: NodeInventory;
  private readonly orchestrator: PullOrchestrator;
  private readonly reconcileIntervalMs: number;
  private readonly availabilityMode: AvailabilityMode;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly published: ShallowRef<CachePolicyStatus>;
  /** Latest pull handle per normalized image reference */
  private readonly handles = new Map<string, PullJobHandle>();
  private intervalTimer: NodeJS.Timeout | null = null;
  private isRunning = false;
  private stopped = false;
  private inFlight: Promise<CachePolicyStatus> | null = null;
  /** Settles once stop() is called; a tick stops waiting on shared pulls */
  private readonly stopSignal: Promise<null>;
  private signalStop: () => void = () => undefined;

  constructor(options: CachePolicyControllerOptions) {
    this.spec = Object.freeze({
      name: options.spec.name,
      labelSelector: Object.freeze({ ...options.spec.labelSelector }),
      strategies: options.spec.strategies.map((strategy) => ({ ...strategy })),
    });
    this.name = this.spec.name;
    this.strategies = [...options.strategies];
    this.inventory = options.inventory;
    this.orchestrator = options.orchestrator;
    this.reconcileIntervalMs = options.reconcileIntervalMs ?? 60000;
    this.availabilityMode = options.availabilityMode ?? 'all';
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? createServiceLogger({ service: 'prepuller' }))
      .child({ component: 'cache-policy-controller' })
      .forPolicy(this.name);
    this.published = shallowRef(createInitialStatus(this.name, this.spec.labelSelector));
    this.stopSignal = new Promise<null>((resolve) => {
      this.signalStop = () => resolve(null);
    });
  }

  /**
   * Whether the reconciliation loop is running
   */
  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Start the reconciliation loop
   */
  start(): void {
    if (this.isRunning) {
      this.logger.warn('Cache policy controller is already running');
      return;
    }
    if (this.stopped) {
      this.logger.warn('Cache policy controller was stopped and cannot be restarted');
      return;
    }

    this.isRunning = true;
    this.logger.info('Starting cache policy controller', {
      interval: this.reconcileIntervalMs,
      selector: formatLabelSelector(this.spec.labelSelector),
      strategies: this.strategies.map((strategy) => strategy.description),
    });

    // Run immediately, then on interval
    void this.runReconcileLoop();

    this.intervalTimer = setInterval(() => {
      void this.runReconcileLoop();
    }, this.reconcileIntervalMs);
  }

  /**
   * Stop the loop. An in-flight tick stops before its next pull, stops
   * waiting on the current one and the controller's pull jobs are released.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.isRunning = false;
    this.signalStop();

    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }

    this.orchestrator.release(this.name);

    if (this.inFlight) {
      await this.inFlight;
    }

    this.logger.info('Cache policy controller stopped');
  }

  /**
   * Current status. Pull job snapshots are read live.
   */
  status(): CachePolicyStatus {
    return {
      ...this.published.value,
      pulling: this.pullingJobs(),
    };
  }

  /**
   * Every image the strategies listed on the last tick
   */
  allImages(): DesiredImage[] {
    return [...this.published.value.all];
  }

  /**
   * Images the strategies produced on the last tick
   */
  desired(): DesiredImage[] {
    return [...this.published.value.desired];
  }

  /**
   * Desired images present on the targeted nodes as of the last tick
   */
  available(): DesiredImage[] {
    return [...this.published.value.available];
  }

  /**
   * Run one reconciliation tick. A call made while a tick is running
   * shares that tick.
   */
  reconcile(): Promise<CachePolicyStatus> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const tick = this.reconcileOnce().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = tick;
    return tick;
  }

  /**
   * Timer entry point; overlapping ticks are skipped and nothing escapes
   */
  private async runReconcileLoop(): Promise<void> {
    if (this.inFlight) {
      this.logger.debug('Skipping reconcile cycle - previous cycle still running');
      return;
    }

    try {
      await this.reconcile();
    } catch (error) {
      this.logger.error('Error in reconcile cycle', error instanceof Error ? error : undefined);
    }
  }

  private async reconcileOnce(): Promise<CachePolicyStatus> {
    const sources = await this.resolveSources();

    let lastError: string | undefined;
    try {
      await this.inventory.refresh();
    } catch (error) {
      lastError = errorMessage(error);
      this.logger.warn('Inventory refresh failed, using previous snapshot', { error: lastError });
    }

    this.forgetUndesired(sources.desired);
    this.publish(sources, lastError);

    const targetNodes = this.inventory.nodesMatching(this.spec.labelSelector).length;
    if (targetNodes === 0) {
      this.logger.debug('No nodes match the selector, nothing to pull');
    }

    for (const image of sources.desired) {
      if (this.stopped) {
        break;
      }
      if (targetNodes === 0 || this.isAvailable(image)) {
        continue;
      }

      const handle = this.orchestrator.ensurePulled({
        owner: this.name,
        image: image.imageReference,
        labelSelector: { ...this.spec.labelSelector },
        targetNodes,
      });
      this.handles.set(normalizeImageReference(image.imageReference), handle);
      this.publish(sources, lastError);

      // Other policies may still hold the job after this one lets go of it
      const job = await Promise.race([handle.completion, this.stopSignal]);
      if (job === null) {
        this.logger.debug('Stopped while pulling', { image: image.imageReference, jobId: handle.id });
        break;
      }
      this.logPullResult(image, job);
      this.publish(sources, lastError);
    }

    return this.publish(sources, lastError, new Date(this.now()));
  }

  /**
   * Resolve every strategy; failures are recorded and skipped.
   * Duplicates by normalized reference keep the first occurrence.
   */
  private async resolveSources(): Promise<ResolvedSources> {
    const desired: DesiredImage[] = [];
    const all: DesiredImage[] = [];
    const sourceErrors: SourceErrorEntry[] = [];
    const seen = new Set<string>();
    const listed = new Set<string>();
    const context: ResolveContext = {
      cachedReferencesWithDigest: (digest) => this.inventory.referencesWithDigest(digest, this.spec.labelSelector),
    };

    for (const strategy of this.strategies) {
      let resolved: ResolvedImages;
      try {
        resolved = await strategy.resolve(context);
      } catch (error) {
        const message = errorMessage(error);
        sourceErrors.push({ strategy: strategy.description, message });
        this.logger.warn('Image source unavailable, skipping for this tick', {
          strategy: strategy.description,
          error: message,
        });
        continue;
      }

      appendUnique(desired, resolved.images, seen);
      appendUnique(all, resolved.all, listed);
    }

    return { desired, all, sourceErrors };
  }

  private isAvailable(image: DesiredImage): boolean {
    return this.inventory.isAvailable(image, this.spec.labelSelector, this.availabilityMode);
  }

  /**
   * Drop handles for images that are no longer desired
   */
  private forgetUndesired(desired: readonly DesiredImage[]): void {
    const wanted = new Set(desired.map((image) => normalizeImageReference(image.imageReference)));
    for (const key of [...this.handles.keys()]) {
      if (!wanted.has(key)) {
        this.handles.delete(key);
      }
    }
  }

  /**
   * Running and failed jobs; finished ones drop out
   */
  private pullingJobs(): PullJob[] {
    const jobs: PullJob[] = [];
    for (const handle of this.handles.values()) {
      const job = handle.snapshot();
      if (job.state !== 'done') {
        jobs.push(job);
      }
    }
    return jobs;
  }

  private publish(
    { desired, all, sourceErrors }: ResolvedSources,
    lastError: string | undefined,
    reconciledAt?: Date,
  ): CachePolicyStatus {
    const previous = this.published.value;
    const status: CachePolicyStatus = {
      name: this.name,
      labelSelector: { ...this.spec.labelSelector },
      desired: [...desired],
      all: [...all],
      pulling: this.pullingJobs(),
      available: desired.filter((image) => this.isAvailable(image)),
      availableReferences: [...this.inventory.imagesAvailableFor(this.spec.labelSelector)].sort(),
      targetNodeCount: this.inventory.nodesMatching(this.spec.labelSelector).length,
      sourceErrors: [...sourceErrors],
      ...(lastError !== undefined && { lastError }),
    };
    const lastReconciledAt = reconciledAt ?? previous.lastReconciledAt;
    if (lastReconciledAt) {
      status.lastReconciledAt = lastReconciledAt;
    }

    this.published.value = status;
    return status;
  }

  private logPullResult(image: DesiredImage, job: PullJob): void {
    if (job.state === 'done') {
      this.logger.info('Image cached', { image: image.imageReference, nodes: job.completedNodeCount });
    } else {
      this.logger.warn('Image pull did not complete, will retry next tick', {
        image: image.imageReference,
        error: job.lastError,
      });
    }
  }
}

function appendUnique(target: DesiredImage[], images: readonly DesiredImage[], seen: Set<string>): void {
  for (const image of images) {
    const key = normalizeImageReference(image.imageReference);
    if (!seen.has(key)) {
      seen.add(key);
      target.push(image);
    }
  }
}
