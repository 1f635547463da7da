/**
 * Cluster-wide node image inventory
 * @module @prepuller/core/inventory/node-inventory
 */

import { computed, shallowRef, type ComputedRef, type ShallowRef } from '@vue/reactivity';
import {
  ClusterApiError,
  createServiceLogger,
  matchesLabels,
  normalizeImageReference,
  type AvailabilityMode,
  type DesiredImage,
  type Labels,
  type Logger,
  type NodeRecord,
} from '@prepuller/shared';
import type { ClusterClient } from '../cluster/cluster-client';

/**
 * Immutable view of the cluster at one point in time
 */
export interface InventorySnapshot {
  readonly nodes: readonly NodeRecord[];
  /** When the snapshot was taken; null before the first refresh */
  readonly refreshedAt: Date | null;
}

/**
 * Node inventory options
 */
export interface NodeInventoryOptions {
  /** A refresh younger than this is reused (default: 5000) */
  maxAgeMs?: number;
  /** Clock, overridable in tests */
  now?: () => number;
  logger?: Logger;
}

const EMPTY_SNAPSHOT: InventorySnapshot = Object.freeze({ nodes: Object.freeze([]), refreshedAt: null });

/**
 * Single scanning path for node images, shared by every controller.
 *
 * The snapshot is replaced wholesale on refresh, so readers never observe a
 * partially updated node list.
 */
export class NodeInventory {
  private readonly cluster: ClusterClient;
  private readonly maxAgeMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly current: ShallowRef<InventorySnapshot> = shallowRef(EMPTY_SNAPSHOT);
  private inFlight: Promise<void> | null = null;
  private lastRefreshAt: number | null = null;
  /** Bumped by invalidate(); a refresh started before the bump does not count as fresh */
  private generation = 0;

  /** Number of nodes in the current snapshot */
  readonly nodeCount: ComputedRef<number> = computed(() => this.current.value.nodes.length);

  constructor(cluster: ClusterClient, options: NodeInventoryOptions = {}) {
    this.cluster = cluster;
    this.maxAgeMs = options.maxAgeMs ?? 5000;
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? createServiceLogger({ service: 'prepuller' }))
      .child({ component: 'node-inventory' });
  }

  /**
   * Current snapshot
   */
  get snapshot(): InventorySnapshot {
    return this.current.value;
  }

  /**
   * Re-list nodes unless a fresh enough snapshot exists.
   * Concurrent callers share one in-flight request.
   *
   * @throws {ClusterApiError} The previous snapshot is kept
   */
  refresh(): Promise<void> {
    if (this.inFlight) {
      return this.inFlight;
    }
    if (this.isFresh()) {
      return Promise.resolve();
    }

    const request = this.load().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = request;
    return request;
  }

  /**
   * Force the next refresh() to hit the cluster
   */
  invalidate(): void {
    this.generation += 1;
    this.lastRefreshAt = null;
  }

  /**
   * Milliseconds since the last successful refresh, null if there was none
   */
  ageMs(): number | null {
    const refreshedAt = this.current.value.refreshedAt;
    return refreshedAt ? this.now() - refreshedAt.getTime() : null;
  }

  /**
   * Nodes whose labels include every selector pair
   */
  nodesMatching(selector: Readonly<Labels>): NodeRecord[] {
    return this.current.value.nodes.filter((node) => matchesLabels(node.labels, selector));
  }

  /**
   * Images present on every node matching the selector.
   * Empty when no node matches.
   */
  imagesAvailableFor(selector: Readonly<Labels>): Set<string> {
    const nodes = this.nodesMatching(selector);
    const [first, ...rest] = nodes;
    if (!first) {
      return new Set();
    }

    const common = new Set(first.presentImages);
    for (const node of rest) {
      for (const image of common) {
        if (!node.presentImages.has(image)) {
          common.delete(image);
        }
      }
    }
    return common;
  }

  /**
   * References cached on every node matching the selector whose copies all
   * carry the given digest, sorted
   */
  referencesWithDigest(digest: string, selector: Readonly<Labels>): string[] {
    const nodes = this.nodesMatching(selector);
    return [...this.imagesAvailableFor(selector)]
      .filter((reference) => nodes.every((node) => node.imageDigests.get(reference) === digest))
      .sort();
  }

  /**
   * Whether an image is on the selected nodes. When the image carries a
   * digest, each node's copy must have that digest too.
   */
  isAvailable(image: DesiredImage | string, selector: Readonly<Labels>, mode: AvailabilityMode = 'all'): boolean {
    const reference = normalizeImageReference(typeof image === 'string' ? image : image.imageReference);
    const digest = typeof image === 'string' ? undefined : image.digest;
    const nodes = this.nodesMatching(selector);
    if (nodes.length === 0) {
      return false;
    }

    const holds = (node: NodeRecord): boolean =>
      node.presentImages.has(reference) &&
      (digest === undefined || node.imageDigests.get(reference) === digest);

    return mode === 'any' ? nodes.some(holds) : nodes.every(holds);
  }

  private isFresh(): boolean {
    return this.lastRefreshAt !== null && this.now() - this.lastRefreshAt < this.maxAgeMs;
  }

  private async load(): Promise<void> {
    const startedGeneration = this.generation;
    let nodes: NodeRecord[];
    try {
      nodes = await this.cluster.listNodes();
    } catch (error) {
      const wrapped = ClusterApiError.from('listNodes', error);
      this.logger.warn('Node listing failed, keeping previous inventory', {
        error: wrapped.message,
        nodes: this.current.value.nodes.length,
      });
      throw wrapped;
    }

    const takenAt = this.now();
    this.current.value = Object.freeze({
      nodes: Object.freeze([...nodes]),
      refreshedAt: new Date(takenAt),
    });
    if (this.generation === startedGeneration) {
      this.lastRefreshAt = takenAt;
    }
    this.logger.debug('Inventory refreshed', { nodes: nodes.length });
  }
}
