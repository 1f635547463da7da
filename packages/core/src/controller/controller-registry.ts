/**
 * Controller Registry
 * @module @prepuller/core/controller/controller-registry
 *
 * Process-scoped table of cache policy controllers keyed by policy name.
 */

import { computed, shallowReactive, type ComputedRef } from '@vue/reactivity';
import {
  createServiceLogger,
  ErrorCode,
  parseCachePolicySpec,
  PrepullError,
  type AvailabilityMode,
  type CachePolicyStatus,
  type Labels,
  type Logger,
} from '@prepuller/shared';
import type { NodeInventory } from '../inventory/node-inventory';
import type { PullOrchestrator } from '../pull/pull-orchestrator';
import { createStrategies, type StrategyDependencies } from '../strategies/strategy-factory';
import { CachePolicyController } from './cache-policy-controller';

/**
 * Controller registry options
 */
export interface ControllerRegistryOptions {
  inventory: NodeInventory;
  orchestrator: PullOrchestrator;
  strategies: StrategyDependencies;
  /** Reconcile interval for every controller (default: 60000) */
  reconcileIntervalMs?: number;
  availabilityMode?: AvailabilityMode;
  /** Start controllers on creation (default: true) */
  autoStart?: boolean;
  logger?: Logger;
}

/**
 * Creates, looks up and stops cache policy controllers
 */
export class ControllerRegistry {
  readonly inventory: NodeInventory;
  /** Number of registered policies */
  readonly policyCount: ComputedRef<number>;
  private readonly orchestrator: PullOrchestrator;
  private readonly strategyDeps: StrategyDependencies;
  private readonly reconcileIntervalMs: number | undefined;
  private readonly availabilityMode: AvailabilityMode | undefined;
  private readonly autoStart: boolean;
  private readonly logger: Logger;
  private readonly controllers = shallowReactive(new Map<string, CachePolicyController>());

  constructor(options: ControllerRegistryOptions) {
    this.inventory = options.inventory;
    this.orchestrator = options.orchestrator;
    this.strategyDeps = options.strategies;
    this.reconcileIntervalMs = options.reconcileIntervalMs;
    this.availabilityMode = options.availabilityMode;
    this.autoStart = options.autoStart ?? true;
    this.logger = (options.logger ?? createServiceLogger({ service: 'prepuller' }))
      .child({ component: 'controller-registry' });
    this.policyCount = computed(() => this.controllers.size);
  }

  /**
   * Validate a policy, build its strategies and start its controller
   *
   * @throws {ConfigError} When the policy is malformed
   * @throws {PrepullError} ALREADY_EXISTS when the name is taken
   */
  create(input: unknown): CachePolicyController {
    const spec = parseCachePolicySpec(input);

    if (this.controllers.has(spec.name)) {
      throw new PrepullError(`Cache policy "${spec.name}" already exists`, ErrorCode.ALREADY_EXISTS, {
        resourceType: 'cache-policy',
        resourceId: spec.name,
      });
    }

    const strategies = createStrategies(spec.strategies, {
      ...this.strategyDeps,
      logger: this.strategyDeps.logger ?? this.logger,
    });

    const controller = new CachePolicyController({
      spec,
      strategies,
      inventory: this.inventory,
      orchestrator: this.orchestrator,
      reconcileIntervalMs: this.reconcileIntervalMs,
      availabilityMode: this.availabilityMode,
      logger: this.logger,
    });

    this.controllers.set(spec.name, controller);
    this.logger.info('Cache policy created', { policy: spec.name, strategies: strategies.length });

    if (this.autoStart) {
      controller.start();
    }

    return controller;
  }

  get(name: string): CachePolicyController | undefined {
    return this.controllers.get(name);
  }

  has(name: string): boolean {
    return this.controllers.has(name);
  }

  /**
   * Registered policy names in creation order
   */
  list(): string[] {
    return [...this.controllers.keys()];
  }

  status(name: string): CachePolicyStatus | undefined {
    return this.controllers.get(name)?.status();
  }

  /**
   * Stop and remove a policy. Returns false when it does not exist.
   */
  async delete(name: string): Promise<boolean> {
    const controller = this.controllers.get(name);
    if (!controller) {
      return false;
    }

    this.controllers.delete(name);
    await controller.stop();
    this.logger.info('Cache policy deleted', { policy: name });
    return true;
  }

  /**
   * Normalized references present on every node matching the selector,
   * from the current inventory snapshot
   */
  availableFor(selector: Readonly<Labels>): string[] {
    return [...this.inventory.imagesAvailableFor(selector)].sort();
  }

  /**
   * Stop every controller, then the orchestrator
   */
  async shutdown(): Promise<void> {
    const controllers = [...this.controllers.values()];
    this.controllers.clear();
    await Promise.all(controllers.map((controller) => controller.stop()));
    await this.orchestrator.shutdown();
    this.logger.info('Controller registry shut down', { stopped: controllers.length });
  }
}
