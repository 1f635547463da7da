/**
 * prepuller - Core Package
 * Image sources, node inventory, pull orchestration and policy controllers
 * @module @prepuller/core
 */

// Tag grammar
export * from './tags/tag-parser';

// Ports to the outside world
export type { ClusterClient, PullWorkloadSpec } from './cluster/cluster-client';
export type { RegistryClient, RegistryClientFactory } from './registry/registry-client';

// Image sources
export * from './strategies/index';

// Node inventory
export * from './inventory/index';

// Pull orchestration
export * from './pull/index';

// Controllers
export * from './controller/index';
