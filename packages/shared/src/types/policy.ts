/**
 * Cache policy and image source configuration types
 * @module @prepuller/shared/types/policy
 */

import type { Labels } from './labels';

/**
 * Strategy type discriminators
 */
export type StrategyType = 'PinnedListStrategy' | 'TagClassifyingStrategy';

/**
 * All strategy type names
 */
export const STRATEGY_TYPES: readonly StrategyType[] = ['PinnedListStrategy', 'TagClassifyingStrategy'];

/**
 * One entry of a pinned image list
 */
export interface PinnedImage {
  /** Display name */
  name: string;
  /** Image reference to pull */
  imageUrl: string;
}

/**
 * Static, ordered list of images
 */
export interface PinnedListStrategyConfig {
  type: 'PinnedListStrategy';
  images: PinnedImage[];
}

/**
 * Images chosen by classifying a repository's tags
 */
export interface TagClassifyingStrategyConfig {
  type: 'TagClassifyingStrategy';
  /** Repository to inspect, e.g. `lsstsqre/sciplat-lab` */
  repo: string;
  /** Registry host; Docker Hub when omitted */
  registryUrl?: string;
  /** Tag always pulled in addition to the enumerated ones */
  recommendedTag?: string;
  numReleases: number;
  numWeeklies: number;
  numDailies: number;
  /** Only tags built for this cycle are candidates */
  cycle?: number;
  /** Tags treated as aliases and never enumerated */
  aliasTags?: string[];
}

/**
 * Strategy configuration, tagged on `type`
 */
export type StrategyConfig = PinnedListStrategyConfig | TagClassifyingStrategyConfig;

/**
 * A named cache policy
 *
 * @example
 * {
 *   name: 'jupyter',
 *   labelSelector: { jupyterlab: 'ok' },
 *   strategies: [{ type: 'PinnedListStrategy', images: [{ name: 'Lab', imageUrl: 'lsstsqre/lab:w_2021_13' }] }]
 * }
 */
export interface CachePolicySpec {
  /** Unique, immutable identifier */
  name: string;
  /** Nodes carrying all of these labels are targeted */
  labelSelector: Labels;
  /** Image sources, resolved in order */
  strategies: StrategyConfig[];
}

/**
 * Type guard for pinned list configuration
 */
export function isPinnedListConfig(config: StrategyConfig): config is PinnedListStrategyConfig {
  return config.type === 'PinnedListStrategy';
}

/**
 * Type guard for tag classifying configuration
 */
export function isTagClassifyingConfig(config: StrategyConfig): config is TagClassifyingStrategyConfig {
  return config.type === 'TagClassifyingStrategy';
}
