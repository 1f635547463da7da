/**
 * Builds strategies from their configuration
 * @module @prepuller/core/strategies/strategy-factory
 */

import type { Logger, StrategyConfig } from '@prepuller/shared';
import type { RegistryClientFactory } from '../registry/registry-client';
import type { ImageSourceStrategy } from './image-source-strategy';
import { PinnedListStrategy } from './pinned-list-strategy';
import { DEFAULT_REGISTRY_HOST, TagClassifyingStrategy } from './tag-classifying-strategy';

/**
 * What strategies need from their surroundings
 */
export interface StrategyDependencies {
  registryClientFor: RegistryClientFactory;
  defaultRegistryHost?: string;
  logger?: Logger;
}

/**
 * Build one strategy
 *
 * @throws {ConfigError} When the configuration is malformed
 */
export function createStrategy(config: StrategyConfig, deps: StrategyDependencies): ImageSourceStrategy {
  switch (config.type) {
    case 'PinnedListStrategy':
      return new PinnedListStrategy(config);
    case 'TagClassifyingStrategy': {
      const host = config.registryUrl ?? deps.defaultRegistryHost ?? DEFAULT_REGISTRY_HOST;
      return new TagClassifyingStrategy(config, deps.registryClientFor(host), {
        defaultRegistryHost: host,
        logger: deps.logger,
      });
    }
  }
}

/**
 * Build every strategy of a policy, in order
 */
export function createStrategies(configs: readonly StrategyConfig[], deps: StrategyDependencies): ImageSourceStrategy[] {
  return configs.map((config) => createStrategy(config, deps));
}
