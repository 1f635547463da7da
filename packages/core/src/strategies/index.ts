export type { ImageSourceStrategy } from './image-source-strategy';
export { PinnedListStrategy } from './pinned-list-strategy';
export {
  TagClassifyingStrategy,
  DEFAULT_REGISTRY_HOST,
  type TagClassifyingStrategyOptions,
} from './tag-classifying-strategy';
export { createStrategy, createStrategies, type StrategyDependencies } from './strategy-factory';
