/**
 * Shared types for prepuller
 * @module @prepuller/shared/types
 */

// Label types
export type { Labels } from './labels';

export {
  matchesLabels,
  selectorKey,
  formatLabelSelector,
  parseLabelSelector,
  isValidLabelKey,
  isValidLabelValue,
  validateLabels,
} from './labels';

// Image types
export type { ImageCategory, DesiredImage, ParsedImageReference, ResolvedImages } from './images';

export {
  DOCKER_HUB_REGISTRY,
  isPlaceholderImageName,
  isDockerHubRegistry,
  parseImageReference,
  formatImageReference,
  normalizeImageReference,
  imageRepositoryKey,
} from './images';

// Policy types
export type {
  StrategyType,
  PinnedImage,
  PinnedListStrategyConfig,
  TagClassifyingStrategyConfig,
  StrategyConfig,
  CachePolicySpec,
} from './policy';

export { STRATEGY_TYPES, isPinnedListConfig, isTagClassifyingConfig } from './policy';

// Node types
export type { NodeRecord, AvailabilityMode } from './node';

export { AVAILABILITY_MODES, isAvailabilityMode } from './node';

// Pull job types
export type { PullJobState, PullJob, PullWorkloadStatus } from './pull-job';

export { TERMINAL_PULL_STATES, isTerminalPullState } from './pull-job';

// Status types
export type { SourceErrorEntry, CachePolicyStatus } from './status';

export { createInitialStatus } from './status';

// Version helpers
export type { SemVer } from './version';

export { parseSemVer, formatSemVer, compareSemVer } from './version';
