/**
 * Image source strategy contract
 * @module @prepuller/core/strategies/image-source-strategy
 */

import type { ResolvedImages, StrategyType } from '@prepuller/shared';

/**
 * What a strategy may ask about the nodes' shared image cache
 */
export interface ResolveContext {
  /** Normalized references cached on every targeted node with this content digest */
  cachedReferencesWithDigest(digest: string): string[];
}

/**
 * Produces the images a policy wants cached.
 *
 * `resolve()` rejects with `SourceUnavailableError` when its backing data
 * cannot be read this tick; the controller skips it and tries again next tick.
 */
export interface ImageSourceStrategy {
  readonly type: StrategyType;
  /** Short label for logs and status, e.g. `TagClassifyingStrategy(lsstsqre/sciplat-lab)` */
  readonly description: string;
  resolve(context?: ResolveContext): Promise<ResolvedImages>;
}
