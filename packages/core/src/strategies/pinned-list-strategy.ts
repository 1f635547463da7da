/**
 * Static image list
 * @module @prepuller/core/strategies/pinned-list-strategy
 */

import {
  ConfigError,
  toConfigErrorDetails,
  validatePinnedListConfig,
  type ResolvedImages,
  type PinnedImage,
  type PinnedListStrategyConfig,
} from '@prepuller/shared';
import type { ImageSourceStrategy } from './image-source-strategy';

/**
 * Returns its configured images verbatim, in order, as both the cached and
 * the listed set. Never fails at resolve time.
 */
export class PinnedListStrategy implements ImageSourceStrategy {
  readonly type = 'PinnedListStrategy' as const;
  readonly description: string;
  private readonly images: readonly PinnedImage[];

  /**
   * @throws {ConfigError} When the image list is malformed
   */
  constructor(config: PinnedListStrategyConfig) {
    const errors = validatePinnedListConfig({ ...config }, 'config');
    if (errors.length > 0) {
      throw ConfigError.multiple(toConfigErrorDetails(errors));
    }
    this.images = config.images.map((image) => ({ ...image }));
    this.description = `PinnedListStrategy(${this.images.length} images)`;
  }

  async resolve(): Promise<ResolvedImages> {
    const images = this.images.map((image) => ({
      displayName: image.name,
      imageReference: image.imageUrl,
    }));
    return { images, all: images.map((image) => ({ ...image })) };
  }
}
