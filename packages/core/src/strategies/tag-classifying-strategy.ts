/**
 * Images chosen from a repository's tags
 * @module @prepuller/core/strategies/tag-classifying-strategy
 */

import {
  ConfigError,
  SourceUnavailableError,
  createServiceLogger,
  imageRepositoryKey,
  isSourceUnavailableError,
  toConfigErrorDetails,
  validateTagClassifyingConfig,
  type DesiredImage,
  type ImageCategory,
  type Logger,
  type ResolvedImages,
  type TagClassifyingStrategyConfig,
} from '@prepuller/shared';
import type { RegistryClient } from '../registry/registry-client';
import { classOf, compareTagsDescending, parseTag, type ParsedTag } from '../tags/tag-parser';
import type { ImageSourceStrategy, ResolveContext } from './image-source-strategy';

/**
 * Registry used when a strategy names none
 */
export const DEFAULT_REGISTRY_HOST = 'registry.hub.docker.com';

/**
 * Tag classifying strategy options
 */
export interface TagClassifyingStrategyOptions {
  /** Registry host used when the config names none */
  defaultRegistryHost?: string;
  logger?: Logger;
}

type EnumeratedClass = 'release' | 'weekly' | 'daily';

const ENUMERATED: readonly EnumeratedClass[] = ['release', 'weekly', 'daily'];

/**
 * Picks the newest releases, weeklies and dailies of a repository, plus an
 * optional recommended tag.
 *
 * Result order: releases, weeklies, dailies, recommended.
 */
export class TagClassifyingStrategy implements ImageSourceStrategy {
  readonly type = 'TagClassifyingStrategy' as const;
  readonly description: string;
  readonly registryHost: string;
  private readonly config: TagClassifyingStrategyConfig;
  private readonly registry: RegistryClient;
  private readonly aliasTags: readonly string[];
  private readonly logger: Logger;

  /**
   * @throws {ConfigError} When the configuration is malformed
   */
  constructor(
    config: TagClassifyingStrategyConfig,
    registry: RegistryClient,
    options: TagClassifyingStrategyOptions = {},
  ) {
    const errors = validateTagClassifyingConfig({ ...config }, 'config');
    if (errors.length > 0) {
      throw ConfigError.multiple(toConfigErrorDetails(errors));
    }

    this.config = { ...config, aliasTags: [...(config.aliasTags ?? [])] };
    this.registry = registry;
    this.registryHost = config.registryUrl ?? options.defaultRegistryHost ?? DEFAULT_REGISTRY_HOST;
    this.description = `TagClassifyingStrategy(${config.repo})`;

    const aliases = new Set(config.aliasTags ?? []);
    if (config.recommendedTag) {
      aliases.add(config.recommendedTag);
    }
    this.aliasTags = [...aliases];

    this.logger = (options.logger ?? createServiceLogger({ service: 'prepuller' }))
      .child({ component: 'tag-classifying-strategy', repository: config.repo });
  }

  /**
   * The recommended entry is named after every other tag known to point at
   * the same digest: selected images first, then tags of this repository the
   * nodes already cache under that digest.
   */
  async resolve(context?: ResolveContext): Promise<ResolvedImages> {
    const { repo } = this.config;
    const tags = await this.guard(() => this.registry.listTags(repo));
    this.logger.debug('Registry returned tags', { count: tags.length });

    const selected = this.select(tags);
    const images: DesiredImage[] = [];

    for (const cls of ENUMERATED) {
      for (const parsed of selected[cls]) {
        const digest = await this.guard(() => this.registry.resolveDigest(repo, parsed.tag));
        images.push(this.toImage(parsed.tag, parsed.displayName, cls, digest));
      }
    }

    const { recommendedTag } = this.config;
    if (recommendedTag) {
      const digest = await this.guard(() => this.registry.resolveDigest(repo, recommendedTag));
      const aka = this.knownNamesFor(digest, images, context);
      const displayName = aka.length > 0 ? `Recommended (${aka.join(',')})` : 'Recommended';
      images.push(this.toImage(recommendedTag, displayName, 'recommended', digest));
    }

    this.logger.debug('Resolved desired images', {
      images: images.map((image) => image.imageReference),
    });

    const all = [...tags]
      .sort()
      .reverse()
      .map((tag) => ({ displayName: tag, imageReference: this.referenceFor(tag) }));
    return { images, all };
  }

  private knownNamesFor(digest: string, images: readonly DesiredImage[], context?: ResolveContext): string[] {
    const names = images
      .filter((image) => image.digest === digest)
      .map((image) => image.displayName);

    const prefix = `${imageRepositoryKey(this.referenceFor('latest'))}:`;
    for (const reference of context?.cachedReferencesWithDigest(digest) ?? []) {
      const tag = reference.startsWith(prefix) ? reference.slice(prefix.length) : '';
      if (tag === '' || tag.includes('@') || tag === this.config.recommendedTag) {
        continue;
      }
      const name = parseTag(tag, this.aliasTags).displayName;
      if (!names.includes(name)) {
        names.push(name);
      }
    }
    return names;
  }

  /**
   * Classify, filter by cycle, sort newest first and cut to the configured counts
   */
  select(tags: readonly string[]): Record<EnumeratedClass, ParsedTag[]> {
    const buckets: Record<EnumeratedClass, ParsedTag[]> = { release: [], weekly: [], daily: [] };
    const { cycle } = this.config;

    for (const tag of tags) {
      const parsed = parseTag(tag, this.aliasTags);
      const cls = classOf(parsed);
      if (cls === 'alias' || cls === 'unrecognized') {
        continue;
      }
      if (cycle !== undefined && parsed.cycle !== cycle) {
        continue;
      }
      buckets[cls].push(parsed);
    }

    const limits: Record<EnumeratedClass, number> = {
      release: this.config.numReleases,
      weekly: this.config.numWeeklies,
      daily: this.config.numDailies,
    };

    for (const cls of ENUMERATED) {
      buckets[cls] = buckets[cls].sort(compareTagsDescending).slice(0, limits[cls]);
    }
    return buckets;
  }

  private toImage(tag: string, displayName: string, category: ImageCategory, digest: string): DesiredImage {
    return {
      displayName,
      imageReference: this.referenceFor(tag),
      category,
      digest,
    };
  }

  private referenceFor(tag: string): string {
    return `${this.registryHost}/${this.config.repo}:${tag}`;
  }

  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isSourceUnavailableError(error)) {
        throw error;
      }
      throw SourceUnavailableError.unreachable(
        this.config.repo,
        error instanceof Error ? error : new Error(String(error)),
      );
    }
  }
}
