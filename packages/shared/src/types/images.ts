/**
 * Image reference types and helpers
 * @module @prepuller/shared/types/images
 */

/**
 * Display grouping for images produced by a tag-classifying source
 */
export type ImageCategory = 'recommended' | 'release' | 'weekly' | 'daily';

/**
 * An image a cache policy wants present on its nodes
 */
export interface DesiredImage {
  /** Human-facing name, e.g. "Weekly 2021_22" */
  displayName: string;
  /** Pullable image reference as produced by the source */
  imageReference: string;
  /** Display grouping only; pinned images carry none */
  category?: ImageCategory;
  /** Content digest (`sha256:...`) when the source resolved one */
  digest?: string;
}

/**
 * What an image source produced on one resolve
 */
export interface ResolvedImages {
  /** Images to keep cached */
  images: DesiredImage[];
  /** Every image the source knows of, for image selection menus; never pulled */
  all: DesiredImage[];
}

/**
 * Image reference split into its parts
 */
export interface ParsedImageReference {
  /** Registry host, `docker.io` for Docker Hub */
  registry: string;
  /** Repository path, with `library/` for official Hub images */
  repository: string;
  /** Tag, `latest` when neither tag nor digest was given */
  tag?: string;
  /** Digest (`sha256:...`) */
  digest?: string;
}

/**
 * Default registry for unqualified references
 */
export const DOCKER_HUB_REGISTRY = 'docker.io';

/**
 * Host names that all address Docker Hub
 */
const DOCKER_HUB_ALIASES = new Set([
  'docker.io',
  'index.docker.io',
  'registry-1.docker.io',
  'registry.hub.docker.com',
]);

/**
 * Node image names the container runtime reports for dangling images
 */
const PLACEHOLDER_NAMES = new Set(['<none>@<none>', '<none>:<none>']);

/**
 * Check whether a reported node image name is a dangling placeholder
 */
export function isPlaceholderImageName(name: string): boolean {
  return PLACEHOLDER_NAMES.has(name);
}

/**
 * Check whether a registry host is one of Docker Hub's names
 */
export function isDockerHubRegistry(host: string): boolean {
  return DOCKER_HUB_ALIASES.has(host.toLowerCase());
}

function looksLikeRegistryHost(segment: string): boolean {
  return segment.includes('.') || segment.includes(':') || segment === 'localhost';
}

/**
 * Parse an image reference of the form
 * `[registry/][namespace/]repository[:tag][@digest]`
 *
 * @throws {Error} When the reference has no repository part
 */
export function parseImageReference(reference: string): ParsedImageReference {
  let rest = reference.trim();
  let digest: string | undefined;
  let tag: string | undefined;

  const atIndex = rest.indexOf('@');
  if (atIndex !== -1) {
    digest = rest.slice(atIndex + 1);
    rest = rest.slice(0, atIndex);
  }

  // A colon after the last slash is a tag; before it, a registry port
  const colonIndex = rest.lastIndexOf(':');
  if (colonIndex !== -1 && colonIndex > rest.lastIndexOf('/')) {
    tag = rest.slice(colonIndex + 1);
    rest = rest.slice(0, colonIndex);
  }

  let registry = DOCKER_HUB_REGISTRY;
  const slashIndex = rest.indexOf('/');
  if (slashIndex !== -1) {
    const first = rest.slice(0, slashIndex);
    if (looksLikeRegistryHost(first)) {
      registry = first.toLowerCase();
      rest = rest.slice(slashIndex + 1);
    }
  }

  if (rest === '' || (tag !== undefined && tag === '') || (digest !== undefined && digest === '')) {
    throw new Error(`Invalid image reference: "${reference}"`);
  }

  if (isDockerHubRegistry(registry)) {
    registry = DOCKER_HUB_REGISTRY;
    if (!rest.includes('/')) {
      rest = `library/${rest}`;
    }
  }

  if (tag === undefined && digest === undefined) {
    tag = 'latest';
  }

  return {
    registry,
    repository: rest,
    ...(tag !== undefined && { tag }),
    ...(digest !== undefined && { digest }),
  };
}

/**
 * Render a parsed reference as a fully-qualified string
 */
export function formatImageReference(parsed: ParsedImageReference): string {
  let result = `${parsed.registry}/${parsed.repository}`;
  if (parsed.tag !== undefined) {
    result += `:${parsed.tag}`;
  }
  if (parsed.digest !== undefined) {
    result += `@${parsed.digest}`;
  }
  return result;
}

/**
 * Fully-qualify a reference so equivalent spellings compare equal.
 * `lsstsqre/lab:w_2021_13`, `docker.io/lsstsqre/lab:w_2021_13` and
 * `registry.hub.docker.com/lsstsqre/lab:w_2021_13` all normalize to the same string.
 * References that cannot be parsed are returned trimmed.
 */
export function normalizeImageReference(reference: string): string {
  try {
    return formatImageReference(parseImageReference(reference));
  } catch {
    return reference.trim();
  }
}

/**
 * `registry/repository` part of a reference, normalized
 */
export function imageRepositoryKey(reference: string): string {
  const parsed = parseImageReference(reference);
  return `${parsed.registry}/${parsed.repository}`;
}
