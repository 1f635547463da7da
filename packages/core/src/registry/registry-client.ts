/**
 * Image registry access used by image sources
 * @module @prepuller/core/registry/registry-client
 */

/**
 * Read-only view of one registry. Any transport or authentication failure
 * rejects with `SourceUnavailableError`.
 */
export interface RegistryClient {
  /** Registry host this client talks to */
  readonly host: string;
  /** All tags of a repository */
  listTags(repository: string): Promise<string[]>;
  /** Content digest (`sha256:...`) the tag currently points at */
  resolveDigest(repository: string, tag: string): Promise<string>;
}

/**
 * Returns a client for a registry host, e.g. `registry.hub.docker.com`
 */
export type RegistryClientFactory = (host: string) => RegistryClient;
