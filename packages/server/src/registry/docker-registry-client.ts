/**
 * Docker Registry HTTP API v2 client
 * @module @prepuller/server/registry/docker-registry-client
 */

import axios, { type AxiosInstance, type AxiosResponse, type Method } from 'axios';
import type { RegistryClient, RegistryClientFactory } from '@prepuller/core';
import {
  SourceUnavailableError,
  createServiceLogger,
  type Logger,
} from '@prepuller/shared';
import type { DockerCredentialStore, DockerCredentials } from './docker-credentials';

/**
 * Manifest media types we accept when resolving digests
 */
const MANIFEST_ACCEPT = [
  'application/vnd.docker.distribution.manifest.list.v2+json',
  'application/vnd.docker.distribution.manifest.v2+json',
  'application/vnd.oci.image.index.v1+json',
  'application/vnd.oci.image.manifest.v1+json',
].join(', ');

/**
 * Docker registry client options
 */
export interface DockerRegistryClientOptions {
  /** Registry host, e.g. `registry.hub.docker.com` */
  host: string;
  credentials?: DockerCredentials;
  /** HTTP client, overridable in tests */
  http?: AxiosInstance;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Parsed `WWW-Authenticate` challenge
 */
export interface AuthChallenge {
  scheme: string;
  params: Record<string, string>;
}

/**
 * Parse `Bearer realm="https://auth.docker.io/token",service="registry.docker.io",scope="..."`
 */
export function parseAuthChallenge(header: string): AuthChallenge {
  const trimmed = header.trim();
  const space = trimmed.indexOf(' ');
  const scheme = (space === -1 ? trimmed : trimmed.slice(0, space)).toLowerCase();
  const params: Record<string, string> = {};
  if (space !== -1) {
    const pattern = /([a-zA-Z_]+)=(?:"([^"]*)"|([^,\s]*))/g;
    for (const match of trimmed.slice(space + 1).matchAll(pattern)) {
      const key = match[1];
      if (key) {
        params[key.toLowerCase()] = match[2] ?? match[3] ?? '';
      }
    }
  }
  return { scheme, params };
}

/**
 * Target of a `Link: <...>; rel="next"` header, if any
 */
export function nextPageLink(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  for (const part of header.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part);
    if (match?.[1]) {
      return match[1];
    }
  }
  return undefined;
}

function headerString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Talks to one registry host. On a 401 it answers the challenge once
 * (Bearer token or Basic credentials) and retries the request.
 */
export class DockerRegistryClient implements RegistryClient {
  readonly host: string;
  private readonly baseUrl: string;
  private readonly credentials: DockerCredentials | undefined;
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private authorization: string | null = null;

  constructor(options: DockerRegistryClientOptions) {
    this.host = options.host;
    this.baseUrl = `https://${options.host}`;
    this.credentials = options.credentials;
    this.http = options.http ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = (options.logger ?? createServiceLogger({ service: 'prepuller' }))
      .child({ component: 'docker-registry-client', registry: options.host });
  }

  async listTags(repository: string): Promise<string[]> {
    const tags: string[] = [];
    let url: string | undefined = `${this.baseUrl}/v2/${repository}/tags/list`;

    while (url) {
      const response = await this.request('GET', url, repository);
      const data: unknown = response.data;
      if (!isRecord(data)) {
        throw SourceUnavailableError.unreachable(repository, new Error('Malformed tag list response'));
      }
      if (Array.isArray(data.tags)) {
        for (const tag of data.tags) {
          if (typeof tag === 'string') {
            tags.push(tag);
          }
        }
      }

      const next = nextPageLink(headerString(response.headers['link']));
      url = next ? new URL(next, this.baseUrl).toString() : undefined;
    }

    this.logger.debug('Listed tags', { repository, count: tags.length });
    return tags;
  }

  async resolveDigest(repository: string, tag: string): Promise<string> {
    const url = `${this.baseUrl}/v2/${repository}/manifests/${tag}`;
    const response = await this.request('HEAD', url, repository, { Accept: MANIFEST_ACCEPT });
    const digest = headerString(response.headers['docker-content-digest']);
    if (!digest) {
      throw SourceUnavailableError.unreachable(
        repository,
        new Error(`Registry returned no digest for ${repository}:${tag}`),
      );
    }
    return digest;
  }

  private async request(
    method: Method,
    url: string,
    repository: string,
    headers: Record<string, string> = {},
  ): Promise<AxiosResponse> {
    let response = await this.send(method, url, repository, headers);

    if (response.status === 401) {
      await this.authenticate(response, repository);
      response = await this.send(method, url, repository, headers);
      if (response.status === 401) {
        throw SourceUnavailableError.authFailed(repository, 'credentials rejected after authentication');
      }
    }

    if (response.status < 200 || response.status >= 300) {
      throw SourceUnavailableError.unreachable(repository, undefined, response.status);
    }
    return response;
  }

  private async send(
    method: Method,
    url: string,
    repository: string,
    headers: Record<string, string>,
  ): Promise<AxiosResponse> {
    try {
      return await this.http.request({
        method,
        url,
        headers: {
          ...headers,
          ...(this.authorization !== null && { Authorization: this.authorization }),
        },
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });
    } catch (error) {
      throw SourceUnavailableError.unreachable(repository, error instanceof Error ? error : new Error(String(error)));
    }
  }

  private async authenticate(response: AxiosResponse, repository: string): Promise<void> {
    const header = headerString(response.headers['www-authenticate']);
    if (!header) {
      throw SourceUnavailableError.authFailed(repository, 'no authentication challenge');
    }

    const challenge = parseAuthChallenge(header);
    if (challenge.scheme === 'basic') {
      if (!this.credentials) {
        throw SourceUnavailableError.authFailed(repository, `no credentials for ${this.host}`);
      }
      const encoded = Buffer.from(`${this.credentials.username}:${this.credentials.password}`).toString('base64');
      this.authorization = `Basic ${encoded}`;
      this.logger.info('Authenticated with basic auth', { username: this.credentials.username });
      return;
    }

    if (challenge.scheme === 'bearer') {
      this.authorization = `Bearer ${await this.fetchToken(challenge, repository)}`;
      this.logger.info('Authenticated with bearer token');
      return;
    }

    throw SourceUnavailableError.authFailed(repository, `unsupported challenge "${challenge.scheme}"`);
  }

  private async fetchToken(challenge: AuthChallenge, repository: string): Promise<string> {
    const { realm, ...params } = challenge.params;
    if (!realm) {
      throw SourceUnavailableError.authFailed(repository, 'challenge has no realm');
    }

    let response: AxiosResponse;
    try {
      response = await this.http.request({
        method: 'GET',
        url: realm,
        params,
        timeout: this.timeoutMs,
        validateStatus: () => true,
        ...(this.credentials && {
          auth: { username: this.credentials.username, password: this.credentials.password },
        }),
      });
    } catch (error) {
      throw SourceUnavailableError.unreachable(repository, error instanceof Error ? error : new Error(String(error)));
    }

    const data: unknown = response.data;
    if (response.status !== 200 || !isRecord(data)) {
      throw SourceUnavailableError.authFailed(repository, `token endpoint answered HTTP ${response.status}`);
    }
    const token = typeof data.token === 'string' ? data.token : data.access_token;
    if (typeof token !== 'string' || token === '') {
      throw SourceUnavailableError.authFailed(repository, 'token endpoint returned no token');
    }
    return token;
  }
}

/**
 * Registry client factory options
 */
export interface RegistryClientFactoryOptions {
  credentials?: DockerCredentialStore;
  http?: AxiosInstance;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * One client per host, created on first use, so tokens are reused
 * across strategies and ticks
 */
export function createRegistryClientFactory(options: RegistryClientFactoryOptions = {}): RegistryClientFactory {
  const clients = new Map<string, DockerRegistryClient>();
  return (host: string) => {
    let client = clients.get(host);
    if (!client) {
      const credentials = options.credentials?.lookup(host);
      client = new DockerRegistryClient({
        host,
        ...(credentials && { credentials }),
        ...(options.http && { http: options.http }),
        ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
        ...(options.logger && { logger: options.logger }),
      });
      clients.set(host, client);
    }
    return client;
  };
}
