/**
 * Registry credentials from a docker config JSON file
 * @module @prepuller/server/registry/docker-credentials
 */

import fs from 'fs';
import { createServiceLogger, errorMessage, type Logger } from '@prepuller/shared';

/**
 * Username and password for one registry
 */
export interface DockerCredentials {
  username: string;
  password: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode an `auths.<host>.auth` entry (base64 `user:password`)
 */
export function decodeAuth(auth: string): DockerCredentials | null {
  const decoded = Buffer.from(auth, 'base64').toString('utf-8');
  const index = decoded.indexOf(':');
  if (index <= 0) {
    return null;
  }
  return { username: decoded.slice(0, index), password: decoded.slice(index + 1) };
}

/**
 * Credentials keyed by registry host
 */
export class DockerCredentialStore {
  private readonly byHost: ReadonlyMap<string, DockerCredentials>;

  constructor(entries: Iterable<[string, DockerCredentials]> = []) {
    this.byHost = new Map(entries);
  }

  /**
   * Parse the contents of a `.dockerconfigjson`
   *
   * @throws {Error} When the document is not a docker config
   */
  static parse(json: string): DockerCredentialStore {
    const document: unknown = JSON.parse(json);
    if (!isRecord(document) || !isRecord(document.auths)) {
      throw new Error('Docker config has no "auths" object');
    }

    const entries: Array<[string, DockerCredentials]> = [];
    for (const [host, entry] of Object.entries(document.auths)) {
      if (!isRecord(entry)) {
        continue;
      }
      if (typeof entry.auth === 'string') {
        const credentials = decodeAuth(entry.auth);
        if (credentials) {
          entries.push([host, credentials]);
        }
      } else if (typeof entry.username === 'string' && typeof entry.password === 'string') {
        entries.push([host, { username: entry.username, password: entry.password }]);
      }
    }
    return new DockerCredentialStore(entries);
  }

  /**
   * Load a docker config file. A missing or unreadable file yields an
   * empty store.
   */
  static load(path: string, logger?: Logger): DockerCredentialStore {
    const log = logger ?? createServiceLogger({ service: 'prepuller' }, { component: 'docker-credentials' });
    let contents: string;
    try {
      contents = fs.readFileSync(path, 'utf-8');
    } catch {
      log.warn('Docker config not found, registries will be accessed anonymously', { path });
      return new DockerCredentialStore();
    }

    try {
      const store = DockerCredentialStore.parse(contents);
      log.debug('Loaded registry credentials', { path, registries: store.hosts() });
      return store;
    } catch (error) {
      log.warn('Docker config could not be parsed, ignoring it', { path, error: errorMessage(error) });
      return new DockerCredentialStore();
    }
  }

  /**
   * Credentials for a host. Entries written as URLs (`https://host/v1/`)
   * match their host too.
   */
  lookup(host: string): DockerCredentials | undefined {
    const direct = this.byHost.get(host);
    if (direct) {
      return direct;
    }
    for (const [key, credentials] of this.byHost) {
      if (hostOf(key) === host) {
        return credentials;
      }
    }
    return undefined;
  }

  hosts(): string[] {
    return [...this.byHost.keys()];
  }
}

function hostOf(key: string): string {
  return key.replace(/^https?:\/\//, '').split('/')[0] ?? key;
}
