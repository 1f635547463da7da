/**
 * Unit tests for the Docker registry client
 */

import { describe, it, expect, beforeEach } from 'vitest';
import axios, { type AxiosInstance } from 'axios';
import MockAdapter from 'axios-mock-adapter';
import { ErrorCode, SourceUnavailableError } from '@prepuller/shared';
import {
  DockerRegistryClient,
  createRegistryClientFactory,
  nextPageLink,
  parseAuthChallenge,
} from '../../src/registry/docker-registry-client';
import { DockerCredentialStore } from '../../src/registry/docker-credentials';

const BASE = 'https://registry.example.com';
const TAGS_URL = `${BASE}/v2/lsstsqre/lab/tags/list`;
const BEARER_CHALLENGE =
  'Bearer realm="https://auth.example.com/token",service="registry.example.com",scope="repository:lsstsqre/lab:pull"';

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parseAuthChallenge', () => {
  it('should parse a bearer challenge', () => {
    expect(parseAuthChallenge(BEARER_CHALLENGE)).toEqual({
      scheme: 'bearer',
      params: {
        realm: 'https://auth.example.com/token',
        service: 'registry.example.com',
        scope: 'repository:lsstsqre/lab:pull',
      },
    });
  });

  it('should parse a basic challenge', () => {
    expect(parseAuthChallenge('Basic realm="Registry Realm"')).toEqual({
      scheme: 'basic',
      params: { realm: 'Registry Realm' },
    });
  });
});

describe('nextPageLink', () => {
  it('should return the next link target', () => {
    expect(nextPageLink('</v2/lab/tags/list?last=b&n=2>; rel="next"')).toBe('/v2/lab/tags/list?last=b&n=2');
  });

  it('should return undefined without a next link', () => {
    expect(nextPageLink(undefined)).toBeUndefined();
    expect(nextPageLink('</v2/lab/tags/list>; rel="prev"')).toBeUndefined();
  });
});

describe('DockerRegistryClient', () => {
  let http: AxiosInstance;
  let mock: MockAdapter;

  beforeEach(() => {
    http = axios.create();
    mock = new MockAdapter(http);
  });

  describe('listTags', () => {
    it('should list tags anonymously', async () => {
      mock.onGet(TAGS_URL).reply(200, { name: 'lsstsqre/lab', tags: ['w_2021_13', 'r21_0_1'] });
      const client = new DockerRegistryClient({ host: 'registry.example.com', http });

      await expect(client.listTags('lsstsqre/lab')).resolves.toEqual(['w_2021_13', 'r21_0_1']);
    });

    it('should follow pagination links', async () => {
      mock.onGet(TAGS_URL).reply(200, { tags: ['a', 'b'] }, {
        link: '</v2/lsstsqre/lab/tags/list?last=b&n=2>; rel="next"',
      });
      mock.onGet(`${TAGS_URL}?last=b&n=2`).reply(200, { tags: ['c'] });
      const client = new DockerRegistryClient({ host: 'registry.example.com', http });

      await expect(client.listTags('lsstsqre/lab')).resolves.toEqual(['a', 'b', 'c']);
    });

    it('should answer a bearer challenge and retry with the token', async () => {
      mock.onGet(TAGS_URL).reply((config) =>
        config.headers?.Authorization === 'Bearer test-token'
          ? [200, { tags: ['w_2021_13'] }]
          : [401, {}, { 'www-authenticate': BEARER_CHALLENGE }]
      );
      mock.onGet('https://auth.example.com/token').reply((config) =>
        config.auth?.username === 'robot' && config.params?.scope === 'repository:lsstsqre/lab:pull'
          ? [200, { token: 'test-token' }]
          : [403, {}]
      );
      const client = new DockerRegistryClient({
        host: 'registry.example.com',
        credentials: { username: 'robot', password: 'test-secret' },
        http,
      });

      await expect(client.listTags('lsstsqre/lab')).resolves.toEqual(['w_2021_13']);
    });

    it('should accept access_token from the token endpoint', async () => {
      mock.onGet(TAGS_URL).reply((config) =>
        config.headers?.Authorization === 'Bearer other-token'
          ? [200, { tags: ['x'] }]
          : [401, {}, { 'www-authenticate': BEARER_CHALLENGE }]
      );
      mock.onGet('https://auth.example.com/token').reply(200, { access_token: 'other-token' });
      const client = new DockerRegistryClient({ host: 'registry.example.com', http });

      await expect(client.listTags('lsstsqre/lab')).resolves.toEqual(['x']);
    });

    it('should answer a basic challenge with stored credentials', async () => {
      const expected = `Basic ${Buffer.from('robot:test-secret').toString('base64')}`;
      mock.onGet(TAGS_URL).reply((config) =>
        config.headers?.Authorization === expected
          ? [200, { tags: ['w_2021_13'] }]
          : [401, {}, { 'www-authenticate': 'Basic realm="Registry"' }]
      );
      const client = new DockerRegistryClient({
        host: 'registry.example.com',
        credentials: { username: 'robot', password: 'test-secret' },
        http,
      });

      await expect(client.listTags('lsstsqre/lab')).resolves.toEqual(['w_2021_13']);
    });

    it('should fail a basic challenge without credentials', async () => {
      mock.onGet(TAGS_URL).reply(401, {}, { 'www-authenticate': 'Basic realm="Registry"' });
      const client = new DockerRegistryClient({ host: 'registry.example.com', http });

      const error = await captureError(client.listTags('lsstsqre/lab'));

      expect(error).toBeInstanceOf(SourceUnavailableError);
      expect(error).toMatchObject({
        code: ErrorCode.REGISTRY_AUTH_FAILED,
        message: 'Registry authentication failed for lsstsqre/lab: no credentials for registry.example.com',
      });
    });

    it('should fail when the registry still answers 401 after authenticating', async () => {
      mock.onGet(TAGS_URL).reply(401, {}, { 'www-authenticate': 'Basic realm="Registry"' });
      const client = new DockerRegistryClient({
        host: 'registry.example.com',
        credentials: { username: 'robot', password: 'wrong' },
        http,
      });

      const error = await captureError(client.listTags('lsstsqre/lab'));

      expect(error).toMatchObject({
        message: 'Registry authentication failed for lsstsqre/lab: credentials rejected after authentication',
      });
    });

    it('should report an unexpected status', async () => {
      mock.onGet(TAGS_URL).reply(500, {});
      const client = new DockerRegistryClient({ host: 'registry.example.com', http });

      const error = await captureError(client.listTags('lsstsqre/lab'));

      expect(error).toBeInstanceOf(SourceUnavailableError);
      expect(error).toMatchObject({
        code: ErrorCode.REGISTRY_UNREACHABLE,
        message: 'Registry request failed for lsstsqre/lab (HTTP 500)',
      });
    });

    it('should report a network failure', async () => {
      mock.onGet(TAGS_URL).networkError();
      const client = new DockerRegistryClient({ host: 'registry.example.com', http });

      const error = await captureError(client.listTags('lsstsqre/lab'));

      expect(error).toMatchObject({ message: 'Registry request failed for lsstsqre/lab: Network Error' });
    });
  });

  describe('resolveDigest', () => {
    it('should read the content digest header', async () => {
      mock.onHead(`${BASE}/v2/lsstsqre/lab/manifests/w_2021_13`).reply((config) => {
        const accept: unknown = config.headers?.Accept;
        return typeof accept === 'string' && accept.includes('manifest.list.v2+json')
          ? [200, undefined, { 'docker-content-digest': 'sha256:abc123' }]
          : [406, undefined];
      });
      const client = new DockerRegistryClient({ host: 'registry.example.com', http });

      await expect(client.resolveDigest('lsstsqre/lab', 'w_2021_13')).resolves.toBe('sha256:abc123');
    });

    it('should fail when no digest is returned', async () => {
      mock.onHead(`${BASE}/v2/lsstsqre/lab/manifests/w_2021_13`).reply(200, undefined, {});
      const client = new DockerRegistryClient({ host: 'registry.example.com', http });

      const error = await captureError(client.resolveDigest('lsstsqre/lab', 'w_2021_13'));

      expect(error).toMatchObject({
        message: 'Registry request failed for lsstsqre/lab: Registry returned no digest for lsstsqre/lab:w_2021_13',
      });
    });
  });
});

describe('createRegistryClientFactory', () => {
  it('should reuse one client per host', () => {
    const factory = createRegistryClientFactory();

    const first = factory('registry.example.com');

    expect(factory('registry.example.com')).toBe(first);
    expect(factory('other.example.com')).not.toBe(first);
    expect(first.host).toBe('registry.example.com');
  });

  it('should hand stored credentials to the client for their host', async () => {
    const http = axios.create();
    const mock = new MockAdapter(http);
    const expected = `Basic ${Buffer.from('robot:test-secret').toString('base64')}`;
    mock.onGet(TAGS_URL).reply((config) =>
      config.headers?.Authorization === expected
        ? [200, { tags: ['ok'] }]
        : [401, {}, { 'www-authenticate': 'Basic realm="Registry"' }]
    );
    const credentials = new DockerCredentialStore([
      ['registry.example.com', { username: 'robot', password: 'test-secret' }],
    ]);
    const factory = createRegistryClientFactory({ credentials, http });

    await expect(factory('registry.example.com').listTags('lsstsqre/lab')).resolves.toEqual(['ok']);
  });
});
