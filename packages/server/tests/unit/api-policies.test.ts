/**
 * Unit tests for cache policy API endpoints
 * @module @prepuller/server/tests/unit/api-policies
 *
 * Handlers run against a real controller registry backed by in-process
 * cluster and registry fakes.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Request, Response } from 'express';
import { ControllerRegistry, NodeInventory, PullOrchestrator } from '@prepuller/core';
import { ClusterApiError } from '@prepuller/shared';
import { createPolicyHandlers, type PolicyHandlers } from '../../src/api/policies';
import { createAvailabilityHandler } from '../../src/api/availability';
import { createHealthHandler } from '../../src/api/router';
import { FakeClusterClient, FakeRegistryClient } from '../../../core/tests/helpers/fakes';

/**
 * Create a mock Express request
 */
function createMockRequest(overrides: Partial<Request> = {}): Request {
  return {
    body: {},
    params: {},
    query: {},
    headers: {},
    ...overrides,
  } as Request;
}

/**
 * Create a mock Express response with spy functions
 */
function createMockResponse(): Response & { _json: unknown; _status: number } {
  const res = {
    _json: null as unknown,
    _status: 200,
    status(code: number) {
      this._status = code;
      return this;
    },
    json(data: unknown) {
      this._json = data;
      return this;
    },
    send() {
      return this;
    },
  };
  return res as Response & { _json: unknown; _status: number };
}

const LAB = 'docker.io/lsstsqre/lab:w_2021_13';

const validPolicy = {
  name: 'jupyter',
  labelSelector: { jupyterlab: 'ok' },
  strategies: [{ type: 'PinnedListStrategy', images: [{ name: 'Lab', imageUrl: LAB }] }],
};

describe('Cache Policy API Handlers', () => {
  let cluster: FakeClusterClient;
  let registry: ControllerRegistry;
  let handlers: PolicyHandlers;

  beforeEach(() => {
    cluster = new FakeClusterClient();
    cluster.addNode('node-a', { jupyterlab: 'ok' }, [LAB, 'alpine:3.19']);
    cluster.addNode('node-b', { jupyterlab: 'ok' }, [LAB]);
    const inventory = new NodeInventory(cluster);
    const orchestrator = new PullOrchestrator({ cluster, inventory, pollIntervalMs: 1 });
    const registryClient = new FakeRegistryClient();
    registry = new ControllerRegistry({
      inventory,
      orchestrator,
      strategies: { registryClientFor: () => registryClient },
      autoStart: false,
    });
    handlers = createPolicyHandlers(registry);
  });

  afterEach(async () => {
    await registry.shutdown();
  });

  describe('POST / (createPolicy)', () => {
    it('should create a policy and return its status with 201', () => {
      const req = createMockRequest({ body: validPolicy });
      const res = createMockResponse();

      handlers.createPolicy(req, res);

      expect(res._status).toBe(201);
      expect(res._json).toMatchObject({
        success: true,
        data: { name: 'jupyter', labelSelector: { jupyterlab: 'ok' }, desired: [] },
      });
      expect(registry.has('jupyter')).toBe(true);
    });

    it('should return 400 with field details for an invalid policy', () => {
      const req = createMockRequest({ body: { name: 'Bad Name', labelSelector: {}, strategies: [] } });
      const res = createMockResponse();

      handlers.createPolicy(req, res);

      expect(res._status).toBe(400);
      const body = res._json as { success: boolean; error: { code: string; details: { errors: unknown[] } } };
      expect(body.success).toBe(false);
      expect(body.error.code).toBe('VALIDATION_FAILED');
      expect(body.error.details.errors.length).toBeGreaterThan(0);
      expect(registry.list()).toEqual([]);
    });

    it('should return 409 for a duplicate name', () => {
      handlers.createPolicy(createMockRequest({ body: validPolicy }), createMockResponse());
      const res = createMockResponse();

      handlers.createPolicy(createMockRequest({ body: validPolicy }), res);

      expect(res._status).toBe(409);
      expect(res._json).toEqual({
        success: false,
        error: { code: 'ALREADY_EXISTS', message: 'Cache policy "jupyter" already exists' },
      });
    });
  });

  describe('GET / (listPolicies)', () => {
    it('should list policy names', () => {
      registry.create(validPolicy);
      const res = createMockResponse();

      handlers.listPolicies(createMockRequest(), res);

      expect(res._status).toBe(200);
      expect(res._json).toEqual({ success: true, data: { policies: ['jupyter'] } });
    });
  });

  describe('GET /:name (getPolicy)', () => {
    it('should return the status of a known policy', () => {
      registry.create(validPolicy);
      const res = createMockResponse();

      handlers.getPolicy(createMockRequest({ params: { name: 'jupyter' } }), res);

      expect(res._status).toBe(200);
      expect(res._json).toMatchObject({ success: true, data: { name: 'jupyter', pulling: [] } });
    });

    it('should return 404 for an unknown policy', () => {
      const res = createMockResponse();

      handlers.getPolicy(createMockRequest({ params: { name: 'nope' } }), res);

      expect(res._status).toBe(404);
      expect(res._json).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Cache policy "nope" not found' },
      });
    });
  });

  describe('GET /:name/desired and /:name/available', () => {
    it('should return the images after a reconcile', async () => {
      const controller = registry.create(validPolicy);
      await controller.reconcile();

      const desired = createMockResponse();
      handlers.getDesiredImages(createMockRequest({ params: { name: 'jupyter' } }), desired);
      const available = createMockResponse();
      handlers.getAvailableImages(createMockRequest({ params: { name: 'jupyter' } }), available);

      const desiredBody = desired._json as {
        data: { images: Array<{ displayName: string; imageReference: string }>; all: unknown[] };
      };
      expect(desiredBody.data.all).toEqual([{ displayName: 'Lab', imageReference: LAB }]);
      expect(desiredBody.data.images).toHaveLength(1);
      expect(desiredBody.data.images[0]).toMatchObject({ displayName: 'Lab', imageReference: LAB });
      const availableBody = available._json as {
        data: { images: Array<{ imageReference: string }>; all: Array<{ imageReference: string }> };
      };
      expect(availableBody.data.images.map((image) => image.imageReference)).toEqual([LAB]);
      expect(availableBody.data.all.map((image) => image.imageReference)).toEqual([LAB]);
    });

    it('should return 404 for an unknown policy', () => {
      const res = createMockResponse();

      handlers.getAvailableImages(createMockRequest({ params: { name: 'nope' } }), res);

      expect(res._status).toBe(404);
    });
  });

  describe('DELETE /:name (deletePolicy)', () => {
    it('should delete a policy and report it', async () => {
      registry.create(validPolicy);
      const res = createMockResponse();

      await handlers.deletePolicy(createMockRequest({ params: { name: 'jupyter' } }), res);

      expect(res._json).toEqual({ success: true, data: { deleted: true } });
      expect(registry.has('jupyter')).toBe(false);
    });

    it('should report false for an unknown policy', async () => {
      const res = createMockResponse();

      await handlers.deletePolicy(createMockRequest({ params: { name: 'nope' } }), res);

      expect(res._status).toBe(200);
      expect(res._json).toEqual({ success: true, data: { deleted: false } });
    });
  });

  describe('GET /available', () => {
    it('should list images present on every matching node', async () => {
      const getAvailable = createAvailabilityHandler(registry);
      const res = createMockResponse();

      await getAvailable(createMockRequest({ query: { labels: 'jupyterlab=ok' } }), res);

      expect(res._status).toBe(200);
      expect(res._json).toEqual({
        success: true,
        data: { labelSelector: { jupyterlab: 'ok' }, nodeCount: 2, images: [LAB] },
      });
    });

    it('should return 400 for a malformed selector', async () => {
      const getAvailable = createAvailabilityHandler(registry);
      const res = createMockResponse();

      await getAvailable(createMockRequest({ query: { labels: 'oops' } }), res);

      expect(res._status).toBe(400);
      expect(res._json).toEqual({
        success: false,
        error: { code: 'INVALID_INPUT', message: 'Invalid label selector entry "oops", expected key=value' },
      });
    });

    it('should return 502 when nodes cannot be listed', async () => {
      cluster.listNodesError = new ClusterApiError('listNodes', 'connection refused');
      const getAvailable = createAvailabilityHandler(registry);
      const res = createMockResponse();

      await getAvailable(createMockRequest({ query: { labels: 'jupyterlab=ok' } }), res);

      expect(res._status).toBe(502);
      expect(res._json).toEqual({
        success: false,
        error: { code: 'CLUSTER_API_ERROR', message: 'Cluster API listNodes failed: connection refused' },
      });
    });
  });

  describe('GET /health', () => {
    it('should report policy count and inventory state', () => {
      registry.create(validPolicy);
      const res = createMockResponse();

      createHealthHandler(registry)(createMockRequest(), res);

      expect(res._status).toBe(200);
      expect(res._json).toMatchObject({
        status: 'healthy',
        policies: 1,
        inventory: { nodes: 0, ageMs: null },
      });
    });
  });
});
