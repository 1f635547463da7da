/**
 * Cache policy REST API endpoints
 *
 * Creates, inspects and deletes cache policies held by the controller registry.
 * @module @prepuller/server/api/policies
 */

import { Router, type Request, type Response } from 'express';
import type { ControllerRegistry } from '@prepuller/core';
import {
  createServiceLogger,
  generateCorrelationId,
  type CachePolicyStatus,
  type DesiredImage,
} from '@prepuller/shared';
import { sendError, sendFailure, sendSuccess } from './responses';

/**
 * Logger for policy API operations
 */
const logger = createServiceLogger(
  { service: 'prepuller' },
  { component: 'api-policies' }
);

/**
 * Images response body
 */
export interface ImagesResponse {
  images: DesiredImage[];
  /** Every image the policy's sources list, for selection menus */
  all: DesiredImage[];
}

/**
 * Handlers bound to one registry
 */
export interface PolicyHandlers {
  listPolicies(req: Request, res: Response): void;
  createPolicy(req: Request, res: Response): void;
  getPolicy(req: Request, res: Response): void;
  getDesiredImages(req: Request, res: Response): void;
  getAvailableImages(req: Request, res: Response): void;
  deletePolicy(req: Request, res: Response): Promise<void>;
}

function policyName(req: Request): string {
  return typeof req.params.name === 'string' ? req.params.name : '';
}

function sendPolicyNotFound(res: Response, name: string): void {
  sendError(res, 'NOT_FOUND', `Cache policy "${name}" not found`, 404);
}

/**
 * Build handlers for the given registry
 */
export function createPolicyHandlers(registry: ControllerRegistry): PolicyHandlers {
  return {
    /**
     * GET / - List policy names
     */
    listPolicies(_req, res) {
      sendSuccess(res, { policies: registry.list() });
    },

    /**
     * POST / - Create a policy and start reconciling it
     */
    createPolicy(req, res) {
      const requestLogger = logger.withCorrelationId(generateCorrelationId());
      try {
        const controller = registry.create(req.body);
        const status: CachePolicyStatus = controller.status();
        requestLogger.info('Cache policy created via API', { policy: controller.name });
        sendSuccess(res, status, 201);
      } catch (error) {
        requestLogger.warn('Cache policy rejected', {
          error: error instanceof Error ? error.message : String(error),
        });
        sendFailure(res, error, requestLogger);
      }
    },

    /**
     * GET /:name - Full status of a policy
     */
    getPolicy(req, res) {
      const name = policyName(req);
      const status = registry.status(name);
      if (!status) {
        sendPolicyNotFound(res, name);
        return;
      }
      sendSuccess(res, status);
    },

    /**
     * GET /:name/desired - Images the policy wants cached
     */
    getDesiredImages(req, res) {
      const name = policyName(req);
      const controller = registry.get(name);
      if (!controller) {
        sendPolicyNotFound(res, name);
        return;
      }
      const body: ImagesResponse = { images: controller.desired(), all: controller.allImages() };
      sendSuccess(res, body);
    },

    /**
     * GET /:name/available - Desired images present on the policy's nodes
     */
    getAvailableImages(req, res) {
      const name = policyName(req);
      const controller = registry.get(name);
      if (!controller) {
        sendPolicyNotFound(res, name);
        return;
      }
      const body: ImagesResponse = { images: controller.available(), all: controller.allImages() };
      sendSuccess(res, body);
    },

    /**
     * DELETE /:name - Stop and remove a policy; deleting an unknown name is not an error
     */
    async deletePolicy(req, res) {
      const name = policyName(req);
      try {
        const deleted = await registry.delete(name);
        sendSuccess(res, { deleted });
      } catch (error) {
        sendFailure(res, error, logger.forPolicy(name));
      }
    },
  };
}

/**
 * Create the policies router
 */
export function createPoliciesRouter(registry: ControllerRegistry): Router {
  const router = Router();
  const handlers = createPolicyHandlers(registry);

  router.get('/', handlers.listPolicies);
  router.post('/', handlers.createPolicy);
  router.get('/:name', handlers.getPolicy);
  router.get('/:name/desired', handlers.getDesiredImages);
  router.get('/:name/available', handlers.getAvailableImages);
  router.delete('/:name', (req, res, next) => {
    handlers.deletePolicy(req, res).catch(next);
  });

  return router;
}
