/**
 * Policy-independent availability endpoint
 * @module @prepuller/server/api/availability
 */

import { Router, type Request, type Response } from 'express';
import type { ControllerRegistry } from '@prepuller/core';
import {
  createServiceLogger,
  formatLabelSelector,
  parseLabelSelector,
  type Labels,
} from '@prepuller/shared';
import { sendError, sendFailure, sendSuccess } from './responses';

const logger = createServiceLogger(
  { service: 'prepuller' },
  { component: 'api-availability' }
);

/**
 * Availability response body
 */
export interface AvailabilityResponse {
  labelSelector: Labels;
  nodeCount: number;
  images: string[];
}

/**
 * GET /available?labels=k=v,k2=v2 - Images present on every matching node
 */
export function createAvailabilityHandler(registry: ControllerRegistry) {
  return async function getAvailable(req: Request, res: Response): Promise<void> {
    const raw = typeof req.query.labels === 'string' ? req.query.labels : '';

    let selector: Labels;
    try {
      selector = parseLabelSelector(raw);
    } catch (error) {
      sendError(res, 'INVALID_INPUT', error instanceof Error ? error.message : 'Invalid label selector', 400);
      return;
    }

    try {
      await registry.inventory.refresh();
    } catch (error) {
      sendFailure(res, error, logger);
      return;
    }

    const body: AvailabilityResponse = {
      labelSelector: selector,
      nodeCount: registry.inventory.nodesMatching(selector).length,
      images: registry.availableFor(selector),
    };
    logger.debug('Availability queried', { selector: formatLabelSelector(selector), images: body.images.length });
    sendSuccess(res, body);
  };
}

/**
 * Create the availability router
 */
export function createAvailabilityRouter(registry: ControllerRegistry): Router {
  const router = Router();
  const getAvailable = createAvailabilityHandler(registry);

  router.get('/', (req, res, next) => {
    getAvailable(req, res).catch(next);
  });

  return router;
}
