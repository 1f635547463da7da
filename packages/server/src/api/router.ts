/**
 * Central API Router
 *
 * Combines health, availability and policy routes under one prefix.
 * @module @prepuller/server/api/router
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { ControllerRegistry } from '@prepuller/core';
import { createServiceLogger, generateCorrelationId } from '@prepuller/shared';
import { createAvailabilityRouter } from './availability';
import { createPoliciesRouter } from './policies';

/**
 * Logger for API router operations
 */
const logger = createServiceLogger(
  { service: 'prepuller' },
  { component: 'api-router' }
);

/**
 * API router configuration options
 */
export interface ApiRouterOptions {
  registry: ControllerRegistry;
  /** Path everything is mounted under (default: '/prepuller') */
  apiPrefix?: string;
  /** Enable request logging */
  enableLogging?: boolean;
  /** Hide error messages from 500 responses */
  production?: boolean;
}

/**
 * Health check response
 */
export interface HealthCheckResponse {
  status: 'healthy';
  timestamp: string;
  version: string;
  uptime: number;
  policies: number;
  inventory: {
    nodes: number;
    ageMs: number | null;
  };
}

/**
 * Server start time for uptime calculation
 */
const startTime = Date.now();

/**
 * GET /health - Liveness with policy count and inventory age
 */
export function createHealthHandler(registry: ControllerRegistry) {
  return function healthCheck(_req: Request, res: Response): void {
    const response: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '0.1.0',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      policies: registry.policyCount.value,
      inventory: {
        nodes: registry.inventory.nodeCount.value,
        ageMs: registry.inventory.ageMs(),
      },
    };
    res.status(200).json(response);
  };
}

function correlationIdOf(req: Request): string {
  const header = req.headers['x-correlation-id'];
  return typeof header === 'string' && header !== '' ? header : generateCorrelationId();
}

/**
 * Request logging middleware
 */
export function requestLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const correlationId = correlationIdOf(req);
  const started = Date.now();

  res.setHeader('X-Correlation-ID', correlationId);
  const requestLogger = logger.withCorrelationId(correlationId);

  requestLogger.debug('Incoming request', {
    method: req.method,
    path: req.path,
    query: req.query,
  });

  res.on('finish', () => {
    const meta = {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: Date.now() - started,
    };
    if (res.statusCode >= 400) {
      requestLogger.warn('Request completed', meta);
    } else {
      requestLogger.info('Request completed', meta);
    }
  });

  next();
}

/**
 * Error handling middleware
 */
export function createErrorHandlingMiddleware(production: boolean) {
  return function errorHandlingMiddleware(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
  ): void {
    logger.withCorrelationId(correlationIdOf(req)).error('Unhandled error', err, {
      method: req.method,
      path: req.path,
    });

    // Express sets this for malformed JSON bodies
    const status = 'status' in err && typeof err.status === 'number' && err.status < 500 ? err.status : 500;

    res.status(status).json({
      success: false,
      error: {
        code: status === 500 ? 'INTERNAL_ERROR' : 'INVALID_INPUT',
        message: production && status === 500 ? 'An internal error occurred' : err.message,
      },
    });
  };
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    },
  });
}

/**
 * Create the central API router
 */
export function createApiRouter(options: ApiRouterOptions): Router {
  const {
    registry,
    apiPrefix = '/prepuller',
    enableLogging = true,
    production = process.env.NODE_ENV === 'production',
  } = options;

  const router = Router();

  if (enableLogging) {
    router.use(requestLoggingMiddleware);
  }

  // Fixed paths go first; a policy named "health" or "available" is reachable only through the list
  router.get(`${apiPrefix}/health`, createHealthHandler(registry));
  router.use(`${apiPrefix}/available`, createAvailabilityRouter(registry));
  router.use(apiPrefix, createPoliciesRouter(registry));

  router.use(notFoundHandler);
  router.use(createErrorHandlingMiddleware(production));

  logger.info('API router initialized', {
    apiPrefix,
    routes: [`${apiPrefix}/health`, `${apiPrefix}/available`, apiPrefix, `${apiPrefix}/:name`],
  });

  return router;
}
