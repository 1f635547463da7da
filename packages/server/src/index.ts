/**
 * prepuller server
 *
 * Wires the node inventory, pull orchestrator and controller registry to the
 * Kubernetes API and serves the policy API over HTTP.
 * @module @prepuller/server
 */

import http from 'http';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import express, { type Express } from 'express';
import type { AxiosInstance } from 'axios';
import {
  ControllerRegistry,
  NodeInventory,
  PullOrchestrator,
  type ClusterClient,
  type RegistryClientFactory,
} from '@prepuller/core';
import { createServiceLogger, errorMessage } from '@prepuller/shared';
import { createApiRouter } from './api/router';
import { loadServerConfig, type ServerConfig } from './config';
import { KubernetesClusterClient } from './kubernetes/kubernetes-cluster-client';
import { removeStaleWorkloads } from './kubernetes/stale-workloads';
import { DockerCredentialStore } from './registry/docker-credentials';
import { createRegistryClientFactory } from './registry/docker-registry-client';

/**
 * Logger for server operations
 */
const logger = createServiceLogger(
  { service: 'prepuller' },
  { component: 'server' }
);

/**
 * Replaceable collaborators, for tests and embedding
 */
export interface ServerDependencies {
  cluster?: ClusterClient;
  registryClientFor?: RegistryClientFactory;
  /** HTTP client handed to registry clients */
  http?: AxiosInstance;
}

/**
 * Server instance
 */
export interface ServerInstance {
  /** Express application */
  app: Express;
  /** HTTP server */
  httpServer: http.Server;
  /** Running cache policies */
  registry: ControllerRegistry;
  /** Server configuration */
  config: ServerConfig;
  /** Remove leftover pull workloads, then listen */
  start: () => Promise<void>;
  /** Stop every policy and close the listener */
  stop: () => Promise<void>;
}

/**
 * Create and configure the server
 */
export function createServer(
  config: Partial<ServerConfig> = {},
  dependencies: ServerDependencies = {}
): ServerInstance {
  const finalConfig: ServerConfig = { ...loadServerConfig(), ...config };

  logger.info('Creating server', {
    port: finalConfig.port,
    host: finalConfig.host,
    namespace: finalConfig.namespace,
    apiPrefix: finalConfig.apiPrefix,
    availabilityMode: finalConfig.availabilityMode,
    nodeEnv: finalConfig.nodeEnv,
  });

  const cluster = dependencies.cluster ?? KubernetesClusterClient.fromKubeConfig({
    namespace: finalConfig.namespace,
    sleepSeconds: finalConfig.pullWorkloadSleepSeconds,
    ...(finalConfig.pullSecretName !== undefined && { pullSecretName: finalConfig.pullSecretName }),
  });

  const registryClientFor = dependencies.registryClientFor ?? createRegistryClientFactory({
    credentials: DockerCredentialStore.load(finalConfig.dockerConfigPath),
    ...(dependencies.http && { http: dependencies.http }),
  });

  const inventory = new NodeInventory(cluster, { maxAgeMs: finalConfig.inventoryMaxAgeMs });
  const orchestrator = new PullOrchestrator({
    cluster,
    inventory,
    pollIntervalMs: finalConfig.pullPollIntervalMs,
    timeoutMs: finalConfig.pullTimeoutMs,
  });
  const registry = new ControllerRegistry({
    inventory,
    orchestrator,
    strategies: {
      registryClientFor,
      defaultRegistryHost: finalConfig.defaultRegistryHost,
    },
    reconcileIntervalMs: finalConfig.reconcileIntervalMs,
    availabilityMode: finalConfig.availabilityMode,
  });

  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(createApiRouter({
    registry,
    apiPrefix: finalConfig.apiPrefix,
    enableLogging: finalConfig.enableLogging,
    production: finalConfig.nodeEnv === 'production',
  }));

  const httpServer = http.createServer(app);

  return {
    app,
    httpServer,
    registry,
    config: finalConfig,

    start: async () => {
      try {
        await removeStaleWorkloads(cluster, logger);
      } catch (error) {
        logger.warn('Stale pull workload cleanup failed', { error: errorMessage(error) });
      }

      await new Promise<void>((resolveListen, reject) => {
        httpServer.once('error', (error) => {
          logger.error('Server error', error);
          reject(error);
        });
        httpServer.listen(finalConfig.port, finalConfig.host, () => {
          logger.info('HTTP server started', {
            url: `http://${finalConfig.host}:${finalConfig.port}${finalConfig.apiPrefix}`,
          });
          resolveListen();
        });
      });
    },

    stop: async () => {
      logger.info('Stopping server...');
      await registry.shutdown();

      if (!httpServer.listening) {
        return;
      }
      await new Promise<void>((resolveClose, reject) => {
        httpServer.close((error) => {
          if (error) {
            logger.error('Error closing HTTP server', error);
            reject(error);
          } else {
            logger.info('Server stopped');
            resolveClose();
          }
        });
      });
    },
  };
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Main function to start the server
 */
async function main(): Promise<void> {
  const server = createServer();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', error instanceof Error ? error : undefined);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason instanceof Error ? reason : new Error(String(reason)));
  });

  try {
    await server.start();
  } catch (error) {
    logger.error('Failed to start server', error instanceof Error ? error : undefined);
    process.exit(1);
  }
}

const currentFile = fileURLToPath(import.meta.url);
const entryFile = resolve(process.argv[1] ?? '');
if (currentFile === entryFile) {
  void main();
}

// ============================================================================
// Exports
// ============================================================================

export { createApiRouter } from './api/router';
export { createPoliciesRouter, createPolicyHandlers } from './api/policies';
export { createAvailabilityRouter } from './api/availability';
export { loadServerConfig } from './config';
export type { ServerConfig } from './config';
export { KubernetesClusterClient, toNodeRecord } from './kubernetes/kubernetes-cluster-client';
export { removeStaleWorkloads } from './kubernetes/stale-workloads';
export { DockerCredentialStore } from './registry/docker-credentials';
export { DockerRegistryClient, createRegistryClientFactory } from './registry/docker-registry-client';
