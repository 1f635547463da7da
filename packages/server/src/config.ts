/**
 * Server configuration from the environment
 * @module @prepuller/server/config
 */

import fs from 'fs';
import {
  createServiceLogger,
  isAvailabilityMode,
  type AvailabilityMode,
  type Logger,
} from '@prepuller/shared';

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** HTTP port (default: 8080) */
  port: number;
  /** Hostname to bind to (default: '0.0.0.0') */
  host: string;
  /** Path the policy API is mounted under (default: '/prepuller') */
  apiPrefix: string;
  /** Namespace pull workloads are created in */
  namespace: string;
  /** Interval between policy reconciliations (default: 60000) */
  reconcileIntervalMs: number;
  /** Delay between pull workload status reads (default: 5000) */
  pullPollIntervalMs: number;
  /** Give up on a pull after this long (default: 1200000) */
  pullTimeoutMs: number;
  /** A node listing younger than this is reused (default: 5000) */
  inventoryMaxAgeMs: number;
  /** How many targeted nodes must hold an image (default: all) */
  availabilityMode: AvailabilityMode;
  /** Registry for tag-classifying sources that name none */
  defaultRegistryHost: string;
  /** Docker config JSON holding registry credentials */
  dockerConfigPath: string;
  /** Image pull secret attached to pull workloads */
  pullSecretName?: string;
  /** How long pull containers sleep before exiting (default: 1200) */
  pullWorkloadSleepSeconds: number;
  /** Enable request logging (default: true) */
  enableLogging: boolean;
  /** Node environment */
  nodeEnv: 'development' | 'production' | 'test';
}

/**
 * Namespace of the service account the process runs as
 */
export const SERVICE_ACCOUNT_NAMESPACE_FILE = '/var/run/secrets/kubernetes.io/serviceaccount/namespace';

type Env = Record<string, string | undefined>;

function readNamespace(env: Env): string {
  if (env.KUBE_NAMESPACE) {
    return env.KUBE_NAMESPACE;
  }
  try {
    const namespace = fs.readFileSync(SERVICE_ACCOUNT_NAMESPACE_FILE, 'utf-8').trim();
    return namespace || 'default';
  } catch {
    return 'default';
  }
}

function readNodeEnv(value: string | undefined): ServerConfig['nodeEnv'] {
  return value === 'production' || value === 'test' ? value : 'development';
}

/**
 * Build the server configuration from environment variables.
 * Invalid values fall back to their defaults with a warning.
 */
export function loadServerConfig(env: Env = process.env, logger?: Logger): ServerConfig {
  const log = logger ?? createServiceLogger({ service: 'prepuller' }, { component: 'config' });

  const positiveInt = (name: string, fallback: number): number => {
    const raw = env[name];
    if (raw === undefined || raw === '') {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
      log.warn('Invalid numeric setting, using default', { setting: name, value: raw, default: fallback });
      return fallback;
    }
    return value;
  };

  let availabilityMode: AvailabilityMode = 'all';
  if (env.AVAILABILITY_MODE) {
    if (isAvailabilityMode(env.AVAILABILITY_MODE)) {
      availabilityMode = env.AVAILABILITY_MODE;
    } else {
      log.warn('Invalid availability mode, using default', { value: env.AVAILABILITY_MODE, default: 'all' });
    }
  }

  return {
    port: positiveInt('PORT', 8080),
    host: env.HOST || '0.0.0.0',
    apiPrefix: env.API_PREFIX || '/prepuller',
    namespace: readNamespace(env),
    reconcileIntervalMs: positiveInt('RECONCILE_INTERVAL_MS', 60000),
    pullPollIntervalMs: positiveInt('PULL_POLL_INTERVAL_MS', 5000),
    pullTimeoutMs: positiveInt('PULL_TIMEOUT_MS', 1_200_000),
    inventoryMaxAgeMs: positiveInt('INVENTORY_MAX_AGE_MS', 5000),
    availabilityMode,
    defaultRegistryHost: env.DEFAULT_REGISTRY_HOST || 'registry.hub.docker.com',
    dockerConfigPath: env.DOCKER_CONFIG_PATH || '/etc/secrets/.dockerconfigjson',
    ...(env.PULL_SECRET_NAME ? { pullSecretName: env.PULL_SECRET_NAME } : {}),
    pullWorkloadSleepSeconds: positiveInt('PULL_WORKLOAD_SLEEP_SECONDS', 1200),
    enableLogging: env.ENABLE_LOGGING !== 'false',
    nodeEnv: readNodeEnv(env.NODE_ENV),
  };
}
