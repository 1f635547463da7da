/**
 * Cluster access through the Kubernetes API
 * @module @prepuller/server/kubernetes/kubernetes-cluster-client
 *
 * Pull workloads are DaemonSets pinned to the selected nodes. Each pod runs
 * the wanted image with `imagePullPolicy: Always` and sleeps, so a ready pod
 * means the node holds the image.
 */

import * as k8s from '@kubernetes/client-node';
import type { ClusterClient, PullWorkloadSpec } from '@prepuller/core';
import {
  ClusterApiError,
  createServiceLogger,
  imageRepositoryKey,
  isPlaceholderImageName,
  normalizeImageReference,
  type Logger,
  type NodeRecord,
  type PullWorkloadStatus,
} from '@prepuller/shared';

/**
 * Labels put on every pull workload
 */
export const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';
export const MANAGED_BY_VALUE = 'prepuller';
export const POLICY_LABEL = 'prepuller/policy';
export const PULL_LABEL = 'prepuller/pull';

/**
 * API surface used for nodes
 */
export type NodeApi = Pick<k8s.CoreV1Api, 'listNode'>;

/**
 * API surface used for pull workloads
 */
export type DaemonSetApi = Pick<
  k8s.AppsV1Api,
  'createNamespacedDaemonSet' | 'readNamespacedDaemonSetStatus' | 'deleteNamespacedDaemonSet' | 'listNamespacedDaemonSet'
>;

/**
 * Kubernetes cluster client options
 */
export interface KubernetesClusterClientOptions {
  coreApi: NodeApi;
  appsApi: DaemonSetApi;
  /** Namespace pull workloads live in */
  namespace: string;
  /** Image pull secret for private registries */
  pullSecretName?: string;
  /** Container sleep before exit; long enough to outlive the pull wait (default: 1200) */
  sleepSeconds?: number;
  logger?: Logger;
}

/**
 * HTTP status carried by a client-node error, if any
 */
export function apiStatusOf(error: unknown): number | undefined {
  if (error instanceof k8s.ApiException) {
    return error.code;
  }
  return undefined;
}

/**
 * Convert a node object into its labels and image cache.
 * Each image entry lists tag names (`repo:tag`) and digest names
 * (`repo@sha256:...`); tag names are recorded with the digest of the same
 * repository from that entry.
 */
export function toNodeRecord(node: k8s.V1Node): NodeRecord | null {
  const nodeName = node.metadata?.name;
  if (!nodeName) {
    return null;
  }

  const presentImages = new Set<string>();
  const imageDigests = new Map<string, string>();

  for (const image of node.status?.images ?? []) {
    const names = (image.names ?? []).filter((name) => !isPlaceholderImageName(name));
    const digests = new Map<string, string>();
    for (const name of names) {
      const at = name.indexOf('@');
      if (at !== -1) {
        digests.set(repositoryKey(name.slice(0, at)), name.slice(at + 1));
      }
    }

    for (const name of names) {
      if (name.includes('@')) {
        continue;
      }
      const reference = normalizeImageReference(name);
      presentImages.add(reference);
      const digest = digests.get(repositoryKey(name));
      if (digest) {
        imageDigests.set(reference, digest);
      }
    }
  }

  return {
    nodeName,
    labels: { ...(node.metadata?.labels ?? {}) },
    presentImages,
    imageDigests,
  };
}

function repositoryKey(reference: string): string {
  try {
    return imageRepositoryKey(reference);
  } catch {
    return reference;
  }
}

/**
 * ClusterClient backed by the Kubernetes API
 */
export class KubernetesClusterClient implements ClusterClient {
  private readonly coreApi: NodeApi;
  private readonly appsApi: DaemonSetApi;
  private readonly namespace: string;
  private readonly pullSecretName: string | undefined;
  private readonly sleepSeconds: number;
  private readonly logger: Logger;

  constructor(options: KubernetesClusterClientOptions) {
    this.coreApi = options.coreApi;
    this.appsApi = options.appsApi;
    this.namespace = options.namespace;
    this.pullSecretName = options.pullSecretName;
    this.sleepSeconds = options.sleepSeconds ?? 1200;
    this.logger = (options.logger ?? createServiceLogger({ service: 'prepuller' }))
      .child({ component: 'kubernetes-cluster-client', namespace: options.namespace });
  }

  /**
   * Build a client from the in-cluster or local kubeconfig
   */
  static fromKubeConfig(
    options: Omit<KubernetesClusterClientOptions, 'coreApi' | 'appsApi'>,
  ): KubernetesClusterClient {
    const kubeConfig = new k8s.KubeConfig();
    kubeConfig.loadFromDefault();
    return new KubernetesClusterClient({
      ...options,
      coreApi: kubeConfig.makeApiClient(k8s.CoreV1Api),
      appsApi: kubeConfig.makeApiClient(k8s.AppsV1Api),
    });
  }

  async listNodes(): Promise<NodeRecord[]> {
    try {
      const response = await this.coreApi.listNode();
      const records: NodeRecord[] = [];
      for (const node of response.items) {
        const record = toNodeRecord(node);
        if (record) {
          records.push(record);
        }
      }
      return records;
    } catch (error) {
      throw ClusterApiError.from('listNodes', error, apiStatusOf(error));
    }
  }

  async createPullWorkload(spec: PullWorkloadSpec): Promise<void> {
    try {
      await this.appsApi.createNamespacedDaemonSet({
        namespace: this.namespace,
        body: this.buildDaemonSet(spec),
      });
      this.logger.info('Pull workload created', { workload: spec.name, image: spec.image, policy: spec.policy });
    } catch (error) {
      throw ClusterApiError.from('createPullWorkload', error, apiStatusOf(error));
    }
  }

  async readPullWorkloadStatus(name: string): Promise<PullWorkloadStatus> {
    try {
      const daemonSet = await this.appsApi.readNamespacedDaemonSetStatus({ name, namespace: this.namespace });
      return {
        desiredNumberScheduled: daemonSet.status?.desiredNumberScheduled ?? 0,
        numberReady: daemonSet.status?.numberReady ?? 0,
      };
    } catch (error) {
      throw ClusterApiError.from('readPullWorkloadStatus', error, apiStatusOf(error));
    }
  }

  async deletePullWorkload(name: string): Promise<void> {
    try {
      await this.appsApi.deleteNamespacedDaemonSet({
        name,
        namespace: this.namespace,
        propagationPolicy: 'Background',
      });
      this.logger.debug('Pull workload deleted', { workload: name });
    } catch (error) {
      if (apiStatusOf(error) === 404) {
        return;
      }
      throw ClusterApiError.from('deletePullWorkload', error, apiStatusOf(error));
    }
  }

  async listPullWorkloads(): Promise<string[]> {
    try {
      const response = await this.appsApi.listNamespacedDaemonSet({
        namespace: this.namespace,
        labelSelector: `${MANAGED_BY_LABEL}=${MANAGED_BY_VALUE}`,
      });
      return response.items
        .map((daemonSet) => daemonSet.metadata?.name)
        .filter((name): name is string => typeof name === 'string');
    } catch (error) {
      throw ClusterApiError.from('listPullWorkloads', error, apiStatusOf(error));
    }
  }

  /**
   * DaemonSet manifest for one pull attempt
   */
  buildDaemonSet(spec: PullWorkloadSpec): k8s.V1DaemonSet {
    const labels = {
      [MANAGED_BY_LABEL]: MANAGED_BY_VALUE,
      [POLICY_LABEL]: spec.policy,
      [PULL_LABEL]: spec.name,
    };

    return {
      apiVersion: 'apps/v1',
      kind: 'DaemonSet',
      metadata: {
        name: spec.name,
        namespace: this.namespace,
        labels,
      },
      spec: {
        selector: { matchLabels: { [PULL_LABEL]: spec.name } },
        template: {
          metadata: { labels },
          spec: {
            automountServiceAccountToken: false,
            nodeSelector: { ...spec.nodeSelector },
            ...(this.pullSecretName !== undefined && {
              imagePullSecrets: [{ name: this.pullSecretName }],
            }),
            securityContext: {
              runAsNonRoot: true,
              runAsUser: 1000,
              runAsGroup: 1000,
            },
            containers: [
              {
                name: 'prepull',
                image: spec.image,
                imagePullPolicy: 'Always',
                command: ['/bin/sh', '-c', `sleep ${this.sleepSeconds}`],
                securityContext: {
                  allowPrivilegeEscalation: false,
                  capabilities: { drop: ['ALL'] },
                  readOnlyRootFilesystem: true,
                },
              },
            ],
          },
        },
      },
    };
  }
}
