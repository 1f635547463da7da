/**
 * Policy Commands
 *
 * Cache policy management commands: list, get, create, delete
 * @module @prepuller/cli/commands/policy
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs';
import { formatLabelSelector, type DesiredImage, type PullJobState } from '@prepuller/shared';
import { createApiClient, ApiRequestError, type ApiClient } from '../config';
import {
  error,
  info,
  success,
  warn,
  table,
  keyValue,
  getOutputFormat,
  output,
  statusBadge,
  relativeTime,
  truncate,
} from '../output';

/**
 * Pull job as served by the API
 */
export interface PullJobView {
  id: string;
  imageReference: string;
  state: PullJobState;
  targetNodeCount: number;
  completedNodeCount: number;
  attempt: number;
  lastError?: string;
}

/**
 * Policy status as served by the API
 */
export interface PolicyStatusView {
  name: string;
  labelSelector: Record<string, string>;
  desired: DesiredImage[];
  all: DesiredImage[];
  pulling: PullJobView[];
  available: DesiredImage[];
  availableReferences: string[];
  targetNodeCount: number;
  sourceErrors: Array<{ strategy: string; message: string }>;
  lastReconciledAt?: string;
  lastError?: string;
}

/**
 * Row per desired image: available, being pulled, or missing
 */
export function imageRows(status: PolicyStatusView): Array<Record<string, unknown>> {
  const available = new Set(status.available.map((image) => image.imageReference));
  return status.desired.map((image) => {
    const job = status.pulling.find((candidate) => candidate.imageReference === image.imageReference);
    let state: string;
    if (available.has(image.imageReference)) {
      state = 'available';
    } else if (job) {
      state = job.state;
    } else {
      state = 'missing';
    }
    return {
      name: image.displayName,
      reference: truncate(image.imageReference, 72),
      status: statusBadge(state),
      nodes: job ? `${job.completedNodeCount}/${job.targetNodeCount}` : '',
    };
  });
}

function policyPath(name: string): string {
  return `/${encodeURIComponent(name)}`;
}

/**
 * List command handler - one row per policy
 */
export async function listHandler(api: ApiClient): Promise<void> {
  const { policies } = await api.get<{ policies: string[] }>('/');
  const statuses = await Promise.all(policies.map((name) => api.get<PolicyStatusView>(policyPath(name))));

  if (getOutputFormat() === 'json') {
    output(statuses);
    return;
  }

  if (statuses.length === 0) {
    info('No cache policies');
    return;
  }

  table(
    statuses.map((status) => ({
      name: status.name,
      selector: formatLabelSelector(status.labelSelector),
      nodes: status.targetNodeCount,
      desired: status.desired.length,
      available: status.available.length,
      pulling: status.pulling.filter((job) => job.state !== 'failed').length,
      reconciled: status.lastReconciledAt ? relativeTime(status.lastReconciledAt) : 'never',
    })),
    [
      { key: 'name', header: 'NAME' },
      { key: 'selector', header: 'SELECTOR' },
      { key: 'nodes', header: 'NODES' },
      { key: 'desired', header: 'DESIRED' },
      { key: 'available', header: 'AVAILABLE' },
      { key: 'pulling', header: 'PULLING' },
      { key: 'reconciled', header: 'RECONCILED' },
    ]
  );
}

/**
 * Get command handler - status and images of one policy
 */
export async function getHandler(api: ApiClient, name: string): Promise<void> {
  const status = await api.get<PolicyStatusView>(policyPath(name));

  if (getOutputFormat() === 'json') {
    output(status);
    return;
  }

  keyValue({
    Name: status.name,
    Selector: formatLabelSelector(status.labelSelector),
    'Target nodes': status.targetNodeCount,
    'Last reconciled': status.lastReconciledAt ? relativeTime(status.lastReconciledAt) : null,
    'Last error': status.lastError ?? null,
  });

  console.log();
  console.log(chalk.bold('Images'));
  table(imageRows(status), [
    { key: 'name', header: 'NAME' },
    { key: 'reference', header: 'REFERENCE' },
    { key: 'status', header: 'STATUS' },
    { key: 'nodes', header: 'NODES' },
  ]);

  for (const sourceError of status.sourceErrors) {
    warn(`${sourceError.strategy}: ${sourceError.message}`);
  }
  for (const job of status.pulling) {
    if (job.state === 'failed' && job.lastError) {
      warn(`Pull of ${job.imageReference} failed (attempt ${job.attempt}): ${job.lastError}`);
    }
  }
}

/**
 * Create command handler - posts a policy definition read from a JSON file
 */
export async function createHandler(api: ApiClient, file: string): Promise<void> {
  let definition: unknown;
  try {
    definition = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ApiRequestError(`Cannot read policy file ${file}: ${reason}`, 'INVALID_INPUT', 0);
  }

  const status = await api.post<PolicyStatusView>('/', definition);

  if (getOutputFormat() === 'json') {
    output(status);
    return;
  }
  success(`Cache policy "${status.name}" created`);
}

/**
 * Delete command handler
 */
export async function deleteHandler(api: ApiClient, name: string): Promise<void> {
  const { deleted } = await api.delete<{ deleted: boolean }>(policyPath(name));

  if (getOutputFormat() === 'json') {
    output({ name, deleted });
    return;
  }
  if (deleted) {
    success(`Cache policy "${name}" deleted`);
  } else {
    info(`Cache policy "${name}" did not exist`);
  }
}

/**
 * Report a failed command and set a failing exit code
 */
export function reportFailure(err: unknown): void {
  if (err instanceof ApiRequestError) {
    const details = err.details?.errors;
    error(err.message, details);
  } else {
    error(err instanceof Error ? err.message : String(err));
  }
  process.exitCode = 1;
}

/**
 * Run a handler with a fresh API client
 */
export function withApi<A extends unknown[]>(
  handler: (api: ApiClient, ...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await handler(createApiClient(), ...args);
    } catch (err) {
      reportFailure(err);
    }
  };
}

/**
 * Creates the policy command group
 */
export function createPolicyCommand(): Command {
  const policy = new Command('policy')
    .description('Cache policy management');

  policy
    .command('list')
    .alias('ls')
    .description('List cache policies')
    .action(withApi((api) => listHandler(api)));

  policy
    .command('get <name>')
    .description('Show status and images of a cache policy')
    .action(withApi((api, name: string) => getHandler(api, name)));

  policy
    .command('create')
    .description('Create a cache policy from a JSON definition')
    .requiredOption('-f, --file <path>', 'Policy definition file')
    .action(withApi((api, options: { file: string }) => createHandler(api, options.file)));

  policy
    .command('delete <name>')
    .alias('rm')
    .description('Delete a cache policy')
    .action(withApi((api, name: string) => deleteHandler(api, name)));

  return policy;
}
