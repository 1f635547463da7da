/**
 * Available Command
 *
 * Lists images present on every node matching a label selector,
 * independent of any policy.
 * @module @prepuller/cli/commands/available
 */

import { Command } from 'commander';
import { formatLabelSelector, parseLabelSelector, type Labels } from '@prepuller/shared';
import type { ApiClient } from '../config';
import { getOutputFormat, info, output, table } from '../output';
import { withApi } from './policy';

/**
 * Availability as served by the API
 */
export interface AvailabilityView {
  labelSelector: Labels;
  nodeCount: number;
  images: string[];
}

/**
 * Collect repeated `-l key=value` options
 */
function collectLabel(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Available command handler
 */
export async function availableHandler(api: ApiClient, labels: string[]): Promise<void> {
  // Throws on a malformed selector before any request is made
  const selector = parseLabelSelector(labels.join(','));
  const query = new URLSearchParams({ labels: labels.join(',') });
  const result = await api.get<AvailabilityView>(`/available?${query.toString()}`);

  if (getOutputFormat() === 'json') {
    output(result);
    return;
  }

  info(`${result.nodeCount} node(s) match ${formatLabelSelector(selector)}`);
  table(
    result.images.map((image) => ({ image })),
    [{ key: 'image', header: 'IMAGE' }]
  );
}

/**
 * Creates the available command
 */
export function createAvailableCommand(): Command {
  return new Command('available')
    .description('List images present on every node matching the labels')
    .option('-l, --label <key=value>', 'Node label to match (repeatable)', collectLabel, [])
    .action(withApi((api, options: { label: string[] }) => availableHandler(api, options.label)));
}
