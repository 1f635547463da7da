/**
 * prepuller CLI
 *
 * Command-line interface for managing cache policies.
 * @module @prepuller/cli
 */

import { Command } from 'commander';
import { loadConfig } from './config';
import { isOutputFormat, setOutputFormat } from './output';
import { createPolicyCommand } from './commands/policy';
import { createAvailableCommand } from './commands/available';

/**
 * CLI version from package.json
 */
const VERSION = '0.1.0';

/**
 * CLI program description
 */
const DESCRIPTION = `
prepuller CLI

Keeps container images pre-pulled on label-selected Kubernetes nodes.

Commands:
  policy      Cache policy management (list, get, create, delete)
  available   Images present on every node matching a selector

Examples:
  $ prepuller policy create -f jupyter.json
  $ prepuller policy get jupyter
  $ prepuller available -l jupyterlab=ok
`;

/**
 * Creates and configures the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('prepuller')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(DESCRIPTION)
    .option('-o, --output <format>', 'Output format: json, table, plain', loadConfig().defaultOutputFormat ?? 'table')
    .option('--api-url <url>', 'API server URL')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();

      if (isOutputFormat(opts.output)) {
        setOutputFormat(opts.output);
      }

      // Picked up by loadConfig()
      if (typeof opts.apiUrl === 'string' && opts.apiUrl !== '') {
        process.env.PREPULLER_API_URL = opts.apiUrl;
      }

      if (opts.color === false) {
        process.env.FORCE_COLOR = '0';
      }
    });

  program.addCommand(createPolicyCommand());
  program.addCommand(createAvailableCommand());

  program
    .command('config')
    .description('Show CLI configuration')
    .action(() => {
      console.log(JSON.stringify(loadConfig(), null, 2));
    });

  return program;
}

/**
 * Main entry point
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof Error) {
      console.error('Error:', err.message);
    }
    process.exit(1);
  }
}

export { createApiClient, loadConfig, type CliConfig } from './config';
