/**
 * @swarmplan/cli — Command tree
 *
 * Thin wrapper over the swarm API; no planning logic lives here.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { registerRunCommand } from './commands/run.js';
import { registerTopologiesCommand } from './commands/topologies.js';
import { registerRolesCommand } from './commands/roles.js';

export const VERSION = '0.1.0';

const BANNER = `
${chalk.cyan('  swarmplan')} ${chalk.dim(`v${VERSION}`)}
${chalk.green('  ──────────────────────────────────────')}
${chalk.dim('  design → tracks → sync points')}
`;

export function createProgram(): Command {
  const program = new Command();

  program
    .name('swarmplan')
    .description('Plan fullstack features with a swarm of role agents')
    .version(VERSION)
    .addHelpText('beforeAll', BANNER);

  registerRunCommand(program);
  registerTopologiesCommand(program);
  registerRolesCommand(program);

  return program;
}
