/**
 * swarmplan topologies — registered DAG templates
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { defaultTopologies, type TopologyRegistry } from '@swarmplan/swarm';

export function formatTopologies(registry: TopologyRegistry): string {
    const lines: string[] = [];
    for (const name of registry.names()) {
        const definition = registry.get(name) ?? {};
        lines.push(chalk.bold(name));
        for (const [role, preds] of Object.entries(definition)) {
            lines.push(preds.length === 0
                ? `  ${role} ${chalk.dim('(root)')}`
                : `  ${role} ← ${preds.join(', ')}`);
        }
    }
    return lines.join('\n');
}

export function registerTopologiesCommand(program: Command): void {
    program.command('topologies')
        .description('List registered topologies and their edges')
        .action(() => {
            console.log(chalk.bold('\n🕸  Topologies\n'));
            console.log(formatTopologies(defaultTopologies));
            console.log();
        });
}
