/**
 * swarmplan roles — agent role catalog
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { getAllRoles, type RoleDefinition } from '@swarmplan/swarm';

export function formatRoles(roles: RoleDefinition[]): string {
    const lines = [`  ${chalk.dim('Role'.padEnd(18))} ${chalk.dim('Kind'.padEnd(9))} ${chalk.dim('Stack')}`];
    lines.push(`  ${'─'.repeat(40)}`);
    for (const role of roles) {
        const color = role.kind === 'design' ? chalk.magenta : role.kind === 'frontend' ? chalk.blue : chalk.green;
        lines.push(`  ${role.name.padEnd(18)} ${color(role.kind.padEnd(9))} ${role.stack}`);
    }
    return lines.join('\n');
}

export function registerRolesCommand(program: Command): void {
    program.command('roles')
        .description('List agent roles')
        .action(() => {
            const roles = getAllRoles();
            console.log(chalk.bold('\n👥 Agent Roles\n'));
            console.log(formatRoles(roles));
            console.log(`\n  ${chalk.dim(`Total: ${roles.length} roles`)}\n`);
        });
}
