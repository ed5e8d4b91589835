/**
 * swarmplan run — plan one feature with the agent swarm
 */

import { InvalidArgumentError, type Command } from 'commander';
import chalk from 'chalk';
import {
    InvalidTaskError, OrchestrationError, configFromEnv, createLogger, isSwarmError, type LogSink,
} from '@swarmplan/core';
import { createSwarm } from '@swarmplan/swarm';
import type { AggregatedResult, TrackResultKey, TrackTask } from '@swarmplan/shared-types';

export const DEFAULT_AGENTS = 'system_designer,angular_expert,dotnet_expert';
export const DEFAULT_TOPOLOGY = 'fullstack';

export interface RunCommandOptions {
    feature?: string;
    task?: string;
    agents: string;
    topology: string;
    model?: string;
    timeout?: number;
    json?: boolean;
}

/** Logs go to stderr so stdout carries only the plan */
const stderrSink: LogSink = {
    debug: (...args: unknown[]) => console.error(...args),
    log: (...args: unknown[]) => console.error(...args),
    warn: (...args: unknown[]) => console.error(...args),
    error: (...args: unknown[]) => console.error(...args),
};

export function parseAgentList(value: string): string[] {
    return value.split(',').map(a => a.trim()).filter(a => a.length > 0);
}

export function parseTimeout(value: string): number {
    const ms = Number(value);
    if (!Number.isInteger(ms) || ms <= 0) {
        throw new InvalidArgumentError('Expected a positive integer (ms).');
    }
    return ms;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** --task JSON, with --feature layered on top */
export function buildTask(opts: Pick<RunCommandOptions, 'feature' | 'task'>): Record<string, unknown> {
    let base: Record<string, unknown> = {};
    if (opts.task !== undefined) {
        let parsed: unknown;
        try {
            parsed = JSON.parse(opts.task);
        } catch (error) {
            throw new InvalidTaskError(`--task is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
        }
        if (!isRecord(parsed)) {
            throw new InvalidTaskError('--task must be a JSON object');
        }
        base = parsed;
    }
    if (opts.feature !== undefined) {
        base = { ...base, feature: opts.feature };
    }
    if (Object.keys(base).length === 0) {
        throw new InvalidTaskError('Provide --feature or --task');
    }
    return base;
}

export function describeTask(task: TrackTask): string {
    switch (task.type) {
        case 'component':
            return `component  ${task.name}`;
        case 'api_client':
            return `api_client ${task.method} ${task.endpoint}${task.dataModel ? ` → ${task.dataModel}` : ''}`;
        case 'controller':
            return `controller ${task.method} ${task.endpoint}`;
        case 'model':
            return `model      ${task.name}`;
        case 'service':
            return `service    ${task.name}`;
        case 'auth':
            return `auth       ${task.mechanism}`;
    }
}

function isTrackKey(key: string): key is TrackResultKey {
    return key.endsWith('_tasks');
}

export function formatResult(result: AggregatedResult): string {
    const lines: string[] = [];

    lines.push(chalk.bold('Design'));
    if (result.design) {
        lines.push(`  ${result.design.summary}`);
        lines.push(`  ${chalk.dim('endpoints')} ${result.design.apiEndpoints.map(e => `${e.method} ${e.path}`).join(', ') || '-'}`);
        lines.push(`  ${chalk.dim('models')}    ${result.design.dataModels.map(m => m.name).join(', ') || '-'}`);
    } else {
        lines.push(`  ${chalk.dim('no design role requested')}`);
    }

    for (const key of Object.keys(result)) {
        if (!isTrackKey(key)) continue;
        const tasks = result[key];
        lines.push('');
        lines.push(chalk.bold(`${key} (${tasks.length})`));
        for (const task of tasks) {
            lines.push(`  - ${describeTask(task)}`);
        }
    }

    lines.push('');
    lines.push(chalk.bold(`Sync points (${result.sync_points.length})`));
    for (const point of result.sync_points) {
        lines.push(`  ${chalk.cyan(`${point.producingTrack} → ${point.consumingTrack}`)} ${point.contractDescription}`);
        for (const issue of point.issues) {
            const tag = issue.severity === 'critical' ? chalk.red('critical') : chalk.yellow('adjust');
            lines.push(`    ! [${tag}] ${issue.type}: ${issue.detail}`);
        }
    }

    return lines.join('\n');
}

export function formatFailure(error: unknown): string {
    if (error instanceof OrchestrationError) {
        const lines = [chalk.red('✗ Run failed')];
        for (const f of error.failures) {
            lines.push(`  ${chalk.bold(f.role)} [${f.cause}] ${f.message}`);
        }
        if (error.skippedRoles.length > 0) {
            lines.push(`  ${chalk.dim('skipped')} ${error.skippedRoles.join(', ')}`);
        }
        return lines.join('\n');
    }
    if (isSwarmError(error)) {
        return chalk.red(`✗ ${error.kind}: ${error.message}`);
    }
    return chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`);
}

export function registerRunCommand(program: Command): void {
    program.command('run')
        .description('Plan a feature: design, per-track tasks and sync points')
        .option('-f, --feature <name>', 'Feature to plan, e.g. product_listing')
        .option('-t, --task <json>', 'Full task payload as a JSON object')
        .option('-a, --agents <list>', 'Comma-separated agent roles', DEFAULT_AGENTS)
        .option('--topology <name>', 'Topology name', DEFAULT_TOPOLOGY)
        .option('-m, --model <id>', 'Model: "mock", "provider/model" or a bare OpenAI id')
        .option('--timeout <ms>', 'Whole-run timeout in milliseconds', parseTimeout)
        .option('--json', 'Print the result as JSON')
        .action(async (opts: RunCommandOptions) => {
            const controller = new AbortController();
            const onSigint = () => controller.abort();
            process.once('SIGINT', onSigint);
            try {
                const env = configFromEnv();
                const logLevel = env.logLevel ?? (opts.json ? 'warn' : 'info');
                const swarm = createSwarm(parseAgentList(opts.agents), opts.topology, {
                    ...env,
                    modelName: opts.model ?? env.modelName,
                    runTimeoutMs: opts.timeout ?? env.runTimeoutMs,
                    logLevel,
                    logger: createLogger('Swarm', { level: logLevel, sink: stderrSink }),
                });
                const result = await swarm.run(buildTask(opts), { signal: controller.signal });
                console.log(opts.json ? JSON.stringify(result, null, 2) : formatResult(result));
            } catch (error) {
                console.error(formatFailure(error));
                process.exitCode = 1;
            } finally {
                process.off('SIGINT', onSigint);
            }
        });
}
