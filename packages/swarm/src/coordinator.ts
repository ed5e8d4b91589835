/**
 * @swarmplan/swarm — Coordinator
 *
 * Builds the graph and agents once, then drives runs: launch every ready
 * node, wait for the first settlement or cancellation, apply the transition,
 * repeat. The loop is the only writer of node state.
 *
 * On cancellation the scheduler is frozen and every in-flight node is
 * aborted; the run rejects at once, and late settlements are discarded.
 */

import {
    AgentError, BackendError, CancelledError, EventBus, InvalidTopologyError, OrchestrationError,
    createConfig, createLogger,
    type EventHandler, type Logger, type RoleFailure, type SwarmConfig,
} from '@swarmplan/core';
import { createBackend, withRetry, type ModelBackend } from '@swarmplan/brain';
import type { AggregatedResult, PartialOutput } from '@swarmplan/shared-types';
import { Agent } from './agent.js';
import { aggregate } from './aggregator.js';
import { TaskGraph } from './dag.js';
import { getRole } from './roles.js';
import { Scheduler, type GraphNode, type TransitionEvent } from './scheduler.js';
import { SharedContext } from './shared-context.js';
import { defaultTopologies, type TopologyRegistry } from './topologies.js';

export interface SwarmOptions extends Partial<SwarmConfig> {
    /** Overrides the backend chosen from modelName; still wrapped in retries */
    backend?: ModelBackend;
    logger?: Logger;
    topologies?: TopologyRegistry;
}

export interface RunOptions {
    signal?: AbortSignal;
}

export type SwarmEvents = {
    transition: TransitionEvent;
    'run:start': { runId: string; topology: string; roles: string[] };
    'run:end': { runId: string; status: 'done' | 'failed' | 'cancelled'; durationMs: number };
};

/** Handle for a run started with Swarm.start() */
export interface SwarmRun {
    readonly id: string;
    readonly result: Promise<AggregatedResult>;
    /** Abort every in-flight node; result rejects with CancelledError */
    cancel(reason?: string): void;
    snapshot(): GraphNode[];
}

interface Built {
    graph: TaskGraph;
    agents: Map<string, Agent>;
}

type Settlement =
    | { role: string; ok: true; output: PartialOutput }
    | { role: string; ok: false; error: Error };

const ABORTED = Symbol('aborted');

export class Swarm {
    readonly agentIds: readonly string[];
    readonly topology: string;
    readonly config: SwarmConfig;

    private logger: Logger;
    private backendOverride?: ModelBackend;
    private registry: TopologyRegistry;
    private built?: Built;
    private events = new EventBus<SwarmEvents>({
        onHandlerError: (error, event) => {
            this.logger.error(`Listener for "${event}" failed: ${error instanceof Error ? error.message : String(error)}`);
        },
    });
    private runCount = 0;

    constructor(agentIds: readonly string[], topologyName: string, options: SwarmOptions = {}) {
        const { backend, logger, topologies, ...overrides } = options;
        this.agentIds = [...agentIds];
        this.topology = topologyName;
        this.config = createConfig(overrides);
        this.logger = logger ?? createLogger('Swarm', { level: this.config.logLevel });
        this.backendOverride = backend;
        this.registry = topologies ?? defaultTopologies;
    }

    /** Validate topology and agents; idempotent */
    build(): TaskGraph {
        return this.ensureBuilt().graph;
    }

    get graph(): TaskGraph {
        return this.build();
    }

    on<K extends keyof SwarmEvents>(event: K, handler: EventHandler<SwarmEvents[K]>): () => void {
        return this.events.on(event, handler);
    }

    off<K extends keyof SwarmEvents>(event: K, handler: EventHandler<SwarmEvents[K]>): void {
        this.events.off(event, handler);
    }

    /** Awaited form */
    async run(task: unknown, options?: RunOptions): Promise<AggregatedResult> {
        return this.start(task, options).result;
    }

    /** Detached form; build and task errors throw here, before anything runs */
    start(task: unknown, options: RunOptions = {}): SwarmRun {
        const { graph, agents } = this.ensureBuilt();
        const context = new SharedContext(task);
        const runId = `run_${Date.now().toString(36)}_${++this.runCount}`;

        const controller = new AbortController();
        const signals = [controller.signal];
        if (options.signal) signals.push(options.signal);
        if (this.config.runTimeoutMs !== undefined) signals.push(AbortSignal.timeout(this.config.runTimeoutMs));
        const signal = AbortSignal.any(signals);

        const scheduler = new Scheduler(graph, {
            runId,
            maxConcurrent: this.config.maxConcurrent,
            onTransition: event => this.events.emit('transition', event),
        });

        const result = this.loop({ runId, graph, agents, context, scheduler, signal });
        return {
            id: runId,
            result,
            cancel: reason => controller.abort(new CancelledError('aborted', reason)),
            snapshot: () => scheduler.snapshot(),
        };
    }

    private ensureBuilt(): Built {
        if (this.built) return this.built;

        const graph = TaskGraph.build(this.topology, this.agentIds, this.registry);
        for (const edge of graph.droppedEdges) {
            this.logger.debug(`Dropped edge ${edge.predecessor} → ${edge.role}: predecessor not requested`);
        }

        const backend = this.backendOverride
            ? withRetry(this.backendOverride, this.config, this.logger.child('Backend'))
            : createBackend(this.config, { logger: this.logger.child('Backend') });

        const agents = new Map<string, Agent>();
        for (const id of graph.roles) {
            const role = getRole(id);
            if (!role) throw new InvalidTopologyError(`Role "${id}" has no definition`);
            agents.set(id, new Agent({ role, backend, logger: this.logger.child(id) }));
        }

        this.built = { graph, agents };
        this.logger.debug(`Built ${this.topology}: ${graph.topologicalOrder().join(' → ')}`, { backend: backend.name });
        return this.built;
    }

    private async loop(run: {
        runId: string;
        graph: TaskGraph;
        agents: Map<string, Agent>;
        context: SharedContext;
        scheduler: Scheduler;
        signal: AbortSignal;
    }): Promise<AggregatedResult> {
        const { runId, graph, agents, context, scheduler, signal } = run;
        const started = Date.now();
        const inFlight = new Map<string, { controller: AbortController; settled: Promise<Settlement> }>();
        const failures: RoleFailure[] = [];
        let status: SwarmEvents['run:end']['status'] | undefined;

        let onAbort: (() => void) | undefined;
        const aborted = new Promise<typeof ABORTED>(resolve => {
            onAbort = () => resolve(ABORTED);
            if (signal.aborted) resolve(ABORTED);
            else signal.addEventListener('abort', onAbort, { once: true });
        });
        const stopInFlight = () => {
            scheduler.freeze();
            for (const { controller } of inFlight.values()) controller.abort();
        };

        this.events.emit('run:start', { runId, topology: graph.topology, roles: [...graph.roles] });
        this.logger.info(`Run ${runId} started`, { topology: graph.topology, roles: graph.roles });

        try {
            while (!signal.aborted) {
                for (const node of scheduler.nextBatch()) {
                    const agent = agents.get(node.role);
                    if (!agent) throw new Error(`No agent for "${node.role}"`);
                    scheduler.start(node.role);
                    const controller = new AbortController();
                    const upstream = context.outputsFor(graph.ancestorsOf(node.role));
                    inFlight.set(node.role, { controller, settled: settle(agent, context, upstream, controller.signal) });
                }
                if (inFlight.size === 0) break;

                const next = await Promise.race([aborted, ...[...inFlight.values()].map(f => f.settled)]);
                if (next === ABORTED || signal.aborted) break;

                inFlight.delete(next.role);
                if (next.ok) {
                    context.addResult(next.role, next.output);
                    const promoted = scheduler.complete(next.role, next.output);
                    this.logger.info(`${next.role} done`, promoted.length > 0 ? { ready: promoted } : undefined);
                } else {
                    failures.push(failureOf(next.role, next.error));
                    const skipped = scheduler.fail(next.role, next.error);
                    this.logger.error(`${next.role} failed: ${next.error.message}`, skipped.length > 0 ? { skipped } : undefined);
                }
            }

            if (signal.aborted) {
                stopInFlight();
                const error = cancelledFrom(signal.reason, this.config.runTimeoutMs);
                this.logger.warn(`Run ${runId} cancelled: ${error.message}`, { running: [...inFlight.keys()] });
                status = 'cancelled';
                throw error;
            }

            if (failures.length > 0) {
                status = 'failed';
                throw new OrchestrationError(failures, scheduler.rolesWith('skipped'), context.completed());
            }

            const result = aggregate(graph, context.completed(), this.logger);
            this.logger.info(`Run ${runId} done`, { ms: Date.now() - started, syncPoints: result.sync_points.length });
            status = 'done';
            return result;
        } catch (error) {
            if (status === undefined) {
                stopInFlight();
                status = 'failed';
                this.logger.error(`Run ${runId} aborted by an internal error`, { running: [...inFlight.keys()] });
            }
            throw error;
        } finally {
            if (onAbort) signal.removeEventListener('abort', onAbort);
            this.events.emit('run:end', { runId, status: status ?? 'failed', durationMs: Date.now() - started });
        }
    }
}

/** Never rejects: failures come back as values for the loop to apply */
async function settle(
    agent: Agent,
    context: SharedContext,
    upstream: Record<string, PartialOutput>,
    signal: AbortSignal,
): Promise<Settlement> {
    const role = agent.role.name;
    try {
        const output = await agent.run(context.task, upstream, { signal });
        return { role, ok: true, output };
    } catch (error) {
        return { role, ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
}

function failureOf(role: string, error: Error): RoleFailure {
    const backend = error instanceof AgentError && error.cause instanceof BackendError ? error.cause : undefined;
    return {
        role,
        message: error.message,
        cause: backend ? (backend.transient ? 'transient' : 'permanent') : 'mapping',
        error,
    };
}

function cancelledFrom(reason: unknown, runTimeoutMs?: number): CancelledError {
    if (reason instanceof CancelledError) return reason;
    if (typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError') {
        return new CancelledError('timeout', runTimeoutMs !== undefined ? `Run timed out after ${runTimeoutMs}ms` : undefined);
    }
    return new CancelledError('aborted');
}

/** Factory */
export function createSwarm(agentIds: readonly string[], topologyName: string, options?: SwarmOptions): Swarm {
    return new Swarm(agentIds, topologyName, options);
}
