/**
 * @swarmplan/swarm — Scheduler
 *
 * Per-run node state machine over a TaskGraph.
 * pending → ready → running → done | failed; pending → skipped when an ancestor fails.
 * All transitions go through here, so a node is promoted at most once.
 */

import type { PartialOutput } from '@swarmplan/shared-types';
import type { TaskGraph } from './dag.js';

export type NodeStatus = 'pending' | 'ready' | 'running' | 'done' | 'failed' | 'skipped';

export interface GraphNode {
    role: string;
    status: NodeStatus;
    predecessors: readonly string[];
    output?: PartialOutput;
    error?: Error;
    startedAt?: number;
    finishedAt?: number;
}

export interface TransitionEvent {
    runId: string;
    role: string;
    from: NodeStatus;
    to: NodeStatus;
    at: number;
}

export interface SchedulerConfig {
    maxConcurrent: number;
    runId: string;
    onTransition?: (event: TransitionEvent) => void;
    now?: () => number;
}

const TERMINAL: ReadonlySet<NodeStatus> = new Set<NodeStatus>(['done', 'failed', 'skipped']);

export class Scheduler {
    private nodes: Map<string, GraphNode> = new Map();
    private order: string[];
    private frozen = false;
    private config: SchedulerConfig;
    private now: () => number;

    constructor(private graph: TaskGraph, config: SchedulerConfig) {
        this.config = config;
        this.now = config.now ?? Date.now;
        this.order = graph.topologicalOrder();
        for (const role of graph.roles) {
            const predecessors = graph.predecessorsOf(role);
            this.nodes.set(role, {
                role,
                status: predecessors.length === 0 ? 'ready' : 'pending',
                predecessors,
            });
        }
    }

    /** Ready nodes in topological order, up to the free concurrency slots */
    nextBatch(): GraphNode[] {
        if (this.frozen) return [];
        const slots = this.config.maxConcurrent - this.runningCount();
        if (slots <= 0) return [];
        return this.order
            .map(role => this.node(role))
            .filter(n => n.status === 'ready')
            .slice(0, slots);
    }

    start(role: string): void {
        const node = this.node(role);
        this.transition(node, 'ready', 'running', () => {
            node.startedAt = this.now();
        });
    }

    /** Mark done and promote successors whose predecessors are all done */
    complete(role: string, output: PartialOutput): string[] {
        const node = this.node(role);
        this.transition(node, 'running', 'done', () => {
            node.output = output;
            node.finishedAt = this.now();
        });

        const promoted: string[] = [];
        for (const s of this.graph.successorsOf(role)) {
            const succ = this.node(s);
            if (succ.status === 'pending' && succ.predecessors.every(p => this.node(p).status === 'done')) {
                this.transition(succ, 'pending', 'ready');
                promoted.push(s);
            }
        }
        return promoted;
    }

    /** Mark failed and skip every pending descendant */
    fail(role: string, error: Error): string[] {
        const node = this.node(role);
        this.transition(node, 'running', 'failed', () => {
            node.error = error;
            node.finishedAt = this.now();
        });

        const skipped: string[] = [];
        for (const d of this.graph.descendantsOf(role)) {
            const desc = this.node(d);
            if (desc.status === 'pending') {
                this.transition(desc, 'pending', 'skipped');
                skipped.push(d);
            }
        }
        return skipped;
    }

    /** No transitions after this; used on cancellation */
    freeze(): void {
        this.frozen = true;
    }

    isFrozen(): boolean {
        return this.frozen;
    }

    /** Nothing ready and nothing running */
    isSettled(): boolean {
        return [...this.nodes.values()].every(n => n.status !== 'ready' && n.status !== 'running');
    }

    runningCount(): number {
        return [...this.nodes.values()].filter(n => n.status === 'running').length;
    }

    getNode(role: string): Readonly<GraphNode> | undefined {
        return this.nodes.get(role);
    }

    /** Copies of every node, in requested order */
    snapshot(): GraphNode[] {
        return this.graph.roles.map(role => ({ ...this.node(role) }));
    }

    rolesWith(status: NodeStatus): string[] {
        return this.graph.roles.filter(role => this.node(role).status === status);
    }

    stats() {
        const nodes = [...this.nodes.values()];
        const count = (s: NodeStatus) => nodes.filter(n => n.status === s).length;
        return {
            total: nodes.length,
            pending: count('pending'),
            ready: count('ready'),
            running: count('running'),
            done: count('done'),
            failed: count('failed'),
            skipped: count('skipped'),
            terminal: nodes.filter(n => TERMINAL.has(n.status)).length,
        };
    }

    private node(role: string): GraphNode {
        const node = this.nodes.get(role);
        if (!node) throw new Error(`Node "${role}" not found`);
        return node;
    }

    /** `apply` fills in the node before listeners see the move */
    private transition(node: GraphNode, from: NodeStatus, to: NodeStatus, apply?: () => void): void {
        if (this.frozen) {
            throw new Error(`Scheduler is frozen: ${node.role} cannot move to ${to}`);
        }
        if (node.status !== from) {
            throw new Error(`Illegal transition for ${node.role}: ${node.status} → ${to}`);
        }
        node.status = to;
        apply?.();
        this.config.onTransition?.({ runId: this.config.runId, role: node.role, from, to, at: this.now() });
    }
}
