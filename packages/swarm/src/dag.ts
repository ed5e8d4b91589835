/**
 * @swarmplan/swarm — Task graph
 *
 * Projection of a registered topology onto the requested agents.
 * Immutable once built; per-run state lives in the Scheduler.
 */

import { InvalidTopologyError, UnknownAgentError, UnknownTopologyError } from '@swarmplan/core';
import { defaultTopologies, type TopologyRegistry } from './topologies.js';

export interface DroppedEdge {
    role: string;
    /** Topology predecessor that was not requested */
    predecessor: string;
}

export class TaskGraph {
    private preds: Map<string, string[]>;
    private succs: Map<string, string[]>;

    private constructor(
        readonly topology: string,
        readonly roles: readonly string[],
        preds: Map<string, string[]>,
        readonly droppedEdges: readonly DroppedEdge[],
    ) {
        this.preds = preds;
        this.succs = new Map(roles.map((r): [string, string[]] => [r, roles.filter(s => preds.get(s)?.includes(r))]));
    }

    /** Validate the request against the topology and project it */
    static build(topologyName: string, agentIds: readonly string[], registry: TopologyRegistry = defaultTopologies): TaskGraph {
        const definition = registry.get(topologyName);
        if (!definition) {
            throw new UnknownTopologyError(topologyName, registry.names());
        }
        if (agentIds.length === 0) {
            throw new InvalidTopologyError('No agents requested');
        }
        const duplicates = agentIds.filter((id, i) => agentIds.indexOf(id) !== i);
        if (duplicates.length > 0) {
            throw new InvalidTopologyError(`Duplicate agents: ${[...new Set(duplicates)].join(', ')}`);
        }
        for (const id of agentIds) {
            if (!Object.hasOwn(definition, id)) {
                throw new UnknownAgentError(id, topologyName);
            }
        }

        const requested = new Set(agentIds);
        const preds = new Map<string, string[]>();
        const dropped: DroppedEdge[] = [];
        for (const id of agentIds) {
            const declared = definition[id] ?? [];
            preds.set(id, declared.filter(p => requested.has(p)));
            for (const p of declared) {
                if (!requested.has(p)) dropped.push({ role: id, predecessor: p });
            }
        }

        return new TaskGraph(topologyName, Object.freeze([...agentIds]), preds, Object.freeze(dropped));
    }

    predecessorsOf(role: string): string[] {
        return [...this.require(role, this.preds)];
    }

    successorsOf(role: string): string[] {
        return [...this.require(role, this.succs)];
    }

    /** Transitive predecessors, in requested order */
    ancestorsOf(role: string): string[] {
        const found = this.walk(role, this.preds);
        return this.roles.filter(r => found.has(r));
    }

    /** Transitive successors, in requested order */
    descendantsOf(role: string): string[] {
        const found = this.walk(role, this.succs);
        return this.roles.filter(r => found.has(r));
    }

    /** True if `role` depends on `other`, directly or transitively */
    dependsOn(role: string, other: string): boolean {
        return this.walk(role, this.preds).has(other);
    }

    roots(): string[] {
        return this.roles.filter(r => this.require(r, this.preds).length === 0);
    }

    /** Kahn's algorithm; ties broken by requested order */
    topologicalOrder(): string[] {
        const remaining = new Map(this.roles.map((r): [string, number] => [r, this.require(r, this.preds).length]));
        const order: string[] = [];
        while (order.length < this.roles.length) {
            const next = this.roles.find(r => remaining.get(r) === 0);
            if (next === undefined) {
                // Topologies are validated on registration, so this only guards a corrupted registry
                throw new InvalidTopologyError(`Cycle in topology "${this.topology}"`);
            }
            remaining.delete(next);
            order.push(next);
            for (const s of this.require(next, this.succs)) {
                const left = remaining.get(s);
                if (left !== undefined) remaining.set(s, left - 1);
            }
        }
        return order;
    }

    /** Unordered pairs sharing an immediate predecessor, with no dependency either way */
    siblingPairs(): Array<[string, string]> {
        const pairs: Array<[string, string]> = [];
        for (let i = 0; i < this.roles.length; i++) {
            for (let j = i + 1; j < this.roles.length; j++) {
                const a = this.roles[i];
                const b = this.roles[j];
                const shared = this.require(a, this.preds).some(p => this.require(b, this.preds).includes(p));
                if (shared && !this.dependsOn(a, b) && !this.dependsOn(b, a)) {
                    pairs.push([a, b]);
                }
            }
        }
        return pairs;
    }

    has(role: string): boolean {
        return this.preds.has(role);
    }

    private require(role: string, table: Map<string, string[]>): string[] {
        const entry = table.get(role);
        if (!entry) throw new Error(`Role "${role}" is not in the graph`);
        return entry;
    }

    private walk(role: string, table: Map<string, string[]>): Set<string> {
        const seen = new Set<string>();
        const stack = [...this.require(role, table)];
        while (stack.length > 0) {
            const id = stack.pop();
            if (id === undefined || seen.has(id)) continue;
            seen.add(id);
            stack.push(...this.require(id, table));
        }
        return seen;
    }
}
