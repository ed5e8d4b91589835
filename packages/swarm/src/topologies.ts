/**
 * @swarmplan/swarm — Topology registry
 *
 * A topology is a named DAG template: role → direct predecessors.
 * Registration validates it once, so building a graph only has to project it.
 */

import { InvalidTopologyError } from '@swarmplan/core';
import { getRole } from './roles.js';

export type TopologyDefinition = Readonly<Record<string, readonly string[]>>;

export const BUILT_IN_TOPOLOGIES: Readonly<Record<string, TopologyDefinition>> = {
    /** Design first, then every track in parallel */
    fullstack: {
        system_designer: [],
        angular_expert: ['system_designer'],
        react_expert: ['system_designer'],
        dotnet_expert: ['system_designer'],
        node_expert: ['system_designer'],
    },
    /** Backends plan the API before the frontends that consume it */
    api_first: {
        system_designer: [],
        dotnet_expert: ['system_designer'],
        node_expert: ['system_designer'],
        angular_expert: ['dotnet_expert'],
        react_expert: ['node_expert'],
    },
};

export class TopologyRegistry {
    private topologies: Map<string, TopologyDefinition> = new Map();

    constructor(initial: Readonly<Record<string, TopologyDefinition>> = {}) {
        for (const [name, definition] of Object.entries(initial)) {
            this.register(name, definition);
        }
    }

    /** Add a topology; throws InvalidTopologyError if it is not a valid DAG of known roles */
    register(name: string, definition: TopologyDefinition): void {
        if (this.topologies.has(name)) {
            throw new InvalidTopologyError(`Topology "${name}" already registered`);
        }
        const roles = Object.keys(definition);
        if (roles.length === 0) {
            throw new InvalidTopologyError(`Topology "${name}" declares no roles`);
        }

        for (const role of roles) {
            if (!getRole(role)) {
                throw new InvalidTopologyError(`Topology "${name}": unknown role "${role}"`);
            }
            for (const dep of definition[role] ?? []) {
                if (!Object.hasOwn(definition, dep)) {
                    throw new InvalidTopologyError(`Topology "${name}": predecessor "${dep}" of "${role}" is not declared`);
                }
                if (dep === role) {
                    throw new InvalidTopologyError(`Topology "${name}": "${role}" depends on itself`);
                }
            }
        }

        const cycle = findCycle(definition);
        if (cycle) {
            throw new InvalidTopologyError(`Topology "${name}": cycle ${cycle.join(' → ')}`);
        }

        const copy: Record<string, readonly string[]> = {};
        for (const role of roles) {
            copy[role] = Object.freeze([...(definition[role] ?? [])]);
        }
        this.topologies.set(name, Object.freeze(copy));
    }

    get(name: string): TopologyDefinition | undefined {
        return this.topologies.get(name);
    }

    has(name: string): boolean {
        return this.topologies.has(name);
    }

    names(): string[] {
        return [...this.topologies.keys()];
    }
}

/** First cycle found, as a closed path, or undefined */
export function findCycle(definition: TopologyDefinition): string[] | undefined {
    const visited = new Set<string>();
    const stack: string[] = [];

    const dfs = (id: string): string[] | undefined => {
        const at = stack.indexOf(id);
        if (at !== -1) return [...stack.slice(at), id];
        if (visited.has(id)) return undefined;
        visited.add(id);
        stack.push(id);
        for (const dep of definition[id] ?? []) {
            const cycle = dfs(dep);
            if (cycle) return cycle;
        }
        stack.pop();
        return undefined;
    };

    for (const id of Object.keys(definition)) {
        const cycle = dfs(id);
        if (cycle) return cycle;
    }
    return undefined;
}

export const defaultTopologies = new TopologyRegistry(BUILT_IN_TOPOLOGIES);
