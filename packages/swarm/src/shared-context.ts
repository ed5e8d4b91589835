/**
 * @swarmplan/swarm — Shared Context
 *
 * One per run: the frozen task plus completed outputs, append-only.
 * Agents receive views of it, never the store itself.
 */

import { z } from 'zod';
import { InvalidTaskError } from '@swarmplan/core';
import type { PartialOutput, Task } from '@swarmplan/shared-types';

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (value === null || typeof value !== 'object') return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

const TaskSchema = z.custom<Record<string, unknown>>(isPlainObject, { message: 'task must be a plain object' });

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) deepFreeze(child);
    }
    return value;
}

/** Validate, clone and deep-freeze a caller payload */
export function freezeTask(input: unknown): Task {
    const parsed = TaskSchema.safeParse(input);
    if (!parsed.success) {
        throw new InvalidTaskError(`Invalid task: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }
    let copy: Record<string, unknown>;
    try {
        copy = structuredClone(parsed.data);
    } catch (error) {
        throw new InvalidTaskError('Invalid task: payload is not cloneable', { cause: error });
    }
    return deepFreeze(copy);
}

export class SharedContext {
    readonly task: Task;
    private results: Map<string, PartialOutput> = new Map();

    constructor(task: unknown) {
        this.task = freezeTask(task);
    }

    /** Record a role's output; each role writes once */
    addResult(role: string, output: PartialOutput): void {
        if (this.results.has(role)) {
            throw new Error(`Result for "${role}" already recorded`);
        }
        this.results.set(role, deepFreeze(output));
    }

    getResult(role: string): PartialOutput | undefined {
        return this.results.get(role);
    }

    /** Outputs of the given roles that have completed */
    outputsFor(roles: readonly string[]): Record<string, PartialOutput> {
        const view: Record<string, PartialOutput> = {};
        for (const role of roles) {
            const output = this.results.get(role);
            if (output) view[role] = output;
        }
        return view;
    }

    completed(): Record<string, PartialOutput> {
        return Object.fromEntries(this.results);
    }

    stats() {
        return { totalResults: this.results.size };
    }
}
