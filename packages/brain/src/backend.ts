/**
 * @swarmplan/brain — ModelBackend contract
 *
 * One capability: turn a role's context into a reasoning output.
 * Implementations must tolerate concurrent infer() calls.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { CancelledError } from '@swarmplan/core';
import type { PartialOutput, RoleKind, Task } from '@swarmplan/shared-types';

export interface InferContext {
    role: string;
    kind: RoleKind;
    /** e.g. "Angular", ".NET Core" */
    stack: string;
    task: Task;
    /** Outputs of every upstream node, keyed by role */
    predecessors: Readonly<Record<string, PartialOutput>>;
    system: string;
    prompt: string;
}

export interface InferOptions {
    signal?: AbortSignal;
}

export interface InferResult {
    /** Structured output (parsed JSON), or raw text when the model returned none */
    content: unknown;
    tokensUsed: number;
    model: string;
}

export interface ModelBackend {
    readonly name: string;
    infer(context: InferContext, options?: InferOptions): Promise<InferResult>;
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) throw new CancelledError('aborted');
}

/** Abortable sleep; rejects with CancelledError when the signal fires */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    try {
        await delay(ms, undefined, { signal });
    } catch (error) {
        if (signal?.aborted) throw new CancelledError('aborted');
        throw error;
    }
}
