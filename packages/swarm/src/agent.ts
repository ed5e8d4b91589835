/**
 * @swarmplan/swarm — Agent
 *
 * One role bound to one backend. Behaviour is resolved in the constructor,
 * never re-dispatched per call.
 */

import { ZodError } from 'zod';
import {
    AgentError, BackendError, CancelledError, PermanentBackendError, silentLogger, type Logger,
} from '@swarmplan/core';
import type { ModelBackend } from '@swarmplan/brain';
import type { PartialOutput, Task } from '@swarmplan/shared-types';
import { behaviorFor, type RoleBehavior, type RoleDefinition } from './roles.js';

export interface AgentOptions {
    role: RoleDefinition;
    backend: ModelBackend;
    logger?: Logger;
}

export interface AgentInfo {
    role: string;
    kind: RoleDefinition['kind'];
    stack: string;
    backend: string;
}

export class Agent {
    readonly role: RoleDefinition;
    private backend: ModelBackend;
    private behavior: RoleBehavior;
    private logger: Logger;

    constructor(options: AgentOptions) {
        this.role = options.role;
        this.backend = options.backend;
        this.behavior = behaviorFor(options.role);
        this.logger = options.logger ?? silentLogger;
    }

    /** Compose, infer, map. Throws AgentError or CancelledError. */
    async run(
        task: Task,
        upstream: Readonly<Record<string, PartialOutput>>,
        options?: { signal?: AbortSignal },
    ): Promise<PartialOutput> {
        const { system, prompt } = this.behavior.compose(task, upstream);

        let content: unknown;
        try {
            const result = await this.backend.infer({
                role: this.role.name,
                kind: this.role.kind,
                stack: this.role.stack,
                task,
                predecessors: upstream,
                system,
                prompt,
            }, { signal: options?.signal });
            content = result.content;
            this.logger.debug(`${this.role.name}: inferred`, { model: result.model, tokens: result.tokensUsed });
        } catch (error) {
            if (error instanceof CancelledError) throw error;
            if (error instanceof BackendError) {
                throw new AgentError(this.role.name, error.message, { cause: error });
            }
            const wrapped = new PermanentBackendError(describe(error), { cause: error });
            throw new AgentError(this.role.name, wrapped.message, { cause: wrapped });
        }

        try {
            return this.behavior.map(content);
        } catch (error) {
            throw new AgentError(this.role.name, `unusable ${this.role.kind} output: ${describe(error)}`, { cause: error });
        }
    }

    info(): AgentInfo {
        return {
            role: this.role.name,
            kind: this.role.kind,
            stack: this.role.stack,
            backend: this.backend.name,
        };
    }
}

function describe(error: unknown): string {
    if (error instanceof ZodError) {
        return error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
    }
    return error instanceof Error ? error.message : String(error);
}
