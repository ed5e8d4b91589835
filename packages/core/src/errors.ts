/**
 * @swarmplan/core — Error kinds
 *
 * Every failure a caller can observe is a SwarmError with a stable `kind`.
 */

import type { PartialOutput } from '@swarmplan/shared-types';

export type SwarmErrorKind =
    | 'UnknownTopology'
    | 'UnknownAgent'
    | 'InvalidTopology'
    | 'InvalidConfig'
    | 'InvalidTask'
    | 'Backend'
    | 'Agent'
    | 'Orchestration'
    | 'Cancelled';

export abstract class SwarmError extends Error {
    abstract readonly kind: SwarmErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export function isSwarmError(value: unknown): value is SwarmError {
    return value instanceof SwarmError;
}

// --- Build time ---

export class UnknownTopologyError extends SwarmError {
    readonly kind = 'UnknownTopology';

    constructor(readonly topology: string, readonly known: readonly string[]) {
        super(`Unknown topology "${topology}" (known: ${known.join(', ') || 'none'})`);
    }
}

export class UnknownAgentError extends SwarmError {
    readonly kind = 'UnknownAgent';

    constructor(readonly agent: string, readonly topology: string) {
        super(`Agent "${agent}" is not declared in topology "${topology}"`);
    }
}

export class InvalidTopologyError extends SwarmError {
    readonly kind = 'InvalidTopology';
}

export class InvalidConfigError extends SwarmError {
    readonly kind = 'InvalidConfig';

    constructor(message: string, readonly issues: readonly string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    }
}

export class InvalidTaskError extends SwarmError {
    readonly kind = 'InvalidTask';
}

// --- Run time ---

export class BackendError extends SwarmError {
    readonly kind = 'Backend';
    readonly statusCode?: number;

    constructor(
        message: string,
        readonly transient: boolean,
        options?: { cause?: unknown; statusCode?: number },
    ) {
        super(message, options);
        this.statusCode = options?.statusCode;
    }
}

/** Network failure or timeout, eligible for retry */
export class TransientBackendError extends BackendError {
    constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
        super(message, true, options);
    }
}

/** Auth, quota or malformed request; never retried */
export class PermanentBackendError extends BackendError {
    constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
        super(message, false, options);
    }
}

export class AgentError extends SwarmError {
    readonly kind = 'Agent';

    constructor(readonly role: string, message: string, options?: { cause?: unknown }) {
        super(`[${role}] ${message}`, options);
    }
}

export type CancelReason = 'aborted' | 'timeout';

export class CancelledError extends SwarmError {
    readonly kind = 'Cancelled';

    constructor(readonly reason: CancelReason = 'aborted', detail?: string) {
        super(detail ?? (reason === 'timeout' ? 'Run timed out' : 'Run cancelled'));
    }
}

export interface RoleFailure {
    role: string;
    message: string;
    /** transient / permanent backend error, or a role mapping failure */
    cause: 'transient' | 'permanent' | 'mapping';
    error: Error;
}

/** A run where at least one role failed. Partial outputs live here and nowhere else. */
export class OrchestrationError extends SwarmError {
    readonly kind = 'Orchestration';

    constructor(
        readonly failures: readonly RoleFailure[],
        readonly skippedRoles: readonly string[],
        readonly completed: Readonly<Record<string, PartialOutput>>,
    ) {
        super(`Run failed: ${failures.map(f => `${f.role} (${f.message})`).join(', ')}`);
    }

    get failedRoles(): string[] {
        return this.failures.map(f => f.role);
    }
}
