/**
 * @swarmplan/swarm — Contract analysis
 *
 * Compares two concurrently planned tracks and describes the contract they
 * share: endpoints matched on path, data models matched on name.
 * Rules report what one side has to change. Most only apply to a
 * backend → frontend pair; model shapes are compared for any pair.
 */

import type { HttpMethod, ModelProperty, SyncIssue, SyncPoint, TrackOutput } from '@swarmplan/shared-types';

export interface EndpointRef {
    method: HttpMethod;
    path: string;
}

/** What one track exposes (backend) or expects (frontend) */
export interface TrackSurface {
    role: string;
    track: TrackOutput['track'];
    endpoints: EndpointRef[];
    models: string[];
    /** Properties of the models this track declares itself */
    modelShapes: Map<string, ModelProperty[]>;
    authMechanism?: string;
    authRoles?: string[];
}

export interface ContractContext {
    producer: TrackSurface;
    consumer: TrackSurface;
}

export interface ContractRule {
    name: string;
    description: string;
    /** Pairs the rule is checked on */
    scope: 'backend_frontend' | 'any';
    check: (ctx: ContractContext) => SyncIssue[];
}

export function endpointKey(endpoint: EndpointRef): string {
    return `${endpoint.method} ${endpoint.path}`;
}

/** Collect endpoints, models and auth from a track's tasks */
export function surfaceOf(output: TrackOutput): TrackSurface {
    const endpoints = new Map<string, EndpointRef>();
    const models = new Set<string>();
    const modelShapes = new Map<string, ModelProperty[]>();
    let authMechanism: string | undefined;
    let authRoles: string[] | undefined;

    for (const task of output.tasks) {
        switch (task.type) {
            case 'api_client': {
                const ref = { method: task.method, path: task.endpoint };
                endpoints.set(endpointKey(ref), ref);
                if (task.dataModel) models.add(task.dataModel);
                break;
            }
            case 'controller': {
                const ref = { method: task.method, path: task.endpoint };
                endpoints.set(endpointKey(ref), ref);
                if (task.requestModel) models.add(task.requestModel);
                if (task.responseModel) models.add(task.responseModel);
                break;
            }
            case 'model':
                models.add(task.name);
                if (!modelShapes.has(task.name)) modelShapes.set(task.name, task.properties);
                break;
            case 'auth':
                if (authMechanism === undefined) {
                    authMechanism = task.mechanism;
                    authRoles = task.roles;
                }
                break;
            case 'component':
            case 'service':
                break;
        }
    }

    return {
        role: output.role,
        track: output.track,
        endpoints: [...endpoints.values()],
        models: [...models],
        modelShapes,
        authMechanism,
        authRoles,
    };
}

// --- Rules (backend → frontend) ---

const missingEndpointRule: ContractRule = {
    name: 'missing-endpoint',
    description: 'Every endpoint the consumer calls exists in the producer',
    scope: 'backend_frontend',
    check: ({ producer, consumer }) => {
        const paths = new Set(producer.endpoints.map(e => e.path));
        return consumer.endpoints
            .filter(e => !paths.has(e.path))
            .map((e): SyncIssue => ({
                type: 'missing_endpoint',
                severity: 'adjust',
                track: producer.role,
                detail: `${producer.role} must expose ${endpointKey(e)} for ${consumer.role}`,
            }));
    },
};

const methodMismatchRule: ContractRule = {
    name: 'method-mismatch',
    description: 'Consumer and producer agree on the HTTP method of a shared path',
    scope: 'backend_frontend',
    check: ({ producer, consumer }) => {
        const issues: SyncIssue[] = [];
        for (const e of consumer.endpoints) {
            const served = producer.endpoints.filter(p => p.path === e.path).map(p => p.method);
            if (served.length > 0 && !served.includes(e.method)) {
                issues.push({
                    type: 'method_mismatch',
                    severity: 'critical',
                    track: consumer.role,
                    detail: `${consumer.role} calls ${endpointKey(e)} but ${producer.role} serves ${served.join('/')}`,
                });
            }
        }
        return issues;
    },
};

const missingModelRule: ContractRule = {
    name: 'missing-model',
    description: 'Every model the consumer uses is declared by the producer',
    scope: 'backend_frontend',
    check: ({ producer, consumer }) => {
        const declared = new Set(producer.models);
        return consumer.models
            .filter(m => !declared.has(m))
            .map((m): SyncIssue => ({
                type: 'missing_model',
                severity: 'adjust',
                track: producer.role,
                detail: `${producer.role} must declare model ${m} used by ${consumer.role}`,
            }));
    },
};

const authMismatchRule: ContractRule = {
    name: 'auth-mismatch',
    description: 'Both sides use the same auth mechanism',
    scope: 'backend_frontend',
    check: ({ producer, consumer }) => {
        if (producer.authMechanism === consumer.authMechanism) return [];
        return [{
            type: 'auth_mismatch',
            severity: 'critical',
            track: consumer.role,
            detail: `${consumer.role} uses ${consumer.authMechanism ?? 'no auth'} but ${producer.role} uses ${producer.authMechanism ?? 'no auth'}`,
        }];
    },
};

const propertyMismatchRule: ContractRule = {
    name: 'property-mismatch',
    description: 'Tracks that both declare a model agree on its properties',
    scope: 'any',
    check: ({ producer, consumer }) => {
        const issues: SyncIssue[] = [];
        for (const [model, ours] of producer.modelShapes) {
            const theirs = consumer.modelShapes.get(model);
            if (!theirs) continue;
            const diffs = propertyDiffs(ours, theirs, producer.role, consumer.role);
            if (diffs.length > 0) {
                issues.push({
                    type: 'property_mismatch',
                    severity: 'critical',
                    track: consumer.role,
                    detail: `${producer.role} and ${consumer.role} disagree on ${model}: ${diffs.join(', ')}`,
                });
            }
        }
        return issues;
    },
};

const roleMismatchRule: ContractRule = {
    name: 'role-mismatch',
    description: 'Both sides authorize the same roles',
    scope: 'backend_frontend',
    check: ({ producer, consumer }) => {
        if (!producer.authRoles || !consumer.authRoles) return [];
        const granted = [...new Set(producer.authRoles)].sort();
        const expected = [...new Set(consumer.authRoles)].sort();
        if (granted.join(',') === expected.join(',')) return [];
        return [{
            type: 'role_mismatch',
            severity: 'critical',
            track: consumer.role,
            detail: `${consumer.role} expects roles [${expected.join(', ')}] but ${producer.role} grants [${granted.join(', ')}]`,
        }];
    },
};

/** `name (a vs b)` for a type clash, `name (only in x)` for a one-sided property */
function propertyDiffs(ours: ModelProperty[], theirs: ModelProperty[], ourRole: string, theirRole: string): string[] {
    const diffs: string[] = [];
    const theirTypes = new Map(theirs.map((p): [string, string] => [p.name, p.type]));
    const ourNames = new Set(ours.map(p => p.name));
    for (const p of ours) {
        const other = theirTypes.get(p.name);
        if (other === undefined) diffs.push(`${p.name} (only in ${ourRole})`);
        else if (other !== p.type) diffs.push(`${p.name} (${p.type} vs ${other})`);
    }
    for (const p of theirs) {
        if (!ourNames.has(p.name)) diffs.push(`${p.name} (only in ${theirRole})`);
    }
    return diffs;
}

export const BUILT_IN_RULES: readonly ContractRule[] = [
    missingEndpointRule,
    methodMismatchRule,
    missingModelRule,
    propertyMismatchRule,
    authMismatchRule,
    roleMismatchRule,
];

/** Backend side produces for a frontend; otherwise the first of the pair */
export function orderPair(a: TrackOutput, b: TrackOutput): [producer: TrackOutput, consumer: TrackOutput] {
    if (a.track === 'frontend' && b.track === 'backend') return [b, a];
    return [a, b];
}

/** SyncPoint for two sibling tracks, or null when they share nothing */
export function analyzeContract(
    a: TrackOutput,
    b: TrackOutput,
    rules: readonly ContractRule[] = BUILT_IN_RULES,
): SyncPoint | null {
    const [producerOut, consumerOut] = orderPair(a, b);
    const producer = surfaceOf(producerOut);
    const consumer = surfaceOf(consumerOut);

    const consumerPaths = new Set(consumer.endpoints.map(e => e.path));
    const sharedEndpoints = [...new Set(producer.endpoints.filter(e => consumerPaths.has(e.path)).map(endpointKey))].sort();
    const consumerModels = new Set(consumer.models);
    const sharedModels = producer.models.filter(m => consumerModels.has(m)).sort();

    if (sharedEndpoints.length === 0 && sharedModels.length === 0) return null;

    const backendToFrontend = producer.track === 'backend' && consumer.track === 'frontend';
    const issues = rules
        .filter(rule => rule.scope === 'any' || backendToFrontend)
        .flatMap(rule => rule.check({ producer, consumer }));

    return {
        producingTrack: producer.role,
        consumingTrack: consumer.role,
        contractDescription: describeContract(producer.role, consumer.role, sharedEndpoints, sharedModels),
        sharedEndpoints,
        sharedModels,
        issues,
    };
}

function describeContract(producer: string, consumer: string, endpoints: string[], models: string[]): string {
    const parts = [`${consumer} consumes ${endpoints.length} endpoint(s) from ${producer}`];
    if (endpoints.length > 0) parts[0] += ` (${endpoints.join(', ')})`;
    if (models.length > 0) parts.push(`shared models: ${models.join(', ')}`);
    return parts.join('; ');
}
