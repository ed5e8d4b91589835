/**
 * @swarmplan/brain — Mock backend
 *
 * Pure and deterministic: the same context always yields the same content.
 * Design output is templated from `task.feature`; track outputs are extracted
 * from the upstream design document.
 */

import { z } from 'zod';
import { PermanentBackendError } from '@swarmplan/core';
import type {
    DesignDocument, PartialOutput, Task, TrackKind, TrackTask,
} from '@swarmplan/shared-types';
import type { InferContext, InferOptions, InferResult, ModelBackend } from './backend.js';
import { throwIfAborted } from './backend.js';

export const MOCK_BACKEND_NAME = 'mock';

const ContextSchema = z.object({
    role: z.string().min(1),
    kind: z.enum(['design', 'frontend', 'backend']),
    stack: z.string(),
    task: z.record(z.string(), z.unknown()),
    predecessors: z.record(z.string(), z.object({ kind: z.enum(['design', 'track']) }).passthrough()),
});

export class MockBackend implements ModelBackend {
    readonly name = MOCK_BACKEND_NAME;

    async infer(context: InferContext, options?: InferOptions): Promise<InferResult> {
        throwIfAborted(options?.signal);

        const check = ContextSchema.safeParse(context);
        if (!check.success) {
            const issues = check.error.issues.map(i => `${i.path.join('.') || 'context'}: ${i.message}`);
            throw new PermanentBackendError(`Malformed infer context: ${issues.join('; ')}`);
        }

        if (context.kind === 'design') {
            return { content: mockDesign(context.task), tokensUsed: 0, model: MOCK_BACKEND_NAME };
        }

        const design = upstreamDesign(context.predecessors) ?? mockDesign(context.task);
        return {
            content: {
                tasks: extractTrackTasks(context.kind, design),
                techStack: context.stack,
                dependencies: context.kind === 'frontend' ? design.frontendDependencies : design.backendDependencies,
            },
            tokensUsed: 0,
            model: MOCK_BACKEND_NAME,
        };
    }
}

function upstreamDesign(predecessors: Readonly<Record<string, PartialOutput>>): DesignDocument | undefined {
    for (const role of Object.keys(predecessors).sort()) {
        const output = predecessors[role];
        if (output?.kind === 'design') return output.design;
    }
    return undefined;
}

function pascal(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/** Templated design document for a task, e.g. `{feature: "product_listing"}` → Product over /api/products */
export function mockDesign(task: Task): DesignDocument {
    const feature = typeof task.feature === 'string' ? task.feature : '';
    const words = feature.split(/[^A-Za-z0-9]+/).filter(w => w.length > 0);
    const head = (words[0] ?? 'item').toLowerCase();
    const entity = pascal(head);
    const featureName = words.length > 0 ? words.map(pascal).join('') : entity;
    const resource = `/api/${head}s`;

    return {
        summary: `${featureName}: ${entity} records served over REST at ${resource} and rendered by ${featureName}Page.`,
        uiComponents: [
            {
                name: `${featureName}Page`,
                requirements: [`Display ${entity} records`, 'Show loading and empty states'],
                dependencies: [`${entity}Card`],
            },
            {
                name: `${entity}Card`,
                requirements: [`Render a single ${entity}`],
                dependencies: [],
            },
        ],
        apiEndpoints: [
            { path: resource, method: 'GET', responseModel: entity, security: ['authenticated'] },
            { path: `${resource}/{id}`, method: 'GET', responseModel: entity, security: ['authenticated'] },
        ],
        dataModels: [
            {
                name: entity,
                properties: [
                    { name: 'id', type: 'string', required: true },
                    { name: 'name', type: 'string', required: true },
                ],
                validations: ['name must not be empty'],
                relationships: [],
            },
        ],
        services: [
            {
                name: `${entity}Service`,
                operations: ['list', 'getById'],
                dependencies: [`${entity}Repository`],
                dataAccess: { repository: `${entity}Repository`, entities: [entity] },
            },
        ],
        auth: { mechanism: 'jwt', roles: ['user'] },
        frontendDependencies: [],
        backendDependencies: [],
    };
}

/** Split a design document into one track's implementation tasks */
export function extractTrackTasks(track: TrackKind, design: DesignDocument): TrackTask[] {
    const tasks: TrackTask[] = [];

    if (track === 'frontend') {
        for (const component of design.uiComponents) {
            tasks.push({
                type: 'component',
                name: component.name,
                requirements: [...component.requirements],
                dependencies: [...component.dependencies],
            });
        }
        for (const endpoint of design.apiEndpoints) {
            const dataModel = endpoint.responseModel ?? endpoint.requestModel;
            tasks.push({
                type: 'api_client',
                endpoint: endpoint.path,
                method: endpoint.method,
                ...(dataModel ? { dataModel } : {}),
            });
        }
    } else {
        for (const endpoint of design.apiEndpoints) {
            tasks.push({
                type: 'controller',
                endpoint: endpoint.path,
                method: endpoint.method,
                ...(endpoint.requestModel ? { requestModel: endpoint.requestModel } : {}),
                ...(endpoint.responseModel ? { responseModel: endpoint.responseModel } : {}),
                security: [...endpoint.security],
            });
        }
        for (const model of design.dataModels) {
            tasks.push({
                type: 'model',
                name: model.name,
                properties: model.properties.map(p => ({ ...p })),
                validations: [...model.validations],
                relationships: [...model.relationships],
            });
        }
        for (const service of design.services) {
            tasks.push({
                type: 'service',
                name: service.name,
                operations: [...service.operations],
                dependencies: [...service.dependencies],
                ...(service.dataAccess
                    ? { dataAccess: { repository: service.dataAccess.repository, entities: [...service.dataAccess.entities] } }
                    : {}),
            });
        }
    }

    if (design.auth) {
        tasks.push({ type: 'auth', mechanism: design.auth.mechanism, roles: [...design.auth.roles] });
    }
    return tasks;
}
