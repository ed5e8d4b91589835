/**
 * @swarmplan/swarm — Agent Roles
 *
 * Closed set of role variants: one design role, and track roles that turn
 * the design into implementation tasks for their stack. Behaviour is picked
 * by kind once, when the agent is built.
 */

import { z } from 'zod';
import type {
    DesignDocument, PartialOutput, Task, TrackKind, TrackOutput, TrackTask,
} from '@swarmplan/shared-types';

export interface DesignRole {
    kind: 'design';
    name: string;
    title: string;
    description: string;
    stack: string;
}

export interface TrackRole {
    kind: TrackKind;
    name: string;
    title: string;
    description: string;
    stack: string;
}

export type RoleDefinition = DesignRole | TrackRole;

export const ROLES = {
    system_designer: {
        kind: 'design',
        name: 'system_designer',
        title: 'System Designer',
        description: 'Architecture decisions: API surface, data models, services, auth',
        stack: 'Architecture',
    },
    angular_expert: {
        kind: 'frontend',
        name: 'angular_expert',
        title: 'Angular Expert',
        description: 'Angular components, services and routing',
        stack: 'Angular',
    },
    react_expert: {
        kind: 'frontend',
        name: 'react_expert',
        title: 'React Expert',
        description: 'React components, hooks and data fetching',
        stack: 'React',
    },
    dotnet_expert: {
        kind: 'backend',
        name: 'dotnet_expert',
        title: '.NET Expert',
        description: 'ASP.NET Core controllers, EF Core models, service layer',
        stack: '.NET Core',
    },
    node_expert: {
        kind: 'backend',
        name: 'node_expert',
        title: 'Node.js Expert',
        description: 'Node.js routes, persistence models, service layer',
        stack: 'Node.js',
    },
} as const satisfies Record<string, RoleDefinition>;

export type BuiltInRole = keyof typeof ROLES;

const ROLE_TABLE: ReadonlyMap<string, RoleDefinition> = new Map(Object.entries(ROLES));

export function getRole(name: string): RoleDefinition | undefined {
    return ROLE_TABLE.get(name);
}

export function getAllRoles(): RoleDefinition[] {
    return [...ROLE_TABLE.values()];
}

export function getRolesByKind(kind: RoleDefinition['kind']): RoleDefinition[] {
    return getAllRoles().filter(r => r.kind === kind);
}

// --- Output schemas (model content → PartialOutput) ---

const HttpMethodSchema = z.preprocess(
    v => (typeof v === 'string' ? v.toUpperCase() : v),
    z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']),
);
const StringList = z.array(z.string()).default([]);

const DataAccessSchema = z.object({
    repository: z.string(),
    entities: StringList,
});

const ModelPropertySchema = z.object({
    name: z.string(),
    type: z.string(),
    required: z.boolean().optional(),
});

export const DesignDocumentSchema = z.object({
    summary: z.string(),
    uiComponents: z.array(z.object({
        name: z.string(),
        requirements: StringList,
        dependencies: StringList,
    })).default([]),
    apiEndpoints: z.array(z.object({
        path: z.string(),
        method: HttpMethodSchema,
        requestModel: z.string().optional(),
        responseModel: z.string().optional(),
        security: StringList,
    })).default([]),
    dataModels: z.array(z.object({
        name: z.string(),
        properties: z.array(ModelPropertySchema).default([]),
        validations: StringList,
        relationships: StringList,
    })).default([]),
    services: z.array(z.object({
        name: z.string(),
        operations: StringList,
        dependencies: StringList,
        dataAccess: DataAccessSchema.optional(),
    })).default([]),
    auth: z.object({ mechanism: z.string(), roles: StringList }).optional(),
    frontendDependencies: StringList,
    backendDependencies: StringList,
});

export const TrackTaskSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('component'), name: z.string(), requirements: StringList, dependencies: StringList }),
    z.object({ type: z.literal('api_client'), endpoint: z.string(), method: HttpMethodSchema, dataModel: z.string().optional() }),
    z.object({
        type: z.literal('controller'),
        endpoint: z.string(),
        method: HttpMethodSchema,
        requestModel: z.string().optional(),
        responseModel: z.string().optional(),
        security: StringList,
    }),
    z.object({
        type: z.literal('model'),
        name: z.string(),
        properties: z.array(ModelPropertySchema).default([]),
        validations: StringList,
        relationships: StringList,
    }),
    z.object({
        type: z.literal('service'),
        name: z.string(),
        operations: StringList,
        dependencies: StringList,
        dataAccess: DataAccessSchema.optional(),
    }),
    z.object({ type: z.literal('auth'), mechanism: z.string(), roles: StringList }),
]);

export const TrackContentSchema = z.object({
    tasks: z.array(TrackTaskSchema).min(1),
    techStack: z.string().optional(),
    dependencies: StringList,
});

/** Track roles only plan the tasks that belong to their side */
const TASK_TYPES: Record<TrackKind, ReadonlySet<TrackTask['type']>> = {
    frontend: new Set<TrackTask['type']>(['component', 'api_client', 'auth']),
    backend: new Set<TrackTask['type']>(['controller', 'model', 'service', 'auth']),
};

// --- Behaviours ---

export interface PromptParts {
    system: string;
    prompt: string;
}

export interface RoleBehavior {
    compose(task: Task, upstream: Readonly<Record<string, PartialOutput>>): PromptParts;
    /** Throws on content the role cannot use */
    map(content: unknown): PartialOutput;
}

class DesignBehavior implements RoleBehavior {
    constructor(private role: DesignRole) { }

    compose(task: Task): PromptParts {
        return {
            system: `You are the ${this.role.title}. ${this.role.description}. Answer with one JSON object only.`,
            prompt: [
                'Produce a design document for the task below as JSON with keys:',
                'summary, uiComponents, apiEndpoints, dataModels, services, auth, frontendDependencies, backendDependencies.',
                `Task: ${JSON.stringify(task)}`,
            ].join('\n'),
        };
    }

    map(content: unknown): PartialOutput {
        const design: DesignDocument = DesignDocumentSchema.parse(content);
        return { kind: 'design', role: this.role.name, design };
    }
}

class TrackBehavior implements RoleBehavior {
    constructor(private role: TrackRole) { }

    compose(task: Task, upstream: Readonly<Record<string, PartialOutput>>): PromptParts {
        const context = Object.keys(upstream).sort().map(role => `[${role}] ${JSON.stringify(upstream[role])}`);
        return {
            system: `You are the ${this.role.title}. ${this.role.description}. Answer with one JSON object only.`,
            prompt: [
                `Turn the design into ${this.role.stack} ${this.role.kind} implementation tasks.`,
                `Answer as JSON: {"tasks": [...], "techStack": "${this.role.stack}", "dependencies": [...]}`,
                `Allowed task types: ${[...TASK_TYPES[this.role.kind]].join(', ')}.`,
                `Task: ${JSON.stringify(task)}`,
                ...context,
            ].join('\n'),
        };
    }

    map(content: unknown): PartialOutput {
        const parsed = TrackContentSchema.parse(content);
        const allowed = TASK_TYPES[this.role.kind];
        const foreign = parsed.tasks.filter(t => !allowed.has(t.type)).map(t => t.type);
        if (foreign.length > 0) {
            throw new Error(`${this.role.kind} track cannot plan ${[...new Set(foreign)].join(', ')} tasks`);
        }
        const output: TrackOutput = {
            kind: 'track',
            role: this.role.name,
            track: this.role.kind,
            techStack: parsed.techStack ?? this.role.stack,
            tasks: parsed.tasks,
            dependencies: parsed.dependencies,
        };
        return output;
    }
}

export function behaviorFor(role: RoleDefinition): RoleBehavior {
    switch (role.kind) {
        case 'design':
            return new DesignBehavior(role);
        case 'frontend':
        case 'backend':
            return new TrackBehavior(role);
    }
}
