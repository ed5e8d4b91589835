/**
 * @swarmplan/shared-types — Types shared by every swarmplan package
 *
 * Single source of truth for the task payload, role outputs and the
 * aggregated plan returned to callers.
 */

// --- Task ---

/** Caller-supplied work item. Frozen at run start, read-only for agents. */
export type Task = Readonly<Record<string, unknown>>;

// --- Roles ---

export type RoleKind = 'design' | 'frontend' | 'backend';
export type TrackKind = Exclude<RoleKind, 'design'>;

// --- Design document ---

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface ModelProperty {
    name: string;
    type: string;
    required?: boolean;
}

export interface DataModelSpec {
    name: string;
    properties: ModelProperty[];
    validations: string[];
    relationships: string[];
}

export interface ApiEndpointSpec {
    path: string;
    method: HttpMethod;
    requestModel?: string;
    responseModel?: string;
    security: string[];
}

export interface UiComponentSpec {
    name: string;
    requirements: string[];
    dependencies: string[];
}

/** Persistence a service goes through */
export interface DataAccessSpec {
    repository: string;
    entities: string[];
}

export interface ServiceSpec {
    name: string;
    operations: string[];
    dependencies: string[];
    dataAccess?: DataAccessSpec;
}

export interface AuthSpec {
    mechanism: string;
    roles: string[];
}

export interface DesignDocument {
    summary: string;
    uiComponents: UiComponentSpec[];
    apiEndpoints: ApiEndpointSpec[];
    dataModels: DataModelSpec[];
    services: ServiceSpec[];
    auth?: AuthSpec;
    frontendDependencies: string[];
    backendDependencies: string[];
}

// --- Track tasks ---

export interface ComponentTask {
    type: 'component';
    name: string;
    requirements: string[];
    dependencies: string[];
}

export interface ApiClientTask {
    type: 'api_client';
    endpoint: string;
    method: HttpMethod;
    dataModel?: string;
}

export interface ControllerTask {
    type: 'controller';
    endpoint: string;
    method: HttpMethod;
    requestModel?: string;
    responseModel?: string;
    security: string[];
}

export interface ModelTask {
    type: 'model';
    name: string;
    properties: ModelProperty[];
    validations: string[];
    relationships: string[];
}

export interface ServiceTask {
    type: 'service';
    name: string;
    operations: string[];
    dependencies: string[];
    dataAccess?: DataAccessSpec;
}

export interface AuthTask {
    type: 'auth';
    mechanism: string;
    roles: string[];
}

export type TrackTask = ComponentTask | ApiClientTask | ControllerTask | ModelTask | ServiceTask | AuthTask;

// --- Partial outputs ---

export interface DesignOutput {
    kind: 'design';
    role: string;
    design: DesignDocument;
}

export interface TrackOutput {
    kind: 'track';
    role: string;
    track: TrackKind;
    techStack: string;
    tasks: TrackTask[];
    dependencies: string[];
}

/** What one agent produces for one task */
export type PartialOutput = DesignOutput | TrackOutput;

// --- Sync points ---

export type SyncIssueType =
    | 'missing_endpoint'
    | 'method_mismatch'
    | 'missing_model'
    | 'property_mismatch'
    | 'auth_mismatch'
    | 'role_mismatch';

export interface SyncIssue {
    type: SyncIssueType;
    severity: 'adjust' | 'critical';
    /** Track that has to change */
    track: string;
    detail: string;
}

export interface SyncPoint {
    producingTrack: string;
    consumingTrack: string;
    contractDescription: string;
    sharedEndpoints: string[];
    sharedModels: string[];
    issues: SyncIssue[];
}

// --- Aggregated result ---

export type TrackResultKey = `${string}_tasks`;

export interface AggregatedResult {
    /** null only when no design-role agent was requested */
    design: DesignDocument | null;
    sync_points: SyncPoint[];
    [trackKey: TrackResultKey]: TrackTask[];
}
