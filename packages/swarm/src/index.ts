/**
 * @swarmplan/swarm — Public API
 */

export {
    ROLES, getRole, getAllRoles, getRolesByKind, behaviorFor,
    DesignDocumentSchema, TrackTaskSchema, TrackContentSchema,
    type RoleDefinition, type DesignRole, type TrackRole, type BuiltInRole, type RoleBehavior, type PromptParts,
} from './roles.js';
export {
    TopologyRegistry, BUILT_IN_TOPOLOGIES, defaultTopologies, findCycle,
    type TopologyDefinition,
} from './topologies.js';
export { TaskGraph, type DroppedEdge } from './dag.js';
export {
    Scheduler,
    type SchedulerConfig, type GraphNode, type NodeStatus, type TransitionEvent,
} from './scheduler.js';
export { SharedContext, freezeTask } from './shared-context.js';
export { Agent, type AgentOptions, type AgentInfo } from './agent.js';
export {
    analyzeContract, surfaceOf, orderPair, endpointKey, BUILT_IN_RULES,
    type ContractRule, type ContractContext, type TrackSurface, type EndpointRef,
} from './contracts.js';
export { aggregate } from './aggregator.js';
export {
    Swarm, createSwarm,
    type SwarmOptions, type SwarmRun, type RunOptions, type SwarmEvents,
} from './coordinator.js';
