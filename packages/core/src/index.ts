/**
 * @swarmplan/core — Public API
 *
 * Ambient pieces every package shares: config, errors, logging, events.
 */

export {
    createConfig, configFromEnv, DEFAULT_CONFIG, MOCK_MODEL, LOG_LEVELS,
    type SwarmConfig, type LogLevel,
} from './config.js';
export {
    SwarmError, isSwarmError,
    UnknownTopologyError, UnknownAgentError, InvalidTopologyError, InvalidConfigError, InvalidTaskError,
    BackendError, TransientBackendError, PermanentBackendError,
    AgentError, CancelledError, OrchestrationError,
    type SwarmErrorKind, type CancelReason, type RoleFailure,
} from './errors.js';
export { createLogger, silentLogger, type Logger, type LogSink, type LoggerOptions } from './logger.js';
export { EventBus, type EventBusOptions, type EventHandler } from './events.js';
