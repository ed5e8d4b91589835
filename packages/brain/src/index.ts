/**
 * @swarmplan/brain — Model backends
 *
 * - MockBackend: deterministic stub for tests and offline runs
 * - LiveBackend: AI SDK generateText() with a per-call timeout
 * - RetryingBackend: bounded exponential backoff for transient errors
 *
 * createBackend() picks the variant once, from the config.
 */

import { MOCK_MODEL, silentLogger, type Logger, type SwarmConfig } from '@swarmplan/core';
import type { ModelBackend } from './backend.js';
import { MockBackend } from './mock.js';
import { LiveBackend, type TextGenerator } from './live.js';
import { RetryingBackend } from './retry.js';

export {
    sleep, throwIfAborted,
    type ModelBackend, type InferContext, type InferOptions, type InferResult,
} from './backend.js';
export { MockBackend, MOCK_BACKEND_NAME, mockDesign, extractTrackTasks } from './mock.js';
export {
    LiveBackend, resolveModel, parseModelOutput, generateWithAiSdk, SUPPORTED_PROVIDERS,
    type LiveBackendOptions, type TextGenerator, type TextRequest, type TextResponse,
} from './live.js';
export { RetryingBackend, type RetryOptions } from './retry.js';

export type BackendConfig = Pick<SwarmConfig, 'modelName' | 'callTimeoutMs' | 'maxRetries' | 'retryBaseDelayMs'>;

/** Wrap with retries when the config allows any */
export function withRetry(
    backend: ModelBackend,
    config: Pick<SwarmConfig, 'maxRetries' | 'retryBaseDelayMs'>,
    logger: Logger = silentLogger,
): ModelBackend {
    if (config.maxRetries <= 0) return backend;
    return new RetryingBackend(backend, {
        maxRetries: config.maxRetries,
        baseDelayMs: config.retryBaseDelayMs,
        logger,
    });
}

/** "mock" → MockBackend; any other model name → LiveBackend */
export function createBackend(
    config: BackendConfig,
    options?: { logger?: Logger; generate?: TextGenerator },
): ModelBackend {
    const logger = options?.logger ?? silentLogger;
    const base = config.modelName === MOCK_MODEL
        ? new MockBackend()
        : new LiveBackend({
            modelName: config.modelName,
            callTimeoutMs: config.callTimeoutMs,
            generate: options?.generate,
            logger,
        });
    return withRetry(base, config, logger);
}
