/**
 * @swarmplan/brain — Retry with exponential backoff
 *
 * Wraps any backend. Only TransientBackendError is retried; the backoff
 * sleep is cut short by the caller's signal.
 */

import { BackendError, silentLogger, type Logger } from '@swarmplan/core';
import type { InferContext, InferOptions, InferResult, ModelBackend } from './backend.js';
import { sleep } from './backend.js';

export interface RetryOptions {
    maxRetries: number;
    baseDelayMs: number;
    logger?: Logger;
}

export class RetryingBackend implements ModelBackend {
    readonly name: string;
    private inner: ModelBackend;
    private maxRetries: number;
    private baseDelayMs: number;
    private logger: Logger;

    constructor(inner: ModelBackend, options: RetryOptions) {
        this.inner = inner;
        this.name = inner.name;
        this.maxRetries = options.maxRetries;
        this.baseDelayMs = options.baseDelayMs;
        this.logger = options.logger ?? silentLogger;
    }

    async infer(context: InferContext, options?: InferOptions): Promise<InferResult> {
        for (let attempt = 0; ; attempt++) {
            try {
                return await this.inner.infer(context, options);
            } catch (error) {
                if (!(error instanceof BackendError) || !error.transient || attempt >= this.maxRetries) {
                    throw error;
                }
                const wait = this.backoff(attempt);
                this.logger.warn(`${context.role}: transient backend error, retry ${attempt + 1}/${this.maxRetries} in ${wait}ms`, {
                    error: error.message,
                });
                await sleep(wait, options?.signal);
            }
        }
    }

    /** baseDelayMs · 2^attempt */
    backoff(attempt: number): number {
        return this.baseDelayMs * 2 ** attempt;
    }
}
