/**
 * @swarmplan/brain — Live backend (AI SDK)
 *
 * One generateText() call per infer(), bounded by callTimeoutMs.
 * Errors are classified so the retry layer knows what it may retry:
 * caller abort → CancelledError, timeout / network / retryable API error →
 * TransientBackendError, everything else → PermanentBackendError.
 */

import { generateText, APICallError, AISDKError, type LanguageModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import {
    CancelledError, InvalidConfigError, PermanentBackendError, TransientBackendError,
    silentLogger, type Logger,
} from '@swarmplan/core';
import type { InferContext, InferOptions, InferResult, ModelBackend } from './backend.js';
import { throwIfAborted } from './backend.js';

export interface TextRequest {
    model: LanguageModel;
    system: string;
    prompt: string;
    abortSignal: AbortSignal;
}

export interface TextResponse {
    text: string;
    totalTokens: number;
}

export type TextGenerator = (request: TextRequest) => Promise<TextResponse>;

/** Default generator. Retries are ours, so the SDK's own are off. */
export const generateWithAiSdk: TextGenerator = async ({ model, system, prompt, abortSignal }) => {
    const result = await generateText({ model, system, prompt, abortSignal, maxRetries: 0 });
    return { text: result.text, totalTokens: result.usage.totalTokens ?? 0 };
};

export const SUPPORTED_PROVIDERS = ['openai', 'google'] as const;

/**
 * "openai/gpt-4o-mini", "google/gemini-2.0-flash" or a bare OpenAI id.
 * API keys come from the providers' own environment variables.
 */
export function resolveModel(modelName: string): LanguageModel {
    const slash = modelName.indexOf('/');
    const provider = slash === -1 ? 'openai' : modelName.slice(0, slash);
    const modelId = slash === -1 ? modelName : modelName.slice(slash + 1);
    if (!modelId) {
        throw new InvalidConfigError(`Invalid model name "${modelName}"`);
    }

    switch (provider) {
        case 'openai':
            return createOpenAI()(modelId);
        case 'google':
            return createGoogleGenerativeAI()(modelId);
        default:
            throw new InvalidConfigError(
                `Unknown model provider "${provider}" in "${modelName}" (supported: ${SUPPORTED_PROVIDERS.join(', ')})`,
            );
    }
}

export interface LiveBackendOptions {
    modelName: string;
    callTimeoutMs: number;
    /** Overrides resolveModel(modelName) */
    model?: LanguageModel;
    generate?: TextGenerator;
    logger?: Logger;
}

export class LiveBackend implements ModelBackend {
    readonly name: string;
    private model: LanguageModel;
    private callTimeoutMs: number;
    private generate: TextGenerator;
    private logger: Logger;

    constructor(options: LiveBackendOptions) {
        this.name = options.modelName;
        this.model = options.model ?? resolveModel(options.modelName);
        this.callTimeoutMs = options.callTimeoutMs;
        this.generate = options.generate ?? generateWithAiSdk;
        this.logger = options.logger ?? silentLogger;
    }

    async infer(context: InferContext, options?: InferOptions): Promise<InferResult> {
        const outer = options?.signal;
        throwIfAborted(outer);

        const timeout = AbortSignal.timeout(this.callTimeoutMs);
        const abortSignal = outer ? AbortSignal.any([outer, timeout]) : timeout;
        const start = Date.now();

        try {
            const response = await this.generate({
                model: this.model,
                system: context.system,
                prompt: context.prompt,
                abortSignal,
            });
            this.logger.debug(`${context.role}: model call done`, {
                model: this.name,
                tokens: response.totalTokens,
                ms: Date.now() - start,
            });
            return { content: parseModelOutput(response.text), tokensUsed: response.totalTokens, model: this.name };
        } catch (error) {
            throw this.classify(context.role, error, outer, timeout);
        }
    }

    private classify(role: string, error: unknown, outer: AbortSignal | undefined, timeout: AbortSignal): Error {
        if (outer?.aborted) {
            return new CancelledError('aborted', `${role}: model call aborted`);
        }
        if (timeout.aborted) {
            return new TransientBackendError(`${role}: model call timed out after ${this.callTimeoutMs}ms`, { cause: error });
        }
        if (APICallError.isInstance(error)) {
            const options = { cause: error, statusCode: error.statusCode };
            return error.isRetryable
                ? new TransientBackendError(`${role}: ${error.message}`, options)
                : new PermanentBackendError(`${role}: ${error.message}`, options);
        }
        if (AISDKError.isInstance(error)) {
            return new PermanentBackendError(`${role}: ${error.message}`, { cause: error });
        }
        const message = error instanceof Error ? error.message : String(error);
        return new TransientBackendError(`${role}: ${message}`, { cause: error });
    }
}

const FENCED = /^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/;

/** JSON (optionally fenced) → parsed value; anything else stays text */
export function parseModelOutput(text: string): unknown {
    const trimmed = text.trim();
    const body = FENCED.exec(trimmed)?.[1] ?? trimmed;
    try {
        return JSON.parse(body);
    } catch {
        return text;
    }
}
