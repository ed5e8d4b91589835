import { describe, it, expect, vi } from 'vitest';
import { APICallError } from 'ai';
import {
    CancelledError, PermanentBackendError, TransientBackendError, type BackendError,
} from '@swarmplan/core';
import type { DesignDocument } from '@swarmplan/shared-types';
import {
    MockBackend,
    mockDesign,
    extractTrackTasks,
    LiveBackend,
    RetryingBackend,
    createBackend,
    resolveModel,
    parseModelOutput,
    type InferContext,
    type ModelBackend,
    type TextGenerator,
} from '../index.js';

function context(overrides: Partial<InferContext> = {}): InferContext {
    return {
        role: 'system_designer',
        kind: 'design',
        stack: 'Architecture',
        task: { feature: 'product_listing' },
        predecessors: {},
        system: 'system prompt',
        prompt: 'user prompt',
        ...overrides,
    };
}

/** Backend that fails `failures` times with the given error, then succeeds */
function flaky(failures: number, error: () => BackendError): ModelBackend & { calls: number } {
    return {
        name: 'flaky',
        calls: 0,
        async infer() {
            this.calls++;
            if (this.calls <= failures) throw error();
            return { content: { ok: true }, tokensUsed: 1, model: 'flaky' };
        },
    };
}

function waitForAbort(signal: AbortSignal): Promise<never> {
    return new Promise((_, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
}

// --- Mock backend ---
describe('mockDesign', () => {
    it('derives entity and resource from the feature name', () => {
        const design = mockDesign({ feature: 'product_listing' });
        expect(design.summary).toBe('ProductListing: Product records served over REST at /api/products and rendered by ProductListingPage.');
        expect(design.uiComponents.map(c => c.name)).toEqual(['ProductListingPage', 'ProductCard']);
        expect(design.apiEndpoints.map(e => `${e.method} ${e.path}`)).toEqual(['GET /api/products', 'GET /api/products/{id}']);
        expect(design.dataModels.map(m => m.name)).toEqual(['Product']);
        expect(design.services[0].name).toBe('ProductService');
        expect(design.auth).toEqual({ mechanism: 'jwt', roles: ['user'] });
    });

    it('falls back to a generic entity without a feature', () => {
        const design = mockDesign({});
        expect(design.dataModels[0].name).toBe('Item');
        expect(design.apiEndpoints[0].path).toBe('/api/items');
    });
});

describe('extractTrackTasks', () => {
    const design = mockDesign({ feature: 'order_history' });

    it('frontend: components, api clients, auth', () => {
        const tasks = extractTrackTasks('frontend', design);
        expect(tasks.map(t => t.type)).toEqual(['component', 'component', 'api_client', 'api_client', 'auth']);
        expect(tasks[2]).toEqual({ type: 'api_client', endpoint: '/api/orders', method: 'GET', dataModel: 'Order' });
    });

    it('backend: controllers, models, services, auth', () => {
        const tasks = extractTrackTasks('backend', design);
        expect(tasks.map(t => t.type)).toEqual(['controller', 'controller', 'model', 'service', 'auth']);
        expect(tasks[0]).toEqual({
            type: 'controller',
            endpoint: '/api/orders',
            method: 'GET',
            responseModel: 'Order',
            security: ['authenticated'],
        });
        expect(tasks[3]).toEqual({
            type: 'service',
            name: 'OrderService',
            operations: ['list', 'getById'],
            dependencies: ['OrderRepository'],
            dataAccess: { repository: 'OrderRepository', entities: ['Order'] },
        });
    });

    it('omits auth when the design has none', () => {
        const noAuth: DesignDocument = { ...design, auth: undefined };
        expect(extractTrackTasks('backend', noAuth).some(t => t.type === 'auth')).toBe(false);
    });
});

describe('MockBackend', () => {
    it('returns the templated design for the design role', async () => {
        const result = await new MockBackend().infer(context());
        expect(result.content).toEqual(mockDesign({ feature: 'product_listing' }));
        expect(result.model).toBe('mock');
        expect(result.tokensUsed).toBe(0);
    });

    it('builds track output from the upstream design', async () => {
        const design = mockDesign({ feature: 'invoice' });
        const result = await new MockBackend().infer(context({
            role: 'dotnet_expert',
            kind: 'backend',
            stack: '.NET Core',
            predecessors: { system_designer: { kind: 'design', role: 'system_designer', design } },
        }));
        expect(result.content).toEqual({
            tasks: extractTrackTasks('backend', design),
            techStack: '.NET Core',
            dependencies: [],
        });
    });

    it('uses the templated design when nothing is upstream', async () => {
        const result = await new MockBackend().infer(context({ role: 'angular_expert', kind: 'frontend', stack: 'Angular' }));
        expect(result.content).toEqual({
            tasks: extractTrackTasks('frontend', mockDesign({ feature: 'product_listing' })),
            techStack: 'Angular',
            dependencies: [],
        });
    });

    it('is deterministic', async () => {
        const backend = new MockBackend();
        const a = await backend.infer(context());
        const b = await backend.infer(context());
        expect(JSON.stringify(a)).toBe(JSON.stringify(b));
    });

    it('rejects a malformed context', async () => {
        const bad = { ...context(), role: '' };
        await expect(new MockBackend().infer(bad)).rejects.toBeInstanceOf(PermanentBackendError);
        await expect(new MockBackend().infer(bad)).rejects.toThrow('Malformed infer context: role');
    });

    it('honours an aborted signal', async () => {
        const controller = new AbortController();
        controller.abort();
        await expect(new MockBackend().infer(context(), { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    });
});

// --- Retry ---
describe('RetryingBackend', () => {
    it('retries transient errors until success', async () => {
        const inner = flaky(2, () => new TransientBackendError('reset'));
        const backend = new RetryingBackend(inner, { maxRetries: 2, baseDelayMs: 1 });
        const result = await backend.infer(context());
        expect(result.content).toEqual({ ok: true });
        expect(inner.calls).toBe(3);
    });

    it('gives up after maxRetries', async () => {
        const inner = flaky(5, () => new TransientBackendError('reset'));
        const backend = new RetryingBackend(inner, { maxRetries: 2, baseDelayMs: 1 });
        await expect(backend.infer(context())).rejects.toThrow('reset');
        expect(inner.calls).toBe(3);
    });

    it('never retries permanent errors', async () => {
        const inner = flaky(1, () => new PermanentBackendError('quota exceeded'));
        const backend = new RetryingBackend(inner, { maxRetries: 3, baseDelayMs: 1 });
        await expect(backend.infer(context())).rejects.toBeInstanceOf(PermanentBackendError);
        expect(inner.calls).toBe(1);
    });

    it('computes exponential backoff', () => {
        const backend = new RetryingBackend(new MockBackend(), { maxRetries: 3, baseDelayMs: 100 });
        expect([0, 1, 2].map(a => backend.backoff(a))).toEqual([100, 200, 400]);
    });

    it('logs each retry', async () => {
        const warn = vi.fn();
        const logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn(), child: vi.fn() };
        const backend = new RetryingBackend(flaky(1, () => new TransientBackendError('reset')), { maxRetries: 1, baseDelayMs: 1, logger });
        await backend.infer(context());
        expect(warn).toHaveBeenCalledWith('system_designer: transient backend error, retry 1/1 in 1ms', { error: 'reset' });
    });

    it('cancels during backoff', async () => {
        const controller = new AbortController();
        const backend = new RetryingBackend(flaky(1, () => new TransientBackendError('reset')), { maxRetries: 1, baseDelayMs: 10_000 });
        const pending = backend.infer(context(), { signal: controller.signal });
        setTimeout(() => controller.abort(), 5);
        await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });
});

// --- Live backend ---
describe('LiveBackend', () => {
    const live = (generate: TextGenerator, callTimeoutMs = 1_000) =>
        new LiveBackend({ modelName: 'openai/gpt-4o-mini', callTimeoutMs, generate });

    it('passes prompts through and parses JSON output', async () => {
        const generate = vi.fn<TextGenerator>(async () => ({ text: '```json\n{"summary":"ok"}\n```', totalTokens: 42 }));
        const result = await live(generate).infer(context());
        expect(result).toEqual({ content: { summary: 'ok' }, tokensUsed: 42, model: 'openai/gpt-4o-mini' });
        expect(generate.mock.calls[0][0].system).toBe('system prompt');
        expect(generate.mock.calls[0][0].prompt).toBe('user prompt');
    });

    it('maps a timeout to a transient error', async () => {
        const backend = live(({ abortSignal }) => waitForAbort(abortSignal), 20);
        const error = await backend.infer(context()).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(TransientBackendError);
        expect(error).toHaveProperty('message', 'system_designer: model call timed out after 20ms');
    });

    it('maps a caller abort to CancelledError', async () => {
        const controller = new AbortController();
        const pending = live(({ abortSignal }) => waitForAbort(abortSignal)).infer(context(), { signal: controller.signal });
        controller.abort();
        await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });

    it('classifies API errors by retryability', async () => {
        const apiError = (statusCode: number) => new APICallError({
            message: `HTTP ${statusCode}`,
            url: 'https://api.example.test/v1/responses',
            requestBodyValues: {},
            statusCode,
        });

        const unauthorized = await live(async () => { throw apiError(401); }).infer(context()).catch((e: unknown) => e);
        expect(unauthorized).toBeInstanceOf(PermanentBackendError);
        expect(unauthorized).toHaveProperty('statusCode', 401);

        const unavailable = await live(async () => { throw apiError(503); }).infer(context()).catch((e: unknown) => e);
        expect(unavailable).toBeInstanceOf(TransientBackendError);
    });

    it('treats unknown failures as transient network errors', async () => {
        const error = await live(async () => { throw new TypeError('fetch failed'); }).infer(context()).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(TransientBackendError);
        expect(error).toHaveProperty('message', 'system_designer: fetch failed');
    });
});

describe('parseModelOutput', () => {
    it('parses bare and fenced JSON', () => {
        expect(parseModelOutput('{"a":1}')).toEqual({ a: 1 });
        expect(parseModelOutput('```\n[1,2]\n```')).toEqual([1, 2]);
    });

    it('keeps non-JSON text as is', () => {
        expect(parseModelOutput('Sure! Here is the plan.')).toBe('Sure! Here is the plan.');
    });
});

describe('resolveModel', () => {
    it('defaults bare ids to openai', () => {
        const model = resolveModel('gpt-4o-mini');
        expect(typeof model === 'string' ? model : model.modelId).toBe('gpt-4o-mini');
    });

    it('rejects unknown providers', () => {
        expect(() => resolveModel('acme/large')).toThrow('Unknown model provider "acme"');
        expect(() => resolveModel('openai/')).toThrow('Invalid model name');
    });

    it('accepts only the listed provider prefixes', () => {
        expect(() => resolveModel('gemini/gemini-2.0-flash'))
            .toThrow('Unknown model provider "gemini" in "gemini/gemini-2.0-flash" (supported: openai, google)');
    });
});

describe('createBackend', () => {
    it('selects the mock for the sentinel model name', () => {
        const backend = createBackend({ modelName: 'mock', callTimeoutMs: 1000, maxRetries: 0, retryBaseDelayMs: 0 });
        expect(backend).toBeInstanceOf(MockBackend);
    });

    it('selects the live backend for any other name, wrapped in retries', () => {
        const backend = createBackend({ modelName: 'openai/gpt-4o-mini', callTimeoutMs: 1000, maxRetries: 2, retryBaseDelayMs: 1 });
        expect(backend).toBeInstanceOf(RetryingBackend);
        expect(backend.name).toBe('openai/gpt-4o-mini');
    });

    it('live backend without retries when maxRetries is 0', () => {
        const backend = createBackend({ modelName: 'google/gemini-2.0-flash', callTimeoutMs: 1000, maxRetries: 0, retryBaseDelayMs: 0 });
        expect(backend).toBeInstanceOf(LiveBackend);
    });
});
