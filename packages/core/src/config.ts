/**
 * @swarmplan/core — Config layer
 *
 * Defaults + overrides, validated with zod. configFromEnv() is the only
 * place that reads environment variables.
 */

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';

/** Model name that selects the deterministic mock backend */
export const MOCK_MODEL = 'mock';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface SwarmConfig {
    /** "mock", "provider/model-id" or a bare OpenAI model id */
    modelName: string;
    /** Per backend call */
    callTimeoutMs: number;
    /** Whole run; unset means no run deadline */
    runTimeoutMs?: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    maxConcurrent: number;
    logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<SwarmConfig> = {
    modelName: MOCK_MODEL,
    callTimeoutMs: 60_000,
    maxRetries: 2,
    retryBaseDelayMs: 500,
    maxConcurrent: 5,
    logLevel: 'info',
};

const ConfigSchema = z.object({
    modelName: z.string().trim().min(1),
    callTimeoutMs: z.number().int().positive(),
    runTimeoutMs: z.number().int().positive().optional(),
    maxRetries: z.number().int().min(0).max(10),
    retryBaseDelayMs: z.number().int().min(0),
    maxConcurrent: z.number().int().positive(),
    logLevel: z.enum(LOG_LEVELS),
});

export function createConfig(overrides?: Partial<SwarmConfig>): SwarmConfig {
    const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
    for (const [key, value] of Object.entries(overrides ?? {})) {
        if (value !== undefined) merged[key] = value;
    }

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new InvalidConfigError(
            'Invalid swarm config',
            parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
        );
    }
    return parsed.data;
}

const ENV_KEYS = {
    modelName: 'SWARMPLAN_MODEL',
    callTimeoutMs: 'SWARMPLAN_CALL_TIMEOUT_MS',
    runTimeoutMs: 'SWARMPLAN_RUN_TIMEOUT_MS',
    maxRetries: 'SWARMPLAN_MAX_RETRIES',
    retryBaseDelayMs: 'SWARMPLAN_RETRY_DELAY_MS',
    maxConcurrent: 'SWARMPLAN_MAX_CONCURRENT',
    logLevel: 'SWARMPLAN_LOG_LEVEL',
} as const;

type IntKey = 'callTimeoutMs' | 'runTimeoutMs' | 'maxRetries' | 'retryBaseDelayMs' | 'maxConcurrent';

const intFromEnv = z.coerce.number().int();

/** Read config overrides from the environment. Unset or empty variables are ignored. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<SwarmConfig> {
    const overrides: Partial<SwarmConfig> = {};
    const issues: string[] = [];

    const readInt = (key: keyof typeof ENV_KEYS): number | undefined => {
        const raw = env[ENV_KEYS[key]]?.trim();
        if (!raw) return undefined;
        const parsed = intFromEnv.safeParse(raw);
        if (!parsed.success) {
            issues.push(`${ENV_KEYS[key]}: expected an integer, got "${raw}"`);
            return undefined;
        }
        return parsed.data;
    };

    const model = env[ENV_KEYS.modelName]?.trim();
    if (model) overrides.modelName = model;

    const level = env[ENV_KEYS.logLevel]?.trim();
    if (level) {
        const parsed = z.enum(LOG_LEVELS).safeParse(level);
        if (parsed.success) overrides.logLevel = parsed.data;
        else issues.push(`${ENV_KEYS.logLevel}: expected one of ${LOG_LEVELS.join('|')}, got "${level}"`);
    }

    const intKeys: IntKey[] = ['callTimeoutMs', 'runTimeoutMs', 'maxRetries', 'retryBaseDelayMs', 'maxConcurrent'];
    for (const key of intKeys) {
        const value = readInt(key);
        if (value !== undefined) overrides[key] = value;
    }

    if (issues.length > 0) {
        throw new InvalidConfigError('Invalid environment', issues);
    }
    return overrides;
}
