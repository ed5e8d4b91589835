/**
 * @swarmplan/core — Logger
 *
 * Tagged console output: `[Swarm] node dotnet_expert → done {"ms":12}`.
 */

import type { LogLevel } from './config.js';

export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
    /** Same sink and level, different tag */
    child(tag: string): Logger;
}

export type LogSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

const SEVERITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export interface LoggerOptions {
    level?: LogLevel;
    sink?: LogSink;
}

export function createLogger(tag: string, options?: LoggerOptions): Logger {
    const level = options?.level ?? 'info';
    const sink = options?.sink ?? console;

    const write = (at: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>) => {
        if (SEVERITY[at] < SEVERITY[level]) return;
        const line = meta && Object.keys(meta).length > 0
            ? `[${tag}] ${message} ${JSON.stringify(meta)}`
            : `[${tag}] ${message}`;
        switch (at) {
            case 'debug': sink.debug(line); break;
            case 'info': sink.log(line); break;
            case 'warn': sink.warn(line); break;
            case 'error': sink.error(line); break;
        }
    };

    return {
        debug: (message, meta) => write('debug', message, meta),
        info: (message, meta) => write('info', message, meta),
        warn: (message, meta) => write('warn', message, meta),
        error: (message, meta) => write('error', message, meta),
        child: (childTag) => createLogger(childTag, { level, sink }),
    };
}

const noop = () => { };

export const silentLogger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => silentLogger,
};
