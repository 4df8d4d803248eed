/**
 * @fileoverview Structured Logging Module
 * Module-scoped, levelled logging to stderr. Stdout is left to the CLI's own
 * output lines. Messages and attached data pass through redaction first.
 *
 * Level: DEBUG when debug is on, WARN in production, INFO otherwise. The
 * initial level comes from `TIME_REPORT_DEBUG` and `NODE_ENV`; `main()` sets
 * it again from the loaded config.
 */

import { ENV_KEYS } from './constants.js';
import { redactText, redactValue } from './redact.js';
import type { AppConfig } from './types.js';

enum LogLevel {
    DEBUG = 10,
    INFO = 20,
    WARN = 30,
    ERROR = 40,
}

const LEVEL_LABELS: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: 'DEBUG',
    [LogLevel.INFO]: 'INFO',
    [LogLevel.WARN]: 'WARN',
    [LogLevel.ERROR]: 'ERROR',
};

function levelFor(debug: boolean, environment: string): LogLevel {
    if (debug) return LogLevel.DEBUG;
    return environment === 'production' ? LogLevel.WARN : LogLevel.INFO;
}

const debugFlag = process.env[ENV_KEYS.DEBUG];
let minLevel = levelFor(debugFlag === 'true' || debugFlag === '1', process.env.NODE_ENV ?? 'development');

/**
 * Applies the run's configuration to every logger.
 */
export function configureLogging(options: Pick<AppConfig, 'debug' | 'environment'>): void {
    minLevel = levelFor(options.debug, options.environment);
}

function emit(level: LogLevel, module: string, message: string, data: unknown[]): void {
    if (level < minLevel) return;

    const line = `[${new Date().toISOString()}] [${LEVEL_LABELS[level]}] [${module}] ${redactText(message)}`;
    const redacted = data.map(redactValue);
    if (level === LogLevel.ERROR) {
        console.error(line, ...redacted);
    } else {
        console.warn(line, ...redacted);
    }
}

/**
 * Creates a logger whose lines are tagged with `module`.
 */
export function createLogger(module: string) {
    const timers = new Map<string, number>();

    return {
        debug: (message: string, ...data: unknown[]) => emit(LogLevel.DEBUG, module, message, data),
        info: (message: string, ...data: unknown[]) => emit(LogLevel.INFO, module, message, data),
        warn: (message: string, ...data: unknown[]) => emit(LogLevel.WARN, module, message, data),
        error: (message: string, ...data: unknown[]) => emit(LogLevel.ERROR, module, message, data),
        /** Starts a debug-level timer; `timeEnd` logs the elapsed milliseconds */
        time: (label: string) => {
            timers.set(label, Date.now());
        },
        timeEnd: (label: string) => {
            const startedAt = timers.get(label);
            if (startedAt === undefined) return;
            timers.delete(label);
            emit(LogLevel.DEBUG, module, `${label}: ${Date.now() - startedAt}ms`, []);
        },
    };
}
