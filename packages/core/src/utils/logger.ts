/**
 * Logger Module
 * Structured logging using pino, written to stderr so result output on
 * stdout stays clean.
 */

import pino, { type Logger as PinoLogger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerOptions {
    level?: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const envLevel = env.LOG_LEVEL?.toLowerCase();
    if (envLevel && isLogLevel(envLevel)) {
        return envLevel;
    }
    return env.NODE_ENV === 'test' ? 'silent' : 'info';
}

const destination = pino.destination({ dest: 2, sync: true });

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "executor", "storage", "repl")
 *
 * @example
 * ```typescript
 * const logger = createLogger("storage");
 * logger.debug({ database: "shop" }, "Flushed database");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
    return pino(
        {
            name: component,
            level: options.level ?? getLogLevel(),
        },
        destination
    );
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
