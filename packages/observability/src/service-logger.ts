/**
 * Structured logger bound to one service.
 *
 * Adds the service name and any bound context (request id, route) to every
 * line, filters by level and redacts secret-like metadata keys before handing
 * the entry to the base JSON logger. `child()` returns a new logger; a logger
 * never mutates its context after creation.
 */

import { log as baseLog, type LogLevel } from './logger.js';

export interface ServiceLoggerConfig {
    /** Service name injected into every log line. */
    service: string;
    /** Minimum log level (default: 'info' in production, 'debug' elsewhere). */
    minLevel?: LogLevel;
    /** Metadata keys to redact; matched case-insensitively as substrings. */
    redactFields?: string[];
    context?: Record<string, unknown>;
}

export interface ServiceLogger {
    debug(message: string, metadata?: Record<string, unknown>): void;
    info(message: string, metadata?: Record<string, unknown>): void;
    warn(message: string, metadata?: Record<string, unknown>): void;
    error(message: string, metadata?: Record<string, unknown>): void;
    child(context: Record<string, unknown>): ServiceLogger;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

export const DEFAULT_REDACT_FIELDS = [
    'password',
    'token',
    'secret',
    'authorization',
    'cookie',
    'apiKey',
    'api_key',
    'privateKey',
    'private_key'
];

export function redactMetadata(
    metadata: Record<string, unknown>,
    redactFields: string[] = DEFAULT_REDACT_FIELDS
): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
        if (redactFields.some((f) => key.toLowerCase().includes(f.toLowerCase()))) {
            result[key] = '[REDACTED]';
        } else if (isPlainRecord(value)) {
            result[key] = redactMetadata(value, redactFields);
        } else {
            result[key] = value;
        }
    }
    return result;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

export function createServiceLogger(config: ServiceLoggerConfig): ServiceLogger {
    const env = process.env.NODE_ENV ?? 'development';
    const minLevel = config.minLevel ?? (env === 'production' ? 'info' : 'debug');
    const minLevelOrder = LOG_LEVEL_ORDER[minLevel];
    const redactFields = config.redactFields ?? DEFAULT_REDACT_FIELDS;
    const context = config.context ?? {};

    const emit = (level: LogLevel, message: string, metadata?: Record<string, unknown>): void => {
        if (LOG_LEVEL_ORDER[level] < minLevelOrder) return;

        const enriched = redactMetadata(
            {
                service: config.service,
                ...context,
                ...(metadata ?? {})
            },
            redactFields
        );

        baseLog(level, message, enriched);
    };

    return {
        debug: (message, metadata) => emit('debug', message, metadata),
        info: (message, metadata) => emit('info', message, metadata),
        warn: (message, metadata) => emit('warn', message, metadata),
        error: (message, metadata) => emit('error', message, metadata),
        child: (extra) =>
            createServiceLogger({
                service: config.service,
                minLevel,
                redactFields,
                context: { ...context, ...extra }
            })
    };
}
