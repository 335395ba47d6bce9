/**
 * Centralized logging utility for the showcase generator.
 * Provides structured JSON logging compatible with pino format for better searchability.
 *
 * Usage:
 *   import { createLogger } from './logger.js';
 *   const logger = createLogger('Fetcher');
 *   logger.info('Fetched player summary', { steamid, badges: 3 });
 *   logger.warn('Live fetch failed', { error });
 *
 * Log levels: debug, info, warn, error
 *
 * debug/info are written to stdout, warn/error to stderr.
 *
 * Output format matches pino structure:
 *   { "level": 30, "time": <timestamp>, "context": "Fetcher", "msg": "...", ...fields }
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
};

export interface LogContext {
    [key: string]: unknown;
}

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && Object.hasOwn(LOG_LEVEL_VALUES, value);
}

/**
 * Sanitizes sensitive data from log context.
 * Masks API keys, tokens, secrets and passwords.
 */
export function sanitizeContext(data: LogContext): LogContext {
    const sanitized: LogContext = {};

    for (const [key, value] of Object.entries(data)) {
        const lowerKey = key.toLowerCase();

        // `key` is the Steam Web API query parameter name
        if (lowerKey === 'key' || lowerKey.includes('apikey') || lowerKey.includes('api_key')
            || lowerKey.includes('token') || lowerKey.includes('password') || lowerKey.includes('secret')) {
            sanitized[key] = '***';
        } else if (value instanceof Error) {
            sanitized[key] = {
                message: value.message,
                name: value.name,
                stack: value.stack,
            };
        } else {
            sanitized[key] = value;
        }
    }

    return sanitized;
}

export class Logger {
    private context: string;
    private minLevel: LogLevel;

    constructor(context: string = 'Showcase', minLevel: LogLevel = 'info') {
        this.context = context;
        this.minLevel = minLevel;
    }

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.minLevel];
    }

    /**
     * Format log message as structured JSON compatible with pino format
     */
    private formatStructured(level: LogLevel, message: string, data?: LogContext): string {
        const logEntry: Record<string, unknown> = {
            level: LOG_LEVEL_VALUES[level],
            time: Date.now(),
            context: this.context,
            msg: message,
        };

        if (data && Object.keys(data).length > 0) {
            Object.assign(logEntry, sanitizeContext(data));
        }

        return JSON.stringify(logEntry);
    }

    debug(message: string, data?: LogContext): void {
        if (this.shouldLog('debug')) {
            console.log(this.formatStructured('debug', message, data));
        }
    }

    info(message: string, data?: LogContext): void {
        if (this.shouldLog('info')) {
            console.log(this.formatStructured('info', message, data));
        }
    }

    warn(message: string, data?: LogContext): void {
        if (this.shouldLog('warn')) {
            console.warn(this.formatStructured('warn', message, data));
        }
    }

    error(message: string, data?: LogContext): void {
        if (this.shouldLog('error')) {
            console.error(this.formatStructured('error', message, data));
        }
    }
}

function envLevel(): LogLevel {
    const raw = process.env.LOG_LEVEL;
    return isLogLevel(raw) ? raw : 'info';
}

/**
 * Create a logger instance with a specific context
 * @param context - Context string attached to every entry (e.g., 'Fetcher', 'Cache', 'CLI')
 * @param minLevel - Minimum log level to output (defaults to LOG_LEVEL env var, then 'info')
 */
export function createLogger(context: string, minLevel?: LogLevel): Logger {
    return new Logger(context, minLevel ?? envLevel());
}
