import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

function envLevel(): LogLevel | undefined {
    const raw = process.env['CITECACHE_LOG_LEVEL'];
    return LOG_LEVELS.find((level) => level === raw);
}

function envJsonLogs(): boolean {
    const raw = process.env['CITECACHE_JSON_LOGS'];
    return raw === '1' || raw === 'true';
}

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = envLevel() ?? 'info', jsonLogs = envJsonLogs() } = options;

    if (jsonLogs) {
        // stdout carries command output
        loggerInstance = pino({ level }, pino.destination(2));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a logger from the environment defaults.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({});
    }
    return loggerInstance;
}
