import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Writes to stderr: stdout belongs to the MCP stdio transport.
 */
let loggerInstance: pino.Logger | null = null;

const STDERR = 2;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ level }, pino.destination(STDERR));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                    destination: STDERR,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Plain JSON logger for the steps that run before `initLogger()`, such as
 * reading the config file. Only warnings and errors get through.
 */
export function createBootstrapLogger(): pino.Logger {
    return pino({ level: 'warn' }, pino.destination(STDERR));
}

/**
 * Get the logger instance.
 * If not initialized, creates a default info-level logger.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: 'info' });
    }
    return loggerInstance;
}

export type Logger = pino.Logger;
