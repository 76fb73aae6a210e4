import pino from 'pino';
import { LOG_LEVELS, type LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with a human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Must run before the workflow modules are imported, since they bind
 * `getLogger()` at module load.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ level });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a plain JSON logger at `REVIEWFLOW_LOG_LEVEL`
 * (`silent` is accepted, which the test config uses).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = pino({ level: envLogLevel() });
    }
    return loggerInstance;
}

function envLogLevel(): string {
    const raw = process.env['REVIEWFLOW_LOG_LEVEL'];
    if (raw === 'silent') return raw;
    return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}
