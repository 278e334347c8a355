import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`;
 * modules call `getLogger()` when they log so they pick up that configuration.
 */
let loggerInstance: pino.Logger | null = null;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Initialize the logger with the specified options.
 * Replaces any logger created earlier.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
    /** Write JSON logs to this stream instead of stdout */
    destination?: pino.DestinationStream;
}): pino.Logger {
    const { level = 'info', jsonLogs = false, destination } = options;
    // Errors are logged under `error` as well as pino's own `err`
    const serializers = { error: pino.stdSerializers.err };

    if (destination) {
        loggerInstance = pino({ name: 'paper-search', level, serializers }, destination);
    } else if (jsonLogs) {
        loggerInstance = pino({ name: 'paper-search', level, serializers });
    } else {
        loggerInstance = pino({
            name: 'paper-search',
            level,
            serializers,
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
 * If not initialized, creates one from LOG_LEVEL / LOG_JSON.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({
            level: parseLogLevel(process.env['LOG_LEVEL']),
            jsonLogs: parseFlag(process.env['LOG_JSON']),
        });
    }
    return loggerInstance;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    const normalized = value?.trim().toLowerCase();
    return LOG_LEVELS.find((level) => level === normalized);
}

export function parseFlag(value: string | undefined): boolean {
    return value === '1' || value?.toLowerCase() === 'true';
}
