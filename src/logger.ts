/**
 * Console logger shared by the governor services.
 * Replace it with setLogger() to route output elsewhere.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
    debug(category: string, message: string, data?: Record<string, unknown>): void;
    info(category: string, message: string, data?: Record<string, unknown>): void;
    warn(category: string, message: string, data?: Record<string, unknown>, error?: unknown): void;
    error(category: string, message: string, data?: Record<string, unknown>, error?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

const formatData = (data?: Record<string, unknown>): string => {
    if (!data || Object.keys(data).length === 0) return '';
    return ' ' + JSON.stringify(data);
};

const formatError = (error?: unknown): string => {
    if (error === undefined) return '';
    return ` [${error instanceof Error ? error.message : String(error)}]`;
};

export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
    const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

    return {
        debug(category, message, data) {
            if (enabled('debug')) {
                console.log(`[DEBUG] [${category}] ${message}${formatData(data)}`);
            }
        },
        info(category, message, data) {
            if (enabled('info')) {
                console.log(`[INFO] [${category}] ${message}${formatData(data)}`);
            }
        },
        warn(category, message, data, error) {
            if (enabled('warn')) {
                console.warn(`[WARN] [${category}] ${message}${formatData(data)}${formatError(error)}`);
            }
        },
        error(category, message, data, error) {
            if (enabled('error')) {
                console.error(`[ERROR] [${category}] ${message}${formatData(data)}${formatError(error)}`);
            }
        }
    };
}

let currentLogger: Logger = createConsoleLogger();

export function setLogger(customLogger: Logger): void {
    currentLogger = customLogger;
}

export function getLogger(): Logger {
    return currentLogger;
}
