export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
    child(scope: string): Logger;
}

type ConsoleMethod = (message?: unknown, ...optionalParams: unknown[]) => void;

const sinks: Record<LogLevel, ConsoleMethod> = {
    debug: (...args) => console.debug(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
};

/**
 * Console logger with a scope and a minimum level.
 * Lines look like `2024-06-15T10:00:00.000Z - pool - INFO - Connected to weather`.
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
    const threshold = LOG_LEVELS.indexOf(level);

    const write = (messageLevel: LogLevel, message: string, details: unknown[]) => {
        if (LOG_LEVELS.indexOf(messageLevel) < threshold) {
            return;
        }
        const line = `${new Date().toISOString()} - ${scope} - ${messageLevel.toUpperCase()} - ${message}`;
        sinks[messageLevel](line, ...details);
    };

    return {
        debug: (message, ...details) => write('debug', message, details),
        info: (message, ...details) => write('info', message, details),
        warn: (message, ...details) => write('warn', message, details),
        error: (message, ...details) => write('error', message, details),
        child: (childScope) => createLogger(`${scope}.${childScope}`, level),
    };
}

export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => silentLogger,
};
