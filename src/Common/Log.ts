/**
 * Returns the current timestamp in ISO format.
 * @example
 * const ts = GetTimestamp(); // '2025-06-24T12:34:56.789Z'
 */
export function GetTimestamp(): string {
    return new Date().toISOString();
}

/**
 * Log levels for application logging.
 */
export enum LogLevel {
    Critical = 'CRITICAL',
    Error = 'ERROR',
    Warning = 'WARNING',
    Info = 'INFO',
    Debug = 'DEBUG',
}

/** Configured verbosity names accepted from config files and env. */
export type LogLevelName = `debug` | `info` | `warn` | `error` | `silent`;

// lower is more verbose
const SEVERITY: Record<LogLevel, number> = {
    [LogLevel.Debug]: 0,
    [LogLevel.Info]: 1,
    [LogLevel.Warning]: 2,
    [LogLevel.Error]: 3,
    [LogLevel.Critical]: 4,
};

const THRESHOLDS: Record<LogLevelName, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: Number.POSITIVE_INFINITY,
};

let _threshold = THRESHOLDS.info;

/**
 * Sets the minimum level that reaches the console.
 * @param level LogLevelName - Verbosity from configuration (e.g. 'debug')
 */
export function SetLogLevel(level: LogLevelName): void {
    _threshold = THRESHOLDS[level];
}

/**
 * Logs a message at the specified log level, prepending a timestamp.
 * @param level LogLevel - Level of the log
 * @param message string - Message to log
 * @param from string - Source identifier (component name)
 * @param context string - Optional additional context
 * @example
 * log(LogLevel.Info, 'Store ready', 'App');
 */
export function log(level: LogLevel, message: string, from: string, context?: string): void {
    if (SEVERITY[level] < _threshold) {
        return;
    }
    const timestamp = GetTimestamp();
    const body = context ? `[${context}] ${message}` : message;
    const formatted = `[${timestamp}] [${level}] [${from}] ${body}`;
    const logger = console;

    switch (level) {
        case LogLevel.Critical:
        case LogLevel.Error:
            logger.error(formatted);
            break;
        case LogLevel.Warning:
            logger.warn(formatted);
            break;
        case LogLevel.Info:
            logger.info(formatted);
            break;
        case LogLevel.Debug:
            logger.debug(formatted);
            break;
    }
}

export namespace log {
    /** Logs a critical level message. */
    export function critical(message: string, from: string, context?: string): void {
        log(LogLevel.Critical, message, from, context);
    }

    /** Logs an error level message. */
    export function error(message: string, from: string, context?: string): void {
        log(LogLevel.Error, message, from, context);
    }

    /** Logs a warning level message. */
    export function warning(message: string, from: string, context?: string): void {
        log(LogLevel.Warning, message, from, context);
    }

    /** Logs an informational level message. */
    export function info(message: string, from: string, context?: string): void {
        log(LogLevel.Info, message, from, context);
    }

    /** Logs a debug level message. */
    export function debug(message: string, from: string, context?: string): void {
        log(LogLevel.Debug, message, from, context);
    }
}
