/**
 * @fileoverview Structured Logging Module
 * Scoped, levelled logging for the pipeline modules. Lines go to stderr so that
 * stdout carries only the command's own output (summary, file paths).
 *
 * Level selection, first match wins:
 * 1. `LOG_LEVEL` (debug | info | warn | error | none)
 * 2. `INVOICE_DEBUG=true` → DEBUG
 * 3. NODE_ENV: test → NONE, production → WARN, otherwise INFO
 */

import { Console as NodeConsole } from 'node:console';
import { APP_ENV, ENV_KEYS } from './constants.js';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: 'DEBUG',
    [LogLevel.INFO]: 'INFO',
    [LogLevel.WARN]: 'WARN',
    [LogLevel.ERROR]: 'ERROR',
    [LogLevel.NONE]: 'NONE',
};

/**
 * Destination of formatted log lines.
 */
export type LogSink = Pick<Console, 'info' | 'warn' | 'error' | 'time' | 'timeEnd'>;

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Minimum log level to output */
    minLevel: LogLevel;
    /** Whether to include timestamps in output */
    timestamps: boolean;
    /** Whether to include the module name in output */
    showModule: boolean;
    sink: LogSink;
}

const stderrSink: LogSink = new NodeConsole({ stdout: process.stderr, stderr: process.stderr });

/**
 * Parses a LOG_LEVEL value; unknown names yield null.
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
    switch ((value ?? '').trim().toLowerCase()) {
        case 'debug':
            return LogLevel.DEBUG;
        case 'info':
            return LogLevel.INFO;
        case 'warn':
        case 'warning':
            return LogLevel.WARN;
        case 'error':
            return LogLevel.ERROR;
        case 'none':
        case 'silent':
            return LogLevel.NONE;
        default:
            return null;
    }
}

function defaultLevel(): LogLevel {
    const explicit = parseLogLevel(process.env[ENV_KEYS.LOG_LEVEL]);
    if (explicit !== null) return explicit;
    if (process.env[ENV_KEYS.DEBUG] === 'true') return LogLevel.DEBUG;
    if (APP_ENV === 'test') return LogLevel.NONE;
    return APP_ENV === 'production' ? LogLevel.WARN : LogLevel.INFO;
}

let config: LoggerConfig = {
    minLevel: defaultLevel(),
    timestamps: true,
    showModule: true,
    sink: stderrSink,
};

/**
 * Configure the logger
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
    config = { ...config, ...newConfig };
}

/**
 * Set the minimum log level
 */
export function setLogLevel(level: LogLevel): void {
    config.minLevel = level;
}

/**
 * Check if debug mode is enabled
 */
export function isDebugEnabled(): boolean {
    return config.minLevel <= LogLevel.DEBUG;
}

/**
 * Format a log message with metadata
 */
export function formatMessage(level: LogLevel, module: string | undefined, message: string): string {
    const parts: string[] = [];

    if (config.timestamps) {
        parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${LOG_LEVEL_NAMES[level]}]`);

    if (config.showModule && module) {
        parts.push(`[${module}]`);
    }

    parts.push(message);

    return parts.join(' ');
}

// ==================== REDACTION ====================

const SENSITIVE_KEY_MARKERS = ['token', 'password', 'secret', 'key', 'email', 'dsn', 'authorization'];

const LONG_TOKEN_PATTERN = /[a-zA-Z0-9]{32,}/g;

/** `/home/<user>`, `/Users/<user>` and `C:\Users\<user>` prefixes */
const HOME_DIRECTORY_PATTERN = /(?:\/home\/|\/Users\/|[A-Za-z]:\\Users\\)[^/\\\s]+/g;

/**
 * Whether a record key names a value that must never be logged or reported.
 */
export function isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return SENSITIVE_KEY_MARKERS.some((marker) => lowerKey.includes(marker));
}

/**
 * Replaces the user part of home-directory paths with `~`.
 *
 * @example
 * redactHomePaths('/home/sam/invoices/north.xlsx') // → '~/invoices/north.xlsx'
 */
export function redactHomePaths(text: string): string {
    return text.replace(HOME_DIRECTORY_PATTERN, '~');
}

/**
 * Sanitize data before logging: masks long tokens and home directories in
 * strings and redacts sensitive keys at any depth.
 */
export function sanitize(data: unknown): unknown {
    if (data === null || data === undefined) {
        return data;
    }

    if (typeof data === 'string') {
        return redactHomePaths(data.replace(LONG_TOKEN_PATTERN, '[REDACTED]'));
    }

    if (data instanceof Error || data instanceof Date) {
        return data;
    }

    if (Array.isArray(data)) {
        return data.map(sanitize);
    }

    if (typeof data === 'object') {
        const sanitized: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(data)) {
            sanitized[key] = isSensitiveKey(key) ? '[REDACTED]' : sanitize(value);
        }
        return sanitized;
    }

    return data;
}

// ==================== OUTPUT ====================

function log(level: LogLevel, module: string | undefined, message: string, ...data: unknown[]): void {
    if (level < config.minLevel) {
        return;
    }

    const formattedMessage = formatMessage(level, module, message);
    const sanitizedData = data.map(sanitize);

    switch (level) {
        case LogLevel.DEBUG:
        case LogLevel.INFO:
            config.sink.info(formattedMessage, ...sanitizedData);
            break;
        case LogLevel.WARN:
            config.sink.warn(formattedMessage, ...sanitizedData);
            break;
        case LogLevel.ERROR:
            config.sink.error(formattedMessage, ...sanitizedData);
            break;
    }
}

/**
 * Scoped logger returned by `createLogger`.
 */
export interface Logger {
    debug(message: string, ...data: unknown[]): void;
    info(message: string, ...data: unknown[]): void;
    warn(message: string, ...data: unknown[]): void;
    error(message: string, ...data: unknown[]): void;
    log(level: LogLevel, message: string, ...data: unknown[]): void;
    /** Starts a DEBUG-level timer */
    time(label: string): void;
    timeEnd(label: string): void;
}

/**
 * Create a scoped logger for a specific module
 */
export function createLogger(module: string): Logger {
    return {
        debug: (message, ...data) => log(LogLevel.DEBUG, module, message, ...data),
        info: (message, ...data) => log(LogLevel.INFO, module, message, ...data),
        warn: (message, ...data) => log(LogLevel.WARN, module, message, ...data),
        error: (message, ...data) => log(LogLevel.ERROR, module, message, ...data),
        log: (level, message, ...data) => log(level, module, message, ...data),
        time: (label) => {
            if (isDebugEnabled()) config.sink.time(`[${module}] ${label}`);
        },
        timeEnd: (label) => {
            if (isDebugEnabled()) config.sink.timeEnd(`[${module}] ${label}`);
        },
    };
}
