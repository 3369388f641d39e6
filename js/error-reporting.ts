/**
 * @fileoverview Error Reporting Module
 * Sends pipeline failures to Sentry when `SENTRY_DSN` is set. Without a DSN every
 * function here only logs, and the SDK is never loaded.
 *
 * Everything that leaves the process is scrubbed first: credentials, email
 * addresses and the user part of home-directory paths (input files are usually
 * under the user's home).
 */

import { createLogger, isSensitiveKey, redactHomePaths } from './logger.js';

const log = createLogger('ErrorReporting');

// ==================== TYPES ====================

/**
 * Sentry configuration options
 */
export interface SentryConfig {
    dsn: string;
    /** e.g. 'production', 'development' */
    environment: string;
    release: string;
    debug?: boolean;
    /** Sample rate for error events (0.0 to 1.0) */
    sampleRate?: number;
    /** Reported instead of the machine's host name */
    serverName?: string;
}

/**
 * Where and how a reported error happened.
 */
export interface ErrorContext {
    /** Module where error occurred */
    module?: string;
    /** Pipeline stage or function name */
    operation?: string;
    metadata?: Record<string, unknown>;
    /** User-facing error message */
    userMessage?: string;
    level?: 'fatal' | 'error' | 'warning' | 'info';
}

type SentryModule = typeof import('@sentry/node');

/**
 * The parts of a Sentry event that may carry sensitive text.
 */
interface ScrubbableEvent {
    exception?: {
        values?: { value?: string; stacktrace?: { frames?: { filename?: string }[] } }[];
    };
    breadcrumbs?: { message?: string; data?: { [key: string]: unknown } }[];
    request?: { url?: string };
    extra?: { [key: string]: unknown };
}

// ==================== STATE ====================

let sentry: SentryModule | null = null;
let eventCodeTag: string | null = null;

// ==================== SCRUBBING ====================

const SENSITIVE_PATTERNS = [
    /Bearer\s+[^\s]*/gi,
    /token["\s:=]+[^"'\s,}]*/gi,
    /password["\s:=]+[^"'\s,}]*/gi,
    /secret["\s:=]+[^"'\s,}]*/gi,
    /api[_-]?key["\s:=]+[^"'\s,}]*/gi,
    /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // email addresses
];

/**
 * Redacts credentials and email addresses and shortens home-directory paths.
 */
export function scrubSensitiveData(text: string): string {
    const redacted = SENSITIVE_PATTERNS.reduce((scrubbed, pattern) => scrubbed.replace(pattern, '[REDACTED]'), text);
    return redactHomePaths(redacted);
}

function scrubValue(value: unknown): unknown {
    if (typeof value === 'string') {
        return scrubSensitiveData(value);
    }
    if (Array.isArray(value)) {
        return value.map(scrubValue);
    }
    if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
        return scrubRecord(Object.entries(value));
    }
    return value;
}

/**
 * Scrubs key/value pairs recursively; values under sensitive keys are dropped.
 */
export function scrubRecord(entries: [string, unknown][] | Record<string, unknown>): Record<string, unknown> {
    const pairs = Array.isArray(entries) ? entries : Object.entries(entries);
    const scrubbed: Record<string, unknown> = {};
    for (const [key, value] of pairs) {
        scrubbed[key] = isSensitiveKey(key) ? '[REDACTED]' : scrubValue(value);
    }
    return scrubbed;
}

/**
 * Scrubs exception values, stack frame file names, breadcrumbs, request URL and
 * extras of an outgoing event in place.
 */
export function scrubEvent(event: ScrubbableEvent): void {
    for (const exception of event.exception?.values ?? []) {
        if (exception.value) {
            exception.value = scrubSensitiveData(exception.value);
        }
        for (const frame of exception.stacktrace?.frames ?? []) {
            if (frame.filename) {
                frame.filename = scrubSensitiveData(frame.filename);
            }
        }
    }

    for (const breadcrumb of event.breadcrumbs ?? []) {
        if (breadcrumb.message) {
            breadcrumb.message = scrubSensitiveData(breadcrumb.message);
        }
        if (breadcrumb.data) {
            breadcrumb.data = scrubRecord(breadcrumb.data);
        }
    }

    if (event.request?.url) {
        event.request.url = scrubSensitiveData(event.request.url);
    }

    if (event.extra) {
        event.extra = scrubRecord(event.extra);
    }
}

// ==================== INITIALIZATION ====================

/**
 * Initializes Sentry error reporting. Later calls are no-ops once it succeeded.
 *
 * @returns Whether reporting is enabled afterwards
 */
export async function initErrorReporting(config: SentryConfig): Promise<boolean> {
    if (sentry) {
        return true;
    }

    if (!config.dsn) {
        log.debug('Sentry DSN not configured, error reporting disabled');
        return false;
    }

    try {
        const Sentry = await import('@sentry/node');

        Sentry.init({
            dsn: config.dsn,
            environment: config.environment,
            release: config.release,
            serverName: config.serverName ?? 'invoice-builder',
            debug: config.debug ?? false,
            sampleRate: config.sampleRate ?? 1.0,
            beforeSend(event) {
                scrubEvent(event);
                return event;
            },
            beforeBreadcrumb(breadcrumb) {
                // Console breadcrumbs would repeat the log lines
                return breadcrumb.category === 'console' ? null : breadcrumb;
            },
        });

        if (eventCodeTag) {
            Sentry.setTag('event_code', eventCodeTag);
        }

        sentry = Sentry;
        log.info('Sentry initialized');
        return true;
    } catch (error) {
        log.warn('Failed to initialize Sentry:', error);
        return false;
    }
}

// ==================== REPORTING ====================

/**
 * Logs an error and, when reporting is enabled, sends it with its context.
 */
export function reportError(error: Error | string, context?: ErrorContext): void {
    const errorObj = typeof error === 'string' ? new Error(error) : error;

    log.error(`[${context?.module || 'App'}] ${context?.operation || 'Error'}:`, errorObj);

    const client = sentry;
    if (!client) {
        return;
    }

    try {
        client.withScope((scope) => {
            if (context?.level) {
                scope.setLevel(context.level);
            }
            if (context?.module) {
                scope.setTag('module', context.module);
            }
            if (context?.operation) {
                scope.setTag('operation', context.operation);
            }
            if (eventCodeTag) {
                scope.setTag('event_code', eventCodeTag);
            }
            if (context?.metadata) {
                scope.setExtras(scrubRecord(context.metadata));
            }
            if (context?.userMessage) {
                scope.setExtra('user_message', context.userMessage);
            }

            client.captureException(errorObj);
        });
    } catch (sentryError) {
        log.warn('Failed to report error to Sentry:', sentryError);
    }
}

/**
 * Sets the event code tag attached to every subsequent report.
 *
 * @param eventCode - e.g. E1025, or null to clear
 */
export function setEventContext(eventCode: string | null): void {
    eventCodeTag = eventCode;
    sentry?.setTag('event_code', eventCode ?? '');
}

/**
 * Records a completed pipeline step on the error trail.
 */
export function addBreadcrumb(category: string, message: string, data?: Record<string, unknown>): void {
    sentry?.addBreadcrumb({
        category,
        message: scrubSensitiveData(message),
        data: data ? scrubRecord(data) : undefined,
        level: 'info',
    });
}

// ==================== HELPERS ====================

export function isErrorReportingEnabled(): boolean {
    return sentry !== null;
}

/**
 * Flushes pending reports; call before the process exits.
 *
 * @returns false when the flush timed out or failed
 */
export async function flushErrorReports(timeout = 2000): Promise<boolean> {
    if (!sentry) {
        return true;
    }

    try {
        return await sentry.flush(timeout);
    } catch (error) {
        log.warn('Failed to flush error reports:', error);
        return false;
    }
}
