import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import {
    configureLogger,
    createLogger,
    formatMessage,
    isDebugEnabled,
    isSensitiveKey,
    LogLevel,
    parseLogLevel,
    redactHomePaths,
    sanitize,
    setLogLevel,
} from '../../js/logger.js';

describe('parseLogLevel', () => {
    test('reads level names case-insensitively', () => {
        expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
        expect(parseLogLevel(' Warning ')).toBe(LogLevel.WARN);
        expect(parseLogLevel('ERROR')).toBe(LogLevel.ERROR);
        expect(parseLogLevel('silent')).toBe(LogLevel.NONE);
    });

    test('unknown or missing values yield null', () => {
        expect(parseLogLevel('loud')).toBeNull();
        expect(parseLogLevel(undefined)).toBeNull();
    });
});

describe('redaction helpers', () => {
    test('sensitive keys match by substring', () => {
        expect(isSensitiveKey('apiKey')).toBe(true);
        expect(isSensitiveKey('SENTRY_DSN')).toBe(true);
        expect(isSensitiveKey('projectRef')).toBe(false);
    });

    test('home directories collapse to ~', () => {
        expect(redactHomePaths('/Users/sam/north.xlsx and C:\\Users\\sam\\hours.csv')).toBe(
            '~/north.xlsx and ~\\hours.csv'
        );
        expect(redactHomePaths('/srv/data/north.xlsx')).toBe('/srv/data/north.xlsx');
    });
});

describe('sanitize', () => {
    test('masks long alphanumeric runs', () => {
        expect(sanitize(`key ${'a'.repeat(32)}`)).toBe('key [REDACTED]');
        expect(sanitize('SDG1234')).toBe('SDG1234');
    });

    test('redacts sensitive keys at any depth', () => {
        expect(sanitize({ email: 'someone', nested: [{ dsn: 'test-dsn', name: 'north.xlsx' }], lines: 3 })).toEqual({
            email: '[REDACTED]',
            nested: [{ dsn: '[REDACTED]', name: 'north.xlsx' }],
            lines: 3,
        });
    });

    test('passes errors through untouched', () => {
        const error = new Error('boom');
        expect(sanitize(error)).toBe(error);
    });
});

describe('logger output', () => {
    const sink = { info: jest.fn(), warn: jest.fn(), error: jest.fn(), time: jest.fn(), timeEnd: jest.fn() };

    beforeEach(() => {
        jest.clearAllMocks();
        configureLogger({ timestamps: false, showModule: true, minLevel: LogLevel.INFO, sink });
    });

    afterEach(() => {
        configureLogger({ timestamps: true, minLevel: LogLevel.NONE });
    });

    test('formats level and module', () => {
        expect(formatMessage(LogLevel.INFO, 'Calc', 'hello')).toBe('[INFO] [Calc] hello');
        configureLogger({ showModule: false });
        expect(formatMessage(LogLevel.WARN, 'Calc', 'hello')).toBe('[WARN] hello');
    });

    test('writes sanitized data at or above the minimum level', () => {
        const log = createLogger('Calc');

        log.debug('hidden');
        log.info('hello', { token: 'test-token' });
        log.warn('careful');
        log.error('failed', '/home/sam/invoices/north.xlsx');

        expect(sink.info).toHaveBeenCalledTimes(1);
        expect(sink.info).toHaveBeenCalledWith('[INFO] [Calc] hello', { token: '[REDACTED]' });
        expect(sink.warn).toHaveBeenCalledWith('[WARN] [Calc] careful');
        expect(sink.error).toHaveBeenCalledWith('[ERROR] [Calc] failed', '~/invoices/north.xlsx');
    });

    test('timers run only at debug level', () => {
        const log = createLogger('Invoice');

        log.time('render');
        expect(isDebugEnabled()).toBe(false);
        expect(sink.time).not.toHaveBeenCalled();

        setLogLevel(LogLevel.DEBUG);
        log.time('render');
        log.timeEnd('render');
        expect(isDebugEnabled()).toBe(true);
        expect(sink.time).toHaveBeenCalledWith('[Invoice] render');
        expect(sink.timeEnd).toHaveBeenCalledWith('[Invoice] render');
    });
});
