import { describe, expect, test } from '@jest/globals';
import {
    addBreadcrumb,
    flushErrorReports,
    initErrorReporting,
    isErrorReportingEnabled,
    reportError,
    scrubEvent,
    scrubRecord,
    scrubSensitiveData,
    setEventContext,
} from '../../js/error-reporting.js';

describe('scrubSensitiveData', () => {
    test('redacts bearer tokens, token parameters and emails', () => {
        expect(scrubSensitiveData('Authorization: Bearer test-token')).toBe('Authorization: [REDACTED]');
        expect(scrubSensitiveData('upload?token=test-secret')).toBe('upload?[REDACTED]');
        expect(scrubSensitiveData('sent by someone@example.com today')).toBe('sent by [REDACTED] today');
    });

    test('shortens home-directory paths', () => {
        expect(scrubSensitiveData('could not open /Users/sam/north.xlsx')).toBe('could not open ~/north.xlsx');
    });

    test('leaves ordinary text alone', () => {
        expect(scrubSensitiveData('north.xlsx: not a readable workbook')).toBe('north.xlsx: not a readable workbook');
    });
});

describe('scrubRecord', () => {
    test('redacts sensitive keys and scrubs nested values', () => {
        expect(scrubRecord({ apiKey: 'x', nested: { password: 'p', note: 'from a@b.co' }, count: 2 })).toEqual({
            apiKey: '[REDACTED]',
            nested: { password: '[REDACTED]', note: 'from [REDACTED]' },
            count: 2,
        });
    });
});

describe('scrubEvent', () => {
    test('scrubs exceptions, breadcrumbs, request and extras in place', () => {
        const event = {
            exception: {
                values: [
                    {
                        value: 'failed for a@b.co',
                        stacktrace: { frames: [{ filename: '/home/sam/app/dist/js/main.js' }] },
                    },
                ],
            },
            breadcrumbs: [{ message: 'Bearer abc', data: { secretKey: 's', sheets: 4 } }],
            request: { url: 'https://host/upload?token=abc' },
            extra: { password: 'p', eventCode: 'E1025' },
        };

        scrubEvent(event);

        expect(event).toEqual({
            exception: {
                values: [
                    {
                        value: 'failed for [REDACTED]',
                        stacktrace: { frames: [{ filename: '~/app/dist/js/main.js' }] },
                    },
                ],
            },
            breadcrumbs: [{ message: '[REDACTED]', data: { secretKey: '[REDACTED]', sheets: 4 } }],
            request: { url: 'https://host/upload?[REDACTED]' },
            extra: { password: '[REDACTED]', eventCode: 'E1025' },
        });
    });
});

describe('without a DSN', () => {
    test('stays disabled and every call is a no-op', async () => {
        expect(await initErrorReporting({ dsn: '', environment: 'test', release: 'test' })).toBe(false);
        expect(isErrorReportingEnabled()).toBe(false);

        setEventContext('E1025');
        addBreadcrumb('pipeline', 'Template loaded', { sheets: 4 });
        expect(() => reportError('boom', { module: 'State', operation: 'render' })).not.toThrow();
        expect(await flushErrorReports()).toBe(true);
    });
});
