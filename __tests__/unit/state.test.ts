import { describe, expect, test } from '@jest/globals';
import { ERROR_TYPES, SHEET_NAMES } from '../../js/constants.js';
import { ReadError } from '../../js/errors.js';
import {
    createPipelineContext,
    generateInvoice,
    previewCosts,
    readinessIssues,
    withEventName,
    withProductionFiles,
    withProductionTables,
    withStudioEdits,
    withTemplate,
    withTimesheet,
} from '../../js/state.js';
import { loadTemplate, type ExcelStyle } from '../../js/template.js';
import { brokenTemplate, FakeDocument, FakeSheet, fakeTemplate } from '../helpers/fake-document.js';
import { invoiceTemplate, lineItem, openWorksheet, productionTable, productionWorkbook } from '../helpers/fixtures.js';

const COLUMNS = ['Project Ref', 'Event Name', 'Brief Ref', 'Content Brief Status', 'Production Supplier Brief Status'];

const TIMESHEET = new TextEncoder().encode(
    'Job Number,Job Description,Charge Code,Total\n1/SDG1,Window,Creative Design,2\n'
);

const production = productionTable(COLUMNS, [
    lineItem({ projectRef: 'SDG1', briefRef: 'B1', contentBriefStatus: 'Completed', productionSellPrice: 10 }),
    lineItem({ projectRef: 'SDG2', briefRef: 'B2', contentBriefStatus: 'In Progress' }),
]);

describe('createPipelineContext', () => {
    test('derives the event code and starts empty', () => {
        const context = createPipelineContext<string>('Event 10 2025');
        expect(context.eventCode).toBe('E1025');
        expect(context.studio).toEqual([]);
        expect(Object.isFrozen(context)).toBe(true);
        expect(readinessIssues(context)).toEqual(['No template loaded', 'No production data loaded']);
    });

    test('lists every missing input', () => {
        expect(readinessIssues(createPipelineContext<string>())).toEqual([
            'No template loaded',
            'No production data loaded',
            'No event name set',
        ]);
    });

    test('withEventName re-derives the code', () => {
        const context = withEventName(createPipelineContext<string>(), 'Event 3 2024');
        expect(context.eventCode).toBe('E0324');
    });
});

describe('pipeline stages', () => {
    test('production tables yield print rows and studio records', () => {
        const context = withProductionTables(createPipelineContext<string>('Event 10 2025'), [production]);
        expect(context.print).toHaveLength(2);
        expect(context.studio.map((record) => record.projectRef)).toEqual(['SDG1', 'SDG2']);
        expect(context.issues).toEqual([]);
    });

    test('a production file that cannot be read keeps the previous tables', () => {
        const loaded = withProductionTables(createPipelineContext<string>(), [production]);
        const notAZip = new Uint8Array([0x50, 0x4b, 0x03, 0x04, 1, 2, 3, 4, 5, 6, 7, 8]);

        const context = withProductionFiles(loaded, [{ bytes: notAZip, source: 'broken.xlsx' }]);

        expect(context.print).toBe(loaded.print);
        expect(context.issues).toHaveLength(1);
        const [issue] = context.issues;
        expect(issue.kind === 'error' ? [issue.stage, issue.error.type] : null).toEqual([
            'production',
            ERROR_TYPES.READ,
        ]);
    });

    test('timesheet hours merge into the studio table', () => {
        let context = withProductionTables(createPipelineContext<string>(), [production]);
        context = withTimesheet(context, TIMESHEET, 'hours.csv');

        expect(context.studio[0]).toMatchObject({ studioHours: 2, type: 'Creative Artwork', coreOrOab: 'CORE' });
        expect(context.lastMerge?.matched).toBe(1);
        expect(context.lastMerge?.unmatched.map((record) => record.projectRef)).toEqual(['SDG2']);
    });

    test('hours loaded before production data are applied when it arrives', () => {
        let context = withTimesheet(createPipelineContext<string>(), TIMESHEET);
        expect(context.lastMerge?.matched).toBe(0);
        context = withProductionTables(context, [production]);
        expect(context.studio[0].studioHours).toBe(2);
        expect(context.lastMerge?.matched).toBe(1);
    });

    test('a timesheet without usable rows leaves the studio table', () => {
        const loaded = withProductionTables(createPipelineContext<string>(), [production]);
        const context = withTimesheet(loaded, new TextEncoder().encode('Foo\nbar\n'));
        expect(context.studio).toBe(loaded.studio);
        expect(context.issues.length).toBeGreaterThan(0);
    });

    test('rejected edits are recorded', () => {
        const loaded = withProductionTables(createPipelineContext<string>(), [production]);
        const context = withStudioEdits(loaded, [{ projectRef: 'SDG9', studioHours: 1 }]);
        expect(context.studio).toBe(loaded.studio);
        const [issue] = context.issues;
        expect(issue.kind === 'error' ? [issue.stage, issue.error.detail] : null).toEqual([
            'edits',
            'Unknown project SDG9',
        ]);
    });

    test('accepted edits change the cost preview', () => {
        let context = withProductionTables(createPipelineContext<string>(), [production]);
        context = withStudioEdits(context, [{ projectRef: 'SDG2', studioHours: 2, type: 'Digital' }]);
        expect(previewCosts(context).totals.studioCore).toBe(99);
    });
});

describe('withTemplate', () => {
    test('records read failures', async () => {
        const context = await withTemplate(createPipelineContext<string>(), () =>
            Promise.reject(new ReadError('t.xlsx', 'not a readable workbook template'))
        );
        expect(context.template).toBeNull();
        expect(context.issues[0].stage).toBe('template');
    });

    test('rethrows unexpected errors', async () => {
        await expect(
            withTemplate(createPipelineContext<string>(), () => Promise.reject(new TypeError('bug')))
        ).rejects.toThrow('bug');
    });
});

describe('generateInvoice', () => {
    test('does nothing without a template', async () => {
        const context = createPipelineContext<string>('Event 10 2025');
        expect(await generateInvoice(context)).toBe(context);
    });

    test('records render failures and keeps no invoice', async () => {
        let context = await withTemplate(createPipelineContext<string>('Event 10 2025'), async () =>
            fakeTemplate(new FakeDocument([new FakeSheet(SHEET_NAMES.STUDIO)]))
        );
        context = withProductionTables(context, [production]);
        context = await generateInvoice(context, new Date(2025, 9, 3));
        expect(context.generated?.fileName).toBe('E1025_Invoice_20251003.xlsx');

        context = await withTemplate(context, async () => brokenTemplate('corrupt package'));
        context = await generateInvoice(context);

        expect(context.generated).toBeNull();
        const issue = context.issues[context.issues.length - 1];
        expect(issue.kind === 'error' ? [issue.stage, issue.error.type] : null).toEqual([
            'render',
            ERROR_TYPES.RENDER,
        ]);
    });

    test('renders a real template end to end', async () => {
        const header = [...COLUMNS, 'Project Description', 'Total including Spares', 'Production Sell Price'];
        const workbook = productionWorkbook(header, [
            ['SDG1', 'Event 10 2025', 'B1', 'Completed', 'In Production', 'Window', 10, 3],
            ['SDG2', 'Event 10 2025', 'B2', 'In Progress', 'Draft', 'Poster', 5, 2],
        ]);

        let context = createPipelineContext<ExcelStyle>('Event 10 2025');
        const templateBytes = await invoiceTemplate();
        context = await withTemplate(context, () => loadTemplate(templateBytes, 'invoice.xlsx'));
        context = withProductionFiles(context, [{ bytes: workbook, source: 'north.xlsx' }]);
        context = withTimesheet(context, TIMESHEET, 'hours.csv');

        expect(context.issues).toEqual([]);
        expect(previewCosts(context).totals).toMatchObject({ studioCore: 114, printCore: 40, grand: 154 });

        context = await generateInvoice(context, new Date(2025, 9, 3));
        const invoice = context.generated;
        expect(invoice?.fileName).toBe('E1025_Invoice_20251003.xlsx');
        if (!invoice) return;

        const bytes = new Uint8Array(invoice.buffer);
        const studio = await openWorksheet(bytes, SHEET_NAMES.STUDIO);
        expect(studio?.getCell('A3').value).toBe('SDG1');
        expect(studio?.getCell('F3').value).toBe(2);
        expect(studio?.getCell('G3').value).toBe('Creative Artwork');
        expect(studio?.getCell('I3').formula).toBe('F3*H3');
        expect(studio?.getCell('G4').value).toBe('Artwork');

        const print = await openWorksheet(bytes, SHEET_NAMES.PRINT);
        expect(print?.getCell('X4').value).toBe('Draft');
        expect(print?.getCell('T3').value).toBe(10);

        const summary = await openWorksheet(bytes, SHEET_NAMES.SUMMARY_CORE);
        expect(summary?.getCell('D4').value).toBe('Event 10 2025');
    });
});
