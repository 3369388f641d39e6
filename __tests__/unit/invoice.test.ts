import { describe, expect, test } from '@jest/globals';
import { MIME_TYPES, REVIEW_NOTES, SHEET_NAMES } from '../../js/constants.js';
import { RenderError } from '../../js/errors.js';
import {
    buildInvoiceFileName,
    populateInvoice,
    printCategoryFormula,
    renderInvoice,
    saveInvoice,
    studioCostFormula,
    studioRateFormula,
    type InvoiceData,
} from '../../js/invoice.js';
import type { SheetFormatting } from '../../js/types.js';
import { brokenTemplate, FakeDocument, FakeSheet, fakeTemplate } from '../helpers/fake-document.js';
import { lineItem, studioRecord } from '../helpers/fixtures.js';

function invoiceSheets(): FakeDocument {
    return new FakeDocument([
        new FakeSheet(SHEET_NAMES.SUMMARY_CORE),
        new FakeSheet(SHEET_NAMES.SUMMARY_OAB),
        new FakeSheet(SHEET_NAMES.STUDIO, 5),
        new FakeSheet(SHEET_NAMES.PRINT, 2),
        new FakeSheet('Notes'),
    ]);
}

function sheet(document: FakeDocument, name: string): FakeSheet {
    const found = document.getSheet(name);
    if (!found) throw new Error(`No sheet ${name}`);
    return found;
}

function invoiceData(overrides: Partial<InvoiceData> = {}): InvoiceData {
    return {
        studio: [
            studioRecord({
                projectRef: 'SDG1',
                eventName: 'Event 10 2025',
                projectDescription: 'Window',
                projectOwner: 'Sam',
                lines: 2,
                studioHours: 1.75,
                studioComment: REVIEW_NOTES.STUDIO_COMMENT,
            }),
            studioRecord({ projectRef: 'SDG2', type: 'Digital', coreOrOab: 'OAB' }),
        ],
        print: [
            lineItem({
                projectRef: 'SDG1',
                briefRef: 'B1',
                partUrn: 12345,
                inStoreDeadline: new Date(Date.UTC(2025, 9, 3)),
                productionSupplierBriefStatus: 'Draft',
                productionSellPrice: 2,
                comments: 'rush',
                productionStatusNote: REVIEW_NOTES.PRODUCTION_STATUS,
            }),
        ],
        printColumns: ['Project Ref', 'Brief Ref', 'Comments'],
        event: { eventName: 'Event 10 2025', eventCode: 'E1025' },
        ...overrides,
    };
}

function formatting(widths: [number, number][]): SheetFormatting<string> {
    return { columnWidths: new Map(widths), rowHeights: new Map(), mergedRanges: ['A1:B1'], cellStyles: new Map() };
}

describe('formulas', () => {
    test('studio rate and cost', () => {
        expect(studioRateFormula(3)).toBe('IF(G3="Artwork",49.5,IF(G3="Creative Artwork",57,IF(G3="Digital",49.5,0)))');
        expect(studioCostFormula(7)).toBe('F7*H7');
    });

    test('print Core/OAB lookup', () => {
        expect(printCategoryFormula(3)).toBe('IF(Y3>0,IFERROR(VLOOKUP(A3,Studio!$A$3:$J$6129,10,FALSE),""),"")');
    });
});

describe('populateInvoice', () => {
    test('writes the event name on both summary sheets', () => {
        const document = invoiceSheets();
        populateInvoice(document, new Map(), invoiceData());
        expect(sheet(document, SHEET_NAMES.SUMMARY_CORE).getValue('D4')).toBe('Event 10 2025');
        expect(sheet(document, SHEET_NAMES.SUMMARY_OAB).getValue('D4')).toBe('Event 10 2025');
    });

    test('writes studio rows from row 3 with defaults and formulas', () => {
        const document = invoiceSheets();
        populateInvoice(document, new Map(), invoiceData());
        const studio = sheet(document, SHEET_NAMES.STUDIO);

        expect(['A3', 'B3', 'C3', 'D3', 'E3', 'F3', 'G3', 'J3'].map((address) => studio.getValue(address))).toEqual([
            'SDG1',
            'Event 10 2025',
            'Window',
            'Sam',
            2,
            1.75,
            'Artwork',
            'CORE',
        ]);
        expect(studio.getFormula('H3')).toBe(studioRateFormula(3));
        expect(studio.getFormula('I3')).toBe('F3*H3');
        expect(studio.comments.get('A3')).toEqual({ text: REVIEW_NOTES.STUDIO_COMMENT, author: 'Status' });

        expect(studio.getValue('G4')).toBe('Digital');
        expect(studio.getValue('J4')).toBe('OAB');
        expect(studio.getValue('F4')).toBeNull();
        expect(studio.comments.has('A4')).toBe(false);
    });

    test('clears old rows inside the clear window', () => {
        const document = invoiceSheets();
        const studio = sheet(document, SHEET_NAMES.STUDIO);
        studio.setValue('A5', 'old');
        studio.setValue('N5', 'old');
        studio.setValue('O5', 'outside');

        populateInvoice(document, new Map(), invoiceData());

        expect(studio.getValue('A5')).toBeNull();
        expect(studio.getValue('N5')).toBeNull();
        expect(studio.getValue('O5')).toBe('outside');
    });

    test('writes print rows with text identifiers and the status note', () => {
        const document = invoiceSheets();
        populateInvoice(document, new Map(), invoiceData());
        const print = sheet(document, SHEET_NAMES.PRINT);

        expect(print.getValue('A3')).toBe('SDG1');
        expect(print.getValue('E3')).toBe('B1');
        expect(print.getValue('H3')).toBe('12345');
        expect(print.getValue('V3')).toBe('2025-10-03');
        expect(print.getValue('X3')).toBe('Draft');
        expect(print.getValue('Y3')).toBe(2);
        expect(print.getFormula('Z3')).toBe(printCategoryFormula(3));
        expect(print.getValue('AA3')).toBe('rush');
        expect(print.comments.get('X3')).toEqual({ text: REVIEW_NOTES.PRODUCTION_STATUS, author: 'Status' });
    });

    test('writes blank text for missing identifiers', () => {
        const document = invoiceSheets();
        populateInvoice(document, new Map(), invoiceData({ print: [lineItem({ projectRef: 'SDG1' })] }));
        const print = sheet(document, SHEET_NAMES.PRINT);
        expect(print.getValue('H3')).toBe('');
        expect(print.getValue('V3')).toBe('');
        expect(print.getValue('B3')).toBeNull();
    });

    test('skips Comments when the source had no such column', () => {
        const document = invoiceSheets();
        populateInvoice(document, new Map(), invoiceData({ printColumns: ['Project Ref'] }));
        expect(sheet(document, SHEET_NAMES.PRINT).getValue('AA3')).toBeNull();
    });

    test('leaves a sheet alone when its table is empty', () => {
        const document = invoiceSheets();
        sheet(document, SHEET_NAMES.STUDIO).setValue('A3', 'keep');
        populateInvoice(document, new Map(), invoiceData({ studio: [] }));
        expect(sheet(document, SHEET_NAMES.STUDIO).getValue('A3')).toBe('keep');
    });

    test('re-applies captured formatting to every sheet', () => {
        const document = invoiceSheets();
        const captured = new Map([
            [SHEET_NAMES.STUDIO, formatting([[1, 30]])],
            ['Notes', formatting([[2, 12]])],
        ]);

        populateInvoice(document, captured, invoiceData());

        expect(sheet(document, SHEET_NAMES.STUDIO).columnWidths.get(1)).toBe(30);
        expect(sheet(document, 'Notes').columnWidths.get(2)).toBe(12);
        expect(sheet(document, 'Notes').merges).toEqual(['A1:B1']);
    });
});

describe('renderInvoice', () => {
    test('populates a freshly opened document', async () => {
        const document = invoiceSheets();
        const rendered = await renderInvoice(fakeTemplate(document), invoiceData());
        expect(rendered).toBe(document);
        expect(sheet(document, SHEET_NAMES.STUDIO).getValue('A3')).toBe('SDG1');
    });

    test('wraps failures in RenderError', async () => {
        const rendering = renderInvoice(brokenTemplate('corrupt package'), invoiceData());
        await expect(rendering).rejects.toThrow(RenderError);
        await expect(rendering).rejects.toThrow('Failed to populate invoice: corrupt package');
    });
});

describe('output naming', () => {
    test('macro-enabled templates produce .xlsm', () => {
        expect(buildInvoiceFileName('E1025', true, new Date(2025, 9, 3))).toEqual({
            fileName: 'E1025_Invoice_20251003.xlsm',
            extension: 'xlsm',
            mimeType: MIME_TYPES.xlsm,
        });
    });

    test('other templates produce .xlsx', () => {
        expect(buildInvoiceFileName('E0000', false, new Date(2026, 0, 9))).toEqual({
            fileName: 'E0000_Invoice_20260109.xlsx',
            extension: 'xlsx',
            mimeType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
        });
    });

    test('saveInvoice serializes the document', async () => {
        const document = new FakeDocument([], Buffer.from('workbook bytes'));
        const invoice = await saveInvoice(fakeTemplate(document), document, 'E1025', new Date(2025, 9, 3));
        expect(invoice.fileName).toBe('E1025_Invoice_20251003.xlsx');
        expect(invoice.buffer.toString()).toBe('workbook bytes');
    });
});
