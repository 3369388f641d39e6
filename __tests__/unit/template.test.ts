import { describe, expect, test } from '@jest/globals';
import * as ExcelJS from 'exceljs';
import { SHEET_NAMES } from '../../js/constants.js';
import { ReadError } from '../../js/errors.js';
import {
    applyFormatting,
    captureFormatting,
    ExcelTemplateDocument,
    ExcelTemplateSheet,
    extractClients,
    loadTemplate,
    readCellValue,
} from '../../js/template.js';
import { FakeSheet } from '../helpers/fake-document.js';
import { invoiceTemplate } from '../helpers/fixtures.js';

function excelSheet(): ExcelTemplateSheet {
    const workbook = new ExcelJS.Workbook();
    return new ExcelTemplateSheet(workbook.addWorksheet('Sheet1'));
}

describe('readCellValue', () => {
    test('passes plain values through', () => {
        expect(readCellValue('text')).toBe('text');
        expect(readCellValue(4)).toBe(4);
        expect(readCellValue(undefined)).toBeNull();
    });

    test('flattens rich text, hyperlinks and formula results', () => {
        expect(readCellValue({ richText: [{ text: 'Hello ' }, { text: 'there' }] })).toBe('Hello there');
        expect(readCellValue({ text: 'Site', hyperlink: 'https://example.com' })).toBe('Site');
        expect(readCellValue({ formula: 'A1*2', result: 5 })).toBe(5);
        expect(readCellValue({ sharedFormula: 'A3', result: 'x' })).toBe('x');
    });

    test('error values read as null', () => {
        expect(readCellValue({ error: '#N/A' })).toBeNull();
        expect(readCellValue({ formula: 'A1/0', result: { error: '#DIV/0!' } })).toBeNull();
    });
});

describe('ExcelTemplateSheet', () => {
    test('writes and reads formulas', () => {
        const sheet = excelSheet();
        sheet.setFormula('I3', 'F3*H3');
        expect(sheet.getFormula('I3')).toBe('F3*H3');
        expect(sheet.getFormula('I4')).toBeNull();
    });

    test('comments carry a bold author prefix', () => {
        const sheet = excelSheet();
        sheet.setComment('A3', 'check hours', 'Status');
        expect(sheet.getComment('A3')).toBe('Status:\ncheck hours');
        expect(sheet.getComment('A4')).toBeNull();
    });

    test('unstyled empty cells have no style', () => {
        const sheet = excelSheet();
        expect(sheet.getStyle('Z99')).toBeNull();
        sheet.setStyle('B2', { font: { italic: true } });
        expect(sheet.getStyle('B2')?.font?.italic).toBe(true);
    });

    test('reports merged ranges by their corners', () => {
        const sheet = excelSheet();
        sheet.setValue('A1', 'Title');
        sheet.mergeRange('A1:C2');
        expect(sheet.getMergedRanges()).toEqual(['A1:C2']);
    });
});

describe('extractClients', () => {
    test('skips blanks, totals and formulas', () => {
        const sheet = new FakeSheet(SHEET_NAMES.SUMMARY_CORE);
        sheet.setValue('B6', 'Header');
        sheet.setValue('B7', 'Client A');
        sheet.setValue('B8', 'TOTAL');
        sheet.setValue('B9', '');
        sheet.setFormula('B10', 'SUM(C7:C9)');
        sheet.setValue('B11', 1001);
        sheet.setValue('B49', 'Client Z');
        sheet.setValue('B50', 'Too far');
        expect(extractClients(sheet)).toEqual(['Client A', '1001', 'Client Z']);
    });
});

describe('formatting capture', () => {
    test('captures header styles and re-applies them', () => {
        const source = new FakeSheet('Studio', 5, 3);
        source.setStyle('A1', 'bold');
        source.setStyle('C3', 'border');
        source.setStyle('A4', 'body');
        source.setColumnWidth(1, 30);
        source.setRowHeight(1, 24);
        source.mergeRange('A1:C1');

        const captured = captureFormatting(source);
        expect([...captured.cellStyles]).toEqual([
            ['A1', 'bold'],
            ['C3', 'border'],
        ]);

        const target = new FakeSheet('Studio', 5, 3);
        target.mergeRange('A1:C1');
        applyFormatting(target, captured);
        expect(target.getStyle('A1')).toBe('bold');
        expect(target.columnWidths.get(1)).toBe(30);
        expect(target.rowHeights.get(1)).toBe(24);
        expect(target.merges).toEqual(['A1:C1']);
    });

    test('a failing style does not stop the others', () => {
        const target = new FakeSheet('Print');
        target.setStyle = (address: string, style: string): void => {
            if (address === 'A1') throw new Error('bad style');
            target.styles.set(address, style);
        };
        applyFormatting(target, {
            columnWidths: new Map(),
            rowHeights: new Map(),
            mergedRanges: [],
            cellStyles: new Map([
                ['A1', 'bad'],
                ['B1', 'good'],
            ]),
        });
        expect(target.getStyle('B1')).toBe('good');
    });
});

describe('loadTemplate', () => {
    test('reads sheets, clients and formatting', async () => {
        const template = await loadTemplate(await invoiceTemplate(), 'invoice.xlsx');

        expect(template.sheetNames).toEqual([
            SHEET_NAMES.SUMMARY_CORE,
            SHEET_NAMES.SUMMARY_OAB,
            SHEET_NAMES.STUDIO,
            SHEET_NAMES.PRINT,
        ]);
        expect(template.coreClients).toEqual(['Client A', 'Client B']);
        expect(template.oabClients).toEqual(['Client C']);
        expect(template.vbaProject).toBeNull();

        const studio = template.formatting.get(SHEET_NAMES.STUDIO);
        expect(studio?.columnWidths.get(1)).toBe(30);
        expect(studio?.mergedRanges).toEqual(['A1:B1']);
        expect(studio?.cellStyles.get('A1')?.font?.bold).toBe(true);
    });

    test('each open returns an untouched copy', async () => {
        const template = await loadTemplate(await invoiceTemplate());
        const first = await template.openDocument();
        first.getSheet(SHEET_NAMES.STUDIO)?.setValue('A3', 'changed');
        const second = await template.openDocument();
        expect(second.getSheet(SHEET_NAMES.STUDIO)?.getValue('A3')).toBeNull();
        expect(second).toBeInstanceOf(ExcelTemplateDocument);
    });

    test('rejects bytes that are not a workbook', async () => {
        await expect(loadTemplate(new TextEncoder().encode('not a workbook'), 'notes.txt')).rejects.toThrow(ReadError);
    });
});
