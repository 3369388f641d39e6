/**
 * @fileoverview Fixture builders for unit tests
 */

import * as ExcelJS from 'exceljs';
import * as XLSX from 'xlsx';
import { SHEET_NAMES } from '../../js/constants.js';
import type {
    CellValue,
    ProductionFields,
    ProductionLineItem,
    ProductionTable,
    StudioJobRecord,
} from '../../js/types.js';

/**
 * A production line item with every field empty apart from the overrides.
 */
export function lineItem(overrides: Partial<ProductionLineItem> = {}): ProductionLineItem {
    const item: ProductionLineItem = { productionStatusNote: '', source: 'test.xlsx', ...emptyFields() };
    return { ...item, ...overrides };
}

function emptyFields(): ProductionFields {
    return {
        projectRef: null,
        eventName: null,
        projectDescription: null,
        projectOwner: null,
        briefRef: null,
        posCode: null,
        briefDescription: null,
        partUrn: null,
        part: null,
        height: null,
        width: null,
        coloursFront: null,
        coloursBack: null,
        material: null,
        noOfPages: null,
        productionFinishingNotes: null,
        productionSupplierComments: null,
        allocatedQty: null,
        spares: null,
        totalIncludingSpares: null,
        noOfStores: null,
        inStoreDeadline: null,
        contentBriefStatus: null,
        productionSupplierBriefStatus: null,
        productionSellPrice: null,
        comments: null,
    };
}

/**
 * A production table with the given source columns.
 */
export function productionTable(columns: string[], rows: ProductionLineItem[]): ProductionTable {
    return { columns, rows };
}

/**
 * A studio record with nothing known apart from the overrides.
 */
export function studioRecord(overrides: Partial<StudioJobRecord> & { projectRef: string }): StudioJobRecord {
    return {
        eventName: null,
        projectDescription: null,
        projectOwner: null,
        lines: 1,
        studioHours: null,
        type: '',
        coreOrOab: '',
        studioComment: '',
        ...overrides,
    };
}

/**
 * An .xlsx production export: a title row, then the header row, then data.
 */
export function productionWorkbook(header: string[], rows: CellValue[][]): Uint8Array {
    const sheet = XLSX.utils.aoa_to_sheet([['Production line items'], header, ...rows]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, 'Line Items');
    return new Uint8Array(XLSX.write(workbook, { type: 'array', bookType: 'xlsx' }));
}

/**
 * An .xlsx invoice template with the four expected sheets.
 * The Studio sheet has a bold merged title in A1:B1 and a 30-wide first column.
 */
export async function invoiceTemplate(): Promise<Uint8Array> {
    const workbook = new ExcelJS.Workbook();

    const core = workbook.addWorksheet(SHEET_NAMES.SUMMARY_CORE);
    core.getCell('B6').value = 'Client';
    core.getCell('B7').value = 'Client A';
    core.getCell('B8').value = 'Total';
    core.getCell('B9').value = { formula: 'SUM(C7:C8)', result: 0, date1904: false };
    core.getCell('B10').value = 'Client B';

    const oab = workbook.addWorksheet(SHEET_NAMES.SUMMARY_OAB);
    oab.getCell('B7').value = 'Client C';
    oab.getCell('B8').value = 'TOTAL';

    const studio = workbook.addWorksheet(SHEET_NAMES.STUDIO);
    studio.getCell('A1').value = 'Studio';
    studio.getCell('A1').font = { bold: true };
    studio.mergeCells('A1:B1');
    studio.getCell('A2').value = 'Project Ref';
    studio.getColumn(1).width = 30;

    const print = workbook.addWorksheet(SHEET_NAMES.PRINT);
    print.getCell('A2').value = 'Project Ref';

    return new Uint8Array(await workbook.xlsx.writeBuffer());
}

/**
 * Reads one worksheet of a generated workbook back with ExcelJS.
 */
export async function openWorksheet(bytes: Uint8Array, name: string): Promise<ExcelJS.Worksheet | undefined> {
    const workbook = new ExcelJS.Workbook();
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);
    await workbook.xlsx.load(buffer);
    return workbook.getWorksheet(name);
}
