/**
 * @fileoverview Invoice Renderer
 * Populates a fresh copy of the invoice template with the Studio and Print tables,
 * then serializes it (re-injecting the template's VBA project when it had one).
 *
 * ## Sheet Layout
 * - Event Summary - Core / OAB: event name in D4
 * - Studio (from row 3): A ref, B event, C description, D owner, E lines,
 *   F hours, G type, H rate formula, I cost formula, J Core/OAB; review comment on A
 * - Print (from row 3): A..Y line item fields, status note comment on X,
 *   Z Core/OAB lookup into the Studio sheet, AA comments
 *
 * Existing data rows are cleared before writing, within a fixed window per sheet.
 */

import {
    MIME_TYPES,
    PRODUCTION_COLUMNS,
    PRODUCTION_FIELDS,
    REVIEW_NOTES,
    SHEET_NAMES,
    TEMPLATE_LAYOUT,
    type ProductionField,
} from './constants.js';
import { RenderError } from './errors.js';
import { createLogger } from './logger.js';
import { injectVbaProject } from './macros.js';
import { effectiveCoreOrOab, effectiveType } from './reconcile.js';
import { applyFormatting } from './template.js';
import type {
    CellValue,
    EventInfo,
    GeneratedInvoice,
    ProductionLineItem,
    SheetFormatting,
    StudioJobRecord,
    TemplateDocument,
    TemplateInfo,
    TemplateSheet,
} from './types.js';
import { cellAddress, columnLetter, IsoUtils } from './utils.js';

const log = createLogger('Invoice');

/**
 * Tables and event details written into the invoice.
 */
export interface InvoiceData {
    studio: readonly StudioJobRecord[];
    print: readonly ProductionLineItem[];
    /** Source columns of the print table; Comments is written only when present */
    printColumns: readonly string[];
    event: EventInfo;
}

const POPULATED_SHEETS: readonly string[] = [
    SHEET_NAMES.STUDIO,
    SHEET_NAMES.PRINT,
    SHEET_NAMES.SUMMARY_CORE,
    SHEET_NAMES.SUMMARY_OAB,
];

// Print sheet columns A..Y, then AA for Comments
const PRINT_SHEET_FIELDS = PRODUCTION_FIELDS.filter((field) => field !== 'comments');
const PRINT_STATUS_COLUMN = 'X';
const PRINT_LOOKUP_COLUMN = 'Z';
const PRINT_COMMENTS_COLUMN = 'AA';

// ==================== FORMULAS ====================

/**
 * Studio rate formula for a row (column H).
 */
export function studioRateFormula(row: number): string {
    return `IF(G${row}="Artwork",49.5,IF(G${row}="Creative Artwork",57,IF(G${row}="Digital",49.5,0)))`;
}

/**
 * Studio cost formula for a row (column I).
 */
export function studioCostFormula(row: number): string {
    return `F${row}*H${row}`;
}

/**
 * Print Core/OAB lookup formula for a row (column Z).
 */
export function printCategoryFormula(row: number): string {
    const range = `Studio!$A$3:$J$${TEMPLATE_LAYOUT.STUDIO_LOOKUP_LAST_ROW}`;
    return `IF(Y${row}>0,IFERROR(VLOOKUP(A${row},${range},10,FALSE),""),"")`;
}

// ==================== SHEET WRITERS ====================

function clearRows<TStyle>(sheet: TemplateSheet<TStyle>, rowLimit: number, columnCount: number): void {
    const lastRow = Math.min(sheet.rowCount, rowLimit - 1);
    for (let row = TEMPLATE_LAYOUT.FIRST_DATA_ROW; row <= lastRow; row++) {
        for (let column = 1; column <= columnCount; column++) {
            sheet.setValue(cellAddress(row, column), null);
        }
    }
}

/**
 * Writes studio records from row 3.
 */
export function writeStudioSheet<TStyle>(sheet: TemplateSheet<TStyle>, studio: readonly StudioJobRecord[]): void {
    clearRows(sheet, TEMPLATE_LAYOUT.STUDIO_ROW_LIMIT, TEMPLATE_LAYOUT.STUDIO_COLUMN_COUNT);

    studio.forEach((record, index) => {
        const row = TEMPLATE_LAYOUT.FIRST_DATA_ROW + index;
        sheet.setValue(`A${row}`, record.projectRef);
        sheet.setValue(`B${row}`, record.eventName);
        sheet.setValue(`C${row}`, record.projectDescription);
        sheet.setValue(`D${row}`, record.projectOwner);
        sheet.setValue(`E${row}`, record.lines);
        if (record.studioHours !== null) {
            sheet.setValue(`F${row}`, record.studioHours);
        }
        sheet.setValue(`G${row}`, effectiveType(record));
        sheet.setFormula(`H${row}`, studioRateFormula(row));
        sheet.setFormula(`I${row}`, studioCostFormula(row));
        sheet.setValue(`J${row}`, effectiveCoreOrOab(record));

        const comment = record.studioComment.trim();
        if (comment !== '') {
            sheet.setComment(`A${row}`, comment, REVIEW_NOTES.COMMENT_AUTHOR);
        }
    });
}

/**
 * Print sheet representation of a line item field.
 * Part URN and In Store Deadline are written as text, dates as ISO dates.
 */
function printCellValue(line: ProductionLineItem, field: ProductionField): CellValue {
    const value = line[field];
    if (field !== 'partUrn' && field !== 'inStoreDeadline') return value;
    if (value === null) return '';
    return value instanceof Date ? IsoUtils.toISODate(value) : String(value);
}

/**
 * Writes print rows from row 3.
 */
export function writePrintSheet<TStyle>(
    sheet: TemplateSheet<TStyle>,
    print: readonly ProductionLineItem[],
    printColumns: readonly string[]
): void {
    clearRows(sheet, TEMPLATE_LAYOUT.PRINT_ROW_LIMIT, TEMPLATE_LAYOUT.PRINT_COLUMN_COUNT);
    const writeComments = printColumns.includes(PRODUCTION_COLUMNS.comments);

    print.forEach((line, index) => {
        const row = TEMPLATE_LAYOUT.FIRST_DATA_ROW + index;
        PRINT_SHEET_FIELDS.forEach((field, column) => {
            sheet.setValue(`${columnLetter(column + 1)}${row}`, printCellValue(line, field));
        });

        const note = line.productionStatusNote.trim();
        if (note !== '') {
            sheet.setComment(`${PRINT_STATUS_COLUMN}${row}`, note, REVIEW_NOTES.COMMENT_AUTHOR);
        }

        sheet.setFormula(`${PRINT_LOOKUP_COLUMN}${row}`, printCategoryFormula(row));

        if (writeComments) {
            sheet.setValue(`${PRINT_COMMENTS_COLUMN}${row}`, line.comments);
        }
    });
}

// ==================== RENDERING ====================

/**
 * Writes the invoice into an opened template document.
 *
 * @param document - Fresh copy of the template
 * @param formatting - Formatting captured when the template was loaded
 * @param data - Tables and event details
 */
export function populateInvoice<TStyle>(
    document: TemplateDocument<TStyle>,
    formatting: ReadonlyMap<string, SheetFormatting<TStyle>>,
    data: InvoiceData
): void {
    const reformat = (sheet: TemplateSheet<TStyle>): void => {
        const captured = formatting.get(sheet.name);
        if (captured) applyFormatting(sheet, captured);
    };

    for (const name of [SHEET_NAMES.SUMMARY_CORE, SHEET_NAMES.SUMMARY_OAB]) {
        const sheet = document.getSheet(name);
        if (!sheet) continue;
        sheet.setValue(TEMPLATE_LAYOUT.EVENT_NAME_CELL, data.event.eventName);
        reformat(sheet);
    }

    const studioSheet = document.getSheet(SHEET_NAMES.STUDIO);
    if (studioSheet && data.studio.length > 0) {
        reformat(studioSheet);
        writeStudioSheet(studioSheet, data.studio);
    }

    const printSheet = document.getSheet(SHEET_NAMES.PRINT);
    if (printSheet && data.print.length > 0) {
        reformat(printSheet);
        writePrintSheet(printSheet, data.print, data.printColumns);
    }

    for (const name of document.sheetNames) {
        if (POPULATED_SHEETS.includes(name)) continue;
        const sheet = document.getSheet(name);
        if (sheet) reformat(sheet);
    }

    log.info(`Populated invoice: ${data.studio.length} studio rows, ${data.print.length} print rows`);
}

function toRenderError(error: unknown, stage: string): RenderError {
    if (error instanceof RenderError) return error;
    const detail = error instanceof Error ? error.message : String(error);
    return new RenderError(`Failed to ${stage} invoice: ${detail}`, { cause: error });
}

/**
 * Opens a fresh copy of the template and populates it.
 *
 * @throws RenderError when the template cannot be opened or written
 */
export async function renderInvoice<TStyle>(
    template: TemplateInfo<TStyle>,
    data: InvoiceData
): Promise<TemplateDocument<TStyle>> {
    log.time('render');
    try {
        const document = await template.openDocument();
        populateInvoice(document, template.formatting, data);
        return document;
    } catch (error) {
        throw toRenderError(error, 'populate');
    } finally {
        log.timeEnd('render');
    }
}

// ==================== OUTPUT ====================

/**
 * Output file name, extension and MIME type for an invoice.
 *
 * @example
 * buildInvoiceFileName('E1025', true, new Date(2025, 9, 3))
 * // → { fileName: 'E1025_Invoice_20251003.xlsm', extension: 'xlsm', mimeType: '...macroEnabled.12' }
 */
export function buildInvoiceFileName(
    eventCode: string,
    hasMacros: boolean,
    now: Date
): Pick<GeneratedInvoice, 'fileName' | 'extension' | 'mimeType'> {
    const extension = hasMacros ? 'xlsm' : 'xlsx';
    return {
        fileName: `${eventCode}_Invoice_${IsoUtils.toCompactDate(now)}.${extension}`,
        extension,
        mimeType: MIME_TYPES[extension],
    };
}

/**
 * Serializes a populated document, restoring the template's macros if it had any.
 *
 * @throws RenderError when serialization fails
 */
export async function saveInvoice<TStyle>(
    template: TemplateInfo<TStyle>,
    document: TemplateDocument<TStyle>,
    eventCode: string,
    now: Date = new Date()
): Promise<GeneratedInvoice> {
    try {
        const serialized = await document.toBuffer();
        const buffer = template.vbaProject ? await injectVbaProject(serialized, template.vbaProject) : serialized;
        const naming = buildInvoiceFileName(eventCode, template.vbaProject !== null, now);
        log.info(`Generated ${naming.fileName} (${buffer.length} bytes)`);
        return { buffer, ...naming };
    } catch (error) {
        throw toRenderError(error, 'save');
    }
}
