/**
 * @fileoverview Invoice Template Document
 * ExcelJS implementation of the TemplateDocument / TemplateSheet abstraction,
 * plus the load-time analysis of a template: macro detection, formatting
 * capture and client extraction from the Event Summary sheets.
 */

import * as ExcelJS from 'exceljs';
import { SHEET_NAMES, TEMPLATE_LAYOUT } from './constants.js';
import { ReadError } from './errors.js';
import { createLogger } from './logger.js';
import { extractVbaProject } from './macros.js';
import type { CellValue, SheetFormatting, TemplateDocument, TemplateInfo, TemplateSheet } from './types.js';
import { cellAddress, parseCellAddress } from './utils.js';

const log = createLogger('Template');

/**
 * Style snapshot type of the ExcelJS engine.
 */
export type ExcelStyle = Partial<ExcelJS.Style>;

// ==================== CELL VALUE HELPERS ====================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !(value instanceof Date);
}

function joinRuns(runs: unknown[]): string {
    return runs.map((run) => (isRecord(run) && typeof run.text === 'string' ? run.text : '')).join('');
}

/**
 * Reduces an ExcelJS cell value (rich text, hyperlink, formula...) to a plain value.
 * Formula cells yield their cached result; error cells yield null.
 */
export function readCellValue(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (value instanceof Date) return value;
    if (!isRecord(value)) return null;

    if (Array.isArray(value.richText)) {
        return joinRuns(value.richText);
    }
    if (isFormulaValue(value)) {
        return readCellValue(isRecord(value.result) ? null : value.result);
    }
    if (typeof value.hyperlink === 'string') {
        return typeof value.text === 'string' ? value.text : value.hyperlink;
    }
    return null;
}

function isFormulaValue(value: unknown): boolean {
    return isRecord(value) && ('formula' in value || 'sharedFormula' in value);
}

function readNote(note: unknown): string | null {
    if (typeof note === 'string') return note;
    if (isRecord(note) && Array.isArray(note.texts)) {
        return joinRuns(note.texts);
    }
    return null;
}

// ==================== EXCELJS ADAPTER ====================

/**
 * One ExcelJS worksheet seen through the TemplateSheet interface.
 */
export class ExcelTemplateSheet implements TemplateSheet<ExcelStyle> {
    constructor(private readonly worksheet: ExcelJS.Worksheet) {}

    get name(): string {
        return this.worksheet.name;
    }

    get rowCount(): number {
        return this.worksheet.rowCount;
    }

    get columnCount(): number {
        return this.worksheet.columnCount;
    }

    getValue(address: string): CellValue {
        return readCellValue(this.worksheet.getCell(address).value);
    }

    setValue(address: string, value: CellValue): void {
        this.worksheet.getCell(address).value = value;
    }

    getFormula(address: string): string | null {
        const cell = this.worksheet.getCell(address);
        return isFormulaValue(cell.value) ? cell.formula : null;
    }

    setFormula(address: string, formula: string): void {
        this.worksheet.getCell(address).value = { formula, date1904: false };
    }

    getComment(address: string): string | null {
        return readNote(this.worksheet.getCell(address).note);
    }

    setComment(address: string, text: string, author: string): void {
        this.worksheet.getCell(address).note = {
            texts: [
                { font: { bold: true }, text: `${author}:\n` },
                { text },
            ],
        };
    }

    getColumnWidths(): Map<number, number> {
        const widths = new Map<number, number>();
        for (let column = 1; column <= this.worksheet.columnCount; column++) {
            const width = this.worksheet.getColumn(column).width;
            if (typeof width === 'number') widths.set(column, width);
        }
        return widths;
    }

    setColumnWidth(column: number, width: number): void {
        this.worksheet.getColumn(column).width = width;
    }

    getRowHeights(): Map<number, number> {
        const heights = new Map<number, number>();
        this.worksheet.eachRow({ includeEmpty: true }, (row, rowNumber) => {
            if (typeof row.height === 'number') heights.set(rowNumber, row.height);
        });
        return heights;
    }

    setRowHeight(row: number, height: number): void {
        this.worksheet.getRow(row).height = height;
    }

    getStyle(address: string): ExcelStyle | null {
        const cell = this.worksheet.getCell(address);
        if (cell.value === null && Object.keys(cell.style).length === 0) return null;
        return structuredClone(cell.style);
    }

    setStyle(address: string, style: ExcelStyle): void {
        this.worksheet.getCell(address).style = structuredClone(style);
    }

    getMergedRanges(): string[] {
        // Master address → bottom-right corner of its merge
        const extents = new Map<string, { row: number; column: number }>();
        this.worksheet.eachRow((row) => {
            row.eachCell((cell) => {
                if (!cell.isMerged) return;
                const master = cell.master.address;
                const position = parseCellAddress(cell.address);
                const extent = extents.get(master) ?? position;
                extents.set(master, {
                    row: Math.max(extent.row, position.row),
                    column: Math.max(extent.column, position.column),
                });
            });
        });
        return [...extents]
            .filter(([master, end]) => master !== cellAddress(end.row, end.column))
            .map(([master, end]) => `${master}:${cellAddress(end.row, end.column)}`);
    }

    mergeRange(range: string): void {
        this.worksheet.mergeCells(range);
    }
}

/**
 * An ExcelJS workbook seen through the TemplateDocument interface.
 */
export class ExcelTemplateDocument implements TemplateDocument<ExcelStyle> {
    private readonly sheets = new Map<string, ExcelTemplateSheet>();

    constructor(private readonly workbook: ExcelJS.Workbook) {
        for (const worksheet of workbook.worksheets) {
            this.sheets.set(worksheet.name, new ExcelTemplateSheet(worksheet));
        }
    }

    /**
     * Loads an .xlsx/.xlsm package.
     */
    static async load(bytes: Uint8Array): Promise<ExcelTemplateDocument> {
        const workbook = new ExcelJS.Workbook();
        const buffer = new ArrayBuffer(bytes.byteLength);
        new Uint8Array(buffer).set(bytes);
        await workbook.xlsx.load(buffer);
        return new ExcelTemplateDocument(workbook);
    }

    get sheetNames(): string[] {
        return [...this.sheets.keys()];
    }

    getSheet(name: string): ExcelTemplateSheet | undefined {
        return this.sheets.get(name);
    }

    async toBuffer(): Promise<Buffer> {
        return Buffer.from(await this.workbook.xlsx.writeBuffer());
    }
}

// ==================== FORMATTING ====================

/**
 * Captures column widths, row heights, merged regions and the header-row cell
 * styles of a sheet.
 */
export function captureFormatting<TStyle>(sheet: TemplateSheet<TStyle>): SheetFormatting<TStyle> {
    const cellStyles = new Map<string, TStyle>();
    const lastColumn = Math.min(sheet.columnCount, TEMPLATE_LAYOUT.STYLE_SCAN_COLUMNS - 1);
    for (let row = 1; row <= TEMPLATE_LAYOUT.STYLED_HEADER_ROWS; row++) {
        for (let column = 1; column <= lastColumn; column++) {
            const address = cellAddress(row, column);
            const style = sheet.getStyle(address);
            if (style !== null) cellStyles.set(address, style);
        }
    }

    return {
        columnWidths: sheet.getColumnWidths(),
        rowHeights: sheet.getRowHeights(),
        mergedRanges: sheet.getMergedRanges(),
        cellStyles,
    };
}

/**
 * Re-applies captured formatting. A style or merge that cannot be applied is
 * skipped on its own.
 */
export function applyFormatting<TStyle>(sheet: TemplateSheet<TStyle>, formatting: SheetFormatting<TStyle>): void {
    for (const [column, width] of formatting.columnWidths) {
        sheet.setColumnWidth(column, width);
    }
    for (const [row, height] of formatting.rowHeights) {
        sheet.setRowHeight(row, height);
    }
    for (const [address, style] of formatting.cellStyles) {
        try {
            sheet.setStyle(address, style);
        } catch (error) {
            log.debug(`Skipped style for ${sheet.name}!${address}:`, error);
        }
    }

    const existing = new Set(sheet.getMergedRanges());
    for (const range of formatting.mergedRanges) {
        if (existing.has(range)) continue;
        try {
            sheet.mergeRange(range);
        } catch (error) {
            log.debug(`Skipped merge ${sheet.name}!${range}:`, error);
        }
    }
}

// ==================== TEMPLATE ANALYSIS ====================

/**
 * Client names listed in column B of an Event Summary sheet.
 * Blanks, totals and formula cells are skipped.
 */
export function extractClients<TStyle>(sheet: TemplateSheet<TStyle>): string[] {
    const clients: string[] = [];
    for (let row = TEMPLATE_LAYOUT.CLIENT_FIRST_ROW; row <= TEMPLATE_LAYOUT.CLIENT_LAST_ROW; row++) {
        const address = cellAddress(row, 2);
        if (sheet.getFormula(address) !== null) continue;
        const value = sheet.getValue(address);
        if (value === null || value === '' || value === 0 || value === false) continue;
        const name = value instanceof Date ? value.toISOString() : String(value);
        if (name === 'Total' || name === 'TOTAL' || name.startsWith('=')) continue;
        clients.push(name);
    }
    return clients;
}

/**
 * Analyses an opened template document.
 *
 * @param openDocument - Opens a fresh copy of the template
 * @param vbaProject - VBA project part, or null for a macro-free template
 */
export async function analyseTemplate<TStyle>(
    openDocument: () => Promise<TemplateDocument<TStyle>>,
    vbaProject: Uint8Array | null
): Promise<TemplateInfo<TStyle>> {
    const document = await openDocument();

    const formatting = new Map<string, SheetFormatting<TStyle>>();
    for (const name of document.sheetNames) {
        const sheet = document.getSheet(name);
        if (sheet) formatting.set(name, captureFormatting(sheet));
    }

    const clientsOf = (name: string): string[] => {
        const sheet = document.getSheet(name);
        if (!sheet) {
            log.warn(`Template has no "${name}" sheet`);
            return [];
        }
        return extractClients(sheet);
    };

    return {
        openDocument,
        sheetNames: document.sheetNames,
        coreClients: clientsOf(SHEET_NAMES.SUMMARY_CORE),
        oabClients: clientsOf(SHEET_NAMES.SUMMARY_OAB),
        vbaProject,
        formatting,
    };
}

/**
 * Loads an invoice template from its file contents.
 *
 * @param bytes - .xlsx/.xlsm file contents
 * @param source - Label used in error messages
 * @throws ReadError when the bytes are not a readable workbook
 */
export async function loadTemplate(bytes: Uint8Array, source = 'template'): Promise<TemplateInfo<ExcelStyle>> {
    const copy = Uint8Array.from(bytes);
    try {
        const info = await analyseTemplate(() => ExcelTemplateDocument.load(copy), await extractVbaProject(copy));
        log.info(
            `Loaded template ${source}: ${info.sheetNames.length} sheets, ` +
                `${info.coreClients.length} core / ${info.oabClients.length} OAB clients, ` +
                `macros: ${info.vbaProject ? 'yes' : 'no'}`
        );
        return info;
    } catch (error) {
        throw new ReadError(source, 'not a readable workbook template', { cause: error });
    }
}
