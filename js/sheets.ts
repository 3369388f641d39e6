/**
 * @fileoverview Tabular Input Reader
 * Thin layer over SheetJS that turns a CSV text or a workbook's first sheet into
 * header-keyed records. Header labels are trimmed; empty cells become null.
 */

import * as XLSX from 'xlsx';
import { ReadError } from './errors.js';
import type { CellValue } from './types.js';

/**
 * Rows of a sheet keyed by header label.
 */
export interface ParsedTable {
    /** Non-empty header labels in sheet order (first occurrence of duplicates only) */
    columns: string[];
    records: Record<string, CellValue>[];
}

/**
 * Narrows a raw SheetJS cell to a CellValue. Empty strings become null.
 */
export function toCellValue(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string') return value === '' ? null : value;
    if (typeof value === 'number' || typeof value === 'boolean') return value;
    if (value instanceof Date) return value;
    return String(value);
}

/**
 * Converts a worksheet to header-keyed records.
 * Rows above `headerRowIndex` are ignored and rows with no values are skipped.
 *
 * @param sheet - SheetJS worksheet
 * @param headerRowIndex - Zero-based row holding the header labels
 */
export function sheetToTable(sheet: XLSX.WorkSheet, headerRowIndex = 0): ParsedTable {
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        range: headerRowIndex,
        defval: null,
        blankrows: false,
        raw: true,
    });
    if (rows.length === 0) {
        return { columns: [], records: [] };
    }

    // Column index → label; blank and repeated labels are dropped
    const headerCells = rows[0];
    const labels = new Map<number, string>();
    const seen = new Set<string>();
    headerCells.forEach((cell, index) => {
        const label = cell === null || cell === undefined ? '' : String(cell).trim();
        if (label === '' || seen.has(label)) return;
        seen.add(label);
        labels.set(index, label);
    });

    const records: Record<string, CellValue>[] = [];
    for (const row of rows.slice(1)) {
        const record: Record<string, CellValue> = {};
        let hasValue = false;
        for (const [index, label] of labels) {
            const value = toCellValue(row[index]);
            record[label] = value;
            if (value !== null) hasValue = true;
        }
        if (hasValue) records.push(record);
    }

    return { columns: [...seen], records };
}

/**
 * Parses CSV text with a header row. Cells are kept as raw strings.
 *
 * @param text - Decoded CSV text
 * @param source - Label used in error messages
 * @throws ReadError when the text cannot be parsed
 */
export function readCsvTable(text: string, source: string): ParsedTable {
    let workbook: XLSX.WorkBook;
    try {
        workbook = XLSX.read(text, { type: 'string', raw: true });
    } catch (error) {
        throw new ReadError(source, 'not a readable CSV table', { cause: error });
    }
    const sheet = firstSheet(workbook);
    return sheet ? sheetToTable(sheet, 0) : { columns: [], records: [] };
}

/**
 * Reads the first worksheet of an .xlsx/.xls workbook.
 * Date cells are returned as Date objects.
 *
 * @param bytes - Workbook file contents
 * @param source - Label used in error messages
 * @param headerRowIndex - Zero-based row holding the header labels
 * @throws ReadError when the bytes are not a readable workbook
 */
export function readWorkbookTable(bytes: Uint8Array, source: string, headerRowIndex: number): ParsedTable {
    let workbook: XLSX.WorkBook;
    try {
        workbook = XLSX.read(bytes, { type: 'array', cellDates: true });
    } catch (error) {
        throw new ReadError(source, 'not a readable workbook', { cause: error });
    }
    const sheet = firstSheet(workbook);
    if (!sheet) {
        throw new ReadError(source, 'workbook has no worksheets');
    }
    return sheetToTable(sheet, headerRowIndex);
}

function firstSheet(workbook: XLSX.WorkBook): XLSX.WorkSheet | undefined {
    const name = workbook.SheetNames[0];
    return name === undefined ? undefined : workbook.Sheets[name];
}
