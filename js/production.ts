/**
 * @fileoverview Production Combiner
 * Reads production line-item workbooks, combines them with brief-ref
 * deduplication and flags lines that are not in production yet.
 * Rows are never dropped on status; flagged rows only carry a note.
 */

import {
    PRE_PRODUCTION_STATUSES,
    PRODUCTION_COLUMNS,
    PRODUCTION_HEADER_ROW_INDEX,
    REVIEW_NOTES,
    type ProductionField,
} from './constants.js';
import { createLogger } from './logger.js';
import { readWorkbookTable, type ParsedTable } from './sheets.js';
import type {
    CellValue,
    PipelineStage,
    ProductionFields,
    ProductionLineItem,
    ProductionTable,
    ValidationGap,
} from './types.js';
import { cellText, normalizeStatus } from './utils.js';

const log = createLogger('Production');

/**
 * Result of annotating a production table.
 */
export interface AnnotatedProduction {
    table: ProductionTable;
    gaps: ValidationGap[];
}

/**
 * An empty production table.
 */
export function emptyProductionTable(): ProductionTable {
    return { columns: [], rows: [] };
}

/**
 * Builds a line item from a header-keyed record. Absent fields are null.
 */
export function toLineItem(record: Record<string, CellValue>, source: string): ProductionLineItem {
    const read = (field: ProductionField): CellValue => record[PRODUCTION_COLUMNS[field]] ?? null;
    const fields: ProductionFields = {
        projectRef: read('projectRef'),
        eventName: read('eventName'),
        projectDescription: read('projectDescription'),
        projectOwner: read('projectOwner'),
        briefRef: read('briefRef'),
        posCode: read('posCode'),
        briefDescription: read('briefDescription'),
        partUrn: read('partUrn'),
        part: read('part'),
        height: read('height'),
        width: read('width'),
        coloursFront: read('coloursFront'),
        coloursBack: read('coloursBack'),
        material: read('material'),
        noOfPages: read('noOfPages'),
        productionFinishingNotes: read('productionFinishingNotes'),
        productionSupplierComments: read('productionSupplierComments'),
        allocatedQty: read('allocatedQty'),
        spares: read('spares'),
        totalIncludingSpares: read('totalIncludingSpares'),
        noOfStores: read('noOfStores'),
        inStoreDeadline: read('inStoreDeadline'),
        contentBriefStatus: read('contentBriefStatus'),
        productionSupplierBriefStatus: read('productionSupplierBriefStatus'),
        productionSellPrice: read('productionSellPrice'),
        comments: read('comments'),
    };
    return { ...fields, productionStatusNote: '', source };
}

/**
 * Converts a parsed sheet into a production table.
 */
export function toProductionTable(parsed: ParsedTable, source: string): ProductionTable {
    return {
        columns: [...parsed.columns],
        rows: parsed.records.map((record) => toLineItem(record, source)),
    };
}

/**
 * Reads one production workbook: first worksheet, header on row 2.
 *
 * @param bytes - Workbook file contents
 * @param source - File name, kept on each row and used in errors
 * @throws ReadError when the workbook cannot be read
 */
export function readProductionWorkbook(bytes: Uint8Array, source: string): ProductionTable {
    const table = toProductionTable(readWorkbookTable(bytes, source, PRODUCTION_HEADER_ROW_INDEX), source);
    log.info(`Read ${table.rows.length} production lines from ${source}`);
    return table;
}

/**
 * Concatenates production tables in input order and removes duplicate brief refs,
 * keeping the first occurrence. Rows with no brief ref share one empty key.
 */
export function combineProductionTables(tables: readonly ProductionTable[]): ProductionTable {
    const columns: string[] = [];
    for (const table of tables) {
        for (const column of table.columns) {
            if (!columns.includes(column)) columns.push(column);
        }
    }

    const seen = new Set<string>();
    const rows: ProductionLineItem[] = [];
    let duplicates = 0;
    let droppedWithoutRef = 0;

    for (const row of tables.flatMap((table) => table.rows)) {
        const key = cellText(row.briefRef) ?? '';
        if (seen.has(key)) {
            duplicates++;
            if (key === '') droppedWithoutRef++;
            continue;
        }
        seen.add(key);
        rows.push(row);
    }

    if (duplicates > 0) {
        log.info(`Removed ${duplicates} duplicate brief refs`);
    }
    if (droppedWithoutRef > 0) {
        log.warn(`${droppedWithoutRef} rows without a brief ref were treated as duplicates`);
    }

    return { columns, rows };
}

/**
 * Builds a gap for every listed field whose source column the table lacks.
 */
export function findMissingColumns(
    table: ProductionTable,
    fields: readonly ProductionField[],
    stage: PipelineStage
): ValidationGap[] {
    return fields
        .map((field) => PRODUCTION_COLUMNS[field])
        .filter((column) => !table.columns.includes(column))
        .map((column): ValidationGap => ({
            kind: 'gap',
            stage,
            column,
            message: `Production data has no "${column}" column`,
        }));
}

/**
 * Trims supplier statuses and notes rows whose status means the line is not
 * in production yet. Returns new rows; nothing is removed.
 */
export function annotateProductionStatus(table: ProductionTable): AnnotatedProduction {
    const gaps = findMissingColumns(table, ['productionSupplierBriefStatus'], 'production');
    if (gaps.length > 0) {
        const rows = table.rows.map((row) => ({ ...row, productionStatusNote: '' }));
        return { table: { columns: [...table.columns], rows }, gaps };
    }

    let flagged = 0;
    const rows = table.rows.map((row): ProductionLineItem => {
        const status = row.productionSupplierBriefStatus;
        const trimmed = typeof status === 'string' ? status.trim() : status;
        const pending = PRE_PRODUCTION_STATUSES.has(normalizeStatus(trimmed));
        if (pending) flagged++;
        return {
            ...row,
            productionSupplierBriefStatus: trimmed,
            productionStatusNote: pending ? REVIEW_NOTES.PRODUCTION_STATUS : '',
        };
    });

    log.debug(`${flagged} of ${rows.length} lines are not in production yet`);
    return { table: { columns: [...table.columns], rows }, gaps };
}

/**
 * Print table rows: the annotated line items, one per row.
 */
export function preparePrintRows(table: ProductionTable): ProductionLineItem[] {
    return table.rows.map((row) => ({ ...row }));
}
