/**
 * @fileoverview Export Module
 * Writes the Studio and Print tables as CSV for review outside the invoice, and
 * reads such files back. Text cells are guarded against CSV formula injection
 * on the way out and restored on the way in.
 */

import {
    CORE_OR_OAB_VALUES,
    PRODUCTION_COLUMNS,
    PRODUCTION_FIELDS,
    PRODUCTION_STATUS_NOTE_COLUMN,
    STUDIO_TYPES,
} from './constants.js';
import { ReadError } from './errors.js';
import { createLogger } from './logger.js';
import { toLineItem } from './production.js';
import { effectiveCoreOrOab, effectiveType } from './reconcile.js';
import { readCsvTable } from './sheets.js';
import type { CellValue, CoreOrOab, ProductionLineItem, StudioJobRecord, StudioType } from './types.js';
import {
    cellText,
    escapeCsv,
    restoreFormulaText,
    sanitizeFormulaInjection,
    toNullableNumber,
    toNumber,
} from './utils.js';

const log = createLogger('Export');

/**
 * Column headers of the studio CSV.
 */
export const STUDIO_CSV_HEADERS = [
    'Project Ref',
    'Event Name',
    'Project Description',
    'Project Owner',
    'Lines',
    'Studio Hours',
    'Type',
    'Core/OAB',
    'Studio Comment',
] as const;

/**
 * Column headers of the print CSV: every production column, then the status note.
 */
export const PRINT_CSV_HEADERS: readonly string[] = [
    ...PRODUCTION_FIELDS.map((field) => PRODUCTION_COLUMNS[field]),
    PRODUCTION_STATUS_NOTE_COLUMN,
];

// Print fields read back as numbers when they hold one
const NUMERIC_PRINT_COLUMNS: ReadonlySet<string> = new Set(
    (
        [
            'height',
            'width',
            'noOfPages',
            'allocatedQty',
            'spares',
            'totalIncludingSpares',
            'noOfStores',
            'productionSellPrice',
        ] as const
    ).map((field) => PRODUCTION_COLUMNS[field])
);

/**
 * CSV file name for an exported table.
 *
 * @example
 * csvFileName('studio', 'E1025') // → 'studio_data_E1025.csv'
 */
export function csvFileName(table: 'studio' | 'print', eventCode: string): string {
    return `${table}_data_${eventCode}.csv`;
}

function csvCell(value: CellValue): string {
    return escapeCsv(typeof value === 'string' ? sanitizeFormulaInjection(value) : value);
}

function toCsv(headers: readonly string[], rows: CellValue[][]): string {
    const lines = rows.map((row) => row.map(csvCell).join(','));
    return [headers.map(escapeCsv).join(','), ...lines].join('\n') + '\n';
}

// ==================== WRITING ====================

/**
 * Serializes studio records. Type and Core/OAB are written with their defaults
 * applied; missing hours are left blank.
 */
export function studioTableToCsv(studio: readonly StudioJobRecord[]): string {
    const rows = studio.map((record): CellValue[] => [
        record.projectRef,
        record.eventName,
        record.projectDescription,
        record.projectOwner,
        record.lines,
        record.studioHours,
        effectiveType(record),
        effectiveCoreOrOab(record),
        record.studioComment,
    ]);
    log.debug(`Exporting ${rows.length} studio rows`);
    return toCsv(STUDIO_CSV_HEADERS, rows);
}

/**
 * Serializes print rows. Dates are written as ISO dates.
 */
export function printTableToCsv(print: readonly ProductionLineItem[]): string {
    const rows = print.map((line): CellValue[] => [
        ...PRODUCTION_FIELDS.map((field) => line[field]),
        line.productionStatusNote,
    ]);
    log.debug(`Exporting ${rows.length} print rows`);
    return toCsv(PRINT_CSV_HEADERS, rows);
}

// ==================== READING ====================

function readText(record: Record<string, CellValue>, column: string): CellValue {
    const value = record[column] ?? null;
    return typeof value === 'string' ? restoreFormulaText(value) : value;
}

function readOption<T extends string>(value: CellValue, options: readonly T[]): T | '' {
    const text = cellText(value);
    return options.find((option) => option === text) ?? '';
}

/**
 * Reads a studio CSV written by `studioTableToCsv` (or edited by hand).
 * Rows without a project ref are skipped; unknown types and categories are
 * read as unset.
 *
 * @throws ReadError when the text is not a table with a Project Ref column
 */
export function parseStudioCsv(text: string, source = 'studio csv'): StudioJobRecord[] {
    const table = readCsvTable(text, source);
    if (!table.columns.includes('Project Ref')) {
        throw new ReadError(source, 'missing "Project Ref" column');
    }

    const records: StudioJobRecord[] = [];
    for (const record of table.records) {
        const projectRef = cellText(readText(record, 'Project Ref'));
        if (projectRef === null) continue;
        const type: StudioType | '' = readOption(record['Type'] ?? null, STUDIO_TYPES);
        const coreOrOab: CoreOrOab | '' = readOption(record['Core/OAB'] ?? null, CORE_OR_OAB_VALUES);
        records.push({
            projectRef,
            eventName: readText(record, 'Event Name'),
            projectDescription: readText(record, 'Project Description'),
            projectOwner: readText(record, 'Project Owner'),
            lines: toNumber(record['Lines'] ?? null),
            studioHours: toNullableNumber(record['Studio Hours'] ?? null),
            type,
            coreOrOab,
            studioComment: cellText(readText(record, 'Studio Comment')) ?? '',
        });
    }
    return records;
}

/**
 * Reads a print CSV written by `printTableToCsv`.
 * Numeric columns holding a number are read as numbers.
 *
 * @throws ReadError when the text is not a readable table
 */
export function parsePrintCsv(text: string, source = 'print csv'): ProductionLineItem[] {
    const table = readCsvTable(text, source);
    return table.records.map((record) => {
        const restored: Record<string, CellValue> = {};
        for (const column of table.columns) {
            const value = readText(record, column);
            const numeric = NUMERIC_PRINT_COLUMNS.has(column) ? toNullableNumber(value) : null;
            restored[column] = numeric ?? value;
        }
        return {
            ...toLineItem(restored, source),
            productionStatusNote: cellText(restored[PRODUCTION_STATUS_NOTE_COLUMN] ?? null) ?? '',
        };
    });
}
