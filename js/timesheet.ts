/**
 * @fileoverview Timesheet Aggregator
 *
 * Turns a raw timesheet export (CSV bytes of unknown encoding) into one chargeable
 * hours record per project.
 *
 * ## Pipeline
 * 1. Decode the bytes, trying each of TIMESHEET_ENCODINGS with fatal decoding
 * 2. Parse the CSV (cells kept raw, hours coerced to numbers)
 * 3. Extract the project ref from the job number (`1/SDG1234` → `SDG1234`)
 * 4. Drop non-chargeable QC time
 * 5. Group by project ref: sum hours, keep the first description, take the
 *    modal charge code
 * 6. Round hours up to the quarter and classify type and billing category
 *
 * `processTimesheet()` runs all of the above and never throws: decode and read
 * failures are reported and come back as issues alongside an empty result.
 */

import {
    DEFAULT_CORE_OR_OAB,
    DEFAULT_STUDIO_TYPE,
    JOB_NUMBER_PATTERN,
    NON_CHARGEABLE_MARKER,
    OAB_MARKER,
    TIMESHEET_COLUMNS,
    TIMESHEET_ENCODINGS,
    type TimesheetEncoding,
} from './constants.js';
import { reportError } from './error-reporting.js';
import { DecodeError } from './errors.js';
import { createLogger } from './logger.js';
import { readCsvTable } from './sheets.js';
import type {
    CellValue,
    CoreOrOab,
    JobHoursRecord,
    PipelineIssue,
    RawTimeEntry,
    StudioType,
    ValidationGap,
} from './types.js';
import { cellText, createUserFriendlyError, roundUpToQuarter, toNumber } from './utils.js';

const log = createLogger('Timesheet');

/**
 * Decoded timesheet text and the encoding that produced it.
 */
export interface DecodedTimesheet {
    text: string;
    encoding: TimesheetEncoding;
}

/**
 * Parsed timesheet rows plus the expected columns that were missing.
 */
export interface ParsedTimesheet {
    entries: RawTimeEntry[];
    gaps: ValidationGap[];
}

/**
 * Output of `processTimesheet`.
 */
export interface TimesheetResult {
    records: JobHoursRecord[];
    issues: PipelineIssue[];
}

// ==================== DECODING ====================

/**
 * Resolves a fallback encoding to a WHATWG decoder label.
 * Plain `utf-16` follows the byte order mark and defaults to little-endian.
 */
function decoderLabel(encoding: TimesheetEncoding, bytes: Uint8Array): string {
    if (encoding === 'utf-16') {
        return bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff ? 'utf-16be' : 'utf-16le';
    }
    return encoding;
}

/**
 * Whether a decoder failure means "try the next encoding": a TypeError for an
 * invalid byte sequence or a RangeError for a label this runtime lacks.
 * Matched by name, since the decoder's errors may come from another realm.
 */
export function isDecoderRejection(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('name' in error)) {
        return false;
    }
    return error.name === 'TypeError' || error.name === 'RangeError';
}

/**
 * Decodes timesheet bytes with the first encoding that accepts them.
 * A leading byte order mark is stripped.
 *
 * @param bytes - Raw file contents
 * @param encodings - Encodings to try, in order
 * @throws DecodeError when every encoding rejects the bytes
 */
export function decodeTimesheet(
    bytes: Uint8Array,
    encodings: readonly TimesheetEncoding[] = TIMESHEET_ENCODINGS
): DecodedTimesheet {
    for (const encoding of encodings) {
        try {
            const decoder = new TextDecoder(decoderLabel(encoding, bytes), { fatal: true });
            const text = decoder.decode(bytes);
            log.debug(`Decoded timesheet as ${encoding}`);
            return { text, encoding };
        } catch (error) {
            if (!isDecoderRejection(error)) {
                throw error;
            }
            log.debug(`Timesheet is not ${encoding}`);
        }
    }
    throw new DecodeError(encodings);
}

// ==================== PARSING ====================

/**
 * Parses decoded timesheet text into raw entries.
 * Missing columns are reported as gaps and read as empty text or zero hours.
 *
 * @param text - Decoded CSV text
 * @param source - Label used in error messages
 * @throws ReadError when the text is not a readable table
 */
export function parseTimeEntries(text: string, source = 'timesheet'): ParsedTimesheet {
    const table = readCsvTable(text, source);

    const gaps: ValidationGap[] = Object.values(TIMESHEET_COLUMNS)
        .filter((column) => !table.columns.includes(column))
        .map((column): ValidationGap => ({
            kind: 'gap',
            stage: 'timesheet',
            column,
            message: `Timesheet has no "${column}" column`,
        }));

    const read = (record: Record<string, CellValue>, column: string): CellValue => record[column] ?? null;

    const entries = table.records.map((record): RawTimeEntry => ({
        jobNumber: cellText(read(record, TIMESHEET_COLUMNS.JOB_NUMBER)) ?? '',
        jobDescription: cellText(read(record, TIMESHEET_COLUMNS.JOB_DESCRIPTION)) ?? '',
        chargeCode: cellText(read(record, TIMESHEET_COLUMNS.CHARGE_CODE)),
        hours: toNumber(read(record, TIMESHEET_COLUMNS.HOURS)),
    }));

    return { entries, gaps };
}

// ==================== AGGREGATION ====================

/**
 * Maps a charge code to a studio type.
 *
 * @example
 * classifyChargeCode('Creative Design') // → 'Creative Artwork'
 * classifyChargeCode('TEC Build') // → 'Digital'
 * classifyChargeCode(null) // → 'Artwork'
 */
export function classifyChargeCode(chargeCode: string | null): StudioType {
    const code = (chargeCode ?? '').toLowerCase();
    if (code.includes('creative')) return 'Creative Artwork';
    if (code.includes('digital') || code.includes('tec')) return 'Digital';
    return DEFAULT_STUDIO_TYPE;
}

/**
 * Most frequent charge code; ties go to the lexicographically smallest.
 * Missing codes are ignored, so a group with none yields null.
 */
export function modalChargeCode(codes: readonly (string | null)[]): string | null {
    const counts = new Map<string, number>();
    for (const code of codes) {
        if (code === null) continue;
        counts.set(code, (counts.get(code) ?? 0) + 1);
    }

    let best: string | null = null;
    let bestCount = 0;
    for (const [code, count] of counts) {
        if (count > bestCount || (count === bestCount && best !== null && code < best)) {
            best = code;
            bestCount = count;
        }
    }
    return best;
}

interface ProjectGroup {
    description: string;
    hours: number;
    codes: (string | null)[];
}

/**
 * Aggregates raw entries into one record per project ref, sorted by ref.
 * Rows whose job number has no project ref and QC rows are dropped.
 */
export function aggregateTimesheet(entries: readonly RawTimeEntry[]): JobHoursRecord[] {
    const groups = new Map<string, ProjectGroup>();
    let skippedQc = 0;
    let skippedUnmatched = 0;

    for (const entry of entries) {
        const match = entry.jobNumber.match(JOB_NUMBER_PATTERN);
        if (!match) {
            skippedUnmatched++;
            continue;
        }
        if ((entry.chargeCode ?? '').toLowerCase().includes(NON_CHARGEABLE_MARKER)) {
            skippedQc++;
            continue;
        }

        const projectRef = match[1];
        const group = groups.get(projectRef) ?? { description: '', hours: 0, codes: [] };
        if (group.description === '' && entry.jobDescription !== '') {
            group.description = entry.jobDescription;
        }
        group.hours += entry.hours;
        group.codes.push(entry.chargeCode);
        groups.set(projectRef, group);
    }

    if (skippedUnmatched > 0 || skippedQc > 0) {
        log.debug(`Skipped ${skippedUnmatched} rows without a project ref and ${skippedQc} QC rows`);
    }

    const sorted = [...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return sorted.map(([projectRef, group]): JobHoursRecord => {
        const coreOrOab: CoreOrOab = group.description.toLowerCase().includes(OAB_MARKER)
            ? 'OAB'
            : DEFAULT_CORE_OR_OAB;
        return {
            projectRef,
            totalHours: roundUpToQuarter(group.hours),
            type: classifyChargeCode(modalChargeCode(group.codes)),
            coreOrOab,
        };
    });
}

// ==================== ENTRY POINT ====================

/**
 * Decodes, parses and aggregates a timesheet export.
 * Never throws: failures are reported and returned as issues with no records.
 *
 * @param bytes - Raw file contents
 * @param source - Label used in logs and error messages
 */
export function processTimesheet(bytes: Uint8Array, source = 'timesheet'): TimesheetResult {
    try {
        const { text, encoding } = decodeTimesheet(bytes);
        const { entries, gaps } = parseTimeEntries(text, source);
        const records = aggregateTimesheet(entries);
        log.info(`Timesheet ${source} (${encoding}): ${entries.length} rows → ${records.length} projects`);
        return { records, issues: gaps };
    } catch (error) {
        const friendly = createUserFriendlyError(error);
        reportError(friendly.originalError ?? friendly.detail, {
            module: 'Timesheet',
            operation: 'processTimesheet',
            userMessage: friendly.message,
            level: 'warning',
            metadata: { source, bytes: bytes.length },
        });
        return { records: [], issues: [{ kind: 'error', stage: 'timesheet', error: friendly }] };
    }
}
