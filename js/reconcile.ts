/**
 * @fileoverview Reconciler
 * Merges timesheet hours into the studio table and applies manual edits.
 *
 * Stored records keep '' / null for anything unknown; `effectiveType()` and
 * `effectiveCoreOrOab()` supply the Artwork / CORE defaults wherever a value is
 * read for costing, rendering or export.
 */

import { CONSTANTS, CORE_OR_OAB_VALUES, DEFAULT_CORE_OR_OAB, DEFAULT_STUDIO_TYPE, STUDIO_TYPES } from './constants.js';
import { ValidationError } from './errors.js';
import { createLogger } from './logger.js';
import type {
    CoreOrOab,
    JobHoursRecord,
    StudioEdit,
    StudioJobRecord,
    StudioType,
    TimesheetMergeResult,
} from './types.js';
import { round, validateNumber, validateOption } from './utils.js';

const log = createLogger('Reconcile');

type StudioPatch = Partial<Pick<StudioJobRecord, 'studioHours' | 'type' | 'coreOrOab'>>;

/**
 * Studio type used for costing and output: the stored type, or Artwork.
 */
export function effectiveType(record: Pick<StudioJobRecord, 'type'>): StudioType {
    return record.type === '' ? DEFAULT_STUDIO_TYPE : record.type;
}

/**
 * Billing category used for costing and output: the stored value, or CORE.
 */
export function effectiveCoreOrOab(record: Pick<StudioJobRecord, 'coreOrOab'>): CoreOrOab {
    return record.coreOrOab === '' ? DEFAULT_CORE_OR_OAB : record.coreOrOab;
}

/**
 * Left-joins timesheet hours onto the studio table by project ref.
 * Timesheet values win where present; otherwise the existing values stay.
 *
 * @param studio - Current studio records
 * @param hours - Aggregated timesheet records
 */
export function mergeTimesheetHours(
    studio: readonly StudioJobRecord[],
    hours: readonly JobHoursRecord[]
): TimesheetMergeResult {
    const byRef = new Map(hours.map((record) => [record.projectRef, record]));
    let matched = 0;

    const records = studio.map((record): StudioJobRecord => {
        const timesheet = byRef.get(record.projectRef);
        if (!timesheet) return { ...record };
        matched++;
        return {
            ...record,
            studioHours: timesheet.totalHours,
            type: timesheet.type,
            coreOrOab: timesheet.coreOrOab,
        };
    });

    const totalHours = round(
        records.reduce((sum, record) => sum + (record.studioHours ?? 0), 0),
        2
    );
    const unmatched = records.filter((record) => record.studioHours === null);

    log.info(`Matched ${matched} of ${records.length} studio projects to timesheet hours`);
    if (unmatched.length > 0) {
        log.debug('Projects without hours:', unmatched.map((record) => record.projectRef));
    }

    return { records, matched, totalHours, unmatched };
}

/**
 * Applies manual corrections to studio records.
 * Every edit is validated before any is applied.
 *
 * @param studio - Current studio records
 * @param edits - Corrections keyed by project ref
 * @returns New records with the edits applied
 * @throws ValidationError for an unknown project or a rejected value
 */
export function applyStudioEdits(
    studio: readonly StudioJobRecord[],
    edits: readonly StudioEdit[]
): StudioJobRecord[] {
    const known = new Set(studio.map((record) => record.projectRef));
    const patches = new Map<string, StudioPatch>();

    for (const edit of edits) {
        if (!known.has(edit.projectRef)) {
            throw new ValidationError(`Unknown project ${edit.projectRef}`);
        }
        const patch: StudioPatch = { ...patches.get(edit.projectRef) };

        if (edit.studioHours !== undefined) {
            const hours = validateNumber(edit.studioHours, 'Studio Hours');
            if (hours < 0 || hours > CONSTANTS.MAX_STUDIO_HOURS) {
                throw new ValidationError(`Studio Hours must be between 0 and ${CONSTANTS.MAX_STUDIO_HOURS}`);
            }
            patch.studioHours = hours;
        }
        if (edit.type !== undefined) {
            patch.type = validateOption(edit.type, STUDIO_TYPES, 'Type');
        }
        if (edit.coreOrOab !== undefined) {
            patch.coreOrOab = validateOption(edit.coreOrOab, CORE_OR_OAB_VALUES, 'Core/OAB');
        }
        patches.set(edit.projectRef, patch);
    }

    log.debug(`Applying edits to ${patches.size} projects`);
    return studio.map((record) => ({ ...record, ...patches.get(record.projectRef) }));
}
