/**
 * @fileoverview Studio Aggregator
 * Groups production line items into one studio record per project.
 *
 * Each project is classified from its content brief statuses (trimmed and
 * lowercased; empty or non-text cells count as ''):
 * - `degenerate`   no statuses at all → kept, commented
 * - `excluded`     only "not applicable" → dropped
 * - `complete`     every status "completed" → kept, no comment
 * - `needs-review` anything else → kept, commented
 *
 * "Not applicable" lines never count towards a project's lines or its
 * first-value fields.
 */

import { CONTENT_STATUS, REVIEW_NOTES } from './constants.js';
import { createLogger } from './logger.js';
import type { CellValue, ProductionLineItem, ProductionTable, ProjectStatusClass, StudioJobRecord } from './types.js';
import { cellText, isPresent, normalizeStatus } from './utils.js';

const log = createLogger('Studio');

/**
 * Classifies a project from the normalized statuses of its lines.
 */
export function classifyProjectStatuses(statuses: readonly string[]): ProjectStatusClass {
    if (statuses.length === 0) return 'degenerate';
    if (statuses.every((status) => status === CONTENT_STATUS.NOT_APPLICABLE)) return 'excluded';
    if (statuses.every((status) => status === CONTENT_STATUS.COMPLETED)) return 'complete';
    return 'needs-review';
}

/**
 * First value among the rows that is not empty.
 */
function firstPresent(rows: readonly ProductionLineItem[], pick: (row: ProductionLineItem) => CellValue): CellValue {
    for (const row of rows) {
        const value = pick(row);
        if (isPresent(value)) return value;
    }
    return null;
}

/**
 * Aggregates line items into per-project studio records, ordered by project ref.
 * Rows without a project ref are ignored.
 */
export function aggregateStudioJobs(table: ProductionTable): StudioJobRecord[] {
    const groups = new Map<string, ProductionLineItem[]>();
    for (const row of table.rows) {
        const projectRef = cellText(row.projectRef);
        if (projectRef === null) continue;
        const rows = groups.get(projectRef) ?? [];
        rows.push(row);
        groups.set(projectRef, rows);
    }

    const records: StudioJobRecord[] = [];
    let excluded = 0;

    const refs = [...groups.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    for (const projectRef of refs) {
        const rows = groups.get(projectRef) ?? [];
        const statuses = rows.map((row) => normalizeStatus(row.contentBriefStatus));
        const statusClass = classifyProjectStatuses(statuses);
        if (statusClass === 'excluded') {
            excluded++;
            continue;
        }

        const applicable = rows.filter(
            (row) => normalizeStatus(row.contentBriefStatus) !== CONTENT_STATUS.NOT_APPLICABLE
        );
        if (applicable.length === 0) continue;

        records.push({
            projectRef,
            eventName: firstPresent(applicable, (row) => row.eventName),
            projectDescription: firstPresent(applicable, (row) => row.projectDescription),
            projectOwner: firstPresent(applicable, (row) => row.projectOwner),
            lines: applicable.length,
            studioHours: null,
            type: '',
            coreOrOab: '',
            studioComment: statusClass === 'complete' ? '' : REVIEW_NOTES.STUDIO_COMMENT,
        });
    }

    log.info(`Aggregated ${records.length} studio projects (${excluded} excluded as not applicable)`);
    return records;
}
