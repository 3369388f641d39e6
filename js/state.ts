/**
 * @fileoverview Pipeline Context
 *
 * An explicit, immutable session context threaded through the invoice pipeline.
 * Every stage takes a context and returns a new frozen one; nothing is shared
 * or mutated between stages.
 *
 * ## Lifecycle
 *
 * 1. **Creation** (`createPipelineContext`) - event name and derived event code
 * 2. **Template** (`withTemplate`) - loaded template, captured formatting, clients
 * 3. **Production** (`withProductionFiles` / `withProductionTables`)
 *    - Combine and deduplicate line items, annotate supplier status
 *    - Derive the Print rows and the Studio table
 * 4. **Timesheet** (`withTimesheet`) - merge quarter-rounded hours into the Studio table
 * 5. **Edits** (`withStudioEdits`) - manual hours / type / Core-OAB corrections
 * 6. **Costs** (`previewCosts`) - read-only cost preview
 * 7. **Invoice** (`generateInvoice`) - render and serialize
 *
 * ## Failure Handling
 *
 * A stage that fails with a pipeline error records a StageFailure in `issues`
 * and returns the context with its previous tables. Missing columns are recorded
 * as ValidationGaps while processing continues.
 */

import { computeCostPreview } from './calc.js';
import { ERROR_TYPES } from './constants.js';
import { addBreadcrumb, reportError } from './error-reporting.js';
import { PipelineError } from './errors.js';
import { renderInvoice, saveInvoice } from './invoice.js';
import { createLogger } from './logger.js';
import {
    annotateProductionStatus,
    combineProductionTables,
    emptyProductionTable,
    findMissingColumns,
    preparePrintRows,
    readProductionWorkbook,
} from './production.js';
import { applyStudioEdits, mergeTimesheetHours } from './reconcile.js';
import { aggregateStudioJobs } from './studio.js';
import { processTimesheet } from './timesheet.js';
import type {
    CostPreview,
    GeneratedInvoice,
    JobHoursRecord,
    PipelineIssue,
    PipelineStage,
    ProductionLineItem,
    ProductionTable,
    StudioEdit,
    StudioJobRecord,
    TemplateInfo,
    TimesheetMergeResult,
} from './types.js';
import { convertEventToCode, createUserFriendlyError } from './utils.js';

const log = createLogger('State');

/**
 * Session state shared by the pipeline stages.
 *
 * @typeParam TStyle - Style snapshot type of the template's document engine
 */
export interface PipelineContext<TStyle> {
    readonly eventName: string;
    readonly eventCode: string;
    readonly template: TemplateInfo<TStyle> | null;
    /** Combined, annotated production line items */
    readonly production: ProductionTable;
    readonly print: readonly ProductionLineItem[];
    readonly studio: readonly StudioJobRecord[];
    /** Latest non-empty timesheet aggregation */
    readonly timesheetHours: readonly JobHoursRecord[];
    /** Summary of the latest timesheet merge */
    readonly lastMerge: TimesheetMergeResult | null;
    /** Latest successfully generated invoice */
    readonly generated: GeneratedInvoice | null;
    readonly issues: readonly PipelineIssue[];
}

/**
 * One production workbook to read.
 */
export interface ProductionFile {
    bytes: Uint8Array;
    source: string;
}

function freeze<TStyle>(context: PipelineContext<TStyle>): PipelineContext<TStyle> {
    return Object.freeze(context);
}

/**
 * Records a stage failure. Errors that are not pipeline errors are rethrown.
 */
function withFailure<TStyle>(
    context: PipelineContext<TStyle>,
    stage: PipelineStage,
    error: unknown
): PipelineContext<TStyle> {
    if (!(error instanceof PipelineError)) {
        throw error;
    }
    const friendly = createUserFriendlyError(error);
    reportError(error, {
        module: 'State',
        operation: stage,
        userMessage: friendly.message,
        level: error.type === ERROR_TYPES.VALIDATION ? 'warning' : 'error',
        metadata: { eventCode: context.eventCode },
    });
    return freeze({ ...context, issues: [...context.issues, { kind: 'error', stage, error: friendly }] });
}

// ==================== CREATION ====================

/**
 * Creates an empty context for an event.
 *
 * @param eventName - Free-text event name, e.g. "Event 10 2025"
 */
export function createPipelineContext<TStyle>(eventName = ''): PipelineContext<TStyle> {
    return freeze({
        eventName,
        eventCode: convertEventToCode(eventName),
        template: null,
        production: emptyProductionTable(),
        print: [],
        studio: [],
        timesheetHours: [],
        lastMerge: null,
        generated: null,
        issues: [],
    });
}

/**
 * Renames the event; the event code is derived again.
 */
export function withEventName<TStyle>(context: PipelineContext<TStyle>, eventName: string): PipelineContext<TStyle> {
    return freeze({ ...context, eventName, eventCode: convertEventToCode(eventName) });
}

// ==================== STAGES ====================

/**
 * Loads the invoice template.
 *
 * @param load - Reads and analyses the template (e.g. `() => loadTemplate(bytes)`)
 */
export async function withTemplate<TStyle>(
    context: PipelineContext<TStyle>,
    load: () => Promise<TemplateInfo<TStyle>>
): Promise<PipelineContext<TStyle>> {
    try {
        const template = await load();
        addBreadcrumb('pipeline', 'Template loaded', { sheets: template.sheetNames.length });
        return freeze({ ...context, template });
    } catch (error) {
        return withFailure(context, 'template', error);
    }
}

/**
 * Replaces the production data with the combination of the given tables and
 * derives the Print rows and Studio table. Timesheet hours already loaded are
 * merged into the new Studio table.
 */
export function withProductionTables<TStyle>(
    context: PipelineContext<TStyle>,
    tables: readonly ProductionTable[]
): PipelineContext<TStyle> {
    const combined = combineProductionTables(tables);
    const { table: production, gaps } = annotateProductionStatus(combined);
    const studioGaps = findMissingColumns(production, ['projectRef', 'contentBriefStatus'], 'studio');

    let studio = aggregateStudioJobs(production);
    let lastMerge: TimesheetMergeResult | null = null;
    if (context.timesheetHours.length > 0) {
        lastMerge = mergeTimesheetHours(studio, context.timesheetHours);
        studio = lastMerge.records;
    }

    log.info(`Production: ${production.rows.length} print lines, ${studio.length} studio projects`);
    addBreadcrumb('pipeline', 'Production data loaded', { tables: tables.length, lines: production.rows.length });
    return freeze({
        ...context,
        production,
        print: preparePrintRows(production),
        studio,
        lastMerge,
        issues: [...context.issues, ...gaps, ...studioGaps],
    });
}

/**
 * Reads production workbooks and applies them with `withProductionTables`.
 * If any file cannot be read, nothing changes apart from the recorded issue.
 */
export function withProductionFiles<TStyle>(
    context: PipelineContext<TStyle>,
    files: readonly ProductionFile[]
): PipelineContext<TStyle> {
    let tables: ProductionTable[];
    try {
        tables = files.map((file) => readProductionWorkbook(file.bytes, file.source));
    } catch (error) {
        return withFailure(context, 'production', error);
    }
    return withProductionTables(context, tables);
}

/**
 * Processes a timesheet export and merges its hours into the Studio table.
 * The Studio table changes only when the timesheet produced records.
 */
export function withTimesheet<TStyle>(
    context: PipelineContext<TStyle>,
    bytes: Uint8Array,
    source = 'timesheet'
): PipelineContext<TStyle> {
    const { records, issues } = processTimesheet(bytes, source);
    if (records.length === 0) {
        log.warn(`No valid timesheet data found in ${source}`);
        return freeze({ ...context, issues: [...context.issues, ...issues] });
    }

    const merge = mergeTimesheetHours(context.studio, records);
    addBreadcrumb('pipeline', 'Timesheet merged', { projects: records.length, matched: merge.matched });
    return freeze({
        ...context,
        studio: merge.records,
        timesheetHours: records,
        lastMerge: merge,
        issues: [...context.issues, ...issues],
    });
}

/**
 * Applies manual studio edits. A rejected edit leaves the Studio table as it was.
 */
export function withStudioEdits<TStyle>(
    context: PipelineContext<TStyle>,
    edits: readonly StudioEdit[]
): PipelineContext<TStyle> {
    try {
        return freeze({ ...context, studio: applyStudioEdits(context.studio, edits) });
    } catch (error) {
        return withFailure(context, 'edits', error);
    }
}

// ==================== OUTPUT ====================

/**
 * Cost preview of the current Studio and Print tables.
 */
export function previewCosts<TStyle>(context: PipelineContext<TStyle>): CostPreview {
    return computeCostPreview(context.studio, context.print);
}

/**
 * Reasons the invoice cannot be generated yet; empty when ready.
 */
export function readinessIssues<TStyle>(context: PipelineContext<TStyle>): string[] {
    const reasons: string[] = [];
    if (!context.template) reasons.push('No template loaded');
    if (context.production.rows.length === 0) reasons.push('No production data loaded');
    if (context.eventName.trim() === '') reasons.push('No event name set');
    return reasons;
}

/**
 * Renders and serializes the invoice. On failure the issue is recorded and no
 * generated invoice is kept.
 *
 * @param now - Date used in the file name
 */
export async function generateInvoice<TStyle>(
    context: PipelineContext<TStyle>,
    now: Date = new Date()
): Promise<PipelineContext<TStyle>> {
    const template = context.template;
    if (!template) {
        log.warn('Cannot generate an invoice without a template');
        return context;
    }

    try {
        const document = await renderInvoice(template, {
            studio: context.studio,
            print: context.print,
            printColumns: context.production.columns,
            event: { eventName: context.eventName, eventCode: context.eventCode },
        });
        const generated = await saveInvoice(template, document, context.eventCode, now);
        return freeze({ ...context, generated });
    } catch (error) {
        return withFailure({ ...context, generated: null }, 'render', error);
    }
}
