/**
 * @fileoverview TypeScript Type Definitions
 * Centralized type definitions shared across the invoice pipeline.
 */

import type { ErrorType, ProductionField } from './constants.js';

// ==================== CELL VALUES ====================

/**
 * A single spreadsheet or CSV cell after parsing.
 * Empty cells are always `null`, never `undefined`.
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * Studio job classification, each with its own hourly rate.
 */
export type StudioType = 'Artwork' | 'Creative Artwork' | 'Digital';

/**
 * Billing category of a job.
 */
export type CoreOrOab = 'CORE' | 'OAB';

// ==================== TIMESHEET TYPES ====================

/**
 * One row of the timesheet export.
 */
export interface RawTimeEntry {
    /** Job number, e.g. `1/SDG2161` */
    jobNumber: string;
    /** Free-text job description */
    jobDescription: string;
    /** Charge code; null when the cell is empty */
    chargeCode: string | null;
    /** Hours booked (non-numeric cells coerced to 0) */
    hours: number;
}

/**
 * Chargeable hours aggregated per project from the timesheet.
 */
export interface JobHoursRecord {
    /** Project ref, e.g. `SDG2161` */
    projectRef: string;
    /** Summed hours rounded up to the next quarter hour */
    totalHours: number;
    /** Classification derived from the modal charge code */
    type: StudioType;
    /** OAB when the job description mentions ROI */
    coreOrOab: CoreOrOab;
}

// ==================== PRODUCTION TYPES ====================

/**
 * Production export fields keyed by their camelCase names.
 */
export type ProductionFields = { [K in ProductionField]: CellValue };

/**
 * One production line item (also the Print table row shape).
 */
export interface ProductionLineItem extends ProductionFields {
    /** Derived review note; empty when the line needs no check */
    productionStatusNote: string;
    /** Label of the input file this row came from */
    source: string;
}

/**
 * A set of production line items plus the source columns that were present.
 */
export interface ProductionTable {
    /** Header labels found in the source file(s), in first-seen order */
    columns: string[];
    rows: ProductionLineItem[];
}

// ==================== STUDIO TYPES ====================

/**
 * Per-project studio record aggregated from production line items.
 */
export interface StudioJobRecord {
    projectRef: string;
    eventName: CellValue;
    projectDescription: CellValue;
    projectOwner: CellValue;
    /** Count of line items that are not "not applicable" */
    lines: number;
    /** Chargeable hours; null until a timesheet or edit supplies them */
    studioHours: number | null;
    /** Empty until classified */
    type: StudioType | '';
    /** Empty until classified */
    coreOrOab: CoreOrOab | '';
    /** Review comment; empty when every line is completed */
    studioComment: string;
}

/**
 * Outcome of classifying a project's content brief statuses.
 *
 * - `degenerate`: no statuses at all (kept, commented)
 * - `excluded`: only "not applicable" statuses (dropped)
 * - `complete`: every status is "completed" (kept, no comment)
 * - `needs-review`: anything else (kept, commented)
 */
export type ProjectStatusClass = 'degenerate' | 'excluded' | 'complete' | 'needs-review';

/**
 * Result of merging timesheet hours into the studio table.
 */
export interface TimesheetMergeResult {
    records: StudioJobRecord[];
    /** Projects that received timesheet hours */
    matched: number;
    /** Sum of studio hours across all projects after the merge */
    totalHours: number;
    /** Projects still without hours */
    unmatched: StudioJobRecord[];
}

/**
 * A manual correction to one studio project.
 * Values are untyped because they arrive from user input.
 */
export interface StudioEdit {
    projectRef: string;
    studioHours?: unknown;
    type?: unknown;
    coreOrOab?: unknown;
}

// ==================== COST TYPES ====================

/**
 * Studio record with cost fields attached.
 */
export interface StudioCostRow {
    record: StudioJobRecord;
    type: StudioType;
    coreOrOab: CoreOrOab;
    /** Hours used for costing (null and non-numeric become 0) */
    hours: number;
    rate: number;
    studioCost: number;
}

/**
 * Print row with cost fields attached.
 */
export interface PrintCostRow {
    line: ProductionLineItem;
    coreOrOab: CoreOrOab;
    sellPrice: number;
    quantity: number;
    totalCost: number;
}

/**
 * Cost totals split by billing category.
 */
export interface CostTotals {
    studioCore: number;
    studioOab: number;
    printCore: number;
    printOab: number;
    core: number;
    oab: number;
    grand: number;
}

/**
 * Cost summary for one studio project.
 */
export interface ProjectCostSummary {
    projectRef: string;
    projectDescription: CellValue;
    lines: number;
    studioHours: number;
    coreOrOab: CoreOrOab;
    studioCost: number;
    productionCost: number;
    totalCost: number;
}

/**
 * Full cost preview.
 */
export interface CostPreview {
    studio: StudioCostRow[];
    print: PrintCostRow[];
    totals: CostTotals;
    projects: ProjectCostSummary[];
    /** Whether any project has non-zero studio hours */
    hasStudioHours: boolean;
}

// ==================== TEMPLATE TYPES ====================

/**
 * One worksheet of a loaded template document.
 * Addresses are A1-style (e.g. `D4`); rows and columns are 1-based.
 *
 * @typeParam TStyle - Style snapshot type of the underlying document engine
 */
export interface TemplateSheet<TStyle> {
    readonly name: string;
    /** Last row holding any content */
    readonly rowCount: number;
    /** Last column holding any content */
    readonly columnCount: number;
    getValue(address: string): CellValue;
    setValue(address: string, value: CellValue): void;
    /** Formula text without the leading `=` */
    getFormula(address: string): string | null;
    setFormula(address: string, formula: string): void;
    getComment(address: string): string | null;
    setComment(address: string, text: string, author: string): void;
    getColumnWidths(): Map<number, number>;
    setColumnWidth(column: number, width: number): void;
    getRowHeights(): Map<number, number>;
    setRowHeight(row: number, height: number): void;
    /** Style of a cell, or null for a cell with no value and default style */
    getStyle(address: string): TStyle | null;
    setStyle(address: string, style: TStyle): void;
    getMergedRanges(): string[];
    mergeRange(range: string): void;
}

/**
 * A loaded template workbook.
 */
export interface TemplateDocument<TStyle> {
    readonly sheetNames: string[];
    getSheet(name: string): TemplateSheet<TStyle> | undefined;
    /** Serializes the workbook package */
    toBuffer(): Promise<Buffer>;
}

/**
 * Formatting captured from a template sheet at load time.
 */
export interface SheetFormatting<TStyle> {
    columnWidths: Map<number, number>;
    rowHeights: Map<number, number>;
    mergedRanges: string[];
    /** Styles of the header rows keyed by address */
    cellStyles: Map<string, TStyle>;
}

/**
 * A template document plus what was learned about it at load time.
 */
export interface TemplateInfo<TStyle> {
    /** Opens a fresh, unmodified copy of the template */
    openDocument(): Promise<TemplateDocument<TStyle>>;
    sheetNames: string[];
    coreClients: string[];
    oabClients: string[];
    /** Raw VBA project part when the template carries macros */
    vbaProject: Uint8Array | null;
    formatting: Map<string, SheetFormatting<TStyle>>;
}

/**
 * Event metadata written into the invoice.
 */
export interface EventInfo {
    eventName: string;
    eventCode: string;
}

/**
 * A generated invoice ready to be written or downloaded.
 */
export interface GeneratedInvoice {
    buffer: Buffer;
    fileName: string;
    extension: 'xlsm' | 'xlsx';
    mimeType: string;
}

// ==================== PIPELINE TYPES ====================

/**
 * Pipeline stage that raised an issue.
 */
export type PipelineStage = 'template' | 'production' | 'timesheet' | 'studio' | 'edits' | 'render';

/**
 * An expected column was absent; processing continued with defaults.
 */
export interface ValidationGap {
    kind: 'gap';
    stage: PipelineStage;
    column: string;
    message: string;
}

/**
 * A stage failed and its output was discarded.
 */
export interface StageFailure {
    kind: 'error';
    stage: PipelineStage;
    error: FriendlyError;
}

export type PipelineIssue = ValidationGap | StageFailure;

// ==================== ERROR TYPES ====================

/**
 * User-friendly error object
 */
export interface FriendlyError {
    /** Error type from ERROR_TYPES */
    type: ErrorType;
    /** User-friendly error title */
    title: string;
    /** User-friendly error message */
    message: string;
    /** Suggested action */
    action: 'retry' | 'reupload' | 'none';
    /** Detail from the original error */
    detail: string;
    /** Original error object */
    originalError?: Error;
    /** ISO timestamp of when error occurred */
    timestamp: string;
    /** Error stack trace for debugging */
    stack?: string;
}
