/**
 * @fileoverview Application Constants
 * Business rules (rates, status vocabularies, annotation text), template layout
 * coordinates, file naming, and environment-derived settings shared across the
 * invoice pipeline.
 */

import type { CoreOrOab, FriendlyError, StudioType } from './types.js';

// ==================== ENVIRONMENT ====================

/**
 * Sentry DSN for error tracking.
 * Read from the SENTRY_DSN environment variable; empty disables reporting.
 */
export const SENTRY_DSN = process.env.SENTRY_DSN ?? '';

/**
 * Runtime environment name used for logging defaults and Sentry tagging.
 */
export const APP_ENV = process.env.NODE_ENV ?? 'development';

/**
 * Release identifier reported with errors.
 */
export const APP_RELEASE = 'studio-invoice-builder@1.0.0';

/**
 * Environment variables understood by the logger.
 */
export const ENV_KEYS = {
    /** Explicit log level: debug | info | warn | error | none. */
    LOG_LEVEL: 'LOG_LEVEL',
    /** Debug flag ('true' forces DEBUG level). */
    DEBUG: 'INVOICE_DEBUG',
} as const;

// ==================== STUDIO RATES ====================

/**
 * Studio job types in the order offered for manual edits.
 */
export const STUDIO_TYPES: readonly StudioType[] = ['Artwork', 'Creative Artwork', 'Digital'];

/**
 * Billing categories in the order offered for manual edits.
 */
export const CORE_OR_OAB_VALUES: readonly CoreOrOab[] = ['CORE', 'OAB'];

/**
 * Hourly studio rate per job type (GBP).
 */
export const STUDIO_RATES: Readonly<Record<StudioType, number>> = {
    Artwork: 49.5,
    'Creative Artwork': 57,
    Digital: 49.5,
};

/**
 * Type assumed for a studio job with no classification.
 */
export const DEFAULT_STUDIO_TYPE: StudioType = 'Artwork';

/**
 * Billing category assumed when none is known.
 */
export const DEFAULT_CORE_OR_OAB: CoreOrOab = 'CORE';

/**
 * Global application constants.
 */
export const CONSTANTS = {
    /** Rate applied when a studio type is unknown or missing. */
    DEFAULT_STUDIO_RATE: 49.5,
    /** Upper bound accepted for manually entered studio hours. */
    MAX_STUDIO_HOURS: 1000,
    /** Studio hours are rounded up to this increment. */
    HOURS_INCREMENT: 0.25,
    /** Currency code used in the CLI cost summary. */
    CURRENCY: 'GBP',
    /** Placeholder event code when the event name cannot be parsed. */
    FALLBACK_EVENT_CODE: 'E0000',
} as const;

// ==================== TIMESHEET ====================

/**
 * Source column names of the timesheet export.
 */
export const TIMESHEET_COLUMNS = {
    JOB_NUMBER: 'Job Number',
    JOB_DESCRIPTION: 'Job Description',
    CHARGE_CODE: 'Charge Code',
    HOURS: 'Total',
} as const;

/**
 * Job number pattern; the capture group is the project ref.
 */
export const JOB_NUMBER_PATTERN = /1\/(SDG\d+)/;

/**
 * Charge codes containing this marker are non-chargeable QC time.
 */
export const NON_CHARGEABLE_MARKER = 'qc';

/**
 * Job descriptions containing this marker are billed as OAB.
 */
export const OAB_MARKER = 'roi';

/**
 * Text encodings tried in order when decoding a timesheet export.
 */
export const TIMESHEET_ENCODINGS = ['utf-8', 'utf-16', 'latin1', 'windows-1252'] as const;

export type TimesheetEncoding = typeof TIMESHEET_ENCODINGS[number];

// ==================== PRODUCTION ====================

/**
 * Production line-item fields in Print sheet column order (A..Y), then Comments.
 */
export const PRODUCTION_FIELDS = [
    'projectRef',
    'eventName',
    'projectDescription',
    'projectOwner',
    'briefRef',
    'posCode',
    'briefDescription',
    'partUrn',
    'part',
    'height',
    'width',
    'coloursFront',
    'coloursBack',
    'material',
    'noOfPages',
    'productionFinishingNotes',
    'productionSupplierComments',
    'allocatedQty',
    'spares',
    'totalIncludingSpares',
    'noOfStores',
    'inStoreDeadline',
    'contentBriefStatus',
    'productionSupplierBriefStatus',
    'productionSellPrice',
    'comments',
] as const;

export type ProductionField = typeof PRODUCTION_FIELDS[number];

/**
 * Source column names of the production line-item export.
 */
export const PRODUCTION_COLUMNS: Readonly<Record<ProductionField, string>> = {
    projectRef: 'Project Ref',
    eventName: 'Event Name',
    projectDescription: 'Project Description',
    projectOwner: 'Project Owner',
    briefRef: 'Brief Ref',
    posCode: 'POS Code',
    briefDescription: 'Brief Description',
    partUrn: 'Part URN',
    part: 'Part',
    height: 'Height',
    width: 'Width',
    coloursFront: 'Colours Front',
    coloursBack: 'Colours Back',
    material: 'Material',
    noOfPages: 'No of Pages',
    productionFinishingNotes: 'Production Finishing Notes',
    productionSupplierComments: 'Production Supplier Comments',
    allocatedQty: 'Allocated Qty',
    spares: 'Spares',
    totalIncludingSpares: 'Total including Spares',
    noOfStores: 'No of Stores',
    inStoreDeadline: 'In Store Deadline',
    contentBriefStatus: 'Content Brief Status',
    productionSupplierBriefStatus: 'Production Supplier Brief Status',
    productionSellPrice: 'Production Sell Price',
    comments: 'Comments',
};

/**
 * Column holding the derived production status note.
 */
export const PRODUCTION_STATUS_NOTE_COLUMN = 'Production Status Note';

/**
 * Zero-based index of the header row in production workbooks (row 2).
 */
export const PRODUCTION_HEADER_ROW_INDEX = 1;

/**
 * Supplier statuses meaning the line is not in production yet.
 */
export const PRE_PRODUCTION_STATUSES: ReadonlySet<string> = new Set([
    'draft',
    'saved',
    'awaiting rfq',
    'rfq responses',
    'estimates awaiting approval',
    'client approved estimates',
]);

/**
 * Content brief status values with special meaning during studio aggregation.
 */
export const CONTENT_STATUS = {
    NOT_APPLICABLE: 'not applicable',
    COMPLETED: 'completed',
} as const;

/**
 * Annotation texts attached to rows that need a human check.
 */
export const REVIEW_NOTES = {
    PRODUCTION_STATUS: 'check status/cost as line not in production yet',
    STUDIO_COMMENT: 'check all lines are approved, artwork hours may require updating',
    /** Author shown on comments attached in the invoice. */
    COMMENT_AUTHOR: 'Status',
} as const;

// ==================== TEMPLATE ====================

/**
 * Sheet names the invoice template is expected to contain.
 */
export const SHEET_NAMES = {
    STUDIO: 'Studio',
    PRINT: 'Print',
    SUMMARY_CORE: 'Event Summary - Core',
    SUMMARY_OAB: 'Event Summary - OAB',
} as const;

/**
 * Fixed coordinates and scan windows inside the template.
 */
export const TEMPLATE_LAYOUT = {
    /** Cell receiving the event name on both summary sheets. */
    EVENT_NAME_CELL: 'D4',
    /** First data row on the Studio and Print sheets. */
    FIRST_DATA_ROW: 3,
    /** Header rows whose cell styles are captured at load time. */
    STYLED_HEADER_ROWS: 3,
    /** Columns scanned when capturing header styles (exclusive bound). */
    STYLE_SCAN_COLUMNS: 50,
    /** Studio sheet clear window: rows below this bound, columns 1..14. */
    STUDIO_ROW_LIMIT: 1000,
    STUDIO_COLUMN_COUNT: 14,
    /** Print sheet clear window: rows below this bound, columns 1..29. */
    PRINT_ROW_LIMIT: 3000,
    PRINT_COLUMN_COUNT: 29,
    /** Rows of column B scanned for client names on the summary sheets. */
    CLIENT_FIRST_ROW: 7,
    CLIENT_LAST_ROW: 49,
    /** Last row referenced by the Print sheet Core/OAB lookup. */
    STUDIO_LOOKUP_LAST_ROW: 6129,
} as const;

// ==================== OUTPUT ====================

/**
 * Output MIME types keyed by file extension.
 */
export const MIME_TYPES = {
    xlsm: 'application/vnd.ms-excel.sheet.macroEnabled.12',
    xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
    csv: 'text/csv',
} as const;

/**
 * Package part holding a workbook's VBA project.
 */
export const VBA_PROJECT_PART = 'xl/vbaProject.bin';

// ==================== ERROR CONSTANTS ====================

/**
 * Classification of error types.
 */
export const ERROR_TYPES = {
    DECODE: 'DECODE_ERROR',
    READ: 'READ_ERROR',
    VALIDATION: 'VALIDATION_ERROR',
    RENDER: 'RENDER_ERROR',
    UNKNOWN: 'UNKNOWN_ERROR',
} as const;

export type ErrorType = typeof ERROR_TYPES[keyof typeof ERROR_TYPES];

/**
 * Error message configuration
 */
export interface ErrorMessageConfig {
    title: string;
    message: string;
    action: 'retry' | 'reupload' | 'none';
}

/**
 * User-facing messages and actions for each error type.
 */
export const ERROR_MESSAGES: Record<ErrorType, ErrorMessageConfig> = {
    [ERROR_TYPES.DECODE]: {
        title: 'Unreadable Timesheet',
        message: 'Unable to read the uploaded timesheet. Please upload a CSV encoded as UTF-8 or UTF-16.',
        action: 'reupload',
    },
    [ERROR_TYPES.READ]: {
        title: 'Read Error',
        message: 'The file could not be read as a table. Check that it is the expected export and try again.',
        action: 'reupload',
    },
    [ERROR_TYPES.VALIDATION]: {
        title: 'Validation Error',
        message: 'Some values were rejected. Please check your inputs and try again.',
        action: 'none',
    },
    [ERROR_TYPES.RENDER]: {
        title: 'Invoice Generation Failed',
        message: 'The invoice could not be generated from the template.',
        action: 'retry',
    },
    [ERROR_TYPES.UNKNOWN]: {
        title: 'Unexpected Error',
        message: 'An unexpected error occurred. Please try again or contact support if the issue persists.',
        action: 'none',
    },
};

// Re-export types for convenience
export type { FriendlyError };
