/**
 * @fileoverview Utility Functions
 * Generic helpers for numeric coercion, rounding, text normalization, error
 * handling, CSV escaping, and spreadsheet addressing. These functions are pure
 * and stateless.
 */

import { CONSTANTS, ERROR_MESSAGES, ERROR_TYPES, type ErrorType, type FriendlyError } from './constants.js';
import { PipelineError, ValidationError } from './errors.js';
import type { CellValue } from './types.js';

// ==================== TYPE VALIDATION ====================

/**
 * Validates that a value is a valid number.
 * @param value - Value to validate.
 * @param field - Field name for error messages.
 * @returns The validated number.
 * @throws ValidationError if invalid.
 */
export function validateNumber(value: unknown, field: string): number {
    if (value === null || value === undefined || value === '') {
        throw new ValidationError(`${field} is required`);
    }
    const num = Number(value);
    if (isNaN(num)) {
        throw new ValidationError(`${field} must be a number`);
    }
    return num;
}

/**
 * Validates that a value is a valid string.
 * @param value - Value to validate.
 * @param field - Field name for error messages.
 * @returns The trimmed string.
 * @throws ValidationError if invalid.
 */
export function validateString(value: unknown, field: string): string {
    if (value === null || value === undefined || typeof value !== 'string') {
        throw new ValidationError(`${field} must be a non-empty string`);
    }
    const trimmed = value.trim();
    if (trimmed === '') {
        throw new ValidationError(`${field} cannot be empty`);
    }
    return trimmed;
}

/**
 * Validates that a value is one of a fixed set of options.
 * @param value - Value to validate.
 * @param options - Allowed values.
 * @param field - Field name for error messages.
 * @returns The matching option.
 * @throws ValidationError if the value is not an option.
 */
export function validateOption<T extends string>(value: unknown, options: readonly T[], field: string): T {
    const str = validateString(value, field);
    const match = options.find((option) => option === str);
    if (match === undefined) {
        throw new ValidationError(`${field} must be one of: ${options.join(', ')}`);
    }
    return match;
}

// ==================== ERROR CLASSIFICATION ====================

/**
 * Classifies an error object into a predefined category.
 *
 * @param error - The error object to classify.
 * @returns One of the ERROR_TYPES constants.
 */
export function classifyError(error: unknown): ErrorType {
    if (error instanceof PipelineError) return error.type;
    return ERROR_TYPES.UNKNOWN;
}

/**
 * Creates a structured, user-friendly error object from a raw error.
 *
 * @param error - The raw error or error message.
 * @param type - Optional explicit error type override.
 * @returns Structured error object.
 */
export function createUserFriendlyError(error: unknown, type?: ErrorType): FriendlyError {
    const errorType = type || classifyError(error);
    const errorMessage = ERROR_MESSAGES[errorType];
    const err = error instanceof Error ? error : new Error(String(error));

    return {
        type: errorType,
        title: errorMessage.title,
        message: errorMessage.message,
        action: errorMessage.action,
        detail: err.message,
        originalError: err,
        timestamp: new Date().toISOString(),
        stack: err.stack,
    };
}

// ==================== NUMERIC HELPERS ====================

/**
 * Rounds a number to a specific number of decimal places.
 * Crucial for avoiding floating point drift in currency and hour calculations.
 *
 * @param num - The number to round.
 * @param decimals - Number of decimal places.
 * @returns The rounded number.
 */
export function round(num: number, decimals = 4): number {
    if (!Number.isFinite(num)) return 0;
    const factor = Math.pow(10, decimals);
    return Math.round((num + Number.EPSILON) * factor) / factor;
}

/**
 * Rounds hours up to the smallest multiple of a quarter hour that is not below
 * them; any positive excess, however small, counts as another quarter.
 *
 * @example
 * roundUpToQuarter(1.1) // → 1.25
 * roundUpToQuarter(2) // → 2
 * roundUpToQuarter(0) // → 0
 */
export function roundUpToQuarter(hours: number): number {
    if (!Number.isFinite(hours) || hours === 0) return 0;
    const quarters = 1 / CONSTANTS.HOURS_INCREMENT;
    return Math.ceil(hours * quarters) / quarters;
}

/**
 * Coerces a cell to a finite number.
 * Numeric strings (with thousands separators or a currency sign) are parsed;
 * anything else becomes `fallback`.
 *
 * @param value - Cell value.
 * @param fallback - Value returned when coercion fails.
 */
export function toNumber(value: CellValue | undefined, fallback = 0): number {
    if (typeof value === 'number') return Number.isFinite(value) ? value : fallback;
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (typeof value !== 'string') return fallback;
    const cleaned = value.trim().replace(/^£/, '').replace(/,/g, '');
    if (cleaned === '') return fallback;
    const num = Number(cleaned);
    return Number.isFinite(num) ? num : fallback;
}

/**
 * Like `toNumber` but keeps "no value" distinct from zero.
 */
export function toNullableNumber(value: CellValue | undefined): number | null {
    const num = toNumber(value, NaN);
    return Number.isNaN(num) ? null : num;
}

// ==================== TEXT HELPERS ====================

/**
 * Converts a cell to a trimmed identifier string; empty cells become null.
 * Whole numbers are rendered without a decimal point.
 */
export function cellText(value: CellValue | undefined): string | null {
    if (value === null || value === undefined) return null;
    if (value instanceof Date) return IsoUtils.toISODate(value);
    const text = String(value).trim();
    return text === '' ? null : text;
}

/**
 * Normalizes a status cell for comparison: trimmed and lowercased.
 * Non-text cells normalize to the empty string.
 */
export function normalizeStatus(value: CellValue | undefined): string {
    return typeof value === 'string' ? value.trim().toLowerCase() : '';
}

/**
 * Returns true when a cell holds something other than blank text.
 */
export function isPresent(value: CellValue | undefined): boolean {
    if (value === null || value === undefined) return false;
    if (typeof value === 'number') return !Number.isNaN(value);
    return typeof value !== 'string' || value !== '';
}

/**
 * Converts a free-text event name into its short code.
 *
 * @example
 * convertEventToCode('Event 10 2025') // → 'E1025'
 * convertEventToCode('Event 3 2024') // → 'E0324'
 * convertEventToCode('Spring launch') // → 'E0000'
 */
export function convertEventToCode(eventName: string): string {
    const match = eventName.match(/Event\s+(\d+)\s+(\d{4})/i);
    if (!match) return CONSTANTS.FALLBACK_EVENT_CODE;
    const eventNumber = match[1].padStart(2, '0');
    const year = match[2].slice(-2);
    return `E${eventNumber}${year}`;
}

// ==================== CSV HELPERS ====================

/**
 * Escapes a value for inclusion in a CSV file.
 * Handles quotes, commas, and newlines by wrapping in double quotes.
 * Escapes existing double quotes by doubling them.
 *
 * @param str - The value to escape.
 * @returns The CSV-safe string.
 */
export function escapeCsv(str: unknown): string {
    if (str === null || str === undefined) return '';
    const stringValue = str instanceof Date ? IsoUtils.toISODate(str) : String(str);
    if (/[",\n\r]/.test(stringValue)) {
        return '"' + stringValue.replace(/"/g, '""') + '"';
    }
    return stringValue;
}

/** Formula trigger, possibly behind apostrophes that are part of the text */
const FORMULA_PREFIX_PATTERN = /^'*[=+\-@\t\r]/;

/**
 * Sanitizes a text cell to prevent CSV formula injection.
 * If a field starts with =, +, -, @, tab, or carriage return, Excel might execute it,
 * so a single quote is prepended. Text that already has apostrophes before such a
 * character gets one more, so `restoreFormulaText` can always take exactly one off.
 *
 * @example
 * sanitizeFormulaInjection('=SUM(A1)') // → "'=SUM(A1)"
 * sanitizeFormulaInjection("'=SUM(A1)") // → "''=SUM(A1)"
 * sanitizeFormulaInjection("'quoted") // → "'quoted"
 */
export function sanitizeFormulaInjection(str: string | null | undefined): string {
    if (!str) return '';
    if (FORMULA_PREFIX_PATTERN.test(str)) {
        return "'" + str;
    }
    return str;
}

/**
 * Reverses `sanitizeFormulaInjection` for text read back from an export.
 */
export function restoreFormulaText(str: string): string {
    return str.startsWith("'") && FORMULA_PREFIX_PATTERN.test(str) ? str.slice(1) : str;
}

// ==================== SPREADSHEET ADDRESSING ====================

/**
 * Converts a 1-based column number to its letter (1 → A, 27 → AA).
 */
export function columnLetter(column: number): string {
    let n = column;
    let letters = '';
    while (n > 0) {
        const rem = (n - 1) % 26;
        letters = String.fromCharCode(65 + rem) + letters;
        n = Math.floor((n - 1) / 26);
    }
    return letters;
}

/**
 * Builds an A1-style address from 1-based row and column numbers.
 */
export function cellAddress(row: number, column: number): string {
    return `${columnLetter(column)}${row}`;
}

/**
 * Splits an A1-style address into 1-based row and column numbers.
 *
 * @example
 * parseCellAddress('AA12') // → { row: 12, column: 27 }
 */
export function parseCellAddress(address: string): { row: number; column: number } {
    const match = /^\$?([A-Z]+)\$?(\d+)$/i.exec(address.trim());
    if (!match) {
        throw new Error(`Invalid cell address: ${address}`);
    }
    let column = 0;
    for (const letter of match[1].toUpperCase()) {
        column = column * 26 + (letter.charCodeAt(0) - 64);
    }
    return { row: Number(match[2]), column };
}

// ==================== FORMATTING ====================

/**
 * Formats a number as a currency string.
 *
 * @param amount - The amount to format.
 * @param currency - Currency code.
 * @returns Formatted currency string.
 */
export function formatCurrency(amount: number, currency: string = CONSTANTS.CURRENCY): string {
    const safeAmount = Number.isFinite(amount) ? amount : 0;
    try {
        return new Intl.NumberFormat('en-GB', { style: 'currency', currency }).format(safeAmount);
    } catch {
        return `${currency} ${safeAmount.toFixed(2)}`;
    }
}

/**
 * Formats decimal hours into a fixed two-decimal string (e.g., "8.50").
 *
 * @param hours - Decimal hours.
 * @param decimals - Decimal places.
 * @returns Formatted decimal string.
 */
export function formatHoursDecimal(hours: number | null | undefined, decimals = 2): string {
    if (hours == null || isNaN(hours)) return '0.00';
    return round(hours, decimals).toFixed(decimals);
}

export const IsoUtils = {
    /**
     * Converts a Date object to an ISO date string (YYYY-MM-DD).
     * Uses UTC methods to prevent local timezone shifts from changing the date.
     */
    toISODate(date: Date | null | undefined): string {
        if (!date || isNaN(date.getTime())) return '';
        const y = date.getUTCFullYear();
        const m = String(date.getUTCMonth() + 1).padStart(2, '0');
        const d = String(date.getUTCDate()).padStart(2, '0');
        return `${y}-${m}-${d}`;
    },

    /**
     * Converts a Date object to a compact local date stamp (YYYYMMDD) for file names.
     */
    toCompactDate(date: Date): string {
        const y = date.getFullYear();
        const m = String(date.getMonth() + 1).padStart(2, '0');
        const d = String(date.getDate()).padStart(2, '0');
        return `${y}${m}${d}`;
    },
};
