/**
 * @fileoverview Pipeline Error Classes
 * Typed errors raised by the pipeline stages. Each carries an ERROR_TYPES code so
 * `createUserFriendlyError()` can map it to a user-facing message.
 */

import { ERROR_TYPES, type ErrorType } from './constants.js';

/**
 * Base class for every error the pipeline raises on purpose.
 */
export class PipelineError extends Error {
    readonly type: ErrorType;

    constructor(type: ErrorType, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PipelineError';
        this.type = type;
    }
}

/**
 * No fallback encoding could decode the timesheet.
 */
export class DecodeError extends PipelineError {
    /** Encodings tried, in order */
    readonly attempted: readonly string[];

    constructor(attempted: readonly string[], options?: { cause?: unknown }) {
        super(ERROR_TYPES.DECODE, `Unable to decode input as any of: ${attempted.join(', ')}`, options);
        this.name = 'DecodeError';
        this.attempted = attempted;
    }
}

/**
 * A table or workbook could not be read.
 */
export class ReadError extends PipelineError {
    /** Label of the input that failed (file name or description) */
    readonly source: string;

    constructor(source: string, message: string, options?: { cause?: unknown }) {
        super(ERROR_TYPES.READ, `${source}: ${message}`, options);
        this.name = 'ReadError';
        this.source = source;
    }
}

/**
 * A user-supplied value was rejected.
 */
export class ValidationError extends PipelineError {
    constructor(message: string) {
        super(ERROR_TYPES.VALIDATION, message);
        this.name = 'ValidationError';
    }
}

/**
 * Populating or saving the invoice workbook failed.
 */
export class RenderError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(ERROR_TYPES.RENDER, message, options);
        this.name = 'RenderError';
    }
}
