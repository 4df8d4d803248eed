/**
 * @fileoverview Error Classes
 * Every failure the pipeline knows about carries one of the ERROR_TYPES so the
 * top level can classify it without string matching.
 */

import { ERROR_TYPES, type ErrorType } from './constants.js';

/**
 * Base class for errors raised by the report pipeline.
 */
export class ReportError extends Error {
    readonly type: ErrorType;

    constructor(type: ErrorType, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ReportError';
        this.type = type;
    }
}

/**
 * The time entries endpoint could not be read (network failure, timeout,
 * bad status, or a body that is not a list of entries).
 */
export class FetchError extends ReportError {
    /** HTTP status, 0 when no response was received */
    readonly status: number;

    constructor(type: ErrorType, message: string, status = 0, options?: { cause?: unknown }) {
        super(type, message, options);
        this.name = 'FetchError';
        this.status = status;
    }
}

/**
 * Total hours are zero, negative or not finite, so shares cannot be computed.
 */
export class DegenerateAggregateError extends ReportError {
    readonly totalHours: number;

    constructor(totalHours: number) {
        super(
            ERROR_TYPES.DEGENERATE_DATA,
            `Cannot compute shares of a total of ${totalHours} hours`
        );
        this.name = 'DegenerateAggregateError';
        this.totalHours = totalHours;
    }
}

/**
 * An artifact could not be encoded or written.
 */
export class RenderError extends ReportError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(ERROR_TYPES.RENDER, message, options);
        this.name = 'RenderError';
    }
}

/**
 * The configuration file or an override holds an invalid value.
 */
export class ConfigError extends ReportError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(ERROR_TYPES.CONFIG, message, options);
        this.name = 'ConfigError';
    }
}
