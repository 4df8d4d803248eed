/**
 * @fileoverview Utility Functions
 * Generic helpers for validation, error handling, formatting, and timestamp
 * parsing. These functions are pure and stateless.
 */

import { ERROR_MESSAGES, ERROR_TYPES, type ErrorType } from './constants.js';
import { ReportError } from './errors.js';
import type { FriendlyError, TimeEntry } from './types.js';

// ==================== TYPE VALIDATION ====================

/**
 * Extended error with status code
 */
interface ErrorWithStatus extends Error {
    status?: number;
}

/**
 * Creates a validation error.
 * @param message - The error message.
 * @returns The structured error.
 */
function createValidationError(message: string): ReportError {
    return new ReportError(ERROR_TYPES.VALIDATION, message);
}

/**
 * Narrows an unknown value to a plain record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a valid number.
 * @param value - Value to validate.
 * @param field - Field name for error messages.
 * @returns The validated number.
 * @throws ReportError with VALIDATION type if invalid.
 */
export function validateNumber(value: unknown, field: string): number {
    if (value === null || value === undefined || value === '') {
        throw createValidationError(`${field} is required`);
    }
    const num = Number(value);
    if (isNaN(num)) {
        throw createValidationError(`${field} must be a number`);
    }
    return num;
}

/**
 * Validates that a value is a non-negative integer.
 * @throws ReportError with VALIDATION type if invalid.
 */
export function validateNonNegativeInteger(value: unknown, field: string): number {
    const num = validateNumber(value, field);
    if (!Number.isInteger(num) || num < 0) {
        throw createValidationError(`${field} must be a non-negative integer`);
    }
    return num;
}

/**
 * Validates that a value is a valid string.
 * @param value - Value to validate.
 * @param field - Field name for error messages.
 * @returns The trimmed string.
 * @throws ReportError with VALIDATION type if invalid.
 */
export function validateString(value: unknown, field: string): string {
    if (value === null || value === undefined || typeof value !== 'string') {
        throw createValidationError(`${field} must be a non-empty string`);
    }
    const trimmed = value.trim();
    if (trimmed === '') {
        throw createValidationError(`${field} cannot be empty`);
    }
    return trimmed;
}

/**
 * Validates a boolean-ish flag ("true", "1", true).
 */
export function validateBoolean(value: unknown, field: string): boolean {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') {
        const lower = value.trim().toLowerCase();
        if (lower === 'true' || lower === '1') return true;
        if (lower === 'false' || lower === '0' || lower === '') return false;
    }
    throw createValidationError(`${field} must be a boolean`);
}

// ==================== TIMESTAMPS ====================

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Normalizes an endpoint timestamp to an ISO 8601 string with a zone.
 * A space between date and time becomes `T`; a timestamp with no zone
 * designator is read as UTC.
 */
export function normalizeTimestamp(value: string): string {
    const trimmed = value.trim();
    if (DATE_ONLY.test(trimmed)) {
        return `${trimmed}T00:00:00Z`;
    }
    const spacedMatch = trimmed.match(/^(\d{4}-\d{2}-\d{2})\s+(.+)$/);
    const withT = spacedMatch ? `${spacedMatch[1]}T${spacedMatch[2]}` : trimmed;
    return ZONE_SUFFIX.test(withT) ? withT : `${withT}Z`;
}

/**
 * Validates a timestamp string and converts it to a Date.
 * @throws ReportError with VALIDATION type if invalid.
 */
export function validateTimestamp(value: unknown, field: string): Date {
    const str = validateString(value, field);

    if (!/^\d{4}-\d{2}-\d{2}/.test(str)) {
        throw createValidationError(`${field} must be an ISO timestamp`);
    }

    const date = new Date(normalizeTimestamp(str));
    if (isNaN(date.getTime())) {
        throw createValidationError(`${field} is not a valid timestamp`);
    }

    return date;
}

// ==================== TIME ENTRY PARSING ====================

/**
 * Accepted spellings for each endpoint field, compared case-insensitively.
 */
const ENTRY_FIELDS = {
    employeeName: ['employeename'],
    start: ['startimeutc', 'starttimeutc'],
    end: ['endtimeutc'],
    notes: ['entrynotes'],
    deletedOn: ['deletedon'],
} as const;

function pickField(record: Record<string, unknown>, candidates: readonly string[]): unknown {
    for (const [key, value] of Object.entries(record)) {
        if (candidates.includes(key.toLowerCase())) {
            return value;
        }
    }
    return undefined;
}

/**
 * The grouping key, exactly as sent. A missing or null name groups as ''.
 */
function readEmployeeName(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (typeof value !== 'string') {
        throw createValidationError('Employee name must be a string');
    }
    return value;
}

/**
 * Validates one raw endpoint record and converts it to a TimeEntry.
 *
 * @param raw - One element of the endpoint's JSON array.
 * @returns The parsed entry.
 * @throws ReportError with VALIDATION type if a required field is missing or invalid.
 */
export function parseTimeEntry(raw: unknown): TimeEntry {
    if (!isRecord(raw)) {
        throw createValidationError('Time entry must be an object');
    }

    const employeeName = readEmployeeName(pickField(raw, ENTRY_FIELDS.employeeName));
    const startUtc = validateTimestamp(pickField(raw, ENTRY_FIELDS.start), 'Start time');
    const endUtc = validateTimestamp(pickField(raw, ENTRY_FIELDS.end), 'End time');

    const rawNotes = pickField(raw, ENTRY_FIELDS.notes);
    const notes = typeof rawNotes === 'string' ? rawNotes : '';

    const rawDeletedOn = pickField(raw, ENTRY_FIELDS.deletedOn);
    const deletedOn =
        rawDeletedOn === null || rawDeletedOn === undefined
            ? null
            : validateTimestamp(rawDeletedOn, 'Deletion time');

    return { employeeName, startUtc, endUtc, notes, deletedOn };
}

// ==================== ERROR CLASSIFICATION ====================

/**
 * Classifies an error object into a predefined category.
 * Used to determine retry logic and user-facing error messages.
 *
 * @param error - The error object to classify.
 * @returns One of the ERROR_TYPES constants.
 */
export function classifyError(error: unknown): ErrorType {
    if (!error) return ERROR_TYPES.UNKNOWN;

    if (error instanceof ReportError) {
        return error.type;
    }

    if (!(error instanceof Error)) return ERROR_TYPES.UNKNOWN;

    const err: ErrorWithStatus = error;

    // Network errors (fetch failures, timeouts)
    if (err.name === 'TypeError' && err.message?.includes('fetch')) {
        return ERROR_TYPES.NETWORK;
    }
    if (err.name === 'AbortError' || err.name === 'TimeoutError') {
        return ERROR_TYPES.NETWORK;
    }
    if (err.name === 'SyntaxError') {
        return ERROR_TYPES.VALIDATION;
    }

    // HTTP status based errors (if attached to the error object)
    if (err.status === 401 || err.status === 403) {
        return ERROR_TYPES.AUTH;
    }
    if (err.status && err.status >= 400 && err.status < 500) {
        return ERROR_TYPES.VALIDATION;
    }
    if (err.status && err.status >= 500) {
        return ERROR_TYPES.API;
    }

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
        detail: err.message,
        originalError: err,
        timestamp: new Date().toISOString(),
        stack: err.stack,
    };
}

// ==================== GENERIC HELPERS ====================

/**
 * Rounds a number to a specific number of decimal places.
 * Symmetric around zero, so -0.125 rounds to -0.13 as 0.125 rounds to 0.13.
 *
 * @param num - The number to round.
 * @param decimals - Number of decimal places.
 * @returns The rounded number.
 */
export function round(num: number, decimals = 4): number {
    if (!Number.isFinite(num)) return 0;
    const factor = Math.pow(10, decimals);
    return (Math.sign(num) * Math.round(Math.abs(num) * factor)) / factor;
}

/**
 * Escapes HTML special characters to prevent XSS.
 *
 * @param str - The input string.
 * @returns Escaped string safe for HTML insertion.
 */
export function escapeHtml(str: string | null | undefined): string {
    if (!str) return '';
    return String(str)
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#039;');
}

/**
 * Formats decimal hours as a fixed-decimal string (e.g., "8.50").
 *
 * @param hours - Decimal hours.
 * @param decimals - Decimal places.
 * @returns Formatted decimal string.
 */
export function formatHoursDecimal(hours: number | null | undefined, decimals = 2): string {
    if (hours == null || isNaN(hours)) return (0).toFixed(decimals);
    return round(hours, decimals).toFixed(decimals);
}

/**
 * Formats a percentage with one decimal place and a percent sign ("23.4%").
 */
export function formatPercentage(percentage: number): string {
    return `${round(percentage, 1).toFixed(1)}%`;
}
