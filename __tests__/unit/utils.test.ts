import { describe, it, expect } from '@jest/globals';
import { ERROR_TYPES } from '../../js/constants.js';
import { DegenerateAggregateError, FetchError, ReportError } from '../../js/errors.js';
import {
    classifyError,
    createUserFriendlyError,
    escapeHtml,
    formatHoursDecimal,
    formatPercentage,
    normalizeTimestamp,
    parseTimeEntry,
    round,
    validateBoolean,
    validateNonNegativeInteger,
    validateString,
    validateTimestamp,
} from '../../js/utils.js';
import { createRawEntry } from '../helpers/mock-api.js';

function withStatus(status: number): Error {
    return Object.assign(new Error(`status ${status}`), { status });
}

describe('validators', () => {
    it('trims strings and rejects blanks', () => {
        expect(validateString('  Ann  ', 'name')).toBe('Ann');
        expect(() => validateString('   ', 'name')).toThrow('name cannot be empty');
        expect(() => validateString(42, 'name')).toThrow('name must be a non-empty string');
    });

    it('accepts non-negative integers only', () => {
        expect(validateNonNegativeInteger('3', 'retries')).toBe(3);
        expect(validateNonNegativeInteger(0, 'retries')).toBe(0);
        expect(() => validateNonNegativeInteger(1.5, 'retries')).toThrow('retries must be a non-negative integer');
        expect(() => validateNonNegativeInteger('many', 'retries')).toThrow('retries must be a number');
    });

    it('reads boolean flags', () => {
        expect(validateBoolean(true, 'debug')).toBe(true);
        expect(validateBoolean('1', 'debug')).toBe(true);
        expect(validateBoolean('FALSE', 'debug')).toBe(false);
        expect(() => validateBoolean('yes', 'debug')).toThrow('debug must be a boolean');
    });

    it('raises validation errors', () => {
        expect(() => validateString(null, 'name')).toThrow(ReportError);
    });
});

describe('timestamps', () => {
    it('reads zone-less timestamps as UTC', () => {
        expect(normalizeTimestamp('2024-03-04T09:00:00')).toBe('2024-03-04T09:00:00Z');
        expect(normalizeTimestamp('2024-03-04 09:00:00')).toBe('2024-03-04T09:00:00Z');
        expect(normalizeTimestamp('2024-03-04')).toBe('2024-03-04T00:00:00Z');
    });

    it('keeps an explicit zone', () => {
        expect(normalizeTimestamp('2024-03-04T09:00:00Z')).toBe('2024-03-04T09:00:00Z');
        expect(normalizeTimestamp('2024-03-04T09:00:00+02:00')).toBe('2024-03-04T09:00:00+02:00');
        expect(validateTimestamp('2024-03-04T09:00:00+02:00', 'Start time').toISOString()).toBe(
            '2024-03-04T07:00:00.000Z'
        );
    });

    it('keeps fractional seconds', () => {
        expect(validateTimestamp('2024-03-04T09:00:00.250', 'Start time').toISOString()).toBe('2024-03-04T09:00:00.250Z');
    });

    it('rejects non-ISO and impossible timestamps', () => {
        expect(() => validateTimestamp('03/04/2024', 'Start time')).toThrow('Start time must be an ISO timestamp');
        expect(() => validateTimestamp('2024-13-45', 'Start time')).toThrow('Start time is not a valid timestamp');
    });
});

describe('parseTimeEntry', () => {
    it('converts a wire record', () => {
        expect(parseTimeEntry(createRawEntry({ EntryNotes: null }))).toEqual({
            employeeName: 'Alice Example',
            startUtc: new Date('2024-03-04T09:00:00Z'),
            endUtc: new Date('2024-03-04T17:00:00Z'),
            notes: '',
            deletedOn: null,
        });
    });

    it('keeps the employee name exactly as sent', () => {
        expect(parseTimeEntry(createRawEntry({ EmployeeName: '  Ann  ' })).employeeName).toBe('  Ann  ');
        expect(parseTimeEntry(createRawEntry({ EmployeeName: '' })).employeeName).toBe('');
    });

    it('reads a null or missing employee name as empty', () => {
        expect(parseTimeEntry(createRawEntry({ EmployeeName: null })).employeeName).toBe('');
        expect(parseTimeEntry(createRawEntry({ EmployeeName: undefined })).employeeName).toBe('');
    });

    it('rejects a name that is not a string', () => {
        expect(() => parseTimeEntry(createRawEntry({ EmployeeName: 42 }))).toThrow('Employee name must be a string');
    });

    it('names the invalid time field', () => {
        expect(() => parseTimeEntry(createRawEntry({ EndTimeUtc: 17 }))).toThrow('End time must be a non-empty string');
        expect(() => parseTimeEntry(createRawEntry({ StarTimeUtc: undefined }))).toThrow(
            'Start time must be a non-empty string'
        );
    });

    it('rejects a non-object', () => {
        expect(() => parseTimeEntry([])).toThrow('Time entry must be an object');
    });
});

describe('classifyError', () => {
    it('uses the type carried by pipeline errors', () => {
        expect(classifyError(new FetchError(ERROR_TYPES.AUTH, 'denied', 401))).toBe(ERROR_TYPES.AUTH);
        expect(classifyError(new DegenerateAggregateError(0))).toBe(ERROR_TYPES.DEGENERATE_DATA);
    });

    it('recognizes network failures', () => {
        expect(classifyError(new TypeError('fetch failed'))).toBe(ERROR_TYPES.NETWORK);
        const abort = new Error('aborted');
        abort.name = 'AbortError';
        expect(classifyError(abort)).toBe(ERROR_TYPES.NETWORK);
    });

    it('maps statuses', () => {
        expect(classifyError(withStatus(403))).toBe(ERROR_TYPES.AUTH);
        expect(classifyError(withStatus(422))).toBe(ERROR_TYPES.VALIDATION);
        expect(classifyError(withStatus(503))).toBe(ERROR_TYPES.API);
    });

    it('treats unparsable JSON as a validation failure', () => {
        expect(classifyError(new SyntaxError('Unexpected token'))).toBe(ERROR_TYPES.VALIDATION);
    });

    it('falls back to unknown', () => {
        expect(classifyError(new Error('odd'))).toBe(ERROR_TYPES.UNKNOWN);
        expect(classifyError('odd')).toBe(ERROR_TYPES.UNKNOWN);
        expect(classifyError(null)).toBe(ERROR_TYPES.UNKNOWN);
    });
});

describe('createUserFriendlyError', () => {
    it('pairs the error with its title and message', () => {
        const friendly = createUserFriendlyError(new DegenerateAggregateError(0));

        expect(friendly.type).toBe(ERROR_TYPES.DEGENERATE_DATA);
        expect(friendly.title).toBe('Degenerate Data');
        expect(friendly.detail).toBe('Cannot compute shares of a total of 0 hours');
    });

    it('wraps non-error values', () => {
        const friendly = createUserFriendlyError('boom');

        expect(friendly.type).toBe(ERROR_TYPES.UNKNOWN);
        expect(friendly.detail).toBe('boom');
        expect(friendly.originalError).toBeInstanceOf(Error);
    });

    it('honours an explicit type', () => {
        expect(createUserFriendlyError(new Error('x'), ERROR_TYPES.RENDER).title).toBe('Render Error');
    });
});

describe('formatting', () => {
    it('rounds to the requested decimals', () => {
        expect(round(12.3456, 2)).toBe(12.35);
        expect(round(Number.NaN, 2)).toBe(0);
    });

    it('rounds negative halves away from zero like positive ones', () => {
        expect(round(2.5, 0)).toBe(3);
        expect(round(-2.5, 0)).toBe(-3);
        expect(round(0.125, 2)).toBe(0.13);
        expect(round(-0.125, 2)).toBe(-0.13);
    });

    it('formats hours', () => {
        expect(formatHoursDecimal(8)).toBe('8.00');
        expect(formatHoursDecimal(7.5, 1)).toBe('7.5');
        expect(formatHoursDecimal(null)).toBe('0.00');
        expect(formatHoursDecimal(-2.5)).toBe('-2.50');
        expect(formatHoursDecimal(-0.125)).toBe('-0.13');
        expect(formatHoursDecimal(-0.001)).toBe('0.00');
    });

    it('formats percentages with one decimal', () => {
        expect(formatPercentage(100)).toBe('100.0%');
        expect(formatPercentage(100 / 3)).toBe('33.3%');
    });

    it('escapes HTML', () => {
        expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
            '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#039;s&lt;/a&gt;'
        );
        expect(escapeHtml(null)).toBe('');
    });
});
