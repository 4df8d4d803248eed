/**
 * @fileoverview Redaction of secrets and personal data
 * Shared by the logger and error reporting. The endpoint's access token
 * travels as the `code` query parameter, so URLs are scrubbed too.
 */

export const REDACTED = '[REDACTED]';

const TEXT_RULES: ReadonlyArray<readonly [RegExp, string]> = [
    [/([?&]code=)[^&\s]*/gi, `$1${REDACTED}`],
    [/(Bearer\s+)\S+/gi, `$1${REDACTED}`],
    [/((?:token|password|secret|api[_-]?key)["']?\s*[:=]\s*["']?)[^"'\s,}&]+/gi, `$1${REDACTED}`],
    [/[\w.%+-]+@[\w-]+(?:\.[\w-]+)*\.[a-z]{2,}/gi, REDACTED],
    // Long opaque strings are most likely keys
    [/[A-Za-z0-9]{32,}/g, REDACTED],
];

const SENSITIVE_KEY = /token|password|secret|key|email|dsn|^code$|^authorization$/i;

export function redactText(text: string): string {
    return TEXT_RULES.reduce((result, [pattern, replacement]) => result.replace(pattern, replacement), text);
}

/**
 * Deep copy of `value` with sensitive keys blanked and strings scrubbed.
 * Errors are returned as they are.
 */
export function redactValue(value: unknown): unknown {
    if (typeof value === 'string') return redactText(value);
    if (Array.isArray(value)) return value.map(redactValue);
    if (value instanceof Error || value === null || typeof value !== 'object') return value;
    return redactRecord(Object.fromEntries(Object.entries(value)));
}

export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(record)) {
        result[key] = SENSITIVE_KEY.test(key) ? REDACTED : redactValue(entry);
    }
    return result;
}
