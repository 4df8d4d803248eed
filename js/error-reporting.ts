/**
 * @fileoverview Error Reporting Module
 * Optional Sentry reporting. Nothing is sent unless a real DSN is configured,
 * and every event is scrubbed of the access token, credentials and email
 * addresses before it leaves the process. The endpoint host is attached only
 * as a hash.
 */

import * as Sentry from '@sentry/node';
import type { NodeOptions } from '@sentry/node';
import { createLogger } from './logger.js';
import { redactRecord, redactText } from './redact.js';

const logger = createLogger('ErrorReporting');

export interface ErrorReportingOptions {
    dsn: string;
    environment: string;
    /** `name@version` */
    release: string;
    /** Only a hash of its host is attached to events */
    apiUrl?: string;
}

export interface ReportContext {
    module?: string;
    operation?: string;
    metadata?: Record<string, unknown>;
    /** The line printed to the user */
    userMessage?: string;
}

type Severity = 'fatal' | 'error' | 'warning' | 'info';
type BeforeSend = NonNullable<NodeOptions['beforeSend']>;

let enabled = false;

const scrubEvent: BeforeSend = (event) => {
    for (const exception of event.exception?.values ?? []) {
        if (exception.value) {
            exception.value = redactText(exception.value);
        }
    }
    for (const breadcrumb of event.breadcrumbs ?? []) {
        if (breadcrumb.message) {
            breadcrumb.message = redactText(breadcrumb.message);
        }
        if (breadcrumb.data) {
            breadcrumb.data = redactRecord(breadcrumb.data);
        }
    }
    if (event.request?.url) {
        event.request.url = redactText(event.request.url);
    }
    if (typeof event.request?.query_string === 'string') {
        event.request.query_string = redactText(event.request.query_string);
    }
    if (event.extra) {
        event.extra = redactRecord(event.extra);
    }
    return event;
};

/** 32-bit FNV-1a, hex */
function fnv1a(text: string): string {
    let hash = 0x811c9dc5;
    for (let i = 0; i < text.length; i++) {
        hash ^= text.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return (hash >>> 0).toString(16);
}

function endpointHostHash(apiUrl: string | undefined): string | null {
    if (!apiUrl || !URL.canParse(apiUrl)) return null;
    return fnv1a(new URL(apiUrl).host.toLowerCase());
}

/**
 * Starts Sentry when `dsn` is a real value. Empty and `__PLACEHOLDER__` DSNs
 * leave reporting off.
 *
 * @returns Whether reporting is on.
 */
export function initErrorReporting(options: ErrorReportingOptions): boolean {
    if (enabled) return true;
    if (!options.dsn || options.dsn.startsWith('__')) return false;

    Sentry.init({
        dsn: options.dsn,
        environment: options.environment,
        release: options.release,
        beforeSend: scrubEvent,
        ignoreErrors: ['AbortError'],
    });

    const hostHash = endpointHostHash(options.apiUrl);
    if (hostHash) {
        Sentry.setTag('endpoint_host', hostHash);
    }

    enabled = true;
    return true;
}

/**
 * Sends an error with its context. No-op while reporting is off.
 */
export function reportError(error: Error, context: ReportContext = {}): void {
    if (!enabled) return;

    try {
        Sentry.withScope((scope) => {
            if (context.module) scope.setTag('module', context.module);
            if (context.operation) scope.setTag('operation', context.operation);
            if (context.metadata) scope.setExtras(redactRecord(context.metadata));
            if (context.userMessage) scope.setExtra('user_message', redactText(context.userMessage));
            Sentry.captureException(error);
        });
    } catch (sentryError) {
        logger.warn('Failed to report error', sentryError);
    }
}

/**
 * Sends a non-error event. No-op while reporting is off.
 */
export function reportMessage(message: string, level: Severity, context: Omit<ReportContext, 'userMessage'> = {}): void {
    if (!enabled) return;

    try {
        Sentry.withScope((scope) => {
            scope.setLevel(level);
            if (context.module) scope.setTag('module', context.module);
            if (context.operation) scope.setTag('operation', context.operation);
            if (context.metadata) scope.setExtras(redactRecord(context.metadata));
            Sentry.captureMessage(redactText(message));
        });
    } catch (sentryError) {
        logger.warn('Failed to report message', sentryError);
    }
}

export function addBreadcrumb(category: string, message: string, data?: Record<string, unknown>): void {
    if (!enabled) return;
    Sentry.addBreadcrumb({
        category,
        level: 'info',
        message: redactText(message),
        data: data ? redactRecord(data) : undefined,
    });
}

/**
 * Waits for queued events; call before the process exits.
 * @returns false when the queue did not drain in time.
 */
export async function flushErrorReports(timeoutMs = 2000): Promise<boolean> {
    if (!enabled) return true;
    return Sentry.flush(timeoutMs);
}
