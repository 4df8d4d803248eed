/**
 * @fileoverview API Interaction Module
 * Reads time entries from the configured HTTP endpoint.
 *
 * The client is created once per run and disposed when the run ends;
 * disposing aborts any request still in flight. Failed requests are not
 * retried unless `maxRetries` is raised, and 401/403/404 are never retried.
 */

import { ERROR_TYPES, HARD_MAX_RETRIES } from './constants.js';
import { FetchError } from './errors.js';
import { createLogger } from './logger.js';
import { classifyError, parseTimeEntry } from './utils.js';
import type { ApiResponse, AppConfig, TimeEntriesClient, TimeEntry } from './types.js';

const logger = createLogger('Api');

// ==================== TYPE DEFINITIONS ====================

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Collaborators the client can be given instead of the globals.
 */
export interface ClientDependencies {
    fetch?: FetchLike;
    /** Waits between retries */
    delay?: (ms: number) => Promise<void>;
}

export type ClientConfig = Pick<AppConfig, 'apiUrl' | 'accessToken' | 'requestTimeoutMs' | 'maxRetries'>;

/**
 * Error with the HTTP status that caused it
 */
class HttpStatusError extends Error {
    readonly status: number;

    constructor(status: number) {
        super(`API Error: ${status}`);
        this.name = 'HttpStatusError';
        this.status = status;
    }
}

const defaultDelay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

// ==================== URL RESOLUTION ====================

/**
 * Builds the request URL, attaching the access token as the `code` parameter.
 */
export function buildEntriesUrl(apiUrl: string, accessToken: string): string {
    let url: URL;
    try {
        url = new URL(apiUrl);
    } catch (error) {
        throw new FetchError(ERROR_TYPES.VALIDATION, `Invalid API URL: ${apiUrl}`, 0, { cause: error });
    }
    if (accessToken) {
        url.searchParams.set('code', accessToken);
    }
    return url.toString();
}

// ==================== RESPONSE PARSING ====================

/**
 * Converts the endpoint's JSON body into entries. Records that fail
 * validation are skipped with a warning.
 *
 * @throws FetchError with VALIDATION type when the body is not an array.
 */
export function parseEntriesResponse(body: unknown): TimeEntry[] {
    if (!Array.isArray(body)) {
        throw new FetchError(ERROR_TYPES.VALIDATION, 'Expected a JSON array of time entries');
    }

    const entries: TimeEntry[] = [];
    let skipped = 0;
    body.forEach((raw: unknown, index) => {
        try {
            entries.push(parseTimeEntry(raw));
        } catch (error) {
            skipped++;
            logger.warn(`Skipping time entry #${index}: ${error instanceof Error ? error.message : String(error)}`);
        }
    });

    if (skipped > 0) {
        logger.warn(`Skipped ${skipped} of ${body.length} time entries that failed validation`);
    }
    return entries;
}

// ==================== CLIENT ====================

/**
 * Creates the time entries client.
 *
 * @param config - Endpoint, token, timeout and retry settings.
 * @param deps - Optional replacements for `fetch` and the retry delay.
 */
export function createTimeEntriesClient(config: ClientConfig, deps: ClientDependencies = {}): TimeEntriesClient {
    const fetchImpl: FetchLike = deps.fetch ?? ((input, init) => fetch(input, init));
    const delay = deps.delay ?? defaultDelay;
    const retries = Math.min(Math.max(config.maxRetries, 0), HARD_MAX_RETRIES);
    const active = new Set<AbortController>();
    let disposed = false;

    /**
     * One GET with a timeout. Returns the parsed JSON body or a failure record.
     */
    async function getJson<T>(url: string): Promise<ApiResponse<T>> {
        for (let attempt = 0; attempt <= retries; attempt++) {
            if (disposed) {
                return { data: null, failed: true, status: 0, error: new Error('Client disposed') };
            }

            const controller = new AbortController();
            const timer = setTimeout(() => controller.abort(), config.requestTimeoutMs);
            active.add(controller);

            try {
                const response = await fetchImpl(url, {
                    method: 'GET',
                    headers: { Accept: 'application/json' },
                    signal: controller.signal,
                });

                // Invalid token, permissions or a missing resource: retrying will not help
                if (response.status === 401 || response.status === 403 || response.status === 404) {
                    return { data: null, failed: true, status: response.status, error: new HttpStatusError(response.status) };
                }

                if (response.status === 429 && attempt < retries) {
                    const retryAfterHeader = response.headers.get('Retry-After');
                    let waitMs = 5000;
                    if (retryAfterHeader) {
                        const seconds = parseInt(retryAfterHeader, 10);
                        if (!isNaN(seconds)) {
                            waitMs = seconds * 1000;
                        }
                    }
                    logger.warn(`Rate limit exceeded (attempt ${attempt + 1}/${retries + 1}). Retrying after ${waitMs}ms`);
                    await delay(waitMs);
                    continue;
                }

                if (!response.ok) {
                    throw new HttpStatusError(response.status);
                }

                const text = await response.text();
                const data: T = JSON.parse(text);
                return { data, failed: false, status: response.status };
            } catch (error) {
                const err = error instanceof Error ? error : new Error(String(error));
                const status = err instanceof HttpStatusError ? err.status : 0;
                const errorType = classifyError(err);

                // Auth and validation errors (bad request, unparsable body) are final
                if (errorType === ERROR_TYPES.AUTH || errorType === ERROR_TYPES.VALIDATION) {
                    logger.error(`Fetch error (not retryable): ${errorType}`, err.message);
                    return { data: null, failed: true, status, error: err };
                }

                if (attempt < retries && !disposed) {
                    const backoffTime = Math.pow(2, attempt) * 1000; // 1s, 2s, 4s...
                    logger.warn(`Retry ${attempt + 1}/${retries} after ${backoffTime}ms: ${err.message}`);
                    await delay(backoffTime);
                    continue;
                }

                logger.error('Fetch error after retries:', err.message);
                return { data: null, failed: true, status, error: err };
            } finally {
                clearTimeout(timer);
                active.delete(controller);
            }
        }

        return { data: null, failed: true, status: 0 };
    }

    return {
        /**
         * Fetches and validates every time entry.
         * @throws FetchError when the endpoint cannot be read or returns a non-array body.
         */
        async fetchEntries(): Promise<TimeEntry[]> {
            const url = buildEntriesUrl(config.apiUrl, config.accessToken);
            logger.debug(`Fetching time entries from ${new URL(url).host}`);

            const { data, failed, status, error } = await getJson<unknown>(url);
            if (failed) {
                const type = error ? classifyError(error) : ERROR_TYPES.NETWORK;
                const reason = error?.name === 'AbortError' ? 'request timed out or was aborted' : error?.message ?? 'request failed';
                throw new FetchError(
                    type === ERROR_TYPES.UNKNOWN ? ERROR_TYPES.NETWORK : type,
                    `Error fetching data: ${reason}`,
                    status,
                    { cause: error }
                );
            }

            const entries = parseEntriesResponse(data);
            logger.info(`Fetched ${entries.length} time entries`);
            return entries;
        },

        dispose(): void {
            disposed = true;
            for (const controller of active) {
                controller.abort();
            }
            active.clear();
        },
    };
}
