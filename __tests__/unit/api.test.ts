import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { aggregate } from '../../js/aggregate.js';
import { buildEntriesUrl, createTimeEntriesClient, parseEntriesResponse, type FetchLike } from '../../js/api.js';
import { ERROR_TYPES } from '../../js/constants.js';
import { FetchError } from '../../js/errors.js';
import { silenceLogs } from '../helpers/console.js';
import { createRawEntry, mockFetch } from '../helpers/mock-api.js';

const API_URL = 'https://entries.test/api/time-entries';

const baseConfig = {
    apiUrl: API_URL,
    accessToken: 'test-token',
    requestTimeoutMs: 5000,
    maxRetries: 0,
};

function noDelay() {
    return jest.fn(async (_ms: number) => {});
}

async function catchFetchError(promise: Promise<unknown>): Promise<FetchError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof FetchError) return error;
        throw error;
    }
    throw new Error('Expected a FetchError');
}

beforeEach(() => {
    silenceLogs();
});

afterEach(() => {
    jest.restoreAllMocks();
});

describe('buildEntriesUrl', () => {
    it('attaches the access token as the code parameter', () => {
        expect(buildEntriesUrl(API_URL, 'test-token')).toBe('https://entries.test/api/time-entries?code=test-token');
    });

    it('keeps existing query parameters', () => {
        expect(buildEntriesUrl(`${API_URL}?page=2`, 'test-token')).toBe(
            'https://entries.test/api/time-entries?page=2&code=test-token'
        );
    });

    it('leaves the URL alone without a token', () => {
        expect(buildEntriesUrl(API_URL, '')).toBe(API_URL);
    });

    it('rejects an unparsable URL', () => {
        expect(() => buildEntriesUrl('not a url', 'test-token')).toThrow(FetchError);
    });
});

describe('parseEntriesResponse', () => {
    it('parses wire records, reading zone-less times as UTC', () => {
        const [entry] = parseEntriesResponse([createRawEntry()]);

        expect(entry.employeeName).toBe('Alice Example');
        expect(entry.startUtc.toISOString()).toBe('2024-03-04T09:00:00.000Z');
        expect(entry.endUtc.toISOString()).toBe('2024-03-04T17:00:00.000Z');
        expect(entry.notes).toBe('Planning');
        expect(entry.deletedOn).toBeNull();
    });

    it('accepts the StartTimeUtc spelling and any key casing', () => {
        const [entry] = parseEntriesResponse([
            {
                employeename: 'Bob Example',
                STARTTIMEUTC: '2024-03-04 08:30:00',
                endTimeUtc: '2024-03-04T10:00:00Z',
            },
        ]);

        expect(entry.employeeName).toBe('Bob Example');
        expect(entry.startUtc.toISOString()).toBe('2024-03-04T08:30:00.000Z');
        expect(entry.notes).toBe('');
    });

    it('parses a deletion time', () => {
        const [entry] = parseEntriesResponse([createRawEntry({ DeletedOn: '2024-03-06T12:00:00Z' })]);
        expect(entry.deletedOn?.toISOString()).toBe('2024-03-06T12:00:00.000Z');
    });

    it('skips records that fail validation', () => {
        const entries = parseEntriesResponse([
            createRawEntry({ EmployeeName: ['Bob'] }),
            createRawEntry({ StarTimeUtc: 'yesterday' }),
            'not a record',
            createRawEntry({ EmployeeName: 'Carol Example' }),
        ]);

        expect(entries.map((entry) => entry.employeeName)).toEqual(['Carol Example']);
    });

    it('keeps padded and null names as separate employees', () => {
        const summary = aggregate(
            parseEntriesResponse([
                createRawEntry({ EmployeeName: 'Alice' }),
                createRawEntry({ EmployeeName: ' Alice ' }),
                createRawEntry({ EmployeeName: null }),
            ])
        );

        expect(summary).toEqual([
            { name: 'Alice', totalHours: 8 },
            { name: ' Alice ', totalHours: 8 },
            { name: '', totalHours: 8 },
        ]);
    });

    it('rejects a body that is not an array', () => {
        expect(() => parseEntriesResponse({ entries: [] })).toThrow('Expected a JSON array of time entries');
    });
});

describe('createTimeEntriesClient', () => {
    it('requests the entries URL with the token', async () => {
        const fetch = mockFetch([createRawEntry()]);
        const client = createTimeEntriesClient(baseConfig, { fetch });

        const entries = await client.fetchEntries();

        expect(entries).toHaveLength(1);
        expect(fetch).toHaveBeenCalledTimes(1);
        expect(fetch.mock.calls[0][0]).toBe('https://entries.test/api/time-entries?code=test-token');
        expect(fetch.mock.calls[0][1]?.method).toBe('GET');
    });

    it('returns an empty list for an empty array', async () => {
        const client = createTimeEntriesClient(baseConfig, { fetch: mockFetch([]) });
        await expect(client.fetchEntries()).resolves.toEqual([]);
    });

    it('fails on a server error without retrying by default', async () => {
        const fetch = mockFetch({ message: 'boom' }, 500);
        const client = createTimeEntriesClient(baseConfig, { fetch, delay: noDelay() });

        const error = await catchFetchError(client.fetchEntries());

        expect(error.type).toBe(ERROR_TYPES.API);
        expect(error.status).toBe(500);
        expect(error.message).toBe('Error fetching data: API Error: 500');
        expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('retries a server error when retries are configured', async () => {
        const fetch = jest
            .fn<FetchLike>()
            .mockResolvedValueOnce(new Response('', { status: 503 }))
            .mockResolvedValueOnce(new Response(JSON.stringify([createRawEntry()]), { status: 200 }));
        const delay = noDelay();
        const client = createTimeEntriesClient({ ...baseConfig, maxRetries: 1 }, { fetch, delay });

        const entries = await client.fetchEntries();

        expect(entries).toHaveLength(1);
        expect(fetch).toHaveBeenCalledTimes(2);
        expect(delay).toHaveBeenCalledWith(1000);
    });

    it('honours Retry-After on 429 when retries remain', async () => {
        const fetch = jest
            .fn<FetchLike>()
            .mockResolvedValueOnce(new Response('', { status: 429, headers: { 'Retry-After': '2' } }))
            .mockResolvedValueOnce(new Response('[]', { status: 200 }));
        const delay = noDelay();
        const client = createTimeEntriesClient({ ...baseConfig, maxRetries: 1 }, { fetch, delay });

        await expect(client.fetchEntries()).resolves.toEqual([]);
        expect(delay).toHaveBeenCalledWith(2000);
    });

    it('never retries an authentication failure', async () => {
        const fetch = mockFetch({}, 401);
        const client = createTimeEntriesClient({ ...baseConfig, maxRetries: 3 }, { fetch, delay: noDelay() });

        const error = await catchFetchError(client.fetchEntries());

        expect(error.type).toBe(ERROR_TYPES.AUTH);
        expect(error.status).toBe(401);
        expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('never retries a missing resource', async () => {
        const fetch = mockFetch({}, 404);
        const client = createTimeEntriesClient({ ...baseConfig, maxRetries: 3 }, { fetch, delay: noDelay() });

        const error = await catchFetchError(client.fetchEntries());

        expect(error.type).toBe(ERROR_TYPES.VALIDATION);
        expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('reports a body that is not JSON as a validation failure', async () => {
        const client = createTimeEntriesClient(baseConfig, { fetch: mockFetch('<html>oops</html>') });

        const error = await catchFetchError(client.fetchEntries());

        expect(error.type).toBe(ERROR_TYPES.VALIDATION);
    });

    it('reports a JSON object body as a validation failure', async () => {
        const client = createTimeEntriesClient(baseConfig, { fetch: mockFetch({ entries: [] }) });

        const error = await catchFetchError(client.fetchEntries());

        expect(error.type).toBe(ERROR_TYPES.VALIDATION);
        expect(error.message).toBe('Expected a JSON array of time entries');
    });

    it('reports connection failures as network errors', async () => {
        const fetch = jest.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed'));
        const client = createTimeEntriesClient(baseConfig, { fetch });

        const error = await catchFetchError(client.fetchEntries());

        expect(error.type).toBe(ERROR_TYPES.NETWORK);
        expect(error.status).toBe(0);
        expect(error.message).toBe('Error fetching data: fetch failed');
    });

    it('aborts a request that exceeds the timeout', async () => {
        const fetch: FetchLike = (_input, init) =>
            new Promise<Response>((_resolve, reject) => {
                init?.signal?.addEventListener('abort', () => {
                    const abort = new Error('The operation was aborted');
                    abort.name = 'AbortError';
                    reject(abort);
                });
            });
        const client = createTimeEntriesClient({ ...baseConfig, requestTimeoutMs: 10 }, { fetch });

        const error = await catchFetchError(client.fetchEntries());

        expect(error.type).toBe(ERROR_TYPES.NETWORK);
        expect(error.message).toBe('Error fetching data: request timed out or was aborted');
    });

    it('refuses to fetch after being disposed', async () => {
        const fetch = mockFetch([]);
        const client = createTimeEntriesClient(baseConfig, { fetch });

        client.dispose();
        const error = await catchFetchError(client.fetchEntries());

        expect(error.message).toBe('Error fetching data: Client disposed');
        expect(fetch).not.toHaveBeenCalled();
    });
});
