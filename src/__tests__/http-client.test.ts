import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError } from '../utils/http-client.js';

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000 });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.retryAfterMs).toBeNull();
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const responseData = { error: 'bad request' };
            const error = new HttpError('Bad Request', 400, false, responseData);
            expect(error.response).toEqual(responseData);
        });
    });

    describe('requests', () => {
        it('should send JSON bodies and parse JSON responses', async () => {
            const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => jsonResponse({ answer: 42 }));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.post<{ answer: number }>('https://api.example.com/ask', { q: 'x' });

            expect(response.data).toEqual({ answer: 42 });
            expect(response.status).toBe(200);
            const init = fetchMock.mock.calls[0]?.[1];
            expect(init?.method).toBe('POST');
            expect(init?.body).toBe('{"q":"x"}');
            expect(init?.headers).toMatchObject({ 'Content-Type': 'application/json', 'User-Agent': 'paperask/1.0.0' });
        });

        it('should surface the Retry-After hint of a 429 when no retries are left', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'quota' }, 429, { 'retry-after': '12' })));

            const error = await client.request('https://api.example.com/x', { maxRetries: 0 }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 429, retryable: true, retryAfterMs: 12000 });
        });

        it('should retry retryable statuses', async () => {
            const fetchMock = vi
                .fn(async () => jsonResponse({ ok: true }))
                .mockResolvedValueOnce(jsonResponse({ error: 'busy' }, 503, { 'retry-after': '0' }));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.request('https://api.example.com/x', { maxRetries: 1 });

            expect(response.data).toEqual({ ok: true });
            expect(fetchMock).toHaveBeenCalledTimes(2);
        });

        it('should stop backing off when the caller aborts', async () => {
            const fetchMock = vi.fn(async () => jsonResponse({ error: 'quota' }, 429, { 'retry-after': '3' }));
            vi.stubGlobal('fetch', fetchMock);
            const controller = new AbortController();
            setTimeout(() => controller.abort(new Error('deadline')), 50);
            const start = Date.now();

            await expect(
                client.request('https://api.example.com/x', { maxRetries: 2, signal: controller.signal })
            ).rejects.toThrow('deadline');
            expect(Date.now() - start).toBeLessThan(1000);
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should stop backing off after a network error when the caller aborts', async () => {
            const failure = new TypeError('fetch failed', { cause: { code: 'ECONNRESET' } });
            const fetchMock = vi.fn(async () => Promise.reject(failure));
            vi.stubGlobal('fetch', fetchMock);
            const controller = new AbortController();
            setTimeout(() => controller.abort(new Error('deadline')), 50);

            await expect(
                client.request('https://api.example.com/x', { maxRetries: 2, signal: controller.signal })
            ).rejects.toThrow('deadline');
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should not retry client errors', async () => {
            const fetchMock = vi.fn(async () => jsonResponse({ error: 'missing' }, 404));
            vi.stubGlobal('fetch', fetchMock);

            await expect(client.request('https://api.example.com/x')).rejects.toMatchObject({ status: 404, retryable: false });
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should wrap network failures', async () => {
            const failure = new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } });
            vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(failure)));

            await expect(client.request('https://api.example.com/x', { maxRetries: 0 })).rejects.toMatchObject({
                message: 'Network error: fetch failed',
                status: 0,
                retryable: true,
            });
        });

        it('should reject with the abort reason without calling fetch', async () => {
            const fetchMock = vi.fn(async () => jsonResponse({}));
            vi.stubGlobal('fetch', fetchMock);
            const controller = new AbortController();
            controller.abort(new Error('cancelled'));

            await expect(client.request('https://api.example.com/x', { signal: controller.signal })).rejects.toThrow('cancelled');
            expect(fetchMock).not.toHaveBeenCalled();
        });
    });

    describe('rate limiting', () => {
        it('should throttle requests beyond the burst size', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ data: 'ok' })));

            const start = Date.now();

            // Default bucket: 5 per second, burst of 5
            await Promise.all(
                Array.from({ length: 7 }, (_, i) => client.request(`https://api.example.com/${i}`, { source: 'unlisted' }))
            );

            const elapsed = Date.now() - start;

            // The 6th and 7th requests wait ~200ms and ~400ms for tokens
            expect(elapsed).toBeGreaterThanOrEqual(350);
        });

        it('should stop waiting for a token when the caller aborts', async () => {
            const fetchMock = vi.fn(async () => jsonResponse({ data: 'ok' }));
            vi.stubGlobal('fetch', fetchMock);

            await Promise.all(
                Array.from({ length: 5 }, (_, i) => client.request(`https://api.example.com/${i}`, { source: 'unlisted' }))
            );

            const controller = new AbortController();
            setTimeout(() => controller.abort(new Error('deadline')), 20);
            const start = Date.now();

            await expect(
                client.request('https://api.example.com/late', { source: 'unlisted', signal: controller.signal })
            ).rejects.toThrow('deadline');
            expect(Date.now() - start).toBeLessThan(150);
            expect(fetchMock).toHaveBeenCalledTimes(5);
        });
    });
});
