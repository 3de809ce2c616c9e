import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError, parseRetryAfter } from '../utils/http-client.js';

interface FetchInit {
    signal?: AbortSignal;
}

function abortable() {
    return vi.fn(
        (_url: string, init?: FetchInit) =>
            new Promise<Response>((_, reject) => {
                init?.signal?.addEventListener('abort', () => {
                    reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
                });
            })
    );
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000 });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.aborted).toBe(false);
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const responseData = { error: 'bad request' };
            const error = new HttpError('Bad Request', 400, false, responseData);
            expect(error.response).toEqual(responseData);
        });
    });

    describe('request', () => {
        it('should decode JSON bodies', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('{"ok":true}', { headers: { 'content-type': 'application/json' } })));
            const response = await client.request('https://api.example.test/');
            expect(response).toMatchObject({ status: 200, ok: true, data: { ok: true } });
        });

        it('should return text bodies as strings', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('plain', { headers: { 'content-type': 'text/plain' } })));
            const response = await client.request('https://api.example.test/');
            expect(response.data).toBe('plain');
        });

        it('should classify 500 as retryable', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('boom', { status: 500, statusText: 'Internal Server Error' })));
            const error = await client.request('https://api.example.test/').catch((e: unknown) => e);
            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 500, retryable: true, response: 'boom', message: 'HTTP 500: Internal Server Error' });
        });

        it('should classify 5xx outside the common set as retryable', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('overloaded', { status: 529 })));
            await expect(client.request('https://api.example.test/')).rejects.toMatchObject({ status: 529, retryable: true });
        });

        it('should classify 400 as not retryable', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('bad', { status: 400 })));
            await expect(client.request('https://api.example.test/')).rejects.toMatchObject({ status: 400, retryable: false });
        });

        it('should time out as a retryable error', async () => {
            vi.stubGlobal('fetch', abortable());
            const error = await new HttpClient({ timeout: 20 }).request('https://api.example.test/').catch((e: unknown) => e);
            expect(error).toMatchObject({ status: 0, retryable: true, aborted: false });
            expect(error).toMatchObject({ message: 'Request timeout after 20ms: https://api.example.test/' });
        });

        it('should stop when the caller signal aborts', async () => {
            vi.stubGlobal('fetch', abortable());
            const controller = new AbortController();
            const pending = client.request('https://api.example.test/', { signal: controller.signal });
            controller.abort();
            await expect(pending).rejects.toMatchObject({ status: 0, retryable: false, aborted: true });
        });

        it('should not start when the signal is already aborted', async () => {
            const fetchMock = abortable();
            vi.stubGlobal('fetch', fetchMock);
            const controller = new AbortController();
            controller.abort();
            await expect(client.request('https://api.example.test/', { signal: controller.signal })).rejects.toMatchObject({ aborted: true });
            expect(fetchMock).not.toHaveBeenCalled();
        });
    });
});

describe('parseRetryAfter', () => {
    it('should read seconds', () => {
        expect(parseRetryAfter('5')).toBe(5000);
    });

    it('should return undefined for a missing header', () => {
        expect(parseRetryAfter(null)).toBeUndefined();
    });

    it('should return undefined for garbage', () => {
        expect(parseRetryAfter('soon')).toBeUndefined();
    });

    it('should read a past HTTP date as zero', () => {
        expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT')).toBe(0);
    });
});
