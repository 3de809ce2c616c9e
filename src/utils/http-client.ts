/**
 * Error classification for HTTP responses: 408, 429 and every 5xx.
 */
export function isRetryableStatus(status: number): boolean {
    return status === 408 || status === 429 || status >= 500;
}
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    /** Caller-side cancellation (e.g. an overall deadline) */
    signal?: AbortSignal;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
    ok: boolean;
}

/**
 * HTTP error with classification.
 * `status` is 0 for network failures, timeouts and aborts.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown,
        public readonly retryAfterMs?: number,
        public readonly aborted = false
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Minimal fetch wrapper: one attempt, a timeout, JSON decoding and error
 * classification. Retrying is the caller's job.
 */
export class HttpClient {
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options?: { timeout?: number; version?: string }) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.userAgent = `postmortem-analyzer/${options?.version ?? '1.0.0'}`;
    }

    /**
     * Make a single HTTP request.
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { method = 'GET', headers = {}, body, timeout = this.defaultTimeout, signal } = options;

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        if (signal?.aborted) {
            throw new HttpError(`Request aborted before start: ${url}`, 0, false, undefined, undefined, true);
        }

        const controller = new AbortController();
        let timedOut = false;
        const timeoutId = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, timeout);
        const forwardAbort = (): void => controller.abort();
        signal?.addEventListener('abort', forwardAbort, { once: true });

        try {
            const response = await fetch(url, {
                method,
                headers: requestHeaders,
                body: requestBody,
                signal: controller.signal,
            });

            // Parse response
            const contentType = response.headers.get('content-type') ?? '';
            let data: unknown;
            if (contentType.includes('application/json')) {
                data = await response.json();
            } else {
                data = await response.text();
            }

            // Build headers map
            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (!response.ok) {
                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    isRetryableStatus(response.status),
                    data,
                    parseRetryAfter(response.headers.get('retry-after'))
                );
            }

            return { status: response.status, headers: responseHeaders, data, ok: true };
        } catch (error) {
            if (error instanceof HttpError) throw error;

            if (error instanceof Error && error.name === 'AbortError') {
                if (timedOut) {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }
                throw new HttpError(`Request aborted: ${url}`, 0, false, undefined, undefined, true);
            }

            const code = errorCode(error);
            throw new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0,
                code !== undefined && RETRYABLE_ERROR_CODES.has(code)
            );
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', forwardAbort);
        }
    }

    /**
     * Convenience method for POST requests.
     */
    async post(url: string, body: object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'POST', body });
    }
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null): number | undefined {
    if (!header) return undefined;

    // Try parsing as seconds
    const seconds = Number(header.trim());
    if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;

    // Try parsing as HTTP date
    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - Date.now());
    }

    return undefined;
}

/**
 * Node error code of a network failure. undici puts it on `cause`.
 */
function errorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    if ('cause' in error) return errorCode(error.cause);
    return undefined;
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(options?: { timeout?: number; version?: string }): HttpClient {
    return new HttpClient(options);
}
