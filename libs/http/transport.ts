import { ConnectionError, TimeoutError } from '../errors/errors.js';

/**
 * Injected HTTP seam. Production uses the global `fetch`; tests pass a fake
 * that returns `Response` objects.
 */
export type HttpTransport = (url: string, init: RequestInit) => Promise<Response>;

export const fetchTransport: HttpTransport = (url, init) => fetch(url, init);

export interface HttpReply {
    readonly url: string;
    readonly status: number;
    readonly ok: boolean;
    readonly body: string;
}

/**
 * Send one request with a fixed timeout and read the whole body. Transport
 * failures are mapped onto `TimeoutError` and `ConnectionError`; HTTP status
 * codes are left to the caller.
 */
export async function sendRequest(
    transport: HttpTransport,
    url: string,
    init: RequestInit,
    timeoutMs: number
): Promise<HttpReply> {
    try {
        const response = await transport(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
        const body = await response.text();
        return { url, status: response.status, ok: response.ok, body };
    } catch (error) {
        if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
            throw new TimeoutError(url, timeoutMs);
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConnectionError(`Unable to reach ${url.split('?')[0]}: ${reason}`, { cause: error });
    }
}
