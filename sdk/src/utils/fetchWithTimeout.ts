/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { CancelledError, FetchTimeoutError, HttpStatusError, TransportError } from '../types/errors';

export const DEFAULT_HTTP_TIMEOUT_MS = 30000;

export type ResponseReader<T> = (response: Response) => Promise<T>;

function abortedBy(signal: AbortSignal): Promise<never> {
    return new Promise((_, reject) => {
        const fail = () => reject(new Error('body read aborted'));
        if (signal.aborted) {
            fail();
            return;
        }
        signal.addEventListener('abort', fail, { once: true });
    });
}

/**
 * Fetches `url` and hands the response to `read`. The timeout and the
 * caller's signal cover the body read too, so a server that stalls after
 * the headers still fails in time. Errors thrown by `read` pass through.
 */
export async function fetchWithTimeout<T>(
    url: string,
    init: RequestInit,
    read: ResponseReader<T>,
    timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS,
    signal?: AbortSignal
): Promise<T> {
    if (signal?.aborted) {
        throw new CancelledError(`request to ${url}`);
    }

    const controller = new AbortController();
    const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
        let response: Response;
        try {
            response = await fetch(url, {
                ...init,
                signal: controller.signal,
            });
        } catch (error) {
            if (controller.signal.aborted) {
                throw error;
            }
            if (error instanceof Error) {
                throw new TransportError(url, error.message, { cause: error });
            }
            throw new TransportError(url, String(error));
        }

        return await Promise.race([read(response), abortedBy(controller.signal)]);
    } catch (error) {
        if (signal?.aborted) {
            throw new CancelledError(`request to ${url}`);
        }

        if (controller.signal.aborted) {
            throw new FetchTimeoutError(url, timeoutMs);
        }

        throw error;
    } finally {
        clearTimeout(timeoutHandle);
        signal?.removeEventListener('abort', forwardAbort);
    }
}

/**
 * Throws HttpStatusError for non-2xx responses, using the body's `error`,
 * `detail` or `message` field when the server sent JSON.
 */
export async function ensureOk(response: Response, url: string): Promise<Response> {
    if (response.ok) {
        return response;
    }

    const body = parseJson(await response.text());
    let detail = response.statusText;

    if (body && typeof body === 'object') {
        for (const field of ['error', 'detail', 'message']) {
            const value: unknown = Object.getOwnPropertyDescriptor(body, field)?.value;
            if (typeof value === 'string' && value.length > 0) {
                detail = value;
                break;
            }
        }
    }

    throw new HttpStatusError(url, response.status, detail);
}

// checks the status, then parses the body as JSON
export function readJsonBody(url: string): ResponseReader<unknown> {
    return async (response) => {
        await ensureOk(response, url);
        const json: unknown = await response.json();
        return json;
    };
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}
