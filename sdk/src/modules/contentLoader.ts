/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { promises as fs } from 'fs';
import { parse as parseLossless } from 'lossless-json';
import {
    CancelledError,
    ContentNotFoundError,
    StorageError,
    ValidationError,
    errorMessage,
} from '../types/errors';
import { DEFAULT_HTTP_TIMEOUT_MS, ensureOk, fetchWithTimeout } from '../utils/fetchWithTimeout';
import { Logger } from '../utils/logger';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../utils/retry';

export const IPFS_SCHEME = 'ipfs://';
export const FILE_SCHEME = 'file://';

export const DEFAULT_GATEWAYS: readonly string[] = Object.freeze([
    'https://ipfs.io/ipfs',
    'https://gateway.pinata.cloud/ipfs',
    'https://cloudflare-ipfs.com/ipfs',
]);

export interface ContentLoaderOptions {
    gateways?: readonly string[];
    // falls back to IPFS_GATEWAY_URL, then to the first gateway
    preferredGateway?: string;
    timeoutMs?: number;
    retryPolicy?: RetryPolicy;
}

export interface LoadOptions {
    signal?: AbortSignal;
}

export function formatUri(cid: string): string {
    return `${IPFS_SCHEME}${cid}`;
}

export function extractCid(uri: string): string {
    return uri.startsWith(IPFS_SCHEME) ? uri.slice(IPFS_SCHEME.length) : uri;
}

function trimTrailingSlash(url: string): string {
    return url.replace(/\/+$/, '');
}

export function orderGateways(preferred: string | undefined, gateways: readonly string[]): string[] {
    const ordered: string[] = [];

    for (const gateway of preferred ? [preferred, ...gateways] : gateways) {
        const normalized = trimTrailingSlash(gateway.trim());
        if (normalized.length > 0 && !ordered.includes(normalized)) {
            ordered.push(normalized);
        }
    }

    return ordered;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

const utf8 = new TextDecoder('utf-8');
const utf8Encoder = new TextEncoder();

/**
 * Resolves content URIs to bytes. `ipfs://` content is tried gateway by
 * gateway in preference order, each gateway with its own retry budget;
 * `file://` and `http(s)://` have a single source. Anything else is inline
 * content and comes back unchanged.
 */
export class ContentLoader {
    private readonly gateways: readonly string[];
    private readonly timeoutMs: number;
    private readonly retryPolicy: RetryPolicy;

    constructor(options: ContentLoaderOptions = {}) {
        const preferred = options.preferredGateway ?? process.env.IPFS_GATEWAY_URL?.trim();
        this.gateways = Object.freeze(orderGateways(preferred || undefined, options.gateways ?? DEFAULT_GATEWAYS));
        this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
        this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;

        if (this.gateways.length === 0) {
            throw new StorageError('At least one content gateway is required');
        }

        Logger.info('ContentLoader initialized', {
            gateway: this.gateways[0],
            gatewayCount: this.gateways.length,
        });
    }

    gatewayUrls(): readonly string[] {
        return this.gateways;
    }

    async load(uri: string, options: LoadOptions = {}): Promise<string> {
        if (!this.isResolvable(uri)) {
            return uri;
        }
        return utf8.decode(await this.loadBytes(uri, options));
    }

    async loadJson(uri: string, options: LoadOptions = {}): Promise<unknown> {
        return this.parseWith(JSON.parse, uri, options);
    }

    /**
     * Like loadJson, but numbers come back as LosslessNumber holding their
     * original text, so the document rehashes to exactly what was stored.
     */
    async loadDocument(uri: string, options: LoadOptions = {}): Promise<unknown> {
        return this.parseWith((text) => parseLossless(text), uri, options);
    }

    private async parseWith(parser: (text: string) => unknown, uri: string, options: LoadOptions): Promise<unknown> {
        const text = await this.load(uri, options);
        try {
            return parser(text);
        } catch (error) {
            throw new ValidationError(`Content at ${uri} is not valid JSON`, { uri, error: errorMessage(error) });
        }
    }

    async loadBytes(uri: string, options: LoadOptions = {}): Promise<Uint8Array> {
        if (uri.startsWith(FILE_SCHEME)) {
            return this.readFile(uri.slice(FILE_SCHEME.length));
        }

        if (uri.startsWith(IPFS_SCHEME)) {
            return this.fetchFromGateways(extractCid(uri), options.signal);
        }

        if (uri.startsWith('http://') || uri.startsWith('https://')) {
            return withRetry(
                this.retryPolicy,
                () => this.fetchBytes(uri, options.signal),
                { operationName: 'http_fetch', signal: options.signal }
            );
        }

        return utf8Encoder.encode(uri);
    }

    private isResolvable(uri: string): boolean {
        return [FILE_SCHEME, IPFS_SCHEME, 'http://', 'https://'].some((scheme) => uri.startsWith(scheme));
    }

    private async readFile(path: string): Promise<Uint8Array> {
        try {
            return new Uint8Array(await fs.readFile(path));
        } catch (error) {
            if (isMissingFile(error)) {
                throw new ContentNotFoundError(path);
            }
            throw new StorageError(`Failed to read ${path}: ${errorMessage(error)}`, { path }, { cause: error });
        }
    }

    private async fetchFromGateways(cid: string, signal?: AbortSignal): Promise<Uint8Array> {
        let lastError: unknown;

        for (const gateway of this.gateways) {
            const url = `${gateway}/${cid}`;

            try {
                return await withRetry(
                    this.retryPolicy,
                    () => this.fetchBytes(url, signal),
                    { operationName: 'ipfs_fetch', signal }
                );
            } catch (error) {
                if (error instanceof CancelledError) {
                    throw error;
                }

                lastError = error;
                Logger.warn('Content gateway failed', { gateway, cid, error: errorMessage(error) });
            }
        }

        throw new StorageError(
            `All content gateways failed: ${errorMessage(lastError)}`,
            { cid, gateways: [...this.gateways], lastError: errorMessage(lastError) },
            { cause: lastError }
        );
    }

    private async fetchBytes(url: string, signal?: AbortSignal): Promise<Uint8Array> {
        return fetchWithTimeout(url, { method: 'GET' }, async (response) => {
            await ensureOk(response, url);
            return new Uint8Array(await response.arrayBuffer());
        }, this.timeoutMs, signal);
    }
}
