/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { RegistrySDKError, StorageError, errorMessage } from '../types/errors';
import { DEFAULT_HTTP_TIMEOUT_MS, fetchWithTimeout, readJsonBody } from '../utils/fetchWithTimeout';
import { Logger } from '../utils/logger';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../utils/retry';
import { ContentLoader, FILE_SCHEME, IPFS_SCHEME, formatUri } from './contentLoader';

export interface ContentStorageConfig {
    uploadUrl?: string;
    timeoutMs?: number;
    retryPolicy?: RetryPolicy;
}

export interface UploadResult {
    uri: string;
    cid: string;
}

function cidFrom(body: unknown): string | undefined {
    if (typeof body !== 'object' || body === null) {
        return undefined;
    }

    for (const field of ['hash', 'cid']) {
        const value: unknown = Object.getOwnPropertyDescriptor(body, field)?.value;
        if (typeof value === 'string' && value.length > 0) {
            return value;
        }
    }

    return undefined;
}

function isUri(value: string): boolean {
    return [IPFS_SCHEME, FILE_SCHEME, 'http://', 'https://'].some((scheme) => value.startsWith(scheme));
}

/**
 * Publishes JSON documents to a pinning endpoint and reads them back through
 * the ContentLoader.
 */
export class ContentStorage {
    private readonly timeoutMs: number;
    private readonly retryPolicy: RetryPolicy;

    constructor(
        private readonly loader: ContentLoader,
        private readonly config: ContentStorageConfig = {}
    ) {
        this.timeoutMs = config.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
        this.retryPolicy = config.retryPolicy ?? DEFAULT_RETRY_POLICY;
    }

    get canUpload(): boolean {
        return Boolean(this.config.uploadUrl);
    }

    async upload(data: Record<string, unknown>, signal?: AbortSignal): Promise<UploadResult> {
        const uploadUrl = this.config.uploadUrl;
        if (!uploadUrl) {
            throw new StorageError('No content upload endpoint configured');
        }

        const body = await withRetry(
            this.retryPolicy,
            () => fetchWithTimeout(uploadUrl, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(data),
            }, readJsonBody(uploadUrl), this.timeoutMs, signal),
            { operationName: 'ipfs_upload', signal }
        );

        const cid = cidFrom(body);
        if (!cid) {
            throw new StorageError('No content hash in upload response', { uploadUrl });
        }

        const uri = formatUri(cid);
        Logger.info('Document uploaded', { uri });

        return { uri, cid };
    }

    // bare CIDs are accepted as well as URIs
    async fetch(uriOrCid: string, signal?: AbortSignal): Promise<unknown> {
        const uri = isUri(uriOrCid) ? uriOrCid : formatUri(uriOrCid);

        try {
            return await this.loader.loadJson(uri, { signal });
        } catch (error) {
            if (error instanceof RegistrySDKError) {
                throw error;
            }
            throw new StorageError(`Failed to fetch ${uri}: ${errorMessage(error)}`, { uri }, { cause: error });
        }
    }
}
