/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { AgentRecord, AgentSearchFilters, AgentSearchPage, IntegerInput, ValidationRecord } from '../types/agent';
import { NetworkError } from '../types/errors';
import { DEFAULT_HTTP_TIMEOUT_MS, ensureOk, fetchWithTimeout } from '../utils/fetchWithTimeout';
import { Logger } from '../utils/logger';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../utils/retry';
import { validateAgentId } from '../utils/validation';

export interface RegistryApiClientConfig {
    baseUrl: string;
    apiKey?: string;
    timeoutMs?: number;
    retryPolicy?: RetryPolicy;
}

export type ReputationReport = Record<string, unknown>;
export type RegistryStats = Record<string, unknown>;
export type SyncStatus = Record<string, unknown>;

interface RequestOptions {
    operationName: string;
    query?: URLSearchParams;
    body?: unknown;
    signal?: AbortSignal;
}

function ensureTrailingBase(baseUrl: string): string {
    return baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Client for the registry's indexing backend. Every call goes through the
 * transport timeout and the retry policy; records come back as the backend
 * sends them.
 */
export class RegistryApiClient {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly retryPolicy: RetryPolicy;

    constructor(private readonly config: RegistryApiClientConfig) {
        this.baseUrl = ensureTrailingBase(config.baseUrl);
        this.timeoutMs = config.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
        this.retryPolicy = config.retryPolicy ?? DEFAULT_RETRY_POLICY;

        Logger.info('RegistryApiClient initialized', { baseUrl: this.baseUrl });
    }

    async getAgent(agentId: IntegerInput, signal?: AbortSignal): Promise<AgentRecord> {
        const id = validateAgentId(agentId);
        return this.request<AgentRecord>('GET', `/agents/${id}`, { operationName: 'api_get_agent', signal });
    }

    async searchAgents(filters: AgentSearchFilters = {}, signal?: AbortSignal): Promise<AgentSearchPage> {
        const query = new URLSearchParams();
        query.set('limit', String(filters.limit ?? 20));
        query.set('offset', String(filters.offset ?? 0));

        if (filters.query) {
            query.set('query', filters.query);
        }
        for (const skill of filters.skills ?? []) {
            query.append('skills', skill);
        }
        for (const tag of filters.tags ?? []) {
            query.append('tags', tag);
        }
        if (filters.minFeedbackPositive !== undefined) {
            query.set('min_feedback_positive', String(filters.minFeedbackPositive));
        }
        if (filters.verifiedOnly) {
            query.set('verified_only', 'true');
        }

        return this.request<AgentSearchPage>('GET', '/agents', { operationName: 'api_search_agents', query, signal });
    }

    async syncAgent(agentId: IntegerInput, signal?: AbortSignal): Promise<SyncStatus> {
        const id = validateAgentId(agentId);
        return this.request<SyncStatus>('POST', `/agents/${id}/sync`, { operationName: 'api_sync_agent', signal });
    }

    async getReputation(agentId: IntegerInput, signal?: AbortSignal): Promise<ReputationReport> {
        const id = validateAgentId(agentId);
        return this.request<ReputationReport>('GET', `/reputation/${id}`, { operationName: 'api_get_reputation', signal });
    }

    async getValidations(agentId: IntegerInput, limit: number = 50, signal?: AbortSignal): Promise<ValidationRecord[]> {
        const id = validateAgentId(agentId);
        const query = new URLSearchParams({ limit: String(limit) });
        return this.request<ValidationRecord[]>('GET', `/validations/${id}`, {
            operationName: 'api_get_validations',
            query,
            signal,
        });
    }

    async uploadDocument(data: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
        const result = await this.request<unknown>('POST', '/storage/upload', {
            operationName: 'api_upload_document',
            body: { data },
            signal,
        });

        const uri = isRecord(result) ? result.uri : undefined;
        if (typeof uri !== 'string' || uri.length === 0) {
            throw new NetworkError('Upload response did not include a uri', { path: '/storage/upload' });
        }
        return uri;
    }

    async getStats(signal?: AbortSignal): Promise<RegistryStats> {
        return this.request<RegistryStats>('GET', '/stats', { operationName: 'api_get_stats', signal });
    }

    private headers(hasBody: boolean): Record<string, string> {
        const headers: Record<string, string> = {
            Accept: 'application/json',
        };

        if (hasBody) {
            headers['Content-Type'] = 'application/json';
        }

        if (this.config.apiKey) {
            headers.Authorization = `Bearer ${this.config.apiKey}`;
        }

        return headers;
    }

    private async request<T>(method: 'GET' | 'POST', path: string, options: RequestOptions): Promise<T> {
        const search = options.query ? `?${options.query.toString()}` : '';
        const url = `${this.baseUrl}${path}${search}`;

        return withRetry(
            this.retryPolicy,
            () => fetchWithTimeout(url, {
                method,
                headers: this.headers(options.body !== undefined),
                body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
            }, async (response) => {
                await ensureOk(response, url);

                // backend records are passed through without schema validation
                return (await response.json()) as T;
            }, this.timeoutMs, options.signal),
            { operationName: options.operationName, signal: options.signal }
        );
    }
}
