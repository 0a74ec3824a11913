/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { NetworkError } from '../types/errors';
import { DEFAULT_HTTP_TIMEOUT_MS, fetchWithTimeout, readJsonBody } from '../utils/fetchWithTimeout';
import { Logger } from '../utils/logger';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from '../utils/retry';

export interface AgentProtocolClientConfig {
    timeoutMs?: number;
    retryPolicy?: RetryPolicy;
}

export interface AgentTask {
    task_id: string;
    [key: string]: unknown;
}

// step output is agent-defined
export type AgentStep = Record<string, unknown>;

const TASKS_PATH = '/ap/v1/agent/tasks';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Agent-to-agent task client: create a task on a remote agent, then drive
 * it one step at a time.
 */
export class AgentProtocolClient {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly retryPolicy: RetryPolicy;

    constructor(baseUrl: string, config: AgentProtocolClientConfig = {}) {
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.timeoutMs = config.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
        this.retryPolicy = config.retryPolicy ?? DEFAULT_RETRY_POLICY;

        Logger.info('AgentProtocolClient initialized', { baseUrl: this.baseUrl });
    }

    async createTask(input?: string, signal?: AbortSignal): Promise<AgentTask> {
        const body = await this.post(TASKS_PATH, input, 'agent_protocol_create_task', signal);

        const taskId = body.task_id;
        if (typeof taskId !== 'string' || taskId.length === 0) {
            throw new NetworkError('No task_id in response', { baseUrl: this.baseUrl });
        }

        return { ...body, task_id: taskId };
    }

    async executeStep(taskId: string, input?: string, signal?: AbortSignal): Promise<AgentStep> {
        return this.post(
            `${TASKS_PATH}/${encodeURIComponent(taskId)}/steps`,
            input,
            'agent_protocol_execute_step',
            signal
        );
    }

    // creates a task and runs a single step with the JSON-encoded payload
    async run(payload: Record<string, unknown>, signal?: AbortSignal): Promise<AgentStep> {
        const task = await this.createTask(undefined, signal);
        return this.executeStep(task.task_id, JSON.stringify(payload), signal);
    }

    private async post(
        path: string,
        input: string | undefined,
        operationName: string,
        signal?: AbortSignal
    ): Promise<Record<string, unknown>> {
        const url = `${this.baseUrl}${path}`;

        const body = await withRetry(
            this.retryPolicy,
            () => fetchWithTimeout(url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(input !== undefined ? { input } : {}),
            }, readJsonBody(url), this.timeoutMs, signal),
            { operationName, signal }
        );

        if (!isRecord(body)) {
            throw new NetworkError(`Unexpected response from ${url}`, { url });
        }
        return body;
    }
}
