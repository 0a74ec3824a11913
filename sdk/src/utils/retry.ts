/**
 * SPDX-License-Identifier: Apache-2.0
 */
import {
    AuthenticationError,
    CancelledError,
    ConfigurationError,
    HttpStatusError,
    NetworkError,
    StorageError,
    ValidationError,
    errorMessage,
} from '../types/errors';
import { Logger } from './logger';

export interface RetryPolicy {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
    readonly exponentialBase: number;
    readonly jitter: boolean;
}

export type ErrorClass = 'retryable' | 'fatal';

export interface RetryAttempt {
    attempt: number;
    previousError: unknown;
    delayMs: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
    operationName?: string;
    signal?: AbortSignal;
    classify?: (error: unknown) => ErrorClass;
    onRetry?: (attempt: RetryAttempt) => void;
    sleep?: SleepFn;
}

const JITTER_RATIO = 0.1;

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    exponentialBase: 2,
    jitter: true,
});

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...overrides };

    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
        throw new ConfigurationError('maxAttempts must be an integer >= 1', { maxAttempts: policy.maxAttempts });
    }
    if (!Number.isFinite(policy.baseDelayMs) || policy.baseDelayMs < 0) {
        throw new ConfigurationError('baseDelayMs must be >= 0', { baseDelayMs: policy.baseDelayMs });
    }
    if (!Number.isFinite(policy.maxDelayMs) || policy.maxDelayMs < policy.baseDelayMs) {
        throw new ConfigurationError('maxDelayMs must be >= baseDelayMs', {
            baseDelayMs: policy.baseDelayMs,
            maxDelayMs: policy.maxDelayMs,
        });
    }
    if (!Number.isFinite(policy.exponentialBase) || policy.exponentialBase <= 1) {
        throw new ConfigurationError('exponentialBase must be > 1', { exponentialBase: policy.exponentialBase });
    }

    return Object.freeze(policy);
}

const RETRYABLE_KEYWORDS = [
    'timeout',
    'connection',
    'network',
    'unavailable',
    'refused',
    'rpc',
    'node',
    'gateway',
] as const;

const RETRYABLE_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ETIMEDOUT',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EPIPE',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
    'UND_ERR_BODY_TIMEOUT',
    'UND_ERR_SOCKET',
    // ethers
    'NETWORK_ERROR',
    'TIMEOUT',
    'SERVER_ERROR',
]);

const FATAL_CODES = new Set([
    'CALL_EXCEPTION',
    'INVALID_ARGUMENT',
    'INSUFFICIENT_FUNDS',
    'NONCE_EXPIRED',
    'ACTION_REJECTED',
    'UNSUPPORTED_OPERATION',
]);

const MAX_CAUSE_DEPTH = 5;

function isRetryableStatus(status: number): boolean {
    return status === 408 || status === 425 || status === 429 || status >= 500;
}

function codeOf(error: object): string | undefined {
    if ('code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function classifyByCode(error: unknown): ErrorClass | undefined {
    let current: unknown = error;

    for (let depth = 0; depth < MAX_CAUSE_DEPTH && current instanceof Object; depth++) {
        const code = codeOf(current);
        if (code && RETRYABLE_CODES.has(code)) {
            return 'retryable';
        }
        if (code && FATAL_CODES.has(code)) {
            return 'fatal';
        }
        current = 'cause' in current ? current.cause : undefined;
    }

    return undefined;
}

export function classifyMessage(message: string): ErrorClass {
    const lowered = message.toLowerCase();
    return RETRYABLE_KEYWORDS.some((keyword) => lowered.includes(keyword)) ? 'retryable' : 'fatal';
}

/**
 * Decides whether a failed attempt may be repeated. Structured signals win
 * (SDK error classes, HTTP status, Node/ethers error codes anywhere on the
 * cause chain); the message keywords only decide for opaque errors.
 */
export function classifyError(error: unknown): ErrorClass {
    if (error instanceof CancelledError) {
        return 'fatal';
    }
    if (error instanceof Error && error.name === 'AbortError') {
        return 'fatal';
    }

    if (error instanceof HttpStatusError) {
        return isRetryableStatus(error.status) ? 'retryable' : 'fatal';
    }
    if (error instanceof NetworkError) {
        return 'retryable';
    }
    if (
        error instanceof ConfigurationError ||
        error instanceof ValidationError ||
        error instanceof StorageError ||
        error instanceof AuthenticationError
    ) {
        return 'fatal';
    }

    return classifyByCode(error) ?? classifyMessage(errorMessage(error));
}

/**
 * Delay in ms to wait before `attempt` (1-based). The first attempt never
 * waits; attempt 2 waits baseDelayMs; later attempts grow by exponentialBase
 * up to maxDelayMs, then jitter moves the value by up to ±10%.
 */
export function calculateDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
    if (attempt <= 1) {
        return 0;
    }

    let delay = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(policy.exponentialBase, attempt - 2));

    if (policy.jitter) {
        const range = delay * JITTER_RATIO;
        delay += (random() * 2 - 1) * range;
    }

    return Math.max(0, delay);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new CancelledError('backoff sleep'));
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(new CancelledError('backoff sleep'));
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Runs `operation` until it succeeds, fails with a fatal error, or the
 * policy's attempts are used up. The terminal error is rethrown as-is.
 */
export async function withRetry<T>(
    policy: RetryPolicy,
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const operationName = options.operationName ?? 'operation';
    const classify = options.classify ?? classifyError;
    const wait = options.sleep ?? sleep;
    const { signal } = options;

    for (let attempt = 1; ; attempt++) {
        if (signal?.aborted) {
            throw new CancelledError(operationName);
        }

        try {
            return await operation(attempt);
        } catch (error: unknown) {
            if (signal?.aborted) {
                throw error instanceof CancelledError ? error : new CancelledError(operationName);
            }

            if (classify(error) === 'fatal') {
                Logger.info(`${operationName} failed with a non-retryable error`, {
                    operation: operationName,
                    attempt,
                    error: errorMessage(error),
                });
                throw error;
            }

            if (attempt >= policy.maxAttempts) {
                Logger.error(`${operationName} failed after ${attempt} attempts`, {
                    operation: operationName,
                    attempt,
                    maxAttempts: policy.maxAttempts,
                    error: errorMessage(error),
                });
                throw error;
            }

            const delayMs = calculateDelay(attempt + 1, policy);
            Logger.warn(`Retrying ${operationName}`, {
                operation: operationName,
                attempt,
                maxAttempts: policy.maxAttempts,
                delayMs: Math.round(delayMs),
                error: errorMessage(error),
            });
            options.onRetry?.({ attempt: attempt + 1, previousError: error, delayMs });

            await wait(delayMs, signal);
        }
    }
}
