/**
 * SPDX-License-Identifier: Apache-2.0
 */
import dotenv from 'dotenv';
import { AssertionError, strict as assert } from 'assert';
import { ConfigurationError } from './types/errors';
import { DEFAULT_HTTP_TIMEOUT_MS } from './utils/fetchWithTimeout';
import { DEFAULT_RETRY_POLICY, RetryPolicy, createRetryPolicy } from './utils/retry';

export type Env = Record<string, string | undefined>;

export interface SdkConfig {
    // network
    rpcUrl: string;
    chainId?: number;

    // contracts
    identityRegistryAddress?: string;
    validationRegistryAddress?: string;
    reputationRegistryAddress?: string;

    // backend api
    apiUrl: string;
    apiKey?: string;

    // content network
    ipfsGatewayUrl?: string;
    ipfsUploadUrl?: string;

    // key
    privateKey?: string;

    httpTimeoutMs: number;
    retryPolicy: RetryPolicy;
}

export const DEFAULT_API_URL = 'http://localhost:8000';

function readEnv(env: Env, name: string): string | undefined {
    const value = env[name];
    if (!value) return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

function validateEnv(env: Env, name: string): string {
    const value = readEnv(env, name);
    assert(value, `${name} is missing`);
    return value;
}

function validateEnvNumber(env: Env, name: string, fallback: number): number {
    const value = readEnv(env, name);
    if (value === undefined) {
        return fallback;
    }

    const num = Number(value);
    assert(Number.isFinite(num), `${name} must be a number`);
    return num;
}

function validateEnvInteger(env: Env, name: string): number | undefined {
    const value = readEnv(env, name);
    if (value === undefined) {
        return undefined;
    }

    assert(/^\d+$/.test(value), `${name} must be a positive integer`);
    return parseInt(value, 10);
}

function validateEnvBool(env: Env, name: string, fallback: boolean): boolean {
    const value = readEnv(env, name);

    if (!value) {
        return fallback;
    }

    const lowered = value.toLowerCase();
    assert(['true', 'false', '1', '0'].includes(lowered), `${name} must be true or false`);
    return lowered === 'true' || lowered === '1';
}

function validateEnvAddress(env: Env, name: string): string | undefined {
    const value = readEnv(env, name);
    if (value !== undefined) {
        assert(/^0x[0-9a-fA-F]{40}$/.test(value), `${name} must be a 20-byte hex address`);
    }
    return value;
}

function validateEnvUrl(env: Env, name: string, fallback?: string): string | undefined {
    const value = readEnv(env, name) ?? fallback;
    if (value !== undefined) {
        assert(/^https?:\/\//.test(value), `${name} must be an http(s) URL`);
    }
    return value;
}

export function retryPolicyFromEnv(env: Env): RetryPolicy {
    return createRetryPolicy({
        maxAttempts: validateEnvNumber(env, 'RETRY_MAX_ATTEMPTS', DEFAULT_RETRY_POLICY.maxAttempts),
        baseDelayMs: validateEnvNumber(env, 'RETRY_BASE_DELAY_MS', DEFAULT_RETRY_POLICY.baseDelayMs),
        maxDelayMs: validateEnvNumber(env, 'RETRY_MAX_DELAY_MS', DEFAULT_RETRY_POLICY.maxDelayMs),
        exponentialBase: validateEnvNumber(env, 'RETRY_EXPONENTIAL_BASE', DEFAULT_RETRY_POLICY.exponentialBase),
        jitter: validateEnvBool(env, 'RETRY_JITTER', DEFAULT_RETRY_POLICY.jitter),
    });
}

function loadDotenv(): Env {
    dotenv.config();
    return process.env;
}

/**
 * Builds an SdkConfig from environment variables. With no argument the
 * process environment is used after loading `.env`.
 */
export function loadConfigFromEnv(env: Env = loadDotenv()): SdkConfig {
    try {
        const httpTimeoutMs = validateEnvNumber(env, 'HTTP_TIMEOUT_MS', DEFAULT_HTTP_TIMEOUT_MS);
        assert(httpTimeoutMs > 0, 'HTTP_TIMEOUT_MS must be > 0');

        return {
            rpcUrl: validateEnv(env, 'RPC_URL'),
            chainId: validateEnvInteger(env, 'CHAIN_ID'),

            identityRegistryAddress: validateEnvAddress(env, 'IDENTITY_REGISTRY_ADDRESS'),
            validationRegistryAddress: validateEnvAddress(env, 'VALIDATION_REGISTRY_ADDRESS'),
            reputationRegistryAddress: validateEnvAddress(env, 'REPUTATION_REGISTRY_ADDRESS'),

            apiUrl: validateEnvUrl(env, 'REGISTRY_API_URL', DEFAULT_API_URL) ?? DEFAULT_API_URL,
            apiKey: readEnv(env, 'REGISTRY_API_KEY'),

            ipfsGatewayUrl: validateEnvUrl(env, 'IPFS_GATEWAY_URL'),
            ipfsUploadUrl: validateEnvUrl(env, 'IPFS_UPLOAD_URL'),

            privateKey: readEnv(env, 'PRIVATE_KEY'),

            httpTimeoutMs,
            retryPolicy: retryPolicyFromEnv(env),
        };
    } catch (error) {
        if (error instanceof AssertionError) {
            throw new ConfigurationError(error.message);
        }
        throw error;
    }
}
