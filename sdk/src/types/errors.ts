/**
 * SPDX-License-Identifier: Apache-2.0
 */
export type ErrorContext = Record<string, unknown>;

export class RegistrySDKError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly context?: ErrorContext,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'RegistrySDKError';
    }

    toString(): string {
        return `[${this.code}] ${this.message}`;
    }
}

export class ConfigurationError extends RegistrySDKError {
    constructor(message: string, context?: ErrorContext) {
        super(message, 'CONFIGURATION_ERROR', context);
        this.name = 'ConfigurationError';
    }
}

export class ContractError extends RegistrySDKError {
    constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
        super(message, 'CONTRACT_ERROR', context, options);
        this.name = 'ContractError';
    }
}

export class NetworkError extends RegistrySDKError {
    constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }, code: string = 'NETWORK_ERROR') {
        super(message, code, context, options);
        this.name = 'NetworkError';
    }
}

export class FetchTimeoutError extends NetworkError {
    constructor(url: string, timeoutMs: number) {
        super(`Request to ${url} timed out after ${timeoutMs}ms`, { url, timeoutMs }, undefined, 'TIMEOUT_ERROR');
        this.name = 'FetchTimeoutError';
    }
}

export class TransportError extends NetworkError {
    constructor(url: string, message: string, options?: { cause?: unknown }) {
        super(`Network request to ${url} failed: ${message}`, { url }, options, 'TRANSPORT_ERROR');
        this.name = 'TransportError';
    }
}

export class HttpStatusError extends RegistrySDKError {
    constructor(
        public readonly url: string,
        public readonly status: number,
        detail?: string
    ) {
        super(
            `Request to ${url} failed with HTTP ${status}${detail ? `: ${detail}` : ''}`,
            'HTTP_STATUS_ERROR',
            { url, status }
        );
        this.name = 'HttpStatusError';
    }
}

export class ValidationError extends RegistrySDKError {
    constructor(message: string, context?: ErrorContext) {
        super(message, 'VALIDATION_ERROR', context);
        this.name = 'ValidationError';
    }
}

export class StorageError extends RegistrySDKError {
    constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }, code: string = 'STORAGE_ERROR') {
        super(message, code, context, options);
        this.name = 'StorageError';
    }
}

export class ContentNotFoundError extends StorageError {
    constructor(path: string) {
        super(`File not found: ${path}`, { path }, undefined, 'CONTENT_NOT_FOUND');
        this.name = 'ContentNotFoundError';
    }
}

export class AuthenticationError extends RegistrySDKError {
    constructor(message: string, context?: ErrorContext) {
        super(message, 'AUTHENTICATION_ERROR', context);
        this.name = 'AuthenticationError';
    }
}

export class CancelledError extends RegistrySDKError {
    constructor(operation: string) {
        super(`${operation} was cancelled`, 'CANCELLED', { operation });
        this.name = 'CancelledError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
