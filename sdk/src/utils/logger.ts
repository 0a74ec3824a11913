/**
 * SPDX-License-Identifier: Apache-2.0
 */
export interface LogMeta {
    operation?: string | null;
    agentId?: string | number | bigint | null;
    txHash?: string | null;
    requestId?: string | null;
    gateway?: string | null;
    [key: string]: unknown;
}

type LogLevel = 'info' | 'warn' | 'error';

const SERVICE_NAME = 'agent-registry-sdk';

function baseContext(meta?: LogMeta): Record<string, unknown> {
    return {
        service: SERVICE_NAME,
        env: process.env.NODE_ENV || 'development',
        operation: meta?.operation ?? null,
        agentId: meta?.agentId ?? null,
        txHash: meta?.txHash ?? null,
        requestId: meta?.requestId ?? null,
        gateway: meta?.gateway ?? null,
        ...meta,
    };
}

function normalizeErrorMeta(metaOrError?: unknown): LogMeta | undefined {
    if (!metaOrError) {
        return undefined;
    }

    if (metaOrError instanceof Error) {
        const code = 'code' in metaOrError ? metaOrError.code : undefined;
        return {
            error: metaOrError.message,
            errorName: metaOrError.name,
            code: code ?? null,
            stack: metaOrError.stack,
        };
    }

    if (typeof metaOrError === 'object') {
        return { ...metaOrError };
    }

    return {
        error: String(metaOrError),
    };
}

// bigint fields (agent ids, token amounts) are not JSON-serializable by default
function replacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}

export class Logger {
    private static write(level: LogLevel, message: string, meta?: LogMeta): void {
        const line = JSON.stringify({
            level,
            timestamp: new Date().toISOString(),
            message,
            ...baseContext(meta),
        }, replacer);

        if (level === 'error') {
            console.error(line);
            return;
        }

        if (level === 'warn') {
            console.warn(line);
            return;
        }

        console.log(line);
    }

    static info(message: string, meta?: LogMeta): void {
        this.write('info', message, meta);
    }

    static warn(message: string, meta?: LogMeta): void {
        this.write('warn', message, meta);
    }

    static error(message: string, metaOrError?: unknown): void {
        this.write('error', message, normalizeErrorMeta(metaOrError));
    }
}
