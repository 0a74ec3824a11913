/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ContractInvocation, LedgerInvoker, TxResult } from './types/ledger';
import { generateIdempotencyKey } from './utils/idempotency';
import { Logger } from './utils/logger';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from './utils/retry';

export interface SubmitOptions {
    signal?: AbortSignal;
    // reuse to resume a submission whose outcome is unknown
    idempotencyKey?: string;
}

/**
 * Runs shaped invocations against the ledger under the retry policy. Every
 * attempt of one submission shares an idempotency key so the invoker can
 * avoid broadcasting the same write twice.
 */
export class Client {
    constructor(
        protected readonly invoker: LedgerInvoker,
        protected readonly retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY
    ) {}

    async submit(invocation: ContractInvocation, options: SubmitOptions = {}): Promise<TxResult> {
        const idempotencyKey = options.idempotencyKey ?? generateIdempotencyKey(invocation.operation);

        let result: TxResult;
        try {
            result = await withRetry(
                this.retryPolicy,
                (attempt) => this.invoker.send(invocation, { idempotencyKey, attempt }),
                { operationName: invocation.operation, signal: options.signal }
            );
        } catch (error) {
            this.invoker.release(idempotencyKey);
            throw error;
        }

        Logger.info('Transaction confirmed', {
            operation: invocation.operation,
            layout: invocation.layout,
            txHash: result.txHash,
            blockNumber: result.blockNumber,
        });

        return result;
    }

    async read(invocation: ContractInvocation, signal?: AbortSignal): Promise<unknown> {
        return withRetry(
            this.retryPolicy,
            () => this.invoker.call(invocation),
            { operationName: invocation.operation, signal }
        );
    }
}
