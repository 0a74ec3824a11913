/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';
import { SdkConfig } from '../config';
import { ConfigurationError, ContractError, errorMessage } from '../types/errors';
import { ContractInvocation, ContractName, LedgerInvoker, SendContext, TxResult } from '../types/ledger';
import { Logger } from '../utils/logger';

export type EthersLedgerInvokerConfig = Pick<
    SdkConfig,
    'rpcUrl' | 'chainId' | 'privateKey' | 'identityRegistryAddress' | 'validationRegistryAddress' | 'reputationRegistryAddress'
> & {
    confirmations?: number;
    receiptTimeoutMs?: number;
};

interface PendingSubmission {
    nonce: number;
    txHash?: string;
}

const MAX_PENDING_SUBMISSIONS = 1000;
export const DEFAULT_RECEIPT_TIMEOUT_MS = 120000;

// rejected by the node before anything was broadcast
const PRE_BROADCAST_CODES = new Set(['CALL_EXCEPTION', 'INSUFFICIENT_FUNDS', 'INVALID_ARGUMENT', 'ACTION_REJECTED']);

function isPreBroadcastRejection(error: unknown): boolean {
    return error instanceof Error && 'code' in error && typeof error.code === 'string' && PRE_BROADCAST_CODES.has(error.code);
}

/**
 * LedgerInvoker over an EVM JSON-RPC endpoint. Each invocation is run
 * through a Contract built from its own fragment. Writes keep the nonce and
 * the broadcast hash per idempotency key, so a retried submission either
 * waits for the transaction it already sent or replaces it with the same
 * nonce.
 */
export class EthersLedgerInvoker implements LedgerInvoker {
    private readonly provider: ethers.JsonRpcProvider;
    private readonly signer?: ethers.Wallet;
    private readonly pending = new Map<string, PendingSubmission>();
    private lastNonce?: number;

    constructor(private readonly config: EthersLedgerInvokerConfig) {
        this.provider = config.chainId !== undefined
            ? new ethers.JsonRpcProvider(config.rpcUrl, config.chainId, { staticNetwork: true })
            : new ethers.JsonRpcProvider(config.rpcUrl);

        if (config.privateKey) {
            this.signer = new ethers.Wallet(config.privateKey, this.provider);
        }

        Logger.info('EthersLedgerInvoker initialized', {
            chainId: config.chainId ?? null,
            signer: this.signer?.address ?? null,
        });
    }

    get signerAddress(): string | undefined {
        return this.signer?.address;
    }

    async send(invocation: ContractInvocation, context: SendContext): Promise<TxResult> {
        const signer = this.requireSigner(invocation);
        const contract = new ethers.Contract(this.addressFor(invocation.contract), [invocation.fragment], signer);
        const submission = await this.reserve(context.idempotencyKey, signer);

        try {
            let txHash = submission.txHash;

            if (txHash) {
                Logger.info('Waiting for previously broadcast transaction', {
                    operation: invocation.operation,
                    txHash,
                    attempt: context.attempt,
                });
            } else {
                const tx = await contract.getFunction(invocation.operation).send(...invocation.args, {
                    nonce: submission.nonce,
                });
                txHash = tx.hash;
                submission.txHash = txHash;
            }

            const receipt = await this.provider.waitForTransaction(
                txHash,
                this.config.confirmations ?? 1,
                this.config.receiptTimeoutMs ?? DEFAULT_RECEIPT_TIMEOUT_MS
            );

            if (!receipt) {
                throw new ContractError('Transaction receipt not available', {
                    operation: invocation.operation,
                    txHash,
                });
            }

            if (receipt.status === 0) {
                throw new ContractError(`${invocation.operation} reverted`, {
                    operation: invocation.operation,
                    txHash: receipt.hash,
                });
            }

            this.pending.delete(context.idempotencyKey);

            return {
                txHash: receipt.hash,
                blockNumber: receipt.blockNumber,
                logs: receipt.logs.map((log) => ({ topics: [...log.topics], data: log.data })),
            };
        } catch (error) {
            if (!submission.txHash && isPreBroadcastRejection(error)) {
                this.forget(context.idempotencyKey, submission);
            }

            if (error instanceof ContractError) {
                throw error;
            }

            throw new ContractError(
                `Failed to submit ${invocation.operation}: ${errorMessage(error)}`,
                {
                    operation: invocation.operation,
                    idempotencyKey: context.idempotencyKey,
                    attempt: context.attempt,
                    txHash: submission.txHash ?? null,
                },
                { cause: error }
            );
        }
    }

    async call(invocation: ContractInvocation): Promise<unknown> {
        const contract = new ethers.Contract(this.addressFor(invocation.contract), [invocation.fragment], this.provider);

        try {
            return await contract.getFunction(invocation.operation).staticCall(...invocation.args);
        } catch (error) {
            throw new ContractError(
                `Failed to call ${invocation.operation}: ${errorMessage(error)}`,
                { operation: invocation.operation },
                { cause: error }
            );
        }
    }

    destroy(): void {
        this.provider.destroy();
    }

    private requireSigner(invocation: ContractInvocation): ethers.Wallet {
        if (!this.signer) {
            throw new ConfigurationError('A private key is required for write operations', {
                operation: invocation.operation,
            });
        }
        return this.signer;
    }

    private addressFor(contract: ContractName): string {
        const addresses: Record<ContractName, string | undefined> = {
            identity: this.config.identityRegistryAddress,
            validation: this.config.validationRegistryAddress,
            reputation: this.config.reputationRegistryAddress,
        };

        const address = addresses[contract];
        if (!address) {
            throw new ConfigurationError(`No address configured for the ${contract} registry`, { contract });
        }
        return address;
    }

    private async reserve(idempotencyKey: string, signer: ethers.Wallet): Promise<PendingSubmission> {
        const existing = this.pending.get(idempotencyKey);
        if (existing) {
            return existing;
        }

        const pendingNonce = await signer.getNonce('pending');
        const nonce = this.lastNonce === undefined ? pendingNonce : Math.max(pendingNonce, this.lastNonce + 1);
        this.lastNonce = nonce;

        const submission: PendingSubmission = { nonce };
        this.pending.set(idempotencyKey, submission);

        if (this.pending.size > MAX_PENDING_SUBMISSIONS) {
            const oldest = this.pending.keys().next();
            if (!oldest.done) {
                this.pending.delete(oldest.value);
            }
        }

        return submission;
    }

    /**
     * Gives back the nonce of a submission that ended without broadcasting.
     * A submission with a broadcast hash is kept so the same key can resume
     * waiting for it.
     */
    release(idempotencyKey: string): void {
        const submission = this.pending.get(idempotencyKey);
        if (submission && !submission.txHash) {
            this.forget(idempotencyKey, submission);
        }
    }

    private forget(idempotencyKey: string, submission: PendingSubmission): void {
        this.pending.delete(idempotencyKey);
        if (this.lastNonce === submission.nonce) {
            this.lastNonce = submission.nonce - 1;
        }
    }
}
