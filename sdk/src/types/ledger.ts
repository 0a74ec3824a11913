/**
 * SPDX-License-Identifier: Apache-2.0
 */
export type ContractName = 'identity' | 'validation' | 'reputation';

export type ContractArg = string | number | bigint | boolean;

export type CallLayout = 'legacy' | 'extended';

export interface ContractInvocation {
    readonly contract: ContractName;
    readonly operation: string;
    readonly layout: CallLayout;
    // human-readable ABI fragment, e.g. "function exists(uint256 agentId) view returns (bool)"
    readonly fragment: string;
    readonly args: readonly ContractArg[];
}

export interface LogEntry {
    topics: readonly string[];
    data: string;
}

export interface TxResult {
    txHash: string;
    blockNumber: number | null;
    logs: readonly LogEntry[];
}

export interface SendContext {
    // stable across every retry of one logical submission
    idempotencyKey: string;
    attempt: number;
}

export interface LedgerInvoker {
    send(invocation: ContractInvocation, context: SendContext): Promise<TxResult>;
    call(invocation: ContractInvocation): Promise<unknown>;
    // the submission under this key has ended without a confirmed result
    release(idempotencyKey: string): void;
}
