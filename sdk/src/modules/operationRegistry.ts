/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';
import { HashInput, IntegerInput, Sentiment } from '../types/agent';
import { ContractArg, ContractName } from '../types/ledger';
import { ZERO_HASH } from '../utils/hash';

type AgentRef = { agentId: IntegerInput };

/**
 * Caller-facing arguments for every registry operation, keyed by contract
 * method name. Optional fields fall back to the defaults in
 * OPERATION_REGISTRY.
 */
export interface OperationArgs {
    // identity registry
    register: { tokenUri: string; metadataHash?: HashInput };
    setAgentWallet: AgentRef & { wallet: string };
    exists: AgentRef;
    ownerOf: AgentRef;
    tokenURI: AgentRef;
    agentWalletOf: AgentRef;
    totalAgents: Record<string, never>;

    // validation registry
    validationRequest: AgentRef & { validator: string; requestUri: string; requestDataHash?: HashInput };
    completeValidation: {
        requestId: HashInput;
        resultUri: string;
        resultHash?: HashInput;
        tag?: string;
        responseCode?: number;
    };
    rejectValidation: {
        requestId: HashInput;
        resultUri?: string;
        reasonHash?: HashInput;
        tag?: string;
        responseCode?: number;
    };
    cancelRequest: { requestId: HashInput };
    getRequest: { requestId: HashInput };
    getAgentRequests: AgentRef;
    getSummaryForAgent: AgentRef;

    // reputation registry
    giveFeedback: AgentRef & {
        feedbackText: string;
        sentiment: Sentiment;
        value?: IntegerInput;
        valueDecimals?: number;
        tag1?: string;
        tag2?: string;
        endpoint?: string;
        feedbackUri?: string;
        feedbackHash?: HashInput;
    };
    revokeFeedback: AgentRef & { feedbackIndex: IntegerInput };
    appendResponse: AgentRef & {
        feedbackIndex: IntegerInput;
        responseText: string;
        clientAddress?: string;
        responseUri?: string;
        responseHash?: HashInput;
    };
    getFeedback: AgentRef & { feedbackIndex: IntegerInput };
    getFeedbackCount: AgentRef;
    getSummary: AgentRef;
}

export type OperationName = keyof OperationArgs;

export type FieldKind = 'uint256' | 'int128' | 'uint8' | 'sentiment' | 'string' | 'address' | 'bytes32';

export interface FieldSpec<A> {
    key: Extract<keyof A, string>;
    kind: FieldKind;
    default?: ContractArg;
}

export interface ExtensionFieldSpec<A> extends FieldSpec<A> {
    default: ContractArg;
}

export interface OperationDescriptor<A> {
    contract: ContractName;
    kind: 'write' | 'read';
    params: readonly FieldSpec<A>[];
    // trailing optional fields of the extended layout, in wire order
    extension?: readonly ExtensionFieldSpec<A>[];
    returns?: string;
}

export type OperationRegistry = {
    readonly [K in OperationName]: OperationDescriptor<OperationArgs[K]>;
};

export const SOLIDITY_TYPES: Readonly<Record<FieldKind, string>> = Object.freeze({
    uint256: 'uint256',
    int128: 'int128',
    uint8: 'uint8',
    sentiment: 'uint8',
    string: 'string',
    address: 'address',
    bytes32: 'bytes32',
});

const VALIDATION_RESULT_EXTENSION = [
    { key: 'tag', kind: 'string', default: '' },
    { key: 'responseCode', kind: 'uint8', default: 0 },
] as const;

const registry: OperationRegistry = {
    register: {
        contract: 'identity',
        kind: 'write',
        params: [
            { key: 'tokenUri', kind: 'string' },
            { key: 'metadataHash', kind: 'bytes32', default: ZERO_HASH },
        ],
    },
    setAgentWallet: {
        contract: 'identity',
        kind: 'write',
        params: [
            { key: 'agentId', kind: 'uint256' },
            { key: 'wallet', kind: 'address' },
        ],
    },
    exists: {
        contract: 'identity',
        kind: 'read',
        params: [{ key: 'agentId', kind: 'uint256' }],
        returns: '(bool)',
    },
    ownerOf: {
        contract: 'identity',
        kind: 'read',
        params: [{ key: 'agentId', kind: 'uint256' }],
        returns: '(address)',
    },
    tokenURI: {
        contract: 'identity',
        kind: 'read',
        params: [{ key: 'agentId', kind: 'uint256' }],
        returns: '(string)',
    },
    agentWalletOf: {
        contract: 'identity',
        kind: 'read',
        params: [{ key: 'agentId', kind: 'uint256' }],
        returns: '(address)',
    },
    totalAgents: {
        contract: 'identity',
        kind: 'read',
        params: [],
        returns: '(uint256)',
    },

    validationRequest: {
        contract: 'validation',
        kind: 'write',
        params: [
            { key: 'agentId', kind: 'uint256' },
            { key: 'validator', kind: 'address' },
            { key: 'requestUri', kind: 'string' },
            { key: 'requestDataHash', kind: 'bytes32', default: ZERO_HASH },
        ],
    },
    completeValidation: {
        contract: 'validation',
        kind: 'write',
        params: [
            { key: 'requestId', kind: 'bytes32' },
            { key: 'resultUri', kind: 'string' },
            { key: 'resultHash', kind: 'bytes32', default: ZERO_HASH },
        ],
        extension: VALIDATION_RESULT_EXTENSION,
    },
    rejectValidation: {
        contract: 'validation',
        kind: 'write',
        params: [
            { key: 'requestId', kind: 'bytes32' },
            { key: 'resultUri', kind: 'string', default: '' },
            { key: 'reasonHash', kind: 'bytes32', default: ZERO_HASH },
        ],
        extension: VALIDATION_RESULT_EXTENSION,
    },
    cancelRequest: {
        contract: 'validation',
        kind: 'write',
        params: [{ key: 'requestId', kind: 'bytes32' }],
    },
    getRequest: {
        contract: 'validation',
        kind: 'read',
        params: [{ key: 'requestId', kind: 'bytes32' }],
        returns: '(uint256 agentId, address requester, address validator, string requestUri, bytes32 requestDataHash, '
            + 'string resultUri, bytes32 resultHash, uint8 status, uint256 createdAt, uint256 completedAt)',
    },
    getAgentRequests: {
        contract: 'validation',
        kind: 'read',
        params: [{ key: 'agentId', kind: 'uint256' }],
        returns: '(bytes32[])',
    },
    getSummaryForAgent: {
        contract: 'validation',
        kind: 'read',
        params: [{ key: 'agentId', kind: 'uint256' }],
        returns: '(uint256 total, uint256 pending, uint256 completed, uint256 rejected, uint256 cancelled)',
    },

    giveFeedback: {
        contract: 'reputation',
        kind: 'write',
        params: [
            { key: 'agentId', kind: 'uint256' },
            { key: 'feedbackText', kind: 'string' },
            { key: 'sentiment', kind: 'sentiment' },
        ],
        extension: [
            { key: 'value', kind: 'int128', default: 0n },
            { key: 'valueDecimals', kind: 'uint8', default: 0 },
            { key: 'tag1', kind: 'string', default: '' },
            { key: 'tag2', kind: 'string', default: '' },
            { key: 'endpoint', kind: 'string', default: '' },
            { key: 'feedbackUri', kind: 'string', default: '' },
            { key: 'feedbackHash', kind: 'bytes32', default: ZERO_HASH },
        ],
    },
    revokeFeedback: {
        contract: 'reputation',
        kind: 'write',
        params: [
            { key: 'agentId', kind: 'uint256' },
            { key: 'feedbackIndex', kind: 'uint256' },
        ],
    },
    appendResponse: {
        contract: 'reputation',
        kind: 'write',
        params: [
            { key: 'agentId', kind: 'uint256' },
            { key: 'feedbackIndex', kind: 'uint256' },
            { key: 'responseText', kind: 'string' },
        ],
        extension: [
            { key: 'clientAddress', kind: 'address', default: ethers.ZeroAddress },
            { key: 'responseUri', kind: 'string', default: '' },
            { key: 'responseHash', kind: 'bytes32', default: ZERO_HASH },
        ],
    },
    getFeedback: {
        contract: 'reputation',
        kind: 'read',
        params: [
            { key: 'agentId', kind: 'uint256' },
            { key: 'feedbackIndex', kind: 'uint256' },
        ],
        returns: '(address client, string feedbackText, uint8 sentiment, uint256 timestamp, bool revoked, uint256 responseCount)',
    },
    getFeedbackCount: {
        contract: 'reputation',
        kind: 'read',
        params: [{ key: 'agentId', kind: 'uint256' }],
        returns: '(uint256)',
    },
    getSummary: {
        contract: 'reputation',
        kind: 'read',
        params: [{ key: 'agentId', kind: 'uint256' }],
        returns: '(uint256 total, uint256 active, uint256 revoked, uint256 positive, uint256 neutral, uint256 negative)',
    },
};

export const OPERATION_REGISTRY: OperationRegistry = Object.freeze(registry);

export function buildFragment<A>(method: string, descriptor: OperationDescriptor<A>, fields: readonly FieldSpec<A>[]): string {
    const inputs = fields.map((field) => `${SOLIDITY_TYPES[field.kind]} ${field.key}`).join(', ');
    const suffix = descriptor.kind === 'read' ? ` view returns ${descriptor.returns ?? '()'}` : '';
    return `function ${method}(${inputs})${suffix}`;
}
