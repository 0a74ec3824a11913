/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';
import { HashInput, IntegerInput } from '../types/agent';
import { ValidationError } from '../types/errors';
import { isZeroHash, toBytes32 } from './hash';


export function validateAddress(address: string, fieldName: string): void {
    if (!ethers.isAddress(address)) {
        throw new ValidationError(`invalid ${fieldName} address`, { address, fieldName });
    }
    if (address === ethers.ZeroAddress) {
        throw new ValidationError(`${fieldName} cannot be zero address`, { address, fieldName });
    }
}


export function validateAgentId(agentId: IntegerInput): bigint {
    let id: bigint;

    if (typeof agentId === 'bigint') {
        id = agentId;
    } else if (typeof agentId === 'number' && Number.isSafeInteger(agentId)) {
        id = BigInt(agentId);
    } else if (typeof agentId === 'string' && /^\d+$/.test(agentId.trim())) {
        id = BigInt(agentId.trim());
    } else {
        throw new ValidationError('agentId must be a non-negative integer', { agentId: String(agentId) });
    }

    if (id < 0n) {
        throw new ValidationError('agentId cannot be negative', { agentId: id });
    }

    return id;
}


// should be 32 bytes and never the zero sentinel
export function validateRequestId(requestId: HashInput): string {
    const normalized = toBytes32(requestId, 'requestId');

    if (isZeroHash(normalized)) {
        throw new ValidationError('requestId is required', { requestId: normalized });
    }

    return normalized;
}
