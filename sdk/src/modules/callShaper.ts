/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';
import { SENTIMENT_CODES, Sentiment } from '../types/agent';
import { ValidationError } from '../types/errors';
import { CallLayout, ContractArg, ContractInvocation } from '../types/ledger';
import { isZeroHash, toBytes32 } from '../utils/hash';
import {
    FieldSpec,
    OPERATION_REGISTRY,
    OperationArgs,
    OperationName,
    buildFragment,
} from './operationRegistry';

const INT128_MAX = (1n << 127n) - 1n;
const INT128_MIN = -(1n << 127n);

function isSentiment(value: string): value is Sentiment {
    return Object.prototype.hasOwnProperty.call(SENTIMENT_CODES, value);
}

function toInteger(raw: unknown, field: string): bigint {
    if (typeof raw === 'bigint') {
        return raw;
    }
    if (typeof raw === 'number' && Number.isSafeInteger(raw)) {
        return BigInt(raw);
    }
    if (typeof raw === 'string' && /^-?\d+$/.test(raw.trim())) {
        return BigInt(raw.trim());
    }
    throw new ValidationError(`${field} must be an integer`, { field, value: String(raw) });
}

function encodeValue(kind: FieldSpec<unknown>['kind'], raw: unknown, field: string): ContractArg {
    switch (kind) {
        case 'uint256': {
            const value = toInteger(raw, field);
            if (value < 0n) {
                throw new ValidationError(`${field} cannot be negative`, { field, value: value.toString() });
            }
            return value;
        }
        case 'int128': {
            const value = toInteger(raw, field);
            if (value < INT128_MIN || value > INT128_MAX) {
                throw new ValidationError(`${field} does not fit in int128`, { field, value: value.toString() });
            }
            return value;
        }
        case 'uint8': {
            const value = toInteger(raw, field);
            if (value < 0n || value > 255n) {
                throw new ValidationError(`${field} must be between 0 and 255`, { field, value: value.toString() });
            }
            return Number(value);
        }
        case 'sentiment': {
            const normalized = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
            if (!isSentiment(normalized)) {
                throw new ValidationError(
                    `Invalid sentiment: ${String(raw)}. Must be positive/neutral/negative`,
                    { field, value: String(raw) }
                );
            }
            return SENTIMENT_CODES[normalized];
        }
        case 'string':
            if (typeof raw !== 'string') {
                throw new ValidationError(`${field} must be a string`, { field });
            }
            return raw;
        case 'address':
            if (typeof raw !== 'string' || !ethers.isAddress(raw)) {
                throw new ValidationError(`invalid ${field} address`, { field, address: String(raw) });
            }
            return ethers.getAddress(raw);
        case 'bytes32':
            if (typeof raw !== 'string' && !(raw instanceof Uint8Array)) {
                throw new ValidationError(`${field} must be a hex string or 32 bytes`, { field });
            }
            return toBytes32(raw, field);
    }
}

function encodeField<A>(operation: OperationName, field: FieldSpec<A>, raw: unknown): ContractArg {
    if (raw === undefined || raw === null) {
        if (field.default !== undefined) {
            return field.default;
        }
        throw new ValidationError(`${operation}: ${field.key} is required`, { operation, field: field.key });
    }

    const encoded = encodeValue(field.kind, raw, field.key);

    // an identifier in a bytes32 slot without a default must be real, not the sentinel
    if (field.kind === 'bytes32' && field.default === undefined && typeof encoded === 'string' && isZeroHash(encoded)) {
        throw new ValidationError(`${operation}: ${field.key} is required`, { operation, field: field.key });
    }

    return encoded;
}

function shape<K extends OperationName>(operation: K, args: OperationArgs[K]): {
    layout: CallLayout;
    args: ContractArg[];
    fields: readonly FieldSpec<OperationArgs[K]>[];
} {
    const descriptor = OPERATION_REGISTRY[operation];
    const params = descriptor.params;
    const extension = descriptor.extension ?? [];

    const base = params.map((field) => encodeField(operation, field, args[field.key]));
    const trailing = extension.map((field) => encodeField(operation, field, args[field.key]));

    const extended = trailing.some((value, index) => value !== extension[index].default);

    if (!extended) {
        return { layout: 'legacy', args: base, fields: params };
    }

    return { layout: 'extended', args: [...base, ...trailing], fields: [...params, ...extension] };
}

/**
 * Picks the wire layout for `operation`. The extended layout is chosen as
 * soon as one trailing optional field differs from its default; it then
 * carries every trailing field, defaults included.
 */
export function selectLayout<K extends OperationName>(operation: K, args: OperationArgs[K]): CallLayout {
    return shape(operation, args).layout;
}

export function shapeInvocation<K extends OperationName>(operation: K, args: OperationArgs[K]): ContractInvocation {
    const descriptor = OPERATION_REGISTRY[operation];
    const shaped = shape(operation, args);

    return Object.freeze({
        contract: descriptor.contract,
        operation,
        layout: shaped.layout,
        fragment: buildFragment(operation, descriptor, shaped.fields),
        args: Object.freeze(shaped.args),
    });
}

export function isReadOperation(operation: OperationName): boolean {
    return OPERATION_REGISTRY[operation].kind === 'read';
}
