/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { createHash } from 'crypto';
import { ethers } from 'ethers';
import { ValidationError } from '../types/errors';
import { canonicalJsonStringify } from './canonicalize';

// 32 zero bytes: the registries compute the hash themselves when they see it
export const ZERO_HASH: string = ethers.ZeroHash;

const BYTES32_PATTERN = /^0x[0-9a-f]{64}$/;

const utf8 = new TextEncoder();

export interface DocumentHash {
    canonicalJson: string;
    bytes: Uint8Array;
    hash: string;
}

function toBytes(data: Uint8Array | string): Uint8Array {
    return typeof data === 'string' ? utf8.encode(data) : data;
}

export function keccak256Hex(data: Uint8Array | string): string {
    return ethers.keccak256(toBytes(data));
}

export function keccak256Bytes(data: Uint8Array | string): Uint8Array {
    return ethers.getBytes(keccak256Hex(data));
}

export function sha256Hex(data: Uint8Array | string): string {
    return `0x${createHash('sha256').update(toBytes(data)).digest('hex')}`;
}

export function hashDocument(doc: unknown): DocumentHash {
    const canonicalJson = canonicalJsonStringify(doc);
    const bytes = utf8.encode(canonicalJson);

    return {
        canonicalJson,
        bytes,
        hash: keccak256Hex(bytes),
    };
}

export function computeDocumentHash(doc: unknown): string {
    return hashDocument(doc).hash;
}

export function normalizeHash(value: string | null | undefined): string {
    if (!value) {
        return '';
    }

    const lowered = value.trim().toLowerCase();
    return lowered.startsWith('0x') ? lowered.slice(2) : lowered;
}

export function hashesMatch(a: string | null | undefined, b: string | null | undefined): boolean {
    const left = normalizeHash(a);
    return left.length > 0 && left === normalizeHash(b);
}

export function isZeroHash(value: string): boolean {
    return normalizeHash(value) === normalizeHash(ZERO_HASH);
}

export function toBytes32(value: string | Uint8Array | null | undefined, fieldName: string = 'hash'): string {
    if (value === null || value === undefined || value === '') {
        return ZERO_HASH;
    }

    if (typeof value !== 'string') {
        if (value.length !== 32) {
            throw new ValidationError(`${fieldName} must be exactly 32 bytes`, { fieldName, length: value.length });
        }
        return ethers.hexlify(value);
    }

    const normalized = `0x${normalizeHash(value)}`;
    if (!BYTES32_PATTERN.test(normalized)) {
        throw new ValidationError(
            `${fieldName} must be a 32-byte hex string (0x...)`,
            { fieldName, value, length: value.length }
        );
    }

    return normalized;
}
