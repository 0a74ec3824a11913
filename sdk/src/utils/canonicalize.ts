/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { LosslessNumber, isLosslessNumber } from 'lossless-json';
import { ValidationError } from '../types/errors';

// LosslessNumber carries a number exactly as it was written in parsed JSON
export type CanonicalPrimitive = null | boolean | string | number | LosslessNumber;
export type CanonicalValue = CanonicalPrimitive | CanonicalValue[] | CanonicalObject;
export interface CanonicalObject {
    [key: string]: CanonicalValue;
}

const utf8 = new TextEncoder();

function assertFiniteNumber(value: number, path: string): void {
    if (!Number.isFinite(value)) {
        throw new ValidationError('Non-finite numbers cannot be canonicalized', { path, value: String(value) });
    }
}

function canonicalizeArray(value: unknown[], path: string): CanonicalValue[] {
    // JSON.stringify writes undefined array slots as null
    return value.map((entry, index) => (entry === undefined ? null : canonicalizeAt(entry, `${path}[${index}]`)));
}

// byte order of the UTF-8 encoding, which is code point order
export function compareKeys(a: string, b: string): number {
    return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

function canonicalizeObject(value: object, path: string): CanonicalObject {
    const entries = Object.entries(value).sort(([a], [b]) => compareKeys(a, b));
    const result: CanonicalObject = {};

    for (const [key, raw] of entries) {
        if (raw === undefined) {
            continue;
        }
        // defineProperty keeps "__proto__" as an own data field
        Object.defineProperty(result, key, {
            value: canonicalizeAt(raw, `${path}.${key}`),
            enumerable: true,
            writable: true,
            configurable: true,
        });
    }

    return result;
}

function canonicalizeAt(value: unknown, path: string): CanonicalValue {
    if (value === null) {
        return null;
    }

    if (typeof value === 'string' || typeof value === 'boolean') {
        return value;
    }

    if (typeof value === 'number') {
        assertFiniteNumber(value, path);
        return value;
    }

    if (isLosslessNumber(value)) {
        return value;
    }

    if (Array.isArray(value)) {
        return canonicalizeArray(value, path);
    }

    if (value instanceof Date) {
        return value.toISOString();
    }

    if (typeof value === 'object') {
        return canonicalizeObject(value, path);
    }

    throw new ValidationError(`Unsupported value type in canonical document: ${typeof value}`, { path });
}

function serialize(value: CanonicalValue): string {
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value);
    }

    if (isLosslessNumber(value)) {
        return value.value;
    }

    if (Array.isArray(value)) {
        return `[${value.map(serialize).join(',')}]`;
    }

    // integer-like keys do not keep insertion order on a JS object, so sort here
    const members = Object.keys(value)
        .sort(compareKeys)
        .map((key) => `${JSON.stringify(key)}:${serialize(value[key])}`);
    return `{${members.join(',')}}`;
}

/**
 * Rebuilds a JSON value with object keys sorted at every depth and
 * undefined properties dropped. Keys compare by code point, which is the
 * byte order of their UTF-8 encoding.
 */
export function canonicalize(value: unknown): CanonicalValue {
    return canonicalizeAt(value, '$');
}

/**
 * Compact canonical JSON. Numbers parsed as LosslessNumber are written back
 * with their original text.
 */
export function canonicalJsonStringify(value: unknown): string {
    return serialize(canonicalize(value));
}

export function canonicalJsonBytes(value: unknown): Uint8Array {
    return utf8.encode(canonicalJsonStringify(value));
}
