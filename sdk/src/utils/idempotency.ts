/**
 * SPDX-License-Identifier: Apache-2.0
 */
import crypto from 'crypto';

export function generateRequestId(): string {
    return crypto.randomBytes(16).toString('hex');
}

export function generateIdempotencyKey(operation: string): string {
    return `${operation}:${generateRequestId()}`;
}
