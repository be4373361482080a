// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';

export const ZERO_HASH = '0000000000000000000000000000000000000000000000000000000000000000';

// 1.1 Hash Function (SHA-256)
export function hash(data: string | Uint8Array): string {
    return createHash('sha256').update(data).digest('hex');
}

export function digest(data: string | Uint8Array): Buffer {
    return createHash('sha256').update(data).digest();
}

// 1.2 Canonical Encoding
function normalize(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map((item) => normalize(item));
    }

    if (typeof value === 'number' && !Number.isFinite(value)) {
        throw new TypeError(`Cannot canonicalize non-finite number: ${value}`);
    }

    if (value !== null && typeof value === 'object') {
        const entries: [string, unknown][] = Object.entries(value);
        entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        const sorted: Record<string, unknown> = {};
        for (const [key, member] of entries) {
            if (member === undefined) continue;
            sorted[key] = normalize(member);
        }
        return sorted;
    }

    return value;
}

/**
 * Deterministic JSON: object keys sorted recursively, undefined members dropped.
 * Two structurally equal values always encode to the same string.
 */
export function canonicalize(value: unknown): string {
    return JSON.stringify(normalize(value));
}

export function hashObject(value: unknown): string {
    return hash(canonicalize(value));
}
