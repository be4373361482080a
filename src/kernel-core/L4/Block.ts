import { ZERO_HASH, canonicalize, digest } from '../L0/Crypto.js';
import { DIMENSIONS } from '../L0/Ontology.js';
import type { Block, BlockTemplate, Vector8 } from '../L0/Ontology.js';
import { parseTransaction } from '../L1/Transactions.js';
import { CoreError, ErrorCode } from '../Errors.js';

const UINT32_MAX = 0xffffffff;

/**
 * Canonical hash input: [index, timestamp, transactions, previousHash, nonce].
 * Reordering any transaction field changes the digest and the derived coordinate.
 */
export function hashInput(template: BlockTemplate, nonce: number): string {
    return canonicalize([template.index, template.timestamp, template.transactions, template.previousHash, nonce]);
}

export function blockDigest(template: BlockTemplate, nonce: number): Buffer {
    return digest(hashInput(template, nonce));
}

/**
 * Splits a 256-bit digest into 8 big-endian uint32 chunks scaled to [0, 1].
 */
export function positionFromDigest(bytes: Uint8Array): number[] {
    if (bytes.length !== DIMENSIONS * 4) {
        throw new RangeError(`Expected a ${DIMENSIONS * 4}-byte digest, got ${bytes.length}`);
    }
    const view = Buffer.from(bytes);
    const position: number[] = [];
    for (let i = 0; i < DIMENSIONS; i++) {
        position.push(view.readUInt32BE(i * 4) / UINT32_MAX);
    }
    return position;
}

export function sealBlock(template: BlockTemplate, nonce: number): Block {
    const bytes = blockDigest(template, nonce);
    return {
        index: template.index,
        timestamp: template.timestamp,
        transactions: template.transactions,
        previousHash: template.previousHash,
        nonce,
        hash: bytes.toString('hex'),
        position8d: positionFromDigest(bytes)
    };
}

export function templateOf(block: Block): BlockTemplate {
    return {
        index: block.index,
        timestamp: block.timestamp,
        transactions: block.transactions,
        previousHash: block.previousHash
    };
}

/** Recomputes hash and coordinate; true only when both match the stated values. */
export function hasConsistentHash(block: Block): boolean {
    const expected = sealBlock(templateOf(block), block.nonce);
    return expected.hash === block.hash && samePosition(expected.position8d, block.position8d);
}

function samePosition(a: Vector8, b: Vector8): boolean {
    return a.length === b.length && a.every((x, i) => x === b[i]);
}

// --- Genesis ---
export const GENESIS_BLOCK: Block = Object.freeze(
    sealBlock({ index: 0, timestamp: 0, transactions: [], previousHash: ZERO_HASH }, 0)
);

// --- Persisted Layout ---
export function serializeBlock(block: Block): Buffer {
    return Buffer.from(canonicalize(block), 'utf8');
}

const HEX_64 = /^[0-9a-f]{64}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(message: string, metadata?: Record<string, unknown>): CoreError {
    return new CoreError(ErrorCode.MALFORMED_BLOCK, message, metadata);
}

function nonNegativeInteger(record: Record<string, unknown>, key: string): number {
    const value = record[key];
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
        throw malformed(`Block field ${key} must be a non-negative integer`);
    }
    return value;
}

function hex(record: Record<string, unknown>, key: string): string {
    const value = record[key];
    if (typeof value !== 'string' || !HEX_64.test(value)) {
        throw malformed(`Block field ${key} must be a 64 character hex digest`);
    }
    return value;
}

/**
 * Structural check of a decoded block. Says nothing about linkage or PoHD;
 * the ledger decides those.
 */
export function parseBlock(value: unknown): Block {
    if (!isRecord(value)) throw malformed('Block must be an object');

    const timestamp = value['timestamp'];
    if (typeof timestamp !== 'number' || !Number.isFinite(timestamp)) {
        throw malformed('Block timestamp must be a number');
    }
    const transactions = value['transactions'];
    if (!Array.isArray(transactions)) throw malformed('Block transactions must be a list');
    const position8d = value['position8d'];
    if (!Array.isArray(position8d) || position8d.length !== DIMENSIONS) {
        throw malformed(`Block position must have ${DIMENSIONS} coordinates`);
    }

    return {
        index: nonNegativeInteger(value, 'index'),
        timestamp,
        transactions: transactions.map((tx: unknown) => parseTransaction(tx)),
        previousHash: hex(value, 'previousHash'),
        nonce: nonNegativeInteger(value, 'nonce'),
        hash: hex(value, 'hash'),
        position8d: position8d.map((x: unknown) => {
            if (typeof x !== 'number' || !Number.isFinite(x)) throw malformed('Block coordinates must be numbers');
            return x;
        })
    };
}

export function deserializeBlock(bytes: Uint8Array): Block {
    let raw: unknown;
    try {
        raw = JSON.parse(Buffer.from(bytes).toString('utf8'));
    } catch (e) {
        throw malformed('Block bytes are not valid JSON', { cause: String(e) });
    }
    return parseBlock(raw);
}
