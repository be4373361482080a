import { describe, it, expect } from '@jest/globals';
import { ZERO_HASH, canonicalize } from '../../L0/Crypto.js';
import type { BlockTemplate } from '../../L0/Ontology.js';
import { transferTransaction } from '../../L1/Transactions.js';
import {
    GENESIS_BLOCK, deserializeBlock, hasConsistentHash, hashInput, parseBlock, positionFromDigest, sealBlock, serializeBlock
} from '../Block.js';
import { ErrorCode } from '../../Errors.js';

const template: BlockTemplate = {
    index: 1,
    timestamp: 5000,
    transactions: [transferTransaction({ from: 'COINBASE', to: 'miner', amount: 10, nonce: 1 }, 5000)],
    previousHash: GENESIS_BLOCK.hash
};

describe('Block', () => {
    it('should hard-code a genesis block', () => {
        expect(GENESIS_BLOCK.index).toBe(0);
        expect(GENESIS_BLOCK.timestamp).toBe(0);
        expect(GENESIS_BLOCK.transactions).toEqual([]);
        expect(GENESIS_BLOCK.previousHash).toBe(ZERO_HASH);
        expect(GENESIS_BLOCK.nonce).toBe(0);
        expect(hasConsistentHash(GENESIS_BLOCK)).toBe(true);
    });

    it('should hash the canonical tuple of the block fields', () => {
        expect(hashInput(template, 7)).toBe(
            canonicalize([1, 5000, template.transactions, GENESIS_BLOCK.hash, 7])
        );
    });

    it('should derive the coordinate from big-endian 32-bit chunks', () => {
        expect(positionFromDigest(Buffer.alloc(32, 0xff))).toEqual([1, 1, 1, 1, 1, 1, 1, 1]);
        expect(positionFromDigest(Buffer.alloc(32, 0))).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);

        const bytes = Buffer.alloc(32, 0);
        bytes.writeUInt32BE(0x80000000, 4);
        expect(positionFromDigest(bytes)[1]).toBe(0x80000000 / 0xffffffff);
        expect(() => positionFromDigest(Buffer.alloc(16))).toThrow(RangeError);
    });

    it('should change hash and coordinate with the nonce', () => {
        const a = sealBlock(template, 0);
        const b = sealBlock(template, 1);
        expect(a.hash).not.toBe(b.hash);
        expect(a.position8d).not.toEqual(b.position8d);
    });

    it('should detect a stated hash that does not match the content', () => {
        const block = sealBlock(template, 3);
        expect(hasConsistentHash(block)).toBe(true);
        expect(hasConsistentHash({ ...block, nonce: 4 })).toBe(false);
        expect(hasConsistentHash({ ...block, hash: 'f'.repeat(64) })).toBe(false);
    });

    it('should round-trip the persisted layout through the hash', () => {
        const block = sealBlock(template, 3);
        const restored = deserializeBlock(serializeBlock(block));

        expect(restored).toEqual(block);
        expect(hasConsistentHash(restored)).toBe(true);
    });

    it('should reject structurally broken blocks', () => {
        const block = JSON.parse(serializeBlock(sealBlock(template, 3)).toString('utf8'));
        let error: unknown;
        try {
            parseBlock({ ...block, previousHash: 'xyz' });
        } catch (e) {
            error = e;
        }
        expect(error).toMatchObject({ code: ErrorCode.MALFORMED_BLOCK });
        expect(() => deserializeBlock(Buffer.from('{'))).toThrow('MALFORMED_BLOCK');
    });
});
