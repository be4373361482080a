import { describe, it, expect } from '@jest/globals';
import { GENESIS_BLOCK, sealBlock } from '../../L4/Block.js';
import { ChainTail } from '../ChainTail.js';

describe('ChainTail', () => {
    it('should start at the genesis block', () => {
        const tail = new ChainTail(GENESIS_BLOCK);
        expect(tail.snapshot()).toEqual({ index: 0, hash: GENESIS_BLOCK.hash, generation: 0 });
    });

    it('should mark earlier snapshots stale once it advances', () => {
        const tail = new ChainTail(GENESIS_BLOCK);
        const seen = tail.snapshot();
        expect(tail.isStale(seen)).toBe(false);

        const block = sealBlock({ index: 1, timestamp: 10, transactions: [], previousHash: GENESIS_BLOCK.hash }, 3);
        const next = tail.advance(block);

        expect(next).toEqual({ index: 1, hash: block.hash, generation: 1 });
        expect(tail.isStale(seen)).toBe(true);
        expect(tail.isStale(next)).toBe(false);
    });
});
