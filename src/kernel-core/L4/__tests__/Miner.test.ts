import { describe, it, expect } from '@jest/globals';
import type { BlockTemplate } from '../../L0/Ontology.js';
import { GENESIS_BLOCK, hasConsistentHash } from '../Block.js';
import { mineSync, satisfiesPoHD } from '../Consensus.js';
import { CandidateBlock, Miner } from '../Miner.js';
import { ErrorCode } from '../../Errors.js';

const template: BlockTemplate = { index: 1, timestamp: 2000, transactions: [], previousHash: GENESIS_BLOCK.hash };

describe('CandidateBlock lifecycle', () => {
    it('should move PENDING -> MINING -> ACCEPTED', async () => {
        const candidate = new CandidateBlock(template);
        expect(candidate.state).toBe('PENDING');

        const result = await new Miner({ workers: 1 }).mine(candidate, 0);
        expect(result.status).toBe('FOUND');
        expect(candidate.state).toBe('MINING');

        candidate.accept();
        expect(candidate.state).toBe('ACCEPTED');
        expect(() => candidate.startMining()).toThrow(ErrorCode.ILLEGAL_TRANSITION);
    });

    it('should refuse to accept a block that was never sealed', () => {
        const candidate = new CandidateBlock(template);
        expect(() => candidate.accept()).toThrow(ErrorCode.ILLEGAL_TRANSITION);
        candidate.startMining();
        expect(() => candidate.accept()).toThrow(ErrorCode.ILLEGAL_TRANSITION);
    });

    it('should allow a restart back to PENDING', () => {
        const candidate = new CandidateBlock(template);
        candidate.startMining();
        candidate.restart();
        expect(candidate.state).toBe('PENDING');
        expect(() => candidate.restart()).toThrow(ErrorCode.ILLEGAL_TRANSITION);
    });
});

describe('Miner', () => {
    it('should find the same nonce as the sequential search with one worker', async () => {
        const result = await new Miner({ workers: 1, batchSize: 8 }).mine(new CandidateBlock(template), 4);
        expect(result.status).toBe('FOUND');
        if (result.status === 'FOUND') {
            expect(result.block.nonce).toBe(mineSync(template, 4).nonce);
        }
    });

    it('should find a valid block with several workers', async () => {
        const result = await new Miner({ workers: 4, batchSize: 4 }).mine(new CandidateBlock(template), 6);
        expect(result.status).toBe('FOUND');
        if (result.status === 'FOUND') {
            expect(hasConsistentHash(result.block)).toBe(true);
            expect(satisfiesPoHD(result.block.position8d, 6)).toBe(true);
        }
    });

    it('should stop on the first hit', async () => {
        const result = await new Miner({ workers: 3 }).mine(new CandidateBlock(template), 0);
        expect(result).toMatchObject({ status: 'FOUND', attempts: 1 });
    });

    it('should honour an aborted signal before searching', async () => {
        const controller = new AbortController();
        controller.abort();
        const candidate = new CandidateBlock(template);

        const result = await new Miner().mine(candidate, 0, { signal: controller.signal });
        expect(result).toEqual({ status: 'ABORTED', reason: 'SIGNAL', attempts: 0 });
        expect(candidate.state).toBe('PENDING');
    });

    it('should abort mid-search when the signal fires', async () => {
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 10);

        const result = await new Miner({ workers: 2, batchSize: 16 }).mine(new CandidateBlock(template), 64, {
            signal: controller.signal
        });
        expect(result.status).toBe('ABORTED');
        if (result.status === 'ABORTED') expect(result.reason).toBe('SIGNAL');
    });

    it('should abort when the chain tail moves', async () => {
        let checks = 0;
        const result = await new Miner({ workers: 2, batchSize: 16 }).mine(new CandidateBlock(template), 64, {
            isStale: () => ++checks > 3
        });
        expect(result.status).toBe('ABORTED');
        if (result.status === 'ABORTED') expect(result.reason).toBe('STALE');
    });

    it('should report an exhausted nonce space', async () => {
        const result = await new Miner({ workers: 2 }).mine(new CandidateBlock(template), 64, { maxAttempts: 50 });
        expect(result).toEqual({ status: 'ABORTED', reason: 'EXHAUSTED', attempts: 50 });
    });

    it('should refuse an empty worker pool', () => {
        expect(() => new Miner({ workers: 0 })).toThrow(ErrorCode.CONFIGURATION_INVALID);
    });
});
