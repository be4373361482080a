import { describe, it, expect } from '@jest/globals';
import { DEFAULT_NODE_CONFIG } from '../../infrastructure/config/Config.js';
import type { NodeConfig } from '../../infrastructure/config/Config.js';
import type { RandomSource } from '../../kernel-core/L0/Random.js';
import { FixedDifficulty, RetargetingDifficulty } from '../../kernel-core/L4/Consensus.js';
import { difficultySchedule, startNode } from '../NodePlatform.js';

const config: NodeConfig = {
    ...DEFAULT_NODE_CONFIG,
    dbPath: ':memory:',
    rewardAccount: 'miner-0',
    difficulty: { ...DEFAULT_NODE_CONFIG.difficulty, initial: 0, min: 0 },
    mining: { ...DEFAULT_NODE_CONFIG.mining, workers: 1 }
};

// Every normal draw sits half a unit above its mean, so the acceptance gate always passes.
const lucky: RandomSource = {
    next: () => 0.5,
    nextGaussian: (mean = 0) => mean + 0.5
};

describe('NodePlatform', () => {
    it('should pick the difficulty schedule from config', () => {
        expect(difficultySchedule(config.difficulty)).toBeInstanceOf(FixedDifficulty);
        expect(difficultySchedule({ ...config.difficulty, mode: 'retarget' })).toBeInstanceOf(RetargetingDifficulty);
    });

    it('should start a node that registers its reward account and mines', async () => {
        const platform = await startNode(config, {
            oracle: { score: async () => ({ correctness: 0.9, completeness: 0.8, coherence: 0.85, novelty: 0.4 }) },
            rng: lucky,
            clock: () => 1_000
        });

        try {
            const { node, ledger } = platform;
            await expect(node.getAccount('miner-0')).resolves.toMatchObject({ identity: 'miner-0', energy: 100 });

            await node.registerAccount('alice');
            const result = await node.submitSolution('alice', { id: 'p-1', difficulty: 0.2, requiredDomains: ['cosmology'] }, {
                answer: 'Redshift grows with distance.'
            });
            expect(result.accepted).toBe(true);

            const outcome = await node.mineBlock();
            expect(outcome.status).toBe('ACCEPTED');
            expect(ledger.getChainLength()).toBe(2);
            expect(node.getBalance('miner-0')).toBe(10);
            expect((await node.getAccount('alice')).problemsSolved).toBe(1);
        } finally {
            platform.close();
        }
    });
});
