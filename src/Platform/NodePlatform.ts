import fs from 'fs';
import path from 'path';
import { RandomEngine } from '../kernel-core/L0/Random.js';
import type { RandomSource } from '../kernel-core/L0/Random.js';
import { HeuristicOracle } from '../kernel-core/L3/HeuristicOracle.js';
import { ValidationPipeline } from '../kernel-core/L3/Validation.js';
import type { ScoringOracle } from '../kernel-core/L3/Validation.js';
import { FixedDifficulty, RetargetingDifficulty } from '../kernel-core/L4/Consensus.js';
import type { DifficultySchedule } from '../kernel-core/L4/Consensus.js';
import { Miner } from '../kernel-core/L4/Miner.js';
import { Ledger } from '../kernel-core/L5/Ledger.js';
import { LedgerNode } from '../kernel-core/Node.js';
import type { DifficultyConfig, NodeConfig } from '../infrastructure/config/Config.js';
import { SQLiteAccountStore } from '../infrastructure/persistence/SQLiteAccountStore.js';
import { SQLiteBlockStore } from '../infrastructure/persistence/SQLiteBlockStore.js';

export interface PlatformOverrides {
    oracle?: ScoringOracle;
    rng?: RandomSource;
    clock?: () => number;
}

/**
 * A running node with the resources it owns.
 */
export interface NodePlatform {
    node: LedgerNode;
    ledger: Ledger;
    close(): void;
}

export function difficultySchedule(config: DifficultyConfig): DifficultySchedule {
    if (config.mode === 'retarget') {
        return new RetargetingDifficulty({
            initial: config.initial,
            targetBlockTimeMs: config.targetBlockTimeMs,
            min: config.min,
            max: config.max
        });
    }
    return new FixedDifficulty(config.initial);
}

/**
 * Wires SQLite stores, the ledger (replayed from disk), the miner and the
 * validation pipeline into a node.
 */
export async function startNode(config: NodeConfig, overrides: PlatformOverrides = {}): Promise<NodePlatform> {
    if (config.dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(config.dbPath), { recursive: true });
    }

    const accounts = new SQLiteAccountStore(config.dbPath);
    const blocks = new SQLiteBlockStore(config.dbPath);
    const genesis = config.genesis;

    const ledger = await Ledger.load(accounts, {
        difficulty: difficultySchedule(config.difficulty),
        blockReward: config.blockReward,
        blockStore: blocks,
        genesis
    });

    const rng = overrides.rng ?? (config.seed !== undefined ? new RandomEngine(config.seed) : RandomEngine.fromEntropy());
    const node = new LedgerNode({
        ledger,
        accounts,
        validation: new ValidationPipeline(overrides.oracle ?? new HeuristicOracle(), {
            oracleTimeoutMs: config.validation.oracleTimeoutMs
        }),
        miner: new Miner(config.mining),
        rng,
        genesis,
        rewardAccount: config.rewardAccount,
        clock: overrides.clock
    });

    if (config.rewardAccount) await node.registerAccount(config.rewardAccount);
    console.log(`[Node] Ready: chain length ${ledger.getChainLength()}, difficulty ${ledger.difficultyFor(ledger.getChainLength())}`);

    return {
        node,
        ledger,
        close: () => {
            blocks.close();
            accounts.close();
        }
    };
}
