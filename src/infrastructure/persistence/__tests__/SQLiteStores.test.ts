import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { COINBASE } from '../../../kernel-core/L0/Ontology.js';
import { RandomEngine } from '../../../kernel-core/L0/Random.js';
import { createAccount } from '../../../kernel-core/L1/AccountStore.js';
import { transferTransaction } from '../../../kernel-core/L1/Transactions.js';
import { applySolution } from '../../../kernel-core/L2/Evolution.js';
import { GENESIS_BLOCK } from '../../../kernel-core/L4/Block.js';
import { FixedDifficulty, mineSync } from '../../../kernel-core/L4/Consensus.js';
import { Ledger } from '../../../kernel-core/L5/Ledger.js';
import { SQLiteAccountStore } from '../SQLiteAccountStore.js';
import { SQLiteBlockStore } from '../SQLiteBlockStore.js';

function sampleBlock() {
    const { account, transaction } = applySolution(
        createAccount('alice'),
        { id: 'p-chem', difficulty: 0.3, requiredDomains: ['chemistry', 'physics'] },
        0.65,
        new RandomEngine(3),
        1500
    );
    const reward = transferTransaction({ from: COINBASE, to: 'alice', amount: 10, nonce: 1 }, 1500);
    const block = mineSync({ index: 1, timestamp: 1500, transactions: [reward, transaction], previousHash: GENESIS_BLOCK.hash }, 0);
    return { account, block };
}

describe('SQLiteAccountStore', () => {
    let store: SQLiteAccountStore;

    beforeEach(() => {
        store = new SQLiteAccountStore(':memory:');
    });

    afterEach(() => {
        store.close();
    });

    it('should return null for an unknown identity', async () => {
        await expect(store.get('alice')).resolves.toBeNull();
    });

    it('should insert, overwrite and list accounts by identity', async () => {
        await store.upsert(createAccount('bob'));
        await store.upsert(createAccount('alice'));
        const { account } = sampleBlock();
        await store.upsert(account);

        expect(await store.get('alice')).toEqual(account);
        expect((await store.list()).map((a) => a.identity)).toEqual(['alice', 'bob']);
    });
});

describe('SQLiteBlockStore', () => {
    let store: SQLiteBlockStore;

    beforeEach(() => {
        store = new SQLiteBlockStore(':memory:');
    });

    afterEach(() => {
        store.close();
    });

    it('should return the stored block unchanged', async () => {
        const { block } = sampleBlock();
        await expect(store.load()).resolves.toEqual([]);

        await store.append(block);

        expect(await store.load()).toEqual([block]);
    });

    it('should refuse a second block at the same index', async () => {
        const { block } = sampleBlock();
        await store.append(block);
        await expect(store.append(block)).rejects.toThrow();
    });
});

describe('Ledger over SQLite', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pohd-ledger-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should replay a chain written by an earlier session', async () => {
        const dbPath = path.join(dir, 'ledger.db');
        const { account, block } = sampleBlock();

        const accounts = new SQLiteAccountStore(dbPath);
        const blocks = new SQLiteBlockStore(dbPath);
        await accounts.upsert(createAccount('alice'));
        const ledger = new Ledger(accounts, { difficulty: new FixedDifficulty(0), blockStore: blocks });
        await ledger.append(block);
        blocks.close();
        accounts.close();

        const reopenedAccounts = new SQLiteAccountStore(dbPath);
        const reopenedBlocks = new SQLiteBlockStore(dbPath);
        try {
            const restored = await Ledger.load(reopenedAccounts, { difficulty: new FixedDifficulty(0), blockStore: reopenedBlocks });
            expect(restored.getChainLength()).toBe(2);
            expect(restored.getTip().hash).toBe(block.hash);
            expect(restored.balanceOf('alice')).toBe(10);
            expect(await reopenedAccounts.get('alice')).toEqual(account);
        } finally {
            reopenedBlocks.close();
            reopenedAccounts.close();
        }
    });
});
