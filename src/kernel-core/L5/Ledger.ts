import { hashObject } from '../L0/Crypto.js';
import { ProblemGuard, TransferGuard } from '../L0/Guards.js';
import { euclidean } from '../L0/Geometry.js';
import { checkInvariants } from '../L0/Invariants.js';
import { KeyedMutex } from '../L0/Mutex.js';
import { COINBASE, DIMENSIONS } from '../L0/Ontology.js';
import type {
    Account, AccountID, Block, EvolutionPayload, EvolutionTransaction, Tier, Transaction, TransferTransaction, Vector8
} from '../L0/Ontology.js';
import { energyCap } from '../L0/Tiers.js';
import { DEFAULT_GENESIS, InMemoryAccountStore, accountStateHash, createAccount } from '../L1/AccountStore.js';
import type { AccountGenesis, IAccountStore } from '../L1/AccountStore.js';
import { hasValidId } from '../L1/Transactions.js';
import {
    LEAP_SCALE_PER_TIER, attemptCost, regenerationAmount, regenerationEvent, solutionEvent, solutionOutcome
} from '../L2/Evolution.js';
import { GENESIS_BLOCK, hasConsistentHash } from '../L4/Block.js';
import { satisfiesPoHD } from '../L4/Consensus.js';
import type { DifficultySchedule } from '../L4/Consensus.js';
import { CoreError, ErrorCode, isCoreError } from '../Errors.js';
import { InMemoryBlockStore } from './BlockStore.js';
import type { IBlockStore } from './BlockStore.js';
import { ChainTail } from './ChainTail.js';
import type { TailSnapshot } from './ChainTail.js';

export const DEFAULT_BLOCK_REWARD = 10.0;

export interface LedgerOptions {
    difficulty: DifficultySchedule;
    blockReward?: number;
    blockStore?: IBlockStore;
    /** Registration state of accounts, used when replaying the chain from storage. */
    genesis?: AccountGenesis;
}

/**
 * Chain-derived state a block is validated against. Validation works on a copy
 * and the ledger swaps it in only after the whole block passed.
 */
interface WorkingSet {
    states: Map<AccountID, Account>;
    balances: Map<AccountID, number>;
    nonces: Map<AccountID, number>;
    ids: Set<string>;
    coinbaseSeen: boolean;
}

interface TransactionContext {
    index: number;
    position: number;
}

export interface ScreenResult {
    valid: Transaction[];
    dropped: { transaction: Transaction; error: CoreError }[];
}

export type ChainVerdict =
    | { valid: true; length: number }
    | { valid: false; index: number; error: CoreError };

const CHAIN_LOCK = 'chain';
const LEAP_TOLERANCE = 1e-9;

/**
 * Append-only chain of PoHD blocks.
 * Every block, local or external, passes the same checks in the same order:
 * shape, hash/position, linkage, PoHD, transactions. A failure rejects the whole block.
 */
export class Ledger {
    private chain: Block[] = [GENESIS_BLOCK];
    private txIds: Set<string> = new Set();
    private states: Map<AccountID, Account> = new Map();
    private balances: Map<AccountID, number> = new Map();
    private nonces: Map<AccountID, number> = new Map();
    private halted: Map<string, CoreError> = new Map();
    private lock = new KeyedMutex();
    private replaying = false;

    public readonly tail = new ChainTail(GENESIS_BLOCK);
    private readonly blockReward: number;
    private readonly blockStore: IBlockStore;
    private readonly genesis: AccountGenesis;

    constructor(private accounts: IAccountStore, private options: LedgerOptions) {
        this.blockReward = options.blockReward ?? DEFAULT_BLOCK_REWARD;
        this.blockStore = options.blockStore ?? new InMemoryBlockStore();
        this.genesis = options.genesis ?? DEFAULT_GENESIS;
    }

    /**
     * Rebuilds a ledger from its block store, validating every stored block again.
     */
    public static async load(accounts: IAccountStore, options: LedgerOptions): Promise<Ledger> {
        const ledger = new Ledger(accounts, options);
        const stored = await ledger.blockStore.load();

        ledger.replaying = true;
        try {
            for (const block of stored) {
                await ledger.commit(block, await ledger.stage(block));
            }
        } finally {
            ledger.replaying = false;
        }

        for (const account of ledger.states.values()) {
            await accounts.upsert(account);
        }
        if (stored.length > 0) {
            console.log(`[Ledger] Replayed ${stored.length} blocks, tip #${ledger.tail.snapshot().index}`);
        }
        return ledger;
    }

    // --- Read API ---

    public getBlock(index: number): Block | null {
        return this.chain[index] ?? null;
    }

    public getChainLength(): number {
        return this.chain.length;
    }

    public getTip(): TailSnapshot {
        return this.tail.snapshot();
    }

    /** Token balance derived from every TRANSFER on the chain. */
    public balanceOf(id: AccountID): number {
        return this.balances.get(id) ?? 0;
    }

    /** Nonce the next transfer from this account must carry. */
    public nextNonce(id: AccountID): number {
        return this.nonces.get(id) ?? 0;
    }

    public hasTransaction(id: string): boolean {
        return this.txIds.has(id);
    }

    public getReward(): number {
        return this.blockReward;
    }

    public difficultyFor(index: number): number {
        return this.options.difficulty.difficultyFor(this.chain, index);
    }

    public isHalted(sourceId: string): boolean {
        return this.halted.has(sourceId);
    }

    // --- Write API ---

    /**
     * Validates and appends a block. Throws the first violated rule as a CoreError.
     */
    public async append(block: Block): Promise<Block> {
        return this.lock.runExclusive(CHAIN_LOCK, async () => {
            await this.commit(block, await this.stage(block));
            console.log(`[Ledger] Block #${block.index} accepted (${block.transactions.length} tx, ${block.hash.slice(0, 12)})`);
            return block;
        });
    }

    /**
     * Appends a block received from another source. A corruption-class failure
     * halts the source; every later block from it is refused unseen.
     */
    public async ingest(block: Block, sourceId: string): Promise<Block> {
        const cause = this.halted.get(sourceId);
        if (cause) {
            throw new CoreError(ErrorCode.SOURCE_HALTED, `Source ${sourceId} is halted`, {
                sourceId,
                cause: cause.message
            }, 'FAULT');
        }

        try {
            return await this.append(block);
        } catch (e) {
            if (isCoreError(e) && e.isFault) {
                this.halted.set(sourceId, e);
                console.error(`[Ledger] Halting source ${sourceId}: ${e.message}`);
            }
            throw e;
        }
    }

    /**
     * Dry-runs candidate transactions against the current tip in order,
     * keeping the ones that would be accepted in a block at the next index.
     */
    public async screen(transactions: readonly Transaction[]): Promise<ScreenResult> {
        return this.lock.runExclusive(CHAIN_LOCK, async () => {
            let working = this.workingSet();
            const index = this.chain.length;
            const result: ScreenResult = { valid: [], dropped: [] };

            for (const tx of transactions) {
                const trial = this.fork(working);
                try {
                    await this.applyTransaction(tx, { index, position: result.valid.length }, trial);
                } catch (e) {
                    if (!isCoreError(e)) throw e;
                    result.dropped.push({ transaction: tx, error: e });
                    continue;
                }
                working = trial;
                result.valid.push(tx);
            }
            return result;
        });
    }

    /**
     * Replays the whole chain into a scratch ledger over a copy of the account table.
     */
    public async verifyChain(): Promise<ChainVerdict> {
        const snapshot = new InMemoryAccountStore(await this.accounts.list());
        const replica = new Ledger(snapshot, { ...this.options, blockStore: new InMemoryBlockStore() });
        replica.replaying = true;
        for (const block of this.chain.slice(1)) {
            try {
                await replica.commit(block, await replica.stage(block));
            } catch (e) {
                if (!isCoreError(e)) throw e;
                return { valid: false, index: block.index, error: e };
            }
        }
        return { valid: true, length: this.chain.length };
    }

    // --- Validation ---

    /** Runs every acceptance rule against the current tip without appending. */
    public async validateBlock(block: Block): Promise<void> {
        await this.stage(block);
    }

    private async stage(block: Block): Promise<WorkingSet> {
        // Shape
        if (block.position8d.length !== DIMENSIONS) {
            throw new CoreError(ErrorCode.MALFORMED_BLOCK, `Block #${block.index} position must have ${DIMENSIONS} coordinates`);
        }
        if (block.transactions.length === 0) {
            throw new CoreError(ErrorCode.MALFORMED_BLOCK, `Block #${block.index} carries no transactions`);
        }

        // (c) Hash and coordinate
        if (!hasConsistentHash(block)) {
            throw new CoreError(ErrorCode.MALFORMED_BLOCK, `Block #${block.index} hash does not match its content`, {
                index: block.index,
                hash: block.hash
            }, 'FAULT');
        }

        // (a)/(b) Linkage
        const tip = this.tail.snapshot();
        if (block.index !== tip.index + 1) {
            throw new CoreError(ErrorCode.CHAIN_LINKAGE, `Expected block #${tip.index + 1}, got #${block.index}`, {
                expected: tip.index + 1,
                actual: block.index
            });
        }
        if (block.previousHash !== tip.hash) {
            throw new CoreError(ErrorCode.CHAIN_LINKAGE, `Block #${block.index} does not extend the tip`, {
                expected: tip.hash,
                actual: block.previousHash
            });
        }

        // (d) Proof of HyperDistance
        const difficulty = this.difficultyFor(block.index);
        if (!satisfiesPoHD(block.position8d, difficulty)) {
            throw new CoreError(ErrorCode.INVALID_NONCE, `Nonce ${block.nonce} misses the difficulty ${difficulty} target`, {
                index: block.index,
                difficulty
            });
        }

        // (e) Transactions
        const working = this.workingSet();
        for (const [position, tx] of block.transactions.entries()) {
            await this.applyTransaction(tx, { index: block.index, position }, working);
        }
        return working;
    }

    private async commit(block: Block, working: WorkingSet): Promise<void> {
        if (!this.replaying) await this.blockStore.append(block);

        this.chain.push(block);
        this.txIds = working.ids;
        this.balances = working.balances;
        this.nonces = working.nonces;
        const touched = block.transactions
            .filter((tx): tx is EvolutionTransaction => tx.kind === 'EVOLUTION')
            .map((tx) => tx.accountId);
        this.states = working.states;
        this.tail.advance(block);

        if (this.replaying) return;
        for (const id of new Set(touched)) {
            const account = this.states.get(id);
            if (account) await this.accounts.upsert(account);
        }
    }

    private workingSet(): WorkingSet {
        return {
            states: new Map(this.states),
            balances: new Map(this.balances),
            nonces: new Map(this.nonces),
            ids: new Set(this.txIds),
            coinbaseSeen: false
        };
    }

    private fork(working: WorkingSet): WorkingSet {
        return {
            states: new Map(working.states),
            balances: new Map(working.balances),
            nonces: new Map(working.nonces),
            ids: new Set(working.ids),
            coinbaseSeen: working.coinbaseSeen
        };
    }

    private async applyTransaction(tx: Transaction, ctx: TransactionContext, working: WorkingSet): Promise<void> {
        if (!hasValidId(tx)) {
            throw new CoreError(ErrorCode.MALFORMED_BLOCK, `Transaction id ${tx.id} does not match its content`, {
                index: ctx.index
            }, 'FAULT');
        }
        if (working.ids.has(tx.id)) {
            throw new CoreError(ErrorCode.INVALID_TRANSACTION, `Transaction ${tx.id} is already on the chain`, {
                transactionId: tx.id
            });
        }

        if (tx.kind === 'EVOLUTION') {
            await this.applyEvolution(tx, working);
        } else {
            await this.applyTransfer(tx, ctx, working);
        }
        working.ids.add(tx.id);
    }

    private async requireRegistered(id: AccountID): Promise<void> {
        if (!(await this.accounts.get(id))) {
            throw new CoreError(ErrorCode.ACCOUNT_NOT_FOUND, `Account ${id} is not registered`, { accountId: id });
        }
    }

    /** Latest chain-derived state, or the registration state for an account the chain has not touched. */
    private async preState(id: AccountID, working: WorkingSet): Promise<Account> {
        const known = working.states.get(id);
        if (known) return known;
        const stored = await this.accounts.get(id);
        if (!stored) {
            throw new CoreError(ErrorCode.ACCOUNT_NOT_FOUND, `Account ${id} is not registered`, { accountId: id });
        }
        return this.replaying ? createAccount(id, this.genesis) : stored;
    }

    private async applyEvolution(tx: EvolutionTransaction, working: WorkingSet): Promise<void> {
        const payload = tx.payload;
        const prior = await this.preState(tx.accountId, working);

        if (payload.priorStateHash !== accountStateHash(prior)) {
            throw new CoreError(ErrorCode.INVALID_TRANSACTION, `Transaction ${tx.id} was built on a stale state of ${tx.accountId}`, {
                accountId: tx.accountId,
                transactionId: tx.id
            });
        }

        const expected = this.recompute(tx, prior);
        if (hashObject(expected) !== hashObject(payload)) {
            throw new CoreError(ErrorCode.INTEGRITY_BREACH, `Transaction ${tx.id} does not match its recomputation`, {
                accountId: tx.accountId,
                transactionId: tx.id
            }, 'FAULT');
        }

        const check = checkInvariants({ account: payload.resultingState, prior });
        if (!check.ok) {
            throw new CoreError(check.rejection.code, check.rejection.message, {
                invariantId: check.rejection.invariantId,
                transactionId: tx.id
            }, 'FAULT');
        }

        working.states.set(tx.accountId, payload.resultingState);
    }

    /**
     * Rebuilds the payload an honest engine would have produced from `prior`.
     * Only the leap direction on a tier change is taken from the payload.
     */
    private recompute(tx: EvolutionTransaction, prior: Account): EvolutionPayload {
        const payload = tx.payload;

        if (payload.event === 'REGENERATION') {
            if (!Number.isFinite(payload.elapsedSeconds) || payload.elapsedSeconds < 0) {
                throw new CoreError(ErrorCode.INVALID_TRANSACTION, `Transaction ${tx.id} has a negative elapsed time`);
            }
            const energy = Math.min(energyCap(prior.tier), prior.energy + regenerationAmount(prior, payload.elapsedSeconds));
            return regenerationEvent(prior, { ...prior, energy }, payload.elapsedSeconds);
        }

        const problem = { id: payload.problemId, difficulty: payload.difficulty, requiredDomains: payload.requiredDomains };
        const problemCheck = ProblemGuard(problem);
        if (!problemCheck.ok) {
            throw new CoreError(problemCheck.code, problemCheck.violation, { transactionId: tx.id });
        }
        if (!Number.isFinite(payload.quality) || payload.quality < 0 || payload.quality > 1) {
            throw new CoreError(ErrorCode.INVALID_TRANSACTION, `Transaction ${tx.id} quality is outside [0, 1]`);
        }
        if (prior.energy < attemptCost(problem)) {
            throw new CoreError(ErrorCode.INSUFFICIENT_ENERGY, `Account ${tx.accountId} could not afford transaction ${tx.id}`, {
                accountId: tx.accountId
            });
        }

        const outcome = solutionOutcome(prior, problem.difficulty, problem.requiredDomains, payload.quality);
        const crossed = outcome.newTier !== outcome.oldTier;
        if (crossed) this.checkLeap(tx, payload.resultingState.position8d, outcome.position8d, outcome.newTier);
        const next: Account = {
            ...prior,
            complexityIndex: outcome.newComplexityIndex,
            energy: outcome.energy,
            tier: outcome.newTier,
            knowledgeVector: outcome.knowledgeVector,
            position8d: crossed ? payload.resultingState.position8d : outcome.position8d,
            problemsSolved: prior.problemsSolved + 1,
            totalDifficulty: prior.totalDifficulty + problem.difficulty
        };
        return solutionEvent(prior, next, problem, payload.quality, outcome);
    }

    /** Clamping only shortens a leap, so the leapt position lies within the leap radius of the directed update. */
    private checkLeap(tx: EvolutionTransaction, leapt: Vector8, directed: Vector8, newTier: Tier): void {
        const distance = leapt.length === DIMENSIONS ? euclidean(leapt, directed) : Infinity;
        const radius = LEAP_SCALE_PER_TIER * newTier;
        if (!(distance <= radius + LEAP_TOLERANCE)) {
            throw new CoreError(ErrorCode.INTEGRITY_BREACH, `Transaction ${tx.id} leaps ${distance} from the updated position, limit ${radius}`, {
                accountId: tx.accountId,
                transactionId: tx.id
            }, 'FAULT');
        }
    }

    private async applyTransfer(tx: TransferTransaction, ctx: TransactionContext, working: WorkingSet): Promise<void> {
        const { from, to, amount, nonce } = tx.payload;
        const guard = TransferGuard(tx.payload);
        if (!guard.ok) throw new CoreError(guard.code, guard.violation, { transactionId: tx.id });
        if (tx.accountId !== from) {
            throw new CoreError(ErrorCode.INVALID_TRANSACTION, `Transaction ${tx.id} is not filed under its sender`);
        }

        if (from === COINBASE) {
            if (ctx.position !== 0 || working.coinbaseSeen) {
                throw new CoreError(ErrorCode.INVALID_TRANSACTION, 'Block reward must be the first and only COINBASE transfer', {
                    index: ctx.index
                });
            }
            if (amount !== this.blockReward || nonce !== ctx.index) {
                throw new CoreError(ErrorCode.INVALID_TRANSACTION, `Block reward must be ${this.blockReward} with nonce ${ctx.index}`, {
                    amount,
                    nonce
                });
            }
            working.coinbaseSeen = true;
        } else {
            await this.requireRegistered(from);
            const balance = working.balances.get(from) ?? 0;
            if (balance < amount) {
                throw new CoreError(ErrorCode.INVALID_TRANSACTION, `Account ${from} holds ${balance}, transfer needs ${amount}`, {
                    accountId: from
                });
            }
            const expectedNonce = working.nonces.get(from) ?? 0;
            if (nonce !== expectedNonce) {
                throw new CoreError(ErrorCode.INVALID_TRANSACTION, `Transfer nonce ${nonce} from ${from}, expected ${expectedNonce}`, {
                    accountId: from
                });
            }
            working.balances.set(from, balance - amount);
            working.nonces.set(from, expectedNonce + 1);
        }

        await this.requireRegistered(to);
        working.balances.set(to, (working.balances.get(to) ?? 0) + amount);
    }
}
