import { EnergyGuard, ProblemGuard, TransferGuard } from './L0/Guards.js';
import { KeyedMutex } from './L0/Mutex.js';
import { COINBASE } from './L0/Ontology.js';
import type {
    Account, AccountID, Block, Problem, Solution, Tier, Transaction, TransferTransaction
} from './L0/Ontology.js';
import type { RandomSource } from './L0/Random.js';
import { DEFAULT_GENESIS, createAccount, requireAccount } from './L1/AccountStore.js';
import type { AccountGenesis, IAccountStore } from './L1/AccountStore.js';
import { transferTransaction } from './L1/Transactions.js';
import { applySolution, attemptCost, regenerate } from './L2/Evolution.js';
import type { ValidationPipeline, ValidationVerdict } from './L3/Validation.js';
import { CandidateBlock } from './L4/Miner.js';
import type { AbortReason, Miner } from './L4/Miner.js';
import type { Ledger } from './L5/Ledger.js';
import { CoreError, ErrorCode, isCoreError } from './Errors.js';

export interface NodeOptions {
    ledger: Ledger;
    accounts: IAccountStore;
    validation: ValidationPipeline;
    miner: Miner;
    rng: RandomSource;
    genesis?: AccountGenesis;
    /** Receives the COINBASE reward of every block this node mines. */
    rewardAccount?: AccountID;
    clock?: () => number;
}

export interface SubmissionResult {
    accepted: boolean;
    quality: number;
    complexityDelta: number;
    /** Set only when the solution moved the account into a new tier. */
    newTier?: Tier;
    transactionId?: string;
    verdict: ValidationVerdict;
}

export interface RegenerationResult {
    account: Account;
    energyGained: number;
    transactionId: string;
}

export type MineOutcome =
    | { status: 'ACCEPTED'; block: Block; dropped: Transaction[] }
    | { status: 'EMPTY'; dropped: Transaction[] }
    | { status: 'ABORTED'; reason: AbortReason; dropped: Transaction[] };

export interface MineBlockOptions {
    signal?: AbortSignal;
}

/**
 * LEDGER NODE
 * Orchestrates submissions, the pending pool and block production.
 *
 * Every account mutation runs under that account's lock. The oracle is awaited
 * before the lock is taken and the working state is read again inside it.
 * Working state = newest pending post-state (overlay) or the committed record.
 */
export class LedgerNode {
    private mutex = new KeyedMutex();
    private overlay: Map<AccountID, Account> = new Map();
    private pool: Transaction[] = [];

    private readonly ledger: Ledger;
    private readonly accounts: IAccountStore;
    private readonly genesis: AccountGenesis;
    private readonly clock: () => number;

    constructor(private options: NodeOptions) {
        this.ledger = options.ledger;
        this.accounts = options.accounts;
        this.genesis = options.genesis ?? DEFAULT_GENESIS;
        this.clock = options.clock ?? Date.now;
    }

    // --- Accounts ---

    /** Creates the account with genesis values; registering an existing id returns it unchanged. */
    public async registerAccount(id: AccountID): Promise<Account> {
        if (!id || id === COINBASE) {
            throw new CoreError(ErrorCode.INVALID_TRANSACTION, `Account id ${JSON.stringify(id)} is reserved or empty`);
        }
        return this.mutex.runExclusive(id, async () => {
            const existing = await this.accounts.get(id);
            if (existing) return existing;
            const account = createAccount(id, this.genesis);
            await this.accounts.upsert(account);
            console.log(`[Node] Registered account ${id}`);
            return account;
        });
    }

    /** Committed state, as recorded by the last accepted block. */
    public async getAccount(id: AccountID): Promise<Account> {
        return requireAccount(this.accounts, id);
    }

    /** State including transactions still waiting in the pool. */
    public async getWorkingAccount(id: AccountID): Promise<Account> {
        return this.overlay.get(id) ?? requireAccount(this.accounts, id);
    }

    // --- Submissions ---

    public async submitSolution(accountId: AccountID, problem: Problem, solution: Solution): Promise<SubmissionResult> {
        const problemCheck = ProblemGuard(problem);
        if (!problemCheck.ok) throw new CoreError(problemCheck.code, problemCheck.violation, { problemId: problem.id });

        const snapshot = await this.getWorkingAccount(accountId);
        this.requireEnergy(snapshot, attemptCost(problem));

        const verdict = await this.options.validation.validate(snapshot, problem, solution, this.options.rng);
        if (!verdict.accepted) {
            console.log(`[Node] ${accountId} solution to ${problem.id} rejected (internal=${verdict.internalGate}, probabilistic=${verdict.probabilisticGate})`);
            return { accepted: false, quality: verdict.quality, complexityDelta: 0, verdict };
        }

        return this.mutex.runExclusive(accountId, async () => {
            const current = await this.getWorkingAccount(accountId);
            const result = applySolution(current, problem, verdict.quality, this.options.rng, this.clock());
            this.overlay.set(accountId, result.account);
            this.pool.push(result.transaction);

            const { event } = result;
            if (event.newTier !== event.oldTier) {
                console.log(`[Node] ${accountId} evolved: tier ${event.oldTier} -> ${event.newTier}`);
            }
            return {
                accepted: true,
                quality: verdict.quality,
                complexityDelta: event.complexityDelta,
                newTier: event.newTier !== event.oldTier ? event.newTier : undefined,
                transactionId: result.transaction.id,
                verdict
            };
        });
    }

    public async regenerate(accountId: AccountID, elapsedSeconds: number): Promise<RegenerationResult> {
        return this.mutex.runExclusive(accountId, async () => {
            const current = await this.getWorkingAccount(accountId);
            const result = regenerate(current, elapsedSeconds, this.clock());
            this.overlay.set(accountId, result.account);
            this.pool.push(result.transaction);
            return {
                account: result.account,
                energyGained: result.event.energyDelta,
                transactionId: result.transaction.id
            };
        });
    }

    public async submitTransfer(from: AccountID, to: AccountID, amount: number): Promise<TransferTransaction> {
        if (from === COINBASE) {
            throw new CoreError(ErrorCode.INVALID_TRANSACTION, 'COINBASE transfers are minted by block producers only');
        }
        return this.mutex.runExclusive(from, async () => {
            await requireAccount(this.accounts, from);
            await requireAccount(this.accounts, to);

            const outgoing = this.pool.filter((tx): tx is TransferTransaction => tx.kind === 'TRANSFER' && tx.payload.from === from);
            const payload = {
                from,
                to,
                amount,
                nonce: this.ledger.nextNonce(from) + outgoing.length
            };
            const guard = TransferGuard(payload);
            if (!guard.ok) throw new CoreError(guard.code, guard.violation, { from, to });

            const available = this.ledger.balanceOf(from) - outgoing.reduce((sum, tx) => sum + tx.payload.amount, 0);
            if (available < amount) {
                throw new CoreError(ErrorCode.INVALID_TRANSACTION, `Account ${from} can spend ${available}, transfer needs ${amount}`, {
                    accountId: from
                });
            }

            const tx = transferTransaction(payload, this.clock());
            this.pool.push(tx);
            return tx;
        });
    }

    public pendingTransactions(): readonly Transaction[] {
        return this.pool;
    }

    // --- Block Production ---

    /**
     * Assembles the pool into a block, mines and appends it. Transactions whose
     * pre-state diverged are dropped together with the overlay they built on;
     * a chain tip that moves mid-search restarts assembly.
     */
    public async mineBlock(options: MineBlockOptions = {}): Promise<MineOutcome> {
        const dropped: Transaction[] = [];

        for (;;) {
            const tip = this.ledger.tail.snapshot();
            const screened = await this.ledger.screen(this.pool);
            for (const { transaction, error } of screened.dropped) {
                console.warn(`[Node] Dropping ${transaction.kind} ${transaction.id.slice(0, 12)} of ${transaction.accountId}: ${error.message}`);
                dropped.push(transaction);
                await this.discard(transaction);
            }
            if (screened.valid.length === 0) return { status: 'EMPTY', dropped };

            const index = tip.index + 1;
            const timestamp = this.clock();
            const transactions: Transaction[] = [...screened.valid];
            if (this.options.rewardAccount) {
                transactions.unshift(transferTransaction({
                    from: COINBASE,
                    to: this.options.rewardAccount,
                    amount: this.ledger.getReward(),
                    nonce: index
                }, timestamp));
            }

            const candidate = new CandidateBlock({ index, timestamp, transactions, previousHash: tip.hash });
            const result = await this.options.miner.mine(candidate, this.ledger.difficultyFor(index), {
                signal: options.signal,
                isStale: () => this.ledger.tail.isStale(tip)
            });

            if (result.status === 'ABORTED') {
                if (result.reason === 'STALE') continue;
                return { status: 'ABORTED', reason: result.reason, dropped };
            }

            try {
                await this.ledger.append(result.block);
            } catch (e) {
                // The tip moved between the last staleness check and the append.
                if (isCoreError(e, ErrorCode.CHAIN_LINKAGE)) {
                    candidate.restart();
                    continue;
                }
                throw e;
            }
            candidate.accept();
            this.settle(result.block);
            return { status: 'ACCEPTED', block: result.block, dropped };
        }
    }

    /**
     * Accepts a block produced elsewhere. Pending work of every account the block
     * touched is discarded, since it was built on a state that is no longer the tip.
     */
    public async ingestBlock(block: Block, sourceId: string): Promise<Block> {
        const accepted = await this.ledger.ingest(block, sourceId);
        const included = this.settle(accepted);

        const touched = new Set(accepted.transactions.filter((tx) => tx.kind === 'EVOLUTION').map((tx) => tx.accountId));
        for (const accountId of touched) {
            await this.mutex.runExclusive(accountId, async () => {
                const stale = this.pool.filter((tx) => tx.kind === 'EVOLUTION' && tx.accountId === accountId && !included.has(tx.id));
                if (stale.length > 0) {
                    console.warn(`[Node] Block #${accepted.index} from ${sourceId} superseded ${stale.length} pending transaction(s) of ${accountId}`);
                }
                this.pool = this.pool.filter((tx) => !stale.includes(tx));
                this.overlay.delete(accountId);
            });
        }
        return accepted;
    }

    // --- Read API ---

    public getBlock(index: number): Block | null {
        return this.ledger.getBlock(index);
    }

    public getChainLength(): number {
        return this.ledger.getChainLength();
    }

    public getBalance(id: AccountID): number {
        return this.ledger.balanceOf(id);
    }

    // --- Internals ---

    private requireEnergy(account: Account, cost: number): void {
        const check = EnergyGuard({ account, cost });
        if (!check.ok) {
            throw new CoreError(check.code, check.violation, { accountId: account.identity, energy: account.energy, cost });
        }
    }

    /** Removes a transaction the ledger refused; an evolution takes its account's overlay with it. */
    private async discard(transaction: Transaction): Promise<void> {
        this.pool = this.pool.filter((tx) => tx.id !== transaction.id);
        if (transaction.kind !== 'EVOLUTION') return;
        await this.mutex.runExclusive(transaction.accountId, async () => {
            this.overlay.delete(transaction.accountId);
        });
    }

    /** Drops committed transactions from the pool and overlays that no longer lead the store. */
    private settle(block: Block): Set<string> {
        const included = new Set(block.transactions.map((tx) => tx.id));
        this.pool = this.pool.filter((tx) => !included.has(tx.id));
        for (const tx of block.transactions) {
            if (tx.kind !== 'EVOLUTION') continue;
            const stillPending = this.pool.some((p) => p.kind === 'EVOLUTION' && p.accountId === tx.accountId);
            if (!stillPending) this.overlay.delete(tx.accountId);
        }
        return included;
    }
}
