import { setImmediate as yieldToLoop } from 'timers/promises';
import type { Block, BlockLifecycle, BlockTemplate } from '../L0/Ontology.js';
import { CoreError, ErrorCode } from '../Errors.js';
import { sealBlock } from './Block.js';
import { DEFAULT_MAX_ATTEMPTS, satisfiesPoHD } from './Consensus.js';

/**
 * A block under construction. Everything but the nonce is fixed once mining starts.
 */
export class CandidateBlock {
    private lifecycle: BlockLifecycle = 'PENDING';
    private sealed: Block | null = null;

    constructor(public readonly template: BlockTemplate) { }

    public get state(): BlockLifecycle {
        return this.lifecycle;
    }

    public get block(): Block | null {
        return this.sealed;
    }

    public startMining(): void {
        this.transition('MINING');
    }

    /** Search gave up (aborted or stale); the candidate may be mined again. */
    public restart(): void {
        this.transition('PENDING');
    }

    public seal(block: Block): void {
        if (this.lifecycle !== 'MINING') {
            throw new CoreError(ErrorCode.ILLEGAL_TRANSITION, `Cannot seal a ${this.lifecycle} block`);
        }
        this.sealed = block;
    }

    public accept(): void {
        if (!this.sealed) {
            throw new CoreError(ErrorCode.ILLEGAL_TRANSITION, 'Cannot accept a block without a nonce');
        }
        this.transition('ACCEPTED');
    }

    private transition(to: BlockLifecycle): void {
        const from = this.lifecycle;
        const allowed: Record<BlockLifecycle, BlockLifecycle[]> = {
            'PENDING': ['MINING'],
            'MINING': ['ACCEPTED', 'PENDING'],
            'ACCEPTED': []
        };

        if (!allowed[from].includes(to)) {
            throw new CoreError(ErrorCode.ILLEGAL_TRANSITION, `Illegal block transition ${from} -> ${to}`, {
                index: this.template.index
            });
        }
        if (to === 'PENDING') this.sealed = null;
        this.lifecycle = to;
    }
}

export type AbortReason = 'SIGNAL' | 'STALE' | 'EXHAUSTED';

export type MiningResult =
    | { status: 'FOUND'; block: Block; attempts: number }
    | { status: 'ABORTED'; reason: AbortReason; attempts: number };

interface SearchState {
    found: Block | null;
    attempts: number;
    stop: AbortReason | null;
}

export interface MineOptions {
    signal?: AbortSignal;
    /** Polled between batches; true when the chain tail moved under the miner. */
    isStale?: () => boolean;
    maxAttempts?: number;
}

export interface MinerOptions {
    workers?: number;
    /** Nonces a worker tries before yielding to the event loop. */
    batchSize?: number;
    /** Size of the nonce space searched before giving up. */
    maxAttempts?: number;
}

/**
 * Cooperative nonce search. Worker w tries w, w + N, w + 2N, ...; the first hit
 * stops every worker. Workers share the event loop, so submissions keep flowing
 * between batches.
 */
export class Miner {
    private readonly workers: number;
    private readonly batchSize: number;
    private readonly maxAttempts: number;

    constructor(options: MinerOptions = {}) {
        this.workers = options.workers ?? 4;
        this.batchSize = options.batchSize ?? 256;
        this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
        if (!Number.isInteger(this.workers) || this.workers < 1) {
            throw new CoreError(ErrorCode.CONFIGURATION_INVALID, `Miner needs at least one worker, got ${this.workers}`);
        }
        if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
            throw new CoreError(ErrorCode.CONFIGURATION_INVALID, `Miner batch size must be positive, got ${this.batchSize}`);
        }
    }

    public async mine(candidate: CandidateBlock, difficulty: number, options: MineOptions = {}): Promise<MiningResult> {
        const maxAttempts = options.maxAttempts ?? this.maxAttempts;
        const search: SearchState = { found: null, attempts: 0, stop: null };
        const template = candidate.template;

        candidate.startMining();
        const started = Date.now();

        const shouldStop = (): boolean => {
            if (search.found || search.stop) return true;
            if (options.signal?.aborted) search.stop = 'SIGNAL';
            else if (options.isStale?.()) search.stop = 'STALE';
            return search.stop !== null;
        };

        const worker = async (offset: number): Promise<void> => {
            let nonce = offset;
            while (!shouldStop()) {
                for (let i = 0; i < this.batchSize; i++) {
                    if (nonce >= maxAttempts || search.found) return;
                    const block = sealBlock(template, nonce);
                    search.attempts++;
                    if (satisfiesPoHD(block.position8d, difficulty)) {
                        search.found = block;
                        return;
                    }
                    nonce += this.workers;
                }
                await yieldToLoop();
            }
        };

        await Promise.all(Array.from({ length: this.workers }, (_, w) => worker(w)));

        if (search.found) {
            candidate.seal(search.found);
            console.log(`[Miner] Block #${template.index} sealed: nonce=${search.found.nonce}, attempts=${search.attempts}, ${Date.now() - started}ms`);
            return { status: 'FOUND', block: search.found, attempts: search.attempts };
        }

        const reason = search.stop ?? 'EXHAUSTED';
        candidate.restart();
        console.warn(`[Miner] Block #${template.index} abandoned (${reason}) after ${search.attempts} attempts`);
        return { status: 'ABORTED', reason, attempts: search.attempts };
    }
}
