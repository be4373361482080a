import { CENTER, MAX_DISTANCE, euclidean } from '../L0/Geometry.js';
import type { Block, BlockTemplate, Vector8 } from '../L0/Ontology.js';
import { CoreError, ErrorCode } from '../Errors.js';
import { sealBlock } from './Block.js';

/**
 * PROOF OF HYPERDISTANCE
 * A block is valid when the coordinate derived from its hash lands within
 * sqrt(2) * 0.5^(difficulty / 4) of the hypercube centre. Each difficulty step
 * shrinks the acceptance ball, so the hit probability falls roughly geometrically.
 */
export function targetDistance(difficulty: number): number {
    return MAX_DISTANCE * Math.pow(0.5, difficulty / 4);
}

export function distanceToCenter(position: Vector8): number {
    return euclidean(position, CENTER);
}

export function satisfiesPoHD(position: Vector8, difficulty: number): boolean {
    return distanceToCenter(position) < targetDistance(difficulty);
}

export const DEFAULT_MAX_ATTEMPTS = 10_000_000;

/**
 * Synchronous reference search from nonce 0 upwards.
 * Throws INVALID_NONCE when the search space is exhausted.
 */
export function mineSync(template: BlockTemplate, difficulty: number, maxAttempts = DEFAULT_MAX_ATTEMPTS): Block {
    for (let nonce = 0; nonce < maxAttempts; nonce++) {
        const block = sealBlock(template, nonce);
        if (satisfiesPoHD(block.position8d, difficulty)) return block;
    }
    throw new CoreError(ErrorCode.INVALID_NONCE, `No nonce below ${maxAttempts} satisfies difficulty ${difficulty}`, {
        index: template.index,
        difficulty
    });
}

// --- Difficulty Schedule ---

export interface DifficultySchedule {
    /** Difficulty the block at `index` must satisfy, given the chain before it. */
    difficultyFor(chain: readonly Block[], index: number): number;
}

export class FixedDifficulty implements DifficultySchedule {
    constructor(private readonly difficulty: number) {}

    difficultyFor(): number {
        return this.difficulty;
    }
}

export interface RetargetOptions {
    initial: number;
    targetBlockTimeMs: number;
    min: number;
    max: number;
}

/**
 * Adjusts by one step per block from index 3 on: harder when the previous
 * interval was under half the target, easier when it exceeded twice the target.
 * Difficulty is a function of the chain alone and is never stored in blocks.
 */
export class RetargetingDifficulty implements DifficultySchedule {
    constructor(private readonly options: RetargetOptions) {
        if (options.min > options.max || options.initial < options.min || options.initial > options.max) {
            throw new CoreError(ErrorCode.CONFIGURATION_INVALID, 'Retarget bounds must satisfy min <= initial <= max');
        }
    }

    /** Last computed value, keyed by the hash of the block below it. */
    private memo: { index: number; difficulty: number; anchorHash: string } | null = null;

    difficultyFor(chain: readonly Block[], index: number): number {
        let difficulty = this.options.initial;
        let from = 3;
        const memo = this.memo;
        if (memo && memo.index <= index && chain[memo.index - 1]?.hash === memo.anchorHash) {
            difficulty = memo.difficulty;
            from = memo.index + 1;
        }
        for (let i = from; i <= index; i++) {
            difficulty = this.step(chain, i, difficulty);
        }
        const anchor = chain[index - 1];
        if (index >= 3 && anchor) this.memo = { index, difficulty, anchorHash: anchor.hash };
        return difficulty;
    }

    private step(chain: readonly Block[], index: number, previous: number): number {
        const last = chain[index - 1];
        const beforeLast = chain[index - 2];
        if (!last || !beforeLast) return previous;
        const interval = last.timestamp - beforeLast.timestamp;
        const { targetBlockTimeMs, min, max } = this.options;
        if (interval < targetBlockTimeMs / 2) return Math.min(max, previous + 1);
        if (interval > targetBlockTimeMs * 2) return Math.max(min, previous - 1);
        return previous;
    }
}
