import type { Block } from '../L0/Ontology.js';

export interface TailSnapshot {
    readonly index: number;
    readonly hash: string;
    readonly generation: number;
}

/**
 * The one piece of global mutable state: index and hash of the latest accepted
 * block. The generation counter moves on every append, so a miner can detect
 * that the chain advanced under it without comparing hashes.
 */
export class ChainTail {
    private current: TailSnapshot;

    constructor(genesis: Block) {
        this.current = { index: genesis.index, hash: genesis.hash, generation: 0 };
    }

    public snapshot(): TailSnapshot {
        return this.current;
    }

    public advance(block: Block): TailSnapshot {
        this.current = { index: block.index, hash: block.hash, generation: this.current.generation + 1 };
        return this.current;
    }

    public isStale(seen: TailSnapshot): boolean {
        return this.current.generation !== seen.generation;
    }
}
