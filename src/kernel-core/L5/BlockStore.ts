import type { Block } from '../L0/Ontology.js';

/**
 * Block Store Port
 * Append-only persistence of accepted blocks (genesis excluded, it is hard-coded).
 */
export interface IBlockStore {
    append(block: Block): Promise<void>;
    /** Every stored block in ascending index order. */
    load(): Promise<Block[]>;
}

export class InMemoryBlockStore implements IBlockStore {
    private blocks: Block[];

    constructor(initial: Block[] = []) {
        this.blocks = [...initial];
    }

    async append(block: Block): Promise<void> {
        this.blocks.push(block);
    }

    async load(): Promise<Block[]> {
        return [...this.blocks].sort((a, b) => a.index - b.index);
    }
}
