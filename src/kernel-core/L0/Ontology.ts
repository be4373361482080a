/**
 * LEDGER ONTOLOGY
 * The single source of truth for the primitives shared by every layer:
 * accounts, problems, transactions and blocks.
 */

// --- 1. Space ---
export const DIMENSIONS = 8;

/** A point of the unit hypercube; always exactly DIMENSIONS entries. */
export type Vector8 = readonly number[];

// --- 2. Knowledge Domains ---
// Order is the bijection onto the standard basis: domain i <-> e_i.
export const KNOWLEDGE_DOMAINS = [
    'physics',
    'biology',
    'mathematics',
    'chemistry',
    'engineering',
    'computer_science',
    'philosophy',
    'cosmology',
] as const;

export type KnowledgeDomain = (typeof KNOWLEDGE_DOMAINS)[number];
export type KnowledgeVector = Readonly<Record<KnowledgeDomain, number>>;

export function isKnowledgeDomain(value: unknown): value is KnowledgeDomain {
    return typeof value === 'string' && KNOWLEDGE_DOMAINS.some((domain) => domain === value);
}

// --- 3. Account (SCDA) ---
export type AccountID = string;
export type Tier = 1 | 2 | 3 | 4;

export interface Account {
    readonly identity: AccountID;
    readonly complexityIndex: number;
    readonly energy: number;
    readonly tier: Tier;
    readonly knowledgeVector: KnowledgeVector;
    readonly position8d: Vector8;
    readonly problemsSolved: number;
    readonly totalDifficulty: number;
}

// --- 4. Problem & Solution (supplied by collaborators) ---
export interface Problem {
    readonly id: string;
    readonly difficulty: number; // [0, 1]
    readonly requiredDomains: readonly KnowledgeDomain[];
    readonly question?: string;
}

export interface Solution {
    readonly answer: string;
    readonly reasoning?: string;
}

// --- 5. Transactions ---
export type TransactionKind = 'EVOLUTION' | 'TRANSFER';

export interface SolutionEvent {
    readonly event: 'SOLUTION';
    readonly problemId: string;
    readonly difficulty: number;
    readonly requiredDomains: readonly KnowledgeDomain[];
    readonly quality: number;
    readonly priorComplexityIndex: number;
    readonly complexityDelta: number;
    readonly newComplexityIndex: number;
    readonly energyConsumed: number;
    readonly energyGained: number;
    readonly tierBonus: number;
    readonly energyDelta: number;
    readonly oldTier: Tier;
    readonly newTier: Tier;
    readonly priorStateHash: string;
    readonly resultingStateHash: string;
    readonly resultingState: Account;
}

export interface RegenerationEvent {
    readonly event: 'REGENERATION';
    readonly elapsedSeconds: number;
    readonly energyDelta: number;
    readonly priorStateHash: string;
    readonly resultingStateHash: string;
    readonly resultingState: Account;
}

export type EvolutionPayload = SolutionEvent | RegenerationEvent;

export interface TransferPayload {
    readonly from: AccountID;
    readonly to: AccountID;
    readonly amount: number;
    readonly nonce: number;
}

interface TransactionBase<K extends TransactionKind, P> {
    readonly id: string;
    readonly kind: K;
    readonly accountId: AccountID;
    readonly payload: P;
    readonly timestamp: number;
}

export type EvolutionTransaction = TransactionBase<'EVOLUTION', EvolutionPayload>;
export type TransferTransaction = TransactionBase<'TRANSFER', TransferPayload>;
export type Transaction = EvolutionTransaction | TransferTransaction;

/** Sender of the block reward; not an account. */
export const COINBASE: AccountID = 'COINBASE';

// --- 6. Blocks ---
export type BlockLifecycle = 'PENDING' | 'MINING' | 'ACCEPTED';

/** Everything a miner holds fixed while it searches the nonce space. */
export interface BlockTemplate {
    readonly index: number;
    readonly timestamp: number;
    readonly transactions: readonly Transaction[];
    readonly previousHash: string;
}

export interface Block extends BlockTemplate {
    readonly nonce: number;
    readonly hash: string;
    readonly position8d: Vector8;
}
