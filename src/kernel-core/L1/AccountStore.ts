import { canonicalize, hashObject } from '../L0/Crypto.js';
import { CENTER } from '../L0/Geometry.js';
import { checkInvariants } from '../L0/Invariants.js';
import { DIMENSIONS, KNOWLEDGE_DOMAINS } from '../L0/Ontology.js';
import type { Account, AccountID, KnowledgeDomain, KnowledgeVector, Tier } from '../L0/Ontology.js';
import { tierFor } from '../L0/Tiers.js';
import { CoreError, ErrorCode } from '../Errors.js';

/**
 * Account Store Port
 * Durable table of SCDA records keyed by identity. Last writer wins;
 * the node serializes writers per account.
 */
export interface IAccountStore {
    get(id: AccountID): Promise<Account | null>;
    upsert(account: Account): Promise<void>;
    list(): Promise<Account[]>;
}

export interface AccountGenesis {
    complexityIndex: number;
    energy: number;
}

export const DEFAULT_GENESIS: AccountGenesis = { complexityIndex: 1.0, energy: 100.0 };

export function createAccount(identity: AccountID, genesis: AccountGenesis = DEFAULT_GENESIS): Account {
    const knowledge: Record<KnowledgeDomain, number> = {
        physics: 0, biology: 0, mathematics: 0, chemistry: 0,
        engineering: 0, computer_science: 0, philosophy: 0, cosmology: 0
    };
    return {
        identity,
        complexityIndex: genesis.complexityIndex,
        energy: genesis.energy,
        tier: tierFor(genesis.complexityIndex),
        knowledgeVector: knowledge,
        position8d: [...CENTER],
        problemsSolved: 0,
        totalDifficulty: 0
    };
}

export function accountStateHash(account: Account): string {
    return hashObject(account);
}

export async function requireAccount(store: IAccountStore, id: AccountID): Promise<Account> {
    const account = await store.get(id);
    if (!account) {
        throw new CoreError(ErrorCode.ACCOUNT_NOT_FOUND, `Account ${id} is not registered`, { accountId: id });
    }
    return account;
}

// --- Persisted Layout ---

export function serializeAccount(account: Account): Buffer {
    return Buffer.from(canonicalize(account), 'utf8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTier(value: unknown): value is Tier {
    return value === 1 || value === 2 || value === 3 || value === 4;
}

function numberField(record: Record<string, unknown>, key: string): number {
    const value = record[key];
    if (typeof value !== 'number') {
        throw new CoreError(ErrorCode.INTEGRITY_BREACH, `Account field ${key} must be a number`, undefined, 'FAULT');
    }
    return value;
}

/**
 * Parses an account from unknown input and checks it against the account invariants.
 */
export function parseAccount(value: unknown): Account {
    if (!isRecord(value)) {
        throw new CoreError(ErrorCode.INTEGRITY_BREACH, 'Account must be an object', undefined, 'FAULT');
    }
    const { identity, tier, knowledgeVector, position8d } = value;
    if (typeof identity !== 'string') {
        throw new CoreError(ErrorCode.INTEGRITY_BREACH, 'Account identity must be a string', undefined, 'FAULT');
    }
    if (!isTier(tier)) {
        throw new CoreError(ErrorCode.INTEGRITY_BREACH, `Account ${identity} has an unknown tier`, undefined, 'FAULT');
    }
    if (!isRecord(knowledgeVector)) {
        throw new CoreError(ErrorCode.INTEGRITY_BREACH, `Account ${identity} has no knowledge vector`, undefined, 'FAULT');
    }
    if (!Array.isArray(position8d) || position8d.length !== DIMENSIONS) {
        throw new CoreError(ErrorCode.INTEGRITY_BREACH, `Account ${identity} has no 8D position`, undefined, 'FAULT');
    }

    const knowledge: Record<KnowledgeDomain, number> = { ...createAccount(identity).knowledgeVector };
    for (const domain of KNOWLEDGE_DOMAINS) {
        knowledge[domain] = numberField(knowledgeVector, domain);
    }
    const position = position8d.map((x: unknown) => {
        if (typeof x !== 'number') {
            throw new CoreError(ErrorCode.INTEGRITY_BREACH, `Account ${identity} has a non-numeric coordinate`, undefined, 'FAULT');
        }
        return x;
    });

    const account: Account = {
        identity,
        complexityIndex: numberField(value, 'complexityIndex'),
        energy: numberField(value, 'energy'),
        tier,
        knowledgeVector: knowledge satisfies KnowledgeVector,
        position8d: position,
        problemsSolved: numberField(value, 'problemsSolved'),
        totalDifficulty: numberField(value, 'totalDifficulty')
    };

    const check = checkInvariants({ account });
    if (!check.ok) {
        throw new CoreError(check.rejection.code, check.rejection.message, { invariantId: check.rejection.invariantId }, 'FAULT');
    }
    return account;
}

export function deserializeAccount(bytes: Uint8Array): Account {
    let raw: unknown;
    try {
        raw = JSON.parse(Buffer.from(bytes).toString('utf8'));
    } catch (e) {
        throw new CoreError(ErrorCode.INTEGRITY_BREACH, 'Account bytes are not valid JSON', { cause: String(e) }, 'FAULT');
    }
    return parseAccount(raw);
}

// --- In-Memory Implementation ---

export class InMemoryAccountStore implements IAccountStore {
    private accounts: Map<AccountID, Account> = new Map();

    constructor(initial: Account[] = []) {
        for (const account of initial) this.accounts.set(account.identity, account);
    }

    async get(id: AccountID): Promise<Account | null> {
        return this.accounts.get(id) ?? null;
    }

    async upsert(account: Account): Promise<void> {
        this.accounts.set(account.identity, account);
    }

    async list(): Promise<Account[]> {
        return [...this.accounts.values()].sort((a, b) => (a.identity < b.identity ? -1 : a.identity > b.identity ? 1 : 0));
    }
}
