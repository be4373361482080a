import { hashObject } from '../L0/Crypto.js';
import { isKnowledgeDomain } from '../L0/Ontology.js';
import type {
    EvolutionPayload, EvolutionTransaction, KnowledgeDomain, Tier, Transaction, TransactionKind,
    TransferPayload, TransferTransaction
} from '../L0/Ontology.js';
import { CoreError, ErrorCode } from '../Errors.js';
import { parseAccount } from './AccountStore.js';

type Unsealed<T extends Transaction> = Omit<T, 'id'>;

interface TransactionContent {
    kind: TransactionKind;
    accountId: string;
    payload: unknown;
    timestamp: number;
}

/** Transaction ids are the hash of their canonical content, so replays collide. */
export function transactionId(tx: TransactionContent): string {
    return hashObject({
        kind: tx.kind,
        accountId: tx.accountId,
        payload: tx.payload,
        timestamp: tx.timestamp
    });
}

export function evolutionTransaction(accountId: string, payload: EvolutionPayload, timestamp: number): EvolutionTransaction {
    const draft: Unsealed<EvolutionTransaction> = { kind: 'EVOLUTION', accountId, payload, timestamp };
    return { id: transactionId(draft), ...draft };
}

export function transferTransaction(payload: TransferPayload, timestamp: number): TransferTransaction {
    const draft: Unsealed<TransferTransaction> = { kind: 'TRANSFER', accountId: payload.from, payload, timestamp };
    return { id: transactionId(draft), ...draft };
}

export function hasValidId(tx: Transaction): boolean {
    return tx.id === transactionId(tx);
}

// --- Persisted Layout ---

function malformed(message: string): CoreError {
    return new CoreError(ErrorCode.MALFORMED_BLOCK, message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTier(value: unknown): value is Tier {
    return value === 1 || value === 2 || value === 3 || value === 4;
}

function str(record: Record<string, unknown>, key: string): string {
    const value = record[key];
    if (typeof value !== 'string') throw malformed(`Transaction field ${key} must be a string`);
    return value;
}

function num(record: Record<string, unknown>, key: string): number {
    const value = record[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) throw malformed(`Transaction field ${key} must be a number`);
    return value;
}

function tier(record: Record<string, unknown>, key: string): Tier {
    const value = record[key];
    if (!isTier(value)) throw malformed(`Transaction field ${key} must be a tier`);
    return value;
}

function domains(record: Record<string, unknown>, key: string): KnowledgeDomain[] {
    const value = record[key];
    if (!Array.isArray(value)) throw malformed(`Transaction field ${key} must be a list`);
    return value.map((d: unknown) => {
        if (!isKnowledgeDomain(d)) throw malformed(`Unknown knowledge domain ${String(d)}`);
        return d;
    });
}

function parseEvolutionPayload(payload: Record<string, unknown>): EvolutionPayload {
    const common = {
        energyDelta: num(payload, 'energyDelta'),
        priorStateHash: str(payload, 'priorStateHash'),
        resultingStateHash: str(payload, 'resultingStateHash'),
        resultingState: parseAccount(payload['resultingState'])
    };
    switch (payload['event']) {
        case 'SOLUTION':
            return {
                event: 'SOLUTION',
                problemId: str(payload, 'problemId'),
                difficulty: num(payload, 'difficulty'),
                requiredDomains: domains(payload, 'requiredDomains'),
                quality: num(payload, 'quality'),
                priorComplexityIndex: num(payload, 'priorComplexityIndex'),
                complexityDelta: num(payload, 'complexityDelta'),
                newComplexityIndex: num(payload, 'newComplexityIndex'),
                energyConsumed: num(payload, 'energyConsumed'),
                energyGained: num(payload, 'energyGained'),
                tierBonus: num(payload, 'tierBonus'),
                oldTier: tier(payload, 'oldTier'),
                newTier: tier(payload, 'newTier'),
                ...common
            };
        case 'REGENERATION':
            return { event: 'REGENERATION', elapsedSeconds: num(payload, 'elapsedSeconds'), ...common };
        default:
            throw malformed(`Unknown evolution event ${String(payload['event'])}`);
    }
}

/**
 * Rebuilds a transaction from decoded JSON. Field order and extra members are
 * dropped, so the result re-encodes to the canonical form.
 */
export function parseTransaction(value: unknown): Transaction {
    if (!isRecord(value)) throw malformed('Transaction must be an object');
    const payload = value['payload'];
    if (!isRecord(payload)) throw malformed('Transaction payload must be an object');

    const base = {
        id: str(value, 'id'),
        accountId: str(value, 'accountId'),
        timestamp: num(value, 'timestamp')
    };

    switch (value['kind']) {
        case 'EVOLUTION':
            return { ...base, kind: 'EVOLUTION', payload: parseEvolutionPayload(payload) };
        case 'TRANSFER':
            return {
                ...base,
                kind: 'TRANSFER',
                payload: {
                    from: str(payload, 'from'),
                    to: str(payload, 'to'),
                    amount: num(payload, 'amount'),
                    nonce: num(payload, 'nonce')
                }
            };
        default:
            throw malformed(`Unknown transaction kind ${String(value['kind'])}`);
    }
}
