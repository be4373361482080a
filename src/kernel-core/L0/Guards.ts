// src/kernel-core/L0/Guards.ts
import { COINBASE, isKnowledgeDomain } from './Ontology.js';
import type { Account, Problem, TransferPayload } from './Ontology.js';
import { ErrorCode } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string): GuardResult => ({ ok: false, code, violation: msg });

// 1. Problem Shape (external input)
export const ProblemGuard: Guard<Problem> = (problem) => {
    if (typeof problem.id !== 'string' || problem.id.length === 0) {
        return FAIL(ErrorCode.INVALID_PROBLEM, 'Problem id is required');
    }
    if (!Number.isFinite(problem.difficulty) || problem.difficulty < 0 || problem.difficulty > 1) {
        return FAIL(ErrorCode.INVALID_PROBLEM, `Difficulty must be within [0, 1], got ${problem.difficulty}`);
    }
    if (!Array.isArray(problem.requiredDomains)) {
        return FAIL(ErrorCode.INVALID_PROBLEM, 'Required domains must be a list');
    }
    const unknown = problem.requiredDomains.filter((d) => !isKnowledgeDomain(d));
    if (unknown.length > 0) {
        return FAIL(ErrorCode.INVALID_PROBLEM, `Unknown knowledge domains: ${unknown.join(', ')}`);
    }
    if (new Set(problem.requiredDomains).size !== problem.requiredDomains.length) {
        return FAIL(ErrorCode.INVALID_PROBLEM, 'Required domains must not repeat');
    }
    return OK;
};

// 2. Energy Precondition (attempt cost)
export const EnergyGuard: Guard<{ account: Account; cost: number }> = ({ account, cost }) => {
    if (account.energy < cost) {
        return FAIL(
            ErrorCode.INSUFFICIENT_ENERGY,
            `Account ${account.identity} holds ${account.energy} energy, attempt costs ${cost}`
        );
    }
    return OK;
};

// 3. Transfer Shape
export const TransferGuard: Guard<TransferPayload> = ({ from, to, amount, nonce }) => {
    if (!from || !to) return FAIL(ErrorCode.INVALID_TRANSACTION, 'Transfer requires sender and recipient');
    if (from === to) return FAIL(ErrorCode.INVALID_TRANSACTION, 'Transfer sender and recipient must differ');
    if (to === COINBASE) return FAIL(ErrorCode.INVALID_TRANSACTION, 'COINBASE cannot receive transfers');
    if (!Number.isFinite(amount) || amount <= 0) {
        return FAIL(ErrorCode.INVALID_TRANSACTION, `Transfer amount must be positive, got ${amount}`);
    }
    if (!Number.isInteger(nonce) || nonce < 0) {
        return FAIL(ErrorCode.INVALID_TRANSACTION, `Transfer nonce must be a non-negative integer`);
    }
    return OK;
};
