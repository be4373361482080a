// src/kernel-core/L0/Invariants.ts
import { DIMENSIONS, KNOWLEDGE_DOMAINS } from './Ontology.js';
import type { Account } from './Ontology.js';
import { energyCap, tierFor } from './Tiers.js';
import { ErrorCode } from '../Errors.js';

export interface Invariant {
    id: string;
    boundary: string;
    description: string;
    predicate: (context: InvariantContext) => boolean;
    violation: ErrorCode;
}

export interface InvariantContext {
    account: Account;
    /** State the account evolved from, when checking a transition. */
    prior?: Account;
}

export interface Rejection {
    code: ErrorCode;
    invariantId: string;
    boundary: string;
    message: string;
}

// Floating point slack for the energy cap.
const EPSILON = 1e-9;

const inUnitInterval = (x: number) => Number.isFinite(x) && x >= 0 && x <= 1;

// --- I. Account Shape ---
export const INV_ACC_01: Invariant = {
    id: 'INV-ACC-01',
    boundary: 'Account Shape',
    description: 'Identity must be a non-empty string',
    predicate: ({ account }) => typeof account.identity === 'string' && account.identity.length > 0,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_ACC_02: Invariant = {
    id: 'INV-ACC-02',
    boundary: 'Account Shape',
    description: 'Position must have 8 coordinates in [0, 1]',
    predicate: ({ account }) => account.position8d.length === DIMENSIONS && account.position8d.every(inUnitInterval),
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_ACC_03: Invariant = {
    id: 'INV-ACC-03',
    boundary: 'Account Shape',
    description: 'Knowledge vector must cover every domain with a value in [0, 1]',
    predicate: ({ account }) => KNOWLEDGE_DOMAINS.every((d) => inUnitInterval(account.knowledgeVector[d])),
    violation: ErrorCode.INTEGRITY_BREACH
};

// --- II. Evolution Laws ---
export const INV_EVO_01: Invariant = {
    id: 'INV-EVO-01',
    boundary: 'Evolution Law',
    description: 'Complexity index must be a positive finite number',
    predicate: ({ account }) => Number.isFinite(account.complexityIndex) && account.complexityIndex > 0,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_EVO_02: Invariant = {
    id: 'INV-EVO-02',
    boundary: 'Evolution Law',
    description: 'Tier must match the complexity thresholds',
    predicate: ({ account }) => account.tier === tierFor(account.complexityIndex),
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_EVO_03: Invariant = {
    id: 'INV-EVO-03',
    boundary: 'Evolution Law',
    description: 'Energy must stay within [0, cap(tier)]',
    predicate: ({ account }) =>
        Number.isFinite(account.energy) && account.energy >= 0 && account.energy <= energyCap(account.tier) + EPSILON,
    violation: ErrorCode.INTEGRITY_BREACH
};

export const INV_EVO_04: Invariant = {
    id: 'INV-EVO-04',
    boundary: 'Evolution Law',
    description: 'Counters must be non-negative',
    predicate: ({ account }) =>
        Number.isInteger(account.problemsSolved) && account.problemsSolved >= 0 &&
        Number.isFinite(account.totalDifficulty) && account.totalDifficulty >= 0,
    violation: ErrorCode.INTEGRITY_BREACH
};

// --- III. Monotonicity (transitions only) ---
export const INV_MON_01: Invariant = {
    id: 'INV-MON-01',
    boundary: 'Monotonicity',
    description: 'Complexity, tier, counters and knowledge never decrease',
    predicate: ({ account, prior }) => {
        if (!prior) return true;
        return account.identity === prior.identity &&
            account.complexityIndex >= prior.complexityIndex &&
            account.tier >= prior.tier &&
            account.problemsSolved >= prior.problemsSolved &&
            account.totalDifficulty >= prior.totalDifficulty &&
            KNOWLEDGE_DOMAINS.every((d) => account.knowledgeVector[d] >= prior.knowledgeVector[d]);
    },
    violation: ErrorCode.INTEGRITY_BREACH
};

export const ACCOUNT_INVARIANTS: readonly Invariant[] = [
    INV_ACC_01, INV_ACC_02, INV_ACC_03,
    INV_EVO_01, INV_EVO_02, INV_EVO_03, INV_EVO_04,
    INV_MON_01
];

export function checkInvariants(context: InvariantContext): { ok: true } | { ok: false; rejection: Rejection } {
    for (const inv of ACCOUNT_INVARIANTS) {
        if (!inv.predicate(context)) {
            return {
                ok: false,
                rejection: {
                    code: inv.violation,
                    invariantId: inv.id,
                    boundary: inv.boundary,
                    message: `Invariant Violation (${inv.id}): ${inv.description}`
                }
            };
        }
    }
    return { ok: true };
}
