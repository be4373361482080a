import { produce } from 'immer';
import { CENTER, MAX_DISTANCE, displace, euclidean, normalize, zeros } from '../L0/Geometry.js';
import { EnergyGuard, ProblemGuard } from '../L0/Guards.js';
import { DIMENSIONS, KNOWLEDGE_DOMAINS } from '../L0/Ontology.js';
import type {
    Account, EvolutionTransaction, KnowledgeDomain, KnowledgeVector, Problem, RegenerationEvent, SolutionEvent,
    Tier, Vector8
} from '../L0/Ontology.js';
import type { RandomSource } from '../L0/Random.js';
import { energyCap, tierDefinition, tierFor } from '../L0/Tiers.js';
import { accountStateHash } from '../L1/AccountStore.js';
import { evolutionTransaction } from '../L1/Transactions.js';
import { CoreError, ErrorCode } from '../Errors.js';

// --- Evolution Constants ---
export const ENERGY_CONSUMPTION_FACTOR = 10.0; // k1
export const ENERGY_REWARD_FACTOR = 50.0; // k2
export const EVOLUTIONARY_RESISTANCE = 1.5; // alpha
export const KNOWLEDGE_RATE = 0.1;
export const LEAP_SCALE_PER_TIER = 0.2;
export const PASSIVE_REGEN_PER_MINUTE = 1.0;

export interface EvolutionResult<E> {
    account: Account;
    event: E;
    transaction: EvolutionTransaction;
}

export function attemptCost(problem: Problem): number {
    return ENERGY_CONSUMPTION_FACTOR * problem.difficulty;
}

export function complexityGain(difficulty: number, complexityIndex: number): number {
    return difficulty / Math.pow(complexityIndex, EVOLUTIONARY_RESISTANCE);
}

/**
 * Moves a position towards the basis directions of the solved domains.
 * eta = 1 / (1 + C); V = normalize(sum of e_d * difficulty * quality).
 */
export function updatePosition(
    position: Vector8,
    complexityIndex: number,
    domains: readonly KnowledgeDomain[],
    difficulty: number,
    quality: number
): number[] {
    const eta = 1.0 / (1.0 + complexityIndex);
    const pull = zeros();
    for (const domain of domains) {
        const axis = KNOWLEDGE_DOMAINS.indexOf(domain);
        pull[axis] = (pull[axis] ?? 0) + difficulty * quality;
    }
    return displace(position, normalize(pull), eta);
}

export function randomUnitVector(rng: RandomSource): number[] {
    const v: number[] = [];
    for (let i = 0; i < DIMENSIONS; i++) v.push(rng.nextGaussian(0, 1));
    return normalize(v);
}

export interface SolutionOutcome {
    complexityDelta: number;
    newComplexityIndex: number;
    energyConsumed: number;
    energyGained: number;
    tierBonus: number;
    oldTier: Tier;
    newTier: Tier;
    /** Energy after reward, tier bonus and both caps. */
    energy: number;
    knowledgeVector: KnowledgeVector;
    /** Position after the directed update, before any evolutionary leap. */
    position8d: number[];
}

/**
 * Deterministic part of steps 2-8: everything except the leap direction.
 * Shared by the engine and by block validation, which recomputes it from the pre-state.
 */
export function solutionOutcome(
    account: Account,
    difficulty: number,
    requiredDomains: readonly KnowledgeDomain[],
    quality: number
): SolutionOutcome {
    const energyConsumed = ENERGY_CONSUMPTION_FACTOR * difficulty;
    const complexityDelta = complexityGain(difficulty, account.complexityIndex);
    const newComplexityIndex = account.complexityIndex + complexityDelta;
    const energyGained = ENERGY_REWARD_FACTOR * difficulty * newComplexityIndex;
    const oldTier = account.tier;
    const newTier = tierFor(newComplexityIndex);
    const tierBonus = newTier !== oldTier ? tierDefinition(newTier).energyBonus : 0;

    let energy = account.energy - energyConsumed;
    energy = Math.min(energyCap(oldTier), energy + energyGained);
    if (newTier !== oldTier) energy = Math.min(energyCap(newTier), energy + tierBonus);

    const knowledgeVector: Record<KnowledgeDomain, number> = { ...account.knowledgeVector };
    for (const domain of requiredDomains) {
        knowledgeVector[domain] = Math.min(1.0, knowledgeVector[domain] + difficulty * quality * KNOWLEDGE_RATE);
    }

    return {
        complexityDelta,
        newComplexityIndex,
        energyConsumed,
        energyGained,
        tierBonus,
        oldTier,
        newTier,
        energy,
        knowledgeVector,
        position8d: updatePosition(account.position8d, newComplexityIndex, requiredDomains, difficulty, quality)
    };
}

export function solutionEvent(
    prior: Account,
    next: Account,
    problem: Pick<Problem, 'id' | 'difficulty' | 'requiredDomains'>,
    quality: number,
    outcome: SolutionOutcome
): SolutionEvent {
    return {
        event: 'SOLUTION',
        problemId: problem.id,
        difficulty: problem.difficulty,
        requiredDomains: [...problem.requiredDomains],
        quality,
        priorComplexityIndex: prior.complexityIndex,
        complexityDelta: outcome.complexityDelta,
        newComplexityIndex: outcome.newComplexityIndex,
        energyConsumed: outcome.energyConsumed,
        energyGained: outcome.energyGained,
        tierBonus: outcome.tierBonus,
        energyDelta: next.energy - prior.energy,
        oldTier: outcome.oldTier,
        newTier: outcome.newTier,
        priorStateHash: accountStateHash(prior),
        resultingStateHash: accountStateHash(next),
        resultingState: next
    };
}

/**
 * Applies an accepted solution to an account snapshot.
 * Steps run on an immer draft, so callers only ever see the old or the new state.
 */
export function applySolution(
    account: Account,
    problem: Problem,
    quality: number,
    rng: RandomSource,
    timestamp: number
): EvolutionResult<SolutionEvent> {
    const problemCheck = ProblemGuard(problem);
    if (!problemCheck.ok) throw new CoreError(problemCheck.code, problemCheck.violation, { problemId: problem.id });
    if (!Number.isFinite(quality) || quality < 0 || quality > 1) {
        throw new CoreError(ErrorCode.INVALID_TRANSACTION, `Quality must be within [0, 1], got ${quality}`);
    }

    // 1. Attempt cost precondition
    const cost = attemptCost(problem);
    const energyCheck = EnergyGuard({ account, cost });
    if (!energyCheck.ok) {
        throw new CoreError(energyCheck.code, energyCheck.violation, {
            accountId: account.identity,
            energy: account.energy,
            cost
        });
    }

    const outcome = solutionOutcome(account, problem.difficulty, problem.requiredDomains, quality);
    const crossed = outcome.newTier !== outcome.oldTier;
    const leap = crossed ? randomUnitVector(rng) : null;

    const next = produce(account, (draft) => {
        // 2-4. Consume, grow, reward (capped at the tier held before this step)
        draft.complexityIndex = outcome.newComplexityIndex;
        draft.energy = outcome.energy;
        // 5. Knowledge
        draft.knowledgeVector = outcome.knowledgeVector;
        // 6. Position
        draft.position8d = outcome.position8d;
        // 7. Counters
        draft.problemsSolved += 1;
        draft.totalDifficulty += problem.difficulty;
        // 8. Tier transition and evolutionary leap
        if (leap) {
            draft.tier = outcome.newTier;
            draft.position8d = displace(outcome.position8d, leap, LEAP_SCALE_PER_TIER * outcome.newTier);
        }
    });

    // 9. Evolution event
    const event = solutionEvent(account, next, problem, quality, outcome);
    return { account: next, event, transaction: evolutionTransaction(account.identity, event, timestamp) };
}

/**
 * Passive energy regeneration: faster at higher tiers and closer to the hypercube centre.
 */
export function regenerationAmount(account: Account, elapsedSeconds: number): number {
    const tierMultiplier = 1.0 + account.tier * 0.5;
    const positionBonus = (1.0 - euclidean(account.position8d, CENTER) / MAX_DISTANCE) * 0.5;
    return PASSIVE_REGEN_PER_MINUTE * (elapsedSeconds / 60.0) * tierMultiplier * (1.0 + positionBonus);
}

export function regenerate(account: Account, elapsedSeconds: number, timestamp: number): EvolutionResult<RegenerationEvent> {
    if (!Number.isFinite(elapsedSeconds) || elapsedSeconds < 0) {
        throw new CoreError(ErrorCode.INVALID_TRANSACTION, `Elapsed time must be a non-negative number, got ${elapsedSeconds}`);
    }

    const gained = regenerationAmount(account, elapsedSeconds);
    const next = produce(account, (draft) => {
        draft.energy = Math.min(energyCap(draft.tier), draft.energy + gained);
    });

    const event = regenerationEvent(account, next, elapsedSeconds);
    return { account: next, event, transaction: evolutionTransaction(account.identity, event, timestamp) };
}

export function regenerationEvent(prior: Account, next: Account, elapsedSeconds: number): RegenerationEvent {
    return {
        event: 'REGENERATION',
        elapsedSeconds,
        energyDelta: next.energy - prior.energy,
        priorStateHash: accountStateHash(prior),
        resultingStateHash: accountStateHash(next),
        resultingState: next
    };
}
