import { clamp } from '../L0/Geometry.js';
import type { Account, KnowledgeVector, Problem, Solution } from '../L0/Ontology.js';
import type { RandomSource } from '../L0/Random.js';
import { CoreError, ErrorCode, isCoreError } from '../Errors.js';

// --- Oracle Port ---
export interface OracleScores {
    correctness: number;
    completeness: number;
    coherence: number;
    novelty: number;
}

export interface ScoringRequest {
    problem: Problem;
    solution: Solution;
    knowledgeVector: KnowledgeVector;
}

/**
 * External scorer (LLM, heuristic or stub). Fallible; assumed side-effect free.
 */
export interface ScoringOracle {
    score(request: ScoringRequest, signal: AbortSignal): Promise<OracleScores>;
}

export interface ValidationVerdict {
    accepted: boolean;
    quality: number;
    internalGate: boolean;
    probabilisticGate: boolean;
    scores: OracleScores;
}

export const INTERNAL_ACCEPTANCE_THRESHOLD = 0.7;
export const PROBABILISTIC_THRESHOLD = 0.5;
export const PROBABILISTIC_STDDEV = 0.1;

const SCORE_KEYS = ['correctness', 'completeness', 'coherence', 'novelty'] as const;

function assertScores(scores: OracleScores): void {
    for (const key of SCORE_KEYS) {
        const value = scores[key];
        if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
            throw new CoreError(ErrorCode.ORACLE_UNAVAILABLE, `Oracle returned ${key}=${String(value)} outside [0, 1]`);
        }
    }
}

/**
 * Pure decision given oracle scores and the account's complexity.
 * Always performs exactly one normal draw.
 */
export function decide(scores: OracleScores, complexityIndex: number, rng: RandomSource): ValidationVerdict {
    const mean = (scores.correctness + scores.completeness + scores.coherence) / 3;
    const internalGate = mean > INTERNAL_ACCEPTANCE_THRESHOLD;

    const x = rng.nextGaussian(Math.min(1.0, complexityIndex / 10.0), PROBABILISTIC_STDDEV);
    const probabilisticGate = x > PROBABILISTIC_THRESHOLD;

    const quality = clamp(0.5 * mean + 0.3 * scores.novelty + 0.2 * (probabilisticGate ? 1.0 : 0.0));

    return {
        accepted: internalGate && probabilisticGate,
        quality,
        internalGate,
        probabilisticGate,
        scores
    };
}

export interface ValidationPipelineOptions {
    /** Abort the oracle call after this many milliseconds; 0 disables the deadline. */
    oracleTimeoutMs?: number;
}

export class ValidationPipeline {
    private oracleTimeoutMs: number;

    constructor(private oracle: ScoringOracle, options?: ValidationPipelineOptions) {
        this.oracleTimeoutMs = options?.oracleTimeoutMs ?? 30_000;
    }

    public async validate(account: Account, problem: Problem, solution: Solution, rng: RandomSource): Promise<ValidationVerdict> {
        const scores = await this.callOracle({ problem, solution, knowledgeVector: account.knowledgeVector });
        return decide(scores, account.complexityIndex, rng);
    }

    private async callOracle(request: ScoringRequest): Promise<OracleScores> {
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;

        const deadline = new Promise<never>((_, reject) => {
            if (this.oracleTimeoutMs <= 0) return;
            timer = setTimeout(() => {
                reject(new CoreError(ErrorCode.ORACLE_UNAVAILABLE, `Oracle timed out after ${this.oracleTimeoutMs}ms`));
                controller.abort();
            }, this.oracleTimeoutMs);
        });

        try {
            const scores = await Promise.race([this.oracle.score(request, controller.signal), deadline]);
            assertScores(scores);
            return scores;
        } catch (e) {
            if (isCoreError(e)) throw e;
            const message = e instanceof Error ? e.message : String(e);
            throw new CoreError(ErrorCode.ORACLE_UNAVAILABLE, `Oracle failed: ${message}`, { problemId: request.problem.id });
        } finally {
            if (timer) clearTimeout(timer);
        }
    }
}
