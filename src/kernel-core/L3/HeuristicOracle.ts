import { clamp } from '../L0/Geometry.js';
import type { OracleScores, ScoringOracle, ScoringRequest } from './Validation.js';

function words(text: string): Set<string> {
    return new Set(text.toLowerCase().split(/\W+/).filter((w) => w.length > 2));
}

/**
 * Offline scorer used when no model is wired in.
 * Longer answers are expected for harder problems; reasoning and lexical
 * overlap with the question raise the scores.
 */
export class HeuristicOracle implements ScoringOracle {
    async score({ problem, solution, knowledgeVector }: ScoringRequest): Promise<OracleScores> {
        const answer = solution.answer.trim();
        const reasoning = solution.reasoning?.trim() ?? '';

        const expectedLength = Math.max(1, Math.round(problem.difficulty * 200));
        const completeness = clamp(answer.length / expectedLength);

        const questionWords = words(problem.question ?? '');
        const answerWords = words(answer);
        let shared = 0;
        for (const w of questionWords) if (answerWords.has(w)) shared++;
        const alignment = questionWords.size === 0 ? 0.5 : shared / questionWords.size;
        const correctness = clamp(alignment + 0.3);

        const coherence = reasoning.length >= 5 ? clamp(0.6 + reasoning.length / 1000) : 0.3;

        // Familiar domains make a solution less novel.
        const familiarity = problem.requiredDomains.length === 0
            ? 0
            : problem.requiredDomains.reduce((sum, d) => sum + knowledgeVector[d], 0) / problem.requiredDomains.length;
        const novelty = clamp(1 - familiarity);

        return { correctness, completeness, coherence, novelty };
    }
}
