/**
 * Fleet / Doctrine Policy Adapter
 *
 * Scores every candidate against the weighted components and ranks them.
 * Ranking is by score, then by declared priority, never by iteration order.
 */

import type {
    CandidateAction,
    CandidateContext,
    CandidateScore,
    EvaluationIssue,
    PolicyRecommendation
} from '../types.js';

export * from './catalog.js';

export interface ScoredCandidates {
    scores: CandidateScore[];
    issues: EvaluationIssue[];
}

/**
 * Evaluate feasibility and score for each candidate. A predicate that throws
 * marks its candidate infeasible; a score that throws or is not finite
 * becomes 0. Both are reported as invariant violations.
 */
export function scoreCandidates(
    candidates: readonly CandidateAction[],
    context: CandidateContext
): ScoredCandidates {
    const scores: CandidateScore[] = [];
    const issues: EvaluationIssue[] = [];

    for (const candidate of candidates) {
        let feasible: boolean;
        try {
            feasible = candidate.isFeasible(context);
        } catch (error) {
            issues.push(violation(candidate.id, `feasibility check threw (${describeError(error)}); treated as infeasible`));
            feasible = false;
        }

        let score: number;
        try {
            score = candidate.score(context);
        } catch (error) {
            issues.push(violation(candidate.id, `score threw (${describeError(error)}); substituted 0`));
            score = 0;
        }
        if (!Number.isFinite(score)) {
            issues.push(violation(candidate.id, `score was ${score}; substituted 0`));
            score = 0;
        }

        scores.push({
            id: candidate.id,
            kind: candidate.kind,
            priority: candidate.priority,
            score,
            feasible
        });
    }

    return { scores, issues };
}

export function compareCandidateScores(a: CandidateScore, b: CandidateScore): number {
    if (b.score !== a.score) {
        return b.score - a.score;
    }
    return a.priority - b.priority;
}

export function rankCandidates(scores: readonly CandidateScore[]): CandidateScore[] {
    return [...scores].sort(compareCandidateScores);
}

export function recommend(scores: readonly CandidateScore[]): PolicyRecommendation {
    const ranking = rankCandidates(scores);
    return {
        ranking,
        doctrine: ranking.find(entry => entry.feasible && entry.kind === 'doctrine') ?? null,
        fleetPolicy: ranking.find(entry => entry.feasible && entry.kind === 'fleet_policy') ?? null
    };
}

function violation(candidateId: string, detail: string): EvaluationIssue {
    return {
        kind: 'internal-invariant-violation',
        field: candidateId,
        message: `${candidateId}: ${detail}`
    };
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
