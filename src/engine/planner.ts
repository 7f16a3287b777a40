/**
 * Action Planner
 *
 * Per-tick state machine: idle -> scoring -> filtering -> selecting -> logged.
 * Scores every candidate, drops the infeasible ones, and picks the highest
 * score with ties going to the declared priority. When nothing is feasible
 * the hold action is selected; a tick always ends with a decision.
 */

import { EVALUATOR_TABLES } from '../data/schemas/index.js';
import { computeComponents, SCORING_FUNCTIONS } from './scoring.js';
import { selectCounterWeights } from './meta/index.js';
import {
    buildCatalog,
    rankCandidates,
    recommend,
    scoreCandidates,
    HOLD_ACTION
} from './policy/index.js';
import type {
    CandidateAction,
    CandidateScore,
    ComponentWeights,
    EvaluationIssue,
    EvaluatorConfiguration,
    EvaluatorTables,
    Observation,
    PolicyRecommendation,
    ScoreComponents,
    ScoringContext,
    ScoringFunction
} from './types.js';

export type PlannerPhase = 'idle' | 'scoring' | 'filtering' | 'selecting' | 'logged';

const NEXT_PHASE: Record<PlannerPhase, PlannerPhase> = {
    idle: 'scoring',
    scoring: 'filtering',
    filtering: 'selecting',
    selecting: 'logged',
    logged: 'idle'
};

export interface PlannerOptions {
    tables?: EvaluatorTables;
    scoringFunctions?: readonly ScoringFunction[];
    /** Replaces the table catalog */
    candidates?: readonly CandidateAction[];
}

export interface Plan {
    selected: CandidateScore;
    fallback: boolean;
    components: ScoreComponents;
    weights: ComponentWeights;
    detectedArchetypes: string[];
    recommendation: PolicyRecommendation;
    issues: EvaluationIssue[];
}

export function toCandidateScore(candidate: CandidateAction, score: number): CandidateScore {
    return {
        id: candidate.id,
        kind: candidate.kind,
        priority: candidate.priority,
        score,
        feasible: true
    };
}

export class ActionPlanner {
    readonly tables: EvaluatorTables;
    private readonly scoringFunctions: readonly ScoringFunction[];
    private readonly candidates: readonly CandidateAction[];
    private phase: PlannerPhase = 'idle';
    private trace: PlannerPhase[] = [];

    constructor(options: PlannerOptions = {}) {
        this.tables = options.tables ?? EVALUATOR_TABLES;
        this.scoringFunctions = options.scoringFunctions ?? SCORING_FUNCTIONS;
        this.candidates = options.candidates ?? buildCatalog(this.tables);
    }

    getPhase(): PlannerPhase {
        return this.phase;
    }

    /**
     * Phases visited by the most recent tick, starting with idle
     */
    getLastTrace(): readonly PlannerPhase[] {
        return [...this.trace];
    }

    /**
     * Run one tick. `log` receives the finished plan while the planner is in
     * the selecting phase; the planner enters logged once it returns.
     */
    plan(
        observation: Readonly<Observation>,
        configuration: Readonly<EvaluatorConfiguration>,
        log: (plan: Plan) => void = () => { }
    ): Plan {
        if (this.phase === 'logged') {
            this.transition('idle');
        }
        if (this.phase !== 'idle') {
            throw new Error(`Planner cannot start a tick while ${this.phase}`);
        }
        this.trace = ['idle'];

        try {
            const context: ScoringContext = { observation, configuration, tables: this.tables };

            // Scoring
            this.transition('scoring');
            const issues: EvaluationIssue[] = [];
            const computed = computeComponents(context, this.scoringFunctions);
            issues.push(...computed.issues);
            const meta = selectCounterWeights(observation, configuration, this.tables);
            const scored = scoreCandidates(this.candidates, {
                ...context,
                components: computed.components,
                weights: meta.weights
            });
            issues.push(...scored.issues);

            // Filtering
            this.transition('filtering');
            const feasible = scored.scores.filter(entry => entry.feasible);

            // Selecting
            this.transition('selecting');
            let selected: CandidateScore;
            let fallback = false;
            const best = rankCandidates(feasible)[0];
            if (best) {
                selected = best;
            } else {
                fallback = true;
                selected = toCandidateScore(HOLD_ACTION, 0);
                issues.push({
                    kind: 'no-feasible-action',
                    message: `no feasible candidate among ${this.candidates.length}; selected "${HOLD_ACTION.id}"`
                });
            }

            const plan: Plan = {
                selected,
                fallback,
                components: computed.components,
                weights: meta.weights,
                detectedArchetypes: meta.detectedArchetypes,
                recommendation: recommend(scored.scores),
                issues
            };
            log(plan);

            this.transition('logged');
            return plan;
        } finally {
            // A failed tick leaves the planner ready for the next one
            if (this.getPhase() !== 'logged') {
                this.phase = 'idle';
            }
        }
    }

    private transition(to: PlannerPhase): void {
        const expected = NEXT_PHASE[this.phase];
        if (to !== expected) {
            throw new Error(`Illegal planner transition ${this.phase} -> ${to}`);
        }
        this.phase = to;
        this.trace.push(to);
    }
}
