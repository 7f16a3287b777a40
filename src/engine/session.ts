/**
 * Evaluator Session
 *
 * Holds the frozen configuration, the rule tables, the planner and the
 * diagnostics history for one game. `evaluate()` is the per-tick entry
 * point: it always returns a decision and never throws for data reasons.
 */

import { EVALUATOR_TABLES } from '../data/schemas/index.js';
import { loadConfiguration, type LoadedConfiguration } from './config.js';
import { DiagnosticsRecorder, type DiagnosticsView } from './diagnostics.js';
import { ingestObservation } from './observation.js';
import { ActionPlanner, type Plan } from './planner.js';
import type {
    CandidateAction,
    DiagnosticsEntry,
    EvaluationIssue,
    EvaluatorConfiguration,
    EvaluatorTables,
    ScoringFunction,
    TickResult
} from './types.js';

export type EvaluatorLogger = Pick<Console, 'warn'>;

export interface SessionOptions {
    tables?: EvaluatorTables;
    logger?: EvaluatorLogger;
    scoringFunctions?: readonly ScoringFunction[];
    candidates?: readonly CandidateAction[];
}

export class EvaluatorSession {
    readonly configuration: Readonly<EvaluatorConfiguration>;
    /** Corrections made while loading the configuration */
    readonly configurationIssues: readonly EvaluationIssue[];
    readonly tables: EvaluatorTables;

    private readonly recorder: DiagnosticsRecorder;
    private readonly planner: ActionPlanner;
    private readonly logger: EvaluatorLogger;
    private readonly warnedViolations = new Set<string>();
    private tickCounter = 0;

    constructor(rawConfiguration?: unknown, options: SessionOptions = {}) {
        const loaded = loadConfiguration(rawConfiguration);
        this.configuration = loaded.configuration;
        this.configurationIssues = Object.freeze([...loaded.issues]);
        this.tables = options.tables ?? EVALUATOR_TABLES;
        this.logger = options.logger ?? console;
        this.recorder = new DiagnosticsRecorder(this.configuration.diagnostics.history_capacity);
        this.planner = new ActionPlanner({
            tables: this.tables,
            scoringFunctions: options.scoringFunctions,
            candidates: options.candidates
        });

        for (const issue of this.configurationIssues) {
            this.logger.warn(`[Config] ${issue.message}`);
        }
    }

    get diagnostics(): DiagnosticsView {
        return this.recorder;
    }

    /** Ticks evaluated so far */
    get ticks(): number {
        return this.tickCounter;
    }

    /**
     * Evaluate one tick. A configuration passed here replaces the session's
     * for this tick only and is loaded like the session's: clamped, with its
     * corrections reported in the tick's issues.
     *
     * `diagnostics.history_capacity` is ignored here; the history keeps the
     * capacity the session was created with.
     */
    evaluate(rawObservation: unknown, rawConfiguration?: unknown): TickResult {
        const tick = this.tickCounter++;
        const loaded = this.resolveConfiguration(rawConfiguration);
        const ingested = ingestObservation(rawObservation);
        const inputIssues = [...loaded.issues, ...ingested.issues];

        const plan = this.planner.plan(ingested.observation, loaded.configuration, finished => {
            this.recorder.record(toDiagnosticsEntry(tick, finished, [...inputIssues, ...finished.issues]));
        });
        const issues = [...inputIssues, ...plan.issues];

        this.warnViolations(issues);

        return {
            tick,
            selectedActionId: plan.selected.id,
            fallback: plan.fallback,
            anomaly: hasAnomaly(issues),
            scoreComponents: plan.components,
            weights: plan.weights,
            detectedArchetypes: plan.detectedArchetypes,
            ranking: plan.recommendation.ranking,
            doctrine: plan.recommendation.doctrine,
            fleetPolicy: plan.recommendation.fleetPolicy,
            issues,
            diagnosticsSnapshot: this.recorder.entries()
        };
    }

    private resolveConfiguration(rawConfiguration: unknown): LoadedConfiguration {
        if (rawConfiguration === undefined) {
            return { configuration: this.configuration, issues: [] };
        }
        return loadConfiguration(rawConfiguration);
    }

    private warnViolations(issues: readonly EvaluationIssue[]): void {
        for (const issue of issues) {
            if (issue.kind !== 'internal-invariant-violation') continue;
            const key = issue.field ?? issue.message;
            if (this.warnedViolations.has(key)) continue;
            this.warnedViolations.add(key);
            this.logger.warn(`[Evaluator] ${issue.message}`);
        }
    }
}

function hasAnomaly(issues: readonly EvaluationIssue[]): boolean {
    return issues.some(issue => issue.kind === 'internal-invariant-violation');
}

function toDiagnosticsEntry(tick: number, plan: Plan, issues: EvaluationIssue[]): DiagnosticsEntry {
    const candidateScores: Record<string, number> = {};
    for (const entry of plan.recommendation.ranking) {
        candidateScores[entry.id] = entry.score;
    }
    return {
        tick,
        selectedActionId: plan.selected.id,
        fallback: plan.fallback,
        anomaly: hasAnomaly(issues),
        components: { ...plan.components },
        weights: { ...plan.weights },
        detectedArchetypes: [...plan.detectedArchetypes],
        candidateScores,
        issues
    };
}

// ============ ENTRY POINTS ============

export function createSession(rawConfiguration?: unknown, options?: SessionOptions): EvaluatorSession {
    return new EvaluatorSession(rawConfiguration, options);
}

export function evaluateTick(
    session: EvaluatorSession,
    rawObservation: unknown,
    rawConfiguration?: unknown
): TickResult {
    return session.evaluate(rawObservation, rawConfiguration);
}
