/**
 * Evaluator Type Definitions
 *
 * Core types shared by the scoring, meta, policy, planner and diagnostics
 * modules. Field names of Configuration and Observation follow the
 * snake_case keys of the JSON payloads they are read from.
 */

import type {
    CandidateKind,
    ComponentWeights,
    EvaluatorTables,
    ScoreComponentName
} from '../data/schemas/index.js';

export type { CandidateKind, ComponentWeights, EvaluatorTables, ScoreComponentName };

// ============ CONFIGURATION ============

export type DifficultyLevel =
    | 'cadet'
    | 'ensign'
    | 'captain'
    | 'commodore'
    | 'admiral'
    | 'grand_admiral';

export interface DifficultyProfile {
    level: DifficultyLevel;
    /** 0-2: Multiplier on economy-derived components */
    eco_bias: number;
    /** 0-2: Multiplier on the tech component */
    tech_bias: number;
    /** 0-2: Multiplier on threat and readiness components */
    mil_bias: number;
    /** Gate for exploration-oriented scoring and candidates */
    curiosity_enabled: boolean;
}

/**
 * Opt-out flags. Each one disables exactly one scoring adjustment rule.
 */
export interface CompatibilityFlags {
    disable_bio_ascension_growth: boolean;
    disable_virtuality_consolidation: boolean;
    disable_shattered_ring_research: boolean;
    disable_meta_counters: boolean;
}

export type CompatibilityFlag = keyof CompatibilityFlags;

export interface PerformanceSettings {
    max_projection_months_low_diff: number;
}

export interface DiagnosticsSettings {
    history_capacity: number;
}

export interface EvaluatorConfiguration {
    /** 0.5-2.0: Scales threat-response weight and offensive candidates */
    aggression_slider: number;
    difficulty_profile: DifficultyProfile;
    compatibility: CompatibilityFlags;
    performance: PerformanceSettings;
    diagnostics: DiagnosticsSettings;
}

// ============ OBSERVATION ============

export interface Observation {
    our_total_economy: number;
    enemy_total_economy: number;
    pop_growth_pressure: number;
    planet_capacity_pressure: number;
    alloy_density: number;
    bio_ascension: boolean;
    machine_age_virtuality: boolean;
    shattered_ring_origin: boolean;
    /** Opponent archetype signal -> confidence in [0, 1] */
    steam_meta_signals: Readonly<Record<string, number>>;
}

// ============ SCORING ============

export type ScoreComponents = Record<ScoreComponentName, number>;

export interface ScoringContext {
    readonly observation: Readonly<Observation>;
    readonly configuration: Readonly<EvaluatorConfiguration>;
    readonly tables: EvaluatorTables;
}

export interface ComponentBounds {
    readonly min: number;
    readonly max: number;
}

export interface ScoringFunction {
    readonly name: ScoreComponentName;
    readonly bounds: ComponentBounds;
    compute(context: ScoringContext): number;
}

// ============ ISSUES ============

export type EvaluationIssueKind =
    | 'malformed-input'
    | 'configuration-out-of-range'
    | 'no-feasible-action'
    | 'internal-invariant-violation';

/**
 * A recovered condition. Issues never abort a tick; they are reported
 * alongside the result and in diagnostics.
 */
export interface EvaluationIssue {
    kind: EvaluationIssueKind;
    field?: string;
    message: string;
}

// ============ CANDIDATES ============

export interface CandidateContext extends ScoringContext {
    readonly components: Readonly<ScoreComponents>;
    readonly weights: Readonly<ComponentWeights>;
}

export interface CandidateAction {
    readonly id: string;
    readonly kind: CandidateKind;
    readonly offensive: boolean;
    /** Lower value wins ties */
    readonly priority: number;
    isFeasible(context: ScoringContext): boolean;
    score(context: CandidateContext): number;
}

export interface CandidateScore {
    id: string;
    kind: CandidateKind;
    priority: number;
    score: number;
    feasible: boolean;
}

// ============ RESULTS ============

export interface MetaAdjustment {
    weights: ComponentWeights;
    detectedArchetypes: string[];
}

export interface PolicyRecommendation {
    /** All candidates, best first */
    ranking: CandidateScore[];
    doctrine: CandidateScore | null;
    fleetPolicy: CandidateScore | null;
}

export interface DiagnosticsEntry {
    tick: number;
    selectedActionId: string;
    fallback: boolean;
    anomaly: boolean;
    components: ScoreComponents;
    weights: ComponentWeights;
    detectedArchetypes: string[];
    candidateScores: Record<string, number>;
    issues: EvaluationIssue[];
}

export interface TickResult {
    tick: number;
    selectedActionId: string;
    fallback: boolean;
    anomaly: boolean;
    scoreComponents: ScoreComponents;
    weights: ComponentWeights;
    detectedArchetypes: string[];
    ranking: CandidateScore[];
    doctrine: CandidateScore | null;
    fleetPolicy: CandidateScore | null;
    issues: EvaluationIssue[];
    diagnosticsSnapshot: DiagnosticsEntry[];
}
