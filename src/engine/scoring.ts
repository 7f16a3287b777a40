/**
 * Scoring Functions
 *
 * Pure, bounded feature functions over (Observation, Configuration).
 * Every function is clamped to its documented bounds; none divides by a
 * signal that can be zero.
 */

import { ScoreComponentNameSchema } from '../data/schemas/index.js';
import { isLowDifficulty } from './config.js';
import { clamp } from './sanitize.js';
import type {
    ComponentBounds,
    EvaluationIssue,
    Observation,
    ScoreComponentName,
    ScoreComponents,
    ScoringContext,
    ScoringFunction
} from './types.js';

// ============ BOUNDS ============

export const SCORE_COMPONENT_NAMES: readonly ScoreComponentName[] = ScoreComponentNameSchema.options;

export const COMPONENT_BOUNDS: Readonly<Record<ScoreComponentName, ComponentBounds>> = {
    economic_lead: { min: -2, max: 2 },
    threat_pressure: { min: 0, max: 2 },
    expansion_need: { min: 0, max: 2 },
    military_readiness: { min: 0, max: 2 },
    tech_opportunity: { min: 0, max: 2 },
    catch_up_projection: { min: -1, max: 1 },
    exploration_drive: { min: 0, max: 1 }
};

// Signal mixing constants
const THREAT_ENEMY_SHARE_WEIGHT = 0.7;
const THREAT_ALLOY_GAP_WEIGHT = 0.3;
const EXPANSION_POP_WEIGHT = 0.6;
const EXPANSION_CAPACITY_WEIGHT = 0.4;
const BIO_ASCENSION_GROWTH_BONUS = 0.15;
const VIRTUALITY_EXPANSION_FACTOR = 0.5;
const TECH_BASELINE = 0.2;
const TECH_LEAD_WEIGHT = 0.3;
const VIRTUALITY_TECH_BONUS = 0.25;
const SHATTERED_RING_TECH_BONUS = 0.2;
const EXPLORATION_WEIGHT = 0.4;

function clamp01(value: number): number {
    return clamp(value, 0, 1);
}

// ============ SHARED SIGNALS ============

/**
 * Relative economic lead in [-1, 1]. The denominator is floored at the
 * table epsilon, so a zero enemy economy gives a lead of 1 rather than a
 * division by zero.
 */
export function economicLeadSignal(observation: Readonly<Observation>, epsilon: number): number {
    const ours = observation.our_total_economy;
    const theirs = observation.enemy_total_economy;
    return clamp((ours - theirs) / Math.max(ours, theirs, epsilon), -1, 1);
}

/**
 * Enemy share of the combined economy in [0, 1]. Both economies are scaled
 * by the larger one so the sum stays finite.
 */
export function enemyShareSignal(observation: Readonly<Observation>, epsilon: number): number {
    const scale = Math.max(observation.our_total_economy, observation.enemy_total_economy, epsilon);
    const ours = observation.our_total_economy / scale;
    const theirs = observation.enemy_total_economy / scale;
    return clamp01(theirs / Math.max(ours + theirs, epsilon / scale));
}

/**
 * Months the projection may look ahead. Lower difficulties are capped.
 */
export function projectionHorizon(context: ScoringContext): number {
    const horizon = context.tables.projection.horizon_months;
    if (isLowDifficulty(context.configuration)) {
        return Math.min(horizon, context.configuration.performance.max_projection_months_low_diff);
    }
    return horizon;
}

/**
 * Compound both economies month by month and return the lead at the end.
 * Economies are normalised first so large totals cannot overflow.
 */
export function projectLead(context: ScoringContext, months: number): number {
    const { observation, tables } = context;
    const ourGrowth = tables.projection.our_base_growth
        + tables.projection.our_growth_per_pressure * observation.pop_growth_pressure;
    const enemyGrowth = tables.projection.enemy_growth;

    const scale = Math.max(observation.our_total_economy, observation.enemy_total_economy, tables.economy_epsilon);
    let ours = observation.our_total_economy / scale;
    let theirs = observation.enemy_total_economy / scale;
    for (let month = 0; month < months; month++) {
        ours *= 1 + ourGrowth;
        theirs *= 1 + enemyGrowth;
    }
    return economicLeadSignal(
        { ...observation, our_total_economy: ours, enemy_total_economy: theirs },
        tables.economy_epsilon / scale
    );
}

// ============ COMPONENTS ============

export const SCORING_FUNCTIONS: readonly ScoringFunction[] = [
    {
        name: 'economic_lead',
        bounds: COMPONENT_BOUNDS.economic_lead,
        compute: ({ observation, configuration, tables }) =>
            configuration.difficulty_profile.eco_bias * economicLeadSignal(observation, tables.economy_epsilon)
    },
    {
        name: 'threat_pressure',
        bounds: COMPONENT_BOUNDS.threat_pressure,
        compute: ({ observation, configuration, tables }) => {
            const enemyShare = enemyShareSignal(observation, tables.economy_epsilon);
            const alloyGap = 1 - observation.alloy_density;
            const threat = clamp01(THREAT_ENEMY_SHARE_WEIGHT * enemyShare + THREAT_ALLOY_GAP_WEIGHT * alloyGap);
            return configuration.difficulty_profile.mil_bias * threat;
        }
    },
    {
        name: 'expansion_need',
        bounds: COMPONENT_BOUNDS.expansion_need,
        compute: ({ observation, configuration }) => {
            const { compatibility } = configuration;
            let need = EXPANSION_POP_WEIGHT * observation.pop_growth_pressure
                + EXPANSION_CAPACITY_WEIGHT * observation.planet_capacity_pressure;
            if (observation.bio_ascension && !compatibility.disable_bio_ascension_growth) {
                need += BIO_ASCENSION_GROWTH_BONUS;
            }
            if (observation.machine_age_virtuality && !compatibility.disable_virtuality_consolidation) {
                need *= VIRTUALITY_EXPANSION_FACTOR;
            }
            return configuration.difficulty_profile.eco_bias * clamp01(need);
        }
    },
    {
        name: 'military_readiness',
        bounds: COMPONENT_BOUNDS.military_readiness,
        compute: ({ observation, configuration }) =>
            configuration.difficulty_profile.mil_bias * observation.alloy_density
    },
    {
        name: 'tech_opportunity',
        bounds: COMPONENT_BOUNDS.tech_opportunity,
        compute: ({ observation, configuration, tables }) => {
            const { compatibility } = configuration;
            const lead = economicLeadSignal(observation, tables.economy_epsilon);
            let opportunity = TECH_BASELINE + TECH_LEAD_WEIGHT * Math.max(0, lead);
            if (observation.machine_age_virtuality && !compatibility.disable_virtuality_consolidation) {
                opportunity += VIRTUALITY_TECH_BONUS;
            }
            if (observation.shattered_ring_origin && !compatibility.disable_shattered_ring_research) {
                opportunity += SHATTERED_RING_TECH_BONUS;
            }
            return configuration.difficulty_profile.tech_bias * clamp01(opportunity);
        }
    },
    {
        name: 'catch_up_projection',
        bounds: COMPONENT_BOUNDS.catch_up_projection,
        compute: context => {
            const current = economicLeadSignal(context.observation, context.tables.economy_epsilon);
            const projected = projectLead(context, projectionHorizon(context));
            return context.configuration.difficulty_profile.eco_bias * (projected - current);
        }
    },
    {
        name: 'exploration_drive',
        bounds: COMPONENT_BOUNDS.exploration_drive,
        compute: ({ observation, configuration }) => {
            if (!configuration.difficulty_profile.curiosity_enabled) return 0;
            return EXPLORATION_WEIGHT * (1 - observation.planet_capacity_pressure);
        }
    }
];

// ============ EVALUATION ============

export function createEmptyComponents(): ScoreComponents {
    return {
        economic_lead: 0,
        threat_pressure: 0,
        expansion_need: 0,
        military_readiness: 0,
        tech_opportunity: 0,
        catch_up_projection: 0,
        exploration_drive: 0
    };
}

export interface ComputedComponents {
    components: ScoreComponents;
    issues: EvaluationIssue[];
}

/**
 * Run every scoring function. A non-finite result or a throw is an internal
 * invariant violation: the component becomes 0 and the violation is reported.
 * Components without a function stay at 0.
 */
export function computeComponents(
    context: ScoringContext,
    functions: readonly ScoringFunction[] = SCORING_FUNCTIONS
): ComputedComponents {
    const components = createEmptyComponents();
    const issues: EvaluationIssue[] = [];

    for (const fn of functions) {
        let value: number;
        try {
            value = fn.compute(context);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            issues.push({
                kind: 'internal-invariant-violation',
                field: fn.name,
                message: `${fn.name}: scoring function threw (${reason}); substituted 0`
            });
            components[fn.name] = 0;
            continue;
        }

        if (!Number.isFinite(value)) {
            issues.push({
                kind: 'internal-invariant-violation',
                field: fn.name,
                message: `${fn.name}: scoring function returned ${value}; substituted 0`
            });
            components[fn.name] = 0;
            continue;
        }
        components[fn.name] = clamp(value, fn.bounds.min, fn.bounds.max);
    }

    return { components, issues };
}
