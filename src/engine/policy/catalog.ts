/**
 * Candidate catalog
 *
 * Builds candidate actions (doctrines, fleet policies, build/expansion
 * actions) from the catalog table. Table order is the declared priority:
 * index 0 wins every tie.
 */

import { SCORE_COMPONENT_NAMES, economicLeadSignal } from '../scoring.js';
import type { CandidateRequirements, CatalogEntry, ComponentCoefficients } from '../../data/schemas/index.js';
import type {
    CandidateAction,
    CandidateContext,
    ComponentWeights,
    EvaluatorTables,
    ScoreComponents,
    ScoringContext
} from '../types.js';

export const HOLD_ACTION_ID = 'hold';

/**
 * Fallback chosen when nothing else is feasible. Always feasible, scores 0,
 * and loses every tie.
 */
export const HOLD_ACTION: CandidateAction = {
    id: HOLD_ACTION_ID,
    kind: 'action',
    offensive: false,
    priority: Number.MAX_SAFE_INTEGER,
    isFeasible: () => true,
    score: () => 0
};

export function weightComponents(components: Readonly<ScoreComponents>, weights: Readonly<ComponentWeights>): ScoreComponents {
    const weighted = { ...components };
    for (const name of SCORE_COMPONENT_NAMES) {
        weighted[name] = components[name] * weights[name];
    }
    return weighted;
}

/**
 * Aggression amplifies an offensive candidate's appeal and softens its
 * drawbacks: positive scores are multiplied by the slider, negative ones divided.
 */
export function applyAggression(rawScore: number, aggressionSlider: number): number {
    return rawScore >= 0 ? rawScore * aggressionSlider : rawScore / aggressionSlider;
}

export function linearScore(coefficients: ComponentCoefficients, weighted: Readonly<ScoreComponents>): number {
    let total = 0;
    for (const name of SCORE_COMPONENT_NAMES) {
        const coefficient = coefficients[name];
        if (coefficient !== undefined) {
            total += coefficient * weighted[name];
        }
    }
    return total;
}

export function meetsRequirements(requires: CandidateRequirements | undefined, context: ScoringContext): boolean {
    if (!requires) return true;
    const { observation, configuration, tables } = context;

    if (requires.flags && !requires.flags.every(flag => observation[flag])) {
        return false;
    }
    if (requires.min_alloy_density !== undefined && observation.alloy_density < requires.min_alloy_density) {
        return false;
    }
    if (requires.max_planet_capacity_pressure !== undefined
        && observation.planet_capacity_pressure > requires.max_planet_capacity_pressure) {
        return false;
    }
    if (requires.min_economic_lead !== undefined
        && economicLeadSignal(observation, tables.economy_epsilon) < requires.min_economic_lead) {
        return false;
    }
    if (requires.curiosity && !configuration.difficulty_profile.curiosity_enabled) {
        return false;
    }
    return true;
}

export function createCandidate(entry: CatalogEntry, priority: number): CandidateAction {
    const offensive = entry.offensive ?? false;
    return {
        id: entry.id,
        kind: entry.kind,
        offensive,
        priority,
        isFeasible: context => meetsRequirements(entry.requires, context),
        score: (context: CandidateContext) => {
            const raw = linearScore(entry.coefficients, weightComponents(context.components, context.weights));
            return offensive ? applyAggression(raw, context.configuration.aggression_slider) : raw;
        }
    };
}

export function buildCatalog(tables: EvaluatorTables): CandidateAction[] {
    return tables.catalog.map((entry, index) => createCandidate(entry, index));
}
