/**
 * Meta / Counter-Meta Selector
 *
 * Turns opponent-archetype confidences into component weights. Each
 * archetype above the detection threshold contributes a fixed
 * counter-adjustment; adjustments are summed per component, the sum is
 * clamped, and every final weight, detection or not, is clamped to a
 * positive range so no weight can flip sign.
 */

import { SCORE_COMPONENT_NAMES } from '../scoring.js';
import { clamp } from '../sanitize.js';
import type { Archetype } from '../../data/schemas/index.js';
import type {
    ComponentWeights,
    EvaluatorConfiguration,
    EvaluatorTables,
    MetaAdjustment,
    Observation
} from '../types.js';

/**
 * Table weights with the aggression slider applied to threat response.
 */
export function computeBaseWeights(
    configuration: Readonly<EvaluatorConfiguration>,
    tables: EvaluatorTables
): ComponentWeights {
    return {
        ...tables.base_weights,
        threat_pressure: tables.base_weights.threat_pressure * configuration.aggression_slider
    };
}

/**
 * Archetypes whose confidence is strictly above the threshold, in table order.
 * Signals with no matching archetype are ignored.
 */
export function detectArchetypes(
    signals: Readonly<Record<string, number>>,
    tables: EvaluatorTables
): Archetype[] {
    return tables.archetypes.filter(archetype => {
        const confidence = signals[archetype.signal];
        return confidence !== undefined && confidence > tables.meta.threshold;
    });
}

/**
 * Per-component sum of the counter-adjustments, clamped to the table bounds.
 */
export function sumAdjustments(archetypes: readonly Archetype[], tables: EvaluatorTables): ComponentWeights {
    const { min, max } = tables.meta.adjustment_bounds;
    const totals: ComponentWeights = {
        economic_lead: 0,
        threat_pressure: 0,
        expansion_need: 0,
        military_readiness: 0,
        tech_opportunity: 0,
        catch_up_projection: 0,
        exploration_drive: 0
    };

    for (const archetype of archetypes) {
        for (const name of SCORE_COMPONENT_NAMES) {
            const delta = archetype.adjustments[name];
            if (delta !== undefined) {
                totals[name] += delta;
            }
        }
    }

    for (const name of SCORE_COMPONENT_NAMES) {
        totals[name] = clamp(totals[name], min, max);
    }
    return totals;
}

export function selectCounterWeights(
    observation: Readonly<Observation>,
    configuration: Readonly<EvaluatorConfiguration>,
    tables: EvaluatorTables
): MetaAdjustment {
    const base = computeBaseWeights(configuration, tables);
    if (configuration.compatibility.disable_meta_counters) {
        return { weights: clampWeights(base, tables), detectedArchetypes: [] };
    }

    const detected = detectArchetypes(observation.steam_meta_signals, tables);
    if (detected.length === 0) {
        return { weights: clampWeights(base, tables), detectedArchetypes: [] };
    }

    const adjustments = sumAdjustments(detected, tables);
    const weights = { ...base };
    for (const name of SCORE_COMPONENT_NAMES) {
        weights[name] = base[name] + adjustments[name];
    }

    return {
        weights: clampWeights(weights, tables),
        detectedArchetypes: detected.map(archetype => archetype.signal)
    };
}

function clampWeights(weights: ComponentWeights, tables: EvaluatorTables): ComponentWeights {
    const { min, max } = tables.meta.weight_bounds;
    const clamped = { ...weights };
    for (const name of SCORE_COMPONENT_NAMES) {
        clamped[name] = clamp(weights[name], min, max);
    }
    return clamped;
}
