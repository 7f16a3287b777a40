import { describe, it, expect } from 'vitest';
import {
    computeBaseWeights,
    detectArchetypes,
    selectCounterWeights,
    sumAdjustments
} from '../../src/engine/meta/index.js';
import { SCORE_COMPONENT_NAMES } from '../../src/engine/scoring.js';
import { EVALUATOR_TABLES } from '../../src/data/schemas/index.js';
import {
    createTestConfiguration,
    createTestObservation
} from '../../src/engine/test-utils.js';
import type { EvaluatorTables } from '../../src/engine/types.js';

function weightsFor(signals: Record<string, number>, aggression = 1, tables: EvaluatorTables = EVALUATOR_TABLES) {
    return selectCounterWeights(
        createTestObservation({ steam_meta_signals: signals }),
        createTestConfiguration({ aggression_slider: aggression }),
        tables
    );
}

describe('Base weights', () => {
    it('scales the threat weight by the aggression slider', () => {
        const weights = computeBaseWeights(createTestConfiguration({ aggression_slider: 2 }), EVALUATOR_TABLES);

        expect(weights.threat_pressure).toBe(2);
        expect(weights.economic_lead).toBe(1);
        expect(weights.military_readiness).toBe(1);
    });
});

describe('Archetype detection', () => {
    it('requires a confidence strictly above the threshold', () => {
        expect(detectArchetypes({ aggressive_confidence: 0.5 }, EVALUATOR_TABLES)).toEqual([]);
        expect(detectArchetypes({ aggressive_confidence: 0.51 }, EVALUATOR_TABLES).map(a => a.signal))
            .toEqual(['aggressive_confidence']);
    });

    it('ignores unknown signals', () => {
        expect(detectArchetypes({ turtle_confidence: 0.9 }, EVALUATOR_TABLES)).toEqual([]);
    });

    it('reports archetypes in table order', () => {
        const detected = detectArchetypes(
            { virtuality_confidence: 0.9, aggressive_confidence: 0.9 },
            EVALUATOR_TABLES
        );
        expect(detected.map(a => a.signal)).toEqual(['aggressive_confidence', 'virtuality_confidence']);
    });
});

describe('Counter-meta weights', () => {
    it('passes base weights through without a detection', () => {
        const result = weightsFor({}, 1.5);

        expect(result.weights).toEqual(computeBaseWeights(createTestConfiguration({ aggression_slider: 1.5 }), EVALUATOR_TABLES));
        expect(result.detectedArchetypes).toEqual([]);
    });

    it('keeps base weights within the weight bounds without a detection', () => {
        const result = weightsFor({}, 5);

        expect(result.detectedArchetypes).toEqual([]);
        expect(result.weights.threat_pressure).toBe(3);
        expect(result.weights.economic_lead).toBe(1);
    });

    it('counters an aggressive opponent', () => {
        const result = weightsFor({ aggressive_confidence: 0.8 });

        expect(result.detectedArchetypes).toEqual(['aggressive_confidence']);
        expect(result.weights.threat_pressure).toBeCloseTo(1.5, 10);
        expect(result.weights.military_readiness).toBeCloseTo(1.3, 10);
        expect(result.weights.economic_lead).toBeCloseTo(0.8, 10);
        expect(result.weights.expansion_need).toBe(1);
    });

    it('combines aggression and counter-adjustment', () => {
        const result = weightsFor({ aggressive_confidence: 0.8 }, 2);
        expect(result.weights.threat_pressure).toBeCloseTo(2.5, 10);
    });

    it('sums adjustments of several archetypes', () => {
        const result = weightsFor({ aggressive_confidence: 0.9, economic_confidence: 0.9 });

        // +0.4 economic, -0.2 aggressive
        expect(result.weights.economic_lead).toBeCloseTo(1.2, 10);
        expect(result.weights.expansion_need).toBeCloseTo(1.2, 10);
        expect(result.weights.catch_up_projection).toBeCloseTo(1.3, 10);
    });

    it('is skipped when meta counters are disabled', () => {
        const result = selectCounterWeights(
            createTestObservation({ steam_meta_signals: { aggressive_confidence: 0.9 } }),
            createTestConfiguration({ compatibility: { disable_meta_counters: true } }),
            EVALUATOR_TABLES
        );

        expect(result.detectedArchetypes).toEqual([]);
        expect(result.weights.threat_pressure).toBe(1);
    });

    it('never lowers the threat weight as aggressive confidence rises', () => {
        const confidences = [0, 0.3, 0.5, 0.51, 0.8, 1];
        const weights = confidences.map(c => weightsFor({ aggressive_confidence: c }).weights.threat_pressure);

        for (let i = 1; i < weights.length; i++) {
            expect(weights[i]).toBeGreaterThanOrEqual(weights[i - 1]);
        }
        expect(weights[0]).toBe(1);
        expect(weights[weights.length - 1]).toBeCloseTo(1.5, 10);
    });

    it('keeps every weight positive for every combination of archetypes', () => {
        const signals = EVALUATOR_TABLES.archetypes.map(a => a.signal);
        for (let mask = 0; mask < 1 << signals.length; mask++) {
            const active: Record<string, number> = {};
            signals.forEach((signal, index) => {
                if (mask & (1 << index)) active[signal] = 1;
            });

            for (const aggression of [0.5, 2]) {
                const { weights } = weightsFor(active, aggression);
                for (const name of SCORE_COMPONENT_NAMES) {
                    expect(weights[name]).toBeGreaterThanOrEqual(EVALUATOR_TABLES.meta.weight_bounds.min);
                    expect(weights[name]).toBeLessThanOrEqual(EVALUATOR_TABLES.meta.weight_bounds.max);
                }
            }
        }
    });
});

describe('Adjustment bounds', () => {
    const tables: EvaluatorTables = {
        ...EVALUATOR_TABLES,
        base_weights: { ...EVALUATOR_TABLES.base_weights, tech_opportunity: 0.2 },
        archetypes: [
            { signal: 'swarm_a', description: '', adjustments: { threat_pressure: 0.8 } },
            { signal: 'swarm_b', description: '', adjustments: { threat_pressure: 0.8, economic_lead: -2 } },
            { signal: 'swarm_c', description: '', adjustments: { tech_opportunity: -0.6 } }
        ]
    };

    it('clamps the summed adjustment', () => {
        const totals = sumAdjustments(tables.archetypes, tables);

        expect(totals.threat_pressure).toBe(1);
        expect(totals.economic_lead).toBe(-0.75);
        expect(totals.tech_opportunity).toBe(-0.6);
        expect(totals.military_readiness).toBe(0);
    });

    it('clamps the resulting weight to the positive range', () => {
        const { weights } = weightsFor({ swarm_a: 1, swarm_b: 1, swarm_c: 1 }, 2, tables);

        expect(weights.threat_pressure).toBe(3);
        expect(weights.economic_lead).toBe(0.25);
        expect(weights.tech_opportunity).toBe(0.1);
    });
});
