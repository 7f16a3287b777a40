/**
 * Observation Model
 *
 * Typed, frozen view over one tick's input snapshot. Missing fields take
 * neutral defaults; malformed fields are replaced by their defaults and
 * reported. Unknown fields are ignored.
 */

import { z } from 'zod';
import { FieldReader, isRecord, describeValue, clamp } from './sanitize.js';
import type { EvaluationIssue, Observation } from './types.js';

const UNIT_RANGE = { min: 0, max: 1 } as const;
const NON_NEGATIVE = { min: 0 } as const;

const ConfidenceSchema = z.number().finite();

export const NEUTRAL_OBSERVATION: Readonly<Observation> = Object.freeze({
    our_total_economy: 0,
    enemy_total_economy: 0,
    pop_growth_pressure: 0,
    planet_capacity_pressure: 0,
    alloy_density: 0,
    bio_ascension: false,
    machine_age_virtuality: false,
    shattered_ring_origin: false,
    steam_meta_signals: Object.freeze({})
});

export interface IngestedObservation {
    observation: Readonly<Observation>;
    issues: EvaluationIssue[];
}

export function ingestObservation(raw: unknown): IngestedObservation {
    const issues: EvaluationIssue[] = [];
    if (!isRecord(raw)) {
        issues.push({
            kind: 'malformed-input',
            message: `observation: expected an object, received ${describeValue(raw)}; using neutral defaults`
        });
    }

    const reader = new FieldReader(isRecord(raw) ? raw : {}, issues, 'malformed-input');
    const neutral = NEUTRAL_OBSERVATION;

    const observation: Observation = {
        our_total_economy: reader.number('our_total_economy', neutral.our_total_economy, NON_NEGATIVE),
        enemy_total_economy: reader.number('enemy_total_economy', neutral.enemy_total_economy, NON_NEGATIVE),
        pop_growth_pressure: reader.number('pop_growth_pressure', neutral.pop_growth_pressure, UNIT_RANGE),
        planet_capacity_pressure: reader.number('planet_capacity_pressure', neutral.planet_capacity_pressure, UNIT_RANGE),
        alloy_density: reader.number('alloy_density', neutral.alloy_density, UNIT_RANGE),
        bio_ascension: reader.boolean('bio_ascension', neutral.bio_ascension),
        machine_age_virtuality: reader.boolean('machine_age_virtuality', neutral.machine_age_virtuality),
        shattered_ring_origin: reader.boolean('shattered_ring_origin', neutral.shattered_ring_origin),
        steam_meta_signals: readMetaSignals(reader.nested('steam_meta_signals'))
    };

    return {
        observation: Object.freeze({
            ...observation,
            steam_meta_signals: Object.freeze(observation.steam_meta_signals)
        }),
        issues
    };
}

/**
 * Keep numeric confidences, clamped to [0, 1]. Anything else is dropped.
 */
function readMetaSignals(reader: FieldReader): Record<string, number> {
    const signals: Record<string, number> = {};
    for (const [key, value] of reader.entries()) {
        const parsed = ConfidenceSchema.safeParse(value);
        if (!parsed.success) {
            reader.report(key, `expected a numeric confidence, received ${describeValue(value)}; ignored`);
            continue;
        }
        const confidence = clamp(parsed.data, UNIT_RANGE.min, UNIT_RANGE.max);
        if (confidence !== parsed.data) {
            reader.report(key, `${parsed.data} is outside [0, 1]; clamped to ${confidence}`);
        }
        signals[key] = confidence;
    }
    return signals;
}
