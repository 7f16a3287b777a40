/**
 * Configuration Model
 *
 * Session-wide tuning knobs. Loaded once, clamped to documented ranges,
 * frozen. A misconfigured knob falls back or clamps; loading never throws.
 */

import { z } from 'zod';
import { FieldReader, isRecord, describeValue } from './sanitize.js';
import type {
    DifficultyLevel,
    EvaluationIssue,
    EvaluatorConfiguration
} from './types.js';

// ============ RANGES ============

export const CONFIG_RANGES = {
    AGGRESSION_SLIDER: { min: 0.5, max: 2.0 },
    BIAS: { min: 0, max: 2 },
    MAX_PROJECTION_MONTHS: { min: 1, max: 120 },
    HISTORY_CAPACITY: { min: 1, max: 1000 },
} as const;

export const DifficultyLevelSchema = z.enum([
    'cadet',
    'ensign',
    'captain',
    'commodore',
    'admiral',
    'grand_admiral'
]);

/**
 * Difficulties on which projection lookahead is capped
 */
export const LOW_DIFFICULTY_LEVELS: ReadonlySet<DifficultyLevel> = new Set<DifficultyLevel>(['cadet', 'ensign']);

export function isLowDifficulty(configuration: Pick<EvaluatorConfiguration, 'difficulty_profile'>): boolean {
    return LOW_DIFFICULTY_LEVELS.has(configuration.difficulty_profile.level);
}

// ============ DEFAULTS ============

export const DEFAULT_CONFIGURATION: Readonly<EvaluatorConfiguration> = deepFreeze<EvaluatorConfiguration>({
    aggression_slider: 1.0,
    difficulty_profile: {
        level: 'ensign',
        eco_bias: 1.0,
        tech_bias: 1.0,
        mil_bias: 1.0,
        curiosity_enabled: true
    },
    compatibility: {
        disable_bio_ascension_growth: false,
        disable_virtuality_consolidation: false,
        disable_shattered_ring_research: false,
        disable_meta_counters: false
    },
    performance: {
        max_projection_months_low_diff: 12
    },
    diagnostics: {
        history_capacity: 20
    }
});

// ============ LOADING ============

export interface LoadedConfiguration {
    configuration: Readonly<EvaluatorConfiguration>;
    issues: EvaluationIssue[];
}

/**
 * Build a configuration from an untrusted payload.
 * `undefined` yields the defaults without issues.
 */
export function loadConfiguration(raw: unknown): LoadedConfiguration {
    const issues: EvaluationIssue[] = [];
    if (raw !== undefined && !isRecord(raw)) {
        issues.push({
            kind: 'configuration-out-of-range',
            message: `configuration: expected an object, received ${describeValue(raw)}; using defaults`
        });
    }

    const root = new FieldReader(isRecord(raw) ? raw : {}, issues, 'configuration-out-of-range');
    const defaults = DEFAULT_CONFIGURATION;

    const profile = root.nested('difficulty_profile');
    const compatibility = root.nested('compatibility');
    const performance = root.nested('performance');
    const diagnostics = root.nested('diagnostics');

    const configuration: EvaluatorConfiguration = {
        aggression_slider: root.number('aggression_slider', defaults.aggression_slider, CONFIG_RANGES.AGGRESSION_SLIDER),
        difficulty_profile: {
            level: profile.oneOf('level', DifficultyLevelSchema, defaults.difficulty_profile.level),
            eco_bias: profile.number('eco_bias', defaults.difficulty_profile.eco_bias, CONFIG_RANGES.BIAS),
            tech_bias: profile.number('tech_bias', defaults.difficulty_profile.tech_bias, CONFIG_RANGES.BIAS),
            mil_bias: profile.number('mil_bias', defaults.difficulty_profile.mil_bias, CONFIG_RANGES.BIAS),
            curiosity_enabled: profile.boolean('curiosity_enabled', defaults.difficulty_profile.curiosity_enabled)
        },
        compatibility: {
            disable_bio_ascension_growth: compatibility.boolean(
                'disable_bio_ascension_growth',
                defaults.compatibility.disable_bio_ascension_growth
            ),
            disable_virtuality_consolidation: compatibility.boolean(
                'disable_virtuality_consolidation',
                defaults.compatibility.disable_virtuality_consolidation
            ),
            disable_shattered_ring_research: compatibility.boolean(
                'disable_shattered_ring_research',
                defaults.compatibility.disable_shattered_ring_research
            ),
            disable_meta_counters: compatibility.boolean(
                'disable_meta_counters',
                defaults.compatibility.disable_meta_counters
            )
        },
        performance: {
            max_projection_months_low_diff: performance.number(
                'max_projection_months_low_diff',
                defaults.performance.max_projection_months_low_diff,
                { ...CONFIG_RANGES.MAX_PROJECTION_MONTHS, integer: true }
            )
        },
        diagnostics: {
            history_capacity: diagnostics.number(
                'history_capacity',
                defaults.diagnostics.history_capacity,
                { ...CONFIG_RANGES.HISTORY_CAPACITY, integer: true }
            )
        }
    };

    return { configuration: deepFreeze(configuration), issues };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
    for (const child of Object.values(value)) {
        if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}
