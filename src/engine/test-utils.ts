import { DEFAULT_CONFIGURATION } from './config.js';
import { NEUTRAL_OBSERVATION } from './observation.js';
import { EVALUATOR_TABLES } from '../data/schemas/index.js';
import type {
    CompatibilityFlags,
    DifficultyProfile,
    EvaluatorConfiguration,
    EvaluatorTables,
    Observation,
    ScoringContext
} from './types.js';

// ============ OBSERVATION BUILDER ============

export function createTestObservation(overrides: Partial<Observation> = {}): Observation {
    return {
        ...NEUTRAL_OBSERVATION,
        steam_meta_signals: {},
        ...overrides
    };
}

// ============ CONFIGURATION BUILDER ============

export interface ConfigurationOverrides {
    aggression_slider?: number;
    difficulty_profile?: Partial<DifficultyProfile>;
    compatibility?: Partial<CompatibilityFlags>;
    max_projection_months_low_diff?: number;
    history_capacity?: number;
}

/**
 * Build an already-valid configuration. Overrides bypass clamping; use
 * `loadConfiguration` to test the clamping itself.
 */
export function createTestConfiguration(overrides: ConfigurationOverrides = {}): EvaluatorConfiguration {
    const defaults = DEFAULT_CONFIGURATION;
    return {
        aggression_slider: overrides.aggression_slider ?? defaults.aggression_slider,
        difficulty_profile: { ...defaults.difficulty_profile, ...overrides.difficulty_profile },
        compatibility: { ...defaults.compatibility, ...overrides.compatibility },
        performance: {
            max_projection_months_low_diff: overrides.max_projection_months_low_diff
                ?? defaults.performance.max_projection_months_low_diff
        },
        diagnostics: {
            history_capacity: overrides.history_capacity ?? defaults.diagnostics.history_capacity
        }
    };
}

// ============ CONTEXT BUILDER ============

export function createTestContext(
    observation: Partial<Observation> = {},
    configuration: ConfigurationOverrides = {},
    tables: EvaluatorTables = EVALUATOR_TABLES
): ScoringContext {
    return {
        observation: createTestObservation(observation),
        configuration: createTestConfiguration(configuration),
        tables
    };
}

// ============ LOGGER ============

export interface RecordingLogger {
    warnings: string[];
    warn(message: string): void;
}

export function createRecordingLogger(): RecordingLogger {
    const warnings: string[] = [];
    return {
        warnings,
        warn(message: string) {
            warnings.push(message);
        }
    };
}
