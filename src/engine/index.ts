/**
 * Strategy AI evaluator
 *
 * Public surface: create a session from a raw configuration, feed it one
 * observation per tick, read the decision and the diagnostics history.
 */

export { createSession, evaluateTick, EvaluatorSession } from './session.js';
export type { EvaluatorLogger, SessionOptions } from './session.js';

export { loadConfiguration, DEFAULT_CONFIGURATION, CONFIG_RANGES, isLowDifficulty } from './config.js';
export { ingestObservation, NEUTRAL_OBSERVATION } from './observation.js';
export {
    computeComponents,
    economicLeadSignal,
    projectLead,
    projectionHorizon,
    COMPONENT_BOUNDS,
    SCORE_COMPONENT_NAMES,
    SCORING_FUNCTIONS
} from './scoring.js';
export { selectCounterWeights, computeBaseWeights, detectArchetypes } from './meta/index.js';
export {
    buildCatalog,
    createCandidate,
    rankCandidates,
    recommend,
    scoreCandidates,
    HOLD_ACTION,
    HOLD_ACTION_ID
} from './policy/index.js';
export { ActionPlanner } from './planner.js';
export type { Plan, PlannerOptions, PlannerPhase } from './planner.js';
export { DiagnosticsRecorder, parseDiagnosticsJsonl } from './diagnostics.js';
export type { DiagnosticsView, ParsedDiagnostics } from './diagnostics.js';
export { EVALUATOR_TABLES } from '../data/schemas/index.js';

export type * from './types.js';
