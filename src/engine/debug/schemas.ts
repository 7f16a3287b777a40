/**
 * Zod schemas for diagnostics history records.
 *
 * These schemas validate:
 * - Diagnostics entries before they are written to JSONL files
 * - Entries and the meta header when a diagnostics log is loaded back
 */

import { z } from 'zod';
import { ComponentWeightsSchema } from '../../data/schemas/index.js';
import type { DiagnosticsEntry, EvaluationIssue } from '../types.js';

// ============================================================================
// Helper Schemas
// ============================================================================

export const ScoreComponentsSchema = z.object({
    economic_lead: z.number(),
    threat_pressure: z.number(),
    expansion_need: z.number(),
    military_readiness: z.number(),
    tech_opportunity: z.number(),
    catch_up_projection: z.number(),
    exploration_drive: z.number()
});

export const EvaluationIssueSchema: z.ZodType<EvaluationIssue> = z.object({
    kind: z.enum([
        'malformed-input',
        'configuration-out-of-range',
        'no-feasible-action',
        'internal-invariant-violation'
    ]),
    field: z.string().optional(),
    message: z.string()
});

// ============================================================================
// Entry Schema
// ============================================================================

export const DiagnosticsEntrySchema: z.ZodType<DiagnosticsEntry> = z.object({
    tick: z.number().int().nonnegative(),
    selectedActionId: z.string().min(1),
    fallback: z.boolean(),
    anomaly: z.boolean(),
    components: ScoreComponentsSchema,
    weights: ComponentWeightsSchema,
    detectedArchetypes: z.array(z.string()),
    candidateScores: z.record(z.string(), z.number()),
    issues: z.array(EvaluationIssueSchema)
});

// ============================================================================
// Meta Line Schema (for JSONL file header)
// ============================================================================

export const MetaLineSchema = z.object({
    _meta: z.literal(true),
    version: z.string(),
    capacity: z.number().int().positive(),
    size: z.number().int().nonnegative(),
    firstTick: z.number().nullable(),
    lastTick: z.number().nullable(),
    recordedAt: z.string()
});

export type MetaLine = z.infer<typeof MetaLineSchema>;
