import { z } from 'zod';

// Score component names, in output order
export const ScoreComponentNameSchema = z.enum([
  'economic_lead',
  'threat_pressure',
  'expansion_need',
  'military_readiness',
  'tech_opportunity',
  'catch_up_projection',
  'exploration_drive',
]);
export type ScoreComponentName = z.infer<typeof ScoreComponentNameSchema>;

// Observation flags a candidate can require
export const ObservationFlagSchema = z.enum([
  'bio_ascension',
  'machine_age_virtuality',
  'shattered_ring_origin',
]);
export type ObservationFlag = z.infer<typeof ObservationFlagSchema>;

// Candidate kinds
export const CandidateKindSchema = z.enum(['doctrine', 'fleet_policy', 'action']);
export type CandidateKind = z.infer<typeof CandidateKindSchema>;

const RangeSchema = z
  .object({
    min: z.number(),
    max: z.number(),
  })
  .refine(range => range.min <= range.max, { message: 'min must not exceed max' });
export type NumericRange = z.infer<typeof RangeSchema>;

// One weight per component; every key required so the table stays diffable
export const ComponentWeightsSchema = z.object({
  economic_lead: z.number().positive(),
  threat_pressure: z.number().positive(),
  expansion_need: z.number().positive(),
  military_readiness: z.number().positive(),
  tech_opportunity: z.number().positive(),
  catch_up_projection: z.number().positive(),
  exploration_drive: z.number().positive(),
});
export type ComponentWeights = z.infer<typeof ComponentWeightsSchema>;

// Sparse per-component numbers (coefficients, adjustments)
export const ComponentCoefficientsSchema = z.record(ScoreComponentNameSchema, z.number());
export type ComponentCoefficients = z.infer<typeof ComponentCoefficientsSchema>;

export const ProjectionTableSchema = z.object({
  horizon_months: z.number().int().positive(),
  our_base_growth: z.number(),
  our_growth_per_pressure: z.number(),
  enemy_growth: z.number(),
});
export type ProjectionTable = z.infer<typeof ProjectionTableSchema>;

export const MetaTableSchema = z.object({
  threshold: z.number().min(0).max(1),
  adjustment_bounds: RangeSchema,
  weight_bounds: RangeSchema.refine(range => range.min > 0, {
    message: 'weights must stay positive',
  }),
});
export type MetaTable = z.infer<typeof MetaTableSchema>;

export const ArchetypeSchema = z.object({
  signal: z.string().min(1),
  description: z.string(),
  adjustments: ComponentCoefficientsSchema,
});
export type Archetype = z.infer<typeof ArchetypeSchema>;

export const CandidateRequirementsSchema = z.object({
  flags: z.array(ObservationFlagSchema).optional(),
  min_alloy_density: z.number().min(0).max(1).optional(),
  max_planet_capacity_pressure: z.number().min(0).max(1).optional(),
  min_economic_lead: z.number().min(-1).max(1).optional(),
  curiosity: z.boolean().optional(),
});
export type CandidateRequirements = z.infer<typeof CandidateRequirementsSchema>;

export const CatalogEntrySchema = z.object({
  id: z.string().min(1),
  kind: CandidateKindSchema,
  offensive: z.boolean().optional(),
  description: z.string(),
  coefficients: ComponentCoefficientsSchema,
  requires: CandidateRequirementsSchema.optional(),
});
export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

// Complete rule tables
export const EvaluatorTablesSchema = z
  .object({
    economy_epsilon: z.number().positive(),
    projection: ProjectionTableSchema,
    base_weights: ComponentWeightsSchema,
    meta: MetaTableSchema,
    archetypes: z.array(ArchetypeSchema),
    catalog: z.array(CatalogEntrySchema).min(1),
  })
  .superRefine((tables, ctx) => {
    const signals = new Set<string>();
    tables.archetypes.forEach((archetype, index) => {
      if (signals.has(archetype.signal)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['archetypes', index, 'signal'],
          message: `Duplicate archetype signal "${archetype.signal}"`,
        });
      }
      signals.add(archetype.signal);
    });

    const ids = new Set<string>();
    tables.catalog.forEach((entry, index) => {
      if (entry.id === 'hold') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['catalog', index, 'id'],
          message: '"hold" is reserved for the fallback action',
        });
      }
      if (ids.has(entry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['catalog', index, 'id'],
          message: `Duplicate catalog id "${entry.id}"`,
        });
      }
      ids.add(entry.id);
    });
  });
export type EvaluatorTables = z.infer<typeof EvaluatorTablesSchema>;
