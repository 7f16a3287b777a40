import evaluatorJson from '../evaluator.json';
import { EvaluatorTablesSchema, type EvaluatorTables } from './evaluator.schema.js';

// Re-export all types
export * from './evaluator.schema.js';

/**
 * Validates evaluator.json at module load time.
 * Throws with detailed path information if validation fails.
 */
function validateEvaluatorTables(): EvaluatorTables {
  const result = EvaluatorTablesSchema.safeParse(evaluatorJson);
  if (!result.success) {
    console.error('[FATAL] evaluator.json validation failed:');
    console.error(result.error.format());
    throw new Error(`evaluator.json validation failed: ${result.error.message}`);
  }
  return result.data;
}

// Validated once at module load time
export const EVALUATOR_TABLES: EvaluatorTables = validateEvaluatorTables();
