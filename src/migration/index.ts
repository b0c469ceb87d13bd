/**
 * Idempotent migration engine
 *
 * - prober   - reads structural metadata to decide whether an object exists
 * - mutator  - adds tables, columns and constraints only when absent
 * - seeder   - inserts reference rows once, resolving conflicts by lookup
 * - backfill - points existing rows at reference rows using ordered rules
 * - runner   - runs all of the above in one transaction
 *
 * @example
 * ```typescript
 * import { createDatabase } from "@/db/client.js";
 * import { createMigrationRunner, loadPlanFile } from "@/migration/index.js";
 *
 * const plan = await loadPlanFile("./plans/inventory-categories.yml");
 * if (plan.success) {
 *   const runner = createMigrationRunner(createDatabase({ connectionString }), plan.data);
 *   const result = await runner.run({ dryRun: true });
 * }
 * ```
 */

// Schema exports
export {
  MigrationPlanSchema,
  TableDefinitionSchema,
  ColumnDefinitionSchema,
  ColumnChangeSchema,
  ConstraintChangeSchema,
  SeedDefinitionSchema,
  SeedRecordSchema,
  BackfillDefinitionSchema,
  BackfillRuleSchema,
  ObjectKindSchema,
  MAX_SEED_NAME_LENGTH,
  type MigrationPlan,
  type MigrationPlanInput,
  type TableDefinition,
  type ColumnDefinition,
  type ColumnChange,
  type ConstraintDefinition,
  type ConstraintChange,
  type SeedDefinition,
  type SeedRecord,
  type BackfillDefinition,
  type BackfillRule,
  type ObjectKind,
} from "./plan.schema.js";

export { parsePlan, loadPlanFile } from "./plan-loader.js";

// Errors
export {
  MigrationError,
  MetadataQueryError,
  SchemaMutationError,
  SeedResolutionError,
  BackfillExecutionError,
  TransactionError,
} from "./errors.js";

// Engine components
export { ExistenceProber } from "./prober.js";
export { SchemaMutator, type MutationResult } from "./mutator.js";
export { ReferenceSeeder, toCategoryIds, type RowId, type SeedResult } from "./seeder.js";
export {
  BackfillEngine,
  normalizeMatch,
  type BackfillResult,
  type RuleOutcome,
} from "./backfill.js";
export {
  MigrationRunner,
  createMigrationRunner,
  toMigrationError,
  type RunOptions,
  type MigrationSummary,
  type VerificationReport,
  type ObjectStatus,
  type SeedStatus,
  type CategoryCount,
} from "./runner.js";
