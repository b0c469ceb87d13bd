/**
 * reapply - idempotent schema, seed and backfill migrations for PostgreSQL
 *
 * @packageDocumentation
 */

export const VERSION = "0.1.0";

// Migration engine
export {
  MigrationPlanSchema,
  parsePlan,
  loadPlanFile,
  MigrationError,
  MetadataQueryError,
  SchemaMutationError,
  SeedResolutionError,
  BackfillExecutionError,
  TransactionError,
  ExistenceProber,
  SchemaMutator,
  ReferenceSeeder,
  toCategoryIds,
  BackfillEngine,
  normalizeMatch,
  MigrationRunner,
  createMigrationRunner,
} from "./migration/index.js";

export type {
  MigrationPlan,
  MigrationPlanInput,
  BackfillRule,
  SeedRecord,
  ObjectKind,
  MutationResult,
  RowId,
  SeedResult,
  BackfillResult,
  RunOptions,
  MigrationSummary,
  VerificationReport,
} from "./migration/index.js";

// Database access
export { createDatabase } from "./db/client.js";
export type {
  ConnectionPool,
  Database,
  DatabaseOptions,
  IsolationLevel,
  PooledClient,
  Queryable,
  TransactionOptions,
} from "./db/client.js";

// Library utilities
export {
  // Errors
  ReapplyError,
  ValidationError,
  ConfigError,
  // Result utilities
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
  // Logger
  logger,
} from "./lib/index.js";

export type { Result, LogLevel } from "./lib/index.js";
