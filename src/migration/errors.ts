import { ReapplyError } from "../lib/errors.js";

/**
 * Error for migration-specific failures.
 *
 * Every failed run surfaces as one of these; the subclass names the step
 * that failed and the whole transaction has been rolled back.
 */
export class MigrationError extends ReapplyError {
  constructor(message: string, context?: Record<string, unknown>, code: string = "MIGRATION_ERROR") {
    super(message, code, context);
    this.name = "MigrationError";
  }
}

/**
 * Structural metadata could not be read (connectivity, permissions)
 */
export class MetadataQueryError extends MigrationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, "METADATA_QUERY_ERROR");
    this.name = "MetadataQueryError";
  }
}

/**
 * DDL failed for a reason other than the object already existing
 */
export class SchemaMutationError extends MigrationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, "SCHEMA_MUTATION_ERROR");
    this.name = "SchemaMutationError";
  }
}

/**
 * A reference row could neither be inserted nor found
 */
export class SeedResolutionError extends MigrationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, "SEED_RESOLUTION_ERROR");
    this.name = "SeedResolutionError";
  }
}

export class BackfillExecutionError extends MigrationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, "BACKFILL_EXECUTION_ERROR");
    this.name = "BackfillExecutionError";
  }
}

/**
 * BEGIN/COMMIT failed, or the connection was lost mid-run
 */
export class TransactionError extends MigrationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context, "TRANSACTION_ERROR");
    this.name = "TransactionError";
  }
}
