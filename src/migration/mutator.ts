import { isConcurrentDdlConflict, pgErrorCode, qualify, quoteIdentifier } from "../db/sql.js";
import { describeError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { SchemaMutationError } from "./errors.js";

import type { Queryable } from "../db/client.js";
import type { ExistenceProber } from "./prober.js";
import type {
  ColumnDefinition,
  ConstraintDefinition,
  ObjectKind,
  TableDefinition,
} from "./plan.schema.js";

const log = logger.child("[mutator]");

const DDL_SAVEPOINT = "reapply_ddl";

/**
 * Outcome of a conditional schema change
 */
export interface MutationResult {
  kind: ObjectKind;
  /** `table` for tables, `table.name` otherwise */
  target: string;
  /** False when the object already existed, including when a concurrent writer won the race */
  applied: boolean;
}

/**
 * Applies additive DDL only when the prober reports the object missing.
 *
 * The probe is a fast path. Tables and columns are still created with
 * IF NOT EXISTS, and every statement runs under a savepoint: when a
 * concurrent migration wins the race the server's error is rolled back to
 * the savepoint and counted as "already there", leaving the run's
 * transaction usable.
 */
export class SchemaMutator {
  constructor(
    private readonly client: Queryable,
    private readonly prober: ExistenceProber,
    private readonly schema: string
  ) {}

  async ensureTable(table: TableDefinition): Promise<MutationResult> {
    const columns = table.columns.map((column) => this.columnSql(column)).join(",\n  ");
    return this.ensure(
      "table",
      table.name,
      undefined,
      `CREATE TABLE IF NOT EXISTS ${qualify(this.schema, table.name)} (\n  ${columns}\n)`
    );
  }

  async ensureColumn(table: string, column: ColumnDefinition): Promise<MutationResult> {
    return this.ensure(
      "column",
      column.name,
      table,
      `ALTER TABLE ${qualify(this.schema, table)} ADD COLUMN IF NOT EXISTS ${this.columnSql(column)}`
    );
  }

  /**
   * Postgres has no ADD CONSTRAINT IF NOT EXISTS; a duplicate surfaces as
   * 42710 and is recovered like any other lost race.
   */
  async ensureConstraint(table: string, constraint: ConstraintDefinition): Promise<MutationResult> {
    return this.ensure(
      "constraint",
      constraint.name,
      table,
      `ALTER TABLE ${qualify(this.schema, table)} ADD CONSTRAINT ${quoteIdentifier(constraint.name)} ${constraint.definition}`
    );
  }

  /**
   * Column clause shared by CREATE TABLE and ADD COLUMN
   */
  columnSql(column: ColumnDefinition): string {
    const parts = [quoteIdentifier(column.name), column.type.toUpperCase()];
    if (column.primaryKey) {
      parts.push("PRIMARY KEY");
    }
    if (column.notNull) {
      parts.push("NOT NULL");
    }
    if (column.unique) {
      parts.push("UNIQUE");
    }
    if (column.references) {
      parts.push(
        `REFERENCES ${qualify(this.schema, column.references.table)} (${quoteIdentifier(column.references.column)})`
      );
    }
    return parts.join(" ");
  }

  private async ensure(
    kind: ObjectKind,
    name: string,
    table: string | undefined,
    ddl: string
  ): Promise<MutationResult> {
    const target = table === undefined ? name : `${table}.${name}`;

    if (await this.prober.exists(kind, name, table)) {
      log.debug(`${kind} ${target} already exists, skipping`);
      return { kind, target, applied: false };
    }

    await this.client.query(`SAVEPOINT ${DDL_SAVEPOINT}`);
    try {
      await this.client.query(ddl);
    } catch (error) {
      await this.rollbackToSavepoint(kind, target);
      if (isConcurrentDdlConflict(error)) {
        log.debug(`${kind} ${target} was created concurrently, treating as present`);
        return { kind, target, applied: false };
      }
      throw new SchemaMutationError(`Failed to add ${kind} ${target}`, {
        kind,
        target,
        schema: this.schema,
        sqlState: pgErrorCode(error),
        error: describeError(error),
      });
    }
    await this.client.query(`RELEASE SAVEPOINT ${DDL_SAVEPOINT}`);

    log.info(`Added ${kind} ${this.schema}.${target}`);
    return { kind, target, applied: true };
  }

  private async rollbackToSavepoint(kind: ObjectKind, target: string): Promise<void> {
    try {
      await this.client.query(`ROLLBACK TO SAVEPOINT ${DDL_SAVEPOINT}`);
      await this.client.query(`RELEASE SAVEPOINT ${DDL_SAVEPOINT}`);
    } catch (error) {
      throw new SchemaMutationError(`Failed to recover from adding ${kind} ${target}`, {
        kind,
        target,
        schema: this.schema,
        sqlState: pgErrorCode(error),
        error: describeError(error),
      });
    }
  }
}
