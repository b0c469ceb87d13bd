import { ReapplyError, describeError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ok, err } from "../lib/result.js";
import { pgErrorCode, qualify, quoteIdentifier } from "../db/sql.js";

import { BackfillEngine } from "./backfill.js";
import { MigrationError, TransactionError } from "./errors.js";
import { SchemaMutator } from "./mutator.js";
import { ExistenceProber } from "./prober.js";
import { ReferenceSeeder, toCategoryIds } from "./seeder.js";

import type { QueryResultRow } from "pg";

import type { Database, IsolationLevel, Queryable } from "../db/client.js";
import type { Result } from "../lib/result.js";
import type { RuleOutcome } from "./backfill.js";
import type { MutationResult } from "./mutator.js";
import type { MigrationPlan, ObjectKind } from "./plan.schema.js";
import type { RowId, SeedResult } from "./seeder.js";

const log = logger.child("[runner]");

/**
 * Options for a single run
 */
export interface RunOptions {
  /** Execute every step, then roll back instead of committing */
  dryRun?: boolean;
  /** Isolation level for the run's transaction (server default: read committed) */
  isolation?: IsolationLevel;
}

/**
 * Aggregated outcome of a run
 */
export interface MigrationSummary {
  planId: string;
  tablesCreated: number;
  columnsAdded: number;
  constraintsAdded: number;
  /** Reference rows inserted by this run (pre-existing ones excluded) */
  categoriesSeeded: number;
  rowsBackfilled: number;
  mutations: MutationResult[];
  seeded: SeedResult[];
  rules: RuleOutcome[];
  dryRun: boolean;
  durationMs: number;
}

export interface ObjectStatus {
  kind: ObjectKind;
  target: string;
  exists: boolean;
}

export interface SeedStatus {
  name: string;
  id: RowId | null;
}

export interface CategoryCount {
  category: string;
  count: number;
}

/**
 * Read-only view of how far the database matches a plan
 */
export interface VerificationReport {
  planId: string;
  objects: ObjectStatus[];
  seeds: SeedStatus[];
  /** Rows per seeded category; null while the reference column is missing */
  itemsByCategory: CategoryCount[] | null;
  /** Rows whose reference column is still null; null while the column is missing */
  uncategorized: number | null;
  complete: boolean;
}

/**
 * Runs one plan: schema changes, then seeding, then backfill, inside a
 * single transaction.
 *
 * @example
 * ```typescript
 * const runner = createMigrationRunner(createDatabase({ connectionString }), plan);
 * const result = await runner.run();
 * if (result.success) {
 *   console.log(`${result.data.rowsBackfilled} rows backfilled`);
 * }
 * ```
 */
export class MigrationRunner {
  constructor(
    private readonly database: Database,
    private readonly plan: MigrationPlan
  ) {}

  /**
   * Apply the plan. Safe to call repeatedly: a second run adds nothing and
   * re-applies the backfill to the same final state.
   */
  async run(options: RunOptions = {}): Promise<Result<MigrationSummary, MigrationError>> {
    const { dryRun = false, isolation } = options;
    const startTime = Date.now();

    log.info(`Running ${this.plan.id}${dryRun ? " (dry run)" : ""}`);

    try {
      const summary = await this.database.withTransaction(
        (client) => this.applySteps(client, dryRun),
        { rollbackOnly: dryRun, ...(isolation !== undefined && { isolation }) }
      );
      summary.durationMs = Date.now() - startTime;

      log.info(
        `${dryRun ? "[DRY RUN] " : ""}${this.plan.id}: ` +
          `${summary.tablesCreated} table(s), ${summary.columnsAdded} column(s), ` +
          `${summary.constraintsAdded} constraint(s) added; ${summary.categoriesSeeded} reference row(s) seeded; ` +
          `${summary.rowsBackfilled} row(s) backfilled in ${summary.durationMs}ms`
      );
      return ok(summary);
    } catch (error) {
      const failure = toMigrationError(error, this.plan.id);
      log.warn(`${this.plan.id} rolled back: ${failure.message}`);
      return err(failure);
    }
  }

  /**
   * Report which parts of the plan are already in place, without writing
   */
  async verify(): Promise<Result<VerificationReport, MigrationError>> {
    try {
      const report = await this.database.withConnection((client) => this.inspect(client));
      return ok(report);
    } catch (error) {
      return err(toMigrationError(error, this.plan.id));
    }
  }

  private async applySteps(client: Queryable, dryRun: boolean): Promise<MigrationSummary> {
    const { plan } = this;
    const prober = new ExistenceProber(client, plan.schema);
    const mutator = new SchemaMutator(client, prober, plan.schema);

    const mutations: MutationResult[] = [];
    for (const table of plan.tables) {
      mutations.push(await mutator.ensureTable(table));
    }
    for (const { table, ...column } of plan.columns) {
      mutations.push(await mutator.ensureColumn(table, column));
    }
    for (const { table, ...constraint } of plan.constraints) {
      mutations.push(await mutator.ensureConstraint(table, constraint));
    }

    const seeded = plan.seed
      ? await new ReferenceSeeder(client, plan.schema, plan.seed).seed(plan.seed.rows)
      : [];

    const backfill = plan.backfill
      ? await new BackfillEngine(client, plan.schema, plan.backfill).backfill(
          plan.backfill.rules,
          toCategoryIds(seeded)
        )
      : { rowsAffected: 0, rules: [] };

    const appliedCount = (kind: ObjectKind): number =>
      mutations.filter((m) => m.kind === kind && m.applied).length;

    return {
      planId: plan.id,
      tablesCreated: appliedCount("table"),
      columnsAdded: appliedCount("column"),
      constraintsAdded: appliedCount("constraint"),
      categoriesSeeded: seeded.filter((s) => s.wasInserted).length,
      rowsBackfilled: backfill.rowsAffected,
      mutations,
      seeded,
      rules: backfill.rules,
      dryRun,
      durationMs: 0,
    };
  }

  private async inspect(client: Queryable): Promise<VerificationReport> {
    const { plan } = this;
    const prober = new ExistenceProber(client, plan.schema);

    const objects: ObjectStatus[] = [];
    for (const table of plan.tables) {
      objects.push({ kind: "table", target: table.name, exists: await prober.exists("table", table.name) });
    }
    for (const column of plan.columns) {
      objects.push({
        kind: "column",
        target: `${column.table}.${column.name}`,
        exists: await prober.exists("column", column.name, column.table),
      });
    }
    for (const constraint of plan.constraints) {
      objects.push({
        kind: "constraint",
        target: `${constraint.table}.${constraint.name}`,
        exists: await prober.exists("constraint", constraint.name, constraint.table),
      });
    }

    const seeds: SeedStatus[] = [];
    const seed = plan.seed;
    if (seed && (await prober.exists("table", seed.table))) {
      const lookupSql = `SELECT ${quoteIdentifier(seed.idColumn)} AS id
  FROM ${qualify(plan.schema, seed.table)}
 WHERE ${quoteIdentifier(seed.keyColumn)} = $1`;
      for (const row of seed.rows) {
        const { rows } = await this.query<{ id: RowId }>(client, lookupSql, [row.name]);
        seeds.push({ name: row.name, id: rows[0]?.id ?? null });
      }
    } else if (seed) {
      seeds.push(...seed.rows.map((row) => ({ name: row.name, id: null })));
    }

    let itemsByCategory: CategoryCount[] | null = null;
    let uncategorized: number | null = null;
    const backfill = plan.backfill;
    if (backfill && (await prober.exists("column", backfill.referenceColumn, backfill.table))) {
      const items = qualify(plan.schema, backfill.table);
      const reference = quoteIdentifier(backfill.referenceColumn);

      itemsByCategory = [];
      for (const status of seeds) {
        if (status.id === null) {
          continue;
        }
        const { rows } = await this.query<{ count: number }>(
          client,
          `SELECT COUNT(*)::int AS count FROM ${items} WHERE ${reference} = $1`,
          [status.id]
        );
        itemsByCategory.push({ category: status.name, count: Number(rows[0]?.count ?? 0) });
      }

      const { rows } = await this.query<{ count: number }>(
        client,
        `SELECT COUNT(*)::int AS count FROM ${items} WHERE ${reference} IS NULL`
      );
      uncategorized = Number(rows[0]?.count ?? 0);
    }

    const complete =
      objects.every((o) => o.exists) &&
      seeds.every((s) => s.id !== null) &&
      (backfill === undefined || itemsByCategory !== null);

    return { planId: plan.id, objects, seeds, itemsByCategory, uncategorized, complete };
  }

  private async query<R extends QueryResultRow>(
    client: Queryable,
    sql: string,
    values?: unknown[]
  ): Promise<{ rows: R[] }> {
    try {
      return await client.query<R>(sql, values);
    } catch (error) {
      throw new MigrationError("Verification query failed", {
        planId: this.plan.id,
        sqlState: pgErrorCode(error),
        error: describeError(error),
      });
    }
  }
}

/**
 * Normalize anything a run can throw into a MigrationError
 */
export function toMigrationError(error: unknown, planId: string): MigrationError {
  if (error instanceof MigrationError) {
    return error;
  }
  if (error instanceof ReapplyError) {
    return new MigrationError(error.message, { ...error.context, planId, cause: error.code });
  }
  return new TransactionError(`Transaction for ${planId} failed: ${describeError(error)}`, {
    planId,
    sqlState: pgErrorCode(error),
    error: describeError(error),
  });
}

/**
 * Factory function to create a MigrationRunner
 */
export function createMigrationRunner(database: Database, plan: MigrationPlan): MigrationRunner {
  return new MigrationRunner(database, plan);
}
