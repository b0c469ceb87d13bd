import { isUniqueViolation, pgErrorCode, qualify, quoteIdentifier } from "../db/sql.js";
import { describeError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { SeedResolutionError } from "./errors.js";

import type { Queryable } from "../db/client.js";
import type { SeedDefinition, SeedRecord } from "./plan.schema.js";

const log = logger.child("[seeder]");

const INSERT_SAVEPOINT = "reapply_seed";

/**
 * Identity of a reference row. SERIAL/INTEGER ids come back as numbers,
 * BIGINT ids as strings.
 */
export type RowId = number | string;

export interface SeedResult {
  name: string;
  id: RowId;
  wasInserted: boolean;
}

/**
 * Where the reference rows live
 */
export type SeedTarget = Pick<SeedDefinition, "table" | "idColumn" | "keyColumn" | "descriptionColumn">;

/**
 * Inserts reference rows once. A name that already exists is resolved to
 * the existing row's id instead of failing or duplicating it.
 */
export class ReferenceSeeder {
  private readonly insertSql: string;
  private readonly lookupSql: string;

  constructor(
    private readonly client: Queryable,
    private readonly schema: string,
    private readonly target: SeedTarget
  ) {
    const table = qualify(schema, target.table);
    const id = quoteIdentifier(target.idColumn);
    const key = quoteIdentifier(target.keyColumn);
    const description = quoteIdentifier(target.descriptionColumn);

    this.insertSql = `INSERT INTO ${table} (${key}, ${description})
VALUES ($1, $2)
ON CONFLICT (${key}) DO NOTHING
RETURNING ${id} AS id`;
    this.lookupSql = `SELECT ${id} AS id FROM ${table} WHERE ${key} = $1`;
  }

  /**
   * Seed records in input order. Every input name maps to exactly one id on return.
   */
  async seed(records: readonly SeedRecord[]): Promise<SeedResult[]> {
    const results: SeedResult[] = [];
    for (const record of records) {
      results.push(await this.seedOne(record));
    }

    const inserted = results.filter((r) => r.wasInserted).length;
    log.info(`Seeded ${this.target.table}: ${inserted} inserted, ${results.length - inserted} already present`);
    return results;
  }

  private async seedOne(record: SeedRecord): Promise<SeedResult> {
    const insertedId = await this.insert(record);

    if (insertedId !== undefined) {
      log.debug(`inserted ${this.target.table} "${record.name}" as ${insertedId}`);
      return { name: record.name, id: insertedId, wasInserted: true };
    }

    const existingId = await this.lookup(record.name);
    log.debug(`${this.target.table} "${record.name}" already present as ${existingId}`);
    return { name: record.name, id: existingId, wasInserted: false };
  }

  /**
   * Insert under a savepoint; resolves to undefined when the name is taken.
   * A unique violation (a concurrent seeder, or a backend without
   * conflict-skip) is rolled back to the savepoint so the lookup can run.
   */
  private async insert(record: SeedRecord): Promise<RowId | undefined> {
    try {
      await this.client.query(`SAVEPOINT ${INSERT_SAVEPOINT}`);
      const { rows } = await this.client.query<{ id: RowId }>(this.insertSql, [
        record.name,
        record.description ?? null,
      ]);
      await this.client.query(`RELEASE SAVEPOINT ${INSERT_SAVEPOINT}`);
      return rows[0]?.id;
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw new SeedResolutionError(`Failed to insert ${this.target.table} row "${record.name}"`, {
          name: record.name,
          table: this.target.table,
          sqlState: pgErrorCode(error),
          error: describeError(error),
        });
      }
    }

    try {
      await this.client.query(`ROLLBACK TO SAVEPOINT ${INSERT_SAVEPOINT}`);
      await this.client.query(`RELEASE SAVEPOINT ${INSERT_SAVEPOINT}`);
    } catch (error) {
      throw new SeedResolutionError(`Failed to recover from a conflicting ${this.target.table} row "${record.name}"`, {
        name: record.name,
        table: this.target.table,
        sqlState: pgErrorCode(error),
        error: describeError(error),
      });
    }
    return undefined;
  }

  private async lookup(name: string): Promise<RowId> {
    let rows: { id: RowId }[];
    try {
      ({ rows } = await this.client.query<{ id: RowId }>(this.lookupSql, [name]));
    } catch (error) {
      throw new SeedResolutionError(`Failed to look up ${this.target.table} row "${name}"`, {
        name,
        table: this.target.table,
        sqlState: pgErrorCode(error),
        error: describeError(error),
      });
    }

    const row = rows[0];
    if (row === undefined) {
      throw new SeedResolutionError(
        `${this.target.table} row "${name}" conflicted on insert but is not visible`,
        { name, table: this.target.table }
      );
    }
    return row.id;
  }
}

/**
 * Name → id lookup for the backfill step
 */
export function toCategoryIds(results: readonly SeedResult[]): Map<string, RowId> {
  return new Map(results.map((result) => [result.name, result.id]));
}
