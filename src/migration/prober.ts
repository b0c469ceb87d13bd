import { pgErrorCode } from "../db/sql.js";
import { ValidationError, describeError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { MetadataQueryError } from "./errors.js";

import type { Queryable } from "../db/client.js";
import type { ObjectKind } from "./plan.schema.js";

const log = logger.child("[prober]");

const TABLE_SQL = `SELECT 1 AS present
  FROM information_schema.tables
 WHERE table_schema = $1
   AND table_name = $2
 LIMIT 1`;

const COLUMN_SQL = `SELECT 1 AS present
  FROM information_schema.columns
 WHERE table_schema = $1
   AND table_name = $2
   AND column_name = $3
 LIMIT 1`;

const CONSTRAINT_SQL = `SELECT 1 AS present
  FROM information_schema.table_constraints
 WHERE table_schema = $1
   AND table_name = $2
   AND constraint_name = $3
 LIMIT 1`;

/**
 * Answers "does this schema object exist right now?" from the database's
 * structural metadata. Nothing is cached: each call is a fresh query inside
 * the caller's transaction.
 */
export class ExistenceProber {
  constructor(
    private readonly client: Queryable,
    private readonly schema: string
  ) {}

  /**
   * Check for a table, or for a column/constraint of `table`.
   * Absence resolves to `false`; only metadata query failures reject.
   */
  async exists(kind: ObjectKind, name: string, table?: string): Promise<boolean> {
    const [sql, params] = this.statementFor(kind, name, table);

    try {
      const { rows } = await this.client.query<{ present: number }>(sql, params);
      const found = rows.length > 0;
      log.debug(`${kind} ${this.describe(kind, name, table)}: ${found ? "present" : "absent"}`);
      return found;
    } catch (error) {
      throw new MetadataQueryError(
        `Failed to probe ${kind} ${this.describe(kind, name, table)}`,
        {
          kind,
          name,
          table,
          schema: this.schema,
          sqlState: pgErrorCode(error),
          error: describeError(error),
        }
      );
    }
  }

  private statementFor(kind: ObjectKind, name: string, table: string | undefined): [string, string[]] {
    if (kind === "table") {
      return [TABLE_SQL, [this.schema, name]];
    }
    if (table === undefined) {
      throw new ValidationError(`Probing a ${kind} requires its table`, { kind, name });
    }
    return [kind === "column" ? COLUMN_SQL : CONSTRAINT_SQL, [this.schema, table, name]];
  }

  private describe(kind: ObjectKind, name: string, table: string | undefined): string {
    return kind === "table" || table === undefined
      ? `${this.schema}.${name}`
      : `${this.schema}.${table}.${name}`;
  }
}
