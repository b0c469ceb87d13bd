import { asciiLower, pgErrorCode, qualify, quoteIdentifier } from "../db/sql.js";
import { describeError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { BackfillExecutionError } from "./errors.js";

import type { Queryable } from "../db/client.js";
import type { BackfillDefinition, BackfillRule } from "./plan.schema.js";
import type { RowId } from "./seeder.js";

const log = logger.child("[backfill]");

export interface RuleOutcome {
  /** Normalized (lower-cased) match value */
  match: string;
  category: string;
  categoryId: RowId;
  rowsAffected: number;
}

export interface BackfillResult {
  rowsAffected: number;
  rules: RuleOutcome[];
}

export type BackfillTarget = Pick<BackfillDefinition, "table" | "matchColumn" | "referenceColumn">;

/**
 * Lower-case A-Z only. The stored value is folded the same way in SQL
 * (`translate`), so the comparison does not depend on the database locale.
 */
export function normalizeMatch(value: string): string {
  return value.replace(/[A-Z]/g, (char) => char.toLowerCase());
}

/**
 * Points existing rows at reference rows using ordered name rules.
 *
 * Each rule is one UPDATE, applied in order, so when two rules match the
 * same row the later one wins. Matching rows are rewritten even if they
 * already hold the right id; rows no rule matches are left alone.
 */
export class BackfillEngine {
  private readonly updateSql: string;

  constructor(
    private readonly client: Queryable,
    private readonly schema: string,
    private readonly target: BackfillTarget
  ) {
    this.updateSql = `UPDATE ${qualify(schema, target.table)}
   SET ${quoteIdentifier(target.referenceColumn)} = $1
 WHERE ${asciiLower(quoteIdentifier(target.matchColumn))} = $2`;
  }

  async backfill(
    rules: readonly BackfillRule[],
    categoryIds: ReadonlyMap<string, RowId>
  ): Promise<BackfillResult> {
    const outcomes: RuleOutcome[] = [];

    for (const [index, rule] of rules.entries()) {
      const match = normalizeMatch(rule.match);
      const categoryId = categoryIds.get(rule.category);

      if (categoryId === undefined) {
        throw new BackfillExecutionError(`Rule ${index + 1} targets unknown category "${rule.category}"`, {
          rule: index + 1,
          match,
          category: rule.category,
        });
      }

      let rowCount: number | null;
      try {
        ({ rowCount } = await this.client.query(this.updateSql, [categoryId, match]));
      } catch (error) {
        throw new BackfillExecutionError(`Rule ${index + 1} ("${match}" → ${rule.category}) failed`, {
          rule: index + 1,
          match,
          category: rule.category,
          table: this.target.table,
          sqlState: pgErrorCode(error),
          error: describeError(error),
        });
      }

      const rowsAffected = rowCount ?? 0;
      log.debug(`"${match}" → ${rule.category} (${categoryId}): ${rowsAffected} row(s)`);
      outcomes.push({ match, category: rule.category, categoryId, rowsAffected });
    }

    const rowsAffected = outcomes.reduce((sum, outcome) => sum + outcome.rowsAffected, 0);
    log.info(`Backfilled ${this.target.table}.${this.target.referenceColumn}: ${rowsAffected} row(s) across ${outcomes.length} rule(s)`);
    return { rowsAffected, rules: outcomes };
  }
}
