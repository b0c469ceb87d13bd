/**
 * SQL text helpers and PostgreSQL error classification
 */

/** SQLSTATE codes the engine reacts to */
export const PG_ERROR_CODES = {
  UNIQUE_VIOLATION: "23505",
  DUPLICATE_TABLE: "42P07",
  DUPLICATE_COLUMN: "42701",
  DUPLICATE_OBJECT: "42710",
} as const;

const DUPLICATE_OBJECT_CODES: ReadonlySet<string> = new Set([
  PG_ERROR_CODES.DUPLICATE_TABLE,
  PG_ERROR_CODES.DUPLICATE_COLUMN,
  PG_ERROR_CODES.DUPLICATE_OBJECT,
]);

export function quoteIdentifier(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Schema-qualified, quoted table reference
 */
export function qualify(schema: string, table: string): string {
  return `${quoteIdentifier(schema)}.${quoteIdentifier(table)}`;
}

/**
 * SQLSTATE of a driver error, if it carries one
 */
export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * True when the server refused DDL because the object is already defined
 */
export function isDuplicateObjectError(error: unknown): boolean {
  const code = pgErrorCode(error);
  return code !== undefined && DUPLICATE_OBJECT_CODES.has(code);
}

export function isUniqueViolation(error: unknown): boolean {
  return pgErrorCode(error) === PG_ERROR_CODES.UNIQUE_VIOLATION;
}

/**
 * True when DDL lost a race to another session creating the same object.
 * Two concurrent `CREATE TABLE IF NOT EXISTS` collide on the catalog's
 * unique index (pg_type) and report 23505 rather than 42P07.
 */
export function isConcurrentDdlConflict(error: unknown): boolean {
  return isDuplicateObjectError(error) || isUniqueViolation(error);
}

const ASCII_UPPER = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const ASCII_LOWER = "abcdefghijklmnopqrstuvwxyz";

/**
 * SQL expression lower-casing A-Z only, independent of the database locale
 */
export function asciiLower(expression: string): string {
  return `translate(${expression}, '${ASCII_UPPER}', '${ASCII_LOWER}')`;
}
