import pg from "pg";

import { logger } from "../lib/logger.js";

import type { QueryResultRow } from "pg";

const log = logger.child("[db]");

/**
 * Rows and row count of a statement, as returned by pg
 */
export interface QueryOutcome<R> {
  rows: R[];
  rowCount: number | null;
}

/**
 * The part of a pg client the engine talks to.
 *
 * Every engine component receives one of these bound to the run's
 * transaction, never the pool itself.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryOutcome<R>>;
}

export interface PooledClient extends Queryable {
  release(): void;
}

/**
 * What a handle needs from a pool. pg's `Pool` satisfies it, as does
 * pg-mem's adapter.
 */
export interface ConnectionPool {
  connect(): Promise<PooledClient>;
  end(): Promise<void>;
}

export type IsolationLevel = "read committed" | "repeatable read" | "serializable";

export interface TransactionOptions {
  /** Isolation level for BEGIN; the server default when omitted */
  isolation?: IsolationLevel;
  /** Roll back even when the callback succeeds (dry runs) */
  rollbackOnly?: boolean;
}

export interface DatabaseOptions {
  connectionString?: string;
  /** Use an existing pool instead of opening one; it is left open on close() */
  pool?: ConnectionPool;
  max?: number;
  connectionTimeoutMillis?: number;
  idleTimeoutMillis?: number;
}

export interface Database {
  withConnection<T>(fn: (client: Queryable) => Promise<T>): Promise<T>;
  withTransaction<T>(fn: (client: Queryable) => Promise<T>, options?: TransactionOptions): Promise<T>;
  close(): Promise<void>;
}

const ISOLATION_SQL: Record<IsolationLevel, string> = {
  "read committed": "READ COMMITTED",
  "repeatable read": "REPEATABLE READ",
  serializable: "SERIALIZABLE",
};

export function beginStatement(isolation?: IsolationLevel): string {
  return isolation ? `BEGIN ISOLATION LEVEL ${ISOLATION_SQL[isolation]}` : "BEGIN";
}

function openPool(config: Omit<DatabaseOptions, "pool">): ConnectionPool {
  const pool = new pg.Pool(config);
  pool.on("error", (error: Error) => {
    log.error("unexpected error on idle client", error.message);
  });
  return pool;
}

/**
 * Create a database handle over a pg pool
 */
export function createDatabase(options: DatabaseOptions): Database {
  const { pool: existingPool, ...poolConfig } = options;
  const ownsPool = existingPool === undefined;
  const pool = existingPool ?? openPool(poolConfig);

  async function withConnection<T>(fn: (client: Queryable) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  async function withTransaction<T>(
    fn: (client: Queryable) => Promise<T>,
    transactionOptions: TransactionOptions = {}
  ): Promise<T> {
    return withConnection(async (client) => {
      await client.query(beginStatement(transactionOptions.isolation));
      try {
        const result = await fn(client);
        if (transactionOptions.rollbackOnly) {
          await client.query("ROLLBACK");
          log.debug("transaction rolled back (rollback-only)");
        } else {
          await client.query("COMMIT");
        }
        return result;
      } catch (error) {
        try {
          await client.query("ROLLBACK");
        } catch (rollbackError) {
          log.error(
            "failed to roll back transaction",
            rollbackError instanceof Error ? rollbackError.message : String(rollbackError)
          );
        }
        throw error;
      }
    });
  }

  async function close(): Promise<void> {
    if (ownsPool) {
      await pool.end();
    }
  }

  return { withConnection, withTransaction, close };
}
