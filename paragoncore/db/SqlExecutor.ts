// paragoncore/db/SqlExecutor.ts

import type { QueryResultRow } from "pg";

// Rows come back untyped; callers parse them with zod.
export interface SqlResult {
  rows: QueryResultRow[];
  rowCount: number;
}

/** Anything that can run one parameterised statement. */
export interface SqlRunner {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

/**
 * Statement runner plus transactions. Repositories depend on this instead of
 * the pg pool so tests can hand them an in-process stand-in.
 */
export interface SqlExecutor extends SqlRunner {
  transaction<T>(work: (tx: SqlRunner) => Promise<T>): Promise<T>;
}

async function getPool() {
  const mod = await import("./Database");
  return mod.db;
}

/**
 * Executor over the shared pg pool. The Database module is imported on first
 * use, so constructing this is free of side effects.
 */
export class PgSqlExecutor implements SqlExecutor {
  async query(text: string, values: unknown[] = []): Promise<SqlResult> {
    const pool = await getPool();
    const res = await pool.query(text, values);
    return { rows: res.rows, rowCount: res.rowCount ?? 0 };
  }

  async transaction<T>(work: (tx: SqlRunner) => Promise<T>): Promise<T> {
    const pool = await getPool();
    const client = await pool.connect();

    const tx: SqlRunner = {
      async query(text: string, values: unknown[] = []) {
        const res = await client.query(text, values);
        return { rows: res.rows, rowCount: res.rowCount ?? 0 };
      },
    };

    try {
      await client.query("BEGIN");
      const out = await work(tx);
      await client.query("COMMIT");
      return out;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }
}
