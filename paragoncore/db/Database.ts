// paragoncore/db/Database.ts
// Postgres connection layer for the paragon tables.
//
// Importing this module creates the pool but does not connect; the first
// query does. Services import it lazily (see SqlExecutor.ts) so tests can load
// them without opening sockets.

import { Pool } from "pg";
import dotenv from "dotenv";
import { Logger } from "../utils/logger";

dotenv.config();

const log = Logger.scope("DB");

/**
 * Shared Postgres pool.
 *
 * Env: PGN_DB_HOST, PGN_DB_PORT, PGN_DB_USER, PGN_DB_PASS, PGN_DB_NAME,
 * PGN_DB_POOL_SIZE. Missing values surface as an error on first query.
 */
export const db = new Pool({
  host: process.env.PGN_DB_HOST,
  port: parseInt(process.env.PGN_DB_PORT || "5432", 10),
  user: process.env.PGN_DB_USER,
  password: process.env.PGN_DB_PASS,
  database: process.env.PGN_DB_NAME,
  max: parseInt(process.env.PGN_DB_POOL_SIZE || "10", 10),
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5_000,
});

// Errors on idle clients; the pool itself stays usable.
db.on("error", (err: Error) => {
  log.error("Postgres pool error", { err });
});

/** Startup smoke test. Logs the outcome and reports it; never throws. */
export async function testDbConnection(): Promise<boolean> {
  try {
    await db.query("SELECT 1 AS ok");
    log.success("Postgres connected");
    return true;
  } catch (err) {
    log.error("Postgres connection test failed", { err });
    return false;
  }
}

export async function closeDb(): Promise<void> {
  await db.end();
  log.info("Postgres pool closed");
}
