// paragoncore/db/ParagonSchema.ts

import fs from "node:fs";
import path from "node:path";

import type { SqlExecutor } from "./SqlExecutor";
import { Logger } from "../utils/logger";

const log = Logger.scope("DB");

// tsc does not copy .sql into dist/; PGN_SCHEMA_DIR points a built server at the sources.
export const SCHEMA_DIR = process.env.PGN_SCHEMA_DIR ?? path.join(__dirname, "schema");

/** *.sql files under dir, in numeric (lexical) order. */
export function listSchemaFiles(dir: string = SCHEMA_DIR): string[] {
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith(".sql"))
    .sort()
    .map((f) => path.join(dir, f));
}

/**
 * Create the paragon tables. Every statement is IF NOT EXISTS, so running this
 * on each start is safe. Each file runs in its own transaction.
 */
export async function applyParagonSchema(
  sql: SqlExecutor,
  dir: string = SCHEMA_DIR,
): Promise<number> {
  const files = listSchemaFiles(dir);

  for (const file of files) {
    const text = fs.readFileSync(file, "utf8");
    await sql.transaction(async (tx) => {
      await tx.query(text);
    });
    log.info("Applied schema file", { file: path.basename(file) });
  }

  return files.length;
}
