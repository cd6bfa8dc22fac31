// paragoncore/storage/PostgresParagonConfigSource.ts

import { z } from "zod";

import { PgSqlExecutor, type SqlExecutor } from "../db/SqlExecutor";
import type { CatalogueSnapshot } from "../paragon/ParagonCatalogue";
import { Logger } from "../utils/logger";

const settingRowSchema = z.object({
  field: z.string(),
  value: z.coerce.string(),
});

/**
 * Reads the paragon configuration tables. Rows are returned as-is; the
 * catalogue validates them.
 */
export class PostgresParagonConfigSource {
  private log = Logger.scope("REPO");

  constructor(private readonly sql: SqlExecutor = new PgSqlExecutor()) {}

  async loadSnapshot(): Promise<CatalogueSnapshot> {
    const categories = await this.sql.query(
      `SELECT id, name FROM paragon_config_category ORDER BY id`,
    );

    const statistics = await this.sql.query(
      `
      SELECT id, category, type, type_value, icon, factor, "limit", application
      FROM paragon_config_statistic
      ORDER BY id
      `,
    );

    const rewards = await this.sql.query(
      `
      SELECT source_kind, entry_id, experience
      FROM paragon_config_experience
      `,
    );

    const settingRows = await this.sql.query(`SELECT field, value FROM paragon_config`);
    const settings: Record<string, string> = {};
    for (const row of settingRows.rows) {
      const { field, value } = settingRowSchema.parse(row);
      settings[field] = value;
    }

    this.log.info("Loaded paragon configuration", {
      categories: categories.rowCount,
      statistics: statistics.rowCount,
      rewards: rewards.rowCount,
      settings: settingRows.rowCount,
    });

    return {
      categories: categories.rows,
      statistics: statistics.rows,
      rewards: rewards.rows,
      settings,
    };
  }
}
