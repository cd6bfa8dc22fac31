// paragoncore/storage/PostgresParagonRepository.ts

import { z } from "zod";

import { PgSqlExecutor, type SqlExecutor } from "../db/SqlExecutor";
import type { StoredProgress } from "../paragon/ParagonState";
import type { KeyScope, StatId, SubjectRef } from "../paragon/ParagonTypes";
import { Logger } from "../utils/logger";
import { progressKey, type ParagonRepository } from "./ParagonRepository";

// pg hands BIGINT back as string
const progressRowSchema = z.object({
  level: z.coerce.number().int(),
  experience: z.coerce.number().int(),
});

const statValueRowSchema = z.object({
  stat_id: z.coerce.number().int(),
  stat_value: z.coerce.number().int(),
});

const PROGRESS_TABLES: Record<KeyScope, { table: string; column: string }> = {
  character: { table: "character_paragon", column: "character_id" },
  account: { table: "account_paragon", column: "account_id" },
};

export class PostgresParagonRepository implements ParagonRepository {
  private log = Logger.scope("REPO");

  constructor(
    readonly keyScope: KeyScope,
    private readonly sql: SqlExecutor = new PgSqlExecutor(),
  ) {}

  async loadProgress(subject: SubjectRef): Promise<StoredProgress | null> {
    const { table, column } = PROGRESS_TABLES[this.keyScope];
    const res = await this.sql.query(
      `SELECT level, experience FROM ${table} WHERE ${column} = $1`,
      [progressKey(this.keyScope, subject)],
    );

    const row = res.rows[0];
    if (!row) return null;

    const parsed = progressRowSchema.parse(row);
    return { level: parsed.level, experience: parsed.experience };
  }

  async loadInvestments(subject: SubjectRef): Promise<Map<StatId, number>> {
    const res = await this.sql.query(
      `
      SELECT stat_id, stat_value
      FROM character_paragon_stats
      WHERE character_id = $1
      `,
      [subject.characterId],
    );

    const out = new Map<StatId, number>();
    for (const row of res.rows) {
      const parsed = statValueRowSchema.parse(row);
      out.set(parsed.stat_id, parsed.stat_value);
    }
    return out;
  }

  async saveProgress(subject: SubjectRef, progress: StoredProgress): Promise<void> {
    const { table, column } = PROGRESS_TABLES[this.keyScope];
    await this.sql.query(
      `
      INSERT INTO ${table} (${column}, level, experience)
      VALUES ($1, $2, $3)
      ON CONFLICT (${column}) DO UPDATE SET
        level = EXCLUDED.level,
        experience = EXCLUDED.experience
      `,
      [progressKey(this.keyScope, subject), progress.level, progress.experience],
    );
  }

  async saveInvestments(subject: SubjectRef, investments: ReadonlyMap<StatId, number>): Promise<void> {
    const kept = [...investments].filter(([, value]) => value > 0);
    const keptIds = kept.map(([statId]) => statId);

    await this.sql.transaction(async (tx) => {
      await tx.query(
        `
        DELETE FROM character_paragon_stats
        WHERE character_id = $1
          AND NOT (stat_id = ANY($2::int[]))
        `,
        [subject.characterId, keptIds],
      );

      for (const [statId, value] of kept) {
        await tx.query(
          `
          INSERT INTO character_paragon_stats (character_id, stat_id, stat_value)
          VALUES ($1, $2, $3)
          ON CONFLICT (character_id, stat_id) DO UPDATE SET
            stat_value = EXCLUDED.stat_value
          `,
          [subject.characterId, statId, value],
        );
      }
    });

    this.log.debug("Saved paragon investments", {
      characterId: subject.characterId,
      stats: kept.length,
    });
  }
}
