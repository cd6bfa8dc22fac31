// paragoncore/paragon/ParagonCatalogue.ts
//
// Read-only snapshot of the paragon configuration: categories, stat
// definitions, experience rewards and scalar settings. Built once per process
// and passed to whoever needs it.

import { z } from "zod";

import { parseParagonSettings } from "../config/ParagonSettings";
import { Logger } from "../utils/logger";
import type {
  Category,
  CategoryId,
  ParagonSettings,
  SourceKind,
  StatDef,
  StatId,
  StatKind,
} from "./ParagonTypes";

const log = Logger.scope("CATALOGUE");

// -----------------------------
// Raw row shapes (as stored)
// -----------------------------

const idSchema = z.coerce.number().int().positive();

export const categoryRowSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
});

export const statRowSchema = z.object({
  id: idSchema,
  category: idSchema,
  type: z.enum(["AURA", "COMBAT_RATING", "UNIT_MODS"]),
  type_value: z.coerce.number().int(),
  icon: z.string(),
  factor: z.coerce.number().int(),
  limit: z.coerce.number().int().nonnegative(),
  application: z.coerce.number().int(),
});

export const rewardRowSchema = z.object({
  source_kind: z.enum(["CREATURE", "ACHIEVEMENT", "SKILL", "QUEST"]),
  entry_id: z.coerce.number().int().nonnegative(),
  experience: z.coerce.number().int().nonnegative(),
});

export type CategoryRow = z.infer<typeof categoryRowSchema>;
export type StatRow = z.infer<typeof statRowSchema>;
export type RewardRow = z.infer<typeof rewardRowSchema>;

export interface CatalogueSnapshot {
  categories: unknown[];
  statistics: unknown[];
  rewards: unknown[];
  settings: Record<string, string>;
}

const STAT_KIND_BY_TYPE: Record<StatRow["type"], StatKind> = {
  AURA: "Aura",
  COMBAT_RATING: "CombatRating",
  UNIT_MODS: "UnitModifier",
};

const SOURCE_KIND_BY_DB: Record<RewardRow["source_kind"], SourceKind> = {
  CREATURE: "Creature",
  ACHIEVEMENT: "Achievement",
  SKILL: "Skill",
  QUEST: "Quest",
};

function rewardKey(kind: SourceKind, entryId: number): string {
  return `${kind}:${entryId}`;
}

function parseRows<T>(label: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown[]): T[] {
  return rows.map((row, index) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new Error(
        `Invalid ${label} row at index ${index}: ${parsed.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ")}`,
      );
    }
    return parsed.data;
  });
}

export class ParagonCatalogue {
  readonly settings: Readonly<ParagonSettings>;

  private readonly categories: ReadonlyMap<CategoryId, Category>;
  private readonly statsById: ReadonlyMap<StatId, StatDef>;
  private readonly rewards: ReadonlyMap<string, number>;
  private readonly scalars: Readonly<Record<string, string>>;

  private constructor(
    categories: Map<CategoryId, Category>,
    statsById: Map<StatId, StatDef>,
    rewards: Map<string, number>,
    scalars: Record<string, string>,
  ) {
    this.categories = categories;
    this.statsById = statsById;
    this.rewards = rewards;
    this.scalars = Object.freeze({ ...scalars });
    this.settings = Object.freeze(parseParagonSettings(this.scalars));
  }

  /**
   * Validate and index a raw snapshot. Throws on malformed rows or a stat that
   * points at an unknown category: both are startup configuration errors.
   */
  static fromSnapshot(snapshot: CatalogueSnapshot): ParagonCatalogue {
    const categoryRows = parseRows("category", categoryRowSchema, snapshot.categories);
    const statRows = parseRows("statistic", statRowSchema, snapshot.statistics);
    const rewardRows = parseRows("experience reward", rewardRowSchema, snapshot.rewards);

    const statsByCategory = new Map<CategoryId, Map<StatId, StatDef>>();
    const statsById = new Map<StatId, StatDef>();

    for (const row of categoryRows) {
      if (statsByCategory.has(row.id)) {
        throw new Error(`Duplicate paragon category id ${row.id}`);
      }
      statsByCategory.set(row.id, new Map());
    }

    for (const row of statRows) {
      const bucket = statsByCategory.get(row.category);
      if (!bucket) {
        throw new Error(`Paragon statistic ${row.id} references unknown category ${row.category}`);
      }
      if (statsById.has(row.id)) {
        throw new Error(`Duplicate paragon statistic id ${row.id}`);
      }

      const def: StatDef = Object.freeze({
        id: row.id,
        categoryId: row.category,
        kind: STAT_KIND_BY_TYPE[row.type],
        targetCode: row.type_value,
        icon: row.icon,
        factor: row.factor,
        limit: row.limit,
        applicationCode: row.application,
      });

      bucket.set(def.id, def);
      statsById.set(def.id, def);
    }

    const categories = new Map<CategoryId, Category>();
    for (const row of categoryRows) {
      categories.set(
        row.id,
        Object.freeze({ id: row.id, name: row.name, stats: statsByCategory.get(row.id) ?? new Map() }),
      );
    }

    const rewards = new Map<string, number>();
    for (const row of rewardRows) {
      rewards.set(rewardKey(SOURCE_KIND_BY_DB[row.source_kind], row.entry_id), row.experience);
    }

    const catalogue = new ParagonCatalogue(categories, statsById, rewards, snapshot.settings);

    log.info("Paragon catalogue built", {
      categories: categories.size,
      statistics: statsById.size,
      rewards: rewards.size,
    });

    return catalogue;
  }

  getCategories(): Category[] {
    return [...this.categories.values()];
  }

  getCategory(id: CategoryId): Category | undefined {
    return this.categories.get(id);
  }

  getStatDef(statId: StatId): StatDef | undefined {
    return this.statsById.get(statId);
  }

  /** Stat lookup scoped to a category, as the client addresses stats. */
  getStatInCategory(categoryId: CategoryId, statId: StatId): StatDef | undefined {
    return this.categories.get(categoryId)?.stats.get(statId);
  }

  /**
   * Experience for a source: the entry's own reward, else the default (entry 0)
   * for that kind, else undefined.
   */
  getExperienceReward(kind: SourceKind, entryId: number): number | undefined {
    return this.rewards.get(rewardKey(kind, entryId)) ?? this.rewards.get(rewardKey(kind, 0));
  }

  getScalar(name: string): string | undefined {
    return this.scalars[name];
  }
}
