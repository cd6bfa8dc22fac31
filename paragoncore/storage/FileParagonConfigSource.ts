// paragoncore/storage/FileParagonConfigSource.ts
//
// Catalogue snapshot from a JSON file shaped like the config tables. Used by
// the dev server when no database is configured.

import fs from "node:fs/promises";
import { z } from "zod";

import type { CatalogueSnapshot } from "../paragon/ParagonCatalogue";
import { Logger } from "../utils/logger";

const log = Logger.scope("REPO");

const snapshotFileSchema = z.object({
  categories: z.array(z.unknown()),
  statistics: z.array(z.unknown()),
  rewards: z.array(z.unknown()).default([]),
  settings: z.record(z.union([z.string(), z.number()])).default({}),
});

export function parseSnapshotJson(text: string): CatalogueSnapshot {
  const parsed = snapshotFileSchema.parse(JSON.parse(text));

  const settings: Record<string, string> = {};
  for (const [field, value] of Object.entries(parsed.settings)) {
    settings[field] = String(value);
  }

  return {
    categories: parsed.categories,
    statistics: parsed.statistics,
    rewards: parsed.rewards,
    settings,
  };
}

export class FileParagonConfigSource {
  constructor(private readonly filePath: string) {}

  async loadSnapshot(): Promise<CatalogueSnapshot> {
    const text = await fs.readFile(this.filePath, "utf8");
    const snapshot = parseSnapshotJson(text);

    log.info("Loaded paragon configuration file", {
      file: this.filePath,
      categories: snapshot.categories.length,
      statistics: snapshot.statistics.length,
    });
    return snapshot;
  }
}
