// paragon-server/config.ts

import path from "node:path";
import dotenv from "dotenv";

import { parseKeyScope } from "../paragoncore/config/ParagonSettings";
import type { KeyScope } from "../paragoncore/paragon/ParagonTypes";

dotenv.config();

export interface ServerConfig {
  host: string;
  port: number;
  path: string;

  // Clients may send experience triggers (kills, quests...) themselves.
  // Dev only; a real host raises these from gameplay.
  devTriggers: boolean;

  // Overrides LEVEL_LINKED_TO_ACCOUNT when set.
  keyScope: KeyScope | null;

  // Postgres is used when a DB host is configured, the JSON catalogue otherwise.
  useDatabase: boolean;
  catalogueFile: string;

  // Periodic flush of active subjects; 0 disables it.
  autosaveIntervalMs: number;
}

const DEFAULT_PORT = 7787;
const DEFAULT_AUTOSAVE_INTERVAL_MS = 5 * 60_000; // 5 minutes

export const serverConfig: ServerConfig = {
  host: process.env.PGN_HOST || "0.0.0.0",
  port: Number(process.env.PGN_PORT || DEFAULT_PORT),
  path: process.env.PGN_WS_PATH || "/paragon",

  devTriggers: process.env.PGN_DEV_TRIGGERS === "true",
  keyScope: parseKeyScope(process.env.PGN_KEY_SCOPE),

  useDatabase: Boolean(process.env.PGN_DB_HOST),
  catalogueFile:
    process.env.PGN_CATALOGUE_FILE || path.join(__dirname, "data", "demo_catalogue.json"),

  autosaveIntervalMs: Number(process.env.PGN_AUTOSAVE_INTERVAL || DEFAULT_AUTOSAVE_INTERVAL_MS),
};
