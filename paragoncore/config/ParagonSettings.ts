// paragoncore/config/ParagonSettings.ts
//
// Typed view over the paragon_config key/value table. Every value is stored
// as a string; anything missing or out of range falls back to the default.

import type { KeyScope, ParagonSettings } from "../paragon/ParagonTypes";
import { Logger } from "../utils/logger";

const log = Logger.scope("CATALOGUE");

export const SETTING_KEYS = {
  pointsPerLevel: "POINTS_PER_LEVEL",
  baseMaxExperience: "BASE_MAX_EXPERIENCE",
  levelCap: "PARAGON_LEVEL_CAP",
  startingLevel: "PARAGON_STARTING_LEVEL",
  startingExperience: "PARAGON_STARTING_EXPERIENCE",
  linkedToAccount: "LEVEL_LINKED_TO_ACCOUNT",
  lowLevelThreshold: "LOW_LEVEL_THRESHOLD",
  highLevelThreshold: "HIGH_LEVEL_THRESHOLD",
  lowLevelMultiplier: "LOW_LEVEL_MULTIPLIER",
  highLevelMultiplier: "HIGH_LEVEL_MULTIPLIER",
} as const;

export const DEFAULT_SETTINGS: Readonly<ParagonSettings> = Object.freeze({
  pointsPerLevel: 1,
  baseMaxExperience: 1000,
  levelCap: 0,
  startingLevel: 1,
  startingExperience: 0,
  keyScope: "character",

  lowLevelThreshold: 5,
  highLevelThreshold: 100,
  lowLevelMultiplier: 1.5,
  highLevelMultiplier: 0.8,
});

type Check = (n: number) => boolean;

const nonNegativeInt: Check = (n) => Number.isInteger(n) && n >= 0;
const positiveInt: Check = (n) => Number.isInteger(n) && n > 0;
const nonNegative: Check = (n) => n >= 0;

function readNumber(
  raw: Readonly<Record<string, string>>,
  key: string,
  fallback: number,
  valid: Check,
): number {
  const text = raw[key];
  if (text === undefined || text.trim() === "") return fallback;

  const n = Number(text);
  if (!Number.isFinite(n) || !valid(n)) {
    log.warn("Ignoring invalid paragon setting", { key, value: text, fallback });
    return fallback;
  }
  return n;
}

function readKeyScope(raw: Readonly<Record<string, string>>): KeyScope {
  const text = raw[SETTING_KEYS.linkedToAccount];
  if (text === undefined) return DEFAULT_SETTINGS.keyScope;
  return text.trim() === "1" ? "account" : "character";
}

export function parseKeyScope(text: string | undefined): KeyScope | null {
  if (text === "character" || text === "account") return text;
  return null;
}

export function parseParagonSettings(raw: Readonly<Record<string, string>>): ParagonSettings {
  const d = DEFAULT_SETTINGS;

  const levelCap = readNumber(raw, SETTING_KEYS.levelCap, d.levelCap, nonNegativeInt);
  let startingLevel = readNumber(raw, SETTING_KEYS.startingLevel, d.startingLevel, positiveInt);

  if (levelCap > 0 && startingLevel > levelCap) {
    log.warn("Starting level above level cap; clamping", { startingLevel, levelCap });
    startingLevel = levelCap;
  }

  return {
    pointsPerLevel: readNumber(raw, SETTING_KEYS.pointsPerLevel, d.pointsPerLevel, nonNegativeInt),
    baseMaxExperience: readNumber(raw, SETTING_KEYS.baseMaxExperience, d.baseMaxExperience, positiveInt),
    levelCap,
    startingLevel,
    startingExperience: readNumber(
      raw,
      SETTING_KEYS.startingExperience,
      d.startingExperience,
      nonNegativeInt,
    ),
    keyScope: readKeyScope(raw),

    lowLevelThreshold: readNumber(raw, SETTING_KEYS.lowLevelThreshold, d.lowLevelThreshold, nonNegativeInt),
    highLevelThreshold: readNumber(raw, SETTING_KEYS.highLevelThreshold, d.highLevelThreshold, nonNegativeInt),
    lowLevelMultiplier: readNumber(raw, SETTING_KEYS.lowLevelMultiplier, d.lowLevelMultiplier, nonNegative),
    highLevelMultiplier: readNumber(raw, SETTING_KEYS.highLevelMultiplier, d.highLevelMultiplier, nonNegative),
  };
}
