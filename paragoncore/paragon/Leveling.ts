// paragoncore/paragon/Leveling.ts

export interface LevelCurve {
  baseMaxExperience: number;
  // 0 = unlimited
  levelCap: number;
}

export interface LevelingResult {
  oldLevel: number;
  newLevel: number;
  oldXp: number;
  newXp: number;
  requiredForNext: number;
  levelsGained: number;
  atCap: boolean;
}

/** Experience needed to leave `level`. Linear: base × level. */
export function xpForNextLevel(curve: LevelCurve, level: number): number {
  return curve.baseMaxExperience * level;
}

export function isAtCap(curve: LevelCurve, level: number): boolean {
  return curve.levelCap > 0 && level >= curve.levelCap;
}

export function clampLevel(curve: LevelCurve, level: number): number {
  const atLeastOne = Math.max(1, Math.floor(level));
  return curve.levelCap > 0 ? Math.min(atLeastOne, curve.levelCap) : atLeastOne;
}

/**
 * Cascading level-up.
 *
 * Adds deltaXp to the current pool and spends whole thresholds until the
 * remainder no longer reaches the next one. Reaching the cap stops the cascade;
 * whatever is left stays as current experience, held one point below the
 * threshold, so further gains at the cap change nothing.
 *
 * Example (base 50): level 1 with 49/50 gains 150 -> 199 -> level 2 with 149/100
 * -> level 3 with 49/150.
 */
export function applyXp(
  curve: LevelCurve,
  oldLevel: number,
  oldXp: number,
  deltaXp: number,
): LevelingResult {
  let level = oldLevel;
  let required = xpForNextLevel(curve, level);
  let xp = Math.max(0, Math.floor(oldXp + Math.max(0, deltaXp)));

  while (!isAtCap(curve, level) && xp >= required && curve.baseMaxExperience > 0) {
    xp -= required;
    level = clampLevel(curve, level + 1);
    required = xpForNextLevel(curve, level);
  }

  const atCap = isAtCap(curve, level);
  if (atCap && required > 0) {
    xp = Math.min(xp, required - 1);
  }

  return {
    oldLevel,
    newLevel: level,
    oldXp,
    newXp: xp,
    requiredForNext: required,
    levelsGained: level - oldLevel,
    atCap,
  };
}
