// paragoncore/modules/ExperienceModifiers.ts
//
// Optional behaviour plugged into the engine through the mediator: level-based
// experience scaling, a server-wide event multiplier, level-up notices, grant
// auditing and a per-stat allocation cap. Nothing in the engine depends on it.

import type { Mediator } from "../mediator/Mediator";
import type { ParagonSettings } from "../paragon/ParagonTypes";
import type { ParagonState } from "../paragon/ParagonState";
import { Logger } from "../utils/logger";

const log = Logger.scope("MODULES");

/** Sends a short text to a subject (chat line, toast, addon notice). */
export type ParagonNotifier = (subjectId: number, message: string) => void;

export interface ExperienceModifierOptions {
  notify?: ParagonNotifier;

  /** Upper bound any single stat may be set to, on top of its own limit. */
  maxInvestmentPerStat?: number;

  // Log every grant at info instead of debug.
  auditGrants?: boolean;
}

type LevelMultiplierSettings = Pick<
  ParagonSettings,
  "lowLevelThreshold" | "highLevelThreshold" | "lowLevelMultiplier" | "highLevelMultiplier"
>;

/**
 * Level-based scaling: at or below the low threshold the low multiplier
 * applies, at or above the high threshold the high one, otherwise ×1.
 */
export function levelMultiplier(settings: LevelMultiplierSettings, level: number): number {
  if (level <= settings.lowLevelThreshold) return settings.lowLevelMultiplier;
  if (level >= settings.highLevelThreshold) return settings.highLevelMultiplier;
  return 1;
}

/**
 * Runtime multiplier for server events (anniversary weekend and the like).
 * Shared by reference with the ExperienceCalculated handler.
 */
export class EventMultiplier {
  private value = 1;

  get current(): number {
    return this.value;
  }

  get active(): boolean {
    return this.value !== 1;
  }

  set(multiplier: number): void {
    if (!Number.isFinite(multiplier) || multiplier < 0) {
      log.warn("Ignoring invalid event multiplier", { multiplier });
      return;
    }
    this.value = multiplier;
    log.info("Event experience multiplier set", { multiplier });
  }

  clear(): void {
    this.value = 1;
    log.info("Event experience multiplier cleared");
  }
}

function levelUpMessage(state: ParagonState, newLevel: number): string {
  return `Paragon level ${newLevel} reached. ${state.points} point(s) available.`;
}

/**
 * Register the modifier handlers. Call during startup, before the mediator is
 * sealed. Returns the event multiplier so admin commands can drive it.
 */
export function registerExperienceModifiers(
  mediator: Mediator,
  settings: LevelMultiplierSettings,
  options: ExperienceModifierOptions = {},
): EventMultiplier {
  const eventMultiplier = new EventMultiplier();

  mediator.register("ExperienceCalculated", ({ state, amount }) => {
    const scaled = amount * levelMultiplier(settings, state.level) * eventMultiplier.current;
    return { amount: Math.floor(scaled) };
  });

  mediator.register("LevelChanged", ({ state, newLevel }) => {
    options.notify?.(state.subjectId, levelUpMessage(state, newLevel));
  });

  mediator.register("AfterExperienceGrant", ({ state, sourceKind, amount, levelsGained }) => {
    if (amount <= 0) return;

    const meta = {
      subjectId: state.subjectId,
      sourceKind,
      amount,
      levelsGained,
      level: state.level,
    };
    if (options.auditGrants) {
      log.info("Paragon experience granted", meta);
    } else {
      log.debug("Paragon experience granted", meta);
    }
  });

  const cap = options.maxInvestmentPerStat;
  if (cap !== undefined && Number.isInteger(cap) && cap >= 0) {
    mediator.register("BeforeInvestment", ({ value }) => {
      if (value > cap) return { value: cap };
    });
  }

  return eventMultiplier;
}
