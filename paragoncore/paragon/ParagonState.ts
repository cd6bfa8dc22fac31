// paragoncore/paragon/ParagonState.ts

import { Logger } from "../utils/logger";
import { clampLevel, xpForNextLevel, type LevelCurve } from "./Leveling";
import type { ParagonSettings, StatId, SubjectRef } from "./ParagonTypes";

const log = Logger.scope("PARAGON");

export type ProgressionRules = LevelCurve &
  Pick<ParagonSettings, "pointsPerLevel" | "startingLevel" | "startingExperience">;

export interface ParagonExperience {
  current: number;
  requiredForNext: number;
}

/** Persisted shape of level/experience. */
export interface StoredProgress {
  level: number;
  experience: number;
}

export interface ParagonStateSummary {
  subjectId: number;
  level: number;
  experience: number;
  experienceMax: number;
  availablePoints: number;
  usedPoints: number;
  investedStats: number;
  bonusesApplied: boolean;
}

/**
 * Paragon progression for one subject.
 *
 * Available points are never adjusted incrementally: every mutation that
 * touches level or investments recomputes them as
 * level × pointsPerLevel − Σ investments.
 *
 * The mutators here keep the entity consistent but do not fire hooks or touch
 * bonuses; ParagonEngine is the only caller that should use them.
 */
export class ParagonState {
  readonly subject: Readonly<SubjectRef>;

  private _level: number;
  private readonly _experience: ParagonExperience;
  private _points = 0;
  private readonly _investments = new Map<StatId, number>();
  private _bonusesApplied = false;

  constructor(subject: SubjectRef, private readonly rules: ProgressionRules) {
    this.subject = Object.freeze({ ...subject });
    this._level = clampLevel(rules, rules.startingLevel);
    const requiredForNext = xpForNextLevel(rules, this._level);
    this._experience = {
      current: Math.min(rules.startingExperience, Math.max(0, requiredForNext - 1)),
      requiredForNext,
    };
    this.recalculatePoints();
  }

  get subjectId(): number {
    return this.subject.characterId;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  get level(): number {
    return this._level;
  }

  get experience(): Readonly<ParagonExperience> {
    return this._experience;
  }

  get points(): number {
    return this._points;
  }

  get bonusesApplied(): boolean {
    return this._bonusesApplied;
  }

  getInvestment(statId: StatId): number {
    return this._investments.get(statId) ?? 0;
  }

  /** Copy of the non-zero investments. */
  getInvestments(): Map<StatId, number> {
    return new Map(this._investments);
  }

  getUsedPoints(): number {
    let used = 0;
    for (const value of this._investments.values()) used += value;
    return used;
  }

  getTotalPointsForLevel(): number {
    return this._level * this.rules.pointsPerLevel;
  }

  hasAvailablePoints(): boolean {
    return this._points > 0;
  }

  getInvestedStatCount(): number {
    return this._investments.size;
  }

  /** Progress toward the next level, 0–100. */
  getExperienceProgress(): number {
    if (this._experience.requiredForNext <= 0) return 0;
    return (this._experience.current / this._experience.requiredForNext) * 100;
  }

  toStoredProgress(): StoredProgress {
    return { level: this._level, experience: this._experience.current };
  }

  snapshot(): ParagonStateSummary {
    return {
      subjectId: this.subjectId,
      level: this._level,
      experience: this._experience.current,
      experienceMax: this._experience.requiredForNext,
      availablePoints: this._points,
      usedPoints: this.getUsedPoints(),
      investedStats: this._investments.size,
      bonusesApplied: this._bonusesApplied,
    };
  }

  // ---------------------------------------------------------------------------
  // Hydration
  // ---------------------------------------------------------------------------

  /**
   * Overwrite level/experience/investments with persisted values.
   *
   * Stored investments that no longer fit the level budget (points per level
   * was lowered) are dropped so the point invariant holds; the subject gets
   * all points back to spend again.
   */
  hydrate(progress: StoredProgress | null, investments: ReadonlyMap<StatId, number>): void {
    if (progress) {
      this._level = clampLevel(this.rules, progress.level);
      this._experience.requiredForNext = xpForNextLevel(this.rules, this._level);
      this._experience.current = Math.min(
        Math.max(0, Math.floor(progress.experience)),
        Math.max(0, this._experience.requiredForNext - 1),
      );
    }

    this._investments.clear();
    for (const [statId, value] of investments) {
      if (Number.isInteger(value) && value > 0) this._investments.set(statId, value);
    }

    if (this.getUsedPoints() > this.getTotalPointsForLevel()) {
      log.warn("Stored investments exceed level budget; resetting", {
        subjectId: this.subjectId,
        level: this._level,
        used: this.getUsedPoints(),
        budget: this.getTotalPointsForLevel(),
      });
      this._investments.clear();
    }

    this.recalculatePoints();
  }

  // ---------------------------------------------------------------------------
  // Engine-side mutators
  // ---------------------------------------------------------------------------

  setProgress(level: number, currentExperience: number): void {
    this._level = clampLevel(this.rules, level);
    this._experience.requiredForNext = xpForNextLevel(this.rules, this._level);
    this._experience.current = Math.max(0, Math.floor(currentExperience));
    this.recalculatePoints();
  }

  setInvestment(statId: StatId, value: number): void {
    if (value > 0) {
      this._investments.set(statId, value);
    } else {
      this._investments.delete(statId);
    }
    this.recalculatePoints();
  }

  clearInvestments(): void {
    this._investments.clear();
    this.recalculatePoints();
  }

  markBonusesApplied(applied: boolean): void {
    this._bonusesApplied = applied;
  }

  private recalculatePoints(): void {
    this._points = this.getTotalPointsForLevel() - this.getUsedPoints();
  }
}
