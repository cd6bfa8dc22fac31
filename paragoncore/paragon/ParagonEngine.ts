// paragoncore/paragon/ParagonEngine.ts
//
// Experience intake, cascading level-up, point allocation and bonus sync for
// ParagonState. Everything here is synchronous; storage and transport live
// outside (see sessions/ParagonSessionService).

import type { BonusApplicator } from "../bonuses/BonusApplicator";
import { grantForStat, removalForStat } from "../bonuses/BonusSync";
import type { Mediator } from "../mediator/Mediator";
import { Logger } from "../utils/logger";
import { applyXp, clampLevel, isAtCap } from "./Leveling";
import type { ParagonCatalogue } from "./ParagonCatalogue";
import { ParagonState, type ProgressionRules } from "./ParagonState";
import type {
  BatchRejection,
  ExperienceResult,
  InvestmentBatchResult,
  InvestmentChange,
  InvestmentFailure,
  InvestmentRequest,
  InvestmentResult,
  SourceKind,
  StatDef,
  StatId,
  SubjectRef,
} from "./ParagonTypes";

const log = Logger.scope("ENGINE");

type CheckedValue =
  | { ok: true; def: StatDef; value: number }
  | { ok: false; reason: InvestmentFailure };

function isValidInvestment(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

// Hook handlers can hand back anything numeric; the cascade only takes
// non-negative integers.
function sanitizeAmount(amount: number): number {
  if (!Number.isFinite(amount) || amount <= 0) return 0;
  return Math.floor(amount);
}

export class ParagonEngine {
  private readonly rules: ProgressionRules;

  constructor(
    private readonly catalogue: ParagonCatalogue,
    private readonly mediator: Mediator,
    private readonly bonuses: BonusApplicator,
  ) {
    this.rules = catalogue.settings;
  }

  /** Fresh state with the configured starting level/experience. */
  createState(subject: SubjectRef): ParagonState {
    return new ParagonState(subject, this.rules);
  }

  // ---------------------------------------------------------------------------
  // Experience
  // ---------------------------------------------------------------------------

  /**
   * Award the configured experience for a source and run the level cascade.
   * Fails without touching state when neither the entry nor its kind has a
   * reward configured.
   */
  grantExperience(state: ParagonState, sourceKind: SourceKind, entryId: number): ExperienceResult {
    if (this.catalogue.getExperienceReward(sourceKind, entryId) === undefined) {
      log.debug("No experience reward configured", { subjectId: state.subjectId, sourceKind, entryId });
      return { ok: false, reason: "MissingRewardConfig" };
    }

    const before = this.mediator.fire("BeforeExperienceGrant", { state, sourceKind, entryId });

    const reward = this.catalogue.getExperienceReward(before.sourceKind, before.entryId);
    if (reward === undefined) {
      log.debug("Source rewritten to one without a reward", {
        subjectId: state.subjectId,
        sourceKind: before.sourceKind,
        entryId: before.entryId,
      });
      return { ok: false, reason: "MissingRewardConfig" };
    }

    return this.grantRawExperience(state, before.sourceKind, reward);
  }

  /**
   * Award a fixed amount (admin tools, scripted rewards). Goes through
   * ExperienceCalculated and the cascade like any other grant.
   */
  grantRawExperience(state: ParagonState, sourceKind: SourceKind, amount: number): ExperienceResult {
    const calculated = this.mediator.fire("ExperienceCalculated", {
      state,
      sourceKind,
      amount: sanitizeAmount(amount),
    });
    const finalAmount = sanitizeAmount(calculated.amount);

    const oldLevel = state.level;
    const levelsGained = this.runCascade(state, finalAmount);

    this.mediator.fire("AfterExperienceGrant", { state, sourceKind, amount: finalAmount, levelsGained });

    return { ok: true, amount: finalAmount, oldLevel, newLevel: state.level, levelsGained };
  }

  /** Raise the level directly (clamped to the cap). Returns levels actually gained. */
  grantLevels(state: ParagonState, levels: number): number {
    if (!Number.isInteger(levels) || levels <= 0) return 0;

    const oldLevel = state.level;
    const newLevel = clampLevel(this.rules, oldLevel + levels);
    if (newLevel === oldLevel) return 0;

    let current = state.experience.current;
    state.setProgress(newLevel, current);
    if (isAtCap(this.rules, newLevel)) {
      current = Math.min(current, state.experience.requiredForNext - 1);
      state.setProgress(newLevel, current);
    }

    this.fireLevelChanged(state, oldLevel);
    return newLevel - oldLevel;
  }

  private runCascade(state: ParagonState, amount: number): number {
    const oldLevel = state.level;
    const result = applyXp(this.rules, oldLevel, state.experience.current, amount);

    state.setProgress(result.newLevel, result.newXp);

    log.debug("Experience applied", {
      subjectId: state.subjectId,
      amount,
      level: result.newLevel,
      experience: result.newXp,
      requiredForNext: result.requiredForNext,
      atCap: result.atCap,
    });

    if (result.levelsGained > 0) this.fireLevelChanged(state, oldLevel);
    return result.levelsGained;
  }

  private fireLevelChanged(state: ParagonState, oldLevel: number): void {
    log.info("Paragon level up", {
      subjectId: state.subjectId,
      oldLevel,
      newLevel: state.level,
      points: state.points,
    });
    this.mediator.fire("LevelChanged", { state, oldLevel, newLevel: state.level });
  }

  // ---------------------------------------------------------------------------
  // Allocation
  // ---------------------------------------------------------------------------

  /**
   * Set one stat's investment. Atomic: on failure nothing changes. Active
   * bonuses are lifted around the commit so they never reflect stale values.
   */
  setInvestment(state: ParagonState, statId: StatId, value: number): InvestmentResult {
    const def = this.catalogue.getStatDef(statId);
    if (!def) return { ok: false, reason: "InvalidStat" };

    const checked = this.checkValue(state, def, value);
    if (!checked.ok) return checked;

    const delta = checked.value - state.getInvestment(statId);
    if (delta > state.points) {
      return { ok: false, reason: "InsufficientPoints" };
    }
    if (delta === 0) return { ok: true, change: null };

    const change = this.withBonusesLifted(state, () =>
      this.commitInvestment(state, statId, checked.value),
    );

    return { ok: true, change };
  }

  /**
   * Apply a client submission.
   *
   * Entries are validated in order up to the first one that fails. The point
   * delta of the entries before it is checked against available points as a
   * whole; if it does not fit, nothing is touched. Otherwise bonuses are
   * lifted and the accepted entries are committed, one change per stat at the
   * last value submitted for it. Refunds go in before raises so `points`
   * never drops below zero while StatChanged handlers run. The failing entry
   * (if any) is reported, the rest of the batch is dropped, and bonuses go
   * back on.
   */
  applyInvestmentBatch(
    state: ParagonState,
    requests: readonly InvestmentRequest[],
  ): InvestmentBatchResult {
    const pending = new Map<StatId, number>();
    let rejected: BatchRejection | null = null;

    for (let index = 0; index < requests.length; index++) {
      const request = requests[index];
      const def = this.catalogue.getStatInCategory(request.categoryId, request.statId);
      const checked: CheckedValue = def
        ? this.checkValue(state, def, request.value)
        : { ok: false, reason: "InvalidStat" };

      if (!checked.ok) {
        rejected = { index, request, reason: checked.reason };
        break;
      }

      pending.set(checked.def.id, checked.value);
    }

    let delta = 0;
    for (const [statId, value] of pending) {
      delta += value - state.getInvestment(statId);
    }

    if (delta > state.points) {
      log.warn("Allocation batch exceeds available points", {
        subjectId: state.subjectId,
        requested: delta,
        available: state.points,
      });
      return { applied: [], rejected, budgetRejected: true };
    }

    const refunds: [StatId, number][] = [];
    const raises: [StatId, number][] = [];
    for (const [statId, value] of pending) {
      const current = state.getInvestment(statId);
      if (value < current) refunds.push([statId, value]);
      else if (value > current) raises.push([statId, value]);
    }

    const applied: InvestmentChange[] =
      refunds.length + raises.length === 0
        ? []
        : this.withBonusesLifted(state, () => {
            const changes: InvestmentChange[] = [];
            for (const [statId, value] of [...refunds, ...raises]) {
              const change = this.commitInvestment(state, statId, value);
              if (change) changes.push(change);
            }
            return changes;
          });

    if (rejected) {
      log.info("Allocation batch stopped at a rejected entry", {
        subjectId: state.subjectId,
        index: rejected.index,
        reason: rejected.reason,
        applied: applied.length,
      });
    }

    return { applied, rejected, budgetRejected: false };
  }

  /** Respec: every investment back to zero, all points available again. */
  resetInvestments(state: ParagonState): InvestmentChange[] {
    const current = state.getInvestments();
    if (current.size === 0) return [];

    const changes = this.withBonusesLifted(state, () => {
      const out: InvestmentChange[] = [];
      for (const statId of current.keys()) {
        const change = this.commitInvestment(state, statId, 0);
        if (change) out.push(change);
      }
      return out;
    });

    log.info("Investments reset", { subjectId: state.subjectId, points: state.points });
    return changes;
  }

  private checkValue(state: ParagonState, def: StatDef, requested: number): CheckedValue {
    if (!isValidInvestment(requested)) return { ok: false, reason: "InvalidValue" };

    const { value } = this.mediator.fire("BeforeInvestment", { state, statId: def.id, value: requested });

    if (!isValidInvestment(value)) return { ok: false, reason: "InvalidValue" };
    if (def.limit > 0 && value > def.limit) return { ok: false, reason: "LimitExceeded" };

    return { ok: true, def, value };
  }

  private commitInvestment(state: ParagonState, statId: StatId, value: number): InvestmentChange | null {
    const oldValue = state.getInvestment(statId);
    if (oldValue === value) return null;

    state.setInvestment(statId, value);
    this.mediator.fire("StatChanged", { state, statId, oldValue, newValue: value });

    return { statId, oldValue, newValue: value };
  }

  // ---------------------------------------------------------------------------
  // Bonuses
  // ---------------------------------------------------------------------------

  /**
   * Put every invested stat's bonus on the subject (apply) or take them all
   * off. Calls that would not change anything (remove when nothing is
   * applied, apply over applied bonuses) are ignored, which keeps removal
   * idempotent.
   */
  syncBonuses(state: ParagonState, apply: boolean): void {
    if (state.bonusesApplied === apply) {
      log.debug("Bonus sync skipped; already in requested state", { subjectId: state.subjectId, apply });
      return;
    }

    for (const [statId, value] of state.getInvestments()) {
      const def = this.catalogue.getStatDef(statId);
      if (!def) {
        log.warn("Invested stat missing from catalogue; bonus skipped", {
          subjectId: state.subjectId,
          statId,
        });
        continue;
      }

      try {
        if (apply) {
          this.bonuses.apply(state.subjectId, grantForStat(def, value));
        } else {
          this.bonuses.remove(state.subjectId, removalForStat(def, value));
        }
      } catch (err) {
        log.error("Bonus applicator failed", { subjectId: state.subjectId, statId, apply, err });
      }
    }

    state.markBonusesApplied(apply);
    this.mediator.fire("BonusesSynced", { state, apply });
  }

  // Remove, mutate, re-apply. Bonuses that were not on stay off.
  private withBonusesLifted<T>(state: ParagonState, mutate: () => T): T {
    const wasApplied = state.bonusesApplied;
    if (wasApplied) this.syncBonuses(state, false);
    try {
      return mutate();
    } finally {
      if (wasApplied) this.syncBonuses(state, true);
    }
  }
}
