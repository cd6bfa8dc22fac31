// paragoncore/paragon/ParagonTypes.ts

// How an invested stat turns into a gameplay modifier on the subject.
export type StatKind = "Aura" | "CombatRating" | "UnitModifier";

// Activities that award paragon experience.
export const SOURCE_KINDS = ["Creature", "Achievement", "Skill", "Quest"] as const;
export type SourceKind = (typeof SOURCE_KINDS)[number];

export type StatId = number;
export type CategoryId = number;

export interface StatDef {
  id: StatId;
  categoryId: CategoryId;
  kind: StatKind;

  /**
   * Host-side identifier of the thing being modified: a unit-mod index,
   * a combat-rating index, or an aura spell id.
   */
  targetCode: number;
  icon: string;

  // Effective magnitude = invested points × factor.
  factor: number;

  // Point cap for this stat. 0 = unlimited.
  limit: number;

  // Opaque to the engine; forwarded to the host verbatim.
  applicationCode: number;
}

export interface Category {
  id: CategoryId;
  name: string;
  stats: ReadonlyMap<StatId, StatDef>;
}

export interface ExperienceReward {
  sourceKind: SourceKind;
  // 0 = default for the source kind
  entryId: number;
  amount: number;
}

/** Storage key strategy for level/experience rows. */
export type KeyScope = "character" | "account";

export interface ParagonSettings {
  pointsPerLevel: number;
  baseMaxExperience: number;
  levelCap: number;
  startingLevel: number;
  startingExperience: number;
  keyScope: KeyScope;

  lowLevelThreshold: number;
  highLevelThreshold: number;
  lowLevelMultiplier: number;
  highLevelMultiplier: number;
}

/**
 * Who a progression state belongs to. The character id is the state's
 * subject id; the account id is only used when levels are account-wide.
 */
export interface SubjectRef {
  characterId: number;
  accountId: number;
}

// -----------------------------
// Allocation results
// -----------------------------

export type InvestmentFailure =
  | "InvalidStat"
  | "InvalidValue"
  | "LimitExceeded"
  | "InsufficientPoints";

export interface InvestmentChange {
  statId: StatId;
  oldValue: number;
  newValue: number;
}

export type InvestmentResult =
  | { ok: true; change: InvestmentChange | null }
  | { ok: false; reason: InvestmentFailure };

/** One entry of a client allocation submission. */
export interface InvestmentRequest {
  categoryId: CategoryId;
  statId: StatId;
  value: number;
}

export interface BatchRejection {
  index: number;
  // absent when the entry could not be read as a request at all
  request?: InvestmentRequest;
  reason: InvestmentFailure;
}

export interface InvestmentBatchResult {
  applied: InvestmentChange[];
  rejected: BatchRejection | null;
  // true when the batch failed its point-budget check and nothing was touched
  budgetRejected: boolean;
}

// -----------------------------
// Experience results
// -----------------------------

export type ExperienceResult =
  | {
      ok: true;
      amount: number;
      oldLevel: number;
      newLevel: number;
      levelsGained: number;
    }
  | { ok: false; reason: "MissingRewardConfig" };
