// paragoncore/mediator/ParagonHooks.ts
//
// Extension points fired by ParagonEngine, and the argument record each one
// threads through its handlers. A handler may return a partial record; the
// fields it returns replace the threaded values for the next handler and for
// the engine. Fields marked readonly are context only.

import type { ParagonState } from "../paragon/ParagonState";
import type { SourceKind, StatId } from "../paragon/ParagonTypes";

export interface ParagonHookArgs {
  /** Before the reward is resolved into an amount; may retarget the source. */
  BeforeExperienceGrant: {
    readonly state: ParagonState;
    sourceKind: SourceKind;
    entryId: number;
  };

  /** Reward resolved; handlers rescale `amount` (0 absorbs the grant). */
  ExperienceCalculated: {
    readonly state: ParagonState;
    readonly sourceKind: SourceKind;
    amount: number;
  };

  /** After the cascade ran. Observers only. */
  AfterExperienceGrant: {
    readonly state: ParagonState;
    readonly sourceKind: SourceKind;
    readonly amount: number;
    readonly levelsGained: number;
  };

  /** Once per operation that raised the level, never per intermediate level. */
  LevelChanged: {
    readonly state: ParagonState;
    readonly oldLevel: number;
    readonly newLevel: number;
  };

  /** Before a requested investment is validated; may rewrite `value`. */
  BeforeInvestment: {
    readonly state: ParagonState;
    readonly statId: StatId;
    value: number;
  };

  /** After one stat's investment was committed. */
  StatChanged: {
    readonly state: ParagonState;
    readonly statId: StatId;
    readonly oldValue: number;
    readonly newValue: number;
  };

  /** After bonuses were applied (apply = true) or removed. */
  BonusesSynced: {
    readonly state: ParagonState;
    readonly apply: boolean;
  };
}

export type ParagonHookName = keyof ParagonHookArgs;

export const PARAGON_HOOKS: readonly ParagonHookName[] = [
  "BeforeExperienceGrant",
  "ExperienceCalculated",
  "AfterExperienceGrant",
  "LevelChanged",
  "BeforeInvestment",
  "StatChanged",
  "BonusesSynced",
];

/** What a handler may hand back per hook. Observer hooks take nothing back. */
export interface ParagonHookReplacements {
  BeforeExperienceGrant: { sourceKind?: SourceKind; entryId?: number };
  ExperienceCalculated: { amount?: number };
  AfterExperienceGrant: Record<never, never>;
  LevelChanged: Record<never, never>;
  BeforeInvestment: { value?: number };
  StatChanged: Record<never, never>;
  BonusesSynced: Record<never, never>;
}

export type HookHandler<K extends ParagonHookName> = (
  args: Readonly<ParagonHookArgs[K]>,
) => ParagonHookReplacements[K] | void;
