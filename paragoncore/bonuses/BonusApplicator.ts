// paragoncore/bonuses/BonusApplicator.ts

/**
 * A concrete modifier the host puts on (or takes off) a subject.
 *
 * - UnitModifier / CombatRating carry the magnitude (points × factor); the
 *   host adds it on apply and subtracts the same amount on remove.
 * - Aura on apply carries a stack count: the host grants the aura that many
 *   times. Aura removal clears the aura entirely.
 */
export type BonusGrant =
  | {
      kind: "UnitModifier";
      targetCode: number;
      applicationCode: number;
      magnitude: number;
    }
  | {
      kind: "CombatRating";
      targetCode: number;
      magnitude: number;
    }
  | {
      kind: "Aura";
      targetCode: number;
      stacks: number;
    };

export type BonusRemoval =
  | {
      kind: "UnitModifier";
      targetCode: number;
      applicationCode: number;
      magnitude: number;
    }
  | {
      kind: "CombatRating";
      targetCode: number;
      magnitude: number;
    }
  | {
      kind: "Aura";
      targetCode: number;
    };

/** Host capability: put gameplay modifiers on a subject. */
export interface BonusApplicator {
  apply(subjectId: number, bonus: BonusGrant): void;
  remove(subjectId: number, bonus: BonusRemoval): void;
}
