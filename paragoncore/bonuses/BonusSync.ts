// paragoncore/bonuses/BonusSync.ts

import type { StatDef } from "../paragon/ParagonTypes";
import type { BonusGrant, BonusRemoval } from "./BonusApplicator";

export function grantForStat(def: StatDef, value: number): BonusGrant {
  switch (def.kind) {
    case "UnitModifier":
      return {
        kind: "UnitModifier",
        targetCode: def.targetCode,
        applicationCode: def.applicationCode,
        magnitude: value * def.factor,
      };
    case "CombatRating":
      return { kind: "CombatRating", targetCode: def.targetCode, magnitude: value * def.factor };
    case "Aura":
      return { kind: "Aura", targetCode: def.targetCode, stacks: value };
  }
}

export function removalForStat(def: StatDef, value: number): BonusRemoval {
  switch (def.kind) {
    case "UnitModifier":
      return {
        kind: "UnitModifier",
        targetCode: def.targetCode,
        applicationCode: def.applicationCode,
        magnitude: value * def.factor,
      };
    case "CombatRating":
      return { kind: "CombatRating", targetCode: def.targetCode, magnitude: value * def.factor };
    case "Aura":
      // full clear, whatever the stack count
      return { kind: "Aura", targetCode: def.targetCode };
  }
}
