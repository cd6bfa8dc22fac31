// paragoncore/bonuses/InMemoryBonusApplicator.ts

import { Logger } from "../utils/logger";
import type { BonusApplicator, BonusGrant, BonusRemoval } from "./BonusApplicator";

const log = Logger.scope("BONUS");

export interface ActiveBonuses {
  // "<targetCode>:<applicationCode>" -> summed magnitude
  unitModifiers: Map<string, number>;
  // targetCode -> summed rating
  combatRatings: Map<number, number>;
  // aura id -> stack count
  auras: Map<number, number>;
}

function emptyBonuses(): ActiveBonuses {
  return { unitModifiers: new Map(), combatRatings: new Map(), auras: new Map() };
}

function addTo<K>(map: Map<K, number>, key: K, delta: number): void {
  const next = (map.get(key) ?? 0) + delta;
  if (next === 0) {
    map.delete(key);
  } else {
    map.set(key, next);
  }
}

/**
 * Applicator that keeps modifiers in memory. Stands in for the game host in
 * the dev server and in tests, and mirrors the host's arithmetic: modifiers
 * add and subtract, aura grants stack, aura removal clears.
 */
export class InMemoryBonusApplicator implements BonusApplicator {
  private readonly bySubject = new Map<number, ActiveBonuses>();

  apply(subjectId: number, bonus: BonusGrant): void {
    const active = this.ensure(subjectId);

    switch (bonus.kind) {
      case "UnitModifier":
        addTo(active.unitModifiers, `${bonus.targetCode}:${bonus.applicationCode}`, bonus.magnitude);
        break;
      case "CombatRating":
        addTo(active.combatRatings, bonus.targetCode, bonus.magnitude);
        break;
      case "Aura":
        for (let i = 0; i < bonus.stacks; i++) addTo(active.auras, bonus.targetCode, 1);
        break;
    }

    log.debug("Bonus applied", { subjectId, ...bonus });
  }

  remove(subjectId: number, bonus: BonusRemoval): void {
    const active = this.ensure(subjectId);

    switch (bonus.kind) {
      case "UnitModifier":
        addTo(active.unitModifiers, `${bonus.targetCode}:${bonus.applicationCode}`, -bonus.magnitude);
        break;
      case "CombatRating":
        addTo(active.combatRatings, bonus.targetCode, -bonus.magnitude);
        break;
      case "Aura":
        active.auras.delete(bonus.targetCode);
        break;
    }

    log.debug("Bonus removed", { subjectId, ...bonus });
  }

  /** Copy of what is currently on the subject. */
  getActive(subjectId: number): ActiveBonuses {
    const active = this.bySubject.get(subjectId) ?? emptyBonuses();
    return {
      unitModifiers: new Map(active.unitModifiers),
      combatRatings: new Map(active.combatRatings),
      auras: new Map(active.auras),
    };
  }

  private ensure(subjectId: number): ActiveBonuses {
    let active = this.bySubject.get(subjectId);
    if (!active) {
      active = emptyBonuses();
      this.bySubject.set(subjectId, active);
    }
    return active;
  }
}
