// paragoncore/storage/InMemoryParagonRepository.ts

import type { StoredProgress } from "../paragon/ParagonState";
import type { KeyScope, StatId, SubjectRef } from "../paragon/ParagonTypes";
import { progressKey, type ParagonRepository } from "./ParagonRepository";

/** Process-local storage for tests and the dev server without a database. */
export class InMemoryParagonRepository implements ParagonRepository {
  private readonly progress = new Map<number, StoredProgress>();
  private readonly investments = new Map<number, Map<StatId, number>>();

  constructor(readonly keyScope: KeyScope = "character") {}

  async loadProgress(subject: SubjectRef): Promise<StoredProgress | null> {
    const row = this.progress.get(progressKey(this.keyScope, subject));
    return row ? { ...row } : null;
  }

  async loadInvestments(subject: SubjectRef): Promise<Map<StatId, number>> {
    return new Map(this.investments.get(subject.characterId) ?? []);
  }

  async saveProgress(subject: SubjectRef, progress: StoredProgress): Promise<void> {
    this.progress.set(progressKey(this.keyScope, subject), { ...progress });
  }

  async saveInvestments(subject: SubjectRef, investments: ReadonlyMap<StatId, number>): Promise<void> {
    const kept = new Map<StatId, number>();
    for (const [statId, value] of investments) {
      if (value > 0) kept.set(statId, value);
    }
    this.investments.set(subject.characterId, kept);
  }
}
