// paragoncore/storage/ParagonRepository.ts

import type { StoredProgress } from "../paragon/ParagonState";
import type { KeyScope, StatId, SubjectRef } from "../paragon/ParagonTypes";

/**
 * Durable storage for paragon progress.
 *
 * Level/experience rows are keyed per the repository's key scope (character
 * or account); investments are always per character. Saves are upserts, so
 * repeating an identical save is harmless.
 */
export interface ParagonRepository {
  readonly keyScope: KeyScope;

  /** null when the subject has never been saved. */
  loadProgress(subject: SubjectRef): Promise<StoredProgress | null>;
  loadInvestments(subject: SubjectRef): Promise<Map<StatId, number>>;

  saveProgress(subject: SubjectRef, progress: StoredProgress): Promise<void>;
  /** Replaces the subject's investments with exactly `investments`. */
  saveInvestments(subject: SubjectRef, investments: ReadonlyMap<StatId, number>): Promise<void>;
}

/** The id level/experience rows are stored under. */
export function progressKey(scope: KeyScope, subject: SubjectRef): number {
  return scope === "account" ? subject.accountId : subject.characterId;
}
