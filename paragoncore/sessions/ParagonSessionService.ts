// paragoncore/sessions/ParagonSessionService.ts
//
// Owns the loaded ParagonState of every active subject and bridges host
// lifecycle events (login, logout, kills, quests...) to the engine and the
// repository.

import type { ParagonAddonHandler } from "../protocol/ParagonAddonHandler";
import type { ParagonEngine } from "../paragon/ParagonEngine";
import type { ParagonState } from "../paragon/ParagonState";
import type { ExperienceResult, SourceKind, SubjectRef } from "../paragon/ParagonTypes";
import type { ParagonRepository } from "../storage/ParagonRepository";
import { Logger } from "../utils/logger";

const log = Logger.scope("SESSIONS");

interface ActiveSubject {
  subject: SubjectRef;
  state: ParagonState;
}

export class ParagonSessionService {
  private readonly active = new Map<number, ActiveSubject>();
  private readonly pending = new Map<number, Promise<ParagonState>>();
  // grants that arrived while the subject was still loading
  private readonly deferred = new Map<number, Array<[SourceKind, number]>>();

  constructor(
    private readonly engine: ParagonEngine,
    private readonly repo: ParagonRepository,
    private readonly addon?: ParagonAddonHandler,
  ) {}

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  get(characterId: number): ParagonState | undefined {
    return this.active.get(characterId)?.state;
  }

  isActive(characterId: number): boolean {
    return this.active.has(characterId);
  }

  count(): number {
    return this.active.size;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Load (or create) the subject's state, put its bonuses on and push the
   * addon load. A second login for a subject already loading or loaded
   * returns the same state. Grants received during the load are applied
   * before the addon load goes out; a failed load drops them.
   */
  async login(subject: SubjectRef): Promise<ParagonState> {
    const existing = this.active.get(subject.characterId);
    if (existing) return existing.state;

    const inflight = this.pending.get(subject.characterId);
    if (inflight) return inflight;

    const loading = this.load(subject);
    this.pending.set(subject.characterId, loading);
    try {
      const state = await loading;
      this.active.set(subject.characterId, { subject, state });
      this.engine.syncBonuses(state, true);
      this.replayDeferred(subject.characterId, state);
      this.addon?.sendLoad(state);

      log.info("Paragon subject logged in", {
        characterId: subject.characterId,
        level: state.level,
        points: state.points,
      });
      return state;
    } finally {
      this.pending.delete(subject.characterId);
      this.deferred.delete(subject.characterId);
    }
  }

  /** Take the bonuses off, persist, forget. No-op for unknown subjects. */
  async logout(characterId: number): Promise<void> {
    const entry = this.active.get(characterId);
    if (!entry) return;

    this.engine.syncBonuses(entry.state, false);
    this.active.delete(characterId);

    await this.persist(entry);
    log.info("Paragon subject logged out", { characterId });
  }

  /** Persist one active subject. Returns false when it is not loaded. */
  async save(characterId: number): Promise<boolean> {
    const entry = this.active.get(characterId);
    if (!entry) return false;
    await this.persist(entry);
    return true;
  }

  /**
   * Log in every subject in the list (server start or module reload with
   * players online). Failures are logged; the rest still load.
   */
  async loadAll(subjects: readonly SubjectRef[]): Promise<number> {
    const results = await Promise.allSettled(subjects.map((s) => this.login(s)));

    let loaded = 0;
    results.forEach((result, i) => {
      if (result.status === "fulfilled") {
        loaded++;
      } else {
        log.error("Failed to load paragon subject", {
          characterId: subjects[i].characterId,
          err: result.reason,
        });
      }
    });
    return loaded;
  }

  /** Persist every active subject. Returns how many saves succeeded. */
  async saveAll(): Promise<number> {
    const entries = [...this.active.values()];
    const results = await Promise.allSettled(entries.map((e) => this.persist(e)));

    let saved = 0;
    results.forEach((result, i) => {
      if (result.status === "fulfilled") {
        saved++;
      } else {
        log.error("Failed to save paragon subject", {
          characterId: entries[i].subject.characterId,
          err: result.reason,
        });
      }
    });

    log.info("Paragon states saved", { saved, total: entries.length });
    return saved;
  }

  // ---------------------------------------------------------------------------
  // Host triggers
  // ---------------------------------------------------------------------------

  onCreatureKill(characterId: number, creatureEntry: number): ExperienceResult | null {
    return this.grant(characterId, "Creature", creatureEntry);
  }

  onQuestComplete(characterId: number, questId: number): ExperienceResult | null {
    return this.grant(characterId, "Quest", questId);
  }

  onAchievementComplete(characterId: number, achievementId: number): ExperienceResult | null {
    return this.grant(characterId, "Achievement", achievementId);
  }

  onSkillUpdate(characterId: number, skillId: number): ExperienceResult | null {
    return this.grant(characterId, "Skill", skillId);
  }

  /** Route a raw addon request for an active subject. */
  onAddonMessage(characterId: number, raw: unknown): boolean {
    const entry = this.active.get(characterId);
    if (!entry || !this.addon) return false;
    this.addon.handle(entry.state, raw);
    return true;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * Returns null when the subject is not active. A subject whose login is
   * still loading gets the grant queued instead; it is applied on login.
   */
  private grant(characterId: number, kind: SourceKind, entryId: number): ExperienceResult | null {
    const entry = this.active.get(characterId);
    if (!entry) {
      if (this.pending.has(characterId)) {
        const queue = this.deferred.get(characterId) ?? [];
        queue.push([kind, entryId]);
        this.deferred.set(characterId, queue);
        log.debug("Paragon grant deferred until login completes", { characterId, kind, entryId });
      }
      return null;
    }

    const oldLevel = entry.state.level;
    const result = this.engine.grantExperience(entry.state, kind, entryId);

    // refresh the addon only when something the client shows has moved
    if (result.ok && (result.amount > 0 || entry.state.level !== oldLevel)) {
      this.addon?.sendLoad(entry.state);
    }
    return result;
  }

  private replayDeferred(characterId: number, state: ParagonState): void {
    const queue = this.deferred.get(characterId);
    if (!queue) return;
    this.deferred.delete(characterId);

    for (const [kind, entryId] of queue) {
      const result = this.engine.grantExperience(state, kind, entryId);
      if (!result.ok) {
        log.warn("Deferred paragon grant failed", { characterId, kind, entryId, reason: result.reason });
      }
    }
  }

  private async load(subject: SubjectRef): Promise<ParagonState> {
    const state = this.engine.createState(subject);
    const [progress, investments] = await Promise.all([
      this.repo.loadProgress(subject),
      this.repo.loadInvestments(subject),
    ]);
    state.hydrate(progress, investments);
    return state;
  }

  private async persist(entry: ActiveSubject): Promise<void> {
    await this.repo.saveProgress(entry.subject, entry.state.toStoredProgress());
    await this.repo.saveInvestments(entry.subject, entry.state.getInvestments());
  }
}
