// paragoncore/test/behavior_paragonSessions.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import type { StoredProgress } from "../paragon/ParagonState";
import type { SubjectRef } from "../paragon/ParagonTypes";
import { ADDON_PREFIX, type AddonServerMessage } from "../protocol/AddonProtocol";
import { ParagonAddonHandler } from "../protocol/ParagonAddonHandler";
import { ParagonSessionService } from "../sessions/ParagonSessionService";
import { InMemoryParagonRepository } from "../storage/InMemoryParagonRepository";
import { CORE, makeEngineKit, STR, SUBJECT } from "./paragonTestKit";

class FlakyRepository extends InMemoryParagonRepository {
  constructor(private readonly failFor: number) {
    super("character");
  }

  async loadProgress(subject: SubjectRef): Promise<StoredProgress | null> {
    if (subject.characterId === this.failFor) throw new Error("db down");
    return super.loadProgress(subject);
  }
}

class GatedRepository extends InMemoryParagonRepository {
  private opened: () => void = () => {};
  private readonly gate = new Promise<void>((resolve) => {
    this.opened = resolve;
  });

  open(): void {
    this.opened();
  }

  async loadProgress(subject: SubjectRef): Promise<StoredProgress | null> {
    await this.gate;
    return super.loadProgress(subject);
  }
}

function setup(repo = new InMemoryParagonRepository()) {
  const kit = makeEngineKit();
  const sent: Array<[number, AddonServerMessage["op"]]> = [];
  const addon = new ParagonAddonHandler(kit.catalogue, kit.engine, {
    send: (subjectId, message) => sent.push([subjectId, message.op]),
  });
  const sessions = new ParagonSessionService(kit.engine, repo, addon);
  return { ...kit, repo, sent, sessions };
}

test("[behavior] first login creates default state, applies bonuses, pushes load", async () => {
  const { sent, sessions } = setup();

  const state = await sessions.login(SUBJECT);

  assert.equal(state.level, 1);
  assert.equal(state.points, 1);
  assert.equal(state.bonusesApplied, true);
  assert.equal(sessions.get(101), state);
  assert.deepEqual(sent, [[101, "load"]]);
});

test("[behavior] login restores stored progress and re-applies invested bonuses", async () => {
  const repo = new InMemoryParagonRepository();
  await repo.saveProgress(SUBJECT, { level: 5, experience: 30 });
  await repo.saveInvestments(SUBJECT, new Map([[STR, 2]]));
  const { bonuses, sessions } = setup(repo);

  const state = await sessions.login(SUBJECT);

  assert.equal(state.level, 5);
  assert.equal(state.experience.current, 30);
  assert.equal(state.points, 3);
  assert.deepEqual([...bonuses.getActive(101).unitModifiers], [["4:2", 4]]);
});

test("[behavior] concurrent logins for one subject share one state", async () => {
  const { sessions } = setup();

  const [a, b] = await Promise.all([sessions.login(SUBJECT), sessions.login(SUBJECT)]);

  assert.equal(a, b);
  assert.equal(sessions.count(), 1);
});

test("[behavior] logout removes bonuses, saves and forgets the subject", async () => {
  const { bonuses, engine, repo, sessions } = setup();
  const state = await sessions.login(SUBJECT);
  engine.grantLevels(state, 2);
  engine.setInvestment(state, STR, 2);

  await sessions.logout(101);

  assert.equal(sessions.isActive(101), false);
  assert.equal(state.bonusesApplied, false);
  assert.equal(bonuses.getActive(101).unitModifiers.size, 0);
  assert.deepEqual(await repo.loadProgress(SUBJECT), { level: 3, experience: 0 });
  assert.deepEqual([...(await repo.loadInvestments(SUBJECT))], [[STR, 2]]);

  await sessions.logout(101);
  assert.equal(await sessions.save(101), false);
});

test("[behavior] host triggers grant experience only to active subjects", async () => {
  const { sent, sessions } = setup();

  assert.equal(sessions.onCreatureKill(101, 500), null);

  await sessions.login(SUBJECT);
  const kill = sessions.onCreatureKill(101, 500);
  assert.deepEqual(kill, { ok: true, amount: 75, oldLevel: 1, newLevel: 2, levelsGained: 1 });

  assert.deepEqual(sessions.onSkillUpdate(101, 3), { ok: false, reason: "MissingRewardConfig" });
  assert.equal(sessions.onQuestComplete(101, 8)?.ok, true);
  assert.equal(sessions.onAchievementComplete(101, 42)?.ok, true);

  // login load + three successful grants
  assert.equal(sent.length, 4);
});

test("[behavior] addon messages route to the active subject", async () => {
  const { sessions } = setup();

  assert.equal(sessions.onAddonMessage(101, { prefix: ADDON_PREFIX, op: "load" }), false);

  const state = await sessions.login(SUBJECT);
  sessions.onCreatureKill(101, 500);
  const routed = sessions.onAddonMessage(101, {
    prefix: ADDON_PREFIX,
    op: "update",
    stats: [{ categoryId: CORE, statId: STR, value: 2 }],
  });

  assert.equal(routed, true);
  assert.equal(state.getInvestment(STR), 2);
});

test("[behavior] saveAll persists every active subject", async () => {
  const { repo, sessions } = setup();
  const other = { characterId: 202, accountId: 10 };
  await sessions.loadAll([SUBJECT, other]);
  sessions.onQuestComplete(202, 1);

  assert.equal(await sessions.saveAll(), 2);
  assert.deepEqual(await repo.loadProgress(SUBJECT), { level: 1, experience: 0 });
  assert.deepEqual(await repo.loadProgress(other), { level: 2, experience: 50 });
});

test("[behavior] loadAll keeps going when one subject fails to load", async () => {
  const { sessions } = setup(new FlakyRepository(303));

  const loaded = await sessions.loadAll([SUBJECT, { characterId: 303, accountId: 3 }]);

  assert.equal(loaded, 1);
  assert.equal(sessions.isActive(101), true);
  assert.equal(sessions.isActive(303), false);
});

test("[behavior] grants during a pending login are applied once it completes", async () => {
  const repo = new GatedRepository();
  const { sent, sessions } = setup(repo);

  const login = sessions.login(SUBJECT);
  assert.equal(sessions.onQuestComplete(101, 1), null);
  assert.equal(sessions.onCreatureKill(202, 500), null);
  repo.open();
  const state = await login;

  assert.equal(state.level, 2);
  assert.equal(state.experience.current, 50);
  assert.equal(state.points, 2);
  assert.deepEqual(sent, [[101, "load"]]);
});
