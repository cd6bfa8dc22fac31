// paragoncore/test/behavior_paragonExperienceModifiers.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { DEFAULT_SETTINGS } from "../config/ParagonSettings";
import { levelMultiplier, registerExperienceModifiers } from "../modules/ExperienceModifiers";
import { makeEngineKit, STA, SUBJECT } from "./paragonTestKit";

test("[behavior] level multiplier bands", () => {
  assert.equal(levelMultiplier(DEFAULT_SETTINGS, 1), 1.5);
  assert.equal(levelMultiplier(DEFAULT_SETTINGS, 5), 1.5);
  assert.equal(levelMultiplier(DEFAULT_SETTINGS, 6), 1);
  assert.equal(levelMultiplier(DEFAULT_SETTINGS, 99), 1);
  assert.equal(levelMultiplier(DEFAULT_SETTINGS, 100), 0.8);
});

test("[behavior] low levels earn boosted experience", () => {
  const { catalogue, engine, mediator } = makeEngineKit();
  registerExperienceModifiers(mediator, catalogue.settings);

  const state = engine.createState(SUBJECT);
  const result = engine.grantExperience(state, "Quest", 1);

  assert.deepEqual(result, { ok: true, amount: 150, oldLevel: 1, newLevel: 3, levelsGained: 2 });
  assert.equal(state.experience.current, 0);
});

test("[behavior] event multiplier stacks on the level multiplier", () => {
  const { catalogue, engine, mediator } = makeEngineKit();
  const event = registerExperienceModifiers(mediator, catalogue.settings);

  event.set(2);
  event.set(-1);
  assert.equal(event.current, 2);
  assert.equal(event.active, true);

  const state = engine.createState(SUBJECT);
  const result = engine.grantExperience(state, "Quest", 1);
  assert.equal(result.ok && result.amount, 300);

  event.clear();
  assert.equal(event.active, false);
});

test("[behavior] level-ups notify the subject once with the new totals", () => {
  const { catalogue, engine, mediator } = makeEngineKit();
  const notices: Array<[number, string]> = [];
  registerExperienceModifiers(mediator, catalogue.settings, {
    notify: (subjectId, text) => notices.push([subjectId, text]),
  });

  const state = engine.createState(SUBJECT);
  engine.grantExperience(state, "Quest", 1);

  assert.deepEqual(notices, [[101, "Paragon level 3 reached. 3 point(s) available."]]);
});

test("[behavior] per-stat cap clamps allocation requests", () => {
  const { catalogue, engine, mediator } = makeEngineKit();
  registerExperienceModifiers(mediator, catalogue.settings, { maxInvestmentPerStat: 2 });

  const state = engine.createState(SUBJECT);
  engine.grantLevels(state, 4);

  const result = engine.setInvestment(state, STA, 5);
  assert.deepEqual(result, { ok: true, change: { statId: STA, oldValue: 0, newValue: 2 } });
  assert.equal(state.points, 3);
});
