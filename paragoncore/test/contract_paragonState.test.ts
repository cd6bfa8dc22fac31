// paragoncore/test/contract_paragonState.test.ts
//
// Contract: available points always equal level × pointsPerLevel − Σ investments,
// whatever path changed the level or the investments.

import test from "node:test";
import assert from "node:assert/strict";

import { ParagonState, type ProgressionRules } from "../paragon/ParagonState";
import { SUBJECT } from "./paragonTestKit";

const rules: ProgressionRules = {
  baseMaxExperience: 50,
  levelCap: 0,
  pointsPerLevel: 2,
  startingLevel: 3,
  startingExperience: 0,
};

test("[contract] new state starts at the configured level with all points free", () => {
  const state = new ParagonState(SUBJECT, rules);

  assert.equal(state.subjectId, 101);
  assert.equal(state.level, 3);
  assert.equal(state.experience.current, 0);
  assert.equal(state.experience.requiredForNext, 150);
  assert.equal(state.points, 6);
  assert.equal(state.bonusesApplied, false);
});

test("[contract] starting experience above the first threshold is held below it", () => {
  const state = new ParagonState(SUBJECT, { ...rules, startingLevel: 1, startingExperience: 1000 });
  assert.equal(state.experience.current, 49);
});

test("[contract] points follow investments and level", () => {
  const state = new ParagonState(SUBJECT, rules);

  state.setInvestment(1, 4);
  assert.equal(state.points, 2);
  assert.equal(state.getUsedPoints(), 4);

  state.setProgress(5, 0);
  assert.equal(state.points, 6);

  state.setInvestment(1, 0);
  assert.equal(state.getInvestment(1), 0);
  assert.equal(state.getInvestedStatCount(), 0);
  assert.equal(state.points, 10);
});

test("[contract] hydrate restores level, experience and investments", () => {
  const state = new ParagonState(SUBJECT, rules);
  state.hydrate({ level: 5, experience: 70 }, new Map([[1, 3], [2, 4]]));

  assert.equal(state.level, 5);
  assert.equal(state.experience.current, 70);
  assert.equal(state.experience.requiredForNext, 250);
  assert.equal(state.getUsedPoints(), 7);
  assert.equal(state.points, 3);
});

test("[contract] hydrate without stored progress keeps the starting level", () => {
  const state = new ParagonState(SUBJECT, rules);
  state.hydrate(null, new Map([[1, 2]]));

  assert.equal(state.level, 3);
  assert.equal(state.points, 4);
});

test("[contract] hydrate clamps stored experience below the threshold", () => {
  const state = new ParagonState(SUBJECT, rules);
  state.hydrate({ level: 2, experience: 500 }, new Map());
  assert.equal(state.experience.current, 99);
});

test("[contract] hydrate resets investments that exceed the level budget", () => {
  const state = new ParagonState(SUBJECT, rules);
  state.hydrate({ level: 2, experience: 0 }, new Map([[1, 3], [2, 4]]));

  assert.equal(state.getInvestedStatCount(), 0);
  assert.equal(state.points, 4);
});

test("[contract] hydrate ignores zero, negative and fractional investments", () => {
  const state = new ParagonState(SUBJECT, rules);
  state.hydrate(null, new Map([[1, 0], [2, -1], [3, 1.5], [4, 2]]));

  assert.deepEqual([...state.getInvestments()], [[4, 2]]);
  assert.equal(state.points, 4);
});

test("[contract] getInvestments returns a copy", () => {
  const state = new ParagonState(SUBJECT, rules);
  state.setInvestment(1, 1);

  state.getInvestments().set(1, 99);
  assert.equal(state.getInvestment(1), 1);
});

test("[contract] snapshot and progress summarise the state", () => {
  const state = new ParagonState(SUBJECT, rules);
  state.setProgress(3, 75);
  state.setInvestment(2, 1);

  assert.equal(state.getExperienceProgress(), 50);
  assert.deepEqual(state.toStoredProgress(), { level: 3, experience: 75 });
  assert.deepEqual(state.snapshot(), {
    subjectId: 101,
    level: 3,
    experience: 75,
    experienceMax: 150,
    availablePoints: 5,
    usedPoints: 1,
    investedStats: 1,
    bonusesApplied: false,
  });
});
