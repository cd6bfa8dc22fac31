// paragoncore/test/contract_paragonInvestment.test.ts
//
// Contract: a single-stat change either commits whole or leaves the state
// exactly as it was.

import test from "node:test";
import assert from "node:assert/strict";

import { makeEngineKit, STA, STR, SUBJECT } from "./paragonTestKit";

function levelSeven() {
  const kit = makeEngineKit();
  const state = kit.engine.createState(SUBJECT);
  kit.engine.grantLevels(state, 6);
  return { ...kit, state };
}

test("[contract] investing spends points and reports the change", () => {
  const { engine, state } = levelSeven();

  const result = engine.setInvestment(state, STR, 3);

  assert.deepEqual(result, { ok: true, change: { statId: STR, oldValue: 0, newValue: 3 } });
  assert.equal(state.getInvestment(STR), 3);
  assert.equal(state.points, 4);
});

test("[contract] values above the stat limit are rejected", () => {
  const { engine, state } = levelSeven();

  assert.deepEqual(engine.setInvestment(state, STR, 11), { ok: false, reason: "LimitExceeded" });
  assert.equal(state.getInvestment(STR), 0);
  assert.equal(state.points, 7);
});

test("[contract] a delta larger than available points is rejected", () => {
  const { engine, state } = levelSeven();
  engine.setInvestment(state, STA, 2);
  assert.equal(state.points, 5);

  assert.deepEqual(engine.setInvestment(state, STA, 10), { ok: false, reason: "InsufficientPoints" });
  assert.equal(state.getInvestment(STA), 2);
  assert.equal(state.points, 5);
});

test("[contract] unknown stats and malformed values are rejected", () => {
  const { engine, state } = levelSeven();

  assert.deepEqual(engine.setInvestment(state, 99, 1), { ok: false, reason: "InvalidStat" });
  assert.deepEqual(engine.setInvestment(state, STR, -1), { ok: false, reason: "InvalidValue" });
  assert.deepEqual(engine.setInvestment(state, STR, 1.5), { ok: false, reason: "InvalidValue" });
  assert.equal(state.points, 7);
});

test("[contract] an unlimited stat takes every available point", () => {
  const { engine, state } = levelSeven();

  assert.equal(engine.setInvestment(state, STA, 7).ok, true);
  assert.equal(state.points, 0);
  assert.equal(state.hasAvailablePoints(), false);
});

test("[contract] lowering a stat refunds points; setting the same value is a no-op", () => {
  const { engine, state } = levelSeven();
  engine.setInvestment(state, STA, 2);

  assert.deepEqual(engine.setInvestment(state, STA, 2), { ok: true, change: null });
  assert.deepEqual(engine.setInvestment(state, STA, 0), {
    ok: true,
    change: { statId: STA, oldValue: 2, newValue: 0 },
  });
  assert.equal(state.points, 7);
  assert.equal(state.getInvestedStatCount(), 0);
});

test("[contract] StatChanged observes every committed change", () => {
  const { engine, mediator, state } = levelSeven();
  const seen: Array<[number, number, number]> = [];
  mediator.register("StatChanged", ({ statId, oldValue, newValue }) => {
    seen.push([statId, oldValue, newValue]);
  });

  engine.setInvestment(state, STR, 2);
  engine.setInvestment(state, STR, 2);
  engine.setInvestment(state, STR, 1);

  assert.deepEqual(seen, [
    [STR, 0, 2],
    [STR, 2, 1],
  ]);
});

test("[contract] BeforeInvestment can rewrite the requested value", () => {
  const { engine, mediator, state } = levelSeven();
  mediator.register("BeforeInvestment", ({ value }) => (value > 3 ? { value: 3 } : undefined));

  const result = engine.setInvestment(state, STR, 8);

  assert.deepEqual(result, { ok: true, change: { statId: STR, oldValue: 0, newValue: 3 } });
  assert.equal(state.points, 4);
});

test("[contract] applied bonuses follow the committed value", () => {
  const { engine, bonuses, state } = levelSeven();
  engine.syncBonuses(state, true);

  engine.setInvestment(state, STR, 2);
  assert.deepEqual([...bonuses.getActive(SUBJECT.characterId).unitModifiers], [["4:2", 4]]);

  engine.setInvestment(state, STR, 5);
  assert.deepEqual([...bonuses.getActive(SUBJECT.characterId).unitModifiers], [["4:2", 10]]);
  assert.equal(state.bonusesApplied, true);
});
