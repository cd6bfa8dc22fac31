// paragoncore/test/behavior_paragonAddonProtocol.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { ADDON_PREFIX, parseInvestmentEntries, type AddonServerMessage } from "../protocol/AddonProtocol";
import { ParagonAddonHandler, type AddonChannel } from "../protocol/ParagonAddonHandler";
import { CORE, makeEngineKit, STA, STR, SUBJECT } from "./paragonTestKit";

class RecordingChannel implements AddonChannel {
  readonly sent: Array<{ subjectId: number; message: AddonServerMessage }> = [];

  send(subjectId: number, message: AddonServerMessage): void {
    this.sent.push({ subjectId, message });
  }

  ops(): string[] {
    return this.sent.map((s) => s.message.op);
  }

  notices(): string[] {
    const out: string[] = [];
    for (const { message } of this.sent) {
      if (message.op === "notice") out.push(message.text);
    }
    return out;
  }

  lastLoad() {
    for (let i = this.sent.length - 1; i >= 0; i--) {
      const message = this.sent[i].message;
      if (message.op === "load") return message.payload;
    }
    return null;
  }
}

function setup() {
  const kit = makeEngineKit();
  const channel = new RecordingChannel();
  const handler = new ParagonAddonHandler(kit.catalogue, kit.engine, channel);
  const state = kit.engine.createState(SUBJECT);
  kit.engine.grantLevels(state, 6);
  kit.engine.syncBonuses(state, true);
  return { ...kit, channel, handler, state };
}

test("[behavior] load returns the catalogue annotated with investments", () => {
  const { channel, handler, state } = setup();

  assert.deepEqual(handler.handle(state, { prefix: ADDON_PREFIX, op: "load" }), { handled: "load" });

  assert.equal(channel.sent.length, 1);
  assert.equal(channel.sent[0].subjectId, 101);

  const payload = channel.lastLoad();
  assert.ok(payload);
  assert.equal(payload.level, 7);
  assert.equal(payload.points, 7);
  assert.deepEqual(payload.experience, { current: 0, max: 350 });
  assert.deepEqual(
    payload.categories.map((c) => [c.id, c.stats.map((s) => s.id)]),
    [
      [1, [1, 2]],
      [2, [3, 4]],
    ],
  );
  assert.deepEqual(payload.categories[0].stats[0], {
    id: STR,
    kind: "UnitModifier",
    targetCode: 4,
    icon: "str",
    factor: 2,
    limit: 10,
    application: 2,
    assigned: 0,
  });
});

test("[behavior] update commits and answers with a fresh load", () => {
  const { channel, handler, state } = setup();

  const out = handler.handle(state, {
    prefix: ADDON_PREFIX,
    op: "update",
    stats: [{ categoryId: CORE, statId: STR, value: 3 }],
  });

  assert.equal(out.handled, "update");
  assert.deepEqual(channel.ops(), ["load"]);
  assert.equal(channel.lastLoad()?.points, 4);
  assert.equal(channel.lastLoad()?.categories[0].stats[0].assigned, 3);
});

test("[behavior] a rejected entry is reported before the load", () => {
  const { channel, handler, state } = setup();

  handler.handle(state, {
    prefix: ADDON_PREFIX,
    op: "update",
    stats: [
      { categoryId: CORE, statId: STR, value: 2 },
      { categoryId: CORE, statId: 99, value: 1 },
    ],
  });

  assert.deepEqual(channel.ops(), ["notice", "load"]);
  assert.deepEqual(channel.notices(), ["Unknown paragon statistic."]);
  assert.equal(state.getInvestment(STR), 2);
});

test("[behavior] a malformed entry stops the batch after the entries before it", () => {
  const { channel, handler, state } = setup();

  const out = handler.handle(state, {
    prefix: ADDON_PREFIX,
    op: "update",
    stats: [
      { categoryId: CORE, statId: STR, value: 2 },
      { categoryId: "x", statId: STA },
      { categoryId: CORE, statId: STA, value: 1 },
    ],
  });

  assert.ok(out.handled === "update");
  assert.deepEqual(out.result.rejected, { index: 1, reason: "InvalidValue" });
  assert.deepEqual(channel.notices(), ["Invalid paragon value."]);
  assert.equal(state.getInvestment(STR), 2);
  assert.equal(state.getInvestment(STA), 0);
});

test("[behavior] over-budget update is refused whole", () => {
  const { channel, handler, state } = setup();

  handler.handle(state, {
    prefix: ADDON_PREFIX,
    op: "update",
    stats: [{ categoryId: CORE, statId: STA, value: 8 }],
  });

  assert.deepEqual(channel.notices(), ["Not enough paragon points."]);
  assert.equal(state.points, 7);
});

test("[behavior] empty updates and foreign messages get an error notice only", () => {
  const { channel, handler, state } = setup();

  assert.deepEqual(handler.handle(state, { prefix: ADDON_PREFIX, op: "update", stats: [] }), {
    handled: "rejected",
    error: "empty_update",
  });
  assert.deepEqual(handler.handle(state, { prefix: "OtherAddon", op: "load" }), {
    handled: "rejected",
    error: "bad_request",
  });

  assert.deepEqual(channel.ops(), ["notice", "notice"]);
  assert.deepEqual(channel.notices(), ["Empty paragon update.", "Bad paragon request."]);
});

test("[behavior] entry parsing keeps the valid prefix", () => {
  assert.deepEqual(parseInvestmentEntries([{ categoryId: 1, statId: 2, value: 3 }, null]), {
    requests: [{ categoryId: 1, statId: 2, value: 3 }],
    malformedIndex: 1,
  });
  assert.deepEqual(parseInvestmentEntries([]), { requests: [], malformedIndex: null });
});
