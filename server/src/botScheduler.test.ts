import assert from "node:assert/strict";
import test from "node:test";
import { botDelayMs, createBotScheduler, type BotScheduler } from "./botScheduler.js";
import { createGameRoom } from "./gameRoom.js";
import {
  createManualScheduler,
  createMemoryPersistence,
  makeBoard,
  sequenceRandom,
  stackedBag,
  TEST_BOT
} from "./testSupport.js";
import { createWordOracle } from "./wordOracle.js";

async function setup() {
  const scheduler = createManualScheduler(0);
  const persistence = createMemoryPersistence({
    words: ["AT", "CAT"],
    distribution: { E: { count: 10, points: 1 } }
  });
  const oracle = createWordOracle({ dictionary: persistence, cacheSize: 100, timeoutMs: 1_000 });
  const bots: BotScheduler = createBotScheduler({ persistence, oracle, scheduler, random: () => 0 });
  const room = createGameRoom({
    id: "room-1",
    board: makeBoard(),
    bag: stackedBag("CATSDOG", "CATQQQQ", "EEEEEEEEEE"),
    dictionaryId: "en",
    mode: "classic",
    clockMs: 600_000,
    passLimit: 6,
    disconnectGraceMs: 30_000,
    oracle,
    scheduler,
    // The bot takes the first turn.
    random: sequenceRandom([0.9, 0]),
    onEvents: (target, events) => bots.handle(target, events)
  });
  await room.join({ userId: "alice" });
  await room.attachBot(TEST_BOT);
  return { scheduler, bots, room };
}

test("botDelayMs draws from the think-time range inside the allowed window", () => {
  assert.equal(botDelayMs({ ...TEST_BOT, thinkTimeMs: { min: 500, max: 1_000 } }, () => 0.7), 2_000);
  assert.equal(botDelayMs({ ...TEST_BOT, thinkTimeMs: { min: 10_000, max: 60_000 } }, () => 0.5), 20_000);
  assert.equal(botDelayMs(TEST_BOT, () => 0), 3_000);
});

test("the bot moves once its think time has passed", async () => {
  const { scheduler, bots, room } = await setup();
  assert.equal(bots.pendingEpoch("room-1"), room.epoch());

  scheduler.advance(2_999);
  await bots.idle();
  assert.equal(room.snapshot().lastMove, null);

  scheduler.advance(1);
  await bots.idle();

  const view = room.snapshot();
  assert.equal(view.lastMove?.playerId, "bot-test");
  assert.equal(view.lastMove?.type, "play");
  assert.deepEqual(view.lastMove?.words, ["CAT"]);
  assert.equal(view.currentPlayerId, "alice");
  assert.equal(bots.pendingEpoch("room-1"), null);
});

test("scheduling the same turn twice keeps a single timer", async () => {
  const { scheduler, bots, room } = await setup();
  const pendingTimers = scheduler.pending();

  assert.equal(bots.schedule(room), true);
  assert.equal(scheduler.pending(), pendingTimers);
});

test("a finished game cancels the pending bot move", async () => {
  const { scheduler, bots, room } = await setup();
  await room.resign("alice");

  assert.equal(bots.pendingEpoch("room-1"), null);
  scheduler.advance(10_000);
  await bots.idle();
  assert.equal(room.snapshot().lastMove, null);
});

test("a paused bot game waits for the human to return", async () => {
  const { scheduler, bots, room } = await setup();
  await room.disconnect("alice");
  assert.equal(bots.pendingEpoch("room-1"), null);

  scheduler.advance(5_000);
  await bots.idle();
  assert.equal(room.snapshot().lastMove, null);

  await room.join({ userId: "alice" });
  assert.equal(bots.pendingEpoch("room-1"), room.epoch());
  scheduler.advance(3_000);
  await bots.idle();
  assert.equal(room.snapshot().lastMove?.playerId, "bot-test");
});

test("cancel clears a pending turn", async () => {
  const { scheduler, bots, room } = await setup();
  bots.cancel("room-1");
  scheduler.advance(10_000);
  await bots.idle();

  assert.equal(bots.pendingEpoch("room-1"), null);
  assert.equal(room.snapshot().lastMove, null);
});
