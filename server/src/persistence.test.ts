import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";
import { fileURLToPath } from "node:url";
import { createFilePersistence, parseBotProfile, parseTileDistribution } from "./persistence.js";

const DATA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "data");

function validProfile() {
  return {
    id: "bot-x",
    name: "X",
    difficulty: "easy",
    avatar: "🤖",
    description: "Steady.",
    winRate: 0.4,
    thinkTimeMs: { min: 2_000, max: 3_000 },
    strategy: { scoreWeight: 1, lengthWeight: 0, mistakeProbability: 0.2, maxCandidates: 10 }
  };
}

test("parseTileDistribution validates letters and numbers", () => {
  assert.deepEqual(parseTileDistribution({ A: { count: 2, points: 1 }, "?": { count: 1, points: 0 } }), {
    A: { count: 2, points: 1 },
    "?": { count: 1, points: 0 }
  });
  assert.equal(parseTileDistribution({ a: { count: 2, points: 1 } }), null);
  assert.equal(parseTileDistribution({ A: { count: -1, points: 1 } }), null);
  assert.equal(parseTileDistribution({ A: { count: 1.5, points: 1 } }), null);
  assert.equal(parseTileDistribution({ A: { count: 1 } }), null);
  assert.equal(parseTileDistribution({}), null);
});

test("parseBotProfile checks every field", () => {
  assert.deepEqual(parseBotProfile(validProfile()), validProfile());
  assert.equal(parseBotProfile({ ...validProfile(), difficulty: "godlike" }), null);
  assert.equal(parseBotProfile({ ...validProfile(), thinkTimeMs: { min: 3_000, max: 2_000 } }), null);
  assert.equal(
    parseBotProfile({ ...validProfile(), strategy: { ...validProfile().strategy, mistakeProbability: 1.5 } }),
    null
  );
  assert.equal(
    parseBotProfile({ ...validProfile(), strategy: { ...validProfile().strategy, maxCandidates: 0 } }),
    null
  );
  assert.equal(parseBotProfile({ ...validProfile(), id: "" }), null);
  assert.equal(parseBotProfile({ ...validProfile(), winRate: 1.2 }), null);
  assert.equal(parseBotProfile({ ...validProfile(), avatar: undefined }), null);
});

test("file persistence loads the bundled board", async () => {
  const persistence = createFilePersistence({ dataDir: DATA_DIR });
  const board = await persistence.loadBoardConfig("standard");

  assert.equal(board.length, 15);
  assert.equal(board[7][7].premium, "star");
  assert.equal(board[0][0].premium, "3W");
  assert.equal(board[6][6].premium, "2L");
  await assert.rejects(persistence.loadBoardConfig("missing"));
});

test("file persistence loads the bundled tiles and bots", async () => {
  const persistence = createFilePersistence({ dataDir: DATA_DIR });
  const distribution = await persistence.loadTileDistribution("en");
  const bots = await persistence.listBotProfiles();

  assert.equal(
    Object.values(distribution).reduce((sum, entry) => sum + entry.count, 0),
    100
  );
  assert.deepEqual(distribution["?"], { count: 2, points: 0 });
  assert.deepEqual(
    bots.map((bot) => bot.id),
    ["bot-beginner", "bot-easy", "bot-medium", "bot-hard", "bot-expert", "bot-master"]
  );
  assert.deepEqual(
    { avatar: bots[0].avatar, description: bots[0].description, winRate: bots[0].winRate },
    { avatar: "🤖", description: "Takes it slow and steady.", winRate: 0.35 }
  );
});

test("file persistence answers dictionary lookups from the word list", async () => {
  const persistence = createFilePersistence({ dataDir: DATA_DIR });

  assert.equal(await persistence.loadDictionaryEntry("en", "CAT"), true);
  assert.equal(await persistence.loadDictionaryEntry("en", "QXZ"), false);
  assert.equal(await persistence.loadDictionaryEntry("en", "A"), false);
  assert.ok((await persistence.loadBotVocabulary("en")).includes("AT"));
});
