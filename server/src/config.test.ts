import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";
import {
  clampGameMode,
  DEFAULT_CLOCK_MS_PER_PLAYER,
  DEFAULT_PORT,
  DEFAULT_TICK_INTERVAL_MS,
  loadConfig
} from "./config.js";

test("loadConfig falls back to defaults", () => {
  const config = loadConfig({ DATA_DIR: "/srv/data" });

  assert.equal(config.port, DEFAULT_PORT);
  assert.equal(config.clockMsPerPlayer, DEFAULT_CLOCK_MS_PER_PLAYER);
  assert.equal(config.tickIntervalMs, DEFAULT_TICK_INTERVAL_MS);
  assert.equal(config.passLimit, 6);
  assert.equal(config.disconnectGraceMs, 30_000);
  assert.equal(config.roomRemovalDelayMs, 60_000);
  assert.equal(config.dictionaryTimeoutMs, 2_000);
  assert.equal(config.wordCacheSize, 500);
  assert.equal(config.dictionaryId, "en");
  assert.equal(config.boardConfigId, "standard");
  assert.equal(config.tileSetId, "en");
  assert.equal(config.gameMode, "classic");
  assert.equal(config.dataDir, path.resolve("/srv/data"));
  assert.equal(config.wordListPath, null);
});

test("loadConfig clamps numbers into their allowed ranges", () => {
  const config = loadConfig({
    DATA_DIR: "/srv/data",
    PORT: "8080",
    CLOCK_MS_PER_PLAYER: "1000",
    TICK_INTERVAL_MS: "60000",
    PASS_LIMIT: "1",
    DISCONNECT_GRACE_MS: "2500.6",
    DICTIONARY_TIMEOUT_MS: "10"
  });

  assert.equal(config.port, 8080);
  assert.equal(config.clockMsPerPlayer, 60_000);
  assert.equal(config.tickIntervalMs, 5_000);
  assert.equal(config.passLimit, 2);
  assert.equal(config.disconnectGraceMs, 2_501);
  assert.equal(config.dictionaryTimeoutMs, 50);
});

test("loadConfig ignores unreadable values", () => {
  const config = loadConfig({
    DATA_DIR: "/srv/data",
    PORT: "abc",
    PASS_LIMIT: "   ",
    DICTIONARY_ID: "../etc",
    GAME_MODE: "blitz"
  });

  assert.equal(config.port, DEFAULT_PORT);
  assert.equal(config.passLimit, 6);
  assert.equal(config.dictionaryId, "en");
  assert.equal(config.gameMode, "classic");
});

test("loadConfig reads identifiers, mode and word list path", () => {
  const config = loadConfig({
    DATA_DIR: "/srv/data",
    DICTIONARY_ID: " fr ",
    TILE_SET_ID: "fr",
    GAME_MODE: "challenge",
    WORD_LIST_PATH: "/srv/words.txt"
  });

  assert.equal(config.dictionaryId, "fr");
  assert.equal(config.tileSetId, "fr");
  assert.equal(config.gameMode, "challenge");
  assert.equal(config.wordListPath, path.resolve("/srv/words.txt"));
});

test("clampGameMode only keeps known modes", () => {
  assert.equal(clampGameMode("challenge"), "challenge");
  assert.equal(clampGameMode("classic"), "classic");
  assert.equal(clampGameMode(undefined), "classic");
  assert.equal(clampGameMode(3), "classic");
});
