import assert from "node:assert/strict";
import test from "node:test";
import type { CommittedMove, MoveRequest, Placement } from "../../shared/types.js";
import { matchRackTiles, validateMove, type ValidationContext } from "./moveValidator.js";
import { createMemoryDictionary, makeBoard, makeTiles, placeWord } from "./testSupport.js";
import { createWordOracle } from "./wordOracle.js";

const WORDS = ["AT", "CAT", "CATS", "TO", "TRAILED"];

function makeOracle(words: string[] = WORDS) {
  const dictionary = createMemoryDictionary(words);
  return { dictionary, oracle: createWordOracle({ dictionary, cacheSize: 50, timeoutMs: 1_000 }) };
}

function makeContext(overrides: Partial<ValidationContext> = {}): ValidationContext {
  return {
    status: "active",
    mode: "classic",
    dictionaryId: "en",
    board: makeBoard(),
    bagCount: 80,
    currentPlayerIndex: 0,
    playerIndex: 0,
    rack: makeTiles("CATSDOG"),
    lastMove: null,
    ...overrides
  };
}

function across(row: number, col: number, word: string, blanks: number[] = []): Placement[] {
  return word.split("").map((letter, index) => ({ row, col: col + index, letter, isBlank: blanks.includes(index) }));
}

function play(placements: Placement[]): MoveRequest {
  return { type: "play", placements };
}

test("CAT through the center star scores 10", async () => {
  const { oracle } = makeOracle();
  const result = await validateMove(makeContext(), play(across(7, 6, "CAT")), oracle);

  assert.equal(result.ok, true);
  if (!result.ok || result.move.type !== "play") return;
  assert.equal(result.move.score, 10);
  assert.equal(result.move.bingo, false);
  assert.deepEqual(result.move.words, [{ text: "CAT", score: 10 }]);
  assert.deepEqual(
    result.move.placements.map((placement) => placement.tile.id),
    ["t-0", "t-1", "t-2"]
  );
});

test("letter premiums apply before the word multiplier", async () => {
  const { oracle } = makeOracle();
  const board = makeBoard(15, { "8,8": "star", "8,9": "3L" });
  const result = await validateMove(makeContext({ board }), play(across(7, 6, "CAT")), oracle);

  assert.equal(result.ok && result.move.type === "play" ? result.move.score : null, 14);
});

test("the first word must cover the center", async () => {
  const { oracle } = makeOracle();
  const result = await validateMove(makeContext(), play(across(2, 2, "CAT")), oracle);

  assert.deepEqual(result, {
    ok: false,
    error: { code: "INVALID_PLACEMENT", message: "The first word must cover the center square." }
  });
});

test("status is checked before turn order", async () => {
  const { oracle } = makeOracle();
  const paused = await validateMove(makeContext({ status: "paused", currentPlayerIndex: 1 }), { type: "pass" }, oracle);
  const wrongTurn = await validateMove(makeContext({ currentPlayerIndex: 1 }), { type: "pass" }, oracle);

  assert.equal(paused.ok ? null : paused.error.code, "GAME_NOT_ACTIVE");
  assert.equal(wrongTurn.ok ? null : wrongTurn.error.code, "NOT_YOUR_TURN");
});

test("tiles must share a line without gaps", async () => {
  const { oracle } = makeOracle();
  const diagonal = await validateMove(
    makeContext(),
    play([
      { row: 7, col: 7, letter: "C", isBlank: false },
      { row: 8, col: 8, letter: "A", isBlank: false }
    ]),
    oracle
  );
  const gapped = await validateMove(
    makeContext(),
    play([
      { row: 7, col: 6, letter: "C", isBlank: false },
      { row: 7, col: 7, letter: "A", isBlank: false },
      { row: 7, col: 9, letter: "T", isBlank: false }
    ]),
    oracle
  );

  assert.equal(diagonal.ok ? null : diagonal.error.message, "Tiles must form a single row or column.");
  assert.equal(gapped.ok ? null : gapped.error.message, "Tiles must form one unbroken line.");
});

test("placements must be on the board, distinct and on empty squares", async () => {
  const { oracle } = makeOracle();
  const board = makeBoard();
  placeWord(board, 7, 6, "CAT");

  const outside = await validateMove(makeContext(), play(across(7, 14, "AT")), oracle);
  const doubled = await validateMove(
    makeContext(),
    play([
      { row: 7, col: 7, letter: "A", isBlank: false },
      { row: 7, col: 7, letter: "T", isBlank: false }
    ]),
    oracle
  );
  const occupied = await validateMove(makeContext({ board }), play(across(7, 8, "TO")), oracle);
  const badLetter = await validateMove(makeContext(), play(across(7, 7, "A1")), oracle);

  assert.equal(outside.ok ? null : outside.error.code, "INVALID_PLACEMENT");
  assert.equal(doubled.ok ? null : doubled.error.message, "Two tiles cannot share a square.");
  assert.equal(occupied.ok ? null : occupied.error.message, "Tiles must be placed on empty squares.");
  assert.equal(badLetter.ok ? null : badLetter.error.message, "Tiles must carry a single letter A-Z.");
});

test("later words must connect to the board", async () => {
  const { oracle } = makeOracle();
  const board = makeBoard();
  placeWord(board, 7, 6, "CAT");

  const result = await validateMove(makeContext({ board, rack: makeTiles("ATEASRL") }), play(across(2, 2, "AT")), oracle);

  assert.equal(result.ok ? null : result.error.message, "Tiles must connect to a word already on the board.");
});

test("letters the rack does not hold are rejected", async () => {
  const { oracle } = makeOracle();
  const result = await validateMove(makeContext({ rack: makeTiles("CAXSDOG") }), play(across(7, 6, "CAT")), oracle);

  assert.equal(result.ok ? null : result.error.code, "RACK_MISMATCH");
});

test("a single tile on an empty board is too short a word", async () => {
  const { oracle } = makeOracle();
  const result = await validateMove(makeContext(), play(across(7, 7, "A")), oracle);

  assert.deepEqual(result, {
    ok: false,
    error: { code: "INVALID_WORD", message: "Words must be at least 2 letters.", word: "A" }
  });
});

test("unknown words are rejected in classic mode and name the word", async () => {
  const { oracle } = makeOracle();
  const result = await validateMove(makeContext(), play(across(7, 6, "CTA")), oracle);

  assert.deepEqual(result, {
    ok: false,
    error: { code: "INVALID_WORD", message: "CTA is not in the dictionary.", word: "CTA" }
  });
});

test("challenge mode defers the dictionary check", async () => {
  const { oracle, dictionary } = makeOracle();
  const result = await validateMove(makeContext({ mode: "challenge" }), play(across(7, 6, "CTA")), oracle);

  assert.equal(result.ok, true);
  assert.deepEqual(dictionary.lookups, []);
});

test("an unreachable dictionary rejects the play without a verdict", async () => {
  const { oracle, dictionary } = makeOracle();
  dictionary.failing = true;
  const result = await validateMove(makeContext(), play(across(7, 6, "CAT")), oracle);

  assert.equal(result.ok ? null : result.error.code, "DICTIONARY_UNAVAILABLE");
});

test("extending a word scores existing tiles without premiums", async () => {
  const { oracle } = makeOracle();
  const board = makeBoard();
  placeWord(board, 7, 6, "CAT");

  const result = await validateMove(
    makeContext({ board, rack: makeTiles("SOEASRL") }),
    play(across(7, 9, "S")),
    oracle
  );

  assert.equal(result.ok, true);
  if (!result.ok || result.move.type !== "play") return;
  assert.deepEqual(result.move.words, [{ text: "CATS", score: 6 }]);
  assert.equal(result.move.score, 6);
});

test("cross words are collected after the main word", async () => {
  const { oracle } = makeOracle();
  const board = makeBoard();
  placeWord(board, 7, 6, "CAT");

  const result = await validateMove(
    makeContext({ board, rack: makeTiles("TOEASRL") }),
    play(across(8, 7, "TO")),
    oracle
  );

  assert.equal(result.ok, true);
  if (!result.ok || result.move.type !== "play") return;
  assert.deepEqual(
    result.move.words.map((word) => word.text),
    ["TO", "AT", "TO"]
  );
  assert.equal(result.move.score, 6);
});

test("using all seven tiles earns the bingo bonus", async () => {
  const { oracle } = makeOracle();
  const result = await validateMove(
    makeContext({ rack: makeTiles("TRAILED") }),
    play(across(7, 4, "TRAILED")),
    oracle
  );

  assert.equal(result.ok, true);
  if (!result.ok || result.move.type !== "play") return;
  assert.equal(result.move.bingo, true);
  assert.equal(result.move.score, 66);
});

test("a blank takes the chosen letter and scores nothing", async () => {
  const { oracle } = makeOracle();
  const result = await validateMove(
    makeContext({ rack: makeTiles("?ATSDOG") }),
    play(across(7, 6, "CAT", [0])),
    oracle
  );

  assert.equal(result.ok, true);
  if (!result.ok || result.move.type !== "play") return;
  assert.equal(result.move.score, 4);
  assert.deepEqual(result.move.placements[0].tile, { id: "t-0", letter: "C", points: 0, isBlank: true });
});

test("matchRackTiles needs a blank for every blank placement", () => {
  assert.equal(matchRackTiles(makeTiles("CATSDOG"), across(7, 6, "CAT", [0])), null);
});

test("exchanges need a full enough bag and tiles from the rack", async () => {
  const { oracle } = makeOracle();
  const rack = makeTiles("CATSDOG");

  const lowBag = await validateMove(makeContext({ bagCount: 6 }), { type: "exchange", tileIds: ["t-0"] }, oracle);
  const foreign = await validateMove(makeContext(), { type: "exchange", tileIds: ["t-9"] }, oracle);
  const repeated = await validateMove(makeContext(), { type: "exchange", tileIds: ["t-0", "t-0"] }, oracle);
  const valid = await validateMove(makeContext({ rack }), { type: "exchange", tileIds: ["t-1", "t-3"] }, oracle);

  assert.equal(lowBag.ok ? null : lowBag.error.code, "EXCHANGE_NOT_ALLOWED");
  assert.equal(foreign.ok ? null : foreign.error.code, "EXCHANGE_NOT_ALLOWED");
  assert.equal(repeated.ok ? null : repeated.error.code, "EXCHANGE_NOT_ALLOWED");
  assert.deepEqual(valid, { ok: true, move: { type: "exchange", tiles: [rack[1], rack[3]] } });
});

function committedPlay(playerIndex: 0 | 1, words: string[]): CommittedMove {
  return {
    moveNumber: 1,
    type: "play",
    playerId: playerIndex === 0 ? "alice" : "bob",
    playerIndex,
    placements: [],
    exchangedCount: 0,
    words,
    score: 12,
    at: 0
  };
}

test("a challenge needs an opponent's play to target", async () => {
  const { oracle } = makeOracle();
  const none = await validateMove(makeContext(), { type: "challenge" }, oracle);
  const own = await validateMove(makeContext({ lastMove: committedPlay(0, ["CAT"]) }), { type: "challenge" }, oracle);

  assert.equal(none.ok ? null : none.error.code, "CHALLENGE_NOT_ALLOWED");
  assert.equal(own.ok ? null : own.error.code, "CHALLENGE_NOT_ALLOWED");
});

test("a challenge lists every word of the target play that fails the dictionary", async () => {
  const { oracle } = makeOracle();
  const target = committedPlay(1, ["CAT", "XQ", "ZZ"]);
  const result = await validateMove(makeContext({ lastMove: target }), { type: "challenge" }, oracle);

  assert.deepEqual(result, { ok: true, move: { type: "challenge", target, invalidWords: ["XQ", "ZZ"] } });
});

test("passing is always allowed on your turn", async () => {
  const { oracle } = makeOracle();
  assert.deepEqual(await validateMove(makeContext(), { type: "pass" }, oracle), { ok: true, move: { type: "pass" } });
});
