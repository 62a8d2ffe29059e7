import assert from "node:assert/strict";
import test from "node:test";
import {
  cloneBoard,
  createBoard,
  getCell,
  getCenter,
  isBoardEmpty,
  isInBounds,
  letterMultiplier,
  parseBoardConfig,
  wordMultiplier
} from "./board.js";

test("parseBoardConfig accepts an odd square board with 1-based premiums", () => {
  assert.deepEqual(parseBoardConfig("mini", { size: 5, premiums: { "3,3": "star", "1,5": "3W" } }), {
    id: "mini",
    size: 5,
    premiums: { "3,3": "star", "1,5": "3W" }
  });
});

test("parseBoardConfig rejects bad sizes and premiums", () => {
  assert.equal(parseBoardConfig("even", { size: 6, premiums: {} }), null);
  assert.equal(parseBoardConfig("tiny", { size: 3, premiums: {} }), null);
  assert.equal(parseBoardConfig("huge", { size: 23, premiums: {} }), null);
  assert.equal(parseBoardConfig("off", { size: 5, premiums: { "6,1": "2L" } }), null);
  assert.equal(parseBoardConfig("zero", { size: 5, premiums: { "0,1": "2L" } }), null);
  assert.equal(parseBoardConfig("kind", { size: 5, premiums: { "1,1": "4W" } }), null);
  assert.equal(parseBoardConfig("key", { size: 5, premiums: { "a,1": "2L" } }), null);
  assert.equal(parseBoardConfig("missing", { size: 5 }), null);
  assert.equal(parseBoardConfig("array", [5]), null);
});

test("createBoard maps premiums onto 0-based cells", () => {
  const board = createBoard({ id: "mini", size: 5, premiums: { "3,3": "star", "1,5": "3W" } });

  assert.equal(board.length, 5);
  assert.ok(board.every((cells) => cells.length === 5));
  assert.equal(board[2][2].premium, "star");
  assert.equal(board[0][4].premium, "3W");
  assert.equal(board[4][0].premium, "none");
  assert.deepEqual(board[1][3], { row: 1, col: 3, premium: "none", tile: null });
  assert.equal(isBoardEmpty(board), true);
});

test("getCenter and bounds checks", () => {
  const board = createBoard({ id: "standard", size: 15, premiums: {} });

  assert.deepEqual(getCenter(board), { row: 7, col: 7 });
  assert.equal(isInBounds(board, 14, 14), true);
  assert.equal(isInBounds(board, 15, 0), false);
  assert.equal(isInBounds(board, 0, -1), false);
  assert.equal(getCell(board, -1, 0), null);
  assert.equal(getCell(board, 3, 4)?.col, 4);
});

test("cloneBoard copies cells and tiles", () => {
  const board = createBoard({ id: "mini", size: 5, premiums: {} });
  board[2][2].tile = { id: "t-0", letter: "A", points: 1, isBlank: false };

  const copy = cloneBoard(board);
  const copiedTile = copy[2][2].tile;
  assert.ok(copiedTile);
  copiedTile.letter = "B";
  copy[0][0].tile = { id: "t-1", letter: "C", points: 3, isBlank: false };

  assert.equal(board[2][2].tile?.letter, "A");
  assert.equal(board[0][0].tile, null);
  assert.equal(isBoardEmpty(board), false);
});

test("premium multipliers", () => {
  assert.equal(letterMultiplier("2L"), 2);
  assert.equal(letterMultiplier("3L"), 3);
  assert.equal(letterMultiplier("star"), 1);
  assert.equal(wordMultiplier("2W"), 2);
  assert.equal(wordMultiplier("star"), 2);
  assert.equal(wordMultiplier("3W"), 3);
  assert.equal(wordMultiplier("3L"), 1);
});
