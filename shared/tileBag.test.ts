import assert from "node:assert/strict";
import test from "node:test";
import { BLANK_LETTER, createTileBag, drawTiles, rackValue, returnTiles, shuffleTiles } from "./tileBag.js";
import type { Tile } from "./types.js";

function tile(id: string, letter: string, points: number, isBlank = false): Tile {
  return { id, letter, points, isBlank };
}

test("createTileBag builds one tile per count with unique ids", () => {
  const bag = createTileBag(
    {
      A: { count: 3, points: 1 },
      Q: { count: 1, points: 10 },
      "?": { count: 2, points: 5 }
    },
    () => 0
  );

  assert.equal(bag.length, 6);
  assert.equal(new Set(bag.map((entry) => entry.id)).size, 6);
  assert.equal(bag.filter((entry) => entry.letter === "A").length, 3);

  const blanks = bag.filter((entry) => entry.isBlank);
  assert.equal(blanks.length, 2);
  assert.ok(blanks.every((entry) => entry.points === 0 && entry.letter === BLANK_LETTER));
});

test("shuffleTiles is driven by the random source", () => {
  const items = ["a", "b", "c"];
  shuffleTiles(items, () => 0);
  assert.deepEqual(items, ["b", "c", "a"]);

  const untouched = ["a", "b", "c"];
  shuffleTiles(untouched, () => 0.99);
  assert.deepEqual(untouched, ["a", "b", "c"]);
});

test("drawTiles takes from the front and stops at an empty bag", () => {
  const bag = [tile("t-0", "A", 1), tile("t-1", "B", 3), tile("t-2", "C", 3)];

  assert.deepEqual(
    drawTiles(bag, 2).map((entry) => entry.id),
    ["t-0", "t-1"]
  );
  assert.deepEqual(
    drawTiles(bag, 5).map((entry) => entry.id),
    ["t-2"]
  );
  assert.deepEqual(drawTiles(bag, 1), []);
  assert.deepEqual(drawTiles([tile("t-3", "D", 2)], 0), []);
});

test("returnTiles resets blanks before shuffling them back", () => {
  const bag: Tile[] = [];
  returnTiles(bag, [tile("blank-0", "E", 0, true), tile("t-1", "Z", 10)], () => 0.99);

  assert.deepEqual(bag, [tile("blank-0", BLANK_LETTER, 0, true), tile("t-1", "Z", 10)]);
});

test("rackValue sums tile points", () => {
  assert.equal(rackValue([tile("t-0", "Q", 10), tile("t-1", "A", 1), tile("blank-2", "?", 0, true)]), 11);
  assert.equal(rackValue([]), 0);
});
