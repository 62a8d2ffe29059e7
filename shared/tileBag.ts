import type { Tile, TileDistribution } from "./types.js";

export const BLANK_LETTER = "?";
export const RACK_SIZE = 7;

export function createTileBag(
  distribution: TileDistribution,
  random: () => number = Math.random
): Tile[] {
  const tiles: Tile[] = [];
  let counter = 0;
  Object.entries(distribution).forEach(([letter, { count, points }]) => {
    const isBlank = letter === BLANK_LETTER;
    for (let i = 0; i < count; i += 1) {
      tiles.push({ id: `${isBlank ? "blank" : letter}-${counter++}`, letter, points: isBlank ? 0 : points, isBlank });
    }
  });

  shuffleTiles(tiles, random);
  return tiles;
}

export function shuffleTiles<T>(items: T[], random: () => number = Math.random): void {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
}

export function drawTiles(bag: Tile[], count: number): Tile[] {
  if (count <= 0) return [];
  return bag.splice(0, Math.min(count, bag.length));
}

export function returnTiles(bag: Tile[], tiles: Tile[], random: () => number = Math.random): void {
  // Blanks go back unassigned.
  bag.push(...tiles.map((tile) => (tile.isBlank ? { ...tile, letter: BLANK_LETTER } : tile)));
  shuffleTiles(bag, random);
}

export function rackValue(tiles: Tile[]): number {
  return tiles.reduce((sum, tile) => sum + tile.points, 0);
}
