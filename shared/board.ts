import type { Board, BoardConfig, Cell, PremiumKind } from "./types.js";

const PREMIUM_KEY_PATTERN = /^(\d+),(\d+)$/;
const MIN_BOARD_SIZE = 5;
const MAX_BOARD_SIZE = 21;

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isPremiumKind(value: unknown): value is PremiumKind {
  switch (value) {
    case "none":
    case "2L":
    case "3L":
    case "2W":
    case "3W":
    case "star":
      return true;
    default:
      return false;
  }
}

/**
 * Premium keys are 1-based `"row,col"` pairs, e.g. `"8,8": "star"` for the
 * center of a 15x15 board.
 */
export function parseBoardConfig(id: string, raw: unknown): BoardConfig | null {
  if (!isObjectRecord(raw)) return null;
  const size = raw.size;
  if (typeof size !== "number" || !Number.isInteger(size)) return null;
  if (size < MIN_BOARD_SIZE || size > MAX_BOARD_SIZE || size % 2 === 0) return null;
  if (!isObjectRecord(raw.premiums)) return null;

  const premiums: Record<string, PremiumKind> = {};
  for (const [key, value] of Object.entries(raw.premiums)) {
    const match = PREMIUM_KEY_PATTERN.exec(key);
    if (!match || !isPremiumKind(value)) return null;
    const row = Number(match[1]);
    const col = Number(match[2]);
    if (row < 1 || row > size || col < 1 || col > size) return null;
    premiums[key] = value;
  }
  return { id, size, premiums };
}

export function createBoard(config: BoardConfig): Board {
  const board: Board = [];
  for (let row = 0; row < config.size; row += 1) {
    const cells: Cell[] = [];
    for (let col = 0; col < config.size; col += 1) {
      cells.push({
        row,
        col,
        premium: config.premiums[`${row + 1},${col + 1}`] ?? "none",
        tile: null
      });
    }
    board.push(cells);
  }
  return board;
}

export function getCenter(board: Board): { row: number; col: number } {
  const middle = Math.floor(board.length / 2);
  return { row: middle, col: middle };
}

export function isInBounds(board: Board, row: number, col: number): boolean {
  return row >= 0 && col >= 0 && row < board.length && col < board.length;
}

export function getCell(board: Board, row: number, col: number): Cell | null {
  if (!isInBounds(board, row, col)) return null;
  return board[row][col];
}

export function isBoardEmpty(board: Board): boolean {
  return board.every((cells) => cells.every((cell) => cell.tile === null));
}

export function cloneBoard(board: Board): Board {
  return board.map((cells) => cells.map((cell) => ({ ...cell, tile: cell.tile ? { ...cell.tile } : null })));
}

export function letterMultiplier(premium: PremiumKind): number {
  if (premium === "2L") return 2;
  if (premium === "3L") return 3;
  return 1;
}

export function wordMultiplier(premium: PremiumKind): number {
  if (premium === "2W" || premium === "star") return 2;
  if (premium === "3W") return 3;
  return 1;
}
