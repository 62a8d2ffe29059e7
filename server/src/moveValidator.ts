import { getCenter, getCell, isBoardEmpty, isInBounds, letterMultiplier, wordMultiplier } from "../../shared/board.js";
import { RACK_SIZE } from "../../shared/tileBag.js";
import type {
  Board,
  CommittedMove,
  GameMode,
  MoveError,
  MoveErrorCode,
  MoveRequest,
  Placement,
  PlayerIndex,
  PremiumKind,
  RoomStatus,
  Tile
} from "../../shared/types.js";
import { MIN_WORD_LENGTH, normalizeWord } from "../../shared/wordValidation.js";
import { DictionaryUnavailableError, type WordOracle } from "./wordOracle.js";

export const BINGO_BONUS = 50;
export const MIN_BAG_FOR_EXCHANGE = 7;

const LETTER_PATTERN = /^[A-Z]$/;

export type ValidationContext = {
  status: RoomStatus;
  mode: GameMode;
  dictionaryId: string;
  board: Board;
  bagCount: number;
  currentPlayerIndex: PlayerIndex;
  playerIndex: PlayerIndex;
  rack: Tile[];
  lastMove: CommittedMove | null;
};

export type PlacedTile = Placement & {
  tile: Tile;
};

export type FormedWord = {
  text: string;
  score: number;
};

export type ValidatedMove =
  | {
      type: "play";
      placements: PlacedTile[];
      words: FormedWord[];
      score: number;
      bingo: boolean;
    }
  | {
      type: "exchange";
      tiles: Tile[];
    }
  | {
      type: "pass";
    }
  | {
      type: "challenge";
      target: CommittedMove;
      invalidWords: string[];
    };

export type ValidationResult =
  | {
      ok: true;
      move: ValidatedMove;
    }
  | {
      ok: false;
      error: MoveError;
    };

type Direction = "across" | "down";

type WordCell = {
  letter: string;
  points: number;
  premium: PremiumKind;
  isNew: boolean;
};

export function moveError(code: MoveErrorCode, message: string, word?: string): MoveError {
  return word === undefined ? { code, message } : { code, message, word };
}

function reject(code: MoveErrorCode, message: string, word?: string): ValidationResult {
  return { ok: false, error: moveError(code, message, word) };
}

function positionKey(row: number, col: number): string {
  return `${row},${col}`;
}

function step(direction: Direction): { dRow: number; dCol: number } {
  return direction === "across" ? { dRow: 0, dCol: 1 } : { dRow: 1, dCol: 0 };
}

function perpendicular(direction: Direction): Direction {
  return direction === "across" ? "down" : "across";
}

function hasTile(board: Board, row: number, col: number): boolean {
  return Boolean(getCell(board, row, col)?.tile);
}

function normalizePlacements(
  board: Board,
  placements: Placement[]
): { ok: true; placements: Placement[] } | { ok: false; error: MoveError } {
  const seen = new Set<string>();
  const normalized: Placement[] = [];
  for (const placement of placements) {
    const { row, col } = placement;
    if (!Number.isInteger(row) || !Number.isInteger(col) || !isInBounds(board, row, col)) {
      return { ok: false, error: moveError("INVALID_PLACEMENT", "Tile is outside the board.") };
    }
    const letter = normalizeWord(placement.letter);
    if (!LETTER_PATTERN.test(letter)) {
      return { ok: false, error: moveError("INVALID_PLACEMENT", "Tiles must carry a single letter A-Z.") };
    }
    const key = positionKey(row, col);
    if (seen.has(key)) {
      return { ok: false, error: moveError("INVALID_PLACEMENT", "Two tiles cannot share a square.") };
    }
    seen.add(key);
    if (hasTile(board, row, col)) {
      return { ok: false, error: moveError("INVALID_PLACEMENT", "Tiles must be placed on empty squares.") };
    }
    normalized.push({ row, col, letter, isBlank: placement.isBlank });
  }
  return { ok: true, placements: normalized };
}

function resolveDirection(board: Board, placements: Placement[]): Direction | null {
  const rows = new Set(placements.map((placement) => placement.row));
  const cols = new Set(placements.map((placement) => placement.col));
  if (placements.length > 1) {
    if (rows.size === 1) return "across";
    if (cols.size === 1) return "down";
    return null;
  }
  const [single] = placements;
  const touchesAcross = hasTile(board, single.row, single.col - 1) || hasTile(board, single.row, single.col + 1);
  return touchesAcross ? "across" : "down";
}

function isContiguous(board: Board, placements: Placement[], direction: Direction, placed: Set<string>): boolean {
  const positions = placements.map((placement) => (direction === "across" ? placement.col : placement.row));
  const start = Math.min(...positions);
  const end = Math.max(...positions);
  const fixed = direction === "across" ? placements[0].row : placements[0].col;
  for (let index = start; index <= end; index += 1) {
    const row = direction === "across" ? fixed : index;
    const col = direction === "across" ? index : fixed;
    if (!placed.has(positionKey(row, col)) && !hasTile(board, row, col)) {
      return false;
    }
  }
  return true;
}

function touchesExistingTile(board: Board, placements: Placement[]): boolean {
  return placements.some(
    ({ row, col }) =>
      hasTile(board, row - 1, col) ||
      hasTile(board, row + 1, col) ||
      hasTile(board, row, col - 1) ||
      hasTile(board, row, col + 1)
  );
}

/**
 * Pairs each placement with a rack tile. Blank placements consume a blank
 * tile, which takes the chosen letter; other placements need an exact letter.
 */
export function matchRackTiles(rack: Tile[], placements: Placement[]): PlacedTile[] | null {
  const remaining = [...rack];
  const matched: PlacedTile[] = [];
  for (const placement of placements) {
    const index = remaining.findIndex((tile) =>
      placement.isBlank ? tile.isBlank : !tile.isBlank && tile.letter === placement.letter
    );
    if (index === -1) return null;
    const [tile] = remaining.splice(index, 1);
    matched.push({
      ...placement,
      tile: tile.isBlank ? { ...tile, letter: placement.letter } : tile
    });
  }
  return matched;
}

function readWord(
  board: Board,
  placed: Map<string, PlacedTile>,
  origin: { row: number; col: number },
  direction: Direction
): WordCell[] {
  const { dRow, dCol } = step(direction);
  const occupied = (row: number, col: number) => placed.has(positionKey(row, col)) || hasTile(board, row, col);

  let row = origin.row;
  let col = origin.col;
  while (occupied(row - dRow, col - dCol)) {
    row -= dRow;
    col -= dCol;
  }

  const cells: WordCell[] = [];
  while (occupied(row, col)) {
    const placedTile = placed.get(positionKey(row, col));
    const cell = board[row][col];
    if (placedTile) {
      cells.push({ letter: placedTile.letter, points: placedTile.tile.points, premium: cell.premium, isNew: true });
    } else if (cell.tile) {
      cells.push({ letter: cell.tile.letter, points: cell.tile.points, premium: cell.premium, isNew: false });
    }
    row += dRow;
    col += dCol;
  }
  return cells;
}

export function scoreWordCells(cells: WordCell[]): number {
  let sum = 0;
  let multiplier = 1;
  for (const cell of cells) {
    if (cell.isNew) {
      sum += cell.points * letterMultiplier(cell.premium);
      multiplier *= wordMultiplier(cell.premium);
    } else {
      sum += cell.points;
    }
  }
  return Math.max(0, sum * multiplier);
}

function toFormedWord(cells: WordCell[]): FormedWord {
  return {
    text: cells.map((cell) => cell.letter).join(""),
    score: scoreWordCells(cells)
  };
}

/** Main word first, then every perpendicular word of two or more letters. */
export function collectFormedWords(board: Board, placements: PlacedTile[], direction: Direction): FormedWord[] {
  const placed = new Map(placements.map((placement) => [positionKey(placement.row, placement.col), placement]));
  const words: FormedWord[] = [toFormedWord(readWord(board, placed, placements[0], direction))];
  for (const placement of placements) {
    const cross = readWord(board, placed, placement, perpendicular(direction));
    if (cross.length >= MIN_WORD_LENGTH) {
      words.push(toFormedWord(cross));
    }
  }
  return words;
}

async function findInvalidWord(
  words: string[],
  oracle: WordOracle,
  dictionaryId: string
): Promise<string | null> {
  for (const word of words) {
    if (!(await oracle.isValid(word, dictionaryId))) {
      return word;
    }
  }
  return null;
}

async function validatePlay(
  context: ValidationContext,
  requested: Placement[],
  oracle: WordOracle
): Promise<ValidationResult> {
  if (requested.length === 0) {
    return reject("INVALID_PLACEMENT", "Place at least one tile.");
  }
  if (requested.length > RACK_SIZE) {
    return reject("INVALID_PLACEMENT", `A move places at most ${RACK_SIZE} tiles.`);
  }

  const { board } = context;
  const normalized = normalizePlacements(board, requested);
  if (!normalized.ok) return normalized;
  const { placements } = normalized;

  const direction = resolveDirection(board, placements);
  if (!direction) {
    return reject("INVALID_PLACEMENT", "Tiles must form a single row or column.");
  }
  const placedKeys = new Set(placements.map((placement) => positionKey(placement.row, placement.col)));
  if (!isContiguous(board, placements, direction, placedKeys)) {
    return reject("INVALID_PLACEMENT", "Tiles must form one unbroken line.");
  }

  if (isBoardEmpty(board)) {
    const center = getCenter(board);
    if (!placedKeys.has(positionKey(center.row, center.col))) {
      return reject("INVALID_PLACEMENT", "The first word must cover the center square.");
    }
  } else if (!touchesExistingTile(board, placements)) {
    return reject("INVALID_PLACEMENT", "Tiles must connect to a word already on the board.");
  }

  const matched = matchRackTiles(context.rack, placements);
  if (!matched) {
    return reject("RACK_MISMATCH", "You do not hold those tiles.");
  }

  const words = collectFormedWords(board, matched, direction);
  const shortWord = words.find((word) => word.text.length < MIN_WORD_LENGTH);
  if (shortWord) {
    return reject("INVALID_WORD", `Words must be at least ${MIN_WORD_LENGTH} letters.`, shortWord.text);
  }

  if (context.mode === "classic") {
    try {
      const invalid = await findInvalidWord(
        words.map((word) => word.text),
        oracle,
        context.dictionaryId
      );
      if (invalid) {
        return reject("INVALID_WORD", `${invalid} is not in the dictionary.`, invalid);
      }
    } catch (error) {
      if (error instanceof DictionaryUnavailableError) {
        return reject("DICTIONARY_UNAVAILABLE", "Word check is unavailable. Try again.");
      }
      throw error;
    }
  }

  const bingo = matched.length === RACK_SIZE;
  const score = words.reduce((sum, word) => sum + word.score, 0) + (bingo ? BINGO_BONUS : 0);
  return { ok: true, move: { type: "play", placements: matched, words, score, bingo } };
}

function validateExchange(context: ValidationContext, tileIds: string[]): ValidationResult {
  if (context.bagCount < MIN_BAG_FOR_EXCHANGE) {
    return reject("EXCHANGE_NOT_ALLOWED", `Exchanges need at least ${MIN_BAG_FOR_EXCHANGE} tiles in the bag.`);
  }
  if (tileIds.length === 0 || new Set(tileIds).size !== tileIds.length) {
    return reject("EXCHANGE_NOT_ALLOWED", "Choose distinct tiles to exchange.");
  }
  const tiles: Tile[] = [];
  for (const tileId of tileIds) {
    const tile = context.rack.find((entry) => entry.id === tileId);
    if (!tile) {
      return reject("EXCHANGE_NOT_ALLOWED", "You can only exchange tiles from your rack.");
    }
    tiles.push(tile);
  }
  return { ok: true, move: { type: "exchange", tiles } };
}

async function validateChallenge(context: ValidationContext, oracle: WordOracle): Promise<ValidationResult> {
  const target = context.lastMove;
  if (!target || target.type !== "play" || target.playerIndex === context.playerIndex) {
    return reject("CHALLENGE_NOT_ALLOWED", "Only the opponent's last word can be challenged.");
  }
  try {
    const invalidWords: string[] = [];
    for (const word of target.words) {
      if (!(await oracle.isValid(word, context.dictionaryId))) {
        invalidWords.push(word);
      }
    }
    return { ok: true, move: { type: "challenge", target, invalidWords } };
  } catch (error) {
    if (error instanceof DictionaryUnavailableError) {
      return reject("DICTIONARY_UNAVAILABLE", "Word check is unavailable. Try again.");
    }
    throw error;
  }
}

/**
 * Checks a candidate move without touching the room. The caller applies the
 * result inside the same serialized room task.
 */
export async function validateMove(
  context: ValidationContext,
  move: MoveRequest,
  oracle: WordOracle
): Promise<ValidationResult> {
  if (context.status !== "active") {
    return reject("GAME_NOT_ACTIVE", "The game is not active.");
  }
  if (context.currentPlayerIndex !== context.playerIndex) {
    return reject("NOT_YOUR_TURN", "It is not your turn.");
  }

  switch (move.type) {
    case "play":
      return validatePlay(context, move.placements, oracle);
    case "exchange":
      return validateExchange(context, move.tileIds);
    case "pass":
      return { ok: true, move: { type: "pass" } };
    case "challenge":
      return validateChallenge(context, oracle);
  }
}
