import { getCenter, getCell, isInBounds } from "../../shared/board.js";
import { shuffleTiles } from "../../shared/tileBag.js";
import type { Board, BotProfile, MoveRequest, Placement, Tile } from "../../shared/types.js";
import { MIN_WORD_LENGTH } from "../../shared/wordValidation.js";
import type { BotMoveContext } from "./gameRoom.js";
import { MIN_BAG_FOR_EXCHANGE, validateMove } from "./moveValidator.js";
import type { WordOracle } from "./wordOracle.js";

export const DEFAULT_BOT_SEARCH_BUDGET_MS = 1_500;

type Direction = "across" | "down";

export type BotCandidate = {
  placements: Placement[];
  word: string;
};

export type ScoredCandidate = BotCandidate & {
  score: number;
};

export type BotPlayerOptions = {
  vocabulary: string[];
  oracle: WordOracle;
  random?: () => number;
  now?: () => number;
  budgetMs?: number;
};

export type RackCounts = {
  letters: Map<string, number>;
  blanks: number;
};

export function countRack(rack: Tile[]): RackCounts {
  const letters = new Map<string, number>();
  let blanks = 0;
  rack.forEach((tile) => {
    if (tile.isBlank) {
      blanks += 1;
      return;
    }
    letters.set(tile.letter, (letters.get(tile.letter) ?? 0) + 1);
  });
  return { letters, blanks };
}

function boardLetters(board: Board): Set<string> {
  const letters = new Set<string>();
  board.forEach((cells) =>
    cells.forEach((cell) => {
      if (cell.tile) letters.add(cell.tile.letter);
    })
  );
  return letters;
}

/**
 * Cheap prefilter: a word is worth placing only if the rack (plus blanks) covers
 * every letter the board cannot supply.
 */
export function couldSpell(word: string, rack: RackCounts, available: Set<string>, needsBoard: boolean): boolean {
  if (word.length < MIN_WORD_LENGTH) return false;
  const counts = new Map(rack.letters);
  let blanks = rack.blanks;
  let borrowed = 0;
  for (const letter of word) {
    const held = counts.get(letter) ?? 0;
    if (held > 0) {
      counts.set(letter, held - 1);
    } else if (available.has(letter)) {
      borrowed += 1;
    } else if (blanks > 0) {
      blanks -= 1;
    } else {
      return false;
    }
  }
  return needsBoard || borrowed === 0;
}

function delta(direction: Direction): { dRow: number; dCol: number } {
  return direction === "across" ? { dRow: 0, dCol: 1 } : { dRow: 1, dCol: 0 };
}

/** Squares next to existing tiles. On an empty board, the center. */
export function findAnchors(board: Board): Array<{ row: number; col: number }> {
  const anchors: Array<{ row: number; col: number }> = [];
  board.forEach((cells, row) =>
    cells.forEach((cell, col) => {
      if (cell.tile) return;
      const touches = [
        [row - 1, col],
        [row + 1, col],
        [row, col - 1],
        [row, col + 1]
      ].some(([r, c]) => Boolean(getCell(board, r, c)?.tile));
      if (touches) anchors.push({ row, col });
    })
  );
  return anchors.length > 0 ? anchors : [getCenter(board)];
}

/**
 * Lays `word` so that letter `offset` sits on `anchor`. Returns the new
 * placements, or null if the word clashes with the board, runs off it, or
 * needs tiles the rack does not hold.
 */
export function layWord(
  board: Board,
  rack: RackCounts,
  word: string,
  anchor: { row: number; col: number },
  offset: number,
  direction: Direction
): Placement[] | null {
  const { dRow, dCol } = delta(direction);
  const startRow = anchor.row - dRow * offset;
  const startCol = anchor.col - dCol * offset;
  const endRow = startRow + dRow * (word.length - 1);
  const endCol = startCol + dCol * (word.length - 1);
  if (!isInBounds(board, startRow, startCol) || !isInBounds(board, endRow, endCol)) return null;
  if (getCell(board, startRow - dRow, startCol - dCol)?.tile) return null;
  if (getCell(board, endRow + dRow, endCol + dCol)?.tile) return null;

  const counts = new Map(rack.letters);
  let blanks = rack.blanks;
  const placements: Placement[] = [];
  for (let index = 0; index < word.length; index += 1) {
    const row = startRow + dRow * index;
    const col = startCol + dCol * index;
    const letter = word[index];
    const existing = board[row][col].tile;
    if (existing) {
      if (existing.letter !== letter) return null;
      continue;
    }
    const held = counts.get(letter) ?? 0;
    if (held > 0) {
      counts.set(letter, held - 1);
      placements.push({ row, col, letter, isBlank: false });
    } else if (blanks > 0) {
      blanks -= 1;
      placements.push({ row, col, letter, isBlank: true });
    } else {
      return null;
    }
  }
  return placements.length > 0 ? placements : null;
}

function candidateKey(placements: Placement[]): string {
  return placements.map(({ row, col, letter, isBlank }) => `${row},${col}${letter}${isBlank ? "*" : ""}`).join("|");
}

export type EnumerationLimits = {
  now: () => number;
  deadline: number;
  maxCandidates: number;
};

/** Words examined between deadline checks, each followed by a yield to the event loop. */
export const ENUMERATION_BATCH_SIZE = 500;

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Distinct structural placements of vocabulary words through the anchors, in
 * vocabulary order. Stops at `maxCandidates` or once the deadline passes.
 */
export async function enumerateCandidates(
  board: Board,
  rack: Tile[],
  vocabulary: string[],
  isFirstMove: boolean,
  { now, deadline, maxCandidates }: EnumerationLimits
): Promise<BotCandidate[]> {
  const counts = countRack(rack);
  const available = isFirstMove ? new Set<string>() : boardLetters(board);
  const anchors = findAnchors(board);
  const seen = new Set<string>();
  const candidates: BotCandidate[] = [];

  for (let index = 0; index < vocabulary.length; index += 1) {
    if (index % ENUMERATION_BATCH_SIZE === 0) {
      if (now() > deadline) break;
      if (index > 0) await yieldToEventLoop();
    }
    const word = vocabulary[index];
    if (word.length > board.length || !couldSpell(word, counts, available, !isFirstMove)) continue;
    for (const anchor of anchors) {
      for (let offset = 0; offset < word.length; offset += 1) {
        for (const direction of ["across", "down"] as const) {
          const placements = layWord(board, counts, word, anchor, offset, direction);
          if (!placements) continue;
          const key = candidateKey(placements);
          if (seen.has(key)) continue;
          seen.add(key);
          candidates.push({ placements, word });
          if (candidates.length >= maxCandidates) return candidates;
        }
      }
    }
  }
  return candidates;
}

export function chooseCandidate(
  candidates: ScoredCandidate[],
  profile: BotProfile,
  random: () => number
): ScoredCandidate | null {
  if (candidates.length === 0) return null;
  const { scoreWeight, lengthWeight, mistakeProbability } = profile.strategy;
  if (candidates.length > 1 && random() < mistakeProbability) {
    return candidates[Math.floor(random() * candidates.length)];
  }
  let best = candidates[0];
  let bestValue = -Infinity;
  for (const candidate of candidates) {
    const value = scoreWeight * candidate.score + lengthWeight * candidate.placements.length;
    if (value > bestValue) {
      best = candidate;
      bestValue = value;
    }
  }
  return best;
}

function fallbackMove(context: BotMoveContext): MoveRequest {
  if (context.bagCount >= MIN_BAG_FOR_EXCHANGE && context.rack.length > 0) {
    return { type: "exchange", tileIds: context.rack.map((tile) => tile.id) };
  }
  return { type: "pass" };
}

export async function generateBotMove(
  context: BotMoveContext,
  profile: BotProfile,
  { vocabulary, oracle, random = Math.random, now = Date.now, budgetMs = DEFAULT_BOT_SEARCH_BUDGET_MS }: BotPlayerOptions
): Promise<MoveRequest> {
  const deadline = now() + budgetMs;
  const order = [...vocabulary];
  shuffleTiles(order, random);
  const structural = await enumerateCandidates(context.board, context.rack, order, context.isFirstMove, {
    now,
    deadline,
    maxCandidates: profile.strategy.maxCandidates
  });

  // Candidates are dictionary-checked in every mode.
  const validation = { ...context.validation, mode: "classic" as const };
  const accepted: ScoredCandidate[] = [];

  for (const candidate of structural) {
    if (now() > deadline) break;
    const result = await validateMove(validation, { type: "play", placements: candidate.placements }, oracle);
    if (result.ok && result.move.type === "play") {
      accepted.push({ ...candidate, score: result.move.score });
    } else if (!result.ok && result.error.code === "DICTIONARY_UNAVAILABLE") {
      console.warn(`[bot] ${profile.id} stopped searching: dictionary unavailable`);
      break;
    }
  }

  const chosen = chooseCandidate(accepted, profile, random);
  if (chosen) {
    return { type: "play", placements: chosen.placements };
  }
  return fallbackMove(context);
}
