import type { Server as HttpServer } from "node:http";
import { createBoard } from "../../shared/board.js";
import type { Board, BotProfile, PremiumKind, Tile, TileDistribution } from "../../shared/types.js";
import type { PersistenceGateway } from "./persistence.js";
import type { Scheduler, TimerHandle } from "./scheduler.js";

const LETTER_POINTS: Record<string, number> = {
  A: 1,
  B: 3,
  C: 3,
  D: 2,
  E: 1,
  G: 2,
  I: 1,
  L: 1,
  N: 1,
  O: 1,
  Q: 10,
  R: 1,
  S: 1,
  T: 1,
  X: 8,
  Z: 10
};

export function makeTile(letter: string, id: string): Tile {
  if (letter === "?") {
    return { id, letter, points: 0, isBlank: true };
  }
  return { id, letter, points: LETTER_POINTS[letter] ?? 1, isBlank: false };
}

/** One tile per character, ids `${prefix}-${index}`. */
export function makeTiles(letters: string, prefix = "t"): Tile[] {
  return letters.split("").map((letter, index) => makeTile(letter, `${prefix}-${index}`));
}

export function makeBoard(size = 15, premiums: Record<string, PremiumKind> = { "8,8": "star" }): Board {
  return createBoard({ id: "test", size, premiums });
}

/** Writes an already-committed word onto the board. */
export function placeWord(board: Board, row: number, col: number, word: string, direction: "across" | "down" = "across") {
  word.split("").forEach((letter, index) => {
    const r = direction === "across" ? row : row + index;
    const c = direction === "across" ? col + index : col;
    board[r][c].tile = makeTile(letter, `board-${r}-${c}`);
  });
}

/**
 * Bag whose first seven tiles become the first seat's rack and the next seven
 * the second seat's, as dealt when a room activates.
 */
export function stackedBag(firstRack: string, secondRack: string, rest: string): Tile[] {
  return [...makeTiles(firstRack, "p1"), ...makeTiles(secondRack, "p2"), ...makeTiles(rest, "bag")];
}

type ManualTimer = {
  at: number;
  order: number;
  callback: () => void;
  cancelled: boolean;
};

export type ManualScheduler = Scheduler & {
  advance(ms: number): void;
  set(now: number): void;
  pending(): number;
};

/** Clock and timers that only move when a test says so. */
export function createManualScheduler(start = 0): ManualScheduler {
  let current = start;
  let counter = 0;
  const timers: ManualTimer[] = [];

  function runDue(until: number) {
    for (;;) {
      const due = timers
        .filter((timer) => !timer.cancelled && timer.at <= until)
        .sort((a, b) => a.at - b.at || a.order - b.order)[0];
      if (!due) break;
      due.cancelled = true;
      current = Math.max(current, due.at);
      due.callback();
    }
    current = until;
  }

  return {
    now: () => current,
    setTimeout(callback, delayMs): TimerHandle {
      const timer: ManualTimer = { at: current + Math.max(0, delayMs), order: counter++, callback, cancelled: false };
      timers.push(timer);
      return {
        cancel() {
          timer.cancelled = true;
        }
      };
    },
    advance(ms) {
      runDue(current + ms);
    },
    set(now) {
      current = now;
    },
    pending() {
      return timers.filter((timer) => !timer.cancelled).length;
    }
  };
}

/** Seeded-enough randomness for tests: replays the given values, then repeats the last. */
export function sequenceRandom(values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? 0;
    index += 1;
    return value;
  };
}

export type MemoryDictionary = Pick<PersistenceGateway, "loadDictionaryEntry"> & {
  lookups: string[];
  failing: boolean;
  delayMs: number;
};

export function createMemoryDictionary(words: string[]): MemoryDictionary {
  const entries = new Set(words);
  const dictionary: MemoryDictionary = {
    lookups: [],
    failing: false,
    delayMs: 0,
    async loadDictionaryEntry(_dictionaryId, word) {
      dictionary.lookups.push(word);
      if (dictionary.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, dictionary.delayMs));
      }
      if (dictionary.failing) {
        throw new Error("dictionary offline");
      }
      return entries.has(word);
    }
  };
  return dictionary;
}

export const TEST_BOT: BotProfile = {
  id: "bot-test",
  name: "Test Bot",
  difficulty: "medium",
  avatar: "🧪",
  description: "Plays the highest-scoring word it finds.",
  winRate: 0.5,
  thinkTimeMs: { min: 3_000, max: 5_000 },
  strategy: { scoreWeight: 1, lengthWeight: 0, mistakeProbability: 0, maxCandidates: 500 }
};

export function createMemoryPersistence(options: {
  words: string[];
  distribution: TileDistribution;
  bots?: BotProfile[];
  board?: () => Board;
}): PersistenceGateway {
  const dictionary = createMemoryDictionary(options.words);
  return {
    loadDictionaryEntry: dictionary.loadDictionaryEntry,
    async loadBoardConfig() {
      return options.board ? options.board() : makeBoard();
    },
    async loadTileDistribution() {
      return options.distribution;
    },
    async listBotProfiles() {
      return options.bots ?? [TEST_BOT];
    },
    async loadBotVocabulary() {
      return [...options.words];
    }
  };
}

/** Listens on an ephemeral localhost port and resolves the base URL. */
export function listenOnFreePort(server: HttpServer): Promise<string> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (!address || typeof address === "string") {
        reject(new Error("Expected a TCP address"));
        return;
      }
      resolve(`http://127.0.0.1:${address.port}`);
    });
  });
}
