import fs from "node:fs";
import path from "node:path";
import { createBoard, parseBoardConfig } from "../../shared/board.js";
import type { Board, BotDifficulty, BotProfile, TileDistribution } from "../../shared/types.js";
import { isValidWord, loadWordSet } from "../../shared/wordValidation.js";

/**
 * Everything the game core reads from storage. The core never writes through
 * this interface; durable history belongs to whoever implements it.
 */
export interface PersistenceGateway {
  loadDictionaryEntry(dictionaryId: string, word: string): Promise<boolean>;
  loadBoardConfig(configId: string): Promise<Board>;
  loadTileDistribution(langId: string): Promise<TileDistribution>;
  listBotProfiles(): Promise<BotProfile[]>;
  loadBotVocabulary(dictionaryId: string): Promise<string[]>;
}

type FilePersistenceOptions = {
  dataDir: string;
  wordListPaths?: Record<string, string>;
};

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isBotDifficulty(value: unknown): value is BotDifficulty {
  switch (value) {
    case "beginner":
    case "easy":
    case "medium":
    case "hard":
    case "expert":
    case "master":
      return true;
    default:
      return false;
  }
}

export function parseTileDistribution(raw: unknown): TileDistribution | null {
  if (!isObjectRecord(raw)) return null;
  const distribution: TileDistribution = {};
  for (const [letter, entry] of Object.entries(raw)) {
    if (!/^([A-Z]|\?)$/.test(letter)) return null;
    if (!isObjectRecord(entry)) return null;
    const { count, points } = entry;
    if (!isFiniteNumber(count) || !Number.isInteger(count) || count < 0) return null;
    if (!isFiniteNumber(points) || !Number.isInteger(points) || points < 0) return null;
    distribution[letter] = { count, points };
  }
  return Object.keys(distribution).length > 0 ? distribution : null;
}

export function parseBotProfile(raw: unknown): BotProfile | null {
  if (!isObjectRecord(raw)) return null;
  if (typeof raw.id !== "string" || raw.id.length === 0) return null;
  if (typeof raw.name !== "string") return null;
  if (!isBotDifficulty(raw.difficulty)) return null;
  if (typeof raw.avatar !== "string" || typeof raw.description !== "string") return null;
  if (!isFiniteNumber(raw.winRate) || raw.winRate < 0 || raw.winRate > 1) return null;
  const thinkTime = raw.thinkTimeMs;
  if (!isObjectRecord(thinkTime) || !isFiniteNumber(thinkTime.min) || !isFiniteNumber(thinkTime.max)) {
    return null;
  }
  if (thinkTime.min < 0 || thinkTime.max < thinkTime.min) return null;
  const strategy = raw.strategy;
  if (!isObjectRecord(strategy)) return null;
  const { scoreWeight, lengthWeight, mistakeProbability, maxCandidates } = strategy;
  if (!isFiniteNumber(scoreWeight) || !isFiniteNumber(lengthWeight)) return null;
  if (!isFiniteNumber(mistakeProbability) || mistakeProbability < 0 || mistakeProbability > 1) return null;
  if (!isFiniteNumber(maxCandidates) || !Number.isInteger(maxCandidates) || maxCandidates < 1) return null;

  return {
    id: raw.id,
    name: raw.name,
    difficulty: raw.difficulty,
    avatar: raw.avatar,
    description: raw.description,
    winRate: raw.winRate,
    thinkTimeMs: { min: thinkTime.min, max: thinkTime.max },
    strategy: { scoreWeight, lengthWeight, mistakeProbability, maxCandidates }
  };
}

async function readJson(filePath: string): Promise<unknown> {
  const raw = await fs.promises.readFile(filePath, "utf-8");
  return JSON.parse(raw);
}

export function createFilePersistence({ dataDir, wordListPaths = {} }: FilePersistenceOptions): PersistenceGateway {
  const wordSets = new Map<string, Set<string>>();

  function resolveWordListPath(dictionaryId: string): string {
    const configured = wordListPaths[dictionaryId];
    const candidates = [
      configured,
      path.resolve(dataDir, "dictionaries", `${dictionaryId}.txt`),
      path.resolve(dataDir, "..", "wordlist.txt")
    ].filter((candidate): candidate is string => Boolean(candidate));

    const found = candidates.find((candidate) => fs.existsSync(candidate));
    if (found) return found;

    throw new Error(`Word list for dictionary "${dictionaryId}" not found. Checked: ${candidates.join(", ")}`);
  }

  function getWordSet(dictionaryId: string): Set<string> {
    const cached = wordSets.get(dictionaryId);
    if (cached) return cached;
    const wordListPath = resolveWordListPath(dictionaryId);
    const wordSet = loadWordSet(wordListPath);
    console.log(`[dictionary] Loaded ${wordSet.size} words for "${dictionaryId}" from ${wordListPath}`);
    wordSets.set(dictionaryId, wordSet);
    return wordSet;
  }

  return {
    async loadDictionaryEntry(dictionaryId, word) {
      return isValidWord(word, getWordSet(dictionaryId));
    },

    async loadBoardConfig(configId) {
      const raw = await readJson(path.resolve(dataDir, "boards", `${configId}.json`));
      const config = parseBoardConfig(configId, raw);
      if (!config) {
        throw new Error(`Board config "${configId}" is invalid.`);
      }
      return createBoard(config);
    },

    async loadTileDistribution(langId) {
      const raw = await readJson(path.resolve(dataDir, "tiles", `${langId}.json`));
      const distribution = parseTileDistribution(raw);
      if (!distribution) {
        throw new Error(`Tile distribution "${langId}" is invalid.`);
      }
      return distribution;
    },

    async listBotProfiles() {
      const raw = await readJson(path.resolve(dataDir, "bots.json"));
      if (!Array.isArray(raw)) {
        throw new Error("Bot profiles must be a JSON array.");
      }
      const profiles: BotProfile[] = [];
      raw.forEach((entry, index) => {
        const profile = parseBotProfile(entry);
        if (!profile) {
          console.warn(`[bot] Skipping invalid bot profile at index ${index}`);
          return;
        }
        profiles.push(profile);
      });
      return profiles;
    },

    async loadBotVocabulary(dictionaryId) {
      return Array.from(getWordSet(dictionaryId));
    }
  };
}
