import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { GameMode } from "../../shared/types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_PORT = 3001;
export const DEFAULT_CLOCK_MS_PER_PLAYER = 600_000;
export const MIN_CLOCK_MS_PER_PLAYER = 60_000;
export const MAX_CLOCK_MS_PER_PLAYER = 3_600_000;
export const DEFAULT_TICK_INTERVAL_MS = 5_000;
export const MIN_TICK_INTERVAL_MS = 1_000;
export const DEFAULT_PASS_LIMIT = 6;
export const DEFAULT_DISCONNECT_GRACE_MS = 30_000;
export const DEFAULT_ROOM_REMOVAL_DELAY_MS = 60_000;
export const DEFAULT_DICTIONARY_TIMEOUT_MS = 2_000;
export const DEFAULT_WORD_CACHE_SIZE = 500;
export const MIN_BOT_DELAY_MS = 2_000;
export const MAX_BOT_DELAY_MS = 30_000;

export type ServerConfig = {
  port: number;
  clockMsPerPlayer: number;
  tickIntervalMs: number;
  passLimit: number;
  disconnectGraceMs: number;
  roomRemovalDelayMs: number;
  dictionaryTimeoutMs: number;
  wordCacheSize: number;
  dictionaryId: string;
  boardConfigId: string;
  tileSetId: string;
  gameMode: GameMode;
  dataDir: string;
  wordListPath: string | null;
};

type Env = Record<string, string | undefined>;

function readInteger(value: string | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) return fallback;
  const rounded = Math.round(parsed);
  return Math.min(max, Math.max(min, rounded));
}

function readIdentifier(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim() ?? "";
  return /^[A-Za-z0-9_-]+$/.test(trimmed) ? trimmed : fallback;
}

export function clampGameMode(value: unknown): GameMode {
  return value === "challenge" ? "challenge" : "classic";
}

export function defaultDataDir(): string {
  const candidates = [
    path.resolve(process.cwd(), "server", "data"),
    path.resolve(process.cwd(), "data"),
    path.resolve(__dirname, "..", "data"),
    path.resolve(__dirname, "..", "..", "..", "server", "data")
  ];
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? candidates[2];
}

export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    port: readInteger(env.PORT, DEFAULT_PORT, 1, 65_535),
    clockMsPerPlayer: readInteger(
      env.CLOCK_MS_PER_PLAYER,
      DEFAULT_CLOCK_MS_PER_PLAYER,
      MIN_CLOCK_MS_PER_PLAYER,
      MAX_CLOCK_MS_PER_PLAYER
    ),
    tickIntervalMs: readInteger(
      env.TICK_INTERVAL_MS,
      DEFAULT_TICK_INTERVAL_MS,
      MIN_TICK_INTERVAL_MS,
      DEFAULT_TICK_INTERVAL_MS
    ),
    passLimit: readInteger(env.PASS_LIMIT, DEFAULT_PASS_LIMIT, 2, 20),
    disconnectGraceMs: readInteger(env.DISCONNECT_GRACE_MS, DEFAULT_DISCONNECT_GRACE_MS, 1_000, 600_000),
    roomRemovalDelayMs: readInteger(env.ROOM_REMOVAL_DELAY_MS, DEFAULT_ROOM_REMOVAL_DELAY_MS, 0, 3_600_000),
    dictionaryTimeoutMs: readInteger(env.DICTIONARY_TIMEOUT_MS, DEFAULT_DICTIONARY_TIMEOUT_MS, 50, DEFAULT_TICK_INTERVAL_MS),
    wordCacheSize: readInteger(env.WORD_CACHE_SIZE, DEFAULT_WORD_CACHE_SIZE, 0, 100_000),
    dictionaryId: readIdentifier(env.DICTIONARY_ID, "en"),
    boardConfigId: readIdentifier(env.BOARD_CONFIG_ID, "standard"),
    tileSetId: readIdentifier(env.TILE_SET_ID, "en"),
    gameMode: clampGameMode(env.GAME_MODE),
    dataDir: env.DATA_DIR ? path.resolve(env.DATA_DIR) : defaultDataDir(),
    wordListPath: env.WORD_LIST_PATH ? path.resolve(env.WORD_LIST_PATH) : null
  };
}
