export type RoomStatus = "waiting" | "active" | "paused" | "completed" | "abandoned";

export type GameMode = "classic" | "challenge";

export type PlayerIndex = 0 | 1;

export type PremiumKind = "none" | "2L" | "3L" | "2W" | "3W" | "star";

export interface Tile {
  id: string;
  letter: string;
  points: number;
  isBlank: boolean;
}

export interface Cell {
  row: number;
  col: number;
  premium: PremiumKind;
  tile: Tile | null;
}

export type Board = Cell[][];

export interface BoardConfig {
  id: string;
  size: number;
  premiums: Record<string, PremiumKind>;
}

export type TileDistribution = Record<string, { count: number; points: number }>;

export type PlayerIdentity =
  | {
      kind: "human";
      userId: string;
    }
  | {
      kind: "bot";
      botId: string;
    };

export interface Player {
  id: string;
  name: string;
  identity: PlayerIdentity;
  rack: Tile[];
  score: number;
  connected: boolean;
  disconnectedAt: number | null;
}

export interface Placement {
  row: number;
  col: number;
  letter: string;
  isBlank: boolean;
}

export type MoveRequest =
  | {
      type: "play";
      placements: Placement[];
    }
  | {
      type: "exchange";
      tileIds: string[];
    }
  | {
      type: "pass";
    }
  | {
      type: "challenge";
    };

export type MoveType = MoveRequest["type"];

export interface CommittedMove {
  moveNumber: number;
  type: MoveType;
  playerId: string;
  playerIndex: PlayerIndex;
  placements: Placement[];
  exchangedCount: number;
  words: string[];
  score: number;
  at: number;
  challenge?: {
    targetMoveNumber: number;
    outcome: "upheld" | "rejected";
    invalidWords: string[];
  };
}

export interface TimerSnapshot {
  player1Ms: number;
  player2Ms: number;
  running: PlayerIndex | null;
  paused: boolean;
}

export type GameEndReason =
  | "pass-limit"
  | "tiles-exhausted"
  | "timeout"
  | "resigned"
  | "disconnect"
  | "internal-error";

export interface GameResult {
  reason: GameEndReason;
  winnerIndex: PlayerIndex | null;
  winnerId: string | null;
  loserIndex: PlayerIndex | null;
  finalScores: [number, number];
  endedAt: number;
}

export interface PlayerView {
  id: string;
  name: string;
  kind: PlayerIdentity["kind"];
  score: number;
  rackCount: number;
  rack?: Tile[];
  timeRemainingMs: number;
  isCurrentTurn: boolean;
  connected: boolean;
}

export interface RoomView {
  id: string;
  status: RoomStatus;
  mode: GameMode;
  dictionaryId: string;
  board: Board;
  bagCount: number;
  players: PlayerView[];
  currentPlayerIndex: PlayerIndex | null;
  currentPlayerId: string | null;
  consecutivePasses: number;
  moveNumber: number;
  lastMove: CommittedMove | null;
  timer: TimerSnapshot;
  result: GameResult | null;
  createdAt: number;
}

export type MoveErrorCode =
  | "NOT_YOUR_TURN"
  | "GAME_NOT_ACTIVE"
  | "INVALID_PLACEMENT"
  | "RACK_MISMATCH"
  | "INVALID_WORD"
  | "EXCHANGE_NOT_ALLOWED"
  | "CHALLENGE_NOT_ALLOWED"
  | "DICTIONARY_UNAVAILABLE"
  | "ROOM_NOT_FOUND"
  | "ROOM_FULL"
  | "NOT_ENOUGH_PLAYERS"
  | "NOT_IN_ROOM"
  | "BOT_NOT_FOUND"
  | "INVALID_PAYLOAD"
  | "INTERNAL_ERROR";

export interface MoveError {
  code: MoveErrorCode;
  message: string;
  word?: string;
}

export type RoomEvent =
  | {
      type: "state";
      view: RoomView;
      racks: Record<string, Tile[]>;
    }
  | {
      type: "move-committed";
      move: CommittedMove;
    }
  | {
      type: "turn-changed";
      playerId: string;
      playerIndex: PlayerIndex;
    }
  | {
      type: "timer-sync";
      timer: TimerSnapshot;
    }
  | {
      type: "timer-expired";
      side: PlayerIndex;
      playerId: string;
    }
  | {
      type: "game-completed";
      result: GameResult;
    };

export type BotDifficulty = "beginner" | "easy" | "medium" | "hard" | "expert" | "master";

export interface BotStrategy {
  scoreWeight: number;
  lengthWeight: number;
  mistakeProbability: number;
  maxCandidates: number;
}

export interface BotProfile {
  id: string;
  name: string;
  difficulty: BotDifficulty;
  avatar: string;
  description: string;
  /** Share of games won, 0 to 1, as shown in the bot picker. */
  winRate: number;
  thinkTimeMs: {
    min: number;
    max: number;
  };
  strategy: BotStrategy;
}
