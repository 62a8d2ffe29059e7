import { cloneBoard, isBoardEmpty } from "../../shared/board.js";
import { drawTiles, RACK_SIZE, returnTiles } from "../../shared/tileBag.js";
import type {
  Board,
  BotProfile,
  CommittedMove,
  GameEndReason,
  GameMode,
  GameResult,
  MoveError,
  MoveRequest,
  Player,
  PlayerIdentity,
  PlayerIndex,
  RoomEvent,
  RoomStatus,
  RoomView,
  Tile
} from "../../shared/types.js";
import { createGameClock, otherSide, type GameClock } from "./clock.js";
import { moveError, validateMove, type ValidatedMove, type ValidationContext } from "./moveValidator.js";
import { createSerialQueue } from "./roomQueue.js";
import type { Scheduler, TimerHandle } from "./scheduler.js";
import {
  activateRoom,
  advanceTurn,
  assertRoomInvariants,
  completionReason,
  recordPassCount,
  RoomInvariantError,
  settleGame
} from "./turnMachine.js";
import type { WordOracle } from "./wordOracle.js";

export type RoomState = {
  id: string;
  status: RoomStatus;
  mode: GameMode;
  dictionaryId: string;
  board: Board;
  bag: Tile[];
  players: Player[];
  currentPlayerIndex: PlayerIndex;
  consecutivePasses: number;
  moveNumber: number;
  epoch: number;
  history: CommittedMove[];
  playRecords: Map<number, { placed: Tile[]; drawn: Tile[] }>;
  clock: GameClock;
  botProfile: BotProfile | null;
  autoPaused: boolean;
  result: GameResult | null;
  createdAt: number;
};

export type GameRoomOptions = {
  id: string;
  board: Board;
  bag: Tile[];
  dictionaryId: string;
  mode: GameMode;
  clockMs: number;
  passLimit: number;
  disconnectGraceMs: number;
  autoStart?: boolean;
  oracle: WordOracle;
  scheduler: Scheduler;
  random?: () => number;
  onEvents?: (room: GameRoom, events: RoomEvent[]) => void;
};

export type JoinRequest = {
  userId: string;
  name?: string;
};

export type RoomOutcome =
  | {
      ok: true;
      events: RoomEvent[];
    }
  | {
      ok: false;
      error: MoveError;
    };

export type JoinOutcome =
  | {
      ok: true;
      playerId: string;
      playerIndex: PlayerIndex;
      events: RoomEvent[];
    }
  | {
      ok: false;
      error: MoveError;
    };

export type BotTurn = {
  playerId: string;
  profile: BotProfile;
  epoch: number;
};

export type BotMoveContext = {
  turn: BotTurn;
  board: Board;
  rack: Tile[];
  bagCount: number;
  isFirstMove: boolean;
  validation: ValidationContext;
};

export interface GameRoom {
  readonly id: string;
  status(): RoomStatus;
  epoch(): number;
  playerCount(): number;
  isJoinable(): boolean;
  hasPlayer(playerId: string): boolean;
  join(request: JoinRequest): Promise<JoinOutcome>;
  attachBot(profile: BotProfile): Promise<JoinOutcome>;
  start(): Promise<RoomOutcome>;
  submitMove(playerId: string, move: MoveRequest): Promise<RoomOutcome>;
  tick(): Promise<RoomEvent[]>;
  pause(): Promise<RoomOutcome>;
  resume(): Promise<RoomOutcome>;
  resign(playerId: string): Promise<RoomOutcome>;
  disconnect(playerId: string): Promise<RoomEvent[]>;
  pendingBotTurn(): BotTurn | null;
  /**
   * Snapshots the bot's view, runs `decide` outside the room queue, then
   * submits the result. Resolves null when the turn went stale meanwhile.
   */
  playBotTurn(turn: BotTurn, decide: (context: BotMoveContext) => Promise<MoveRequest>): Promise<RoomOutcome | null>;
  snapshot(): RoomView;
  viewFor(playerId: string | null): RoomView;
  idle(): Promise<void>;
  dispose(): void;
}

function fail(error: MoveError): { ok: false; error: MoveError } {
  return { ok: false, error };
}

function defaultName(userId: string): string {
  return `Player-${userId.slice(0, 4)}`;
}

export function createGameRoom(options: GameRoomOptions): GameRoom {
  const {
    id,
    oracle,
    scheduler,
    passLimit,
    disconnectGraceMs,
    autoStart = true,
    random = Math.random,
    onEvents
  } = options;
  const queue = createSerialQueue(`Room ${id}`);
  const graceTimers = new Map<string, TimerHandle>();
  let expiryTimer: TimerHandle | null = null;
  let disposed = false;

  const state: RoomState = {
    id,
    status: "waiting",
    mode: options.mode,
    dictionaryId: options.dictionaryId,
    board: options.board,
    bag: options.bag,
    players: [],
    currentPlayerIndex: 0,
    consecutivePasses: 0,
    moveNumber: 0,
    epoch: 0,
    history: [],
    playRecords: new Map(),
    clock: createGameClock(options.clockMs, scheduler.now()),
    botProfile: null,
    autoPaused: false,
    result: null,
    createdAt: scheduler.now()
  };

  function isLive(): boolean {
    return state.status === "active" || state.status === "paused";
  }

  function findPlayerIndex(playerId: string): PlayerIndex | null {
    const index = state.players.findIndex((player) => player.id === playerId);
    return index === 0 || index === 1 ? index : null;
  }

  function buildView(viewerId: string | null): RoomView {
    const live = isLive();
    const lastMove = state.history[state.history.length - 1] ?? null;
    return {
      id: state.id,
      status: state.status,
      mode: state.mode,
      dictionaryId: state.dictionaryId,
      board: cloneBoard(state.board),
      bagCount: state.bag.length,
      players: state.players.map((player, index) => ({
        id: player.id,
        name: player.name,
        kind: player.identity.kind,
        score: player.score,
        rackCount: player.rack.length,
        ...(viewerId === player.id ? { rack: player.rack.map((tile) => ({ ...tile })) } : {}),
        timeRemainingMs: state.clock.remaining(index === 0 ? 0 : 1),
        isCurrentTurn: live && index === state.currentPlayerIndex,
        connected: player.connected
      })),
      currentPlayerIndex: live ? state.currentPlayerIndex : null,
      currentPlayerId: live ? (state.players[state.currentPlayerIndex]?.id ?? null) : null,
      consecutivePasses: state.consecutivePasses,
      moveNumber: state.moveNumber,
      lastMove,
      timer: state.clock.snapshot(),
      result: state.result,
      createdAt: state.createdAt
    };
  }

  function stateEvent(): RoomEvent {
    const racks: Record<string, Tile[]> = {};
    state.players.forEach((player) => {
      racks[player.id] = player.rack.map((tile) => ({ ...tile }));
    });
    return { type: "state", view: buildView(null), racks };
  }

  function turnEvent(): RoomEvent {
    return {
      type: "turn-changed",
      playerId: state.players[state.currentPlayerIndex].id,
      playerIndex: state.currentPlayerIndex
    };
  }

  function cancelTimers() {
    expiryTimer?.cancel();
    expiryTimer = null;
    graceTimers.forEach((timer) => timer.cancel());
    graceTimers.clear();
  }

  function finish(
    events: RoomEvent[],
    reason: GameEndReason,
    options: { loserIndex?: PlayerIndex; outPlayerIndex?: PlayerIndex } = {}
  ) {
    const result = settleGame(state, reason, scheduler.now(), options);
    cancelTimers();
    console.log(`[room] ${state.id} ended (${reason}), winner: ${result.winnerId ?? "none"}`);
    events.push({ type: "game-completed", result });
  }

  function finishByTimeout(events: RoomEvent[], side: PlayerIndex) {
    events.push({ type: "timer-expired", side, playerId: state.players[side]?.id ?? "" });
    finish(events, "timeout", { loserIndex: side });
  }

  /** Applies elapsed time; ends the game if the running side just ran out. */
  function observeClock(events: RoomEvent[]): boolean {
    if (state.status !== "active") return false;
    const expired = state.clock.tick(scheduler.now());
    if (expired === null) return false;
    finishByTimeout(events, expired);
    return true;
  }

  function abortRoom(events: RoomEvent[], error: RoomInvariantError) {
    console.error(`[room] ${state.id} aborted`, error);
    cancelTimers();
    const now = scheduler.now();
    state.clock.stop(now);
    state.status = "abandoned";
    state.epoch += 1;
    state.result = {
      reason: "internal-error",
      winnerIndex: null,
      winnerId: null,
      loserIndex: null,
      finalScores: [state.players[0]?.score ?? 0, state.players[1]?.score ?? 0],
      endedAt: now
    };
    events.push({ type: "game-completed", result: state.result }, stateEvent());
  }

  function armExpiryTimer() {
    expiryTimer?.cancel();
    expiryTimer = null;
    if (disposed || state.status !== "active") return;
    const running = state.clock.running();
    if (running === null) return;
    expiryTimer = scheduler.setTimeout(() => {
      expiryTimer = null;
      room.tick().catch((error: unknown) => {
        console.error(`[room] ${state.id} expiry tick failed`, error);
      });
    }, state.clock.remaining(running));
  }

  /**
   * Every mutation goes through here: one task at a time per room, invariants
   * checked afterwards, events published in commit order.
   */
  function exclusive<T>(task: (events: RoomEvent[]) => Promise<T> | T): Promise<T> {
    return queue.run(async () => {
      const events: RoomEvent[] = [];
      try {
        const result = await task(events);
        assertRoomInvariants(state);
        return result;
      } catch (error) {
        if (error instanceof RoomInvariantError) {
          abortRoom(events, error);
        }
        throw error;
      } finally {
        armExpiryTimer();
        if (events.length > 0) {
          onEvents?.(room, events);
        }
      }
    });
  }

  function validationContext(playerIndex: PlayerIndex): ValidationContext {
    return {
      status: state.status,
      mode: state.mode,
      dictionaryId: state.dictionaryId,
      board: state.board,
      bagCount: state.bag.length,
      currentPlayerIndex: state.currentPlayerIndex,
      playerIndex,
      rack: state.players[playerIndex].rack,
      lastMove: state.history[state.history.length - 1] ?? null
    };
  }

  /** The bot's seat index while `turn` is still the live turn, else null. */
  function botSeat(turn: BotTurn): PlayerIndex | null {
    if (state.epoch !== turn.epoch || state.status !== "active") return null;
    const playerIndex = findPlayerIndex(turn.playerId);
    return playerIndex !== null && playerIndex === state.currentPlayerIndex ? playerIndex : null;
  }

  function removeFromRack(player: Player, tiles: Tile[]) {
    const ids = new Set(tiles.map((tile) => tile.id));
    player.rack = player.rack.filter((tile) => !ids.has(tile.id));
  }

  function revertPlay(target: CommittedMove) {
    const record = state.playRecords.get(target.moveNumber);
    if (!record) {
      throw new RoomInvariantError(state.id, `no record of move ${target.moveNumber}`);
    }
    const owner = state.players[target.playerIndex];
    target.placements.forEach(({ row, col }) => {
      state.board[row][col].tile = null;
    });
    removeFromRack(owner, record.drawn);
    state.bag.unshift(...record.drawn);
    owner.rack.push(...record.placed);
    owner.score = Math.max(0, owner.score - target.score);
    state.playRecords.delete(target.moveNumber);
  }

  /** Commits a validated move. Returns whether the turn passes to the opponent. */
  function commit(playerIndex: PlayerIndex, move: ValidatedMove, now: number): { committed: CommittedMove; switchTurn: boolean } {
    const player = state.players[playerIndex];
    const moveNumber = state.moveNumber + 1;
    const base: CommittedMove = {
      moveNumber,
      type: move.type,
      playerId: player.id,
      playerIndex,
      placements: [],
      exchangedCount: 0,
      words: [],
      score: 0,
      at: now
    };
    let committed = base;
    let switchTurn = true;

    switch (move.type) {
      case "play": {
        const placed = move.placements.map((placement) =>
          player.rack.find((tile) => tile.id === placement.tile.id) ?? placement.tile
        );
        move.placements.forEach((placement) => {
          state.board[placement.row][placement.col].tile = placement.tile;
        });
        removeFromRack(player, placed);
        const drawn = drawTiles(state.bag, RACK_SIZE - player.rack.length);
        player.rack.push(...drawn);
        player.score += move.score;
        state.playRecords.set(moveNumber, { placed, drawn });
        committed = {
          ...base,
          placements: move.placements.map(({ row, col, letter, isBlank }) => ({ row, col, letter, isBlank })),
          words: move.words.map((word) => word.text),
          score: move.score
        };
        break;
      }
      case "exchange": {
        removeFromRack(player, move.tiles);
        player.rack.push(...drawTiles(state.bag, move.tiles.length));
        returnTiles(state.bag, move.tiles, random);
        committed = { ...base, exchangedCount: move.tiles.length };
        break;
      }
      case "pass":
        break;
      case "challenge": {
        const upheld = move.invalidWords.length > 0;
        if (upheld) {
          revertPlay(move.target);
          switchTurn = false;
        }
        committed = {
          ...base,
          words: [...move.target.words],
          score: upheld ? -move.target.score : 0,
          challenge: {
            targetMoveNumber: move.target.moveNumber,
            outcome: upheld ? "upheld" : "rejected",
            invalidWords: move.invalidWords
          }
        };
        break;
      }
    }

    recordPassCount(state, move.type);
    state.moveNumber = moveNumber;
    state.history.push(committed);
    state.epoch += 1;
    return { committed, switchTurn };
  }

  async function applyMove(playerIndex: PlayerIndex, move: MoveRequest, events: RoomEvent[]): Promise<RoomOutcome> {
    const validation = await validateMove(validationContext(playerIndex), move, oracle);
    if (!validation.ok) {
      return fail(validation.error);
    }

    const now = scheduler.now();
    const { committed, switchTurn } = commit(playerIndex, validation.move, now);
    events.push({ type: "move-committed", move: committed });

    const reason = completionReason(state, playerIndex, committed.type, passLimit);
    if (reason) {
      finish(events, reason, reason === "tiles-exhausted" ? { outPlayerIndex: playerIndex } : {});
    } else if (switchTurn) {
      const expired = advanceTurn(state, now);
      if (expired !== null) {
        finishByTimeout(events, expired);
      } else {
        events.push(turnEvent());
      }
    }
    events.push(stateEvent());
    return { ok: true, events };
  }

  function seat(identity: PlayerIdentity, playerId: string, name: string, events: RoomEvent[]): JoinOutcome {
    if (state.status !== "waiting" || state.players.length >= 2) {
      return fail(moveError("ROOM_FULL", "This room is full."));
    }
    state.players.push({
      id: playerId,
      name,
      identity,
      rack: [],
      score: 0,
      connected: true,
      disconnectedAt: null
    });
    const playerIndex: PlayerIndex = state.players.length === 1 ? 0 : 1;
    if (state.players.length === 2 && autoStart) {
      activateRoom(state, random, scheduler.now());
      events.push(turnEvent());
    }
    events.push(stateEvent());
    return { ok: true, playerId, playerIndex, events };
  }

  function markConnected(player: Player, events: RoomEvent[]) {
    player.connected = true;
    player.disconnectedAt = null;
    graceTimers.get(player.id)?.cancel();
    graceTimers.delete(player.id);
    if (state.status === "paused" && state.autoPaused) {
      state.clock.resume(scheduler.now());
      state.status = "active";
      state.autoPaused = false;
      state.epoch += 1;
      events.push(turnEvent());
    }
    events.push(stateEvent());
  }

  function startGraceTimer(player: Player, disconnectedAt: number) {
    graceTimers.get(player.id)?.cancel();
    graceTimers.set(
      player.id,
      scheduler.setTimeout(() => {
        graceTimers.delete(player.id);
        exclusive((events) => {
          const index = findPlayerIndex(player.id);
          if (index === null || !isLive()) return;
          const current = state.players[index];
          if (current.connected || current.disconnectedAt !== disconnectedAt) return;
          finish(events, "disconnect", { loserIndex: index });
          events.push(stateEvent());
        }).catch((error: unknown) => {
          console.error(`[room] ${state.id} disconnect grace failed`, error);
        });
      }, disconnectGraceMs)
    );
  }

  const room: GameRoom = {
    id,

    status: () => state.status,
    epoch: () => state.epoch,
    playerCount: () => state.players.length,

    isJoinable() {
      return (
        state.status === "waiting" &&
        state.players.length === 1 &&
        state.players[0].identity.kind === "human" &&
        state.players[0].connected
      );
    },

    hasPlayer(playerId) {
      return findPlayerIndex(playerId) !== null;
    },

    join({ userId, name }) {
      return exclusive<JoinOutcome>((events) => {
        const existing = findPlayerIndex(userId);
        if (existing !== null) {
          markConnected(state.players[existing], events);
          return { ok: true, playerId: userId, playerIndex: existing, events };
        }
        return seat({ kind: "human", userId }, userId, name?.trim() || defaultName(userId), events);
      });
    },

    attachBot(profile) {
      return exclusive<JoinOutcome>((events) => {
        if (state.botProfile) {
          return fail(moveError("ROOM_FULL", "A bot is already seated in this room."));
        }
        const outcome = seat({ kind: "bot", botId: profile.id }, profile.id, profile.name, events);
        if (outcome.ok) {
          state.botProfile = profile;
        }
        return outcome;
      });
    },

    start() {
      return exclusive<RoomOutcome>((events) => {
        if (state.status === "waiting") {
          if (state.players.length < 2) {
            return fail(moveError("NOT_ENOUGH_PLAYERS", "Two players are needed to start."));
          }
          activateRoom(state, random, scheduler.now());
          events.push(turnEvent(), stateEvent());
          return { ok: true, events };
        }
        if (isLive()) {
          events.push(stateEvent());
          return { ok: true, events };
        }
        return fail(moveError("GAME_NOT_ACTIVE", "The game has ended."));
      });
    },

    submitMove(playerId, move) {
      return exclusive<RoomOutcome>(async (events) => {
        const playerIndex = findPlayerIndex(playerId);
        if (playerIndex === null) {
          return fail(moveError("NOT_IN_ROOM", "You are not seated in this room."));
        }
        if (observeClock(events)) {
          events.push(stateEvent());
          return fail(moveError("GAME_NOT_ACTIVE", "Time has run out."));
        }
        return applyMove(playerIndex, move, events);
      });
    },

    tick() {
      return exclusive((events) => {
        if (state.status !== "active") return events;
        if (observeClock(events)) {
          events.push(stateEvent());
        } else {
          events.push({ type: "timer-sync", timer: state.clock.snapshot() });
        }
        return events;
      });
    },

    pause() {
      return exclusive<RoomOutcome>((events) => {
        if (state.status === "paused") return { ok: true, events };
        if (state.status !== "active") {
          return fail(moveError("GAME_NOT_ACTIVE", "Only an active game can be paused."));
        }
        const expired = state.clock.pause(scheduler.now());
        if (expired !== null) {
          finishByTimeout(events, expired);
        } else {
          state.status = "paused";
          state.epoch += 1;
        }
        events.push(stateEvent());
        return { ok: true, events };
      });
    },

    resume() {
      return exclusive<RoomOutcome>((events) => {
        if (state.status === "active") return { ok: true, events };
        if (state.status !== "paused") {
          return fail(moveError("GAME_NOT_ACTIVE", "Only a paused game can be resumed."));
        }
        state.clock.resume(scheduler.now());
        state.status = "active";
        state.autoPaused = false;
        state.epoch += 1;
        events.push(turnEvent(), stateEvent());
        return { ok: true, events };
      });
    },

    resign(playerId) {
      return exclusive<RoomOutcome>((events) => {
        const playerIndex = findPlayerIndex(playerId);
        if (playerIndex === null) {
          return fail(moveError("NOT_IN_ROOM", "You are not seated in this room."));
        }
        if (!isLive()) {
          return fail(moveError("GAME_NOT_ACTIVE", "The game is not in progress."));
        }
        finish(events, "resigned", { loserIndex: playerIndex });
        events.push(stateEvent());
        return { ok: true, events };
      });
    },

    disconnect(playerId) {
      return exclusive((events) => {
        const playerIndex = findPlayerIndex(playerId);
        if (playerIndex === null) return events;
        const player = state.players[playerIndex];

        if (state.status === "waiting") {
          state.players.splice(playerIndex, 1);
          if (player.identity.kind === "bot") {
            state.botProfile = null;
          }
          events.push(stateEvent());
          return events;
        }
        if (!isLive() || !player.connected) return events;

        const now = scheduler.now();
        player.connected = false;
        player.disconnectedAt = now;
        startGraceTimer(player, now);

        const opponent = state.players[otherSide(playerIndex)];
        if (state.status === "active" && opponent.identity.kind === "bot") {
          const expired = state.clock.pause(now);
          if (expired !== null) {
            finishByTimeout(events, expired);
          } else {
            state.status = "paused";
            state.autoPaused = true;
            state.epoch += 1;
          }
        }
        events.push(stateEvent());
        return events;
      });
    },

    pendingBotTurn() {
      if (state.status !== "active" || !state.botProfile) return null;
      const current = state.players[state.currentPlayerIndex];
      if (current?.identity.kind !== "bot") return null;
      return { playerId: current.id, profile: state.botProfile, epoch: state.epoch };
    },

    async playBotTurn(turn, decide) {
      const context = await exclusive<BotMoveContext | null>((events) => {
        const playerIndex = botSeat(turn);
        if (playerIndex === null) return null;
        if (observeClock(events)) {
          events.push(stateEvent());
          return null;
        }
        const board = cloneBoard(state.board);
        const rack = state.players[playerIndex].rack.map((tile) => ({ ...tile }));
        return {
          turn,
          board,
          rack,
          bagCount: state.bag.length,
          isFirstMove: isBoardEmpty(board),
          validation: { ...validationContext(playerIndex), board, rack }
        };
      });
      if (!context) return null;

      const move = await decide(context);

      return exclusive<RoomOutcome | null>(async (events) => {
        const playerIndex = botSeat(turn);
        if (playerIndex === null) return null;
        if (observeClock(events)) {
          events.push(stateEvent());
          return null;
        }
        const outcome = await applyMove(playerIndex, move, events);
        if (outcome.ok || move.type === "pass") return outcome;
        console.warn(`[bot] ${turn.profile.id} move rejected in ${state.id} (${outcome.error.code}), passing`);
        return applyMove(playerIndex, { type: "pass" }, events);
      });
    },

    snapshot: () => buildView(null),
    viewFor: (playerId) => buildView(playerId),
    idle: () => queue.idle(),

    dispose() {
      disposed = true;
      cancelTimers();
    }
  };

  return room;
}
