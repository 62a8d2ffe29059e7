import { randomUUID } from "node:crypto";
import { createTileBag } from "../../shared/tileBag.js";
import type { BotProfile, MoveError, PlayerIndex, RoomEvent } from "../../shared/types.js";
import type { ServerConfig } from "./config.js";
import { createGameRoom, type GameRoom, type JoinRequest } from "./gameRoom.js";
import { moveError } from "./moveValidator.js";
import type { PersistenceGateway } from "./persistence.js";
import { createSerialQueue } from "./roomQueue.js";
import type { Scheduler, TimerHandle } from "./scheduler.js";
import type { WordOracle } from "./wordOracle.js";

export type RegistryConfig = Pick<
  ServerConfig,
  | "clockMsPerPlayer"
  | "passLimit"
  | "disconnectGraceMs"
  | "roomRemovalDelayMs"
  | "dictionaryId"
  | "boardConfigId"
  | "tileSetId"
  | "gameMode"
>;

export type RoomRegistryOptions = {
  config: RegistryConfig;
  persistence: PersistenceGateway;
  oracle: WordOracle;
  scheduler: Scheduler;
  random?: () => number;
  createRoomId?: () => string;
  onEvents?: (room: GameRoom, events: RoomEvent[]) => void;
};

export type SeatOutcome =
  | {
      ok: true;
      room: GameRoom;
      playerId: string;
      playerIndex: PlayerIndex;
      events: RoomEvent[];
    }
  | {
      ok: false;
      error: MoveError;
    };

export type RoomLookup =
  | {
      ok: true;
      room: GameRoom;
    }
  | {
      ok: false;
      error: MoveError;
    };

export interface RoomRegistry {
  /** Seats the user in the oldest room waiting for a human opponent, or opens a new one. */
  join(user: JoinRequest): Promise<SeatOutcome>;
  joinRoom(roomId: string, user: JoinRequest): Promise<SeatOutcome>;
  attachBot(roomId: string, botId: string): Promise<SeatOutcome>;
  listBots(): Promise<BotProfile[]>;
  get(roomId: string): GameRoom | null;
  require(roomId: string): RoomLookup;
  list(): GameRoom[];
  tickAll(): Promise<void>;
  disconnect(playerId: string): Promise<void>;
  remove(roomId: string): Promise<boolean>;
  scheduleRemoval(roomId: string): void;
  idle(): Promise<void>;
  dispose(): void;
}

type BotTarget =
  | {
      ok: true;
      room: GameRoom;
      profile: BotProfile;
    }
  | {
      ok: false;
      error: MoveError;
    };

function roomNotFound(roomId: string): { ok: false; error: MoveError } {
  return { ok: false, error: moveError("ROOM_NOT_FOUND", `Room ${roomId} does not exist.`) };
}

export function createRoomRegistry({
  config,
  persistence,
  oracle,
  scheduler,
  random = Math.random,
  createRoomId = randomUUID,
  onEvents
}: RoomRegistryOptions): RoomRegistry {
  const rooms = new Map<string, GameRoom>();
  const removals = new Map<string, TimerHandle>();
  const claims = new Map<string, Set<string>>();
  const queue = createSerialQueue("Room registry");
  let botProfiles: Promise<BotProfile[]> | null = null;

  function publish(room: GameRoom, events: RoomEvent[]) {
    if (events.some((event) => event.type === "game-completed")) {
      registry.scheduleRemoval(room.id);
    }
    onEvents?.(room, events);
  }

  async function openRoom(): Promise<GameRoom> {
    const [board, distribution] = await Promise.all([
      persistence.loadBoardConfig(config.boardConfigId),
      persistence.loadTileDistribution(config.tileSetId)
    ]);
    const room = createGameRoom({
      id: createRoomId(),
      board,
      bag: createTileBag(distribution, random),
      dictionaryId: config.dictionaryId,
      mode: config.gameMode,
      clockMs: config.clockMsPerPlayer,
      passLimit: config.passLimit,
      disconnectGraceMs: config.disconnectGraceMs,
      oracle,
      scheduler,
      random,
      onEvents: publish
    });
    rooms.set(room.id, room);
    console.log(`[room] Created ${room.id} (${config.gameMode}, ${config.dictionaryId})`);
    return room;
  }

  /** Promises a seat in `room` to `userId` until their join settles. */
  function claim(room: GameRoom, userId: string): GameRoom {
    const claimants = claims.get(room.id) ?? new Set<string>();
    claimants.add(userId);
    claims.set(room.id, claimants);
    return room;
  }

  function releaseClaim(roomId: string, userId: string) {
    const claimants = claims.get(roomId);
    if (!claimants) return;
    claimants.delete(userId);
    if (claimants.size === 0) {
      claims.delete(roomId);
    }
  }

  function pendingSeats(room: GameRoom): number {
    const claimants = Array.from(claims.get(room.id) ?? []);
    return claimants.filter((userId) => !room.hasPlayer(userId)).length;
  }

  /** A waiting room with exactly one seat left for a human, counting seats already promised. */
  function acceptsOpponent(room: GameRoom): boolean {
    if (room.status() !== "waiting") return false;
    const pending = pendingSeats(room);
    if (room.playerCount() === 0) return pending === 1;
    return pending === 0 && room.isJoinable();
  }

  function isEmptyWaitingRoom(room: GameRoom): boolean {
    return rooms.get(room.id) === room && room.status() === "waiting" && room.playerCount() === 0 && !claims.has(room.id);
  }

  /** Runs outside the registry queue; only the room's own queue is held. */
  async function seat(room: GameRoom, user: JoinRequest): Promise<SeatOutcome> {
    try {
      const outcome = await room.join(user);
      if (!outcome.ok) return outcome;
      return { ...outcome, room };
    } finally {
      releaseClaim(room.id, user.userId);
    }
  }

  function dropRoom(roomId: string): boolean {
    const room = rooms.get(roomId);
    removals.get(roomId)?.cancel();
    removals.delete(roomId);
    if (!room) return false;
    room.dispose();
    rooms.delete(roomId);
    console.log(`[room] Removed ${roomId}`);
    return true;
  }

  const registry: RoomRegistry = {
    async join(user) {
      const room = await queue.run(async () => {
        for (const candidate of rooms.values()) {
          const status = candidate.status();
          if (candidate.hasPlayer(user.userId) && status !== "completed" && status !== "abandoned") {
            return claim(candidate, user.userId);
          }
        }
        for (const candidate of rooms.values()) {
          if (acceptsOpponent(candidate)) {
            return claim(candidate, user.userId);
          }
        }
        return claim(await openRoom(), user.userId);
      });
      return seat(room, user);
    },

    async joinRoom(roomId, user) {
      const room = await queue.run(() => {
        const found = rooms.get(roomId);
        return found ? claim(found, user.userId) : null;
      });
      if (!room) return roomNotFound(roomId);
      return seat(room, user);
    },

    async attachBot(roomId, botId) {
      const target = await queue.run<BotTarget>(async () => {
        const room = rooms.get(roomId);
        if (!room) return roomNotFound(roomId);
        const profile = (await registry.listBots()).find((entry) => entry.id === botId);
        if (!profile) {
          return { ok: false, error: moveError("BOT_NOT_FOUND", `No bot named ${botId}.`) };
        }
        return { ok: true, room: claim(room, profile.id), profile };
      });
      if (!target.ok) return target;

      const { room, profile } = target;
      try {
        const outcome = await room.attachBot(profile);
        if (!outcome.ok) return outcome;
        console.log(`[bot] ${profile.id} joined ${room.id}`);
        return { ...outcome, room };
      } finally {
        releaseClaim(room.id, profile.id);
      }
    },

    listBots() {
      if (!botProfiles) {
        const loading = persistence.listBotProfiles();
        botProfiles = loading;
        loading.catch(() => {
          botProfiles = null;
        });
      }
      return botProfiles;
    },

    get(roomId) {
      return rooms.get(roomId) ?? null;
    },

    require(roomId) {
      const room = rooms.get(roomId);
      return room ? { ok: true, room } : roomNotFound(roomId);
    },

    list() {
      return Array.from(rooms.values());
    },

    async tickAll() {
      const active = Array.from(rooms.values()).filter((room) => room.status() === "active");
      const results = await Promise.allSettled(active.map((room) => room.tick()));
      results.forEach((result, index) => {
        if (result.status === "rejected") {
          console.error(`[room] ${active[index].id} tick failed`, result.reason);
        }
      });
    },

    async disconnect(playerId) {
      const seated = Array.from(rooms.values()).filter((room) => room.hasPlayer(playerId));
      await Promise.all(seated.map((room) => room.disconnect(playerId)));
      await queue.run(() => {
        seated.filter(isEmptyWaitingRoom).forEach((room) => dropRoom(room.id));
      });
    },

    remove(roomId) {
      return queue.run(() => dropRoom(roomId));
    },

    scheduleRemoval(roomId) {
      if (removals.has(roomId)) return;
      removals.set(
        roomId,
        scheduler.setTimeout(() => {
          removals.delete(roomId);
          registry.remove(roomId).catch((error: unknown) => {
            console.error(`[room] ${roomId} removal failed`, error);
          });
        }, config.roomRemovalDelayMs)
      );
    },

    idle() {
      return queue.idle();
    },

    dispose() {
      removals.forEach((timer) => timer.cancel());
      removals.clear();
      rooms.forEach((room) => room.dispose());
      rooms.clear();
    }
  };

  return registry;
}
