import type { Server, Socket } from "socket.io";
import type {
  CommittedMove,
  GameEndReason,
  MoveError,
  MoveRequest,
  Placement,
  PlayerIndex,
  RoomEvent,
  RoomView,
  Tile
} from "../../shared/types.js";
import type { GameRoom, RoomOutcome } from "./gameRoom.js";
import { moveError } from "./moveValidator.js";
import type { RoomRegistry, SeatOutcome } from "./roomRegistry.js";

export type CompletedPayload = {
  winner: string | null;
  reason: GameEndReason;
  finalScores: [number, number];
};

export interface ServerToClientEvents {
  "game:state": (view: RoomView) => void;
  "move:committed": (move: CommittedMove) => void;
  "turn:changed": (payload: { playerId: string; playerIndex: PlayerIndex }) => void;
  "timer:sync": (payload: { player1Ms: number; player2Ms: number }) => void;
  "timer:expired": (payload: { side: PlayerIndex; playerId: string }) => void;
  "game:completed": (payload: CompletedPayload) => void;
  error: (payload: MoveError) => void;
  pong: (payload: { at: number }) => void;
}

export interface ClientToServerEvents {
  "game:join": (payload: unknown) => void;
  "game:start": (payload: unknown) => void;
  "game:move": (payload: unknown) => void;
  "game:pass": (payload: unknown) => void;
  "game:challenge": (payload: unknown) => void;
  "game:resign": (payload: unknown) => void;
  "game:pause": (payload: unknown) => void;
  "game:resume": (payload: unknown) => void;
  "game:bot-attach": (payload: unknown) => void;
  ping: () => void;
}

export type SocketData = {
  userId?: string;
  roomId?: string;
};

export type GameServer = Server<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketData>;
type GameSocket = Socket<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketData>;

export type Channel = { kind: "room"; roomId: string } | { kind: "player"; playerId: string };

export type OutboundMessage =
  | { to: Channel; event: "game:state"; payload: RoomView }
  | { to: Channel; event: "move:committed"; payload: CommittedMove }
  | { to: Channel; event: "turn:changed"; payload: { playerId: string; playerIndex: PlayerIndex } }
  | { to: Channel; event: "timer:sync"; payload: { player1Ms: number; player2Ms: number } }
  | { to: Channel; event: "timer:expired"; payload: { side: PlayerIndex; playerId: string } }
  | { to: Channel; event: "game:completed"; payload: CompletedPayload };

const MAX_NAME_LENGTH = 24;
const MAX_ID_LENGTH = 64;

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isIdentifier(value: unknown): value is string {
  return typeof value === "string" && value.length > 0 && value.length <= MAX_ID_LENGTH;
}

export function playerChannel(playerId: string): string {
  return `player:${playerId}`;
}

function sanitizeName(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim().slice(0, MAX_NAME_LENGTH);
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseJoinPayload(raw: unknown): { roomId: string | null; userId: string; name?: string } | null {
  if (!isObjectRecord(raw) || !isIdentifier(raw.userId)) return null;
  if (raw.roomId !== undefined && raw.roomId !== null && !isIdentifier(raw.roomId)) return null;
  const name = sanitizeName(raw.name);
  return {
    roomId: isIdentifier(raw.roomId) ? raw.roomId : null,
    userId: raw.userId,
    ...(name ? { name } : {})
  };
}

export function parseRoomPayload(raw: unknown): { roomId: string } | null {
  if (!isObjectRecord(raw) || !isIdentifier(raw.roomId)) return null;
  return { roomId: raw.roomId };
}

export function parseBotAttachPayload(raw: unknown): { roomId: string; botId: string } | null {
  if (!isObjectRecord(raw) || !isIdentifier(raw.roomId) || !isIdentifier(raw.botId)) return null;
  return { roomId: raw.roomId, botId: raw.botId };
}

function parsePlacement(raw: unknown): Placement | null {
  if (!isObjectRecord(raw)) return null;
  const { row, col, letter, isBlank } = raw;
  if (typeof row !== "number" || !Number.isInteger(row)) return null;
  if (typeof col !== "number" || !Number.isInteger(col)) return null;
  if (typeof letter !== "string" || letter.length === 0 || letter.length > 2) return null;
  return { row, col, letter, isBlank: isBlank === true };
}

export function parseMoveRequest(raw: unknown): MoveRequest | null {
  if (!isObjectRecord(raw)) return null;
  switch (raw.type) {
    case "play": {
      if (!Array.isArray(raw.placements)) return null;
      const placements: Placement[] = [];
      for (const entry of raw.placements) {
        const placement = parsePlacement(entry);
        if (!placement) return null;
        placements.push(placement);
      }
      return { type: "play", placements };
    }
    case "exchange": {
      if (!Array.isArray(raw.tileIds)) return null;
      const tileIds = raw.tileIds.filter((tileId): tileId is string => typeof tileId === "string");
      if (tileIds.length !== raw.tileIds.length) return null;
      return { type: "exchange", tileIds };
    }
    case "pass":
      return { type: "pass" };
    case "challenge":
      return { type: "challenge" };
    default:
      return null;
  }
}

export function parseMovePayload(raw: unknown): { roomId: string; move: MoveRequest } | null {
  const room = parseRoomPayload(raw);
  if (!room || !isObjectRecord(raw)) return null;
  const move = parseMoveRequest(raw.move);
  return move ? { roomId: room.roomId, move } : null;
}

/** Private view for one seat: the shared view plus that seat's rack. */
export function withRack(view: RoomView, playerId: string, rack: Tile[]): RoomView {
  return {
    ...view,
    players: view.players.map((player) => (player.id === playerId ? { ...player, rack } : player))
  };
}

/**
 * Maps room events to socket messages. Racks travel only on each player's own
 * channel; everything else goes to the whole room.
 */
export function buildOutboundMessages(roomId: string, events: RoomEvent[]): OutboundMessage[] {
  const room: Channel = { kind: "room", roomId };
  const messages: OutboundMessage[] = [];
  for (const event of events) {
    switch (event.type) {
      case "state":
        event.view.players.forEach((player) => {
          if (player.kind === "bot") return;
          messages.push({
            to: { kind: "player", playerId: player.id },
            event: "game:state",
            payload: withRack(event.view, player.id, event.racks[player.id] ?? [])
          });
        });
        break;
      case "move-committed":
        messages.push({ to: room, event: "move:committed", payload: event.move });
        break;
      case "turn-changed":
        messages.push({
          to: room,
          event: "turn:changed",
          payload: { playerId: event.playerId, playerIndex: event.playerIndex }
        });
        break;
      case "timer-sync":
        messages.push({
          to: room,
          event: "timer:sync",
          payload: { player1Ms: event.timer.player1Ms, player2Ms: event.timer.player2Ms }
        });
        break;
      case "timer-expired":
        messages.push({ to: room, event: "timer:expired", payload: { side: event.side, playerId: event.playerId } });
        break;
      case "game-completed":
        messages.push({
          to: room,
          event: "game:completed",
          payload: {
            winner: event.result.winnerId,
            reason: event.result.reason,
            finalScores: event.result.finalScores
          }
        });
        break;
    }
  }
  return messages;
}

function deliver(io: GameServer, message: OutboundMessage) {
  const target = io.to(message.to.kind === "room" ? message.to.roomId : playerChannel(message.to.playerId));
  switch (message.event) {
    case "game:state":
      target.emit("game:state", message.payload);
      break;
    case "move:committed":
      target.emit("move:committed", message.payload);
      break;
    case "turn:changed":
      target.emit("turn:changed", message.payload);
      break;
    case "timer:sync":
      target.emit("timer:sync", message.payload);
      break;
    case "timer:expired":
      target.emit("timer:expired", message.payload);
      break;
    case "game:completed":
      target.emit("game:completed", message.payload);
      break;
  }
}

export type Gateway = {
  publish(room: GameRoom, events: RoomEvent[]): void;
};

type GatewayOptions = {
  io: GameServer;
  registry: RoomRegistry;
  now?: () => number;
};

function emitError(socket: GameSocket, error: MoveError) {
  socket.emit("error", error);
}

function invalidPayload(socket: GameSocket, event: string) {
  emitError(socket, moveError("INVALID_PAYLOAD", `Malformed ${event} payload.`));
}

export function createGateway({ io, registry, now = Date.now }: GatewayOptions): Gateway {
  // A user counts as connected while any of their sockets is.
  const socketsByUser = new Map<string, Set<string>>();

  function disconnectUser(userId: string) {
    registry.disconnect(userId).catch((error: unknown) => {
      console.error(`[server] disconnect of ${userId} failed`, error);
    });
  }

  function releaseSocket(socket: GameSocket) {
    const userId = socket.data.userId;
    if (!userId) return;
    const sockets = socketsByUser.get(userId);
    sockets?.delete(socket.id);
    if (sockets && sockets.size > 0) return;
    socketsByUser.delete(userId);
    disconnectUser(userId);
  }

  function bindSocket(socket: GameSocket, userId: string) {
    const previous = socket.data.userId;
    if (previous && previous !== userId) releaseSocket(socket);
    const sockets = socketsByUser.get(userId) ?? new Set<string>();
    sockets.add(socket.id);
    socketsByUser.set(userId, sockets);
    socket.data.userId = userId;
  }

  /** Resolves the room a socket may act on, or reports why it may not. */
  function seatedRoom(socket: GameSocket, roomId: string): { room: GameRoom; userId: string } | null {
    const userId = socket.data.userId;
    const lookup = registry.require(roomId);
    if (!lookup.ok) {
      emitError(socket, lookup.error);
      return null;
    }
    if (!userId || !lookup.room.hasPlayer(userId)) {
      emitError(socket, moveError("NOT_IN_ROOM", "Join the room first."));
      return null;
    }
    return { room: lookup.room, userId };
  }

  function reportOutcome(socket: GameSocket, outcome: RoomOutcome | SeatOutcome) {
    if (!outcome.ok) {
      emitError(socket, outcome.error);
    }
  }

  function handleFailure(socket: GameSocket, event: string) {
    return (error: unknown) => {
      console.error(`[server] ${event} from ${socket.id} failed`, error);
      emitError(socket, moveError("INTERNAL_ERROR", "The room could not process that request."));
    };
  }

  function submit(socket: GameSocket, roomId: string, move: MoveRequest, event: string) {
    const seated = seatedRoom(socket, roomId);
    if (!seated) return;
    seated.room
      .submitMove(seated.userId, move)
      .then((outcome) => reportOutcome(socket, outcome))
      .catch(handleFailure(socket, event));
  }

  io.on("connection", (socket) => {
    socket.on("game:join", (raw) => {
      const payload = parseJoinPayload(raw);
      if (!payload) {
        invalidPayload(socket, "game:join");
        return;
      }
      const user = { userId: payload.userId, name: payload.name };
      const joining = payload.roomId ? registry.joinRoom(payload.roomId, user) : registry.join(user);
      joining
        .then((outcome) => {
          if (!outcome.ok) {
            emitError(socket, outcome.error);
            return;
          }
          if (socket.disconnected) {
            if (!socketsByUser.has(outcome.playerId)) disconnectUser(outcome.playerId);
            return;
          }
          const previousRoomId = socket.data.roomId;
          if (previousRoomId && previousRoomId !== outcome.room.id) {
            void socket.leave(previousRoomId);
          }
          bindSocket(socket, outcome.playerId);
          socket.data.roomId = outcome.room.id;
          void socket.join([outcome.room.id, playerChannel(outcome.playerId)]);
          socket.emit("game:state", outcome.room.viewFor(outcome.playerId));
        })
        .catch(handleFailure(socket, "game:join"));
    });

    socket.on("game:start", (raw) => {
      const payload = parseRoomPayload(raw);
      if (!payload) {
        invalidPayload(socket, "game:start");
        return;
      }
      const seated = seatedRoom(socket, payload.roomId);
      if (!seated) return;
      seated.room
        .start()
        .then((outcome) => reportOutcome(socket, outcome))
        .catch(handleFailure(socket, "game:start"));
    });

    socket.on("game:move", (raw) => {
      const payload = parseMovePayload(raw);
      if (!payload) {
        invalidPayload(socket, "game:move");
        return;
      }
      submit(socket, payload.roomId, payload.move, "game:move");
    });

    socket.on("game:pass", (raw) => {
      const payload = parseRoomPayload(raw);
      if (!payload) {
        invalidPayload(socket, "game:pass");
        return;
      }
      submit(socket, payload.roomId, { type: "pass" }, "game:pass");
    });

    socket.on("game:challenge", (raw) => {
      const payload = parseRoomPayload(raw);
      if (!payload) {
        invalidPayload(socket, "game:challenge");
        return;
      }
      submit(socket, payload.roomId, { type: "challenge" }, "game:challenge");
    });

    socket.on("game:resign", (raw) => {
      const payload = parseRoomPayload(raw);
      if (!payload) {
        invalidPayload(socket, "game:resign");
        return;
      }
      const seated = seatedRoom(socket, payload.roomId);
      if (!seated) return;
      seated.room
        .resign(seated.userId)
        .then((outcome) => reportOutcome(socket, outcome))
        .catch(handleFailure(socket, "game:resign"));
    });

    socket.on("game:pause", (raw) => {
      const payload = parseRoomPayload(raw);
      if (!payload) {
        invalidPayload(socket, "game:pause");
        return;
      }
      const seated = seatedRoom(socket, payload.roomId);
      if (!seated) return;
      seated.room
        .pause()
        .then((outcome) => reportOutcome(socket, outcome))
        .catch(handleFailure(socket, "game:pause"));
    });

    socket.on("game:resume", (raw) => {
      const payload = parseRoomPayload(raw);
      if (!payload) {
        invalidPayload(socket, "game:resume");
        return;
      }
      const seated = seatedRoom(socket, payload.roomId);
      if (!seated) return;
      seated.room
        .resume()
        .then((outcome) => reportOutcome(socket, outcome))
        .catch(handleFailure(socket, "game:resume"));
    });

    socket.on("game:bot-attach", (raw) => {
      const payload = parseBotAttachPayload(raw);
      if (!payload) {
        invalidPayload(socket, "game:bot-attach");
        return;
      }
      const seated = seatedRoom(socket, payload.roomId);
      if (!seated) return;
      registry
        .attachBot(payload.roomId, payload.botId)
        .then((outcome) => reportOutcome(socket, outcome))
        .catch(handleFailure(socket, "game:bot-attach"));
    });

    socket.on("ping", () => {
      socket.emit("pong", { at: now() });
    });

    socket.on("disconnect", () => {
      releaseSocket(socket);
    });
  });

  return {
    publish(room, events) {
      buildOutboundMessages(room.id, events).forEach((message) => deliver(io, message));
    }
  };
}
