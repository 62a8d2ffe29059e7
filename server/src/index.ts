import { createServer } from "node:http";
import { Server } from "socket.io";
import { createApp } from "./app.js";
import { createBotScheduler } from "./botScheduler.js";
import { loadConfig } from "./config.js";
import {
  createGateway,
  type ClientToServerEvents,
  type Gateway,
  type ServerToClientEvents,
  type SocketData
} from "./gateway.js";
import type { GameRoom } from "./gameRoom.js";
import { createFilePersistence } from "./persistence.js";
import { createRoomRegistry } from "./roomRegistry.js";
import { systemScheduler } from "./scheduler.js";
import { createWordOracle } from "./wordOracle.js";
import type { RoomEvent } from "../../shared/types.js";

const config = loadConfig();

const persistence = createFilePersistence({
  dataDir: config.dataDir,
  wordListPaths: config.wordListPath ? { [config.dictionaryId]: config.wordListPath } : {}
});
const oracle = createWordOracle({
  dictionary: persistence,
  cacheSize: config.wordCacheSize,
  timeoutMs: config.dictionaryTimeoutMs
});
const bots = createBotScheduler({ persistence, oracle, scheduler: systemScheduler });

let gateway: Gateway | null = null;

function onRoomEvents(room: GameRoom, events: RoomEvent[]) {
  gateway?.publish(room, events);
  bots.handle(room, events);
}

const registry = createRoomRegistry({
  config,
  persistence,
  oracle,
  scheduler: systemScheduler,
  onEvents: onRoomEvents
});

const app = createApp({ registry });
const httpServer = createServer(app);
const io = new Server<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketData>(httpServer, {
  cors: { origin: "*" }
});
gateway = createGateway({ io, registry });

// Load the word list at boot.
persistence.loadDictionaryEntry(config.dictionaryId, "A").catch((error: unknown) => {
  console.error(`[dictionary] Failed to load "${config.dictionaryId}"`, error);
});

const tickInterval = setInterval(() => {
  registry.tickAll().catch((error: unknown) => {
    console.error("[server] Tick failed", error);
  });
}, config.tickIntervalMs);

function shutdown(signal: string) {
  console.log(`[server] ${signal} received, shutting down`);
  clearInterval(tickInterval);
  bots.dispose();
  registry.dispose();
  io.close(() => process.exit(0));
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

httpServer.listen(config.port, () => {
  console.log(`[server] Listening on port ${config.port}`);
});
