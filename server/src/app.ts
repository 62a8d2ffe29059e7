import cors from "cors";
import express from "express";
import type { MoveError, MoveErrorCode } from "../../shared/types.js";
import { moveError } from "./moveValidator.js";
import type { RoomRegistry } from "./roomRegistry.js";

export function statusForError(code: MoveErrorCode): number {
  switch (code) {
    case "ROOM_NOT_FOUND":
    case "BOT_NOT_FOUND":
      return 404;
    case "ROOM_FULL":
    case "GAME_NOT_ACTIVE":
      return 409;
    case "DICTIONARY_UNAVAILABLE":
      return 503;
    case "INTERNAL_ERROR":
      return 500;
    default:
      return 400;
  }
}

type AppOptions = {
  registry: RoomRegistry;
  startedAt?: number;
};

export function createApp({ registry, startedAt = Date.now() }: AppOptions): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  function sendError(res: express.Response, error: MoveError) {
    res.status(statusForError(error.code)).json(error);
  }

  app.get("/health", (_req, res) => {
    const rooms = registry.list();
    res.json({
      status: "ok",
      uptimeMs: Date.now() - startedAt,
      rooms: rooms.length,
      activeRooms: rooms.filter((room) => room.status() === "active").length
    });
  });

  app.get("/bots", (_req, res) => {
    registry
      .listBots()
      .then((bots) => res.json(bots))
      .catch((error: unknown) => {
        console.error("[server] Failed to list bots", error);
        sendError(res, moveError("INTERNAL_ERROR", "Bot profiles are unavailable."));
      });
  });

  app.get("/rooms/:roomId", (req, res) => {
    const lookup = registry.require(req.params.roomId);
    if (!lookup.ok) {
      sendError(res, lookup.error);
      return;
    }
    res.json(lookup.room.snapshot());
  });

  app.post("/rooms/:roomId/bot/:botId", (req, res) => {
    registry
      .attachBot(req.params.roomId, req.params.botId)
      .then((outcome) => {
        if (!outcome.ok) {
          sendError(res, outcome.error);
          return;
        }
        res.status(201).json(outcome.room.snapshot());
      })
      .catch((error: unknown) => {
        console.error(`[server] Failed to attach ${req.params.botId} to ${req.params.roomId}`, error);
        sendError(res, moveError("INTERNAL_ERROR", "Could not attach the bot."));
      });
  });

  return app;
}
