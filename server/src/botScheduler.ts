import type { BotProfile, MoveRequest, RoomEvent } from "../../shared/types.js";
import { MAX_BOT_DELAY_MS, MIN_BOT_DELAY_MS } from "./config.js";
import { generateBotMove } from "./botPlayer.js";
import type { BotMoveContext, GameRoom, RoomOutcome } from "./gameRoom.js";
import type { PersistenceGateway } from "./persistence.js";
import type { Scheduler, TimerHandle } from "./scheduler.js";
import type { WordOracle } from "./wordOracle.js";

export type BotSchedulerOptions = {
  persistence: Pick<PersistenceGateway, "loadBotVocabulary">;
  oracle: WordOracle;
  scheduler: Scheduler;
  random?: () => number;
  searchBudgetMs?: number;
};

export interface BotScheduler {
  /** Reacts to a room's published events: arms, re-arms or cancels its bot timer. */
  handle(room: GameRoom, events: RoomEvent[]): void;
  schedule(room: GameRoom): boolean;
  cancel(roomId: string): void;
  pendingEpoch(roomId: string): number | null;
  /** Resolves once every bot turn started so far has settled. */
  idle(): Promise<void>;
  dispose(): void;
}

type PendingTurn = {
  epoch: number;
  timer: TimerHandle;
};

export function botDelayMs(profile: BotProfile, random: () => number = Math.random): number {
  const min = Math.min(MAX_BOT_DELAY_MS, Math.max(MIN_BOT_DELAY_MS, profile.thinkTimeMs.min));
  const max = Math.min(MAX_BOT_DELAY_MS, Math.max(min, profile.thinkTimeMs.max));
  return Math.floor(min + random() * (max - min));
}

export function createBotScheduler({
  persistence,
  oracle,
  scheduler,
  random = Math.random,
  searchBudgetMs
}: BotSchedulerOptions): BotScheduler {
  const pending = new Map<string, PendingTurn>();
  const vocabularies = new Map<string, Promise<string[]>>();
  const running = new Set<Promise<void>>();

  function vocabularyFor(dictionaryId: string): Promise<string[]> {
    const cached = vocabularies.get(dictionaryId);
    if (cached) return cached;
    const loading = persistence.loadBotVocabulary(dictionaryId);
    vocabularies.set(dictionaryId, loading);
    // A failed load is retried on the next turn.
    loading.catch(() => vocabularies.delete(dictionaryId));
    return loading;
  }

  async function decide(context: BotMoveContext): Promise<MoveRequest> {
    const { profile } = context.turn;
    try {
      const vocabulary = await vocabularyFor(context.validation.dictionaryId);
      return await generateBotMove(context, profile, {
        vocabulary,
        oracle,
        random,
        now: () => scheduler.now(),
        budgetMs: searchBudgetMs
      });
    } catch (error) {
      console.error(`[bot] ${profile.id} could not pick a move, passing`, error);
      return { type: "pass" };
    }
  }

  function logOutcome(room: GameRoom, profile: BotProfile, outcome: RoomOutcome | null) {
    if (!outcome) {
      console.log(`[bot] ${profile.id} turn in ${room.id} went stale`);
      return;
    }
    if (!outcome.ok) {
      console.warn(`[bot] ${profile.id} turn in ${room.id} failed: ${outcome.error.code}`);
    }
  }

  function track(task: Promise<void>) {
    running.add(task);
    void task.finally(() => running.delete(task));
  }

  const botScheduler: BotScheduler = {
    handle(room, events) {
      if (events.some((event) => event.type === "game-completed")) {
        botScheduler.cancel(room.id);
        return;
      }
      botScheduler.schedule(room);
    },

    schedule(room) {
      const turn = room.pendingBotTurn();
      if (!turn) {
        botScheduler.cancel(room.id);
        return false;
      }
      const existing = pending.get(room.id);
      if (existing?.epoch === turn.epoch) return true;
      existing?.timer.cancel();

      const delay = botDelayMs(turn.profile, random);
      const timer = scheduler.setTimeout(() => {
        if (pending.get(room.id)?.timer === timer) {
          pending.delete(room.id);
        }
        track(
          room.playBotTurn(turn, decide).then(
            (outcome) => logOutcome(room, turn.profile, outcome),
            (error: unknown) => {
              console.error(`[bot] ${turn.profile.id} turn in ${room.id} crashed`, error);
            }
          )
        );
      }, delay);
      pending.set(room.id, { epoch: turn.epoch, timer });
      return true;
    },

    cancel(roomId) {
      pending.get(roomId)?.timer.cancel();
      pending.delete(roomId);
    },

    pendingEpoch(roomId) {
      return pending.get(roomId)?.epoch ?? null;
    },

    async idle() {
      while (running.size > 0) {
        await Promise.all(Array.from(running));
      }
    },

    dispose() {
      pending.forEach((entry) => entry.timer.cancel());
      pending.clear();
    }
  };

  return botScheduler;
}
