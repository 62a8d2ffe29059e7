import type { PlayerIndex, TimerSnapshot } from "../../shared/types.js";

export interface GameClock {
  start(side: PlayerIndex, now: number): void;
  /** Finalizes the outgoing side, then runs the other one. Returns a side that expired while finalizing. */
  switch(now: number): PlayerIndex | null;
  pause(now: number): PlayerIndex | null;
  resume(now: number): void;
  stop(now: number): PlayerIndex | null;
  /** Returns the side whose counter reached zero on this tick, at most once per side. */
  tick(now: number): PlayerIndex | null;
  remaining(side: PlayerIndex): number;
  running(): PlayerIndex | null;
  isPaused(): boolean;
  snapshot(): TimerSnapshot;
}

export function otherSide(side: PlayerIndex): PlayerIndex {
  return side === 0 ? 1 : 0;
}

export function createGameClock(totalMs: number, now: number): GameClock {
  if (!Number.isInteger(totalMs) || totalMs <= 0) {
    throw new Error(`Clock total must be a positive integer of milliseconds, got ${totalMs}`);
  }

  const remaining: [number, number] = [totalMs, totalMs];
  const reported = new Set<PlayerIndex>();
  let running: PlayerIndex | null = null;
  let paused = false;
  let lastTick = Math.floor(now);

  function applyElapsed(at: number): PlayerIndex | null {
    const current = Math.floor(at);
    if (running === null || paused) {
      lastTick = Math.max(lastTick, current);
      return null;
    }
    const elapsed = Math.max(0, current - lastTick);
    lastTick = Math.max(lastTick, current);
    remaining[running] = Math.max(0, remaining[running] - elapsed);
    if (remaining[running] === 0 && !reported.has(running)) {
      reported.add(running);
      return running;
    }
    return null;
  }

  return {
    start(side, at) {
      running = side;
      paused = false;
      lastTick = Math.floor(at);
    },

    switch(at) {
      if (running === null) {
        throw new Error("Cannot switch a clock that has not started");
      }
      const expired = applyElapsed(at);
      running = otherSide(running);
      return expired;
    },

    pause(at) {
      const expired = applyElapsed(at);
      paused = true;
      return expired;
    },

    resume(at) {
      paused = false;
      lastTick = Math.floor(at);
    },

    stop(at) {
      const expired = applyElapsed(at);
      running = null;
      paused = false;
      return expired;
    },

    tick(at) {
      return applyElapsed(at);
    },

    remaining(side) {
      return remaining[side];
    },

    running() {
      return running;
    },

    isPaused() {
      return paused;
    },

    snapshot() {
      return {
        player1Ms: remaining[0],
        player2Ms: remaining[1],
        running,
        paused
      };
    }
  };
}
