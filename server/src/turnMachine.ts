import { RACK_SIZE, drawTiles, rackValue } from "../../shared/tileBag.js";
import type { GameEndReason, GameResult, MoveType, PlayerIndex } from "../../shared/types.js";
import { otherSide } from "./clock.js";
import type { RoomState } from "./gameRoom.js";

export class RoomInvariantError extends Error {
  constructor(roomId: string, detail: string) {
    super(`Room ${roomId} is corrupted: ${detail}`);
    this.name = "RoomInvariantError";
  }
}

export function chooseStartingPlayer(random: () => number): PlayerIndex {
  return random() < 0.5 ? 0 : 1;
}

/** waiting -> active: deals both racks and starts the clock on a random side. */
export function activateRoom(state: RoomState, random: () => number, now: number): PlayerIndex {
  if (state.status !== "waiting" || state.players.length !== 2) {
    throw new RoomInvariantError(state.id, `cannot activate from ${state.status} with ${state.players.length} players`);
  }
  state.players.forEach((player) => {
    player.rack.push(...drawTiles(state.bag, RACK_SIZE - player.rack.length));
  });
  const starting = chooseStartingPlayer(random);
  state.currentPlayerIndex = starting;
  state.status = "active";
  state.clock.start(starting, now);
  state.epoch += 1;
  return starting;
}

/**
 * Flips the turn cursor together with the clock. Returns the outgoing side if
 * its time ran out while the move was being committed.
 */
export function advanceTurn(state: RoomState, now: number): PlayerIndex | null {
  const expired = state.clock.switch(now);
  state.currentPlayerIndex = otherSide(state.currentPlayerIndex);
  return expired;
}

export function recordPassCount(state: RoomState, type: MoveType): void {
  if (type === "play" || type === "exchange") {
    state.consecutivePasses = 0;
  } else if (type === "pass") {
    state.consecutivePasses += 1;
  }
}

export function completionReason(
  state: RoomState,
  moverIndex: PlayerIndex,
  type: MoveType,
  passLimit: number
): GameEndReason | null {
  if (state.consecutivePasses >= passLimit) return "pass-limit";
  if (type === "play" && state.bag.length === 0 && state.players[moverIndex].rack.length === 0) {
    return "tiles-exhausted";
  }
  return null;
}

function decideByScore(scores: [number, number], rackValues: [number, number]): PlayerIndex | null {
  if (scores[0] !== scores[1]) return scores[0] > scores[1] ? 0 : 1;
  if (rackValues[0] !== rackValues[1]) return rackValues[0] < rackValues[1] ? 0 : 1;
  return null;
}

type SettleOptions = {
  loserIndex?: PlayerIndex;
  outPlayerIndex?: PlayerIndex;
};

/**
 * Ends the game. Rack penalties apply only to endings decided on the board;
 * timeouts, resignations and disconnects name the loser directly.
 */
export function settleGame(
  state: RoomState,
  reason: GameEndReason,
  now: number,
  { loserIndex, outPlayerIndex }: SettleOptions = {}
): GameResult {
  state.clock.stop(now);

  const rackValues: [number, number] = [
    rackValue(state.players[0]?.rack ?? []),
    rackValue(state.players[1]?.rack ?? [])
  ];

  let winnerIndex: PlayerIndex | null = null;
  let loser: PlayerIndex | null = loserIndex ?? null;

  if (reason === "pass-limit" || reason === "tiles-exhausted") {
    state.players.forEach((player, index) => {
      player.score = Math.max(0, player.score - rackValues[index]);
    });
    if (outPlayerIndex !== undefined) {
      state.players[outPlayerIndex].score += rackValues[otherSide(outPlayerIndex)];
    }
    const scores: [number, number] = [state.players[0].score, state.players[1].score];
    winnerIndex = decideByScore(scores, rackValues);
    loser = winnerIndex === null ? null : otherSide(winnerIndex);
  } else if (loser !== null) {
    winnerIndex = otherSide(loser);
  }

  const result: GameResult = {
    reason,
    winnerIndex,
    winnerId: winnerIndex === null ? null : (state.players[winnerIndex]?.id ?? null),
    loserIndex: loser,
    finalScores: [state.players[0]?.score ?? 0, state.players[1]?.score ?? 0],
    endedAt: now
  };

  state.status = reason === "disconnect" || reason === "internal-error" ? "abandoned" : "completed";
  state.result = result;
  state.epoch += 1;
  return result;
}

export function assertRoomInvariants(state: RoomState): void {
  if (state.currentPlayerIndex !== 0 && state.currentPlayerIndex !== 1) {
    throw new RoomInvariantError(state.id, `turn cursor is ${String(state.currentPlayerIndex)}`);
  }
  const timer = state.clock.snapshot();
  if (timer.player1Ms < 0 || timer.player2Ms < 0) {
    throw new RoomInvariantError(state.id, "negative time remaining");
  }
  if (state.players.length > 2) {
    throw new RoomInvariantError(state.id, `${state.players.length} players seated`);
  }
  if (state.players.some((player) => player.rack.length > RACK_SIZE || player.score < 0)) {
    throw new RoomInvariantError(state.id, "rack or score out of range");
  }
  if (state.status === "active" || state.status === "paused") {
    if (state.players.length !== 2) {
      throw new RoomInvariantError(state.id, `${state.status} with ${state.players.length} players`);
    }
    if (timer.running !== state.currentPlayerIndex) {
      throw new RoomInvariantError(state.id, "clock side does not match the turn cursor");
    }
    if (state.status === "active" && timer.paused) {
      throw new RoomInvariantError(state.id, "clock paused while the game is active");
    }
  }
}
