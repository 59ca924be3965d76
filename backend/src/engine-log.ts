import type { GameEvent, SeatId } from "../../shared/schemas.js";
import { formatCardShort } from "./util/card-notation.js";

export interface GameLogger {
  /** Records a game event as a one-line digest. */
  event(event: GameEvent): void;
  debug(message: string): void;
}

/**
 * One-line digest of an event, e.g. `R3 Bob follows 8♥️ (suit forced)`.
 */
export function formatEventDigest(
  event: GameEvent,
  names: Record<SeatId, string>
): string {
  switch (event.type) {
    case "deal":
      return `deal #${event.dealNumber} → ${names[event.seat]}: ${event.cards
        .map(formatCardShort)
        .join(" ")}`;
    case "lead":
      return `R${event.round} ${names[event.seat]} leads ${formatCardShort(
        event.card
      )}`;
    case "follow":
      return `R${event.round} ${names[event.seat]} follows ${formatCardShort(
        event.card
      )} (${event.suitForced ? "suit forced" : "free"})`;
    case "trick":
      return `R${event.round} trick → ${names[event.winner]} (${
        event.role
      }); score ${event.scores.P1}-${event.scores.P2}`;
    case "reveal":
      return event.card
        ? `R${event.round} revealed ${formatCardShort(event.card)}`
        : `R${event.round} deck empty, nothing revealed`;
    case "redeal":
      return `R${event.round} redeal #${event.dealNumber}: ${event.cardsPerPlayer} cards each`;
    case "game-over": {
      const result =
        event.outcome.kind === "tie"
          ? "tie"
          : `${event.outcome.kind} ${names[event.outcome.winner]}`;
      return `game over after ${event.roundsPlayed} rounds (${event.reason}): ${result}`;
    }
  }
}

export function createGameLogger(
  gameId: string,
  names: Record<SeatId, string>,
  enabled: boolean
): GameLogger {
  const prefix = `[Game ${gameId}]`;
  return {
    event(event) {
      if (!enabled) return;
      console.debug(`${prefix} ${formatEventDigest(event, names)}`);
    },
    debug(message) {
      if (!enabled) return;
      console.debug(`${prefix} ${message}`);
    },
  };
}
