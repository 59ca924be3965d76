import type {
  Card,
  GameEvent,
  RulesConfig,
  Scores,
  SeatId,
} from "../../shared/schemas.js";
import { GameError } from "../../shared/errors.js";
import type { Deck } from "./deck.js";
import { buildFullDeck, cardKey } from "./rules/cards.js";
import { createScores, getOtherSeat, totalScore } from "./rules/scoring.js";

export type GamePhase = "setup" | "in-progress" | "over";

export interface PlayerState {
  seat: SeatId;
  name: string;
  /** Held cards, in the order they were dealt. */
  hand: Card[];
}

export interface GameState {
  gameId: string;
  seed: string;
  rules: RulesConfig;
  phase: GamePhase;
  players: Record<SeatId, PlayerState>;
  deck: Deck;
  scores: Scores;
  /** Completed rounds. */
  round: number;
  redealsDone: number;
  leader: SeatId;
  follower: SeatId;
  /** Cards turned up from the deck after each trick. */
  revealed: Card[];
  /** Cards played to finished tricks. */
  played: Card[];
  events: GameEvent[];
}

export const DEFAULT_PLAYER_NAMES: Record<SeatId, string> = {
  P1: "Player 1",
  P2: "Player 2",
};

export function normalizePlayerName(
  raw: string | undefined,
  seat: SeatId
): string {
  const trimmed = raw?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : DEFAULT_PLAYER_NAMES[seat];
}

export function createGameState(options: {
  gameId: string;
  seed: string;
  rules: RulesConfig;
  names: Record<SeatId, string>;
  deck: Deck;
  firstLeader: SeatId;
}): GameState {
  const { gameId, seed, rules, names, deck, firstLeader } = options;
  return {
    gameId,
    seed,
    rules,
    phase: "setup",
    players: {
      P1: { seat: "P1", name: names.P1, hand: [] },
      P2: { seat: "P2", name: names.P2, hand: [] },
    },
    deck,
    scores: createScores(),
    round: 0,
    redealsDone: 0,
    leader: firstLeader,
    follower: getOtherSeat(firstLeader),
    revealed: [],
    played: [],
    events: [],
  };
}

export function appendEvent(state: GameState, event: GameEvent): void {
  state.events.push(event);
}

/** Every card the game is tracking, wherever it currently sits. */
export function collectAllCards(state: GameState): Card[] {
  return [
    ...state.deck.remaining(),
    ...state.players.P1.hand,
    ...state.players.P2.hand,
    ...state.revealed,
    ...state.played,
  ];
}

/**
 * Structural checks for a round boundary. These catch bookkeeping bugs, not
 * player mistakes, so a failure is fatal.
 */
export function assertInvariants(state: GameState): void {
  // 1. Card conservation: each of the 48 cards sits in exactly one place
  const seen = new Map<string, number>();
  for (const card of collectAllCards(state)) {
    const key = cardKey(card);
    seen.set(key, (seen.get(key) ?? 0) + 1);
  }

  const duplicates = [...seen.entries()]
    .filter(([, count]) => count > 1)
    .map(([key]) => key);
  if (duplicates.length > 0) {
    throw new GameError(
      "invariant",
      `Invariant violation: duplicate cards detected: ${duplicates.join(", ")}`
    );
  }

  const missing = buildFullDeck()
    .map(cardKey)
    .filter((key) => !seen.has(key));
  if (missing.length > 0) {
    throw new GameError(
      "invariant",
      `Invariant violation: cards missing from play: ${missing.join(", ")}`
    );
  }

  // 2. Score total tracks completed rounds
  if (totalScore(state.scores) !== state.round) {
    throw new GameError(
      "invariant",
      `Invariant violation: score total ${totalScore(
        state.scores
      )} after ${state.round} rounds`
    );
  }

  // 3. Hands shrink by one per round and grow only by deals
  if (state.phase !== "setup") {
    const expectedHandSize =
      state.rules.initialHandSize +
      state.redealsDone * state.rules.redeal.cardsPerPlayer -
      state.round;
    for (const player of Object.values(state.players)) {
      if (player.hand.length !== expectedHandSize) {
        throw new GameError(
          "invariant",
          `Invariant violation: ${player.seat} holds ${player.hand.length} cards, expected ${expectedHandSize}`
        );
      }
    }
  }

  // 4. Leader and follower are the two different seats
  if (state.leader === state.follower) {
    throw new GameError(
      "invariant",
      `Invariant violation: ${state.leader} is both leader and follower`
    );
  }
}
