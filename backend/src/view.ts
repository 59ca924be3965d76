// Player-facing text for the terminal session.

import type {
  Card,
  GameOutcome,
  Scores,
  SeatId,
  Suit,
} from "../../shared/schemas.js";
import { formatCard, formatCardList } from "./util/card-notation.js";
import type { PlayerState } from "./state.js";

export function formatWelcome(gameName: string): string {
  return `Welcome to ${gameName}!`;
}

export function formatNamePrompt(playerNumber: number): string {
  return `Enter name for Player ${playerNumber}: `;
}

export function formatHand(player: PlayerState): string {
  return `${player.name}'s hand: ${formatCardList(player.hand)}`;
}

export function formatFollowPrompt(
  name: string,
  leadSuit: Suit,
  suitForced: boolean
): string {
  return suitForced
    ? `${name}, you must follow suit (${leadSuit}):`
    : `${name}, you have no ${leadSuit}. Play any card: `;
}

export function formatRevealed(card: Card): string {
  return `Revealed from deck: ${formatCard(card)}`;
}

export function formatRedeal(cardsPerPlayer: number): string {
  return `Dealing ${cardsPerPlayer} new cards to each player...`;
}

function formatScores(names: Record<SeatId, string>, scores: Scores): string {
  return `${names.P1}: ${scores.P1} | ${names.P2}: ${scores.P2}`;
}

export function formatScoreLine(
  names: Record<SeatId, string>,
  scores: Scores
): string {
  return `Score → ${formatScores(names, scores)}`;
}

export function formatFinalScoreLine(
  names: Record<SeatId, string>,
  scores: Scores
): string {
  return `Final Score → ${formatScores(names, scores)}`;
}

export function formatOutcome(
  names: Record<SeatId, string>,
  outcome: GameOutcome
): string {
  switch (outcome.kind) {
    case "shoot-the-moon": {
      const [winnerScore, loserScore] = outcome.displayScore;
      return `${names[outcome.winner]} shot the moon and wins ${winnerScore}-${loserScore}!`;
    }
    case "win":
      return `${names[outcome.winner]} wins!`;
    case "tie":
      return "It's a tie!";
  }
}
