/**
 * Lead/follow legality and trick resolution.
 *
 * - The leader may lead any card in hand.
 * - The follower must play the lead suit when holding it; otherwise any card.
 * - Same suit: higher value wins. Off-suit follow: the leader wins, whatever
 *   the values and whether or not following was possible.
 */

import type { Card, Suit, TrickRole } from "../../../shared/schemas.js";
import { GameError } from "../../../shared/errors.js";
import { cardsEqual } from "./cards.js";

export interface FollowOptions {
  candidates: Card[];
  /** True when the follower holds the lead suit and must play it. */
  suitForced: boolean;
}

export function legalLeadCards(hand: readonly Card[]): Card[] {
  if (hand.length === 0) {
    throw new GameError("invariant", "Cannot lead from an empty hand");
  }
  return [...hand];
}

export function legalFollowCards(
  hand: readonly Card[],
  leadSuit: Suit
): FollowOptions {
  if (hand.length === 0) {
    throw new GameError("invariant", "Cannot follow from an empty hand");
  }
  const sameSuit = hand.filter((c) => c.suit === leadSuit);
  if (sameSuit.length > 0) {
    return { candidates: sameSuit, suitForced: true };
  }
  return { candidates: [...hand], suitForced: false };
}

export function isLegalFollow(
  hand: readonly Card[],
  leadSuit: Suit,
  card: Card
): boolean {
  const { candidates } = legalFollowCards(hand, leadSuit);
  return candidates.some((c) => cardsEqual(c, card));
}

export function resolveTrick(leadCard: Card, followCard: Card): TrickRole {
  if (followCard.suit !== leadCard.suit) {
    return "leader";
  }
  // No two cards of one suit share a value, so this is never a tie.
  return followCard.value > leadCard.value ? "follower" : "leader";
}
