/**
 * Card notation for user-facing lines and compact diagnostics.
 *
 * Player-facing text spells cards out ("Queen of Hearts"); debug digests use
 * the short form ("Q♥️") so a whole trick fits on one line.
 */

import type { Card, Rank, Suit } from "../../../shared/schemas.js";

export const SUIT_SYMBOLS: Record<Suit, string> = {
  Clubs: "♣️",
  Diamonds: "♦️",
  Hearts: "♥️",
  Spades: "♠️",
};

const SHORT_RANKS: Partial<Record<Rank, string>> = {
  Jack: "J",
  Queen: "Q",
  Ace: "A",
};

export function getSuitSymbol(suit: Suit): string {
  return SUIT_SYMBOLS[suit];
}

/** e.g. "Queen of Hearts" */
export function formatCard(card: Pick<Card, "rank" | "suit">): string {
  return `${card.rank} of ${card.suit}`;
}

/** e.g. "Q♥️" or "10♠️" */
export function formatCardShort(card: Pick<Card, "rank" | "suit">): string {
  return `${SHORT_RANKS[card.rank] ?? card.rank}${getSuitSymbol(card.suit)}`;
}

export function formatCardList(cards: readonly Card[]): string {
  return cards.map(formatCard).join(", ");
}
