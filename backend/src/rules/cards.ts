import {
  RANKS,
  SUITS,
  type Card,
  type Rank,
  type Suit,
} from "../../../shared/schemas.js";

/**
 * Comparison values. Kings are not in the deck, so 13 is never used and
 * Ace keeps its usual 14.
 */
export const RANK_VALUES: Record<Rank, number> = {
  "2": 2,
  "3": 3,
  "4": 4,
  "5": 5,
  "6": 6,
  "7": 7,
  "8": 8,
  "9": 9,
  "10": 10,
  Jack: 11,
  Queen: 12,
  Ace: 14,
};

export const DECK_SIZE = SUITS.length * RANKS.length;

export function createCard(suit: Suit, rank: Rank): Card {
  return Object.freeze({ suit, rank, value: RANK_VALUES[rank] });
}

export function cardKey(card: Pick<Card, "rank" | "suit">): string {
  return `${card.rank}-${card.suit}`;
}

export function cardsEqual(
  a: Pick<Card, "rank" | "suit">,
  b: Pick<Card, "rank" | "suit">
): boolean {
  return a.suit === b.suit && a.rank === b.rank;
}

/** All 48 cards in suit-major, rank-ascending order. */
export function buildFullDeck(): Card[] {
  return SUITS.flatMap((suit) => RANKS.map((rank) => createCard(suit, rank)));
}

/**
 * Removes exactly one card equal to `card` from `cards`, in place.
 * Returns false when no such card is held.
 */
export function removeCard(cards: Card[], card: Card): boolean {
  const index = cards.findIndex((c) => cardsEqual(c, card));
  if (index === -1) return false;
  cards.splice(index, 1);
  return true;
}
