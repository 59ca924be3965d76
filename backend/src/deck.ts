import type { Card } from "../../shared/schemas.js";
import { GameError } from "../../shared/errors.js";
import { buildFullDeck, cardKey } from "./rules/cards.js";
import { fisherYates, type RandomSource } from "./util/random.js";

/**
 * The undealt cards. The end of the array is the top of the deck: `deal`
 * and `draw` both take from there.
 */
export class Deck {
  private readonly cards: Card[];

  private constructor(cards: Card[]) {
    this.cards = cards;
  }

  /** A full 48-card deck in a uniformly random order. */
  static shuffled(random: RandomSource): Deck {
    return new Deck(fisherYates(buildFullDeck(), random));
  }

  /**
   * A deck in exactly the given order (last card on top). Used to set up
   * known deals.
   */
  static fromCards(cards: readonly Card[]): Deck {
    const seen = new Set<string>();
    for (const card of cards) {
      const key = cardKey(card);
      if (seen.has(key)) {
        throw new GameError("invariant", `Duplicate card in deck: ${key}`);
      }
      seen.add(key);
    }
    return new Deck([...cards]);
  }

  get size(): number {
    return this.cards.length;
  }

  get isEmpty(): boolean {
    return this.cards.length === 0;
  }

  /** Remaining cards, bottom first. */
  remaining(): readonly Card[] {
    return [...this.cards];
  }

  /**
   * Removes `count` cards from the top, in the order they come off.
   * Fails rather than handing back a short deal.
   */
  deal(count: number): Card[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new GameError("invariant", `Invalid deal count: ${count}`);
    }
    if (count > this.cards.length) {
      throw new GameError(
        "deck-exhausted",
        `Cannot deal ${count} cards; ${this.cards.length} remain in the deck`
      );
    }

    const dealt: Card[] = [];
    for (let i = 0; i < count; i++) {
      const card = this.cards.pop();
      if (card) dealt.push(card);
    }
    return dealt;
  }

  /** Takes the top card, or null once the deck is empty. */
  draw(): Card | null {
    return this.cards.pop() ?? null;
  }
}
