import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  isLegalFollow,
  legalFollowCards,
  legalLeadCards,
  resolveTrick,
} from "../backend/src/rules/trick.js";
import { buildFullDeck, cardKey } from "../backend/src/rules/cards.js";
import { isGameError } from "../shared/errors.js";
import { card } from "./helpers/decks.js";

describe("resolveTrick", () => {
  it("gives a same-suit trick to the higher card", () => {
    assert.equal(
      resolveTrick(card("Queen", "Hearts"), card("8", "Hearts")),
      "leader"
    );
    assert.equal(
      resolveTrick(card("8", "Hearts"), card("Queen", "Hearts")),
      "follower"
    );
    assert.equal(
      resolveTrick(card("Jack", "Clubs"), card("Ace", "Clubs")),
      "follower"
    );
  });

  it("gives an off-suit trick to the leader whatever the values", () => {
    assert.equal(
      resolveTrick(card("2", "Spades"), card("Ace", "Hearts")),
      "leader"
    );
    assert.equal(
      resolveTrick(card("3", "Diamonds"), card("Ace", "Clubs")),
      "leader"
    );
  });

  it("is decided by card values alone for every pair in the deck", () => {
    const deck = buildFullDeck();
    for (const lead of deck) {
      for (const follow of deck) {
        if (cardKey(lead) === cardKey(follow)) continue;
        const expected =
          lead.suit === follow.suit && follow.value > lead.value
            ? "follower"
            : "leader";
        assert.equal(resolveTrick(lead, follow), expected);
      }
    }
  });
});

describe("legal cards", () => {
  const hand = [
    card("3", "Spades"),
    card("8", "Hearts"),
    card("Ace", "Clubs"),
    card("2", "Hearts"),
  ];

  it("lets the leader lead anything in hand", () => {
    const candidates = legalLeadCards(hand);
    assert.deepEqual(candidates.map(cardKey), [
      "3-Spades",
      "8-Hearts",
      "Ace-Clubs",
      "2-Hearts",
    ]);
    assert.notEqual(candidates, hand);
  });

  it("forces the follower onto the lead suit when held", () => {
    const { candidates, suitForced } = legalFollowCards(hand, "Hearts");
    assert.equal(suitForced, true);
    assert.deepEqual(candidates.map(cardKey), ["8-Hearts", "2-Hearts"]);
  });

  it("frees the follower when the lead suit is not held", () => {
    const { candidates, suitForced } = legalFollowCards(hand, "Diamonds");
    assert.equal(suitForced, false);
    assert.equal(candidates.length, 4);
  });

  it("checks a single follow card against the rule", () => {
    assert.equal(isLegalFollow(hand, "Hearts", card("2", "Hearts")), true);
    assert.equal(isLegalFollow(hand, "Hearts", card("3", "Spades")), false);
    assert.equal(isLegalFollow(hand, "Diamonds", card("3", "Spades")), true);
    assert.equal(isLegalFollow(hand, "Hearts", card("9", "Hearts")), false);
  });

  it("refuses to pick from an empty hand", () => {
    const isInvariant = (err: unknown) =>
      isGameError(err) && err.type === "invariant";
    assert.throws(() => legalLeadCards([]), isInvariant);
    assert.throws(() => legalFollowCards([], "Hearts"), isInvariant);
  });
});
