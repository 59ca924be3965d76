import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  createScores,
  determineOutcome,
  getOtherSeat,
  isEarlyTermination,
  totalScore,
} from "../backend/src/rules/scoring.js";
import { loadRulesConfig } from "../backend/src/game-config.js";
import { formatOutcome } from "../backend/src/view.js";

const rules = loadRulesConfig();
const names = { P1: "Alice", P2: "Bob" };

describe("scoring", () => {
  it("starts both players at zero", () => {
    const scores = createScores();
    assert.deepEqual(scores, { P1: 0, P2: 0 });
    assert.equal(totalScore(scores), 0);
  });

  it("pairs each seat with the other", () => {
    assert.equal(getOtherSeat("P1"), "P2");
    assert.equal(getOtherSeat("P2"), "P1");
  });

  describe("early termination", () => {
    const early = (P1: number, P2: number) =>
      isEarlyTermination({ P1, P2 }, rules.earlyTermination);

    it("ends once a player has nine and the other at least one", () => {
      assert.equal(early(9, 1), true);
      assert.equal(early(1, 9), true);
      assert.equal(early(10, 3), true);
    });

    it("keeps going below nine", () => {
      assert.equal(early(8, 7), false);
      assert.equal(early(0, 0), false);
    });

    it("keeps going while the trailing player has nothing", () => {
      assert.equal(early(9, 0), false);
      assert.equal(early(0, 12), false);
    });
  });

  describe("outcome", () => {
    it("reports the higher score as the winner", () => {
      assert.deepEqual(determineOutcome({ P1: 9, P2: 1 }, rules.shootTheMoon), {
        kind: "win",
        winner: "P1",
      });
      assert.deepEqual(determineOutcome({ P1: 7, P2: 9 }, rules.shootTheMoon), {
        kind: "win",
        winner: "P2",
      });
    });

    it("reports equal scores as a tie", () => {
      const outcome = determineOutcome({ P1: 8, P2: 8 }, rules.shootTheMoon);
      assert.deepEqual(outcome, { kind: "tie" });
      assert.equal(formatOutcome(names, outcome), "It's a tie!");
    });

    it("reports sixteen tricks to none as shooting the moon, 17-0", () => {
      const outcome = determineOutcome({ P1: 16, P2: 0 }, rules.shootTheMoon);
      assert.deepEqual(outcome, {
        kind: "shoot-the-moon",
        winner: "P1",
        displayScore: [17, 0],
      });
      assert.equal(
        formatOutcome(names, outcome),
        "Alice shot the moon and wins 17-0!"
      );
    });

    it("credits the moon to whichever seat took every trick", () => {
      const outcome = determineOutcome({ P1: 0, P2: 16 }, rules.shootTheMoon);
      assert.equal(
        formatOutcome(names, outcome),
        "Bob shot the moon and wins 17-0!"
      );
    });

    it("treats a shutout short of sixteen as an ordinary win", () => {
      const outcome = determineOutcome({ P1: 15, P2: 0 }, rules.shootTheMoon);
      assert.deepEqual(outcome, { kind: "win", winner: "P1" });
      assert.equal(formatOutcome(names, outcome), "Alice wins!");
    });
  });
});
