import type {
  GameOutcome,
  RulesConfig,
  Scores,
  SeatId,
} from "../../../shared/schemas.js";

export const SEATS: readonly [SeatId, SeatId] = ["P1", "P2"];

export function getOtherSeat(seat: SeatId): SeatId {
  return seat === "P1" ? "P2" : "P1";
}

export function createScores(): Scores {
  return { P1: 0, P2: 0 };
}

export function totalScore(scores: Scores): number {
  return scores.P1 + scores.P2;
}

/**
 * One player has reached the threshold while the other has taken at least
 * the minimum. Checked only between rounds.
 */
export function isEarlyTermination(
  scores: Scores,
  rule: RulesConfig["earlyTermination"]
): boolean {
  const { leaderThreshold, opponentMinimum } = rule;
  return (
    (scores.P1 >= leaderThreshold && scores.P2 >= opponentMinimum) ||
    (scores.P2 >= leaderThreshold && scores.P1 >= opponentMinimum)
  );
}

/**
 * Final result. Taking every trick is reported with the literal display
 * score (17-0 under the standard rules), not the tricks actually counted.
 */
export function determineOutcome(
  scores: Scores,
  rule: RulesConfig["shootTheMoon"]
): GameOutcome {
  for (const seat of SEATS) {
    const other = getOtherSeat(seat);
    if (scores[seat] === rule.tricks && scores[other] === 0) {
      return {
        kind: "shoot-the-moon",
        winner: seat,
        displayScore: [rule.displayScore, 0],
      };
    }
  }

  if (scores.P1 > scores.P2) return { kind: "win", winner: "P1" };
  if (scores.P2 > scores.P1) return { kind: "win", winner: "P2" };
  return { kind: "tie" };
}
