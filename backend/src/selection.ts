import type { Card } from "../../shared/schemas.js";
import type { SelectionResult } from "../../shared/validation.js";
import { GameError } from "../../shared/errors.js";
import type { GameLogger } from "./engine-log.js";
import type { GameIO } from "./io/interface.js";
import { formatCard } from "./util/card-notation.js";

export const INVALID_SELECTION_MESSAGE = "Invalid selection; try again.";

/**
 * Parses a 1-based choice typed by the player. Only plain digits count:
 * "2" selects the second card; " 2", "2.0", "-1" and "two" do not.
 */
export function parseSelection(
  input: string,
  candidateCount: number
): SelectionResult {
  if (!/^\d+$/.test(input)) {
    return { valid: false, reason: `"${input}" is not a card number` };
  }

  const index = Number(input) - 1;
  if (index < 0 || index >= candidateCount) {
    return {
      valid: false,
      reason: `${input} is outside 1-${candidateCount}`,
    };
  }

  return { valid: true, index };
}

/**
 * Lists `candidates` and asks until the player names one of them. There is
 * no attempt limit; only closing the input ends the loop early.
 */
export async function chooseCard(
  io: GameIO,
  playerName: string,
  candidates: readonly Card[],
  logger?: GameLogger
): Promise<Card> {
  if (candidates.length === 0) {
    throw new GameError("selection", `${playerName} has no card to choose`);
  }

  for (;;) {
    candidates.forEach((card, i) => {
      io.print(`    ${i + 1}: ${formatCard(card)}`);
    });
    const answer = await io.ask(
      `${playerName}, choose a card (1-${candidates.length}): `
    );
    const result = parseSelection(answer, candidates.length);
    if (result.valid) {
      return candidates[result.index];
    }
    logger?.debug(`${playerName}: ${result.reason}`);
    io.print(INVALID_SELECTION_MESSAGE);
  }
}
