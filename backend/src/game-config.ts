import fs from "node:fs";
import path from "node:path";
import {
  RulesConfigSchema,
  type RulesConfig,
} from "../../shared/schemas.js";
import { GameError } from "../../shared/errors.js";
import { DECK_SIZE } from "./rules/cards.js";
import { resolveRulesDir } from "./util/rules-path.js";

export const DEFAULT_RULES_ID = "tricksy-battle";

const RULES_DIR = resolveRulesDir();

function validateRulesId(rulesId: string) {
  if (!/^[a-z0-9-]+$/.test(rulesId)) {
    throw new GameError("config", `Invalid rulesId format: ${rulesId}`);
  }
}

function formatIssues(error: {
  issues: Array<{ path: Array<string | number>; message: string }>;
}): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Checks relationships between rule constants that the schema cannot express
 * on its own. A ruleset that fails here could run the deck dry mid-game.
 */
export function assertRulesConsistent(rules: RulesConfig): void {
  const { initialHandSize, redeal, maxRounds, shootTheMoon } = rules;

  // Each round takes one card from each hand and reveals one from the deck.
  const totalDealt =
    2 * initialHandSize + 2 * redeal.cardsPerPlayer * redeal.maxRedeals;
  const cardsInPlay = 2 * maxRounds;
  if (totalDealt > DECK_SIZE) {
    throw new GameError(
      "config",
      `Rules deal ${totalDealt} cards from a ${DECK_SIZE}-card deck`
    );
  }
  if (totalDealt < cardsInPlay) {
    throw new GameError(
      "config",
      `Rules deal ${totalDealt} cards but ${maxRounds} rounds need ${cardsInPlay}`
    );
  }
  if (shootTheMoon.tricks > maxRounds) {
    throw new GameError(
      "config",
      `shootTheMoon.tricks (${shootTheMoon.tricks}) exceeds maxRounds (${maxRounds})`
    );
  }
}

export function parseRulesConfig(json: unknown, source: string): RulesConfig {
  const result = RulesConfigSchema.safeParse(json);
  if (!result.success) {
    throw new GameError(
      "config",
      `Invalid rules config in ${source}`,
      formatIssues(result.error)
    );
  }
  assertRulesConsistent(result.data);
  return result.data;
}

export function loadRulesConfig(
  rulesId: string = DEFAULT_RULES_ID,
  configPath?: string
): RulesConfig {
  validateRulesId(rulesId);

  const resolvedPath = configPath
    ? path.resolve(configPath)
    : path.resolve(RULES_DIR, rulesId, `${rulesId}.rules.json`);

  // Path traversal protection - only read rules from inside RULES_DIR
  const rulesRoot = path.resolve(RULES_DIR) + path.sep;
  if (!resolvedPath.startsWith(rulesRoot)) {
    throw new GameError(
      "config",
      "Refusing to load rules config outside RULES_DIR",
      resolvedPath
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(resolvedPath, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new GameError(
      "config",
      `Could not read rules config ${resolvedPath}`,
      msg
    );
  }

  const rules = parseRulesConfig(json, resolvedPath);
  if (rules.rulesId !== rulesId) {
    throw new GameError(
      "config",
      `rulesId mismatch in ${resolvedPath}: expected ${rulesId}, got ${rules.rulesId}`
    );
  }
  return rules;
}
