import fs from "node:fs";
import path from "node:path";
import { GameMetaSchema, type GameMeta } from "../../../shared/schemas.js";
import { resolveRulesDir } from "../util/rules-path.js";

const RULES_DIR = resolveRulesDir();

/**
 * Display metadata for a ruleset. Only the banner depends on it, so a missing
 * or malformed meta.json degrades to the rules id instead of failing the game.
 */
export function loadGameMeta(rulesId: string): GameMeta {
  const metaPath = path.join(RULES_DIR, rulesId, "meta.json");

  let meta: GameMeta;
  try {
    meta = GameMetaSchema.parse(JSON.parse(fs.readFileSync(metaPath, "utf8")));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.warn(`[meta] Using "${rulesId}" as the game name: ${msg}`);
    return { rulesId, gameName: rulesId };
  }

  if (meta.rulesId !== rulesId) {
    console.warn(
      `[meta] ${metaPath} is labelled ${meta.rulesId}, expected ${rulesId}`
    );
  }
  return { ...meta, rulesId };
}
