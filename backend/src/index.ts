#!/usr/bin/env node
import { isGameError } from "../../shared/errors.js";
import {
  getEnvironmentConfig,
  getEnvironmentVariablesInfo,
} from "./config.js";
import { loadRulesConfig } from "./game-config.js";
import { runGame } from "./game-loop.js";
import { ConsoleIO } from "./io/console-io.js";
import { loadGameMeta } from "./rules/meta.js";

async function main(): Promise<void> {
  const config = getEnvironmentConfig();
  if (config.debugLogging) {
    for (const info of getEnvironmentVariablesInfo()) {
      console.debug(
        `[config] ${info.key}=${info.value}${info.isSet ? "" : " (default)"}`
      );
    }
  }

  const rules = loadRulesConfig();
  const meta = loadGameMeta(rules.rulesId);

  const io = new ConsoleIO();
  try {
    await runGame(io, {
      rules,
      gameName: meta.gameName,
      seed: config.seed,
      checkInvariants: config.checkInvariants,
      debugLogging: config.debugLogging,
    });
  } finally {
    io.close();
  }
}

main().catch((err: unknown) => {
  if (isGameError(err) && err.type === "input-closed") {
    console.log("\nInput closed; game abandoned.");
    return;
  }

  const type = isGameError(err) ? err.type : "unexpected";
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`[FATAL] ${type}: ${msg}`);
  if (isGameError(err) && err.details) {
    console.error(`[FATAL] ${err.details}`);
  }
  process.exitCode = 1;
});
