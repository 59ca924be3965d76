import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  DEFAULT_RULES_ID,
  assertRulesConsistent,
  loadRulesConfig,
  parseRulesConfig,
} from "../backend/src/game-config.js";
import { loadGameMeta } from "../backend/src/rules/meta.js";
import type { RulesConfig } from "../shared/schemas.js";
import { GameError, isGameError } from "../shared/errors.js";

const isConfigError = (err: unknown) =>
  isGameError(err) && err.type === "config";

describe("rules config", () => {
  const rules = loadRulesConfig();

  it("loads the standard ruleset by default", () => {
    assert.equal(rules.rulesId, DEFAULT_RULES_ID);
    assert.equal(rules.initialHandSize, 8);
    assert.deepEqual(rules.redeal, {
      triggerHandSize: 4,
      cardsPerPlayer: 4,
      maxRedeals: 2,
    });
    assert.equal(rules.maxRounds, 16);
    assert.deepEqual(rules.earlyTermination, {
      leaderThreshold: 9,
      opponentMinimum: 1,
    });
    assert.deepEqual(rules.shootTheMoon, { tricks: 16, displayScore: 17 });
  });

  it("accepts the standard ruleset as consistent", () => {
    assert.doesNotThrow(() => assertRulesConsistent(rules));
  });

  it("rejects a config that does not match the schema", () => {
    assert.throws(
      () => parseRulesConfig({ ...rules, initialHandSize: "8" }, "inline"),
      (err: unknown) =>
        isConfigError(err) &&
        err instanceof GameError &&
        err.message === "Invalid rules config in inline" &&
        (err.details ?? "").startsWith("initialHandSize:")
    );
  });

  it("rejects rules that deal more cards than the deck holds", () => {
    const oversized: RulesConfig = { ...rules, initialHandSize: 20 };
    assert.throws(
      () => assertRulesConsistent(oversized),
      (err: unknown) =>
        isConfigError(err) &&
        err instanceof Error &&
        err.message === "Rules deal 56 cards from a 48-card deck"
    );
  });

  it("rejects rules that run out of cards before the last round", () => {
    const tooLong: RulesConfig = { ...rules, maxRounds: 20 };
    assert.throws(
      () => assertRulesConsistent(tooLong),
      (err: unknown) =>
        isConfigError(err) &&
        err instanceof Error &&
        err.message === "Rules deal 32 cards but 20 rounds need 40"
    );
  });

  it("rejects a shoot-the-moon count no game can reach", () => {
    const unreachable: RulesConfig = {
      ...rules,
      shootTheMoon: { tricks: 17, displayScore: 17 },
    };
    assert.throws(() => assertRulesConsistent(unreachable), isConfigError);
  });

  it("rejects malformed rules ids", () => {
    assert.throws(() => loadRulesConfig("../secrets"), isConfigError);
    assert.throws(() => loadRulesConfig("Tricksy Battle"), isConfigError);
  });

  it("reports a missing rules file as a config error", () => {
    assert.throws(
      () => loadRulesConfig("no-such-rules"),
      (err: unknown) =>
        isConfigError(err) &&
        err instanceof Error &&
        err.message.startsWith("Could not read rules config")
    );
  });

  it("refuses to read rules from outside the rules directory", () => {
    assert.throws(
      () => loadRulesConfig(DEFAULT_RULES_ID, "/tmp/tricksy.rules.json"),
      (err: unknown) =>
        isConfigError(err) &&
        err instanceof Error &&
        err.message === "Refusing to load rules config outside RULES_DIR"
    );
  });
});

describe("game meta", () => {
  it("reads the display name", () => {
    const meta = loadGameMeta(DEFAULT_RULES_ID);
    assert.deepEqual(meta, {
      rulesId: DEFAULT_RULES_ID,
      gameName: "Tricksy Battle",
    });
  });

  it("falls back to the rules id when meta.json is missing", (t) => {
    const warn = t.mock.method(console, "warn", () => {});
    const meta = loadGameMeta("no-such-rules");
    assert.deepEqual(meta, {
      rulesId: "no-such-rules",
      gameName: "no-such-rules",
    });
    assert.equal(warn.mock.callCount(), 1);
  });
});
