import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  getEnvironmentConfig,
  getEnvironmentVariablesInfo,
  parseBooleanEnv,
} from "../backend/src/config.js";

const KEYS = ["TRICKSY_SEED", "TRICKSY_DEBUG", "NODE_ENV"] as const;

describe("environment config", () => {
  const saved: Partial<Record<(typeof KEYS)[number], string>> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("parses boolean flags", () => {
    assert.equal(parseBooleanEnv("true"), true);
    assert.equal(parseBooleanEnv("1"), true);
    assert.equal(parseBooleanEnv("yes"), false);
    assert.equal(parseBooleanEnv(undefined), false);
  });

  it("uses defaults when nothing is set", () => {
    assert.deepEqual(getEnvironmentConfig(), {
      seed: null,
      debugLogging: false,
      checkInvariants: true,
    });
  });

  it("normalises the seed and reads the debug flag", () => {
    process.env.TRICKSY_SEED = "  test-seed ";
    process.env.TRICKSY_DEBUG = "1";
    const config = getEnvironmentConfig();
    assert.equal(config.seed, "TEST-SEED");
    assert.equal(config.debugLogging, true);
  });

  it("treats a blank seed as unset", () => {
    process.env.TRICKSY_SEED = "   ";
    assert.equal(getEnvironmentConfig().seed, null);
  });

  it("skips invariant checks in production", () => {
    process.env.NODE_ENV = "production";
    assert.equal(getEnvironmentConfig().checkInvariants, false);
  });

  it("describes each variable and whether it was set", () => {
    process.env.TRICKSY_SEED = "abc";
    assert.deepEqual(getEnvironmentVariablesInfo(), [
      {
        key: "TRICKSY_SEED",
        value: "ABC",
        defaultValue: "[GENERATED]",
        isSet: true,
      },
      {
        key: "TRICKSY_DEBUG",
        value: "false",
        defaultValue: "false",
        isSet: false,
      },
      {
        key: "NODE_ENV",
        value: "",
        defaultValue: "[UNSET]",
        isSet: false,
      },
    ]);
  });
});
