// backend/src/config.ts
// Centralized environment configuration with defaults
import dotenv from "dotenv";
import { normalizeSeed } from "./util/random.js";

// Load .env early so that any module importing config picks up its values.
dotenv.config();

export interface EnvironmentConfig {
  /** Normalised shuffle seed, or null to generate one per game. */
  seed: string | null;
  debugLogging: boolean;
  checkInvariants: boolean;
}

export function parseBooleanEnv(value: string | undefined): boolean {
  return value === "true" || value === "1";
}

export function getEnvironmentConfig(): EnvironmentConfig {
  return {
    seed: normalizeSeed(process.env.TRICKSY_SEED),
    debugLogging: parseBooleanEnv(process.env.TRICKSY_DEBUG),
    checkInvariants: process.env.NODE_ENV !== "production",
  };
}

export function getEnvironmentVariablesInfo(): Array<{
  key: string;
  value: string;
  defaultValue: string;
  isSet: boolean;
}> {
  const config = getEnvironmentConfig();

  return [
    {
      key: "TRICKSY_SEED",
      value: config.seed ?? "[GENERATED]",
      defaultValue: "[GENERATED]",
      isSet: config.seed !== null,
    },
    {
      key: "TRICKSY_DEBUG",
      value: config.debugLogging ? "true" : "false",
      defaultValue: "false",
      isSet: Boolean(process.env.TRICKSY_DEBUG),
    },
    {
      key: "NODE_ENV",
      value: process.env.NODE_ENV || "",
      defaultValue: "[UNSET]",
      isSet: Boolean(process.env.NODE_ENV),
    },
  ];
}
