/**
 * Configuration for the count trainer
 *
 * Environment variables control shoe size, the undo/redo policy and startup mode.
 */

import type { CountingSystemId } from "./types.ts";
import { isCountingSystemId } from "./strategy/CountingSystems.ts";
import { isLogLevel, type LogLevel } from "./utils/logger.ts";

export interface Config {
  // Shoe
  decksTotal: number;               // Decks in a fresh shoe

  // Undo / redo policy
  undoBudget: number;               // Consecutive undos allowed since the last record/reset
  redoCap: number;                  // Max entries kept for redo

  // Startup
  countingSystem: CountingSystemId | null; // Skip the menus and start this system
  hiLoRankMode: boolean;            // Start Hi-Lo with rank keys bound

  // Logging
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value ? value : defaultValue;
}

function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Invalid number for ${key}: ${value}`);
  }
  return parsed;
}

function getEnvCount(env: Env, key: string, defaultValue: number): number {
  const parsed = getEnvNumber(env, key, defaultValue);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid count for ${key}: ${env[key]} (expected a non-negative integer)`);
  }
  return parsed;
}

export function loadConfig(env: Env = process.env): Config {
  const decksTotal = getEnvNumber(env, "DECKS_TOTAL", 6);
  if (!Number.isFinite(decksTotal) || decksTotal <= 0) {
    throw new Error(`Invalid deck count for DECKS_TOTAL: ${env.DECKS_TOTAL} (must be positive)`);
  }

  const system = env.COUNTING_SYSTEM;
  if (system && !isCountingSystemId(system)) {
    throw new Error(`Unknown counting system for COUNTING_SYSTEM: ${system}`);
  }

  const logLevel = getEnv(env, "LOG_LEVEL", "info").toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid log level for LOG_LEVEL: ${logLevel}`);
  }

  return {
    // Shoe
    decksTotal,

    // Undo / redo policy
    undoBudget: getEnvCount(env, "UNDO_BUDGET", 5),
    redoCap: getEnvCount(env, "REDO_CAP", 20),

    // Startup
    countingSystem: system && isCountingSystemId(system) ? system : null,
    hiLoRankMode: getEnvBool(env, "HILO_RANK_MODE", false),

    // Logging
    logLevel,
  };
}
