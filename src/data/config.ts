// ============================================================
// Exercise Tracker — Configuration
// ============================================================

import * as fs from "node:fs";
import * as path from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ParseError, StorageError } from "./errors.js";

export const DEFAULT_API_URL = "https://68252ec20f0188d7e72c394f.mockapi.io/dev/workouts";
export const DEFAULT_TIMEOUT_MS = 10_000;
export const CONFIG_FILE = path.join(".pi", "exercise-tracker.json");

export interface TrackerConfig {
  apiUrl: string;
  timeoutMs: number;
  dataDir: string;
}

const ConfigFileSchema = Type.Object({
  apiUrl: Type.Optional(Type.String({ minLength: 1 })),
  timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
  dataDir: Type.Optional(Type.String({ minLength: 1 })),
});

function parseTimeout(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new ParseError(`EXERCISE_TRACKER_TIMEOUT_MS must be a positive integer, got "${raw}"`);
  }
  return n;
}

/**
 * Defaults, then `.pi/exercise-tracker.json`, then EXERCISE_TRACKER_* env vars.
 * Relative data directories resolve against `cwd`.
 */
export function loadConfig(cwd: string, env: NodeJS.ProcessEnv = process.env): TrackerConfig {
  const config: TrackerConfig = {
    apiUrl: DEFAULT_API_URL,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    dataDir: path.join(".pi", "exercise-tracker"),
  };

  const filepath = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(filepath)) {
    let raw: string;
    try {
      raw = fs.readFileSync(filepath, "utf-8");
    } catch (err) {
      throw new StorageError(`Failed to read ${filepath}`, { cause: err });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ParseError(`${filepath} is not valid JSON`, { cause: err });
    }
    if (!Value.Check(ConfigFileSchema, parsed)) {
      const first = [...Value.Errors(ConfigFileSchema, parsed)][0];
      throw new ParseError(`Invalid ${CONFIG_FILE}: ${first ? `${first.path || "/"} ${first.message}` : "unexpected shape"}`);
    }
    config.apiUrl = parsed.apiUrl ?? config.apiUrl;
    config.timeoutMs = parsed.timeoutMs ?? config.timeoutMs;
    config.dataDir = parsed.dataDir ?? config.dataDir;
  }

  if (env["EXERCISE_TRACKER_API_URL"]) config.apiUrl = env["EXERCISE_TRACKER_API_URL"];
  if (env["EXERCISE_TRACKER_TIMEOUT_MS"]) config.timeoutMs = parseTimeout(env["EXERCISE_TRACKER_TIMEOUT_MS"]);
  if (env["EXERCISE_TRACKER_DATA_DIR"]) config.dataDir = env["EXERCISE_TRACKER_DATA_DIR"];

  config.dataDir = path.resolve(cwd, config.dataDir);
  return config;
}
