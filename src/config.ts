import * as dotenv from "dotenv";
import * as path from "path";
import { ConfigError } from "./lib/errors";
import { dataPath, projectRoot } from "./lib/paths";

export interface AppConfig {
  /** Path to the SQLite database file */
  dbPath: string;
  /** Path to the feed sources JSON file */
  sourcesPath: string;
  /** Early-guardrail passes taken per source per run (default: 10) */
  maxItemsPerSource: number;
  /** Timeout for every feed or article request (default: 10000) */
  fetchTimeoutMs: number;
  /** Tone recorded on generated drafts (default: neutral) */
  defaultTone: string;
}

/** Loads .env from the project root without overriding the environment. */
export function loadEnvFile(): void {
  dotenv.config({ path: path.join(projectRoot(), ".env"), override: false });
}

export function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`Invalid ${name}: "${raw}". Must be a positive integer.`);
  }
  return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dbPath = env.NEWSDECK_DB_PATH?.trim() || path.join(projectRoot(), "newsdeck.db");
  const sourcesPath = env.NEWSDECK_SOURCES_PATH?.trim() || dataPath("sources.json");

  return {
    dbPath,
    sourcesPath,
    maxItemsPerSource: positiveInt(env, "NEWSDECK_MAX_ITEMS_PER_SOURCE", 10),
    fetchTimeoutMs: positiveInt(env, "NEWSDECK_FETCH_TIMEOUT_MS", 10000),
    defaultTone: env.NEWSDECK_DEFAULT_TONE?.trim() || "neutral",
  };
}
