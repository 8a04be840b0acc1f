import { loadConfig, positiveInt, type AppConfig } from "../config";
import { ConfigError } from "../lib/errors";

export interface BotConfig extends AppConfig {
  /** Telegram Bot API token */
  botToken: string;
  /** Comma-separated list of authorized Telegram chat IDs (empty = allow all) */
  authorizedChats: number[];
  /** Minutes between scheduled ingestion runs (0 = disabled) */
  ingestIntervalMinutes: number;
}

/** Timer delays above 2^31-1 ms fire immediately. */
export const MAX_INGEST_INTERVAL_MINUTES = Math.floor(0x7fffffff / 60_000);

export function loadBotConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const botToken = env.TELEGRAM_BOT_TOKEN?.trim();
  if (!botToken) {
    throw new ConfigError(
      "TELEGRAM_BOT_TOKEN is not set. Add it to .env or set it as an environment variable."
    );
  }

  const authorizedChats = (env.TELEGRAM_AUTHORIZED_CHATS ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => {
      const n = Number(s);
      if (!Number.isInteger(n)) {
        throw new ConfigError(
          `Invalid chat ID in TELEGRAM_AUTHORIZED_CHATS: "${s}". Must be a number.`
        );
      }
      return n;
    });

  const intervalRaw = env.NEWSDECK_INGEST_INTERVAL_MINUTES?.trim();
  const ingestIntervalMinutes =
    intervalRaw === undefined || intervalRaw === "" || intervalRaw === "0"
      ? 0
      : positiveInt(env, "NEWSDECK_INGEST_INTERVAL_MINUTES", 0);
  if (ingestIntervalMinutes > MAX_INGEST_INTERVAL_MINUTES) {
    throw new ConfigError(
      `NEWSDECK_INGEST_INTERVAL_MINUTES must be at most ${MAX_INGEST_INTERVAL_MINUTES}, got ${ingestIntervalMinutes}.`
    );
  }

  return {
    ...loadConfig(env),
    botToken,
    authorizedChats,
    ingestIntervalMinutes,
  };
}
