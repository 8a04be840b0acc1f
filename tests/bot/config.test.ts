import { describe, it, expect } from "vitest";
import { loadBotConfig, MAX_INGEST_INTERVAL_MINUTES } from "../../src/bot/config";
import { ConfigError } from "../../src/lib/errors";

describe("loadBotConfig", () => {
  it("requires a bot token", () => {
    expect(() => loadBotConfig({})).toThrow(ConfigError);
  });

  it("parses authorized chats and the ingest interval", () => {
    const config = loadBotConfig({
      TELEGRAM_BOT_TOKEN: "test-secret",
      TELEGRAM_AUTHORIZED_CHATS: "123, -456,",
      NEWSDECK_INGEST_INTERVAL_MINUTES: "30",
      NEWSDECK_DB_PATH: "/tmp/newsdeck-test.db",
    });
    expect(config.botToken).toBe("test-secret");
    expect(config.authorizedChats).toEqual([123, -456]);
    expect(config.ingestIntervalMinutes).toBe(30);
    expect(config.dbPath).toBe("/tmp/newsdeck-test.db");
    expect(config.maxItemsPerSource).toBe(10);
  });

  it("disables scheduling by default", () => {
    expect(loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-secret" }).ingestIntervalMinutes).toBe(0);
    expect(
      loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-secret", NEWSDECK_INGEST_INTERVAL_MINUTES: "0" })
        .ingestIntervalMinutes
    ).toBe(0);
  });

  it("rejects bad values", () => {
    expect(() =>
      loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-secret", TELEGRAM_AUTHORIZED_CHATS: "abc" })
    ).toThrow('Invalid chat ID in TELEGRAM_AUTHORIZED_CHATS: "abc". Must be a number.');
    expect(() =>
      loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-secret", NEWSDECK_INGEST_INTERVAL_MINUTES: "-5" })
    ).toThrow(ConfigError);
  });

  it("caps the ingest interval at the largest timer delay", () => {
    expect(MAX_INGEST_INTERVAL_MINUTES).toBe(35791);
    expect(
      loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-secret", NEWSDECK_INGEST_INTERVAL_MINUTES: "35791" })
        .ingestIntervalMinutes
    ).toBe(35791);
    expect(() =>
      loadBotConfig({ TELEGRAM_BOT_TOKEN: "test-secret", NEWSDECK_INGEST_INTERVAL_MINUTES: "35792" })
    ).toThrow("NEWSDECK_INGEST_INTERVAL_MINUTES must be at most 35791, got 35792.");
  });
});
