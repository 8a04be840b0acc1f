import { loadEnvFile } from "../config";
import { ensureSchema, openDatabase } from "../db";
import { createBot } from "./bot";
import { loadBotConfig } from "./config";
import { startIngestScheduler } from "./scheduler";

async function main(): Promise<void> {
  console.log("[newsdeck-bot] Starting...");

  // 1. Load configuration
  loadEnvFile();
  const config = loadBotConfig();
  console.log("[newsdeck-bot] Config loaded.");

  // 2. Open database and ensure schema
  const db = openDatabase(config.dbPath);
  ensureSchema(db);
  console.log(`[newsdeck-bot] Database ready: ${config.dbPath}`);

  // 3. Create bot
  const bot = createBot(config, db);

  // 4. Scheduled ingestion
  const ingestInterval =
    config.ingestIntervalMinutes > 0 ? startIngestScheduler(db, config) : null;

  // 5. Graceful shutdown
  const shutdown = () => {
    console.log("\n[newsdeck-bot] Shutting down...");
    if (ingestInterval) clearInterval(ingestInterval);
    void bot.stop().finally(() => {
      db.close();
      console.log("[newsdeck-bot] Goodbye.");
      process.exit(0);
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  // 6. Start polling
  const me = await bot.api.getMe();
  console.log(`[newsdeck-bot] Logged in as @${me.username}`);
  if (config.authorizedChats.length > 0) {
    console.log(`[newsdeck-bot] Authorized chats: ${config.authorizedChats.join(", ")}`);
  } else {
    console.log("[newsdeck-bot] All chats authorized (no restriction).");
  }
  console.log(
    ingestInterval
      ? `[newsdeck-bot] Scheduled ingestion every ${config.ingestIntervalMinutes} minutes`
      : "[newsdeck-bot] Scheduled ingestion: disabled"
  );

  await bot.start();
}

main().catch((err) => {
  console.error("[newsdeck-bot] Fatal error:", err);
  process.exit(1);
});
