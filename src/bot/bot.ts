import { Bot } from "grammy";
import type Database from "better-sqlite3";
import type { BotConfig } from "./config";
import {
  handleDraft,
  handlePending,
  handleStart,
  handleTransition,
} from "./handlers/commands";

/**
 * Creates and configures the grammY Bot instance with all middleware and handlers.
 */
export function createBot(config: BotConfig, db: Database.Database): Bot {
  const bot = new Bot(config.botToken);

  // --- Authorization middleware ---
  if (config.authorizedChats.length > 0) {
    bot.use(async (ctx, next) => {
      const chatId = ctx.chat?.id;
      if (chatId && !config.authorizedChats.includes(chatId)) {
        console.log(`[auth] Rejected message from unauthorized chat ${chatId}`);
        return;
      }
      await next();
    });
  }

  // --- Error handler ---
  bot.catch((err) => {
    console.error("[bot] Unhandled error:", err.message);
    console.error(err.stack);
  });

  // --- Commands ---
  bot.command("start", (ctx) => handleStart(ctx));
  bot.command("help", (ctx) => handleStart(ctx));
  bot.command("pending", (ctx) => handlePending(ctx, db));
  bot.command("draft", (ctx) => handleDraft(ctx, db, ctx.match));
  bot.command("review", (ctx) => handleTransition(ctx, db, ctx.match, "NEEDS_REVIEW"));
  bot.command("approve", (ctx) => handleTransition(ctx, db, ctx.match, "APPROVED"));
  bot.command("publish", (ctx) => handleTransition(ctx, db, ctx.match, "PUBLISHED"));

  bot.on("message:text", async (ctx) => {
    if (ctx.message.text.startsWith("/")) {
      await ctx.reply("Unknown command. Send /help for the list.");
    }
  });

  return bot;
}
