import type Database from "better-sqlite3";
import type { DraftStatus } from "../../contracts";
import { getDraftById, listDrafts } from "../../db";
import { DraftNotFoundError, InvalidStatusTransitionError } from "../../lib/errors";
import { transitionDraft } from "../../services/drafts";
import { formatDraftMessage, formatPendingList, HELP_TEXT, parseDraftId } from "../messages";

const PENDING_STATUSES: readonly DraftStatus[] = ["DRAFT", "NEEDS_REVIEW"];

/** The part of a grammY Context the handlers use. */
export interface ReplyContext {
  readonly chat?: { id: number };
  reply(text: string): Promise<unknown>;
}

/**
 * /start and /help: show instructions.
 */
export async function handleStart(ctx: ReplyContext): Promise<void> {
  await ctx.reply(HELP_TEXT);
}

/**
 * /pending: list drafts in DRAFT or NEEDS_REVIEW.
 */
export async function handlePending(ctx: ReplyContext, db: Database.Database): Promise<void> {
  await ctx.reply(formatPendingList(listDrafts(db, { status: PENDING_STATUSES })));
}

/**
 * /draft <id>: show one draft.
 */
export async function handleDraft(
  ctx: ReplyContext,
  db: Database.Database,
  arg: string
): Promise<void> {
  const id = parseDraftId(arg);
  if (id === null) {
    await ctx.reply("Usage: /draft <id>");
    return;
  }
  const draft = getDraftById(db, id);
  await ctx.reply(draft ? formatDraftMessage(draft) : `Draft #${id} not found.`);
}

/**
 * /review, /approve and /publish: move a draft forward.
 */
export async function handleTransition(
  ctx: ReplyContext,
  db: Database.Database,
  arg: string,
  to: DraftStatus
): Promise<void> {
  const id = parseDraftId(arg);
  if (id === null) {
    await ctx.reply(`Usage: /${to === "NEEDS_REVIEW" ? "review" : to.toLowerCase()} <id>`);
    return;
  }

  try {
    const draft = transitionDraft(db, id, to);
    console.log(`[bot] Draft ${id} -> ${to} (chat ${ctx.chat?.id ?? "unknown"})`);
    await ctx.reply(`Draft #${draft.id} is now ${draft.status}.`);
  } catch (err) {
    if (err instanceof DraftNotFoundError || err instanceof InvalidStatusTransitionError) {
      await ctx.reply(err.message);
      return;
    }
    throw err;
  }
}
