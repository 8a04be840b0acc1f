/**
 * Reply texts for the review bot. Pure, so they are tested without Telegram.
 */

import type { DraftRecord } from "../db";

export const HELP_TEXT = [
  "newsdeck review bot",
  "",
  "Commands:",
  "/pending: drafts waiting for review",
  "/draft <id>: show a draft",
  "/review <id>: mark a draft as NEEDS_REVIEW",
  "/approve <id>: approve a draft",
  "/publish <id>: mark an approved draft as published",
  "/help: show this message",
].join("\n");

/** Parses the argument of "/draft 12"-style commands. */
export function parseDraftId(arg: string | undefined): number | null {
  const text = arg?.trim() ?? "";
  if (!/^\d+$/.test(text)) return null;
  const id = Number(text);
  return id > 0 ? id : null;
}

export function formatPendingList(drafts: readonly DraftRecord[]): string {
  if (drafts.length === 0) return "No drafts pending review.";
  const lines = drafts.map((d) => `#${d.id} [${d.status}] ${d.brand}: ${d.hook}`);
  return [`${drafts.length} draft(s) pending:`, ...lines].join("\n");
}

export function formatDraftMessage(draft: DraftRecord): string {
  return [
    `Draft #${draft.id} [${draft.status}] ${draft.brand} / ${draft.category}`,
    "",
    ...draft.slides.map((s, i) => `${i + 1}. ${s.title}: ${s.body}`),
    "",
    draft.caption,
    "",
    draft.hashtags.join(" "),
    "",
    draft.sourceLine,
  ].join("\n");
}
