import type { IngestSummary } from "../contracts";
import type { DraftRecord } from "../db";

/** One line per draft: id, status, brand, news id, hook. */
export function formatDraftLine(draft: DraftRecord): string {
  const variant = draft.variantOfId !== null ? ` (variant of #${draft.variantOfId})` : "";
  return `#${draft.id} [${draft.status}] ${draft.brand} news=${draft.newsId}${variant} ${draft.hook}`;
}

export function formatDraft(draft: DraftRecord): string {
  const slides = draft.slides.map((s, i) => `  ${i + 1}. ${s.title}: ${s.body}`);
  return [
    `Draft #${draft.id} [${draft.status}] ${draft.brand} / ${draft.category}`,
    `News: ${draft.newsId}  Seed: ${draft.seed}  Tone: ${draft.tone}  Language: ${draft.language}`,
    "",
    "Slides:",
    ...slides,
    "",
    "Caption:",
    draft.caption,
    "",
    `Hashtags: ${draft.hashtags.join(" ")}`,
    `CTA: ${draft.cta}`,
    draft.sourceLine,
    draft.disclaimer,
    ...(draft.editorNotes ? ["", `Notes: ${draft.editorNotes}`] : []),
  ].join("\n");
}

export function formatIngestSummary(summary: IngestSummary): string {
  const entries = Object.entries(summary);
  if (entries.length === 0) return "No sources to ingest.";
  const total = entries.reduce((sum, [, n]) => sum + n, 0);
  return [...entries.map(([name, n]) => `  ${name}: ${n}`), `Total inserted: ${total}`].join("\n");
}
