/**
 * Brand summary: a short three-line take on a news item.
 *
 *   1. the fact (title plus source summary, shortened at a word)
 *   2. the brand's strategic reading for the category
 *   3. a closer rotated by seed
 */

import type { DraftSource } from "../contracts";
import { pick } from "../lib/seed";
import type { BrandAdapter, SummarySpec } from "./types";

const PLACEHOLDER = "…";

/** Whole words up to `width` chars; the placeholder marks a cut. */
export function shortenAtWord(text: string, width: number): string {
  const words = text.split(/\s+/).filter(Boolean);
  const joined = words.join(" ");
  if (joined.length <= width) return joined;

  let out = "";
  for (const word of words) {
    const next = out ? `${out} ${word}` : word;
    if (next.length + PLACEHOLDER.length > width) break;
    out = next;
  }
  return out + PLACEHOLDER;
}

export function buildFactLine(item: DraftSource, spec: SummarySpec): string {
  const title = item.title.trim();
  const summary = item.rawSummary?.trim();
  let fact = title;
  if (summary) {
    const lead = /[.!?]$/.test(title) ? title : `${title}.`;
    fact = shortenAtWord(`${lead} ${summary}`, spec.factWidth);
  }

  const lower = fact.toLowerCase();
  if (spec.neutralStarts.some((word) => lower.startsWith(`${word} `))) {
    return fact;
  }
  return `${spec.framePrefix} ${fact}`;
}

/** Null when the brand defines no summary. */
export function buildBrandSummary(
  item: DraftSource,
  brand: BrandAdapter,
  seed: number
): string | null {
  const { templates, fallbackCategory } = brand.spec;
  if (!templates.summary) return null;

  const category = item.category ?? fallbackCategory;
  return [
    buildFactLine(item, templates.summary),
    templates.readings[category] ?? templates.defaultReading,
    pick(templates.closers, seed),
  ].join("\n");
}
