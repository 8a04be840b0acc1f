/**
 * Tag extraction and relevance scoring for tech news.
 */

import type { TechCategory } from "../contracts";

export const MAX_TAGS = 8;
export const BASELINE_SCORE = 50;
/** Items scoring below this are not stored. */
export const MIN_RELEVANCE_SCORE = 2;

const TAG_TERMS: ReadonlySet<string> = new Set([
  "ai", "ia", "ml", "llm", "gpt", "startup", "tech", "software", "data",
  "cloud", "saas", "api", "blockchain", "crypto", "automation", "robot",
  "drone", "ar", "vr", "iot", "openai", "anthropic", "google", "microsoft",
  "meta", "nvidia",
]);

const CATEGORY_BOOST: Partial<Record<TechCategory, number>> = {
  AI_ML: 25,
  RELEASE_UPDATE: 15,
  TOOL_DISCOVERY: 15,
  RESEARCH: 10,
};

const HIGH_VALUE_KEYWORDS = ["inteligencia artificial", "ia ", " ai ", "machine learning", "llm", "gpt"];
const HIGH_VALUE_BOOST = 15;

function haystack(title: string, summary?: string | null): string {
  return `${title} ${summary ?? ""}`.toLowerCase();
}

/** Known tech terms in order of first appearance, at most MAX_TAGS. */
export function extractTags(title: string, summary?: string | null): string[] {
  const tags: string[] = [];
  for (const word of haystack(title, summary).match(/[a-z0-9áéíóúñ]+/g) ?? []) {
    if (TAG_TERMS.has(word) && !tags.includes(word)) {
      tags.push(word);
      if (tags.length === MAX_TAGS) break;
    }
  }
  return tags;
}

/** 0-100; baseline plus category and keyword boosts. */
export function computeRelevanceScore(
  title: string,
  summary: string | null | undefined,
  category: TechCategory
): number {
  let score = BASELINE_SCORE + (CATEGORY_BOOST[category] ?? 0);
  const text = haystack(title, summary);
  if (HIGH_VALUE_KEYWORDS.some((kw) => text.includes(kw))) {
    score += HIGH_VALUE_BOOST;
  }
  return Math.min(100, Math.max(0, score));
}
