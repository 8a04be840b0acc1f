/**
 * Block composition for captions and carousel slides.
 *
 * Captions are assembled from labeled blocks and brought under a hard
 * budget by shrinking facts and reading first, never by cutting a word.
 */

import type { Slide } from "../contracts";
import { truncateAtSentence } from "./truncate";

export const SLIDE_BODY_MAX = 110;
export const SLIDE_COUNT = 3;
export const MAX_CAPTION_FACTS = 3;

const BLOCK_SEPARATOR = "\n\n";
/** Room left for separators when recomputing block budgets. */
const SEPARATOR_RESERVE = 30;

export interface CaptionBlocks {
  hook: string;
  facts: readonly string[];
  reading: string;
  cta: string;
  source: string;
  /** Label in front of the source block. */
  sourcePrefix?: string;
  maxTotal: number;
}

function joinBlocks(blocks: readonly string[]): string {
  return blocks
    .map((b) => b.trim())
    .filter((b) => b.length > 0)
    .join(BLOCK_SEPARATOR);
}

/**
 * Hook, facts, reading, CTA and source, separated by blank lines.
 * Never longer than `maxTotal`.
 */
export function composeCaption(blocks: CaptionBlocks): string {
  const { hook, facts, reading, cta, source, maxTotal } = blocks;
  const sourceLine = `${blocks.sourcePrefix ?? "Fuente"}: ${source}`;

  const caption = joinBlocks([
    hook,
    facts.slice(0, MAX_CAPTION_FACTS).join("\n"),
    reading,
    cta,
    sourceLine,
  ]);
  if (caption.length <= maxTotal) return caption;

  const target = maxTotal - hook.length - cta.length - sourceLine.length - SEPARATOR_RESERVE;
  let shrunk: string;

  if (facts.length > 0) {
    const half = Math.max(0, Math.floor(target / 2));
    let factText = facts.slice(0, 2).join("\n");
    if (factText.length > half) {
      factText = truncateAtSentence(factText, half);
    }
    const readingShort = reading ? truncateAtSentence(reading, half) : "";
    shrunk = joinBlocks([hook, factText, readingShort, cta, sourceLine]);
  } else {
    const readingShort = reading ? truncateAtSentence(reading, Math.max(0, target)) : "";
    shrunk = joinBlocks([hook, readingShort, cta, sourceLine]);
  }

  return shrunk.length > maxTotal ? truncateAtSentence(shrunk, maxTotal) : shrunk;
}

/** Fit one slide body: as-is when short enough, otherwise cut at a sentence. */
export function fitSlideBody(text: string, maxLength: number = SLIDE_BODY_MAX): string {
  return text.length <= maxLength ? text : truncateAtSentence(text, maxLength);
}

/** First candidate (or the fallback) fitted to the slide budget. */
export function composeSlideBody(
  candidates: readonly string[],
  fallback: string,
  maxLength: number = SLIDE_BODY_MAX
): string {
  const body = fitSlideBody(candidates[0] ?? fallback, maxLength);
  return body || fitSlideBody(fallback, maxLength);
}

export interface SlidePlan {
  titles: readonly [string, string, string];
  /** Fallback bodies for the opening and context slides. */
  fallbacks: readonly [string, string];
  /** Closing slide body when no third sentence exists. */
  closer: string;
  maxLength?: number;
}

/**
 * Three fixed slides: opening fact, context fact, closing fact or closer.
 * Missing sentences are filled from the plan; no body is ever empty.
 */
export function composeSlides(sentences: readonly string[], plan: SlidePlan): Slide[] {
  const maxLength = plan.maxLength ?? SLIDE_BODY_MAX;
  const [openTitle, contextTitle, closeTitle] = plan.titles;
  const [openFallback, contextFallback] = plan.fallbacks;

  return [
    { title: openTitle, body: composeSlideBody(sentences.slice(0, 1), openFallback, maxLength) },
    { title: contextTitle, body: composeSlideBody(sentences.slice(1, 2), contextFallback, maxLength) },
    { title: closeTitle, body: composeSlideBody(sentences.slice(2, 3), plan.closer, maxLength) },
  ];
}
