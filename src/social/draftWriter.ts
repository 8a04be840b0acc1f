/**
 * Draft generation for one news item and one brand.
 *
 * Deterministic: the seed (by default derived from the item url) drives
 * every template choice, so the same item and seed give the same draft.
 */

import type { Draft, DraftSource } from "../contracts";
import { draftSeed, pickPair } from "../lib/seed";
import { cleanText } from "../lib/textClean";
import { composeCaption, composeSlides, MAX_CAPTION_FACTS } from "../pipeline/compose";
import { extractKeySentences } from "../pipeline/sentences";
import { buildHashtags } from "./hashtags";
import type { BrandAdapter } from "./types";

export const DEFAULT_TONE = "neutral";
export const DEFAULT_LANGUAGE = "es";

export interface DraftOptions {
  seed?: number;
  tone?: string;
  language?: string;
}

/** `Fuente: {source}`, plus ` | {url}` when the item has one. */
export function buildSourceLine(item: DraftSource): string {
  return item.url ? `Fuente: ${item.source} | ${item.url}` : `Fuente: ${item.source}`;
}

export function buildDisclaimer(item: DraftSource): string {
  const base = `Contenido elaborado a partir de información publicada por ${item.source}.`;
  return item.url ? `${base} Noticia original: ${item.url}` : base;
}

export function generateDraft(
  item: DraftSource,
  brand: BrandAdapter,
  options: DraftOptions = {}
): Draft {
  const { spec } = brand;
  const seed = options.seed ?? draftSeed(item.url);
  const category = item.category ?? spec.fallbackCategory;

  const title = cleanText(item.title);
  const body = cleanText(item.rawSummary) || title;
  const sentences = extractKeySentences(title, body, { maxLength: spec.slides.maxLength });

  const { hook, cta } = pickPair(spec.templates.hooks, spec.templates.ctas, seed);
  const reading = brand.reading(category, seed);

  const slides = composeSlides(sentences, {
    titles: spec.slides.titles,
    fallbacks: spec.slides.fallbacks,
    closer: brand.slideCloser(reading, cta, seed),
    maxLength: spec.slides.maxLength,
  });

  const facts = sentences.length > 0 ? sentences.slice(0, MAX_CAPTION_FACTS) : [spec.factFallback];
  const caption = composeCaption({
    hook,
    facts,
    reading,
    cta,
    source: brand.captionSource(item),
    maxTotal: spec.captionMaxLength,
  });

  return {
    brand: spec.name,
    category,
    seed,
    hook,
    slides,
    caption,
    hashtags: buildHashtags(spec.templates.hashtags, category, seed),
    cta,
    sourceLine: buildSourceLine(item),
    disclaimer: buildDisclaimer(item),
    tone: options.tone ?? DEFAULT_TONE,
    language: options.language ?? DEFAULT_LANGUAGE,
    status: "DRAFT",
  };
}
