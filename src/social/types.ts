/**
 * Brand layer types.
 *
 * BrandAdapter is the pluggable interface: each brand implements it.
 * Adding a new brand means creating a new adapter and registering it.
 */

import type { Domain, DraftSource } from "../contracts";
import type { SlideTheme } from "../lib/slideSvg";

/** Hashtag rules for a brand. */
export interface HashtagSpec {
  base: readonly string[];
  byCategory: Readonly<Record<string, readonly string[]>>;
  /** Used when the category has no entry in `byCategory`. */
  defaultCategory: readonly string[];
  /** Rotated by seed after the category tags. */
  extras: readonly string[];
  /** Numbered filler tags top the list up to `min`. */
  fillerPrefix: string;
  min: number;
  max: number;
}

/** Three-line brand summary of a news item: fact, reading, closer. */
export interface SummarySpec {
  /** Put before a fact line that does not open with a neutral word. */
  framePrefix: string;
  neutralStarts: readonly string[];
  /** The fact line is shortened at a word boundary to this many chars. */
  factWidth: number;
}

/** Template pools for a brand, loaded from data/brands/<name>.json. */
export interface BrandTemplates {
  hooks: readonly string[];
  ctas: readonly string[];
  closers: readonly string[];
  readings: Readonly<Record<string, string>>;
  defaultReading: string;
  hashtags: HashtagSpec;
  /** Brands without one produce no stored summary. */
  summary?: SummarySpec;
}

export interface SlideSpec {
  titles: readonly [string, string, string];
  fallbacks: readonly [string, string];
  maxLength: number;
}

/** Full brand specification. */
export interface BrandSpec {
  name: string;
  display: string;
  domain: Domain;
  captionMaxLength: number;
  /** Category used when an item arrives unclassified. */
  fallbackCategory: string;
  /** Caption fact used when no sentence could be extracted. */
  factFallback: string;
  slides: SlideSpec;
  theme: SlideTheme;
  templates: BrandTemplates;
}

/** Adapter interface: each brand implements this. */
export interface BrandAdapter {
  readonly spec: BrandSpec;
  /** Strategic reading block of the caption. */
  reading(category: string, seed: number): string;
  /** Body of the closing slide when no third sentence was extracted. */
  slideCloser(reading: string, cta: string, seed: number): string;
  /** Attribution text after the "Fuente:" label in the caption. */
  captionSource(item: DraftSource): string;
}
