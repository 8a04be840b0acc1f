import type { Draft, DraftSource } from "../contracts";
import { draftSeed, variantSeed } from "../lib/seed";
import { generateDraft, type DraftOptions } from "./draftWriter";
import type { BrandAdapter } from "./types";

/** Number of distinct hook/CTA pairs, the most variants a brand can give. */
export function variantCapacity(brand: BrandAdapter): number {
  return brand.spec.templates.hooks.length * brand.spec.templates.ctas.length;
}

/**
 * `count` drafts seeded base, base + 7, base + 14, ...
 * Any two of them differ in hook or CTA.
 */
export function generateVariants(
  item: DraftSource,
  brand: BrandAdapter,
  count: number,
  options: Omit<DraftOptions, "seed"> & { baseSeed?: number } = {}
): Draft[] {
  const capacity = variantCapacity(brand);
  if (!Number.isInteger(count) || count < 1 || count > capacity) {
    throw new RangeError(`Variant count must be an integer between 1 and ${capacity}, got ${count}`);
  }
  const base = options.baseSeed ?? draftSeed(item.url);
  return Array.from({ length: count }, (_, i) =>
    generateDraft(item, brand, {
      seed: variantSeed(base, i),
      tone: options.tone,
      language: options.language,
    })
  );
}
