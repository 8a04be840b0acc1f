/**
 * Althara brand adapter (real estate).
 *
 * - Caption: up to 900 chars; hook, facts, strategic reading, CTA, source
 * - Hashtags: 8-12
 * - Slides: Hecho / Contexto / Cierre
 */

import type { DraftSource } from "../../contracts";
import { pick } from "../../lib/seed";
import { splitSentences } from "../../pipeline/sentences";
import { loadBrandTemplates } from "../templates";
import type { BrandAdapter, BrandSpec } from "../types";

const SLIDE_MAX = 110;

export function createAltharaAdapter(): BrandAdapter {
  const templates = loadBrandTemplates("althara");

  const spec: BrandSpec = {
    name: "althara",
    display: "Althara",
    domain: "real_estate",
    captionMaxLength: 900,
    fallbackCategory: "NOTICIAS_INMOBILIARIAS",
    factFallback: "Hecho en el enlace.",
    slides: {
      titles: ["Hecho", "Contexto", "Cierre"],
      fallbacks: ["Hecho en el enlace.", "Contexto en el enlace."],
      maxLength: SLIDE_MAX,
    },
    theme: {
      background: "#14161A",
      text: "#F4F1EA",
      accent: "#C8A96A",
      fontFamily: "'Georgia', 'Times New Roman', serif",
    },
    templates,
  };

  return {
    spec,

    reading(category: string, seed: number): string {
      const line = templates.readings[category] ?? templates.defaultReading;
      return `${line} ${pick(templates.closers, seed)}`;
    },

    // First sentence of the reading when it fits a slide, else the CTA.
    slideCloser(reading: string, cta: string): string {
      const first = splitSentences(reading)[0] ?? "";
      return first && first.length <= SLIDE_MAX ? first : cta;
    },

    captionSource(item: DraftSource): string {
      return item.source;
    },
  };
}
