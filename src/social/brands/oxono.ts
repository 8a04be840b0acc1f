/**
 * Oxono brand adapter (tech).
 *
 * - Caption: up to 850 chars; hook, facts, takeaways, CTA, source and url
 * - Hashtags: 6-10
 * - Slides: Tesis / Hecho / Cierre
 */

import type { DraftSource } from "../../contracts";
import { pick } from "../../lib/seed";
import { loadBrandTemplates } from "../templates";
import type { BrandAdapter, BrandSpec } from "../types";

export function createOxonoAdapter(): BrandAdapter {
  const templates = loadBrandTemplates("oxono");

  const spec: BrandSpec = {
    name: "oxono",
    display: "Oxono",
    domain: "tech",
    captionMaxLength: 850,
    fallbackCategory: "OTHER_TECH",
    factFallback: "Contexto técnico en el enlace.",
    slides: {
      titles: ["Tesis", "Hecho", "Cierre"],
      fallbacks: ["Tesis en el enlace.", "Hecho en el enlace."],
      maxLength: 110,
    },
    theme: {
      background: "#0B0F0C",
      text: "#E8F2EA",
      accent: "#4ADE80",
      fontFamily: "'Segoe UI', 'Helvetica Neue', Arial, sans-serif",
    },
    templates,
  };

  return {
    spec,

    reading(category: string): string {
      return templates.readings[category] ?? templates.defaultReading;
    },

    slideCloser(_reading: string, _cta: string, seed: number): string {
      return pick(templates.closers, seed);
    },

    captionSource(item: DraftSource): string {
      return item.url ? `${item.source} | ${item.url}` : item.source;
    },
  };
}
