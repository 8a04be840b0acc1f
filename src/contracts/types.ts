/**
 * Shared contract types for the newsdeck pipeline.
 *
 * Pipeline, social and ingest modules import shared types from here.
 * No pipeline module should import types from another pipeline module.
 */

// --- Domains & Taxonomies ---

export const DOMAINS = ["real_estate", "tech"] as const;
export type Domain = (typeof DOMAINS)[number];

export const REAL_ESTATE_CATEGORIES = [
  "FONDOS_INVERSION_INMOBILIARIA",
  "GRANDES_INVERSIONES_INMOBILIARIAS",
  "MOVIMIENTOS_GRANDES_TENEDORES",
  "TOKENIZATION_ACTIVOS",
  "NOTICIAS_INMOBILIARIAS",
  "NOTICIAS_HIPOTECAS",
  "NOTICIAS_LEYES_OKUPAS",
  "NOTICIAS_BOE_SUBASTAS",
  "NOTICIAS_DESAHUCIOS",
  "NOTICIAS_CONSTRUCCION",
  "PRECIOS_VIVIENDA",
  "PRECIOS_MATERIALES",
  "PRECIOS_SUELO",
  "FUTURO_SECTOR_INMOBILIARIO",
  "BURBUJA_INMOBILIARIA",
  "ALQUILER_VACACIONAL",
  "NORMATIVAS_VIVIENDAS",
  "FALTA_VIVIENDA",
  "NOTICIAS_URBANIZACION",
  "NOVEDADES_CONSTRUCCION",
  "CONSTRUCCION_MODULAR",
] as const;
export type RealEstateCategory = (typeof REAL_ESTATE_CATEGORIES)[number];

export const TECH_CATEGORIES = [
  "RELEASE_UPDATE",
  "TOOL_DISCOVERY",
  "RESEARCH",
  "AI_ML",
  "STARTUPS",
  "BIG_TECH",
  "SECURITY",
  "POLICY_ETHICS",
  "OTHER_TECH",
] as const;
export type TechCategory = (typeof TECH_CATEGORIES)[number];

export type Category = RealEstateCategory | TechCategory;

// --- News ---

/**
 * The narrow view of a news item the draft composer reads.
 * Nothing else on a stored record is visible to composition.
 */
export interface DraftSource {
  title: string;
  rawSummary: string | null;
  category: string | null;
  source: string;
  url: string;
}

/** A news item as produced by the ingestion boundary. */
export interface NewsItem extends DraftSource {
  domain: Domain;
  publishedAt: Date;
  tags: string | null;
  relevanceScore: number | null;
}

// --- Classification & Guardrails ---

export interface ClassificationRule<C extends string = string> {
  category: C;
  keywords: readonly string[];
}

/** Ordered rules plus the designated catch-all category. */
export interface RuleTable<C extends string = string> {
  fallback: C;
  rules: readonly ClassificationRule<C>[];
}

export interface GuardrailConfig {
  denyKeywords: readonly string[];
  allowKeywords: readonly string[];
  strictRequireAllow: boolean;
}

// --- Drafts ---

export const DRAFT_STATUSES = [
  "DRAFT",
  "NEEDS_REVIEW",
  "APPROVED",
  "PUBLISHED",
] as const;
export type DraftStatus = (typeof DRAFT_STATUSES)[number];

export interface Slide {
  title: string;
  body: string;
}

/** Generated draft content, before it is persisted. */
export interface Draft {
  brand: string;
  category: string;
  seed: number;
  hook: string;
  slides: Slide[];
  caption: string;
  hashtags: string[];
  cta: string;
  sourceLine: string;
  disclaimer: string;
  tone: string;
  language: string;
  status: DraftStatus;
}

// --- Ingestion ---

/** One configured feed. */
export interface FeedSource {
  name: string;
  url: string;
  source: string;
  domain: Domain;
}

/** Per-source inserted counts from one coordinator run. */
export type IngestSummary = Record<string, number>;
